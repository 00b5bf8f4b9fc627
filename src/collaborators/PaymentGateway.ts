import { randomUUID } from 'node:crypto';
import pino from 'pino';

const logger = pino({ name: 'PaymentGateway' });

export interface ChargeRequest {
  orderId: string;
  sessionId: string;
  amount: number;
  currency: string;
}

export type ChargeResult = { ok: true; transactionId: string } | { ok: false; reason: string };

/**
 * Opaque payment backend. Only the success or failure signal matters to callers.
 */
export interface PaymentGateway {
  charge(request: ChargeRequest, signal?: AbortSignal): Promise<ChargeResult>;
}

export interface SimulatedPaymentGatewayOptions {
  /** Return a reason to decline the charge, or null to accept it. */
  decline?: (request: ChargeRequest) => string | null;
}

/**
 * Accepts every positive charge unless `decline` says otherwise.
 */
export class SimulatedPaymentGateway implements PaymentGateway {
  private readonly decline: (request: ChargeRequest) => string | null;

  constructor(options: SimulatedPaymentGatewayOptions = {}) {
    this.decline = options.decline ?? (() => null);
  }

  async charge(request: ChargeRequest, signal?: AbortSignal): Promise<ChargeResult> {
    if (signal?.aborted) {
      return { ok: false, reason: 'Payment was cancelled' };
    }
    if (!(request.amount > 0)) {
      return { ok: false, reason: 'Amount must be greater than zero' };
    }

    const reason = this.decline(request);
    if (reason) {
      logger.info({ orderId: request.orderId, reason }, 'Charge declined');
      return { ok: false, reason };
    }

    const transactionId = `txn_${randomUUID()}`;
    logger.info({ orderId: request.orderId, amount: request.amount, currency: request.currency }, 'Charge accepted');
    return { ok: true, transactionId };
  }
}
