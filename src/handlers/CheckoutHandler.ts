import { randomUUID } from 'node:crypto';
import pino from 'pino';
import { AppError } from '../errors/AppError.js';
import { isShippingMethod } from '../collaborators/EmissionsProvider.js';
import type { PaymentGateway } from '../collaborators/PaymentGateway.js';
import * as machine from '../session/footprintStateMachine.js';
import type { SessionService } from '../session/SessionService.js';
import type { ToolTransportClient } from '../transport/ToolTransportClient.js';
import { EMISSIONS_ENDPOINT } from '../transport/toolNames.js';
import type { HandlerRequest, HandlerResult, TaskParameters } from '../router/taskTypes.js';
import { BaseHandler } from './BaseHandler.js';
import { quoteShipping, shippingQuoteSchema, type ShippingQuote } from './toolCalls.js';

const logger = pino({ name: 'CheckoutHandler' });

export const CHECKOUT_HANDLER = 'checkout';

/**
 * Shipping selection, checkout and payment.
 *
 * Payment holds the session lock across the gateway call so the cart cannot
 * change between the charge and the PaymentSuccess transition.
 */
export class CheckoutHandler extends BaseHandler {
  readonly name = CHECKOUT_HANDLER;
  readonly description = 'Applies shipping choices, starts checkout and takes payment.';
  readonly capabilities = ['shipping_select', 'checkout', 'payment'] as const;

  constructor(
    transport: ToolTransportClient,
    private readonly sessions: SessionService,
    private readonly payments: PaymentGateway
  ) {
    super(transport, [EMISSIONS_ENDPOINT]);
  }

  async handle({ task, previous, signal }: HandlerRequest): Promise<HandlerResult> {
    switch (task.intent) {
      case 'shipping_select': {
        const quote = await this.shippingQuote(task.parameters, previous, signal);
        const session = await this.sessions.selectShipping(task.sessionId, quote.method, quote.footprintKg, signal);
        return {
          summary: `Shipping set to ${quote.label} (${quote.footprintKg} kg CO2e). Total footprint is now ${session.totalFootprintKg} kg CO2e.`,
          data: { shippingMethod: quote.method, shippingFootprintKg: quote.footprintKg },
          session,
        };
      }
      case 'payment':
        return this.pay(task.sessionId, signal);
      default: {
        const session = await this.sessions.checkout(task.sessionId, signal);
        const amount = machine.cartAmount(session.cartItems);
        return {
          summary: `Checkout started for ${machine.itemCount(session.cartItems)} items, ${amount.toFixed(2)} ${session.cartItems[0]?.currency ?? 'USD'}, ${session.totalFootprintKg} kg CO2e.`,
          data: { amount, lifecycle: session.lifecycle },
          session,
        };
      }
    }
  }

  /**
   * Use the quote the previous handler produced, or fetch one.
   */
  private async shippingQuote(
    parameters: TaskParameters,
    previous: HandlerResult | undefined,
    signal: AbortSignal
  ): Promise<ShippingQuote> {
    const fromPrevious = shippingQuoteSchema.safeParse(previous?.data.quote);
    if (fromPrevious.success) {
      return fromPrevious.data;
    }
    const method = parameters.shippingMethod;
    if (!method || !isShippingMethod(method)) {
      throw AppError.validation('Choose eco, ground or express shipping.', { shippingMethod: method ?? null });
    }
    return quoteShipping(this.transport, method, signal);
  }

  private pay(sessionId: string, signal: AbortSignal): Promise<HandlerResult> {
    return this.sessions.withLock(
      sessionId,
      async (current, commit) => {
        let session = current;
        if (session.lifecycle === 'active') {
          session = await commit(machine.checkout, 'checkout');
        }
        if (session.lifecycle !== 'checkout') {
          throw AppError.invalidSessionState('pay', 'There is no order waiting for payment.', {
            lifecycle: session.lifecycle,
          });
        }

        const orderId = `ord_${randomUUID()}`;
        const amount = machine.cartAmount(session.cartItems);
        const currency = session.cartItems[0]?.currency ?? 'USD';
        const charge = await this.payments.charge({ orderId, sessionId, amount, currency }, signal);

        if (!charge.ok) {
          logger.info({ sessionId, orderId, reason: charge.reason }, 'Payment declined');
          return {
            summary: `Payment was declined: ${charge.reason}. Your order is still waiting at checkout.`,
            data: { paid: false, reason: charge.reason },
            session,
          };
        }

        const paid = await commit(
          (state) => machine.paymentSuccess(state, { orderId, transactionId: charge.transactionId, paidAt: Date.now() }),
          'paymentSuccess'
        );
        return {
          summary: `Order ${orderId} is paid. It accounted for ${paid.lastOrder?.totalFootprintKg ?? 0} kg CO2e; your new cart starts at zero.`,
          data: { paid: true, order: paid.lastOrder },
          session: paid,
        };
      },
      signal
    );
  }
}
