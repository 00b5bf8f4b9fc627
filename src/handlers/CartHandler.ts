import { AppError } from '../errors/AppError.js';
import type { SessionService } from '../session/SessionService.js';
import type { SessionSnapshot } from '../session/sessionTypes.js';
import type { ToolTransportClient } from '../transport/ToolTransportClient.js';
import { CATALOG_ENDPOINT, EMISSIONS_ENDPOINT } from '../transport/toolNames.js';
import type { HandlerRequest, HandlerResult, TaskParameters } from '../router/taskTypes.js';
import { BaseHandler } from './BaseHandler.js';
import { productFootprint, resolveProduct } from './toolCalls.js';

export const CART_HANDLER = 'cart';

function describeCart(session: SessionSnapshot): string {
  if (session.cartItems.length === 0) {
    return 'Your cart is empty.';
  }
  const lines = session.cartItems.map((item) => `${item.quantity} x ${item.name}`);
  return `Your cart has ${lines.join(', ')}. Total footprint ${session.totalFootprintKg} kg CO2e.`;
}

/**
 * Cart mutations and views. Footprints are looked up before the session lock
 * is taken, so the lock is only held for the state transition itself.
 */
export class CartHandler extends BaseHandler {
  readonly name = CART_HANDLER;
  readonly description = 'Adds, removes and lists cart items and keeps the cart footprint current.';
  readonly capabilities = ['cart_add', 'cart_remove', 'cart_view', 'cart_clear'] as const;

  constructor(
    transport: ToolTransportClient,
    private readonly sessions: SessionService
  ) {
    super(transport, [CATALOG_ENDPOINT, EMISSIONS_ENDPOINT]);
  }

  async handle({ task, signal }: HandlerRequest): Promise<HandlerResult> {
    switch (task.intent) {
      case 'cart_add':
        return this.add(task.sessionId, task.parameters, signal);
      case 'cart_remove':
        return this.remove(task.sessionId, task.parameters, signal);
      case 'cart_clear': {
        const session = await this.sessions.clearCart(task.sessionId, signal);
        return { summary: 'Your cart is now empty.', data: { cleared: true }, session };
      }
      default: {
        const session = await this.sessions.view(task.sessionId);
        return { summary: describeCart(session), data: { items: session.cartItems }, session };
      }
    }
  }

  private async add(sessionId: string, parameters: TaskParameters, signal: AbortSignal): Promise<HandlerResult> {
    const product = await resolveProduct(this.transport, parameters, signal);
    const footprint = await productFootprint(this.transport, product, signal);
    const quantity = parameters.quantity ?? 1;

    const session = await this.sessions.addToCart(
      sessionId,
      {
        productId: product.id,
        name: product.name,
        quantity,
        unitPrice: product.price,
        currency: product.currency,
        footprintKg: footprint.footprintKg,
      },
      signal
    );

    return {
      summary: `Added ${quantity} x ${product.name} (${footprint.footprintKg} kg CO2e each). ${describeCart(session)}`,
      data: { added: { productId: product.id, quantity, footprintKg: footprint.footprintKg } },
      session,
    };
  }

  private async remove(sessionId: string, parameters: TaskParameters, signal: AbortSignal): Promise<HandlerResult> {
    const current = await this.sessions.view(sessionId);
    const reference = parameters.productRef?.toLowerCase();
    const line = current.cartItems.find(
      (item) =>
        item.productId === parameters.productId ||
        (reference !== undefined && item.name.toLowerCase().includes(reference))
    );
    if (!line) {
      throw AppError.invalidSessionState('remove from cart', 'That product is not in the cart.', {
        productRef: parameters.productRef ?? parameters.productId ?? null,
      });
    }

    const session = await this.sessions.removeFromCart(sessionId, line.productId, parameters.quantity, signal);
    const removed = Math.min(parameters.quantity ?? line.quantity, line.quantity);
    return {
      summary: `Removed ${removed} x ${line.name}. ${describeCart(session)}`,
      data: { removed: { productId: line.productId, quantity: removed } },
      session,
    };
  }
}
