import { AppError } from '../errors/AppError.js';
import { isShippingMethod } from '../collaborators/EmissionsProvider.js';
import type { SessionService } from '../session/SessionService.js';
import type { ToolTransportClient } from '../transport/ToolTransportClient.js';
import { EMISSIONS_ENDPOINT, FOOTPRINT_EXPLANATION_PROMPT } from '../transport/toolNames.js';
import type { HandlerRequest, HandlerResult } from '../router/taskTypes.js';
import { BaseHandler } from './BaseHandler.js';
import { listShippingOptions, productFootprint, quoteShipping, resolveProduct } from './toolCalls.js';

export const FOOTPRINT_HANDLER = 'footprint';

/**
 * Footprint calculations. Reads the session but never writes it.
 *
 * - shipping_select: quotes the chosen method for the next handler in the chain
 * - shipping_options: every method with its footprint
 * - footprint: one product's footprint, or the session's running total
 */
export class FootprintHandler extends BaseHandler {
  readonly name = FOOTPRINT_HANDLER;
  readonly description = 'Calculates product, shipping and session carbon footprints.';
  readonly capabilities = ['footprint', 'shipping_options'] as const;

  constructor(
    transport: ToolTransportClient,
    private readonly sessions: SessionService
  ) {
    super(transport, [EMISSIONS_ENDPOINT]);
  }

  async handle({ task, signal }: HandlerRequest): Promise<HandlerResult> {
    const { parameters } = task;

    switch (task.intent) {
      case 'shipping_select': {
        const method = parameters.shippingMethod;
        if (!method || !isShippingMethod(method)) {
          throw AppError.validation('Choose eco, ground or express shipping.', { shippingMethod: method ?? null });
        }
        const quote = await quoteShipping(this.transport, method, signal);
        return {
          summary: `${quote.label} adds ${quote.footprintKg} kg CO2e.`,
          data: { quote },
        };
      }

      case 'shipping_options': {
        const options = await listShippingOptions(this.transport, signal);
        const lines = options.map((option) => `${option.label}: ${option.footprintKg} kg CO2e, ${option.deliveryDays} days`);
        return { summary: `Shipping options, lowest footprint first. ${lines.join('; ')}.`, data: { options } };
      }

      default: {
        if (task.intent === 'footprint' && (parameters.productId || parameters.productRef)) {
          const product = await resolveProduct(this.transport, parameters, signal);
          const footprint = await productFootprint(this.transport, product, signal);
          return {
            summary: `${product.name} has a footprint of ${footprint.footprintKg} kg CO2e per unit (rating ${footprint.rating}).`,
            data: { product, footprint },
          };
        }
        return this.sessionFootprint(task.sessionId, signal);
      }
    }
  }

  private async sessionFootprint(sessionId: string, signal: AbortSignal): Promise<HandlerResult> {
    const session = await this.sessions.view(sessionId);
    const explanation = await this.transport.renderPrompt(
      EMISSIONS_ENDPOINT,
      FOOTPRINT_EXPLANATION_PROMPT,
      {
        productKg: String(session.productFootprintKg),
        shippingKg: String(session.shippingFootprintKg),
        totalKg: String(session.totalFootprintKg),
      },
      signal
    );
    return {
      summary: `Your cart's footprint is ${session.totalFootprintKg} kg CO2e (${session.productFootprintKg} kg products, ${session.shippingFootprintKg} kg shipping).`,
      data: {
        productFootprintKg: session.productFootprintKg,
        shippingFootprintKg: session.shippingFootprintKg,
        totalFootprintKg: session.totalFootprintKg,
        explanation,
      },
      session,
    };
  }
}
