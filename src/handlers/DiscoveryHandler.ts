import type { ToolTransportClient } from '../transport/ToolTransportClient.js';
import { CATALOG_ENDPOINT, EMISSIONS_ENDPOINT } from '../transport/toolNames.js';
import type { HandlerRequest, HandlerResult } from '../router/taskTypes.js';
import { BaseHandler } from './BaseHandler.js';
import { rateProducts, searchProducts } from './toolCalls.js';

export const DISCOVERY_HANDLER = 'discovery';

const SEARCH_LIMIT = 5;
const COMPARE_CANDIDATES = 3;

/**
 * Product search with a per-unit footprint on every hit, lowest footprint
 * first. For a compare request without explicit products it picks the
 * candidates and asks for a comparison follow-up.
 */
export class DiscoveryHandler extends BaseHandler {
  readonly name = DISCOVERY_HANDLER;
  readonly description = 'Finds products and rates each one by its carbon footprint.';
  readonly capabilities = ['product_search', 'compare'] as const;

  constructor(transport: ToolTransportClient) {
    super(transport, [CATALOG_ENDPOINT, EMISSIONS_ENDPOINT]);
  }

  async handle({ task, signal }: HandlerRequest): Promise<HandlerResult> {
    const { parameters } = task;
    const products = await searchProducts(
      this.transport,
      {
        text: parameters.query,
        category: parameters.category,
        minPrice: parameters.minPrice,
        maxPrice: parameters.maxPrice,
        limit: SEARCH_LIMIT,
      },
      signal
    );

    const rated = await rateProducts(this.transport, products, signal);
    rated.sort((a, b) => a.footprintKg - b.footprintKg);

    if (task.intent === 'compare' && rated.length >= 2) {
      const productIds = rated.slice(0, COMPARE_CANDIDATES).map((product) => product.id);
      return {
        summary: `Picked ${productIds.length} products to compare.`,
        data: { products: rated },
        followUp: { intent: 'compare', parameters: { productIds }, handlers: ['comparison'] },
      };
    }

    const summary =
      rated.length === 0
        ? `No products matched "${parameters.query ?? task.originText}".`
        : `Found ${rated.length} product${rated.length === 1 ? '' : 's'}; ${rated[0].name} has the lowest footprint at ${rated[0].footprintKg} kg CO2e.`;

    return { summary, data: { products: rated } };
  }
}
