import { AppError } from '../errors/AppError.js';
import type { ToolTransportClient } from '../transport/ToolTransportClient.js';
import { CATALOG_ENDPOINT, EMISSIONS_ENDPOINT } from '../transport/toolNames.js';
import type { HandlerRequest, HandlerResult } from '../router/taskTypes.js';
import { BaseHandler } from './BaseHandler.js';
import { getProduct, rateProducts, type RatedProduct } from './toolCalls.js';

export const COMPARISON_HANDLER = 'comparison';

/** Footprint counts for 70% of the value score, price for 30%. */
const FOOTPRINT_WEIGHT = 0.7;
const PRICE_WEIGHT = 0.3;
const MAX_COMPARED = 5;

export interface ComparedProduct extends RatedProduct {
  valueScore: number;
}

function normalizeLowerIsBetter(value: number, min: number, max: number): number {
  return max === min ? 1 : (max - value) / (max - min);
}

/**
 * Score each product by footprint and price relative to the others, 1 being best.
 */
export function scoreProducts(products: RatedProduct[]): ComparedProduct[] {
  const footprints = products.map((product) => product.footprintKg);
  const prices = products.map((product) => product.price);
  const [minF, maxF] = [Math.min(...footprints), Math.max(...footprints)];
  const [minP, maxP] = [Math.min(...prices), Math.max(...prices)];

  return products.map((product) => {
    const score =
      FOOTPRINT_WEIGHT * normalizeLowerIsBetter(product.footprintKg, minF, maxF) +
      PRICE_WEIGHT * normalizeLowerIsBetter(product.price, minP, maxP);
    return { ...product, valueScore: Math.round(score * 100) / 100 };
  });
}

function pick(products: ComparedProduct[], better: (a: ComparedProduct, b: ComparedProduct) => boolean): ComparedProduct {
  return products.reduce((best, product) => (better(product, best) ? product : best));
}

export class ComparisonHandler extends BaseHandler {
  readonly name = COMPARISON_HANDLER;
  readonly description = 'Compares products side by side on footprint and price.';
  readonly capabilities = ['compare'] as const;

  constructor(transport: ToolTransportClient) {
    super(transport, [CATALOG_ENDPOINT, EMISSIONS_ENDPOINT]);
  }

  async handle({ task, signal }: HandlerRequest): Promise<HandlerResult> {
    const productIds = [...new Set(task.parameters.productIds ?? [])].slice(0, MAX_COMPARED);
    if (productIds.length < 2) {
      throw AppError.validation('Name at least two products to compare.', { productCount: productIds.length });
    }

    const products = await Promise.all(productIds.map((productId) => getProduct(this.transport, productId, signal)));
    const compared = scoreProducts(await rateProducts(this.transport, products, signal));

    const lowestFootprint = pick(compared, (a, b) => a.footprintKg < b.footprintKg);
    const cheapest = pick(compared, (a, b) => a.price < b.price);
    const bestValue = pick(compared, (a, b) => a.valueScore > b.valueScore);

    return {
      summary: `${lowestFootprint.name} has the lowest footprint (${lowestFootprint.footprintKg} kg CO2e); ${cheapest.name} is the cheapest; ${bestValue.name} is the best overall value.`,
      data: {
        products: compared,
        lowestFootprint: lowestFootprint.id,
        cheapest: cheapest.id,
        bestValue: bestValue.id,
      },
    };
  }
}
