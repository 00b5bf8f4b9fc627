import { z } from 'zod';
import { ToolServer } from '../transport/ToolServer.js';
import { ToolExecutionError, TransportErrorCode } from '../transport/jsonRpc.js';
import {
  CATALOG_ENDPOINT,
  CATEGORIES_RESOURCE,
  PRODUCT_GET,
  PRODUCT_SEARCH,
  PRODUCT_SUMMARY_PROMPT,
} from '../transport/toolNames.js';
import type { CatalogService } from './catalogTypes.js';

export const productSearchArgsSchema = z.object({
  text: z.string().max(200).optional(),
  category: z.string().max(50).optional(),
  minPrice: z.number().nonnegative().optional(),
  maxPrice: z.number().nonnegative().optional(),
  limit: z.number().int().min(1).max(50).optional(),
});

export const productGetArgsSchema = z.object({
  productId: z.string().min(1),
});

/**
 * Tool endpoint fronting the catalog: product search and lookup, the
 * category list as a resource, and a product summary prompt.
 */
export function createCatalogToolServer(catalog: CatalogService, options: { callTimeoutMs: number }): ToolServer {
  return new ToolServer({ name: CATALOG_ENDPOINT, callTimeoutMs: options.callTimeoutMs })
    .registerTool({
      name: PRODUCT_SEARCH,
      description: 'Search products by free text, category and price range.',
      parameters: productSearchArgsSchema,
      execute: async (args) => {
        if (args.minPrice !== undefined && args.maxPrice !== undefined && args.minPrice > args.maxPrice) {
          throw new ToolExecutionError(TransportErrorCode.InvalidParams, 'minPrice must not exceed maxPrice');
        }
        const products = await catalog.search(args);
        return { products, totalCount: products.length };
      },
    })
    .registerTool({
      name: PRODUCT_GET,
      description: 'Get one product by its id.',
      parameters: productGetArgsSchema,
      execute: async ({ productId }) => {
        const product = await catalog.get(productId);
        if (!product) {
          throw new ToolExecutionError(TransportErrorCode.NotFound, `Product '${productId}' not found`);
        }
        return { product };
      },
    })
    .registerResource({
      uri: CATEGORIES_RESOURCE,
      name: 'Product categories',
      description: 'Every category present in the catalog, one per line.',
      mimeType: 'text/plain',
      read: async () => (await catalog.categories()).join('\n'),
    })
    .registerPrompt({
      name: PRODUCT_SUMMARY_PROMPT,
      description: 'One-paragraph summary of a product for the shopper.',
      arguments: [
        { name: 'name', description: 'Product name', required: true },
        { name: 'footprintKg', description: 'Per-unit footprint in kg CO2e', required: true },
        { name: 'price', description: 'Display price' },
      ],
      render: (args) => {
        const price = args.price ? ` It costs ${args.price}.` : '';
        return `Summarize ${args.name} for a shopper who cares about emissions. Its footprint is ${args.footprintKg} kg CO2e per unit.${price}`;
      },
    });
}
