import { z } from 'zod';
import { AppError } from '../errors/AppError.js';
import { productSchema, type Product } from '../collaborators/catalogTypes.js';
import { TransportErrorCode } from '../transport/jsonRpc.js';
import type { ToolTransportClient } from '../transport/ToolTransportClient.js';
import {
  CATALOG_ENDPOINT,
  EMISSIONS_ENDPOINT,
  FOOTPRINT_PRODUCT,
  FOOTPRINT_SHIPPING,
  PRODUCT_GET,
  PRODUCT_SEARCH,
  SHIPPING_OPTIONS,
} from '../transport/toolNames.js';
import { SHIPPING_METHODS, type ShippingMethod } from '../collaborators/EmissionsProvider.js';

/**
 * Typed wrappers over the built-in tool endpoints. Each result is checked
 * against its schema before it reaches a handler.
 */

const catalogProductSchema = productSchema.extend({ currency: z.string() });

const searchResultSchema = z.object({
  products: z.array(catalogProductSchema),
  totalCount: z.number(),
});

const getResultSchema = z.object({ product: catalogProductSchema });

const productFootprintSchema = z.object({
  footprintKg: z.number(),
  manufacturingKg: z.number(),
  packagingKg: z.number(),
  rating: z.enum(['A', 'B', 'C', 'D', 'E']),
});

export const shippingQuoteSchema = z.object({
  method: z.enum(SHIPPING_METHODS),
  label: z.string(),
  footprintKg: z.number(),
  distanceMiles: z.number(),
  kgPerMile: z.number(),
  cost: z.number(),
  deliveryDays: z.string(),
});

export type ProductFootprintResult = z.infer<typeof productFootprintSchema>;
export type ShippingQuote = z.infer<typeof shippingQuoteSchema>;

export interface RatedProduct extends Product {
  footprintKg: number;
  rating: ProductFootprintResult['rating'];
}

function parseResult<T>(schema: z.ZodType<T>, value: unknown, endpointId: string, toolName: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw AppError.upstreamInvocation(
      endpointId,
      `tools/call ${toolName}`,
      TransportErrorCode.UpstreamUnavailable,
      `Unexpected result from ${toolName}`
    );
  }
  return parsed.data;
}

export interface SearchArgs {
  text?: string;
  category?: string;
  minPrice?: number;
  maxPrice?: number;
  limit?: number;
}

export async function searchProducts(
  transport: ToolTransportClient,
  args: SearchArgs,
  signal: AbortSignal
): Promise<Product[]> {
  const raw = await transport.invoke(CATALOG_ENDPOINT, PRODUCT_SEARCH, { ...args }, signal);
  return parseResult(searchResultSchema, raw, CATALOG_ENDPOINT, PRODUCT_SEARCH).products;
}

export async function getProduct(transport: ToolTransportClient, productId: string, signal: AbortSignal): Promise<Product> {
  const raw = await transport.invoke(CATALOG_ENDPOINT, PRODUCT_GET, { productId }, signal);
  return parseResult(getResultSchema, raw, CATALOG_ENDPOINT, PRODUCT_GET).product;
}

export async function productFootprint(
  transport: ToolTransportClient,
  product: Product,
  signal: AbortSignal
): Promise<ProductFootprintResult> {
  const raw = await transport.invoke(
    EMISSIONS_ENDPOINT,
    FOOTPRINT_PRODUCT,
    { category: product.category, price: product.price, materials: product.materials },
    signal
  );
  return parseResult(productFootprintSchema, raw, EMISSIONS_ENDPOINT, FOOTPRINT_PRODUCT);
}

export async function rateProducts(
  transport: ToolTransportClient,
  products: Product[],
  signal: AbortSignal
): Promise<RatedProduct[]> {
  return Promise.all(
    products.map(async (product) => {
      const footprint = await productFootprint(transport, product, signal);
      return { ...product, footprintKg: footprint.footprintKg, rating: footprint.rating };
    })
  );
}

export async function quoteShipping(
  transport: ToolTransportClient,
  method: ShippingMethod,
  signal: AbortSignal
): Promise<ShippingQuote> {
  const raw = await transport.invoke(EMISSIONS_ENDPOINT, FOOTPRINT_SHIPPING, { method }, signal);
  return parseResult(shippingQuoteSchema, raw, EMISSIONS_ENDPOINT, FOOTPRINT_SHIPPING);
}

export async function listShippingOptions(transport: ToolTransportClient, signal: AbortSignal): Promise<ShippingQuote[]> {
  const raw = await transport.invoke(EMISSIONS_ENDPOINT, SHIPPING_OPTIONS, {}, signal);
  return parseResult(z.object({ options: z.array(shippingQuoteSchema) }), raw, EMISSIONS_ENDPOINT, SHIPPING_OPTIONS).options;
}

/**
 * Resolve a product from an explicit id or a name fragment. Throws a
 * not-found validation error when nothing matches.
 */
export async function resolveProduct(
  transport: ToolTransportClient,
  reference: { productId?: string; productRef?: string },
  signal: AbortSignal
): Promise<Product> {
  if (reference.productId) {
    try {
      return await getProduct(transport, reference.productId, signal);
    } catch (error) {
      if (error instanceof AppError && error.details?.transportCode === TransportErrorCode.NotFound) {
        throw AppError.notFound('Product', reference.productId);
      }
      throw error;
    }
  }
  if (reference.productRef) {
    const [match] = await searchProducts(transport, { text: reference.productRef, limit: 1 }, signal);
    if (match) {
      return match;
    }
    throw AppError.notFound('Product', reference.productRef);
  }
  throw AppError.validation('Which product do you mean?');
}
