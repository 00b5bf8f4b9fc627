/**
 * Canonical tool, resource and prompt names published by the built-in endpoints.
 *
 * Tool calls should reference these constants instead of inline string literals.
 * Names can be verified by running: npm run tools:list
 */

export const CATALOG_ENDPOINT = 'catalog';
export const EMISSIONS_ENDPOINT = 'emissions';

/** Search the catalog by text, category and price range */
export const PRODUCT_SEARCH = 'product.search';

/** Get a single product by id */
export const PRODUCT_GET = 'product.get';

/** Product attributes to kg CO2e per unit */
export const FOOTPRINT_PRODUCT = 'footprint.product';

/** Shipping method to kg CO2e for the reference distance */
export const FOOTPRINT_SHIPPING = 'footprint.shipping';

/** All shipping methods with their footprint, lowest first */
export const SHIPPING_OPTIONS = 'shipping.options';

export const CATEGORIES_RESOURCE = 'catalog://categories';
export const EMISSION_FACTORS_RESOURCE = 'emissions://factors';

export const PRODUCT_SUMMARY_PROMPT = 'product.summary';
export const FOOTPRINT_EXPLANATION_PROMPT = 'footprint.explain';

export const ALL_TOOLS = [
  PRODUCT_SEARCH,
  PRODUCT_GET,
  FOOTPRINT_PRODUCT,
  FOOTPRINT_SHIPPING,
  SHIPPING_OPTIONS,
] as const;
