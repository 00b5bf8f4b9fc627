import { loadDataFile } from './dataFiles.js';
import { catalogFileSchema, type CatalogService, type Product, type ProductQuery, type ProductRecord } from './catalogTypes.js';

const DEFAULT_LIMIT = 10;
const STOP_WORDS = new Set(['a', 'an', 'and', 'the', 'for', 'with', 'of', 'to', 'me', 'some', 'any']);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 1 && !STOP_WORDS.has(token));
}

function singular(token: string): string {
  return token.length > 3 && token.endsWith('s') && !token.endsWith('ss') ? token.slice(0, -1) : token;
}

/**
 * Catalog backed by a fixed product list. Text matching scores each product
 * by how many query tokens appear in its name, description or category.
 */
export class InMemoryCatalog implements CatalogService {
  private readonly products: Product[];

  constructor(records: ProductRecord[], currency = 'USD') {
    this.products = records.map((record) => Object.freeze({ ...record, currency }));
  }

  static fromDataFile(fileName = 'catalog.json'): InMemoryCatalog {
    const data = loadDataFile(fileName, catalogFileSchema);
    return new InMemoryCatalog(data.products, data.currency);
  }

  async search(query: ProductQuery): Promise<Product[]> {
    const tokens = query.text ? tokenize(query.text).map(singular) : [];
    const category = query.category?.toLowerCase();

    const scored: Array<{ product: Product; score: number }> = [];
    for (const product of this.products) {
      if (category && product.category !== category) {
        continue;
      }
      if (query.minPrice !== undefined && product.price < query.minPrice) {
        continue;
      }
      if (query.maxPrice !== undefined && product.price > query.maxPrice) {
        continue;
      }

      let score = 0;
      if (tokens.length > 0) {
        const haystack = `${product.name} ${product.description} ${product.category}`.toLowerCase();
        score = tokens.filter((token) => haystack.includes(token)).length;
        if (score === 0) {
          continue;
        }
      }
      scored.push({ product, score });
    }

    scored.sort((a, b) => b.score - a.score || a.product.price - b.product.price);
    return scored.slice(0, query.limit ?? DEFAULT_LIMIT).map((entry) => entry.product);
  }

  async get(productId: string): Promise<Product | null> {
    return this.products.find((product) => product.id === productId) ?? null;
  }

  async categories(): Promise<string[]> {
    return [...new Set(this.products.map((product) => product.category))].sort();
  }
}
