import { z } from 'zod';

export const productSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  category: z.string().min(1),
  price: z.number().nonnegative(),
  materials: z.array(z.string()),
  weightKg: z.number().nonnegative(),
});

export const catalogFileSchema = z.object({
  currency: z.string().length(3),
  products: z.array(productSchema),
});

export type ProductRecord = z.infer<typeof productSchema>;

export interface Product extends ProductRecord {
  currency: string;
}

export interface ProductQuery {
  text?: string;
  category?: string;
  minPrice?: number;
  maxPrice?: number;
  limit?: number;
}

/**
 * Read-only product catalog.
 */
export interface CatalogService {
  search(query: ProductQuery): Promise<Product[]>;
  get(productId: string): Promise<Product | null>;
  categories(): Promise<string[]>;
}
