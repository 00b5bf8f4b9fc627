import { z } from 'zod';
import { loadDataFile } from './dataFiles.js';

export const SHIPPING_METHODS = ['eco', 'ground', 'express'] as const;
export type ShippingMethod = (typeof SHIPPING_METHODS)[number];

export function isShippingMethod(value: string): value is ShippingMethod {
  return SHIPPING_METHODS.some((method) => method === value);
}

const shippingFactorSchema = z.object({
  label: z.string(),
  kgPerMile: z.number().nonnegative(),
  cost: z.number().nonnegative(),
  deliveryDays: z.string(),
});

export const emissionFactorsSchema = z.object({
  referenceDistanceMiles: z.number().positive(),
  packagingKg: z.number().nonnegative(),
  defaultMaterialFactor: z.number().positive(),
  manufacturingKgPer100Usd: z.record(z.string(), z.number().nonnegative()),
  defaultManufacturingKgPer100Usd: z.number().nonnegative(),
  materials: z.record(z.string(), z.number().nonnegative()),
  shipping: z.object({
    eco: shippingFactorSchema,
    ground: shippingFactorSchema,
    express: shippingFactorSchema,
  }),
});

export type EmissionFactors = z.infer<typeof emissionFactorsSchema>;

export interface ProductAttributes {
  category: string;
  price: number;
  materials: string[];
}

export type FootprintRating = 'A' | 'B' | 'C' | 'D' | 'E';

export interface ProductFootprint {
  footprintKg: number;
  manufacturingKg: number;
  packagingKg: number;
  rating: FootprintRating;
}

export interface ShippingFootprint {
  method: ShippingMethod;
  label: string;
  footprintKg: number;
  distanceMiles: number;
  kgPerMile: number;
  cost: number;
  deliveryDays: string;
}

/**
 * Pure mapping from product attributes and shipping methods to kg CO2e.
 */
export interface EmissionsProvider {
  productFootprint(attributes: ProductAttributes): ProductFootprint;
  shippingFootprint(method: ShippingMethod): ShippingFootprint;
  shippingOptions(): ShippingFootprint[];
  factors(): EmissionFactors;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function ratingFor(footprintKg: number): FootprintRating {
  if (footprintKg < 5) return 'A';
  if (footprintKg < 15) return 'B';
  if (footprintKg < 30) return 'C';
  if (footprintKg < 60) return 'D';
  return 'E';
}

/**
 * Emissions computed from a static factor table.
 *
 * Manufacturing is the category factor scaled by price and by the mean of the
 * material factors; one standard package is added per unit. Shipping is the
 * per-mile factor over the fixed reference distance.
 */
export class FactorTableEmissionsProvider implements EmissionsProvider {
  constructor(private readonly table: EmissionFactors) {}

  static fromDataFile(fileName = 'emissionFactors.json'): FactorTableEmissionsProvider {
    return new FactorTableEmissionsProvider(loadDataFile(fileName, emissionFactorsSchema));
  }

  productFootprint(attributes: ProductAttributes): ProductFootprint {
    const categoryFactor =
      this.table.manufacturingKgPer100Usd[attributes.category] ?? this.table.defaultManufacturingKgPer100Usd;
    const materialFactors = attributes.materials.map(
      (material) => this.table.materials[material] ?? this.table.defaultMaterialFactor
    );
    const materialFactor =
      materialFactors.length > 0
        ? materialFactors.reduce((sum, factor) => sum + factor, 0) / materialFactors.length
        : this.table.defaultMaterialFactor;

    const manufacturingKg = round2((attributes.price / 100) * categoryFactor * materialFactor);
    const footprintKg = round2(manufacturingKg + this.table.packagingKg);
    return {
      footprintKg,
      manufacturingKg,
      packagingKg: this.table.packagingKg,
      rating: ratingFor(footprintKg),
    };
  }

  shippingFootprint(method: ShippingMethod): ShippingFootprint {
    const factor = this.table.shipping[method];
    const distanceMiles = this.table.referenceDistanceMiles;
    return {
      method,
      label: factor.label,
      footprintKg: round2(distanceMiles * factor.kgPerMile),
      distanceMiles,
      kgPerMile: factor.kgPerMile,
      cost: factor.cost,
      deliveryDays: factor.deliveryDays,
    };
  }

  shippingOptions(): ShippingFootprint[] {
    return SHIPPING_METHODS.map((method) => this.shippingFootprint(method)).sort(
      (a, b) => a.footprintKg - b.footprintKg
    );
  }

  factors(): EmissionFactors {
    return this.table;
  }
}
