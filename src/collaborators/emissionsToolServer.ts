import { z } from 'zod';
import { ToolServer } from '../transport/ToolServer.js';
import {
  EMISSION_FACTORS_RESOURCE,
  EMISSIONS_ENDPOINT,
  FOOTPRINT_EXPLANATION_PROMPT,
  FOOTPRINT_PRODUCT,
  FOOTPRINT_SHIPPING,
  SHIPPING_OPTIONS,
} from '../transport/toolNames.js';
import { SHIPPING_METHODS, type EmissionsProvider } from './EmissionsProvider.js';

export const productFootprintArgsSchema = z.object({
  category: z.string().min(1),
  price: z.number().nonnegative(),
  materials: z.array(z.string()).default([]),
});

export const shippingFootprintArgsSchema = z.object({
  method: z.enum(SHIPPING_METHODS),
});

/**
 * Tool endpoint fronting the emissions provider.
 */
export function createEmissionsToolServer(
  emissions: EmissionsProvider,
  options: { callTimeoutMs: number }
): ToolServer {
  return new ToolServer({ name: EMISSIONS_ENDPOINT, callTimeoutMs: options.callTimeoutMs })
    .registerTool({
      name: FOOTPRINT_PRODUCT,
      description: 'Per-unit footprint in kg CO2e for a product with the given attributes.',
      parameters: productFootprintArgsSchema,
      execute: async (args) => emissions.productFootprint(args),
    })
    .registerTool({
      name: FOOTPRINT_SHIPPING,
      description: 'Footprint in kg CO2e of shipping one order with the given method.',
      parameters: shippingFootprintArgsSchema,
      execute: async ({ method }) => emissions.shippingFootprint(method),
    })
    .registerTool({
      name: SHIPPING_OPTIONS,
      description: 'All shipping methods with their footprint, lowest first.',
      parameters: z.object({}),
      execute: async () => ({ options: emissions.shippingOptions() }),
    })
    .registerResource({
      uri: EMISSION_FACTORS_RESOURCE,
      name: 'Emission factors',
      description: 'The factor table used for every footprint calculation.',
      mimeType: 'application/json',
      read: async () => JSON.stringify(emissions.factors()),
    })
    .registerPrompt({
      name: FOOTPRINT_EXPLANATION_PROMPT,
      description: 'Explain a session footprint total to the shopper.',
      arguments: [
        { name: 'productKg', required: true },
        { name: 'shippingKg', required: true },
        { name: 'totalKg', required: true },
      ],
      render: (args) =>
        `Explain a shopping footprint of ${args.totalKg} kg CO2e: ${args.productKg} kg from products and ${args.shippingKg} kg from shipping.`,
    });
}
