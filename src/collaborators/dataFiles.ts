import { readFileSync } from 'node:fs';
import { z } from 'zod';

/**
 * Read and validate a JSON file from the repository's data/ directory.
 * Resolved relative to this module so it works from src/ and dist/ alike.
 */
export function loadDataFile<T>(fileName: string, schema: z.ZodType<T>): T {
  const url = new URL(`../../data/${fileName}`, import.meta.url);
  const raw: unknown = JSON.parse(readFileSync(url, 'utf8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const messages = parsed.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Data file ${fileName} is invalid:\n${messages.join('\n')}`);
  }
  return parsed.data;
}
