import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { Catalog } from '../../domain/catalog/Catalog.js';

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

const itemSchema = z.object({
  itemId: z.string().min(1).regex(/^[a-z0-9-]+$/, 'must be lowercase letters, digits or dashes'),
  name: z.string().min(1).max(50),
  price: z
    .number()
    .positive()
    .refine(price => Math.abs(price * 100 - Math.round(price * 100)) < 1e-6, 'must have at most two decimals'),
  category: z.enum(['healthy', 'fun']),
  image: z.string().regex(/\.(jpg|png|gif)$/, 'must be a .jpg, .png or .gif file'),
  description: z.string().max(200).optional(),
});

const catalogSchema = z.array(itemSchema).min(1, 'catalog must contain at least one item');

export function parseCatalog(raw: unknown): Catalog {
  const result = catalogSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CatalogError(`Invalid catalog:\n  ${issues.join('\n  ')}`);
  }

  try {
    return new Catalog(result.data);
  } catch (err) {
    throw new CatalogError(err instanceof Error ? err.message : String(err));
  }
}

export function loadCatalog(path: string): Catalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new CatalogError(`Unable to read catalog at ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  return parseCatalog(raw);
}
