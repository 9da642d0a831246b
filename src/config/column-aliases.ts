import { z } from 'zod';
import { CANONICAL_FIELDS, CanonicalField } from '../types/domain.types';
import rawAliases from './column-aliases.json';

// Blank entries are tolerated in the data file and dropped here
const aliasListSchema = z
  .array(z.string())
  .transform(aliases => aliases.map(alias => alias.trim()).filter(alias => alias.length > 0));

// Zod schema for the declarative alias tables
const ColumnAliasesSchema = z.object({
  single: z.record(z.string(), aliasListSchema),
  address: aliasListSchema.refine(aliases => aliases.length > 0, 'At least one address alias is required')
});

export interface AliasRule {
  field: CanonicalField;
  /** Matched case-insensitively against trimmed headers; earlier aliases win. */
  aliases: string[];
}

export interface ColumnAliases {
  single: AliasRule[];
  /** Headers whose values are joined into the composite address. */
  address: string[];
}

export function isCanonicalField(value: string): value is CanonicalField {
  return CANONICAL_FIELDS.some(field => field === value);
}

export function parseColumnAliases(input: unknown): ColumnAliases {
  const validationResult = ColumnAliasesSchema.safeParse(input);

  if (!validationResult.success) {
    const errors = validationResult.error.issues.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Column alias validation failed: ${errors}`);
  }

  const validated = validationResult.data;
  const single: AliasRule[] = [];

  for (const [field, aliases] of Object.entries(validated.single)) {
    if (!isCanonicalField(field)) {
      throw new Error(`Column alias validation failed: single.${field}: not a canonical output field`);
    }
    single.push({ field, aliases });
  }

  return { single, address: validated.address };
}

export function loadColumnAliases(): ColumnAliases {
  return parseColumnAliases(rawAliases);
}
