/**
 * Field name standardisation
 *
 * WellInfo spells field names the way operators file them ("BRADFORD CYN");
 * the Field table uses the board's names ("BRADFORD CANYON FIELD"). The
 * mapping lives in data/field-names.json.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

const FIELD_NAMES_URL = new URL('../../data/field-names.json', import.meta.url);

const fieldNameTableSchema = z.record(z.string(), z.string());

export type FieldNameTable = Readonly<Record<string, string>>;

let cached: FieldNameTable | null = null;

/**
 * The bundled field name table, read once.
 */
export function defaultFieldNames(): FieldNameTable {
  if (cached === null) {
    const raw: unknown = JSON.parse(readFileSync(FIELD_NAMES_URL, 'utf8'));
    cached = fieldNameTableSchema.parse(raw);
  }
  return cached;
}

/**
 * Standard name for a raw field name. Names missing from the table are
 * returned unchanged.
 */
export function standardizeFieldName(
  name: string | null,
  table: FieldNameTable = defaultFieldNames()
): string | null {
  if (name === null) return null;
  return table[name] ?? name;
}
