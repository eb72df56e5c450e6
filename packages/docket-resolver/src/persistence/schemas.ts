/**
 * Source Row Schemas
 *
 * Zod schemas for every table the resolvers read. SQLite hands back loosely
 * typed values (integer ids, REAL direction codes, blank strings), so each
 * column is coerced before the resolvers see it: blanks become null, numeric
 * text becomes a number, numbers in text columns become strings.
 */

import { z } from 'zod';
import { MissingColumnError, RowValidationError } from '../core/errors.js';

// ============================================================================
// Column Coercion
// ============================================================================

function isBlank(value: unknown): boolean {
  return (
    value === undefined ||
    value === null ||
    (typeof value === 'string' && value.trim() === '')
  );
}

function toText(value: unknown): unknown {
  if (typeof value === 'number' || typeof value === 'bigint') {
    return String(value);
  }
  return typeof value === 'string' ? value.trim() : value;
}

function toNumber(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string') {
    return Number(value.trim());
  }
  return value;
}

/** Text column that must hold a value. */
const text = z.preprocess(toText, z.string().min(1));

/** Text column; blanks read as null. */
const nullableText = z.preprocess(
  (value) => (isBlank(value) ? null : toText(value)),
  z.string().nullable()
);

/** Text column; blanks read as the empty string. */
const optionalText = z.preprocess(
  (value) => (isBlank(value) ? '' : toText(value)),
  z.string()
);

/**
 * Numeric column; blanks and non-numeric text read as null, the way a
 * coercing numeric parse treats them.
 */
const nullableNumber = z.preprocess((value) => {
  if (isBlank(value)) return null;
  const n = toNumber(value);
  return typeof n === 'number' && !Number.isFinite(n) ? null : n;
}, z.number().nullable());

/** 0/1 style flag. */
const flag = z.preprocess((value) => {
  if (isBlank(value)) return false;
  if (typeof value === 'string') {
    return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return Number(value) === 1;
  }
  return value;
}, z.boolean());

// ============================================================================
// Row Schemas
// ============================================================================

export const wellInfoRowSchema = z.object({
  WellID: text,
  WellName: optionalText,
  Operator: nullableText,
  WorkType: nullableText,
  CurrentWellStatus: nullableText,
  CurrentWellType: nullableText,
  DrySpud: nullableText,
  Board_Year: text,
  Docket_Month: text,
  Board_Docket: text,
  FieldName: nullableText,
  Elevation: nullableNumber,
  MainWell: flag,
  'Mineral Lease': nullableText,
  ConcCode: nullableText,
});

export const surveyRowSchema = z.object({
  APINumber: text,
  X: nullableNumber,
  Y: nullableNumber,
  MeasuredDepth: nullableNumber,
  TrueVerticalDepth: nullableNumber,
  CitingType: nullableText,
});

export const boardDataRowSchema = z.object({
  Sec: nullableText,
  Township: nullableText,
  TownshipDir: nullableText,
  Range: nullableText,
  RangeDir: nullableText,
  PM: nullableText,
  DocketNumber: text,
  CauseNumber: text,
  Quip: nullableText,
  OrderType: nullableText,
  EffectiveDate: nullableText,
  EndDate: nullableText,
  /** Plat code the record references directly, when the table carries one. */
  Conc: nullableText,
});

export const boardDocumentRowSchema = z.object({
  Cause: text,
  Description: optionalText,
  Filepath: optionalText,
  DocumentDate: nullableText,
});

export const platRowSchema = z.object({
  Lat: nullableNumber,
  Lon: nullableNumber,
  Conc: text,
  Board_Docket: text,
  Order: nullableNumber,
});

export const adjacentRowSchema = z.object({
  Board_Docket: text,
  Order: nullableNumber,
  src_FullCo: text,
});

export const fieldRowSchema = z.object({
  Field_Name: text,
  Easting: nullableNumber,
  Northing: nullableNumber,
});

/** Land ownership parcel; geometry is WKT in WGS84 lon/lat. */
export const ownerRowSchema = z.object({
  conc: text,
  owner: nullableText,
  state_legend: nullableText,
  geometry: nullableText,
});

// ============================================================================
// Table Definitions
// ============================================================================

export interface TableDefinition<T> {
  readonly table: string;
  /** Columns whose absence aborts the load. */
  readonly required: readonly string[];
  /** Source column name to the name the schema expects. */
  readonly renames?: Readonly<Record<string, string>>;
  readonly row: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export const TABLES = {
  wellInfo: {
    table: 'WellInfo',
    required: [
      'WellID',
      'WellName',
      'Operator',
      'WorkType',
      'CurrentWellStatus',
      'CurrentWellType',
      'DrySpud',
      'Board_Year',
      'Docket_Month',
      'Board_Docket',
      'FieldName',
      'Elevation',
    ],
    renames: { entityname: 'Operator' },
    row: wellInfoRowSchema,
  },
  surveys: {
    table: 'DX',
    required: ['APINumber', 'X', 'Y', 'MeasuredDepth', 'TrueVerticalDepth', 'CitingType'],
    row: surveyRowSchema,
  },
  boardData: {
    table: 'BoardData',
    required: [
      'Sec',
      'Township',
      'TownshipDir',
      'Range',
      'RangeDir',
      'PM',
      'DocketNumber',
      'CauseNumber',
      'Quip',
      'OrderType',
      'EffectiveDate',
      'EndDate',
    ],
    row: boardDataRowSchema,
  },
  boardDocuments: {
    table: 'BoardDataLinks',
    required: ['Cause', 'Description', 'Filepath', 'DocumentDate'],
    row: boardDocumentRowSchema,
  },
  plats: {
    table: 'PlatData',
    required: ['Lat', 'Lon', 'Conc', 'Board_Docket'],
    row: platRowSchema,
  },
  adjacent: {
    table: 'Adjacent',
    required: ['Board_Docket', 'Order', 'src_FullCo'],
    row: adjacentRowSchema,
  },
  fields: {
    table: 'Field',
    required: ['Field_Name', 'Easting', 'Northing'],
    row: fieldRowSchema,
  },
  owners: {
    table: 'Owner',
    required: ['conc', 'owner', 'state_legend', 'geometry'],
    row: ownerRowSchema,
  },
} as const satisfies Record<string, TableDefinition<unknown>>;

// ============================================================================
// Validation
// ============================================================================

function renameKeys(
  record: Readonly<Record<string, unknown>>,
  renames: Readonly<Record<string, string>>
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    out[renames[key] ?? key] = value;
  }
  return out;
}

/**
 * Validate a table's column list and coerce its rows.
 *
 * @param columns - Column names as the source reports them (before renames)
 * @throws MissingColumnError when a required column is absent
 * @throws RowValidationError when a value cannot be coerced
 */
export function validateRows<T>(
  definition: TableDefinition<T>,
  columns: readonly string[],
  rows: readonly Readonly<Record<string, unknown>>[]
): T[] {
  const renames = definition.renames ?? {};
  const present = new Set(columns.map((column) => renames[column] ?? column));
  const missing = definition.required.filter((column) => !present.has(column));
  if (missing.length > 0) {
    throw new MissingColumnError(definition.table, missing);
  }

  return rows.map((raw, index) => {
    const result = definition.row.safeParse(renameKeys(raw, renames));
    if (!result.success) {
      throw new RowValidationError(
        definition.table,
        index,
        result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }
    return result.data;
  });
}

/**
 * Validate rows that arrive as plain objects, taking the column list from
 * the first row. An empty table passes without a column check.
 */
export function validateRecords<T>(
  definition: TableDefinition<T>,
  rows: readonly Readonly<Record<string, unknown>>[]
): T[] {
  const first = rows[0];
  if (first === undefined) {
    return [];
  }
  return validateRows(definition, Object.keys(first), rows);
}
