/**
 * Well record loading
 *
 * Cleans WellInfo rows into WellRecords: plugging work orders dropped,
 * duplicates removed, display names built, spud dates parsed, age in months
 * derived and field names standardised. Records are ordered by board year
 * and docket month.
 *
 * @module wells/well-records
 */

import {
  MONTH_NAMES,
  STATUS_APPROVED_PERMIT,
  WORK_TYPE_PLUG,
} from '../core/constants.js';
import type { WellInfoRow, WellRecord } from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import { dropDuplicateRows } from '../core/utils/rows.js';
import { standardizeFieldName, type FieldNameTable } from './field-names.js';

const log = createLogger({ module: 'well-records' });

export interface WellLoadOptions {
  /** Reference time for age computation. Defaults to the current time. */
  readonly now?: Date;
  readonly fieldNames?: FieldNameTable;
}

export interface LoadedWells {
  /** Every docket appearance of every well, ordered by year then month. */
  readonly records: readonly WellRecord[];
  /** First record per well id. */
  readonly uniqueWells: readonly WellRecord[];
}

// ============================================================================
// Dates
// ============================================================================

export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

const ISO_DATE = /^(\d{4})-(\d{1,2})-(\d{1,2})/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})/;

function validDate(year: number, month: number, day: number): CalendarDate | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  return { year, month, day };
}

/**
 * Parse a spud date as stored in WellInfo (`YYYY-MM-DD[ hh:mm:ss]` or
 * `M/D/YYYY`). Time of day and zone are ignored.
 */
export function parseSpudDate(value: string | null): CalendarDate | null {
  if (value === null) return null;
  const text = value.trim();

  const iso = ISO_DATE.exec(text);
  if (iso) {
    return validDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));
  }
  const us = US_DATE.exec(text);
  if (us) {
    return validDate(Number(us[3]), Number(us[1]), Number(us[2]));
  }
  return null;
}

export function formatCalendarDate(date: CalendarDate): string {
  const mm = String(date.month).padStart(2, '0');
  const dd = String(date.day).padStart(2, '0');
  return `${date.year}-${mm}-${dd}`;
}

/**
 * Whole months between spud and `now`, counting calendar months only:
 * `(now.year - spud.year) * 12 + now.month - spud.month`. `now` is read in
 * UTC, matching how `--now` and config dates are parsed.
 */
export function ageInMonths(spud: CalendarDate, now: Date): number {
  return (now.getUTCFullYear() - spud.year) * 12 + (now.getUTCMonth() + 1) - spud.month;
}

/**
 * Age of a well. Null when there is no spud date, except for an approved
 * permit, which has not spudded by definition and counts as brand new.
 */
export function wellAge(spud: CalendarDate | null, status: string | null, now: Date): number | null {
  if (spud !== null) return ageInMonths(spud, now);
  return status === STATUS_APPROVED_PERMIT ? 0 : null;
}

// ============================================================================
// Ordering
// ============================================================================

/** 1-12 for a month name, 13 for anything else so unknown months sort last. */
export function monthOrder(month: string): number {
  const index = MONTH_NAMES.findIndex((name) => name.toLowerCase() === month.trim().toLowerCase());
  return index === -1 ? MONTH_NAMES.length + 1 : index + 1;
}

function compareYear(a: string, b: string): number {
  const na = Number(a);
  const nb = Number(b);
  if (Number.isFinite(na) && Number.isFinite(nb)) return na - nb;
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareDocketDate(
  a: Pick<WellRecord, 'boardYear' | 'docketMonth'>,
  b: Pick<WellRecord, 'boardYear' | 'docketMonth'>
): number {
  return compareYear(a.boardYear, b.boardYear) || monthOrder(a.docketMonth) - monthOrder(b.docketMonth);
}

// ============================================================================
// Loading
// ============================================================================

function toWellRecord(row: WellInfoRow, now: Date, fieldNames?: FieldNameTable): WellRecord {
  const spud = parseSpudDate(row.DrySpud);
  return {
    wellId: row.WellID,
    wellName: row.WellName,
    displayName: `${row.WellID} - ${row.WellName}`,
    operator: row.Operator,
    workType: row.WorkType,
    status: row.CurrentWellStatus,
    wellType: row.CurrentWellType,
    spudDate: spud ? formatCalendarDate(spud) : null,
    ageMonths: wellAge(spud, row.CurrentWellStatus, now),
    elevation: row.Elevation,
    fieldName: standardizeFieldName(row.FieldName, fieldNames),
    boardYear: row.Board_Year,
    docketMonth: row.Docket_Month,
    boardDocket: row.Board_Docket,
    mainWell: row.MainWell,
    mineralLease: row['Mineral Lease'],
    concCode: row.ConcCode,
  };
}

export function loadWellRecords(
  rows: readonly WellInfoRow[],
  options: WellLoadOptions = {}
): LoadedWells {
  const now = options.now ?? new Date();
  const active = rows.filter((row) => row.WorkType !== WORK_TYPE_PLUG);
  const distinct = dropDuplicateRows(active);

  const records = distinct
    .map((row) => toWellRecord(row, now, options.fieldNames))
    .sort(compareDocketDate);

  const byId = new Map<string, WellRecord>();
  for (const record of records) {
    if (!byId.has(record.wellId)) byId.set(record.wellId, record);
  }

  log.debug('Loaded well records', {
    rows: rows.length,
    plugged: rows.length - active.length,
    duplicates: active.length - distinct.length,
    wells: byId.size,
  });

  return { records, uniqueWells: [...byId.values()] };
}
