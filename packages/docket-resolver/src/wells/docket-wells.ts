/**
 * Docket well selection, listing and counters
 *
 * @module wells/docket-wells
 */

import {
  MAIN_WELL_STATUSES,
  MAIN_WELL_TYPES,
  MERGED_WELL_TYPES,
} from '../core/constants.js';
import type {
  SelectionContext,
  SurveyPoint,
  WellCounters,
  WellRecord,
} from '../core/types/index.js';

export function matchesSelection(
  record: Pick<WellRecord, 'boardYear' | 'docketMonth' | 'boardDocket'>,
  context: Pick<SelectionContext, 'year' | 'month' | 'docket'>
): boolean {
  return (
    record.boardYear === context.year &&
    record.docketMonth === context.month &&
    record.boardDocket === context.docket
  );
}

/**
 * Records heard in the selected docket, one per well id.
 */
export function docketRecords(
  records: readonly WellRecord[],
  context: SelectionContext
): WellRecord[] {
  const byId = new Map<string, WellRecord>();
  for (const record of records) {
    if (matchesSelection(record, context) && !byId.has(record.wellId)) {
      byId.set(record.wellId, record);
    }
  }
  return [...byId.values()];
}

/**
 * Survey points of the wells in a docket, in their existing order.
 */
export function docketSurveyPoints(
  points: readonly SurveyPoint[],
  wells: readonly Pick<WellRecord, 'wellId'>[]
): SurveyPoint[] {
  const ids = new Set(wells.map((well) => well.wellId));
  return points.filter((point) => ids.has(point.wellId));
}

/**
 * Display names for a docket: subject wells first, then the rest, each
 * group sorted.
 */
export function listWellDisplayNames(wells: readonly WellRecord[]): string[] {
  const main = new Set<string>();
  const rest = new Set<string>();
  for (const well of wells) {
    (well.mainWell ? main : rest).add(well.displayName);
  }
  const mainSorted = [...main].sort();
  const restSorted = [...rest].filter((name) => !main.has(name)).sort();
  return [...mainSorted, ...restSorted];
}

const MAIN_STATUS_SET: ReadonlySet<string> = new Set(MAIN_WELL_STATUSES);
const MAIN_TYPE_SET: ReadonlySet<string> = new Set(MAIN_WELL_TYPES);

/**
 * Status and type counts. Statuses outside the main list count as `Other`;
 * types outside both lists are not counted.
 */
export function countStatusAndType(wells: readonly WellRecord[]): WellCounters {
  const status: Record<string, number> = { Other: 0 };
  for (const name of MAIN_WELL_STATUSES) status[name] = 0;

  const type: Record<string, number> = {};
  for (const name of MAIN_WELL_TYPES) type[name] = 0;
  for (const name of Object.keys(MERGED_WELL_TYPES)) type[name] = 0;

  const mergedLookup = new Map<string, string>();
  for (const [heading, members] of Object.entries(MERGED_WELL_TYPES)) {
    for (const member of members) mergedLookup.set(member, heading);
  }

  for (const well of wells) {
    const statusKey =
      well.status !== null && MAIN_STATUS_SET.has(well.status)
        ? well.status
        : 'Other';
    status[statusKey] = (status[statusKey] ?? 0) + 1;

    if (well.wellType === null) continue;
    const typeKey = MAIN_TYPE_SET.has(well.wellType)
      ? well.wellType
      : mergedLookup.get(well.wellType);
    if (typeKey !== undefined) {
      type[typeKey] = (type[typeKey] ?? 0) + 1;
    }
  }

  return { status, type };
}
