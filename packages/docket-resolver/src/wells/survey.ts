/**
 * Directional survey loading
 *
 * Joins DX survey rows with their well, derives target elevation and
 * state-plane coordinates, and orders each well's points by measured depth.
 *
 * @module wells/survey
 */

import { METRES_PER_FOOT } from '../core/constants.js';
import type { CitingType, SurveyPoint, SurveyRow, WellRecord } from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import { dropDuplicateRows } from '../core/utils/rows.js';

const log = createLogger({ module: 'survey' });

export interface LoadedSurveys {
  /** All points, sorted by (wellId, measuredDepth). */
  readonly points: readonly SurveyPoint[];
  /** First point of each well: its surface-hole location. */
  readonly surfaceHoles: readonly SurveyPoint[];
}

/**
 * Normalise a citing type. Case, spaces, hyphens and underscores are
 * ignored; anything other than as-drilled, planned or vertical is null.
 */
export function normalizeCitingType(value: string | null): CitingType | null {
  if (value === null) return null;
  switch (value.toLowerCase().replace(/[\s_-]+/g, '')) {
    case 'asdrilled':
      return 'asDrilled';
    case 'planned':
      return 'planned';
    case 'vertical':
      return 'vertical';
    default:
      return null;
  }
}

export function toStatePlane(metres: number): number {
  return metres / METRES_PER_FOOT;
}

export function targetElevation(elevation: number | null, tvd: number | null): number | null {
  return elevation === null || tvd === null ? null : elevation - tvd;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Order by well id, then measured depth with unknown depths last.
 */
export function compareSurveyPoints(
  a: Pick<SurveyPoint, 'wellId' | 'measuredDepth'>,
  b: Pick<SurveyPoint, 'wellId' | 'measuredDepth'>
): number {
  const byWell = compareText(a.wellId, b.wellId);
  if (byWell !== 0) return byWell;
  if (a.measuredDepth === null || b.measuredDepth === null) {
    return (a.measuredDepth === null ? 1 : 0) - (b.measuredDepth === null ? 1 : 0);
  }
  return a.measuredDepth - b.measuredDepth;
}

type LocatedSurveyRow = SurveyRow & { readonly X: number; readonly Y: number };

function isLocated(row: SurveyRow): row is LocatedSurveyRow {
  return row.X !== null && row.Y !== null;
}

function toSurveyPoint(row: LocatedSurveyRow, well: WellRecord | undefined): SurveyPoint {
  const elevation = well?.elevation ?? null;
  return {
    wellId: row.APINumber,
    displayName: well?.displayName ?? null,
    x: row.X,
    y: row.Y,
    spx: toStatePlane(row.X),
    spy: toStatePlane(row.Y),
    measuredDepth: row.MeasuredDepth,
    trueVerticalDepth: row.TrueVerticalDepth,
    elevation,
    targetElevation: targetElevation(elevation, row.TrueVerticalDepth),
    citingType: normalizeCitingType(row.CitingType),
    status: well?.status ?? null,
    wellType: well?.wellType ?? null,
    ageMonths: well?.ageMonths ?? null,
    operator: well?.operator ?? null,
    fieldName: well?.fieldName ?? null,
  };
}

/**
 * Build survey points for every DX row with a position. Rows whose well is
 * unknown are kept with null well attributes; they drop out at cleaning for
 * lack of an elevation.
 */
export function loadSurveyPoints(
  rows: readonly SurveyRow[],
  uniqueWells: readonly WellRecord[]
): LoadedSurveys {
  const wells = new Map(uniqueWells.map((well) => [well.wellId, well]));
  const distinct = dropDuplicateRows(rows);
  const located = distinct.filter(isLocated);

  let orphans = 0;
  const points = located
    .map((row) => {
      const well = wells.get(row.APINumber);
      if (!well) orphans++;
      return toSurveyPoint(row, well);
    })
    .sort(compareSurveyPoints);

  const surfaceHoles: SurveyPoint[] = [];
  let previous: string | null = null;
  for (const point of points) {
    if (point.wellId !== previous) {
      surfaceHoles.push(point);
      previous = point.wellId;
    }
  }

  log.debug('Loaded survey points', {
    rows: rows.length,
    duplicates: rows.length - distinct.length,
    unlocated: distinct.length - located.length,
    orphans,
    wells: surfaceHoles.length,
  });

  return { points, surfaceHoles };
}
