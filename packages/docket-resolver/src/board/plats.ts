/**
 * Plat preparation and docket sections
 *
 * PlatData stores plat corners as WGS84 lat/lon, one row per corner, in
 * traversal order. Rows are projected to UTM once; docket resolution then
 * picks the main, first-adjacent and second-adjacent plats named in the
 * Adjacent table and assembles a labelled polygon for each.
 *
 * @module board/plats
 */

import { DEFAULT_UTM_ZONE } from '../core/constants.js';
import { DecodeError } from '../core/errors.js';
import type {
  AssembledPolygon,
  AdjacentRow,
  DocketSections,
  KeyedPoint,
  LabelledPolygon,
  PlatRow,
} from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import { codePrefix, humanizeConcessionCode } from '../codec/index.js';
import {
  assemblePolygons,
  combinedCentroid,
  createUtmProjection,
  polygonCentroid,
} from '../geometry/index.js';
import { dropDuplicateRows } from '../core/utils/rows.js';

const log = createLogger({ module: 'plats' });

/** A plat corner in UTM metres, keyed by its full plat code. */
export interface PlatPoint extends KeyedPoint {
  readonly boardDocket: string;
  readonly order: number | null;
}

export interface PlatOptions {
  readonly utmZone?: number;
}

/** Order values of the Adjacent table. */
export const PLAT_ORDER = {
  main: 0,
  firstAdjacent: 1,
  secondAdjacent: 2,
} as const;

// ============================================================================
// Preparation
// ============================================================================

/**
 * Drop duplicate rows and rows without a position, then project each corner
 * to UTM. Row order is kept.
 */
export function preparePlats(rows: readonly PlatRow[], options: PlatOptions = {}): PlatPoint[] {
  const projection = createUtmProjection(options.utmZone ?? DEFAULT_UTM_ZONE);
  const points: PlatPoint[] = [];
  let unlocated = 0;

  for (const row of dropDuplicateRows(rows)) {
    if (row.Lat === null || row.Lon === null) {
      unlocated++;
      continue;
    }
    const [easting, northing] = projection.toUtm(row.Lon, row.Lat);
    points.push({
      key: row.Conc,
      easting,
      northing,
      boardDocket: row.Board_Docket,
      order: row.Order,
    });
  }

  if (unlocated > 0) {
    log.debug('Dropped plat rows without a position', { rows: unlocated });
  }
  return points;
}

// ============================================================================
// Labelling
// ============================================================================

/**
 * Human-readable label of a plat code's section, or the code itself when
 * its prefix is not a section code.
 */
export function platLabel(conc: string): string {
  try {
    return humanizeConcessionCode(codePrefix(conc));
  } catch (error) {
    if (error instanceof DecodeError) return conc;
    throw error;
  }
}

export function labelPolygon(polygon: AssembledPolygon): LabelledPolygon {
  return { ...polygon, centroid: polygonCentroid(polygon), label: platLabel(polygon.key) };
}

/**
 * Labelled polygons for the given plat codes, in first-appearance order of
 * the plat points.
 */
export function polygonsForCodes(
  points: readonly PlatPoint[],
  codes: ReadonlySet<string>
): LabelledPolygon[] {
  return assemblePolygons(points.filter((point) => codes.has(point.key))).map(labelPolygon);
}

// ============================================================================
// Docket Sections
// ============================================================================

function codesForOrder(adjacent: readonly AdjacentRow[], docket: string, order: number): Set<string> {
  return new Set(
    adjacent
      .filter((row) => row.Board_Docket === docket && row.Order === order)
      .map((row) => row.src_FullCo)
  );
}

/**
 * Main, first-adjacent and second-adjacent plats of a docket.
 *
 * A docket with no plats resolves to empty polygon sets and a null view
 * center.
 */
export function resolveSectionsForDocket(
  docket: string,
  points: readonly PlatPoint[],
  adjacent: readonly AdjacentRow[]
): DocketSections {
  const docketPoints = points.filter((point) => point.boardDocket === docket);
  const unordered = adjacent.filter((row) => row.Board_Docket === docket && row.Order === null);
  if (unordered.length > 0) {
    log.debug('Dropped adjacent rows without an order', { docket, rows: unordered.length });
  }

  const mainPolygons = polygonsForCodes(
    docketPoints,
    codesForOrder(adjacent, docket, PLAT_ORDER.main)
  );
  const adjacent1Polygons = polygonsForCodes(
    docketPoints,
    codesForOrder(adjacent, docket, PLAT_ORDER.firstAdjacent)
  );
  const adjacent2Polygons = polygonsForCodes(
    docketPoints,
    codesForOrder(adjacent, docket, PLAT_ORDER.secondAdjacent)
  );

  const usedCodes = [
    ...new Set(
      [...mainPolygons, ...adjacent1Polygons, ...adjacent2Polygons].map((polygon) => polygon.key)
    ),
  ];

  if (usedCodes.length === 0) {
    log.debug('Docket has no plats', { docket });
  }

  return {
    mainPolygons,
    adjacent1Polygons,
    adjacent2Polygons,
    usedCodes,
    viewCenter: combinedCentroid(mainPolygons),
  };
}
