/**
 * Well Trajectory Classifier & Window Aggregator
 *
 * Turns a docket's survey points into nine-plus-three tables: for each
 * category (drilled, planned, currently drilling) one table per cumulative
 * age window. Vertical surveys are candidates for both drilled and planned;
 * reconciliation then strips from each planned window every well already in
 * the matching drilled window and every well currently drilling, so planned
 * paths never overlap progressed wells.
 *
 * Empty input is a valid state and yields empty windows.
 *
 * @module wells/classifier
 */

import { AGE_WINDOWS, STATUS_DRILLING, type AgeWindow } from '../core/constants.js';
import type {
  CleanSurveyPoint,
  SurveyPoint,
  WellCategory,
  WellWindows,
  WindowSet,
} from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import { compareSurveyPoints } from './survey.js';

const log = createLogger({ module: 'classifier' });

export interface ClassifiedPoints {
  readonly drilled: readonly CleanSurveyPoint[];
  readonly planned: readonly CleanSurveyPoint[];
  readonly currentlyDrilling: readonly CleanSurveyPoint[];
}

// ============================================================================
// Classification
// ============================================================================

export function isDrilledCandidate(point: SurveyPoint): boolean {
  return point.citingType === 'asDrilled' || point.citingType === 'vertical';
}

export function isPlannedCandidate(point: SurveyPoint): boolean {
  return point.citingType === 'planned' || point.citingType === 'vertical';
}

export function isCurrentlyDrilling(point: Pick<SurveyPoint, 'status'>): boolean {
  return point.status === STATUS_DRILLING;
}

/**
 * Keep points with a target elevation; a missing age counts as zero.
 */
export function cleanPoints(points: readonly SurveyPoint[]): CleanSurveyPoint[] {
  const clean: CleanSurveyPoint[] = [];
  for (const point of points) {
    if (point.targetElevation === null) continue;
    clean.push({
      ...point,
      targetElevation: point.targetElevation,
      ageMonths: point.ageMonths ?? 0,
    });
  }
  return clean;
}

export function classifyPoints(points: readonly SurveyPoint[]): ClassifiedPoints {
  const clean = cleanPoints(points);
  return {
    drilled: clean.filter(isDrilledCandidate),
    planned: clean.filter(isPlannedCandidate),
    currentlyDrilling: clean.filter(isCurrentlyDrilling),
  };
}

// ============================================================================
// Windows
// ============================================================================

/**
 * One table per age window, each sorted by (wellId, measuredDepth). A point
 * belongs to every window whose threshold is at or above its age.
 */
export function partitionByAge(points: readonly CleanSurveyPoint[]): WindowSet {
  const windows = new Map<AgeWindow, readonly CleanSurveyPoint[]>();
  for (const threshold of AGE_WINDOWS) {
    windows.set(
      threshold,
      points.filter((point) => point.ageMonths <= threshold).sort(compareSurveyPoints)
    );
  }
  return windows;
}

export function wellIdsIn(points: readonly Pick<SurveyPoint, 'wellId'>[]): Set<string> {
  return new Set(points.map((point) => point.wellId));
}

/**
 * Remove from each planned window the wells present in the drilled window
 * of the same threshold, and every well currently drilling.
 */
export function reconcilePlanned(planned: WindowSet, drilled: WindowSet): WindowSet {
  const reconciled = new Map<AgeWindow, readonly CleanSurveyPoint[]>();
  for (const threshold of AGE_WINDOWS) {
    const progressed = wellIdsIn(drilled.get(threshold) ?? []);
    reconciled.set(
      threshold,
      (planned.get(threshold) ?? []).filter(
        (point) => !progressed.has(point.wellId) && !isCurrentlyDrilling(point)
      )
    );
  }
  return reconciled;
}

/**
 * Classify, window and reconcile a docket's survey points.
 */
export function resolveWindows(points: readonly SurveyPoint[]): WellWindows {
  const classified = classifyPoints(points);
  const drilled = partitionByAge(classified.drilled);
  const planned = reconcilePlanned(partitionByAge(classified.planned), drilled);
  const currentlyDrilling = partitionByAge(classified.currentlyDrilling);

  const windows = new Map<WellCategory, WindowSet>([
    ['drilled', drilled],
    ['planned', planned],
    ['currentlyDrilling', currentlyDrilling],
  ]);

  if (points.length === 0) {
    log.debug('No survey points for selection; windows are empty');
  }
  return windows;
}

/**
 * Points of one category and window, or an empty list.
 */
export function windowPoints(
  windows: WellWindows,
  category: WellCategory,
  threshold: AgeWindow
): readonly CleanSurveyPoint[] {
  return windows.get(category)?.get(threshold) ?? [];
}
