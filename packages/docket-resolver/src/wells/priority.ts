/**
 * Trajectory source priority for a single well
 *
 * Shows the most factual data available: as-drilled, else planned, else
 * vertical. The order is fixed.
 *
 * @module wells/priority
 */

import { WELL_VIEW_HALF_WIDTH } from '../core/constants.js';
import type {
  SelectedWellView,
  SurveyPoint,
  TrajectorySelection,
} from '../core/types/index.js';

/**
 * Pick one well's trajectory. Falls through to `vertical` even when it is
 * empty, so callers always get a tagged result.
 */
export function selectTrajectorySource(points: readonly SurveyPoint[]): TrajectorySelection {
  const drilled = points.filter((point) => point.citingType === 'asDrilled');
  if (drilled.length > 0) {
    return { source: 'drilled', points: drilled };
  }
  const planned = points.filter((point) => point.citingType === 'planned');
  if (planned.length > 0) {
    return { source: 'planned', points: planned };
  }
  return {
    source: 'vertical',
    points: points.filter((point) => point.citingType === 'vertical'),
  };
}

/**
 * Selected well with its chosen trajectory, the mean of its 3D points and a
 * square view box around that mean.
 */
export function describeSelectedWell(
  wellId: string,
  points: readonly SurveyPoint[]
): SelectedWellView {
  const selection = selectTrajectorySource(points.filter((point) => point.wellId === wellId));

  const located = selection.points.filter(
    (point): point is SurveyPoint & { targetElevation: number } => point.targetElevation !== null
  );
  if (located.length === 0) {
    return { wellId, selection, centroid: null, viewBox: null };
  }

  let sx = 0;
  let sy = 0;
  let sz = 0;
  for (const point of located) {
    sx += point.spx;
    sy += point.spy;
    sz += point.targetElevation;
  }
  const n = located.length;
  const centroid = [sx / n, sy / n, sz / n] as const;

  return {
    wellId,
    selection,
    centroid,
    viewBox: {
      xMin: centroid[0] - WELL_VIEW_HALF_WIDTH,
      xMax: centroid[0] + WELL_VIEW_HALF_WIDTH,
      yMin: centroid[1] - WELL_VIEW_HALF_WIDTH,
      yMax: centroid[1] + WELL_VIEW_HALF_WIDTH,
    },
  };
}
