/**
 * Render adapter for well trajectories
 *
 * A vertical survey repeats the same (x, y) at every depth, which a 2D
 * polyline cannot draw. At the presentation boundary each repeat of an
 * (x, y) pair among vertical points gets a small northing offset. The
 * offset is carried separately so consumers can always recover the
 * surveyed location.
 *
 * @module wells/render-adapter
 */

import { VERTICAL_JITTER_STEP } from '../core/constants.js';
import type { RenderPoint, SurveyPoint, WellTrajectory } from '../core/types/index.js';

/**
 * Render points in input order. The n-th occurrence (0-based) of an (x, y)
 * pair among vertical points is offset by `n * step`; other points get 0.
 */
export function toRenderPoints(
  points: readonly SurveyPoint[],
  step: number = VERTICAL_JITTER_STEP
): RenderPoint[] {
  const occurrences = new Map<string, number>();

  return points.map((point) => {
    let yOffset = 0;
    if (point.citingType === 'vertical') {
      const key = `${point.x},${point.y}`;
      const seen = occurrences.get(key) ?? 0;
      occurrences.set(key, seen + 1);
      yOffset = seen * step;
    }
    return {
      wellId: point.wellId,
      x: point.x,
      y: point.y,
      yOffset,
      z: point.targetElevation,
    };
  });
}

/** Plotted northing of a render point. */
export function renderedY(point: RenderPoint): number {
  return point.y + point.yOffset;
}

/**
 * Group points per well into 2D (x, y) and 3D (spx, spy, targetElevation)
 * polylines. Wells keep their first-appearance order; points keep input
 * order. Points without a target elevation are left out of the 3D path.
 */
export function trajectoriesFor(points: readonly SurveyPoint[]): WellTrajectory[] {
  const grouped = new Map<
    string,
    { path2d: [number, number][]; path3d: [number, number, number][] }
  >();

  for (const point of points) {
    let entry = grouped.get(point.wellId);
    if (!entry) {
      entry = { path2d: [], path3d: [] };
      grouped.set(point.wellId, entry);
    }
    entry.path2d.push([point.x, point.y]);
    if (point.targetElevation !== null) {
      entry.path3d.push([point.spx, point.spy, point.targetElevation]);
    }
  }

  return [...grouped].map(([wellId, entry]) => ({ wellId, ...entry }));
}
