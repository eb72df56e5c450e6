/**
 * Well and trajectory types
 */

import type { AgeWindow } from '../constants.js';

export type CitingType = 'asDrilled' | 'planned' | 'vertical';

export type WellCategory = 'drilled' | 'planned' | 'currentlyDrilling';

export const WELL_CATEGORIES: readonly WellCategory[] = ['drilled', 'planned', 'currentlyDrilling'];

/**
 * One WellInfo row after cleanup. A well id can appear once per docket it
 * was heard in.
 */
export interface WellRecord {
  readonly wellId: string;
  readonly wellName: string;
  readonly displayName: string;
  readonly operator: string | null;
  readonly workType: string | null;
  readonly status: string | null;
  readonly wellType: string | null;
  /** ISO `YYYY-MM-DD`, or null when the well has not spudded. */
  readonly spudDate: string | null;
  /** Whole months since spud; 0 for an unspudded approved permit. */
  readonly ageMonths: number | null;
  readonly elevation: number | null;
  readonly fieldName: string | null;
  readonly boardYear: string;
  readonly docketMonth: string;
  readonly boardDocket: string;
  /** The well is one of the docket's subject wells rather than a neighbour. */
  readonly mainWell: boolean;
  readonly mineralLease: string | null;
  readonly concCode: string | null;
}

/**
 * A directional survey point joined with its well. Coordinates are the true
 * surveyed location; any render offset lives in the render adapter.
 */
export interface SurveyPoint {
  readonly wellId: string;
  readonly displayName: string | null;
  readonly x: number;
  readonly y: number;
  /** State-plane feet. */
  readonly spx: number;
  readonly spy: number;
  readonly measuredDepth: number | null;
  readonly trueVerticalDepth: number | null;
  readonly elevation: number | null;
  readonly targetElevation: number | null;
  readonly citingType: CitingType | null;
  readonly status: string | null;
  readonly wellType: string | null;
  readonly ageMonths: number | null;
  readonly operator: string | null;
  readonly fieldName: string | null;
}

/** A survey point that passed cleaning: elevation and age are known. */
export interface CleanSurveyPoint extends SurveyPoint {
  readonly targetElevation: number;
  readonly ageMonths: number;
}

export type WindowSet = ReadonlyMap<AgeWindow, readonly CleanSurveyPoint[]>;

export type WellWindows = ReadonlyMap<WellCategory, WindowSet>;

/**
 * Trajectory chosen for a single well, tagged with the source it came from.
 * `points` may be empty only for the `vertical` branch.
 */
export type TrajectorySelection =
  | { readonly source: 'drilled'; readonly points: readonly SurveyPoint[] }
  | { readonly source: 'planned'; readonly points: readonly SurveyPoint[] }
  | { readonly source: 'vertical'; readonly points: readonly SurveyPoint[] };

export type TrajectorySource = TrajectorySelection['source'];

export interface WellTrajectory {
  readonly wellId: string;
  readonly path2d: readonly (readonly [number, number])[];
  readonly path3d: readonly (readonly [number, number, number])[];
}

/**
 * Point as drawn. `y + yOffset` is the plotted northing; `y` alone is the
 * surveyed one.
 */
export interface RenderPoint {
  readonly wellId: string;
  readonly x: number;
  readonly y: number;
  readonly yOffset: number;
  readonly z: number | null;
}

export interface SelectedWellView {
  readonly wellId: string;
  readonly selection: TrajectorySelection;
  /** Mean of the 3D points (spx, spy, targetElevation); null when no points. */
  readonly centroid: readonly [number, number, number] | null;
  readonly viewBox: {
    readonly xMin: number;
    readonly xMax: number;
    readonly yMin: number;
    readonly yMax: number;
  } | null;
}

export interface WellCounters {
  readonly status: Readonly<Record<string, number>>;
  readonly type: Readonly<Record<string, number>>;
}
