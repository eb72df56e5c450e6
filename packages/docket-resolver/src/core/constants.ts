/**
 * Shared constants for docket resolution
 */

// ============================================================================
// Age Windows
// ============================================================================

/**
 * Cumulative well-age windows, in months. A well belongs to every window
 * whose threshold is at or above its age, so each window contains the
 * previous one.
 */
export const AGE_WINDOWS = [12, 60, 120, 9999] as const;

export type AgeWindow = (typeof AGE_WINDOWS)[number];

// ============================================================================
// Geometry
// ============================================================================

/** Buffer distance for adjacency tests, in projection units (metres). */
export const DEFAULT_ADJACENCY_TOLERANCE = 10;

/** Metres per survey foot used for the state-plane scale. */
export const METRES_PER_FOOT = 0.3048;

/** Y offset added per repeated vertical-well (x, y) pair at render time. */
export const VERTICAL_JITTER_STEP = 1e-3;

/** Half-width of the selected-well view box, in feet. */
export const WELL_VIEW_HALF_WIDTH = 8000;

/** Areas at or below this many square units are treated as degenerate. */
export const AREA_EPSILON = 1e-9;

/** Default UTM zone of the source coordinates (northern hemisphere). */
export const DEFAULT_UTM_ZONE = 12;

// ============================================================================
// Location Codes
// ============================================================================

/**
 * Numeric direction codes used by the board tables.
 *
 * `1` and `2` mean different letters depending on the field they encode.
 */
export const DIRECTION_TABLE = {
  township: { '1': 'N', '2': 'S' },
  range: { '1': 'E', '2': 'W' },
  baseline: { '1': 'S', '2': 'U' },
} as const;

/** Length of a section location code; plat codes carry a trailing suffix. */
export const LOCATION_CODE_LENGTH = 9;

// ============================================================================
// Well Status
// ============================================================================

export const STATUS_DRILLING = 'Drilling';
export const STATUS_APPROVED_PERMIT = 'Approved Permit';
export const WORK_TYPE_PLUG = 'PLUG';

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

export type MonthName = (typeof MONTH_NAMES)[number];

/** Statuses counted individually; everything else counts as `Other`. */
export const MAIN_WELL_STATUSES = [
  'Producing',
  'Shut-in',
  'Plugged & Abandoned',
  'Drilling',
] as const;

/** Types counted individually. */
export const MAIN_WELL_TYPES = ['Oil Well', 'Gas Well', 'Dry Hole'] as const;

/** Types counted together under one heading. */
export const MERGED_WELL_TYPES: Readonly<Record<string, readonly string[]>> = {
  'Injection Well': ['Water Injection Well', 'Gas Injection Well'],
  'Disposal Well': ['Water Disposal Well', 'Oil Well/Water Disposal Well'],
  Other: ['Test Well', 'Water Source Well', 'Unknown'],
};
