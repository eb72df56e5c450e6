/**
 * Location code types
 *
 * A location code (`Conc`) packs section, township, range and baseline into
 * the fixed nine-character layout `SSTTDRRDB`. Plat tables extend the code
 * with a trailing subdivision suffix; the first nine characters still name
 * the section.
 */

export type TownshipDirection = 'N' | 'S';
export type RangeDirection = 'E' | 'W';
export type Baseline = 'S' | 'U';

/** Nine-character section code, e.g. `0115N02WS`. */
export type LocationCode = string;

export interface LocationParts {
  readonly section: number;
  readonly township: number;
  readonly townshipDir: TownshipDirection;
  readonly range: number;
  readonly rangeDir: RangeDirection;
  readonly baseline: Baseline;
}

/** Raw numeric component as it appears in source tables (`1`, `"1"`, `"1.0"`). */
export type NumericComponent = number | string;

/** Raw direction component: a letter or the numeric table code. */
export type DirectionComponent = number | string;

/**
 * One row of the township/section/range index built from plat codes.
 */
export interface TsrRow extends LocationParts {
  /** The nine-character section code. */
  readonly code: LocationCode;
  /** Human-readable form, e.g. `1 15N 2W S`. */
  readonly label: string;
}
