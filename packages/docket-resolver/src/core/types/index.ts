/**
 * Core type exports
 */

export type * from './location.js';
export type * from './geometry.js';
export type * from './source.js';
export type * from './wells.js';
export type * from './board.js';
export { WELL_CATEGORIES } from './wells.js';

/**
 * Explicit selection driving every resolution call.
 */
export interface SelectionContext {
  readonly year: string;
  readonly month: string;
  readonly docket: string;
  readonly section?: string;
}
