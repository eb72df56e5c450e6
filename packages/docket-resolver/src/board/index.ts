/**
 * Board matters and docket plats.
 *
 * @module board
 */

export { BoardIndex, causeFromLabel, matterLabel } from './board-matters.js';
export {
  PLAT_ORDER,
  labelPolygon,
  platLabel,
  polygonsForCodes,
  preparePlats,
  resolveSectionsForDocket,
} from './plats.js';
export type { PlatOptions, PlatPoint } from './plats.js';
export { parcelRings, resolveDocketOwnership } from './ownership.js';
export type { OwnershipOptions } from './ownership.js';
