export {
  assemblePolygons,
  closeRing,
  combinedCentroid,
  isDegenerate,
  polygonArea,
  polygonCentroid,
  toPlanarGeometry,
} from './polygon-assembler.js';
export { resolveAdjacency, adjacencyEdges, fieldPoints, resolveFieldAdjacency } from './adjacency.js';
export type { AdjacencyOptions } from './adjacency.js';
export { createUtmProjection, unprojectGeometry, utmDefinition } from './projection.js';
export type { UtmProjection } from './projection.js';
