/**
 * Adjacency Resolver
 *
 * Two polygons are adjacent when one, dilated by a fixed tolerance, touches
 * the other's raw geometry. Each polygon's neighbour list is computed on its
 * own (a lookup per source polygon, not a shared edge list), which makes the
 * relation symmetric by construction for distance-based buffers.
 *
 * Geometry is projected from UTM to lon/lat so turf can buffer in metres.
 * Pairwise tests are O(n²); n is the number of fields or plats in scope.
 *
 * @module geometry/adjacency
 */

import * as turf from '@turf/turf';
import type { Feature, LineString, MultiPolygon, Point, Polygon } from 'geojson';
import { DEFAULT_ADJACENCY_TOLERANCE, DEFAULT_UTM_ZONE } from '../core/constants.js';
import type {
  AdjacencyEdge,
  AdjacencyMap,
  AssembledPolygon,
  FieldRow,
  KeyedPoint,
} from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import { assemblePolygons, toPlanarGeometry } from './polygon-assembler.js';
import { createUtmProjection, unprojectGeometry } from './projection.js';

const log = createLogger({ module: 'adjacency' });

export interface AdjacencyOptions {
  /** Buffer distance in metres. */
  readonly tolerance?: number;
  /** UTM zone of the input coordinates. */
  readonly utmZone?: number;
}

interface PreparedPolygon {
  readonly name: string;
  readonly geometry: Point | LineString | Polygon;
  readonly buffered: Feature<Polygon | MultiPolygon> | Point | LineString | Polygon;
}

function prepare(
  polygon: AssembledPolygon,
  tolerance: number,
  utmZone: number
): PreparedPolygon {
  const projection = createUtmProjection(utmZone);
  const geometry = unprojectGeometry(projection, toPlanarGeometry(polygon));
  const result =
    tolerance > 0 ? turf.buffer(turf.feature(geometry), tolerance, { units: 'meters' }) : undefined;
  const buffered = result !== undefined && result.type === 'Feature' ? result : undefined;

  if (tolerance > 0 && buffered === undefined) {
    log.debug('Buffer produced no geometry; testing raw shape', { name: polygon.key });
  }

  return { name: polygon.key, geometry, buffered: buffered ?? geometry };
}

/**
 * Resolve adjacency among named polygons.
 *
 * Every input name is present in the result, with an empty list when
 * nothing is in reach. Self matches are excluded; neighbour order follows
 * input order.
 */
export function resolveAdjacency(
  polygons: readonly AssembledPolygon[],
  options: AdjacencyOptions = {}
): AdjacencyMap {
  const tolerance = options.tolerance ?? DEFAULT_ADJACENCY_TOLERANCE;
  const utmZone = options.utmZone ?? DEFAULT_UTM_ZONE;
  const prepared = polygons.map((polygon) => prepare(polygon, tolerance, utmZone));

  const adjacency = new Map<string, string[]>();
  for (const source of prepared) {
    const neighbours = prepared
      .filter((other) => other.name !== source.name)
      .filter((other) => turf.booleanIntersects(source.buffered, other.geometry))
      .map((other) => other.name);
    adjacency.set(source.name, neighbours);
  }

  log.debug('Resolved adjacency', {
    polygons: prepared.length,
    edges: adjacencyEdges(adjacency).length,
  });
  return adjacency;
}

/**
 * Flatten an adjacency map into unique unordered pairs, each written with
 * the lexically smaller name first, sorted.
 */
export function adjacencyEdges(adjacency: AdjacencyMap): AdjacencyEdge[] {
  const edges = new Map<string, AdjacencyEdge>();
  for (const [name, neighbours] of adjacency) {
    for (const neighbour of neighbours) {
      const [a, b] = name < neighbour ? [name, neighbour] : [neighbour, name];
      edges.set(JSON.stringify([a, b]), { a, b });
    }
  }
  return [...edges.values()].sort((x, y) =>
    x.a === y.a ? (x.b < y.b ? -1 : 1) : x.a < y.a ? -1 : 1
  );
}

/**
 * Field outline vertices keyed by field name. Rows without a position are
 * dropped.
 */
export function fieldPoints(fields: readonly FieldRow[]): KeyedPoint[] {
  const points: KeyedPoint[] = [];
  for (const row of fields) {
    if (row.Easting === null || row.Northing === null) continue;
    points.push({ key: row.Field_Name, easting: row.Easting, northing: row.Northing });
  }
  if (points.length < fields.length) {
    log.debug('Dropped field rows without a position', { rows: fields.length - points.length });
  }
  return points;
}

/**
 * Assemble field outlines from the Field table and resolve which fields
 * border each other.
 */
export function resolveFieldAdjacency(
  fields: readonly FieldRow[],
  options: AdjacencyOptions = {}
): AdjacencyMap {
  return resolveAdjacency(assemblePolygons(fieldPoints(fields)), options);
}
