/**
 * Polygon Assembler
 *
 * Groups keyed survey points (plat corners, field outline points) into one
 * polygon per key. Input order is the vertex order: points are never sorted
 * geometrically, so callers supply them already in traversal order.
 *
 * Groups with fewer than three distinct vertices are kept as degenerate
 * polygons; their centroid falls back to the vertex mean.
 *
 * @module geometry/polygon-assembler
 */

import * as turf from '@turf/turf';
import type { LineString, Point, Polygon } from 'geojson';
import { AREA_EPSILON } from '../core/constants.js';
import type { AssembledPolygon, KeyedPoint, PlanarPoint } from '../core/types/index.js';

// ============================================================================
// Assembly
// ============================================================================

function samePoint(a: PlanarPoint, b: PlanarPoint): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

/**
 * Close a vertex sequence: drop consecutive repeats, then repeat the first
 * vertex at the end when there are at least two distinct vertices.
 */
export function closeRing(vertices: readonly PlanarPoint[]): PlanarPoint[] {
  const ring: PlanarPoint[] = [];
  for (const vertex of vertices) {
    const last = ring[ring.length - 1];
    if (last === undefined || !samePoint(last, vertex)) {
      ring.push(vertex);
    }
  }

  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first !== undefined && last !== undefined && ring.length > 1 && samePoint(first, last)) {
    ring.pop();
  }
  if (first !== undefined && ring.length >= 2) {
    ring.push(first);
  }
  return ring;
}

/**
 * Assemble one polygon per distinct key.
 *
 * Keys come out in order of first appearance. Exact duplicate rows are
 * dropped, keeping the first occurrence.
 */
export function assemblePolygons(rows: readonly KeyedPoint[]): AssembledPolygon[] {
  const groups = new Map<string, { seen: Set<string>; vertices: PlanarPoint[] }>();

  for (const row of rows) {
    let group = groups.get(row.key);
    if (!group) {
      group = { seen: new Set(), vertices: [] };
      groups.set(row.key, group);
    }
    const identity = `${row.easting},${row.northing}`;
    if (group.seen.has(identity)) continue;
    group.seen.add(identity);
    group.vertices.push([row.easting, row.northing]);
  }

  return [...groups].map(([key, group]) => ({
    key,
    vertices: group.vertices,
    ring: closeRing(group.vertices),
  }));
}

// ============================================================================
// Measures
// ============================================================================

/**
 * Absolute planar (shoelace) area of the ring, in projection units squared.
 */
export function polygonArea(polygon: AssembledPolygon): number {
  const { ring } = polygon;
  let twiceArea = 0;
  for (let i = 0; i + 1 < ring.length; i++) {
    const a = ring[i];
    const b = ring[i + 1];
    if (a === undefined || b === undefined) continue;
    twiceArea += a[0] * b[1] - b[0] * a[1];
  }
  return Math.abs(twiceArea) / 2;
}

export function isDegenerate(polygon: AssembledPolygon): boolean {
  return polygon.vertices.length < 3 || polygonArea(polygon) <= AREA_EPSILON;
}

function vertexMean(vertices: readonly PlanarPoint[]): PlanarPoint {
  let sx = 0;
  let sy = 0;
  for (const [x, y] of vertices) {
    sx += x;
    sy += y;
  }
  return [sx / vertices.length, sy / vertices.length];
}

/**
 * Area-weighted centroid, or the mean of the vertices for a degenerate
 * polygon.
 */
export function polygonCentroid(polygon: AssembledPolygon): PlanarPoint {
  if (isDegenerate(polygon)) {
    return vertexMean(polygon.vertices);
  }
  const center = turf.centerOfMass(turf.polygon([polygon.ring.map(([x, y]) => [x, y])]));
  const [x = Number.NaN, y = Number.NaN] = center.geometry.coordinates;
  return [x, y];
}

/**
 * Area-weighted centroid of several polygons taken together. Degenerate
 * members contribute nothing unless every member is degenerate, in which
 * case the mean of all vertices is returned.
 *
 * @returns null for an empty list
 */
export function combinedCentroid(polygons: readonly AssembledPolygon[]): PlanarPoint | null {
  if (polygons.length === 0) return null;

  let totalArea = 0;
  let cx = 0;
  let cy = 0;
  for (const polygon of polygons) {
    if (isDegenerate(polygon)) continue;
    const area = polygonArea(polygon);
    const [x, y] = polygonCentroid(polygon);
    totalArea += area;
    cx += x * area;
    cy += y * area;
  }

  if (totalArea > AREA_EPSILON) {
    return [cx / totalArea, cy / totalArea];
  }
  return vertexMean(polygons.flatMap((polygon) => polygon.vertices));
}

// ============================================================================
// GeoJSON
// ============================================================================

/**
 * Planar GeoJSON geometry for a polygon: a Point for one vertex, a
 * LineString when the vertices span no area, a Polygon otherwise.
 */
export function toPlanarGeometry(polygon: AssembledPolygon): Point | LineString | Polygon {
  const positions = polygon.vertices.map(([x, y]) => [x, y]);
  const [only] = positions;
  if (positions.length === 1 && only !== undefined) {
    return { type: 'Point', coordinates: only };
  }
  if (isDegenerate(polygon)) {
    return { type: 'LineString', coordinates: positions };
  }
  return { type: 'Polygon', coordinates: [polygon.ring.map(([x, y]) => [x, y])] };
}
