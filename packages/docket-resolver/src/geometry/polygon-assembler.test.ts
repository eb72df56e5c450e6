/**
 * Tests for the polygon assembler
 */

import { describe, it, expect } from 'vitest';
import {
  assemblePolygons,
  closeRing,
  combinedCentroid,
  isDegenerate,
  polygonArea,
  polygonCentroid,
  toPlanarGeometry,
} from './polygon-assembler.js';
import type { AssembledPolygon, KeyedPoint } from '../core/types/index.js';

function keyed(key: string, points: readonly (readonly [number, number])[]): KeyedPoint[] {
  return points.map(([easting, northing]) => ({ key, easting, northing }));
}

function single(points: readonly (readonly [number, number])[]): AssembledPolygon {
  const [polygon] = assemblePolygons(keyed('P', points));
  if (!polygon) throw new Error('expected one polygon');
  return polygon;
}

describe('assemblePolygons', () => {
  it('should emit one polygon per key in order of first appearance', () => {
    const rows = [
      ...keyed('B', [[0, 0]]),
      ...keyed('A', [[1, 1], [2, 1]]),
      ...keyed('B', [[3, 3]]),
    ];

    const polygons = assemblePolygons(rows);

    expect(polygons.map((p) => p.key)).toEqual(['B', 'A']);
    expect(polygons[0]?.vertices).toEqual([[0, 0], [3, 3]]);
  });

  it('should keep input order as vertex order without sorting', () => {
    const polygon = single([[10, 10], [0, 0], [10, 0], [0, 10]]);
    expect(polygon.vertices).toEqual([[10, 10], [0, 0], [10, 0], [0, 10]]);
  });

  it('should drop duplicate rows so vertex count equals unique rows', () => {
    const polygon = single([[0, 0], [10, 0], [10, 0], [10, 10], [0, 10], [0, 0]]);

    expect(polygon.vertices).toHaveLength(4);
    expect(polygon.ring).toEqual([[0, 0], [10, 0], [10, 10], [0, 10], [0, 0]]);
  });

  it('should keep a single-point group as a one-vertex polygon', () => {
    const polygon = single([[5, 5]]);
    expect(polygon.vertices).toEqual([[5, 5]]);
    expect(polygon.ring).toEqual([[5, 5]]);
  });

  it('should not mutate its input', () => {
    const rows = keyed('A', [[0, 0], [0, 0], [1, 1]]);
    const copy = rows.map((row) => ({ ...row }));
    assemblePolygons(rows);
    expect(rows).toEqual(copy);
  });
});

describe('closeRing', () => {
  it('should remove consecutive repeats and close the ring', () => {
    expect(closeRing([[0, 0], [0, 0], [1, 0], [1, 1], [1, 1]])).toEqual([
      [0, 0],
      [1, 0],
      [1, 1],
      [0, 0],
    ]);
  });

  it('should not double-close an already closed sequence', () => {
    expect(closeRing([[0, 0], [1, 0], [1, 1], [0, 0]])).toEqual([
      [0, 0],
      [1, 0],
      [1, 1],
      [0, 0],
    ]);
  });

  it('should close a two-point sequence back on itself', () => {
    expect(closeRing([[0, 0], [4, 0]])).toEqual([[0, 0], [4, 0], [0, 0]]);
  });
});

describe('polygon measures', () => {
  it('should compute shoelace area regardless of winding', () => {
    expect(polygonArea(single([[0, 0], [10, 0], [10, 10], [0, 10]]))).toBe(100);
    expect(polygonArea(single([[0, 10], [10, 10], [10, 0], [0, 0]]))).toBe(100);
  });

  it('should return the area-weighted centroid, not the vertex mean', () => {
    // vertex mean would be (3.75, 1.5)
    const polygon = single([[0, 0], [12, 0], [3, 3], [0, 3]]);

    expect(polygonArea(polygon)).toBe(22.5);
    expect(polygonCentroid(polygon)).toBeNearPoint([4.2, 1.2]);
  });

  it('should centre a square on its middle', () => {
    expect(polygonCentroid(single([[0, 0], [10, 0], [10, 10], [0, 10]]))).toBeNearPoint([5, 5]);
  });

  it('should fall back to the vertex mean for collinear vertices', () => {
    const polygon = single([[0, 0], [5, 0], [10, 0]]);

    expect(isDegenerate(polygon)).toBe(true);
    expect(polygonArea(polygon)).toBe(0);
    expect(polygonCentroid(polygon)).toEqual([5, 0]);
  });

  it('should fall back to the vertex mean for fewer than three vertices', () => {
    expect(polygonCentroid(single([[2, 4]]))).toEqual([2, 4]);
    expect(polygonCentroid(single([[0, 0], [4, 2]]))).toEqual([2, 1]);
  });
});

describe('combinedCentroid', () => {
  it('should weight each polygon by its area', () => {
    const polygons = assemblePolygons([
      ...keyed('A', [[0, 0], [10, 0], [10, 10], [0, 10]]),
      ...keyed('B', [[20, 0], [30, 0], [30, 10], [20, 10]]),
      ...keyed('line', [[100, 100], [200, 200]]),
    ]);

    expect(combinedCentroid(polygons)).toBeNearPoint([15, 5]);
  });

  it('should average vertices when every polygon is degenerate', () => {
    const polygons = assemblePolygons([...keyed('A', [[0, 0]]), ...keyed('B', [[4, 2]])]);
    expect(combinedCentroid(polygons)).toEqual([2, 1]);
  });

  it('should return null for no polygons', () => {
    expect(combinedCentroid([])).toBeNull();
  });
});

describe('toPlanarGeometry', () => {
  it('should pick the geometry type by degeneracy', () => {
    expect(toPlanarGeometry(single([[1, 2]]))).toEqual({ type: 'Point', coordinates: [1, 2] });
    expect(toPlanarGeometry(single([[0, 0], [5, 0], [10, 0]]))).toEqual({
      type: 'LineString',
      coordinates: [[0, 0], [5, 0], [10, 0]],
    });
    expect(toPlanarGeometry(single([[0, 0], [1, 0], [1, 1]]))).toEqual({
      type: 'Polygon',
      coordinates: [[[0, 0], [1, 0], [1, 1], [0, 0]]],
    });
  });
});
