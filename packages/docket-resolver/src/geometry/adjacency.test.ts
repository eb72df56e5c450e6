/**
 * Tests for the adjacency resolver
 *
 * Coordinates sit in UTM zone 12 around the central meridian, so grid
 * metres and ground metres agree to well under a centimetre per metre.
 */

import { describe, it, expect } from 'vitest';
import { adjacencyEdges, fieldPoints, resolveAdjacency, resolveFieldAdjacency } from './adjacency.js';
import { assemblePolygons } from './polygon-assembler.js';
import type { KeyedPoint } from '../core/types/index.js';

const E0 = 500_000;
const N0 = 4_400_000;

function box(key: string, x0: number, y0: number, x1: number, y1: number): KeyedPoint[] {
  return [
    { key, easting: E0 + x0, northing: N0 + y0 },
    { key, easting: E0 + x1, northing: N0 + y0 },
    { key, easting: E0 + x1, northing: N0 + y1 },
    { key, easting: E0 + x0, northing: N0 + y1 },
  ];
}

// A | B share an edge, C sits 5 m east of B, D is far away
const layout = assemblePolygons([
  ...box('A', 0, 0, 1000, 1000),
  ...box('B', 1000, 0, 2000, 1000),
  ...box('C', 2005, 0, 3000, 1000),
  ...box('D', 6000, 0, 7000, 1000),
]);

describe('resolveAdjacency', () => {
  it('should link polygons within the buffer tolerance', () => {
    const adjacency = resolveAdjacency(layout);

    expect(adjacency.get('A')).toEqual(['B']);
    expect(adjacency.get('B')).toEqual(['A', 'C']);
    expect(adjacency.get('C')).toEqual(['B']);
    expect(adjacency.get('D')).toEqual([]);
  });

  it('should be symmetric', () => {
    const adjacency = resolveAdjacency(layout);

    for (const [name, neighbours] of adjacency) {
      for (const neighbour of neighbours) {
        expect(adjacency.get(neighbour)).toContain(name);
      }
    }
  });

  it('should only count touching shapes with a zero tolerance', () => {
    const adjacency = resolveAdjacency(layout, { tolerance: 0 });

    expect(adjacency.get('B')).toEqual(['A']);
    expect(adjacency.get('C')).toEqual([]);
  });

  it('should tolerate collinear and single-point shapes', () => {
    const polygons = assemblePolygons([
      ...box('A', 0, 0, 1000, 1000),
      { key: 'line', easting: E0 - 5, northing: N0 + 100 },
      { key: 'line', easting: E0 - 5, northing: N0 + 500 },
      { key: 'line', easting: E0 - 5, northing: N0 + 900 },
      { key: 'dot', easting: E0 + 500, northing: N0 - 8 },
      { key: 'dot', easting: E0 + 500, northing: N0 - 8 },
    ]);

    const adjacency = resolveAdjacency(polygons);

    expect(adjacency.get('A')).toEqual(['line', 'dot']);
    expect(adjacency.get('line')).toEqual(['A']);
    expect(adjacency.get('dot')).toEqual(['A']);
  });

  it('should return an empty map for no polygons', () => {
    expect(resolveAdjacency([]).size).toBe(0);
  });
});

describe('adjacencyEdges', () => {
  it('should flatten the map into unique unordered pairs', () => {
    expect(adjacencyEdges(resolveAdjacency(layout))).toEqual([
      { a: 'A', b: 'B' },
      { a: 'B', b: 'C' },
    ]);
  });
});

describe('resolveFieldAdjacency', () => {
  it('should assemble field outlines from Field rows', () => {
    const rows = [...box('NORTH FIELD', 0, 1000, 1000, 2000), ...box('SOUTH FIELD', 0, 0, 1000, 1000)].map(
      (point) => ({ Field_Name: point.key, Easting: point.easting, Northing: point.northing })
    );

    const adjacency = resolveFieldAdjacency(rows);

    expect(adjacency.get('NORTH FIELD')).toEqual(['SOUTH FIELD']);
    expect(adjacency.get('SOUTH FIELD')).toEqual(['NORTH FIELD']);
  });
});

describe('fieldPoints', () => {
  it('should drop rows without a position', () => {
    expect(
      fieldPoints([
        { Field_Name: 'A', Easting: null, Northing: 10 },
        { Field_Name: 'A', Easting: 5, Northing: null },
        { Field_Name: 'A', Easting: 5, Northing: 10 },
      ])
    ).toEqual([{ key: 'A', easting: 5, northing: 10 }]);
  });
});
