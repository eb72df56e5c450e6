/**
 * UTM projection tests
 */

import { describe, it, expect } from 'vitest';
import { createUtmProjection, unprojectGeometry, utmDefinition } from './projection.js';

describe('createUtmProjection', () => {
  it('should put the central meridian at the false easting', () => {
    const [easting, northing] = createUtmProjection(12).toUtm(-111, 0);

    expect(easting).toBeCloseTo(500_000, 3);
    expect(northing).toBeCloseTo(0, 3);
  });

  it('should invert its own forward projection', () => {
    const projection = createUtmProjection(12);
    const [lon, lat] = projection.toLonLat(512_345, 4_400_000);
    const [easting, northing] = projection.toUtm(lon, lat);

    expect(easting).toBeCloseTo(512_345, 3);
    expect(northing).toBeCloseTo(4_400_000, 3);
  });

  it('should share one instance per zone', () => {
    expect(createUtmProjection(13)).toBe(createUtmProjection(13));
    expect(createUtmProjection(13).zone).toBe(13);
  });

  it('should reject zones outside 1-60', () => {
    expect(() => createUtmProjection(0)).toThrow(RangeError);
    expect(() => createUtmProjection(61)).toThrow('UTM zone must be an integer 1-60, got 61');
    expect(() => createUtmProjection(12.5)).toThrow(RangeError);
  });
});

describe('utmDefinition', () => {
  it('should describe a WGS84 UTM zone in metres', () => {
    expect(utmDefinition(12)).toBe('+proj=utm +zone=12 +datum=WGS84 +units=m +no_defs');
  });
});

describe('unprojectGeometry', () => {
  it('should convert every position of a polygon', () => {
    const projection = createUtmProjection(12);
    const polygon = unprojectGeometry(projection, {
      type: 'Polygon',
      coordinates: [
        [
          [500_000, 0],
          [500_000, 1_000],
          [500_000, 0],
        ],
      ],
    });

    expect(polygon.type).toBe('Polygon');
    if (polygon.type !== 'Polygon') return;
    const [ring = []] = polygon.coordinates;
    expect(ring).toHaveLength(3);
    expect(ring[0]?.[0]).toBeCloseTo(-111, 9);
    expect(ring[0]?.[1]).toBeCloseTo(0, 9);
    expect(ring[1]?.[0]).toBeCloseTo(-111, 9);
    expect(ring[1]?.[1]).toBeGreaterThan(0);
  });

  it('should convert a point', () => {
    const point = unprojectGeometry(createUtmProjection(12), { type: 'Point', coordinates: [500_000, 0] });

    expect(point.type).toBe('Point');
    if (point.type !== 'Point') return;
    expect(point.coordinates[0]).toBeCloseTo(-111, 9);
  });
});
