/**
 * UTM projection helpers
 *
 * The board database stores plat corners as WGS84 lat/lon and field
 * outlines as UTM metres. Everything the resolvers compare runs in one
 * fixed UTM zone; turf's metric operations need lon/lat, so geometry is
 * projected back for those.
 *
 * @module geometry/projection
 */

import proj4 from 'proj4';
import type { LineString, Point, Polygon, Position } from 'geojson';
import type { PlanarPoint } from '../core/types/index.js';

const WGS84 = '+proj=longlat +datum=WGS84 +no_defs';

export interface UtmProjection {
  readonly zone: number;
  /** lon/lat degrees to easting/northing metres. */
  toUtm(lon: number, lat: number): PlanarPoint;
  /** easting/northing metres to lon/lat degrees. */
  toLonLat(easting: number, northing: number): PlanarPoint;
}

export function utmDefinition(zone: number): string {
  return `+proj=utm +zone=${zone} +datum=WGS84 +units=m +no_defs`;
}

const projections = new Map<number, UtmProjection>();

/**
 * Projection for a northern-hemisphere UTM zone. Instances are shared per
 * zone.
 */
export function createUtmProjection(zone: number): UtmProjection {
  if (!Number.isInteger(zone) || zone < 1 || zone > 60) {
    throw new RangeError(`UTM zone must be an integer 1-60, got ${zone}`);
  }

  const cached = projections.get(zone);
  if (cached) return cached;

  const converter = proj4(WGS84, utmDefinition(zone));
  const projection: UtmProjection = {
    zone,
    toUtm(lon, lat) {
      const [easting = Number.NaN, northing = Number.NaN] = converter.forward([lon, lat]);
      return [easting, northing];
    },
    toLonLat(easting, northing) {
      const [lon = Number.NaN, lat = Number.NaN] = converter.inverse([easting, northing]);
      return [lon, lat];
    },
  };
  projections.set(zone, projection);
  return projection;
}

function unprojectPositions(projection: UtmProjection, positions: readonly Position[]): Position[] {
  return positions.map(([x = 0, y = 0]) => [...projection.toLonLat(x, y)]);
}

/**
 * Reproject a planar (UTM) geometry to lon/lat.
 */
export function unprojectGeometry(
  projection: UtmProjection,
  geometry: Point | LineString | Polygon
): Point | LineString | Polygon {
  switch (geometry.type) {
    case 'Point': {
      const [x = 0, y = 0] = geometry.coordinates;
      return { type: 'Point', coordinates: [...projection.toLonLat(x, y)] };
    }
    case 'LineString':
      return {
        type: 'LineString',
        coordinates: unprojectPositions(projection, geometry.coordinates),
      };
    case 'Polygon':
      return {
        type: 'Polygon',
        coordinates: geometry.coordinates.map((ring) => unprojectPositions(projection, ring)),
      };
  }
}
