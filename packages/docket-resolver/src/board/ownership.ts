/**
 * Docket land ownership
 *
 * The Owner table holds one parcel per row: the plat code it sits on, its
 * owner, its managing agency and its outline as WKT in WGS84 lon/lat.
 * Parcels on the plats a docket uses are projected to UTM alongside the
 * plat polygons.
 *
 * @module board/ownership
 */

import wkx from 'wkx';
import { z } from 'zod';
import { DEFAULT_UTM_ZONE } from '../core/constants.js';
import type {
  DocketOwnership,
  OwnerRow,
  OwnershipParcel,
  PlanarPoint,
} from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import { dropDuplicateRows } from '../core/utils/rows.js';
import { createUtmProjection, type UtmProjection } from '../geometry/index.js';

const log = createLogger({ module: 'ownership' });

export interface OwnershipOptions {
  readonly utmZone?: number;
}

const ringSchema = z.array(z.array(z.number()).min(2));

const areaSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(ringSchema) }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(z.array(ringSchema)) }),
]);

type Ring = z.infer<typeof ringSchema>;

function exteriorRings(geojson: unknown): Ring[] | null {
  const parsed = areaSchema.safeParse(geojson);
  if (!parsed.success) return null;
  const area = parsed.data;
  const polygons = area.type === 'Polygon' ? [area.coordinates] : area.coordinates;
  return polygons.flatMap((rings) => rings.slice(0, 1));
}

/**
 * Exterior rings of a WKT polygon or multipolygon, projected to UTM. Null
 * when the text is not an areal WKT geometry.
 */
export function parcelRings(wkt: string, projection: UtmProjection): PlanarPoint[][] | null {
  let geojson: unknown;
  try {
    geojson = wkx.Geometry.parse(wkt).toGeoJSON();
  } catch (error) {
    if (!(error instanceof Error)) throw error;
    log.debug('Unreadable parcel geometry', { error: error.message });
    return null;
  }

  const rings = exteriorRings(geojson);
  return (
    rings?.map((ring) => ring.map(([lon = Number.NaN, lat = Number.NaN]) => projection.toUtm(lon, lat))) ??
    null
  );
}

function sortedDistinct(values: Iterable<string | null>): string[] {
  const set = new Set<string>();
  for (const value of values) {
    if (value !== null) set.add(value);
  }
  return [...set].sort();
}

/**
 * Parcels on the given plat codes, with the distinct owners and agencies
 * among them. Duplicate rows are dropped; table order is kept.
 */
export function resolveDocketOwnership(
  rows: readonly OwnerRow[],
  usedCodes: Iterable<string>,
  options: OwnershipOptions = {}
): DocketOwnership {
  const codes = new Set(usedCodes);
  const projection = createUtmProjection(options.utmZone ?? DEFAULT_UTM_ZONE);

  let unreadable = 0;
  const parcels = dropDuplicateRows(rows.filter((row) => codes.has(row.conc))).map(
    (row): OwnershipParcel => {
      const rings = row.geometry === null ? null : parcelRings(row.geometry, projection);
      if (rings === null) unreadable++;
      return { conc: row.conc, owner: row.owner, agency: row.state_legend, rings: rings ?? [] };
    }
  );

  if (unreadable > 0) {
    log.debug('Parcels without a readable outline', { parcels: unreadable });
  }

  return {
    parcels,
    owners: sortedDistinct(parcels.map((parcel) => parcel.owner)),
    agencies: sortedDistinct(parcels.map((parcel) => parcel.agency)),
  };
}
