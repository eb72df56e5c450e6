/**
 * Board matter types
 */

import type { LocationCode, TsrRow } from './location.js';
import type { LabelledPolygon, PlanarPoint } from './geometry.js';

export interface BoardMatter {
  readonly docketNumber: string;
  readonly causeNumber: string;
  readonly orderType: string | null;
  readonly quip: string | null;
  readonly effectiveDate: string | null;
  readonly endDate: string | null;
}

export interface BoardDocument {
  readonly description: string;
  readonly filepath: string;
  readonly date: string | null;
}

export interface MatterDetails extends BoardMatter {
  readonly documents: readonly BoardDocument[];
}

export interface MatterOverviewRow extends TsrRow {
  readonly docketNumber: string;
  readonly causeNumber: string;
  /** `Docket Number:<d>, Cause Number:<c>` */
  readonly matterLabel: string;
}

export interface DocketSections {
  readonly mainPolygons: readonly LabelledPolygon[];
  readonly adjacent1Polygons: readonly LabelledPolygon[];
  readonly adjacent2Polygons: readonly LabelledPolygon[];
  /** Distinct plat codes across the three polygon sets. */
  readonly usedCodes: readonly string[];
  /** Centroid of the main polygons; null when the docket has none. */
  readonly viewCenter: PlanarPoint | null;
}

export type BoardMatterQuery =
  | { readonly section: LocationCode }
  | { readonly cause: string };

export type BoardMatterResolution =
  | {
      readonly kind: 'section';
      readonly section: LocationCode;
      readonly matters: readonly BoardMatter[];
    }
  | {
      readonly kind: 'cause';
      readonly cause: string;
      readonly details: MatterDetails | null;
      readonly sections: readonly string[];
      readonly polygons: readonly LabelledPolygon[];
    };

/** A land ownership parcel on one of a docket's plats. */
export interface OwnershipParcel {
  readonly conc: string;
  readonly owner: string | null;
  /** Managing agency (`state_legend`). */
  readonly agency: string | null;
  /** Exterior rings in UTM metres; empty when the geometry does not parse. */
  readonly rings: readonly (readonly PlanarPoint[])[];
}

export interface DocketOwnership {
  readonly parcels: readonly OwnershipParcel[];
  /** Distinct owners, sorted. */
  readonly owners: readonly string[];
  /** Distinct agencies, sorted. */
  readonly agencies: readonly string[];
}
