/**
 * Planar geometry types
 *
 * Coordinates are UTM easting/northing in metres unless a type says
 * otherwise.
 */

export type PlanarPoint = readonly [x: number, y: number];

export interface KeyedPoint {
  readonly key: string;
  readonly easting: number;
  readonly northing: number;
}

export interface AssembledPolygon {
  readonly key: string;
  /** Unique vertices in traversal order. Never empty. */
  readonly vertices: readonly PlanarPoint[];
  /**
   * Vertices with consecutive repeats removed and the first vertex appended
   * when at least two distinct vertices exist.
   */
  readonly ring: readonly PlanarPoint[];
}

/** Adjacency lookup: polygon name to the names its buffer touches. */
export type AdjacencyMap = ReadonlyMap<string, readonly string[]>;

export interface AdjacencyEdge {
  readonly a: string;
  readonly b: string;
}

export interface LabelledPolygon extends AssembledPolygon {
  readonly centroid: PlanarPoint;
  /**
   * Display label: the section label of a plat (the raw key when it does not
   * decode), or a field's name.
   */
  readonly label: string;
}

/** Field outlines around a docket's wells. */
export interface DocketFields {
  /** Standard field names of the docket wells, sorted. */
  readonly wellFields: readonly string[];
  /** Outlines of those fields and of the fields adjacent to them. */
  readonly polygons: readonly LabelledPolygon[];
}
