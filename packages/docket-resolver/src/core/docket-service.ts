/**
 * Docket Resolver Service
 *
 * Entry point for a shell or CLI. Holds materialised source tables and
 * answers every query for an explicit SelectionContext. Derived tables
 * (well records, survey points, projected plats, the board index) are built
 * on first use; per-docket results are cached by (year, month, docket) and
 * never mutated once stored.
 *
 * @module core/docket-service
 */

import {
  BoardIndex,
  polygonsForCodes,
  preparePlats,
  resolveDocketOwnership,
  resolveSectionsForDocket,
  type PlatPoint,
} from '../board/index.js';
import { buildTsrIndex } from '../codec/index.js';
import {
  assemblePolygons,
  fieldPoints,
  polygonCentroid,
  resolveFieldAdjacency,
  type AdjacencyOptions,
} from '../geometry/index.js';
import {
  countStatusAndType,
  describeSelectedWell,
  docketRecords,
  docketSurveyPoints,
  listWellDisplayNames,
  loadSurveyPoints,
  loadWellRecords,
  monthOrder,
  resolveWindows,
  type FieldNameTable,
  type LoadedSurveys,
  type LoadedWells,
} from '../wells/index.js';
import { DEFAULT_ADJACENCY_TOLERANCE, DEFAULT_UTM_ZONE } from './constants.js';
import type {
  AdjacencyMap,
  BoardMatterQuery,
  BoardMatterResolution,
  DocketFields,
  DocketOwnership,
  DocketSections,
  MatterOverviewRow,
  SelectedWellView,
  SelectionContext,
  SourceTables,
  SurveyPoint,
  TsrRow,
  WellCounters,
  WellRecord,
  WellWindows,
} from './types/index.js';
import { createLogger } from './utils/logger.js';

const log = createLogger({ module: 'docket-service' });

export interface DocketResolverOptions {
  /** Reference date for well ages (default: now). */
  readonly now?: Date;
  readonly utmZone?: number;
  /** Adjacency buffer distance in metres. */
  readonly adjacencyTolerance?: number;
  readonly fieldNames?: FieldNameTable;
}

export interface DocketWellListing {
  readonly wells: readonly WellRecord[];
  /** Subject wells first, then the rest. */
  readonly displayNames: readonly string[];
  readonly counters: WellCounters;
}

interface DocketEntry {
  wells?: readonly WellRecord[];
  points?: readonly SurveyPoint[];
  windows?: WellWindows;
  sections?: DocketSections;
  ownership?: DocketOwnership;
  fields?: DocketFields;
}

function selectionKey(context: Pick<SelectionContext, 'year' | 'month' | 'docket'>): string {
  return JSON.stringify([context.year, context.month, context.docket]);
}

function distinct(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

export class DocketResolverService {
  private readonly options: Required<Omit<DocketResolverOptions, 'fieldNames'>> &
    Pick<DocketResolverOptions, 'fieldNames'>;
  private readonly cache = new Map<string, DocketEntry>();

  private wellsCache: LoadedWells | null = null;
  private surveysCache: LoadedSurveys | null = null;
  private platsCache: PlatPoint[] | null = null;
  private boardCache: BoardIndex | null = null;
  private fieldAdjacencyCache: AdjacencyMap | null = null;

  constructor(
    private readonly tables: SourceTables,
    options: DocketResolverOptions = {}
  ) {
    this.options = {
      now: options.now ?? new Date(),
      utmZone: options.utmZone ?? DEFAULT_UTM_ZONE,
      adjacencyTolerance: options.adjacencyTolerance ?? DEFAULT_ADJACENCY_TOLERANCE,
      fieldNames: options.fieldNames,
    };
  }

  // ==========================================================================
  // Derived tables
  // ==========================================================================

  private get wells(): LoadedWells {
    this.wellsCache ??= loadWellRecords(this.tables.wellInfo, {
      now: this.options.now,
      fieldNames: this.options.fieldNames,
    });
    return this.wellsCache;
  }

  private get surveys(): LoadedSurveys {
    this.surveysCache ??= loadSurveyPoints(this.tables.surveys, this.wells.uniqueWells);
    return this.surveysCache;
  }

  private get plats(): PlatPoint[] {
    this.platsCache ??= preparePlats(this.tables.plats, { utmZone: this.options.utmZone });
    return this.platsCache;
  }

  private get board(): BoardIndex {
    this.boardCache ??= new BoardIndex(this.tables.boardData, this.tables.boardDocuments);
    return this.boardCache;
  }

  private entry(context: SelectionContext): DocketEntry {
    const key = selectionKey(context);
    let entry = this.cache.get(key);
    if (!entry) {
      entry = {};
      this.cache.set(key, entry);
    }
    return entry;
  }

  /** Number of selections with cached results. */
  get cachedSelections(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  // ==========================================================================
  // Selection lists
  // ==========================================================================

  /** Board years in ascending order. */
  listYears(): string[] {
    return distinct(this.wells.records.map((record) => record.boardYear));
  }

  /** Docket months of a year in calendar order. */
  listMonths(year: string): string[] {
    return distinct(
      this.wells.records
        .filter((record) => record.boardYear === year)
        .map((record) => record.docketMonth)
    ).sort((a, b) => monthOrder(a) - monthOrder(b));
  }

  listDockets(year: string, month: string): string[] {
    return distinct(
      this.wells.records
        .filter((record) => record.boardYear === year && record.docketMonth === month)
        .map((record) => record.boardDocket)
    );
  }

  // ==========================================================================
  // Wells
  // ==========================================================================

  private docketWells(context: SelectionContext): readonly WellRecord[] {
    const entry = this.entry(context);
    entry.wells ??= docketRecords(this.wells.records, context);
    return entry.wells;
  }

  /** Survey points of the wells heard in the selected docket. */
  docketSurveyPoints(context: SelectionContext): readonly SurveyPoint[] {
    const entry = this.entry(context);
    entry.points ??= docketSurveyPoints(this.surveys.points, this.docketWells(context));
    return entry.points;
  }

  listDocketWells(context: SelectionContext): DocketWellListing {
    const wells = this.docketWells(context);
    return {
      wells,
      displayNames: listWellDisplayNames(wells),
      counters: countStatusAndType(wells),
    };
  }

  /**
   * Drilled, planned and currently drilling points of the docket, each in
   * four cumulative age windows.
   */
  resolveWellWindows(context: SelectionContext): WellWindows {
    const entry = this.entry(context);
    if (!entry.windows) {
      const points = this.docketSurveyPoints(context);
      entry.windows = resolveWindows(points);
      log.debug('Resolved well windows', { selection: selectionKey(context), points: points.length });
    }
    return entry.windows;
  }

  /**
   * Trajectory and view of one well of the docket. The well may be given by
   * id or by its display name.
   */
  selectWell(context: SelectionContext, well: string): SelectedWellView {
    const record = this.docketWells(context).find(
      (candidate) => candidate.wellId === well || candidate.displayName === well
    );
    const wellId = record?.wellId ?? well;
    if (!record) {
      log.debug('Selected well is not in the docket', { well, selection: selectionKey(context) });
    }
    return describeSelectedWell(wellId, this.docketSurveyPoints(context));
  }

  // ==========================================================================
  // Sections and board matters
  // ==========================================================================

  resolveSectionsForDocket(context: SelectionContext): DocketSections {
    const entry = this.entry(context);
    entry.sections ??= resolveSectionsForDocket(context.docket, this.plats, this.tables.adjacent);
    return entry.sections;
  }

  /**
   * Land ownership parcels on the plats the selected docket uses, with the
   * distinct owners and agencies.
   */
  resolveDocketOwnership(context: SelectionContext): DocketOwnership {
    const entry = this.entry(context);
    entry.ownership ??= resolveDocketOwnership(
      this.tables.owners,
      this.resolveSectionsForDocket(context).usedCodes,
      { utmZone: this.options.utmZone }
    );
    return entry.ownership;
  }

  /** TSR rows of the plats the selected docket uses. */
  sectionsWithMatters(context: SelectionContext): TsrRow[] {
    return this.board.sectionsWithMatters(this.resolveSectionsForDocket(context).usedCodes);
  }

  resolveBoardMatters(query: BoardMatterQuery): BoardMatterResolution {
    if ('section' in query) {
      return {
        kind: 'section',
        section: query.section,
        matters: this.board.mattersForSection(query.section),
      };
    }

    const sections = this.board.sectionsForMatter(
      query.cause,
      this.plats.map((point) => point.key)
    );
    return {
      kind: 'cause',
      cause: query.cause,
      details: this.board.matterDetails(query.cause),
      sections,
      polygons: polygonsForCodes(this.plats, new Set(sections)),
    };
  }

  /**
   * Every board matter touching a plat section, across all plats.
   */
  allMattersOverview(): MatterOverviewRow[] {
    return this.board.allMattersOverview(buildTsrIndex(this.plats.map((point) => point.key)));
  }

  // ==========================================================================
  // Fields
  // ==========================================================================

  /**
   * Adjacent fields across the Field table. The map for the configured
   * tolerance and zone is computed once.
   */
  resolveFieldAdjacency(options: AdjacencyOptions = {}): AdjacencyMap {
    const tolerance = options.tolerance ?? this.options.adjacencyTolerance;
    const utmZone = options.utmZone ?? this.options.utmZone;
    const configured =
      tolerance === this.options.adjacencyTolerance && utmZone === this.options.utmZone;
    if (configured && this.fieldAdjacencyCache) {
      return this.fieldAdjacencyCache;
    }

    const adjacency = resolveFieldAdjacency(this.tables.fields, { tolerance, utmZone });
    if (configured) {
      this.fieldAdjacencyCache = adjacency;
    }
    return adjacency;
  }

  /**
   * Outlines of the fields the docket wells produce from, plus the fields
   * adjacent to them, labelled by field name. Polygons follow the Field
   * table order.
   */
  resolveFieldsForDocket(context: SelectionContext): DocketFields {
    const entry = this.entry(context);
    if (!entry.fields) {
      const wellFields = distinct(
        this.docketWells(context).flatMap((well) => (well.fieldName === null ? [] : [well.fieldName]))
      ).sort();
      const adjacency = this.resolveFieldAdjacency();
      const names = new Set(wellFields);
      for (const field of wellFields) {
        for (const neighbour of adjacency.get(field) ?? []) {
          names.add(neighbour);
        }
      }

      const polygons = assemblePolygons(
        fieldPoints(this.tables.fields).filter((point) => names.has(point.key))
      ).map((polygon) => ({ ...polygon, centroid: polygonCentroid(polygon), label: polygon.key }));

      if (polygons.length === 0) {
        log.debug('Docket wells have no field outlines', { selection: selectionKey(context) });
      }
      entry.fields = { wellFields, polygons };
    }
    return entry.fields;
  }
}
