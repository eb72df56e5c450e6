/**
 * Board Matter / Section Resolver
 *
 * Cross-references board records (one row per cause and section) with plat
 * codes. Each board record's section code is derived once from its
 * Sec/Township/TownshipDir/Range/RangeDir/PM columns.
 *
 * Plat codes extend the nine-character section code with a subdivision
 * suffix. A cause's sections are found by exact set membership: a plat
 * matches when its full code, or its section prefix, is one of the codes
 * linked to the cause. Codes are not prefix-free, so plat codes that merely
 * contain a linked code textually are reported as ambiguous and left out.
 *
 * @module board/board-matters
 */

import { AmbiguousMatchWarning, EncodingError } from '../core/errors.js';
import type {
  BoardDataRow,
  BoardDocument,
  BoardDocumentRow,
  BoardMatter,
  LabelledPolygon,
  LocationCode,
  MatterDetails,
  MatterOverviewRow,
  TsrRow,
} from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import {
  buildTsrIndex,
  codePrefix,
  concessionCodeFromBoardRecord,
  decodeConcessionCode,
} from '../codec/index.js';
import { formatCalendarDate, parseSpudDate } from '../wells/well-records.js';
import { polygonsForCodes, type PlatPoint } from './plats.js';

const log = createLogger({ module: 'board-matters' });

interface IndexedRecord {
  readonly row: BoardDataRow;
  /** Derived section code; null when the row's components do not encode. */
  readonly code: LocationCode | null;
}

function toMatter(row: BoardDataRow): BoardMatter {
  return {
    docketNumber: row.DocketNumber,
    causeNumber: row.CauseNumber,
    orderType: row.OrderType,
    quip: row.Quip,
    effectiveDate: row.EffectiveDate,
    endDate: row.EndDate,
  };
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Label of an overview row, e.g. `Docket Number:2024-001, Cause Number:100-01`.
 */
export function matterLabel(docketNumber: string, causeNumber: string): string {
  return `Docket Number:${docketNumber}, Cause Number:${causeNumber}`;
}

/**
 * Recover the cause number from an overview label. Text without the
 * `Cause Number:` marker is taken to be the cause number itself.
 */
export function causeFromLabel(label: string): string {
  const marker = 'Cause Number:';
  const at = label.indexOf(marker);
  return at === -1 ? label.trim() : label.slice(at + marker.length).trim();
}

/**
 * Board records and documents with derived section codes.
 */
export class BoardIndex {
  private readonly records: readonly IndexedRecord[];
  private readonly documents: readonly BoardDocumentRow[];

  constructor(boardData: readonly BoardDataRow[], documents: readonly BoardDocumentRow[]) {
    let unencodable = 0;
    this.records = boardData.map((row) => {
      try {
        return { row, code: concessionCodeFromBoardRecord(row) };
      } catch (error) {
        if (!(error instanceof EncodingError)) throw error;
        unencodable++;
        return { row, code: null };
      }
    });
    this.documents = documents;

    if (unencodable > 0) {
      log.warn('Board records without a section code', { records: unencodable });
    }
  }

  get size(): number {
    return this.records.length;
  }

  // ==========================================================================
  // Section -> matters
  // ==========================================================================

  /**
   * Matters whose board records name the section of `code`. One entry per
   * (docket, cause), in board record order. A longer plat code is reduced
   * to its section prefix first.
   *
   * @throws DecodeError when the section prefix is not a location code
   */
  mattersForSection(code: string): BoardMatter[] {
    const section = codePrefix(code);
    decodeConcessionCode(section);
    const matters = new Map<string, BoardMatter>();

    for (const { row, code: recordCode } of this.records) {
      if (recordCode !== section) continue;
      const key = `${row.DocketNumber}\u0000${row.CauseNumber}`;
      if (!matters.has(key)) {
        matters.set(key, toMatter(row));
      }
    }

    if (matters.size === 0) {
      log.debug('No board matters for section', { section });
    }
    return [...matters.values()];
  }

  // ==========================================================================
  // Cause -> sections
  // ==========================================================================

  /**
   * Codes the records of a cause point at: each record's derived section
   * code and, where the table carries one, its plat code.
   */
  linkedCodes(cause: string): Set<string> {
    const codes = new Set<string>();
    for (const { row, code } of this.records) {
      if (row.CauseNumber !== cause) continue;
      if (code !== null) codes.add(code);
      if (row.Conc !== null) codes.add(row.Conc);
    }
    return codes;
  }

  /**
   * Distinct plat codes matched to a cause, in the order given.
   *
   * Logs an {@link AmbiguousMatchWarning} for every linked code that a
   * non-matching plat code contains, or is contained in.
   */
  sectionsForMatter(cause: string, platCodes: Iterable<string>): string[] {
    const linked = this.linkedCodes(cause);
    if (linked.size === 0) {
      log.debug('No board records for cause', { cause });
      return [];
    }

    const matched: string[] = [];
    const unmatched: string[] = [];
    const seen = new Set<string>();
    for (const conc of platCodes) {
      if (seen.has(conc)) continue;
      seen.add(conc);
      if (linked.has(conc) || linked.has(codePrefix(conc))) {
        matched.push(conc);
      } else {
        unmatched.push(conc);
      }
    }

    for (const code of linked) {
      const overlapping = unmatched.filter(
        (conc) => conc.includes(code) || code.includes(conc)
      );
      if (overlapping.length > 0) {
        const warning = new AmbiguousMatchWarning(cause, code, overlapping);
        log.warn(warning.message, { cause, code, overlapping });
      }
    }

    return matched;
  }

  /**
   * Assembled plat polygons for the sections of a cause.
   */
  polygonsForMatter(cause: string, plats: readonly PlatPoint[]): LabelledPolygon[] {
    const codes = this.sectionsForMatter(
      cause,
      plats.map((point) => point.key)
    );
    return polygonsForCodes(plats, new Set(codes));
  }

  // ==========================================================================
  // Matter details
  // ==========================================================================

  /**
   * Documents filed under a cause, oldest first. Dates are compared as
   * calendar dates in either `YYYY-MM-DD` or `M/D/YYYY` form. Undated or
   * unreadable dates sort last; equal dates keep table order.
   */
  documentsForMatter(cause: string): BoardDocument[] {
    return this.documents
      .filter((row) => row.Cause === cause)
      .map((row) => {
        const parsed = parseSpudDate(row.DocumentDate);
        return {
          document: { description: row.Description, filepath: row.Filepath, date: row.DocumentDate },
          sortKey: parsed ? formatCalendarDate(parsed) : null,
        };
      })
      .sort((a, b) => {
        if (a.sortKey === null || b.sortKey === null) {
          return (a.sortKey === null ? 1 : 0) - (b.sortKey === null ? 1 : 0);
        }
        return compareText(a.sortKey, b.sortKey);
      })
      .map(({ document }) => document);
  }

  /**
   * Quip, order type and dates of a cause, taken from its first board
   * record, with its documents. Null for an unknown cause.
   */
  matterDetails(cause: string): MatterDetails | null {
    const record = this.records.find(({ row }) => row.CauseNumber === cause);
    if (!record) return null;
    return { ...toMatter(record.row), documents: this.documentsForMatter(cause) };
  }

  // ==========================================================================
  // Overview
  // ==========================================================================

  /**
   * Sections listed in a docket's matter picker: the TSR rows of its plat
   * codes.
   */
  sectionsWithMatters(codes: Iterable<string>): TsrRow[] {
    return buildTsrIndex(codes);
  }

  /**
   * Every (section, docket, cause) where a TSR section matches a board
   * record on all six location components, sorted by docket then cause.
   * Within one (docket, cause) rows keep TSR order.
   */
  allMattersOverview(tsrRows: readonly TsrRow[]): MatterOverviewRow[] {
    const bySection = new Map<LocationCode, BoardDataRow[]>();
    for (const { row, code } of this.records) {
      if (code === null) continue;
      const rows = bySection.get(code);
      if (rows) {
        rows.push(row);
      } else {
        bySection.set(code, [row]);
      }
    }

    const seen = new Set<string>();
    const overview: MatterOverviewRow[] = [];
    for (const tsr of tsrRows) {
      for (const row of bySection.get(tsr.code) ?? []) {
        const key = `${tsr.code}\u0000${row.DocketNumber}\u0000${row.CauseNumber}`;
        if (seen.has(key)) continue;
        seen.add(key);
        overview.push({
          ...tsr,
          docketNumber: row.DocketNumber,
          causeNumber: row.CauseNumber,
          matterLabel: matterLabel(row.DocketNumber, row.CauseNumber),
        });
      }
    }

    return overview.sort(
      (a, b) =>
        compareText(a.docketNumber, b.docketNumber) || compareText(a.causeNumber, b.causeNumber)
    );
  }
}
