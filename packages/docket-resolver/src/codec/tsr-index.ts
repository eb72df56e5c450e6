/**
 * Township/Section/Range index
 *
 * Turns a list of plat codes into decoded, labelled section rows in the
 * order the section pickers list them.
 *
 * @module codec/tsr-index
 */

import { createLogger } from '../core/utils/logger.js';
import { DecodeError } from '../core/errors.js';
import type { TsrRow } from '../core/types/index.js';
import { codePrefix, decodeConcessionCode, humanizeLocation } from './concession-code.js';

const log = createLogger({ module: 'tsr-index' });

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sort order: baseline, township direction, range direction, township,
 * range, section.
 */
export function compareTsrRows(a: TsrRow, b: TsrRow): number {
  return (
    compareText(a.baseline, b.baseline) ||
    compareText(a.townshipDir, b.townshipDir) ||
    compareText(a.rangeDir, b.rangeDir) ||
    a.township - b.township ||
    a.range - b.range ||
    a.section - b.section
  );
}

/**
 * Build the TSR index for a set of plat codes.
 *
 * Codes are reduced to their nine-character section prefix and deduplicated.
 * A prefix that does not decode is skipped with a warning.
 */
export function buildTsrIndex(codes: Iterable<string>): TsrRow[] {
  const rows = new Map<string, TsrRow>();

  for (const conc of codes) {
    const code = codePrefix(conc);
    if (rows.has(code)) continue;

    try {
      const parts = decodeConcessionCode(code);
      rows.set(code, { ...parts, code, label: humanizeLocation(parts) });
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      log.warn('Skipping plat code that does not name a section', { conc });
    }
  }

  return [...rows.values()].sort(compareTsrRows);
}
