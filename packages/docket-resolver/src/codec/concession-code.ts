/**
 * Concession Code Codec
 *
 * Encodes and decodes the nine-character section code `SSTTDRRDB`:
 *
 * - SS: section, two digits
 * - TT: township, two digits
 * - D:  township direction, N or S
 * - RR: range, two digits
 * - D:  range direction, E or W
 * - B:  baseline, S or U
 *
 * Board tables store directions either as letters or as the numeric codes
 * `1`/`2`, whose meaning depends on the field (see DIRECTION_TABLE).
 *
 * @module codec/concession-code
 */

import { DIRECTION_TABLE, LOCATION_CODE_LENGTH } from '../core/constants.js';
import { DecodeError, EncodingError } from '../core/errors.js';
import type {
  Baseline,
  BoardDataRow,
  DirectionComponent,
  LocationCode,
  LocationParts,
  NumericComponent,
  RangeDirection,
  TownshipDirection,
} from '../core/types/index.js';

const CODE_PATTERN = /^(\d{2})(\d{2})([NS])(\d{2})([EW])([SU])$/;
const INTEGER_TEXT = /^[+-]?\d+(\.0*)?$/;

type DirectionField = keyof typeof DIRECTION_TABLE;

const LETTERS: { readonly [F in DirectionField]: readonly string[] } = {
  township: ['N', 'S'],
  range: ['E', 'W'],
  baseline: ['S', 'U'],
};

// ============================================================================
// Component Normalisation
// ============================================================================

/**
 * Parse an integer-valued component. Accepts `1`, `"1"` and `"1.0"`.
 *
 * @returns null when the value is not an integer
 */
function parseInteger(value: NumericComponent): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }
  const trimmed = value.trim();
  if (!INTEGER_TEXT.test(trimmed)) {
    return null;
  }
  return Math.trunc(Number(trimmed));
}

function padComponent(field: string, value: NumericComponent): string {
  const parsed = parseInteger(value);
  if (parsed === null) {
    throw new EncodingError(`${field} is not an integer: ${JSON.stringify(value)}`, field, value);
  }
  if (parsed < 0 || parsed > 99) {
    throw new EncodingError(`${field} out of range 0-99: ${parsed}`, field, value);
  }
  return String(parsed).padStart(2, '0');
}

function translateDirection(field: DirectionField, value: DirectionComponent): string {
  const table: Readonly<Record<string, string>> = DIRECTION_TABLE[field];
  const text = typeof value === 'number' ? String(value) : value.trim().toUpperCase();

  const numeric = parseInteger(text);
  if (numeric !== null) {
    const letter = table[String(numeric)];
    if (letter !== undefined) {
      return letter;
    }
  } else if (LETTERS[field].includes(text)) {
    return text;
  }

  throw new EncodingError(`Unknown ${field} direction: ${JSON.stringify(value)}`, field, value);
}

// ============================================================================
// Encode / Decode
// ============================================================================

/**
 * Build a section code from its six components.
 *
 * @example
 * encodeConcessionCode(1, 15, '1', 2, '2', '1'); // '0115N02WS'
 */
export function encodeConcessionCode(
  section: NumericComponent,
  township: NumericComponent,
  townshipDir: DirectionComponent,
  range: NumericComponent,
  rangeDir: DirectionComponent,
  baseline: DirectionComponent
): LocationCode {
  return (
    padComponent('section', section) +
    padComponent('township', township) +
    translateDirection('township', townshipDir) +
    padComponent('range', range) +
    translateDirection('range', rangeDir) +
    translateDirection('baseline', baseline)
  );
}

export function encodeLocationParts(parts: LocationParts): LocationCode {
  return encodeConcessionCode(
    parts.section,
    parts.township,
    parts.townshipDir,
    parts.range,
    parts.rangeDir,
    parts.baseline
  );
}

function isTownshipDirection(value: string): value is TownshipDirection {
  return value === 'N' || value === 'S';
}

function isRangeDirection(value: string): value is RangeDirection {
  return value === 'E' || value === 'W';
}

function isBaseline(value: string): value is Baseline {
  return value === 'S' || value === 'U';
}

/**
 * Split a section code into its components.
 *
 * @throws DecodeError when the string is not exactly `SSTTDRRDB`
 */
export function decodeConcessionCode(code: string): LocationParts {
  const match = CODE_PATTERN.exec(code);
  if (!match) {
    throw new DecodeError(code);
  }
  const [, section, township, townshipDir, range, rangeDir, baseline] = match;
  if (
    section === undefined ||
    township === undefined ||
    range === undefined ||
    townshipDir === undefined ||
    rangeDir === undefined ||
    baseline === undefined ||
    !isTownshipDirection(townshipDir) ||
    !isRangeDirection(rangeDir) ||
    !isBaseline(baseline)
  ) {
    throw new DecodeError(code);
  }
  return {
    section: Number(section),
    township: Number(township),
    townshipDir,
    range: Number(range),
    rangeDir,
    baseline,
  };
}

export function isLocationCode(code: string): boolean {
  return CODE_PATTERN.test(code);
}

// ============================================================================
// Labels
// ============================================================================

/**
 * Render parts as `"<sec> <twp><tdir> <rng><rdir> <base>"` without leading
 * zeros, e.g. `1 15N 2W S`.
 */
export function humanizeLocation(parts: LocationParts): string {
  return `${parts.section} ${parts.township}${parts.townshipDir} ${parts.range}${parts.rangeDir} ${parts.baseline}`;
}

export function humanizeConcessionCode(code: string): string {
  return humanizeLocation(decodeConcessionCode(code));
}

/**
 * First nine characters of a plat code, i.e. the section it subdivides.
 */
export function codePrefix(conc: string): string {
  return conc.slice(0, LOCATION_CODE_LENGTH);
}

// ============================================================================
// Board Records
// ============================================================================

/**
 * Section code of a BoardData row, built from Sec, Township, TownshipDir,
 * Range, RangeDir and PM.
 *
 * @throws EncodingError when a component is missing or malformed; a
 *   missing component reads as the empty string
 */
export function concessionCodeFromBoardRecord(
  row: Pick<BoardDataRow, 'Sec' | 'Township' | 'TownshipDir' | 'Range' | 'RangeDir' | 'PM'>
): LocationCode {
  return encodeConcessionCode(
    row.Sec ?? '',
    row.Township ?? '',
    row.TownshipDir ?? '',
    row.Range ?? '',
    row.RangeDir ?? '',
    row.PM ?? ''
  );
}
