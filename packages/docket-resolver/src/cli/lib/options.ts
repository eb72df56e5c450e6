/**
 * Option parsers shared by commands
 *
 * @module cli/lib/options
 */

import { InvalidArgumentError, type Command } from 'commander';
import type { SelectionContext } from '../../core/types/index.js';

export interface SelectionOptions {
  readonly year?: string;
  readonly month?: string;
  readonly docket: string;
}

/**
 * Add `--year`, `--month` and `--docket`. The docket is always required;
 * year and month only where the command reads docket wells.
 */
export function addSelectionOptions(command: Command, requireYearAndMonth: boolean): Command {
  if (requireYearAndMonth) {
    command
      .requiredOption('--year <year>', 'Board year, e.g. 2024')
      .requiredOption('--month <month>', 'Docket month, e.g. March');
  } else {
    command
      .option('--year <year>', 'Board year, e.g. 2024')
      .option('--month <month>', 'Docket month, e.g. March');
  }
  return command.requiredOption('--docket <docket>', 'Board docket, e.g. 2024-001');
}

export function toSelection(options: SelectionOptions): SelectionContext {
  return { year: options.year ?? '', month: options.month ?? '', docket: options.docket };
}

/**
 * Commander argument parser for a finite number at or above zero.
 */
export function parseNonNegative(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative number, got "${value}".`);
  }
  return parsed;
}
