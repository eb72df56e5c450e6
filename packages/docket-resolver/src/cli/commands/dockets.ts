/**
 * Dockets Command
 *
 * Lists board years, docket months and dockets, in the order a docket
 * picker offers them.
 *
 * USAGE:
 *   docket-resolver dockets [--year <year>] [--month <month>]
 *
 * @module cli/commands/dockets
 */

import type { Command } from 'commander';
import type { DocketResolverService } from '../../core/docket-service.js';
import type { ContextProvider } from '../context.js';
import { formatOutput, type TableColumn } from '../lib/output.js';

export interface DocketsOptions {
  readonly year?: string;
  readonly month?: string;
}

export interface DocketRow {
  readonly year: string;
  readonly month: string;
  readonly docket: string;
}

const COLUMNS: readonly TableColumn<DocketRow>[] = [
  { key: 'year', header: 'Year' },
  { key: 'month', header: 'Month' },
  { key: 'docket', header: 'Docket' },
];

/**
 * One row per (year, month, docket), optionally narrowed to a year and
 * month.
 */
export function docketRows(service: DocketResolverService, options: DocketsOptions = {}): DocketRow[] {
  const years = options.year === undefined ? service.listYears() : [options.year];
  const rows: DocketRow[] = [];

  for (const year of years) {
    const months = options.month === undefined ? service.listMonths(year) : [options.month];
    for (const month of months) {
      for (const docket of service.listDockets(year, month)) {
        rows.push({ year, month, docket });
      }
    }
  }
  return rows;
}

export function registerDocketsCommand(program: Command, context: ContextProvider): void {
  program
    .command('dockets')
    .description('List board years, months and dockets')
    .option('--year <year>', 'Only this board year')
    .option('--month <month>', 'Only this docket month')
    .action((options: DocketsOptions) => {
      const ctx = context();
      ctx.logger.commandStart('dockets', { ...options });

      const rows = docketRows(ctx.service(), options);
      ctx.print(formatOutput(rows, ctx.format, COLUMNS));

      ctx.logger.commandEnd(true, { rows: rows.length });
    });
}
