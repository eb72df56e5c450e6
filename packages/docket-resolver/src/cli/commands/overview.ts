/**
 * Overview Command
 *
 * Every board matter touching a plat section, sorted by docket then cause.
 *
 * @module cli/commands/overview
 */

import type { Command } from 'commander';
import type { MatterOverviewRow } from '../../core/types/index.js';
import type { ContextProvider } from '../context.js';
import { formatOutput, type TableColumn } from '../lib/output.js';

const COLUMNS: readonly TableColumn<MatterOverviewRow>[] = [
  { key: 'docketNumber', header: 'Docket' },
  { key: 'causeNumber', header: 'Cause' },
  { key: 'code', header: 'Code' },
  { key: 'label', header: 'Section' },
];

export function registerOverviewCommand(program: Command, context: ContextProvider): void {
  program
    .command('overview')
    .description('All board matters across plat sections')
    .action(() => {
      const ctx = context();
      ctx.logger.commandStart('overview');

      const rows = ctx.service().allMattersOverview();
      ctx.print(formatOutput(rows, ctx.format, COLUMNS));

      ctx.logger.commandEnd(true, { rows: rows.length });
    });
}
