/**
 * Matters Command
 *
 * Board matters of a plat section, or the sections, details and documents
 * of one cause.
 *
 * USAGE:
 *   docket-resolver matters --section <code>
 *   docket-resolver matters --cause <number>
 *
 * @module cli/commands/matters
 */

import type { Command } from 'commander';
import type {
  BoardDocument,
  BoardMatter,
  BoardMatterQuery,
  BoardMatterResolution,
} from '../../core/types/index.js';
import { causeFromLabel, platLabel } from '../../board/index.js';
import type { CommandContext, ContextProvider } from '../context.js';
import { formatJson, formatOutput, type TableColumn } from '../lib/output.js';

export interface MattersOptions {
  readonly section?: string;
  readonly cause?: string;
}

export interface MatterSectionRow {
  readonly code: string;
  readonly label: string;
}

const MATTER_COLUMNS: readonly TableColumn<BoardMatter>[] = [
  { key: 'docketNumber', header: 'Docket' },
  { key: 'causeNumber', header: 'Cause' },
  { key: 'orderType', header: 'Order type' },
  { key: 'effectiveDate', header: 'Effective' },
  { key: 'endDate', header: 'Ends' },
  { key: 'quip', header: 'Quip' },
];

const SECTION_COLUMNS: readonly TableColumn<MatterSectionRow>[] = [
  { key: 'code', header: 'Code' },
  { key: 'label', header: 'Section' },
];

const DOCUMENT_COLUMNS: readonly TableColumn<BoardDocument>[] = [
  { key: 'date', header: 'Date' },
  { key: 'description', header: 'Description' },
  { key: 'filepath', header: 'File' },
];

/**
 * Query for exactly one of `--section` and `--cause`; null for neither or
 * both. A cause may be given as an overview label.
 */
export function toMatterQuery(options: MattersOptions): BoardMatterQuery | null {
  const { section, cause } = options;
  if (section !== undefined && cause === undefined) {
    return { section };
  }
  if (cause !== undefined && section === undefined) {
    return { cause: causeFromLabel(cause) };
  }
  return null;
}

export function matterSectionRows(sections: readonly string[]): MatterSectionRow[] {
  return sections.map((code) => ({ code, label: platLabel(code) }));
}

function printResolution(ctx: CommandContext, resolution: BoardMatterResolution): void {
  if (resolution.kind === 'section') {
    ctx.print(formatOutput(resolution.matters, ctx.format, MATTER_COLUMNS));
    return;
  }

  const sections = matterSectionRows(resolution.sections);
  if (ctx.format === 'json') {
    ctx.print(formatJson({ cause: resolution.cause, details: resolution.details, sections }));
    return;
  }

  const { details } = resolution;
  if (details === null) {
    ctx.print(`No board records for cause ${resolution.cause}.`);
    return;
  }
  ctx.print(
    [
      formatOutput([details], ctx.format, MATTER_COLUMNS),
      formatOutput(sections, ctx.format, SECTION_COLUMNS),
      formatOutput(details.documents, ctx.format, DOCUMENT_COLUMNS),
    ].join('\n\n')
  );
}

export function registerMattersCommand(program: Command, context: ContextProvider): void {
  program
    .command('matters')
    .description('Board matters of a section, or sections and documents of a cause')
    .option('--section <code>', 'Section or plat code')
    .option('--cause <number>', 'Cause number, or an overview label')
    .action((options: MattersOptions, command: Command) => {
      const query = toMatterQuery(options);
      if (query === null) {
        command.error('error: specify exactly one of --section or --cause');
      }
      const ctx = context();
      ctx.logger.commandStart('matters', { ...query });

      const resolution = ctx.service().resolveBoardMatters(query);
      printResolution(ctx, resolution);

      ctx.logger.commandEnd(true, {
        kind: resolution.kind,
        results: resolution.kind === 'section' ? resolution.matters.length : resolution.sections.length,
      });
    });
}
