/**
 * Sections Command
 *
 * Main and adjacent plat sections of a docket, or with `--tsr` the
 * sections the docket's matter picker lists.
 *
 * USAGE:
 *   docket-resolver sections --docket <docket> [--tsr]
 *
 * @module cli/commands/sections
 */

import type { Command } from 'commander';
import type { DocketSections, LabelledPolygon, TsrRow } from '../../core/types/index.js';
import type { ContextProvider } from '../context.js';
import { formatJson, formatOutput, formatters, type TableColumn } from '../lib/output.js';
import { addSelectionOptions, toSelection, type SelectionOptions } from '../lib/options.js';

export interface SectionsOptions extends SelectionOptions {
  readonly tsr?: boolean;
}

export type SectionRole = 'main' | 'adjacent1' | 'adjacent2';

export interface SectionRow {
  readonly role: SectionRole;
  readonly code: string;
  readonly label: string;
  readonly vertices: number;
  readonly centroidX: number;
  readonly centroidY: number;
}

const SECTION_COLUMNS: readonly TableColumn<SectionRow>[] = [
  { key: 'role', header: 'Role' },
  { key: 'code', header: 'Code' },
  { key: 'label', header: 'Section' },
  { key: 'vertices', header: 'Vertices', align: 'right' },
  { key: 'centroidX', header: 'Easting', align: 'right', formatter: formatters.fixed(1) },
  { key: 'centroidY', header: 'Northing', align: 'right', formatter: formatters.fixed(1) },
];

const TSR_COLUMNS: readonly TableColumn<TsrRow>[] = [
  { key: 'code', header: 'Code' },
  { key: 'label', header: 'Section' },
];

function toRows(role: SectionRole, polygons: readonly LabelledPolygon[]): SectionRow[] {
  return polygons.map((polygon) => ({
    role,
    code: polygon.key,
    label: polygon.label,
    vertices: polygon.vertices.length,
    centroidX: polygon.centroid[0],
    centroidY: polygon.centroid[1],
  }));
}

/**
 * Main plats first, then first and second adjacent.
 */
export function sectionRows(sections: DocketSections): SectionRow[] {
  return [
    ...toRows('main', sections.mainPolygons),
    ...toRows('adjacent1', sections.adjacent1Polygons),
    ...toRows('adjacent2', sections.adjacent2Polygons),
  ];
}

export function registerSectionsCommand(program: Command, context: ContextProvider): void {
  const command = program
    .command('sections')
    .description('Main and adjacent plat sections of a docket')
    .option('--tsr', 'List the docket sections by township, section and range');

  addSelectionOptions(command, false).action((options: SectionsOptions) => {
    const ctx = context();
    const selection = toSelection(options);
    ctx.logger.commandStart('sections', { docket: selection.docket, tsr: options.tsr });
    const service = ctx.service();

    if (options.tsr === true) {
      const rows = service.sectionsWithMatters(selection);
      ctx.print(formatOutput(rows, ctx.format, TSR_COLUMNS));
      ctx.logger.commandEnd(true, { rows: rows.length });
      return;
    }

    const sections = service.resolveSectionsForDocket(selection);
    const rows = sectionRows(sections);
    ctx.print(
      ctx.format === 'json'
        ? formatJson({ viewCenter: sections.viewCenter, usedCodes: sections.usedCodes, sections: rows })
        : formatOutput(rows, ctx.format, SECTION_COLUMNS)
    );
    ctx.logger.commandEnd(true, { rows: rows.length });
  });
}
