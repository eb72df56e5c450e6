/**
 * Fields Command
 *
 * Oil and gas fields bordering each other, from the Field outlines. With
 * `--docket`, the outlines of the docket wells' fields and their neighbours.
 *
 * USAGE:
 *   docket-resolver fields [--tolerance <metres>]
 *   docket-resolver fields --year <year> --month <month> --docket <docket>
 *
 * @module cli/commands/fields
 */

import type { Command } from 'commander';
import type { AdjacencyMap, DocketFields } from '../../core/types/index.js';
import type { ContextProvider } from '../context.js';
import { parseNonNegative, toSelection } from '../lib/options.js';
import { formatJson, formatOutput, formatters, type TableColumn } from '../lib/output.js';

export interface FieldsOptions {
  readonly tolerance?: number;
  readonly year?: string;
  readonly month?: string;
  readonly docket?: string;
}

export interface FieldAdjacencyRow {
  readonly field: string;
  readonly adjacent: readonly string[];
}

export interface DocketFieldRow {
  readonly field: string;
  /** True for a field a docket well produces from; false for a neighbour. */
  readonly wellField: boolean;
  readonly vertices: number;
  readonly centroidX: number;
  readonly centroidY: number;
}

const COLUMNS: readonly TableColumn<FieldAdjacencyRow>[] = [
  { key: 'field', header: 'Field' },
  { key: 'adjacent', header: 'Adjacent fields' },
];

const DOCKET_COLUMNS: readonly TableColumn<DocketFieldRow>[] = [
  { key: 'field', header: 'Field' },
  { key: 'wellField', header: 'Wells', formatter: (value) => (value === true ? 'yes' : '') },
  { key: 'vertices', header: 'Vertices', align: 'right' },
  { key: 'centroidX', header: 'Easting', align: 'right', formatter: formatters.fixed(1) },
  { key: 'centroidY', header: 'Northing', align: 'right', formatter: formatters.fixed(1) },
];

export function fieldAdjacencyRows(adjacency: AdjacencyMap): FieldAdjacencyRow[] {
  return [...adjacency].map(([field, adjacent]) => ({ field, adjacent }));
}

export function docketFieldRows(fields: DocketFields): DocketFieldRow[] {
  const wellFields = new Set(fields.wellFields);
  return fields.polygons.map((polygon) => ({
    field: polygon.label,
    wellField: wellFields.has(polygon.key),
    vertices: polygon.vertices.length,
    centroidX: polygon.centroid[0],
    centroidY: polygon.centroid[1],
  }));
}

export function registerFieldsCommand(program: Command, context: ContextProvider): void {
  program
    .command('fields')
    .description('Adjacent oil and gas fields')
    .option('--tolerance <metres>', 'Buffer distance for adjacency', parseNonNegative)
    .option('--year <year>', 'Board year, with --docket')
    .option('--month <month>', 'Docket month, with --docket')
    .option('--docket <docket>', 'Outline the fields around a docket')
    .action((options: FieldsOptions, command: Command) => {
      const ctx = context();

      if (options.docket !== undefined) {
        if (options.year === undefined || options.month === undefined) {
          command.error('error: --docket needs --year and --month');
        }
        const selection = toSelection({ ...options, docket: options.docket });
        ctx.logger.commandStart('fields', { ...selection });

        const fields = ctx.service().resolveFieldsForDocket(selection);
        const rows = docketFieldRows(fields);
        ctx.print(
          ctx.format === 'json'
            ? formatJson({ wellFields: fields.wellFields, fields: rows })
            : formatOutput(rows, ctx.format, DOCKET_COLUMNS)
        );
        ctx.logger.commandEnd(true, { fields: rows.length });
        return;
      }

      const tolerance = options.tolerance ?? ctx.config.adjacencyTolerance;
      ctx.logger.commandStart('fields', { tolerance });

      const rows = fieldAdjacencyRows(ctx.service().resolveFieldAdjacency({ tolerance }));
      ctx.print(formatOutput(rows, ctx.format, COLUMNS));

      ctx.logger.commandEnd(true, { fields: rows.length });
    });
}
