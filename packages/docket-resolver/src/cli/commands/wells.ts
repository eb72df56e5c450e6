/**
 * Wells Command
 *
 * Windowed well points of a docket, the docket's well list, or the
 * trajectory of one well.
 *
 * USAGE:
 *   docket-resolver wells --year <year> --month <month> --docket <docket> [options]
 *
 * OPTIONS:
 *   --list          List the docket wells instead of window counts
 *   --well <well>   Trajectory of one well, by id or display name
 *
 * EXAMPLES:
 *   docket-resolver wells --year 2024 --month March --docket 2024-001
 *   docket-resolver wells --year 2024 --month March --docket 2024-001 --well "1 - Alpha"
 *
 * @module cli/commands/wells
 */

import type { Command } from 'commander';
import type { AgeWindow } from '../../core/constants.js';
import type { DocketWellListing } from '../../core/docket-service.js';
import type {
  SelectedWellView,
  WellCategory,
  WellRecord,
  WellWindows,
} from '../../core/types/index.js';
import { toRenderPoints, renderedY, wellIdsIn } from '../../wells/index.js';
import type { ContextProvider } from '../context.js';
import { formatJson, formatOutput, formatters, type TableColumn } from '../lib/output.js';
import { addSelectionOptions, toSelection, type SelectionOptions } from '../lib/options.js';

// ============================================================================
// Types
// ============================================================================

export interface WellsOptions extends SelectionOptions {
  readonly list?: boolean;
  readonly well?: string;
}

export interface WindowSummaryRow {
  readonly category: WellCategory;
  readonly window: AgeWindow;
  readonly wells: number;
  readonly points: number;
}

export interface WellListRow {
  readonly wellId: string;
  readonly displayName: string;
  readonly status: string | null;
  readonly wellType: string | null;
  readonly ageMonths: number | null;
  readonly mainWell: boolean;
}

export interface TrajectoryRow {
  readonly measuredDepth: number | null;
  readonly x: number;
  readonly y: number;
  readonly z: number | null;
}

const WINDOW_COLUMNS: readonly TableColumn<WindowSummaryRow>[] = [
  { key: 'category', header: 'Category' },
  { key: 'window', header: 'Months', align: 'right' },
  { key: 'wells', header: 'Wells', align: 'right' },
  { key: 'points', header: 'Points', align: 'right' },
];

const LIST_COLUMNS: readonly TableColumn<WellListRow>[] = [
  { key: 'displayName', header: 'Well' },
  { key: 'status', header: 'Status' },
  { key: 'wellType', header: 'Type' },
  { key: 'ageMonths', header: 'Age (months)', align: 'right', formatter: formatters.fixed(1) },
  { key: 'mainWell', header: 'Main', formatter: (value) => (value === true ? 'yes' : '') },
];

const TRAJECTORY_COLUMNS: readonly TableColumn<TrajectoryRow>[] = [
  { key: 'measuredDepth', header: 'MD', align: 'right' },
  { key: 'x', header: 'X', align: 'right', formatter: formatters.fixed(6) },
  { key: 'y', header: 'Y', align: 'right', formatter: formatters.fixed(6) },
  { key: 'z', header: 'Target elevation', align: 'right', formatter: formatters.fixed(1) },
];

// ============================================================================
// Rows
// ============================================================================

/**
 * Distinct wells and point count of every category and window.
 */
export function windowSummaryRows(windows: WellWindows): WindowSummaryRow[] {
  const rows: WindowSummaryRow[] = [];
  for (const [category, windowSet] of windows) {
    for (const [window, points] of windowSet) {
      rows.push({ category, window, wells: wellIdsIn(points).size, points: points.length });
    }
  }
  return rows;
}

function toListRow(well: WellRecord): WellListRow {
  return {
    wellId: well.wellId,
    displayName: well.displayName,
    status: well.status,
    wellType: well.wellType,
    ageMonths: well.ageMonths,
    mainWell: well.mainWell,
  };
}

/**
 * One row per display name, in listing order: subject wells first, then the
 * rest. A name heard both as a subject well and otherwise takes its subject
 * record.
 */
export function wellListRows(
  listing: Pick<DocketWellListing, 'wells' | 'displayNames'>
): WellListRow[] {
  const byName = new Map<string, WellRecord>();
  for (const well of listing.wells) {
    const seen = byName.get(well.displayName);
    if (!seen || (well.mainWell && !seen.mainWell)) {
      byName.set(well.displayName, well);
    }
  }
  return listing.displayNames.flatMap((name) => {
    const well = byName.get(name);
    return well ? [toListRow(well)] : [];
  });
}

/**
 * Selected trajectory as plotted: vertical repeats carry their render
 * offset in `y`.
 */
export function trajectoryRows(view: SelectedWellView): TrajectoryRow[] {
  const points = view.selection.points;
  return toRenderPoints(points).map((render, i) => ({
    measuredDepth: points[i]?.measuredDepth ?? null,
    x: render.x,
    y: renderedY(render),
    z: render.z,
  }));
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerWellsCommand(program: Command, context: ContextProvider): void {
  const command = program
    .command('wells')
    .description('Windowed well points of a docket')
    .option('--list', 'List the docket wells')
    .option('--well <well>', 'Trajectory of one well, by id or display name');

  addSelectionOptions(command, true).action((options: WellsOptions) => {
    const ctx = context();
    const selection = toSelection(options);
    ctx.logger.commandStart('wells', { ...selection, well: options.well, list: options.list });
    const service = ctx.service();

    if (options.well !== undefined) {
      const view = service.selectWell(selection, options.well);
      const rows = trajectoryRows(view);
      ctx.print(
        ctx.format === 'json'
          ? formatJson({
              wellId: view.wellId,
              source: view.selection.source,
              centroid: view.centroid,
              viewBox: view.viewBox,
              points: rows,
            })
          : formatOutput(rows, ctx.format, TRAJECTORY_COLUMNS)
      );
      ctx.logger.commandEnd(true, { source: view.selection.source, points: rows.length });
      return;
    }

    if (options.list === true) {
      const listing = service.listDocketWells(selection);
      const rows = wellListRows(listing);
      ctx.print(
        ctx.format === 'json'
          ? formatJson({ wells: rows, counters: listing.counters })
          : formatOutput(rows, ctx.format, LIST_COLUMNS)
      );
      ctx.logger.commandEnd(true, { wells: rows.length });
      return;
    }

    const rows = windowSummaryRows(service.resolveWellWindows(selection));
    ctx.print(formatOutput(rows, ctx.format, WINDOW_COLUMNS));
    ctx.logger.commandEnd(true, { rows: rows.length });
  });
}
