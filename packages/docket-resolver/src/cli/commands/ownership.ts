/**
 * Ownership Command
 *
 * Land ownership parcels on the plats a docket uses.
 *
 * USAGE:
 *   docket-resolver ownership --docket <docket>
 *
 * @module cli/commands/ownership
 */

import type { Command } from 'commander';
import type { OwnershipParcel } from '../../core/types/index.js';
import type { ContextProvider } from '../context.js';
import { formatJson, formatOutput, type TableColumn } from '../lib/output.js';
import { addSelectionOptions, toSelection, type SelectionOptions } from '../lib/options.js';

export interface ParcelRow {
  readonly conc: string;
  readonly owner: string | null;
  readonly agency: string | null;
  readonly rings: number;
  readonly vertices: number;
}

const COLUMNS: readonly TableColumn<ParcelRow>[] = [
  { key: 'conc', header: 'Plat' },
  { key: 'owner', header: 'Owner' },
  { key: 'agency', header: 'Agency' },
  { key: 'rings', header: 'Rings', align: 'right' },
  { key: 'vertices', header: 'Vertices', align: 'right' },
];

export function parcelRows(parcels: readonly OwnershipParcel[]): ParcelRow[] {
  return parcels.map((parcel) => ({
    conc: parcel.conc,
    owner: parcel.owner,
    agency: parcel.agency,
    rings: parcel.rings.length,
    vertices: parcel.rings.reduce((sum, ring) => sum + ring.length, 0),
  }));
}

export function registerOwnershipCommand(program: Command, context: ContextProvider): void {
  const command = program
    .command('ownership')
    .description('Land ownership parcels on the plats of a docket');

  addSelectionOptions(command, false).action((options: SelectionOptions) => {
    const ctx = context();
    const selection = toSelection(options);
    ctx.logger.commandStart('ownership', { docket: selection.docket });

    const ownership = ctx.service().resolveDocketOwnership(selection);
    const rows = parcelRows(ownership.parcels);
    ctx.print(
      ctx.format === 'json'
        ? formatJson({ owners: ownership.owners, agencies: ownership.agencies, parcels: rows })
        : formatOutput(rows, ctx.format, COLUMNS)
    );
    ctx.logger.commandEnd(true, { parcels: rows.length });
  });
}
