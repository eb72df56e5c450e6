/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import type { ContextProvider } from '../context.js';
import { registerDocketsCommand } from './dockets.js';
import { registerFieldsCommand } from './fields.js';
import { registerMattersCommand } from './matters.js';
import { registerOverviewCommand } from './overview.js';
import { registerOwnershipCommand } from './ownership.js';
import { registerSectionsCommand } from './sections.js';
import { registerWellsCommand } from './wells.js';

export { docketRows, type DocketRow } from './dockets.js';
export {
  docketFieldRows,
  fieldAdjacencyRows,
  type DocketFieldRow,
  type FieldAdjacencyRow,
} from './fields.js';
export { matterSectionRows, toMatterQuery } from './matters.js';
export { parcelRows, type ParcelRow } from './ownership.js';
export { sectionRows, type SectionRow } from './sections.js';
export { trajectoryRows, wellListRows, windowSummaryRows } from './wells.js';

/**
 * Register every command on the program
 */
export function registerCommands(program: Command, context: ContextProvider): void {
  registerDocketsCommand(program, context);
  registerWellsCommand(program, context);
  registerSectionsCommand(program, context);
  registerOwnershipCommand(program, context);
  registerMattersCommand(program, context);
  registerOverviewCommand(program, context);
  registerFieldsCommand(program, context);
}
