/**
 * Command context
 *
 * What every command action receives: merged configuration, the CLI
 * logger, the chosen output format and a resolver service opened on first
 * use, so commands that fail option validation never touch the database.
 *
 * @module cli/context
 */

import { DocketResolverService } from '../core/docket-service.js';
import type { SourceTables } from '../core/types/index.js';
import { loadSourceTables } from '../persistence/sqlite-source.js';
import type { DocketResolverConfig } from './lib/config.js';
import type { CLILogger } from './lib/logger.js';
import { printOutput, type OutputFormat } from './lib/output.js';

export interface CommandContext {
  readonly config: DocketResolverConfig;
  readonly logger: CLILogger;
  readonly format: OutputFormat;
  service(): DocketResolverService;
  print(text: string): void;
}

/** Supplies the context of the running command; set by the preAction hook. */
export type ContextProvider = () => CommandContext;

export interface CommandContextOptions {
  readonly format?: OutputFormat;
  readonly openTables?: (database: string) => SourceTables;
  readonly print?: (text: string) => void;
}

export function createCommandContext(
  config: DocketResolverConfig,
  logger: CLILogger,
  options: CommandContextOptions = {}
): CommandContext {
  const openTables = options.openTables ?? loadSourceTables;
  let service: DocketResolverService | null = null;

  return {
    config,
    logger,
    format: options.format ?? (config.json ? 'json' : 'table'),
    print: options.print ?? printOutput,
    service(): DocketResolverService {
      if (service === null) {
        logger.debug('Opening board database', { database: config.database });
        service = new DocketResolverService(openTables(config.database), {
          now: config.now ?? undefined,
          utmZone: config.utmZone,
          adjacencyTolerance: config.adjacencyTolerance,
        });
      }
      return service;
    },
  };
}
