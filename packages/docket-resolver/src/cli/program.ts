/**
 * Docket Resolver CLI Program
 *
 * Builds the commander program: global options, configuration loading in
 * the preAction hook and command registration. `run` parses argv and maps
 * the outcome to an exit code.
 *
 * @module cli/program
 */

import { Command, CommanderError } from 'commander';
import Database from 'better-sqlite3';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError, isDocketResolverError } from '../core/errors.js';
import type { SourceTables } from '../core/types/index.js';
import { registerCommands } from './commands/index.js';
import { createCommandContext, type CommandContext } from './context.js';
import { loadConfig } from './lib/config.js';
import { createCLILogger } from './lib/logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  UNEXPECTED_ERROR: 1,
  RESOLUTION_ERROR: 2,
  CONFIG_ERROR: 3,
  DATABASE_ERROR: 4,
  USAGE_ERROR: 64,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_ERROR;
  if (isDocketResolverError(error)) return EXIT_CODES.RESOLUTION_ERROR;
  if (error instanceof Database.SqliteError) return EXIT_CODES.DATABASE_ERROR;
  return EXIT_CODES.UNEXPECTED_ERROR;
}

// ============================================================================
// Global Options
// ============================================================================

const GlobalOptionsSchema = z.object({
  db: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
  format: z.enum(['table', 'json', 'csv']).optional(),
  json: z.boolean().optional(),
  verbose: z.boolean().optional(),
  now: z.coerce.date().optional(),
  utmZone: z.coerce.number().int().min(1).max(60).optional(),
});

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = new URL('../../package.json', import.meta.url);
  const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

// ============================================================================
// Program
// ============================================================================

export interface ProgramOptions {
  readonly cwd?: string;
  readonly env?: NodeJS.ProcessEnv;
  /** Command output sink (default: stdout) */
  readonly print?: (text: string) => void;
  /** Diagnostics sink, newline included (default: stderr) */
  readonly writeErr?: (text: string) => void;
  readonly openTables?: (database: string) => SourceTables;
}

export interface CliProgram {
  readonly program: Command;
  /** Context of the running command, once the preAction hook has run. */
  currentContext(): CommandContext | null;
}

export function createProgram(options: ProgramOptions = {}): CliProgram {
  const writeErr = options.writeErr ?? ((text: string) => process.stderr.write(text));
  let context: CommandContext | null = null;

  const program = new Command();

  program
    .name('docket-resolver')
    .description('Resolve board dockets into well windows, plat sections and board matters')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('--db <path>', 'Board database file (default: ./data/Board_DB.db)')
    .option('--config <path>', 'Path to config file (default: .docket-resolverrc)')
    .option('--format <fmt>', 'Output format: table|json|csv')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--now <date>', 'Reference date for well ages')
    .option('--utm-zone <zone>', 'UTM zone of the source coordinates')
    .exitOverride()
    .configureOutput({ writeErr })
    .hook('preAction', async (thisCommand) => {
      const parsed = GlobalOptionsSchema.safeParse(thisCommand.opts());
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
          .join('; ');
        throw new ConfigError(`Invalid option: ${detail}`, 'command line');
      }
      const flags = parsed.data;

      const config = await loadConfig({
        configPath: flags.config,
        cwd: options.cwd,
        env: options.env,
        overrides: {
          database: flags.db,
          json: flags.json,
          verbose: flags.verbose,
          now: flags.now,
          utmZone: flags.utmZone,
        },
      });

      const logger = createCLILogger({
        level: config.verbose ? 'debug' : 'info',
        json: config.json,
        ...(options.writeErr && { write: (line: string) => writeErr(`${line}\n`) }),
      });
      logger.debug('Configuration loaded', {
        configPath: config.configPath,
        database: config.database,
      });

      context = createCommandContext(config, logger, {
        format: flags.format,
        openTables: options.openTables,
        print: options.print,
      });
    });

  registerCommands(program, () => {
    if (context === null) {
      throw new Error('Command context not initialized. The preAction hook has not run.');
    }
    return context;
  });

  return { program, currentContext: () => context };
}

/**
 * Parse argv (node-style: executable and script first), run the command
 * and return its exit code.
 */
export async function run(argv: readonly string[], options: ProgramOptions = {}): Promise<ExitCode> {
  const cli = createProgram(options);
  const writeErr = options.writeErr ?? ((text: string) => process.stderr.write(text));

  try {
    await cli.program.parseAsync([...argv]);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const code = exitCodeFor(error);
    // commander has already reported its own errors
    if (error instanceof CommanderError) return code;

    const message = error instanceof Error ? error.message : String(error);
    const context = cli.currentContext();
    if (context) {
      context.logger.error(message, { exitCode: code });
      context.logger.commandEnd(false);
    } else {
      writeErr(`Error: ${message}\n`);
    }
    return code;
  }
}
