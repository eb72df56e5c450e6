/**
 * Docket Resolver CLI Configuration Management
 *
 * Loads configuration from .docket-resolverrc (YAML or JSON) with
 * environment variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (DOCKET_RESOLVER_*)
 * 3. Config file (.docket-resolverrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_ADJACENCY_TOLERANCE, DEFAULT_UTM_ZONE } from '../../core/constants.js';
import { ConfigError } from '../../core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface DocketResolverConfig {
  /** Board database file */
  readonly database: string;
  readonly utmZone: number;
  /** Field adjacency buffer, in metres */
  readonly adjacencyTolerance: number;
  /** Reference date for well ages; null means the current time */
  readonly now: Date | null;
  readonly verbose: boolean;
  readonly json: boolean;
  /** Config file the settings were read from, if any */
  readonly configPath: string | null;
}

type ConfigSettings = Omit<DocketResolverConfig, 'configPath'>;

/** One source of settings; absent keys fall through to the next source. */
export type ConfigLayer = Partial<ConfigSettings>;

export const DEFAULT_CONFIG: ConfigSettings = {
  database: './data/Board_DB.db',
  utmZone: DEFAULT_UTM_ZONE,
  adjacencyTolerance: DEFAULT_ADJACENCY_TOLERANCE,
  now: null,
  verbose: false,
  json: false,
};

export const CONFIG_FILE_NAMES = [
  '.docket-resolverrc',
  '.docket-resolverrc.yaml',
  '.docket-resolverrc.yml',
  '.docket-resolverrc.json',
] as const;

export const ENV_PREFIX = 'DOCKET_RESOLVER_';

// ============================================================================
// Schemas
// ============================================================================

const utmZone = z.number().int().min(1).max(60);
const tolerance = z.number().nonnegative();
const referenceDate = z.coerce.date();

const ConfigFileSchema = z
  .object({
    database: z.string().min(1).optional(),
    utmZone: utmZone.optional(),
    adjacencyTolerance: tolerance.optional(),
    now: referenceDate.optional(),
    verbose: z.boolean().optional(),
    json: z.boolean().optional(),
  })
  .strict();

const envBoolean = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
  DB: z.string().min(1).optional(),
  UTM_ZONE: z.coerce.number().pipe(utmZone).optional(),
  ADJACENCY_TOLERANCE: z.coerce.number().pipe(tolerance).optional(),
  NOW: referenceDate.optional(),
  VERBOSE: envBoolean.optional(),
  JSON: envBoolean.optional(),
});

function describeIssues(error: z.ZodError, prefix = ''): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${prefix}${issue.path.join('.')}` : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

// ============================================================================
// Sources
// ============================================================================

/**
 * Find config file in a directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function parseContent(filePath: string, content: string): unknown {
  try {
    return filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot parse config file ${filePath}: ${reason}`, filePath);
  }
}

/**
 * Read and validate a config file. A relative database path is taken
 * relative to the file's directory.
 */
export function parseConfigFile(filePath: string): ConfigLayer {
  const raw = parseContent(filePath, readFileSync(filePath, 'utf-8'));
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid config file ${filePath}: ${describeIssues(result.error)}`,
      filePath
    );
  }

  const layer = result.data;
  return layer.database === undefined
    ? layer
    : { ...layer, database: resolve(dirname(filePath), layer.database) };
}

/**
 * Settings from DOCKET_RESOLVER_* variables. Empty variables are ignored.
 */
export function readEnvLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[`${ENV_PREFIX}${key}`];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  const result = EnvSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      `Invalid environment: ${describeIssues(result.error, ENV_PREFIX)}`,
      'environment'
    );
  }

  const { DB, UTM_ZONE, ADJACENCY_TOLERANCE, NOW, VERBOSE, JSON: json } = result.data;
  return {
    database: DB,
    utmZone: UTM_ZONE,
    adjacencyTolerance: ADJACENCY_TOLERANCE,
    now: NOW,
    verbose: VERBOSE,
    json,
  };
}

/**
 * Apply layers over a base, lowest precedence first.
 */
export function mergeLayers(base: ConfigSettings, ...layers: readonly ConfigLayer[]): ConfigSettings {
  let merged = base;
  for (const layer of layers) {
    merged = {
      database: layer.database ?? merged.database,
      utmZone: layer.utmZone ?? merged.utmZone,
      adjacencyTolerance: layer.adjacencyTolerance ?? merged.adjacencyTolerance,
      now: layer.now ?? merged.now,
      verbose: layer.verbose ?? merged.verbose,
      json: layer.json ?? merged.json,
    };
  }
  return merged;
}

// ============================================================================
// Loading
// ============================================================================

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory the config file search starts from (default: cwd) */
  readonly cwd?: string;
  /** Environment to read (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  readonly overrides?: ConfigLayer;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when a named config file is missing or any source
 *   holds an invalid value
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<DocketResolverConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null;
  const explicitPath = options.configPath ?? env[`${ENV_PREFIX}CONFIG`];
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
  } else {
    configPath = findConfigFile(cwd);
  }

  const fileLayer = configPath === null ? {} : parseConfigFile(configPath);
  const envLayer = readEnvLayer(env);
  const overrides = options.overrides ?? {};

  const settings = mergeLayers(DEFAULT_CONFIG, fileLayer, envLayer, overrides);
  const fromFile =
    fileLayer.database !== undefined &&
    envLayer.database === undefined &&
    overrides.database === undefined;

  return {
    ...settings,
    database: fromFile ? settings.database : resolve(cwd, settings.database),
    configPath,
  };
}
