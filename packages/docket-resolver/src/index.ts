/**
 * Docket Resolver
 *
 * Resolves a board docket selection into windowed well trajectories, plat
 * section polygons and board matter cross-references.
 *
 * @example
 * ```typescript
 * import { DocketResolverService, loadSourceTables } from '@well-docket/docket-resolver';
 *
 * const service = new DocketResolverService(loadSourceTables('data/Board_DB.db'));
 * const windows = service.resolveWellWindows({ year: '2024', month: 'March', docket: '2024-001' });
 * ```
 *
 * @module docket-resolver
 */

export { DocketResolverService } from './core/docket-service.js';
export type { DocketResolverOptions, DocketWellListing } from './core/docket-service.js';

export * from './core/constants.js';
export * from './core/errors.js';
export type * from './core/types/index.js';
export { WELL_CATEGORIES } from './core/types/index.js';
export { createLogger, logger, type Logger, type LogLevel } from './core/utils/logger.js';

export * from './codec/index.js';
export * from './geometry/index.js';
export * from './wells/index.js';
export * from './board/index.js';

export { loadSourceTables, readSourceTables, readTable } from './persistence/sqlite-source.js';
export { TABLES, validateRecords, validateRows } from './persistence/schemas.js';
export type { TableDefinition } from './persistence/schemas.js';
