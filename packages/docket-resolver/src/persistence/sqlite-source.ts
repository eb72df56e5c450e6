/**
 * SQLite source tables
 *
 * Reads the board database once, read-only, and hands back validated rows.
 * Nothing downstream touches the database: resolvers run on the returned
 * SourceTables.
 *
 * @module persistence/sqlite-source
 */

import Database from 'better-sqlite3';
import { MissingColumnError } from '../core/errors.js';
import type { SourceTables } from '../core/types/index.js';
import { createLogger } from '../core/utils/logger.js';
import { TABLES, validateRows, type TableDefinition } from './schemas.js';

const log = createLogger({ module: 'sqlite-source' });

function isRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function tableExists(db: Database.Database, table: string): boolean {
  const row: unknown = db
    .prepare("SELECT 1 AS present FROM sqlite_master WHERE type IN ('table', 'view') AND name = ?")
    .get(table);
  return row !== undefined;
}

/**
 * Read and validate one table.
 *
 * @throws MissingColumnError when the table, or one of its required
 *   columns, is absent
 * @throws RowValidationError when a value cannot be coerced
 */
export function readTable<T>(db: Database.Database, definition: TableDefinition<T>): T[] {
  if (!tableExists(db, definition.table)) {
    throw new MissingColumnError(definition.table, definition.required);
  }

  const statement = db.prepare(`SELECT * FROM ${quoteIdentifier(definition.table)}`);
  const columns = statement.columns().map((column) => column.name);
  const rows = statement.all().filter(isRecord);

  return validateRows(definition, columns, rows);
}

/**
 * Read every source table from a database file.
 */
export function readSourceTables(db: Database.Database): SourceTables {
  const tables: SourceTables = {
    wellInfo: readTable(db, TABLES.wellInfo),
    surveys: readTable(db, TABLES.surveys),
    boardData: readTable(db, TABLES.boardData),
    boardDocuments: readTable(db, TABLES.boardDocuments),
    plats: readTable(db, TABLES.plats),
    adjacent: readTable(db, TABLES.adjacent),
    fields: readTable(db, TABLES.fields),
    owners: readTable(db, TABLES.owners),
  };

  log.debug('Read source tables', {
    wellInfo: tables.wellInfo.length,
    surveys: tables.surveys.length,
    boardData: tables.boardData.length,
    boardDocuments: tables.boardDocuments.length,
    plats: tables.plats.length,
    adjacent: tables.adjacent.length,
    fields: tables.fields.length,
    owners: tables.owners.length,
  });
  return tables;
}

/**
 * Open a database file read-only, read its tables and close it.
 */
export function loadSourceTables(dbPath: string): SourceTables {
  const db = new Database(dbPath, { readonly: true, fileMustExist: true });
  try {
    return readSourceTables(db);
  } finally {
    db.close();
  }
}
