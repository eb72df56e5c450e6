/**
 * In-process SQLite board databases for persistence and CLI tests.
 */

import Database from 'better-sqlite3';
import type { SourceTables } from '../../core/types/index.js';
import { sampleTables } from './tables.js';

type SqlValue = string | number | null;

const SCHEMA = `
  CREATE TABLE WellInfo (
    WellID TEXT, WellName TEXT, entityname TEXT, WorkType TEXT,
    CurrentWellStatus TEXT, CurrentWellType TEXT, DrySpud TEXT,
    Board_Year TEXT, Docket_Month TEXT, Board_Docket TEXT, FieldName TEXT,
    Elevation REAL, MainWell INTEGER, "Mineral Lease" TEXT, ConcCode TEXT
  );
  CREATE TABLE DX (
    APINumber TEXT, X REAL, Y REAL, MeasuredDepth REAL,
    TrueVerticalDepth REAL, CitingType TEXT
  );
  CREATE TABLE BoardData (
    Sec REAL, Township REAL, TownshipDir REAL, Range REAL, RangeDir REAL, PM REAL,
    DocketNumber TEXT, CauseNumber TEXT, Quip TEXT, OrderType TEXT,
    EffectiveDate TEXT, EndDate TEXT, Conc TEXT
  );
  CREATE TABLE BoardDataLinks (Cause TEXT, Description TEXT, Filepath TEXT, DocumentDate TEXT);
  CREATE TABLE PlatData (Lat REAL, Lon REAL, Conc TEXT, Board_Docket TEXT, "Order" INTEGER);
  CREATE TABLE Adjacent (Board_Docket TEXT, "Order" INTEGER, src_FullCo TEXT);
  CREATE TABLE Field (Field_Name TEXT, Easting REAL, Northing REAL);
  CREATE TABLE Owner (conc TEXT, owner TEXT, state_legend TEXT, geometry TEXT);
`;

function toSqlValue(value: unknown): SqlValue {
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'number' || typeof value === 'string') return value;
  return null;
}

function quote(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function insertRows(
  db: Database.Database,
  table: string,
  rows: readonly Readonly<Record<string, unknown>>[],
  renames: Readonly<Record<string, string>> = {}
): void {
  const first = rows[0];
  if (first === undefined) return;

  const keys = Object.keys(first);
  const columns = keys.map((key) => quote(renames[key] ?? key)).join(', ');
  const placeholders = keys.map(() => '?').join(', ');
  const insert = db.prepare(`INSERT INTO ${quote(table)} (${columns}) VALUES (${placeholders})`);

  const insertAll = db.transaction((batch: readonly Readonly<Record<string, unknown>>[]) => {
    for (const row of batch) {
      insert.run(keys.map((key) => toSqlValue(row[key])));
    }
  });
  insertAll(rows);
}

/**
 * Create the board schema in `db` and fill it with `tables`.
 */
export function populateDatabase(db: Database.Database, tables: SourceTables = sampleTables()): void {
  db.exec(SCHEMA);
  insertRows(db, 'WellInfo', tables.wellInfo, { Operator: 'entityname' });
  insertRows(db, 'DX', tables.surveys);
  insertRows(db, 'BoardData', tables.boardData);
  insertRows(db, 'BoardDataLinks', tables.boardDocuments);
  insertRows(db, 'PlatData', tables.plats);
  insertRows(db, 'Adjacent', tables.adjacent);
  insertRows(db, 'Field', tables.fields);
  insertRows(db, 'Owner', tables.owners);
}

/**
 * Write a populated board database to `path`.
 */
export function writeDatabase(path: string, tables: SourceTables = sampleTables()): void {
  const db = new Database(path);
  try {
    populateDatabase(db, tables);
  } finally {
    db.close();
  }
}
