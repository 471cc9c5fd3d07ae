/**
 * SQLite Storage Backend
 *
 * Indexed storage using better-sqlite3 for the processing ledger and
 * circuit breaker state. Enabled with STORAGE_BACKEND=sqlite.
 */

import Database from "better-sqlite3";
import * as path from "node:path";
import * as fs from "node:fs";
import { getDataDir } from "./base.js";
import type { Repository } from "./repository.js";

let db: Database.Database | null = null;

/**
 * Database file location; PIPELINE_DB_PATH may also be ":memory:".
 */
export function getDatabasePath(): string {
  return process.env.PIPELINE_DB_PATH ?? path.join(getDataDir(), "pipeline.db");
}

/**
 * Open a database at `dbPath` with the pipeline schema applied.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const database = new Database(dbPath);
  database.pragma("journal_mode = WAL");
  database.pragma("synchronous = NORMAL");

  initializeSchema(database);
  return database;
}

/**
 * Get or create the shared SQLite database connection.
 */
export function getDatabase(): Database.Database {
  if (db) return db;
  db = openDatabase(getDatabasePath());
  return db;
}

/**
 * Close the database connection.
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

function initializeSchema(database: Database.Database): void {
  database.exec(`
    -- Processing ledger, one row per message source
    CREATE TABLE IF NOT EXISTS message_records (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      source TEXT,
      message_id TEXT,
      status TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_message_records_source ON message_records(source);
    CREATE INDEX IF NOT EXISTS idx_message_records_message_id ON message_records(message_id);
    CREATE INDEX IF NOT EXISTS idx_message_records_status ON message_records(status);

    -- Circuit breaker state, one row per endpoint
    CREATE TABLE IF NOT EXISTS circuit_state (
      id TEXT PRIMARY KEY,
      data TEXT NOT NULL,
      status TEXT,
      created_at TEXT DEFAULT (datetime('now')),
      updated_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_circuit_state_status ON circuit_state(status);
  `);
}

/**
 * Field mapping from entity property to database column.
 */
export interface FieldMapping<T> {
  column: string;
  property: keyof T;
}

interface DataRow {
  data: string;
}

interface CountRow {
  count: number;
}

function columnValue(value: unknown): string | number | null {
  if (value === undefined || value === null) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "number") return value;
  return String(value);
}

/**
 * Create a SQLite repository for a table. Entities are stored as JSON in the
 * `data` column; mapped properties are copied into indexed columns.
 */
export function createSqliteRepository<T extends { id: string }>(
  tableName: string,
  fieldMappings: FieldMapping<T>[],
  parse: (raw: unknown) => T,
  database: Database.Database = getDatabase()
): Repository<T> {
  const indexedColumns = fieldMappings.map((f) => f.column);
  const columns = ["id", "data", "updated_at", ...indexedColumns];
  const upsert = database.prepare(`
    INSERT INTO ${tableName} (${columns.join(", ")})
    VALUES (${columns.map(() => "?").join(", ")})
    ON CONFLICT(id) DO UPDATE SET
      ${["data", "updated_at", ...indexedColumns].map((c) => `${c} = excluded.${c}`).join(",\n      ")}
  `);
  const selectOne = database.prepare<[string], DataRow>(`SELECT data FROM ${tableName} WHERE id = ?`);
  const selectAll = database.prepare<[], DataRow>(`SELECT data FROM ${tableName}`);
  const remove = database.prepare<[string]>(`DELETE FROM ${tableName} WHERE id = ?`);
  const countAll = database.prepare<[], CountRow>(`SELECT COUNT(*) as count FROM ${tableName}`);

  const decode = (row: DataRow): T => parse(JSON.parse(row.data));

  return {
    async save(entity: T): Promise<T> {
      upsert.run(
        entity.id,
        JSON.stringify(entity),
        new Date().toISOString(),
        ...fieldMappings.map((f) => columnValue(entity[f.property]))
      );
      return entity;
    },

    async get(id: string): Promise<T | null> {
      const row = selectOne.get(id);
      return row ? decode(row) : null;
    },

    async getAll(): Promise<T[]> {
      return selectAll.all().map(decode);
    },

    async delete(id: string): Promise<boolean> {
      return remove.run(id).changes > 0;
    },

    async exists(id: string): Promise<boolean> {
      return selectOne.get(id) !== undefined;
    },

    async find(predicate: (entity: T) => boolean): Promise<T[]> {
      const all = await this.getAll();
      return all.filter(predicate);
    },

    async count(): Promise<number> {
      return countAll.get()?.count ?? 0;
    },
  };
}
