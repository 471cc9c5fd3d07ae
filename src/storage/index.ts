/**
 * Storage Layer
 *
 * Output filesystem, processing ledger and circuit-breaker state.
 * Records use JSON files by default; set STORAGE_BACKEND=sqlite for SQLite.
 */

export {
  getDataDir,
  storageDirs,
  createStorage,
  type StorageOperations,
} from "./base.js";

export {
  type Repository,
  type StorageBackend,
  STORAGE_BACKENDS,
  getStorageBackend,
} from "./repository.js";

export {
  getDatabase,
  getDatabasePath,
  openDatabase,
  closeDatabase,
  createSqliteRepository,
  type FieldMapping,
} from "./sqlite.js";

export {
  type OutputFileSystem,
  NodeFileSystem,
  MemoryFileSystem,
  normalizeRelative,
  TEMP_DIR,
} from "./filesystem.js";

export * from "./message-records.js";
export * from "./circuit-state.js";
