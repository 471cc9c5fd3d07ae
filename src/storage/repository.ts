/**
 * Repository interface for storage backends.
 *
 * Implemented by JSON file storage and by SQLite.
 */

import type { StorageOperations } from "./base.js";

/**
 * Generic repository operations.
 */
export interface Repository<T extends { id: string }> extends StorageOperations<T> {
  /** Count all entities */
  count(): Promise<number>;
}

/**
 * Storage backend type.
 */
export const STORAGE_BACKENDS = ["json", "sqlite"] as const;
export type StorageBackend = (typeof STORAGE_BACKENDS)[number];

/**
 * Get the current storage backend from environment.
 */
export function getStorageBackend(): StorageBackend {
  const backend = process.env.STORAGE_BACKEND?.toLowerCase();
  if (backend === "sqlite") return "sqlite";
  return "json";
}
