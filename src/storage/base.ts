/**
 * Storage Base
 *
 * JSON-file storage shared by the processing ledger and circuit state.
 * Kept separate from the SQLite backend to avoid circular imports.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import { isErrnoException } from "../services/errors.js";

/**
 * Base data directory. PIPELINE_DATA_DIR wins over ./data; resolved on each
 * call so a changed working directory is picked up.
 */
export function getDataDir(): string {
  return process.env.PIPELINE_DATA_DIR ?? path.join(process.cwd(), "data");
}

/**
 * Storage directories.
 */
export function storageDirs() {
  const dataDir = getDataDir();
  return {
    messages: path.join(dataDir, "messages"),
    circuits: path.join(dataDir, "circuits"),
  } as const;
}

/**
 * Generic storage operations for any entity type.
 */
export interface StorageOperations<T extends { id: string }> {
  /** Save an entity to storage */
  save(entity: T): Promise<T>;

  /** Get an entity by ID */
  get(id: string): Promise<T | null>;

  /** Get all entities */
  getAll(): Promise<T[]>;

  /** Delete an entity by ID */
  delete(id: string): Promise<boolean>;

  /** Check if an entity exists */
  exists(id: string): Promise<boolean>;

  /** Find entities matching a predicate */
  find(predicate: (entity: T) => boolean): Promise<T[]>;
}

/**
 * Ids become file names; anything outside a safe set is hex-escaped.
 */
function fileNameFor(id: string): string {
  return `${id.replace(/[^A-Za-z0-9._-]/g, (ch) => `%${ch.charCodeAt(0).toString(16)}`)}.json`;
}

/**
 * Create storage operations for a specific entity type and directory.
 * Every record read back goes through `parse`, which throws on bad data.
 */
export function createStorage<T extends { id: string }>(
  dir: string,
  parse: (raw: unknown) => T
): StorageOperations<T> {
  fs.mkdirSync(dir, { recursive: true });

  const getFilePath = (id: string) => path.join(dir, fileNameFor(id));

  const readEntity = async (filePath: string): Promise<T> => {
    const json = await fs.promises.readFile(filePath, "utf-8");
    return parse(JSON.parse(json));
  };

  return {
    async save(entity: T): Promise<T> {
      const filePath = getFilePath(entity.id);
      const tempPath = `${filePath}.${randomUUID()}.tmp`;
      await fs.promises.writeFile(tempPath, JSON.stringify(entity, null, 2), "utf-8");
      await fs.promises.rename(tempPath, filePath);
      return entity;
    },

    async get(id: string): Promise<T | null> {
      try {
        return await readEntity(getFilePath(id));
      } catch (err) {
        if (isErrnoException(err) && err.code === "ENOENT") {
          return null;
        }
        throw err;
      }
    },

    async getAll(): Promise<T[]> {
      let files: string[];
      try {
        files = await fs.promises.readdir(dir);
      } catch (err) {
        if (isErrnoException(err) && err.code === "ENOENT") {
          return [];
        }
        throw err;
      }

      const entities: T[] = [];
      for (const file of files) {
        if (file.endsWith(".json")) {
          entities.push(await readEntity(path.join(dir, file)));
        }
      }
      return entities;
    },

    async delete(id: string): Promise<boolean> {
      try {
        await fs.promises.unlink(getFilePath(id));
        return true;
      } catch (err) {
        if (isErrnoException(err) && err.code === "ENOENT") {
          return false;
        }
        throw err;
      }
    },

    async exists(id: string): Promise<boolean> {
      try {
        await fs.promises.access(getFilePath(id));
        return true;
      } catch {
        return false;
      }
    },

    async find(predicate: (entity: T) => boolean): Promise<T[]> {
      const all = await this.getAll();
      return all.filter(predicate);
    },
  };
}
