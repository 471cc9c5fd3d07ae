/**
 * Output filesystem.
 *
 * Everything the pipeline writes goes through this interface, addressed by
 * POSIX-style paths relative to the output root. The Node implementation
 * writes to disk; the in-memory one backs tests.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import { isErrnoException, PathTraversalError } from "../services/errors.js";

/** Scratch space for working directories, relative to the output root */
export const TEMP_DIR = ".tmp";

export interface OutputFileSystem {
  /** Human-readable location of the root */
  readonly root: string;
  writeFile(relPath: string, data: string | Uint8Array): Promise<void>;
  readFile(relPath: string): Promise<Buffer>;
  exists(relPath: string): Promise<boolean>;
  mkdir(relPath: string): Promise<void>;
  /** Move a file or directory; the target's parent is created */
  rename(from: string, to: string): Promise<void>;
  /** Remove a file or directory tree; missing paths are ignored */
  remove(relPath: string): Promise<void>;
  /** Files below a directory, relative to it, sorted; [] when missing */
  list(relPath: string): Promise<string[]>;
  /** Create a fresh directory under TEMP_DIR and return its path */
  makeTempDir(prefix: string): Promise<string>;
}

/**
 * Normalize a relative path and refuse anything that leaves the root.
 */
export function normalizeRelative(relPath: string): string {
  const normalized = path.posix.normalize(relPath.replace(/\\/g, "/"));
  if (
    path.posix.isAbsolute(normalized) ||
    normalized === ".." ||
    normalized.startsWith("../") ||
    relPath.includes("\0")
  ) {
    throw new PathTraversalError(`Path "${relPath}" escapes the output root`);
  }
  return normalized === "." ? "" : normalized.replace(/\/+$/, "");
}

function tempName(prefix: string): string {
  return path.posix.join(TEMP_DIR, `${prefix.replace(/[^A-Za-z0-9._-]/g, "_")}${randomUUID()}`);
}

/**
 * Filesystem rooted at a directory on disk.
 */
export class NodeFileSystem implements OutputFileSystem {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private resolve(relPath: string): string {
    return path.join(this.root, ...normalizeRelative(relPath).split("/"));
  }

  async writeFile(relPath: string, data: string | Uint8Array): Promise<void> {
    const target = this.resolve(relPath);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, data);
  }

  async readFile(relPath: string): Promise<Buffer> {
    return fs.promises.readFile(this.resolve(relPath));
  }

  async exists(relPath: string): Promise<boolean> {
    try {
      await fs.promises.access(this.resolve(relPath));
      return true;
    } catch {
      return false;
    }
  }

  async mkdir(relPath: string): Promise<void> {
    await fs.promises.mkdir(this.resolve(relPath), { recursive: true });
  }

  async rename(from: string, to: string): Promise<void> {
    const target = this.resolve(to);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.rename(this.resolve(from), target);
  }

  async remove(relPath: string): Promise<void> {
    await fs.promises.rm(this.resolve(relPath), { recursive: true, force: true });
  }

  async list(relPath: string): Promise<string[]> {
    const base = this.resolve(relPath);
    const files: string[] = [];

    const walk = async (dir: string, prefix: string): Promise<void> => {
      let entries: fs.Dirent[];
      try {
        entries = await fs.promises.readdir(dir, { withFileTypes: true });
      } catch (err) {
        if (isErrnoException(err) && err.code === "ENOENT") return;
        throw err;
      }
      for (const entry of entries) {
        const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
        if (entry.isDirectory()) {
          await walk(path.join(dir, entry.name), rel);
        } else {
          files.push(rel);
        }
      }
    };

    await walk(base, "");
    return files.sort();
  }

  async makeTempDir(prefix: string): Promise<string> {
    const dir = tempName(prefix);
    await this.mkdir(dir);
    return dir;
  }
}

/**
 * In-memory filesystem. Directories exist implicitly while they hold files.
 */
export class MemoryFileSystem implements OutputFileSystem {
  readonly root = "memory://";
  private files = new Map<string, Buffer>();
  private dirs = new Set<string>();

  async writeFile(relPath: string, data: string | Uint8Array): Promise<void> {
    const key = normalizeRelative(relPath);
    this.files.set(key, typeof data === "string" ? Buffer.from(data, "utf-8") : Buffer.from(data));
  }

  async readFile(relPath: string): Promise<Buffer> {
    const key = normalizeRelative(relPath);
    const data = this.files.get(key);
    if (!data) {
      throw Object.assign(new Error(`ENOENT: no such file, open '${key}'`), { code: "ENOENT" });
    }
    return Buffer.from(data);
  }

  async exists(relPath: string): Promise<boolean> {
    const key = normalizeRelative(relPath);
    if (key === "" || this.files.has(key) || this.dirs.has(key)) return true;
    return [...this.files.keys(), ...this.dirs].some((p) => p.startsWith(`${key}/`));
  }

  async mkdir(relPath: string): Promise<void> {
    const key = normalizeRelative(relPath);
    if (key) this.dirs.add(key);
  }

  async rename(from: string, to: string): Promise<void> {
    const source = normalizeRelative(from);
    const target = normalizeRelative(to);
    if (await this.exists(target)) {
      throw Object.assign(new Error(`EEXIST: target exists, rename '${source}' -> '${target}'`), { code: "EEXIST" });
    }
    const file = this.files.get(source);
    if (file) {
      this.files.delete(source);
      this.files.set(target, file);
      return;
    }
    if (!(await this.exists(source))) {
      throw Object.assign(new Error(`ENOENT: no such file or directory, rename '${source}'`), { code: "ENOENT" });
    }
    for (const [key, value] of [...this.files]) {
      if (key.startsWith(`${source}/`)) {
        this.files.delete(key);
        this.files.set(`${target}${key.slice(source.length)}`, value);
      }
    }
    for (const dir of [...this.dirs]) {
      if (dir === source || dir.startsWith(`${source}/`)) {
        this.dirs.delete(dir);
        this.dirs.add(`${target}${dir.slice(source.length)}`);
      }
    }
  }

  async remove(relPath: string): Promise<void> {
    const key = normalizeRelative(relPath);
    const inside = (p: string) => key === "" || p === key || p.startsWith(`${key}/`);
    for (const file of [...this.files.keys()]) {
      if (inside(file)) this.files.delete(file);
    }
    for (const dir of [...this.dirs]) {
      if (inside(dir)) this.dirs.delete(dir);
    }
  }

  async list(relPath: string): Promise<string[]> {
    const key = normalizeRelative(relPath);
    const prefix = key ? `${key}/` : "";
    return [...this.files.keys()]
      .filter((file) => file.startsWith(prefix))
      .map((file) => file.slice(prefix.length))
      .sort();
  }

  async makeTempDir(prefix: string): Promise<string> {
    const dir = tempName(prefix);
    await this.mkdir(dir);
    return dir;
  }
}
