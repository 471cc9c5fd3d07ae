/**
 * Scoped working directories for converters.
 *
 * A converter writes into a fresh directory under the output root's scratch
 * area and commits it to its final location in one rename. Whatever happens,
 * the scratch directory is gone when `withWorkspace` returns.
 */

import * as path from "node:path";
import type { OutputFileSystem } from "../../storage/filesystem.js";
import { ProcessingError } from "../errors.js";

export class Workspace {
  private written = new Set<string>();
  private committedTo: string | null = null;

  constructor(
    readonly dir: string,
    private readonly fs: OutputFileSystem
  ) {}

  /**
   * Write a file inside the workspace; `name` may contain subdirectories.
   */
  async write(name: string, data: string | Uint8Array): Promise<void> {
    if (this.committedTo !== null) {
      throw new ProcessingError(`Workspace already committed to ${this.committedTo}`);
    }
    const normalized = path.posix.normalize(name);
    await this.fs.writeFile(path.posix.join(this.dir, normalized), data);
    this.written.add(normalized);
  }

  /** Relative names written so far, sorted */
  get files(): string[] {
    return [...this.written].sort();
  }

  /**
   * Move the workspace to `target` and return the committed file paths.
   */
  async commit(target: string): Promise<string[]> {
    if (this.committedTo !== null) {
      throw new ProcessingError(`Workspace already committed to ${this.committedTo}`);
    }
    await this.fs.rename(this.dir, target);
    this.committedTo = target;
    return this.files.map((name) => path.posix.join(target, name));
  }
}

/**
 * Run `work` with a fresh workspace and remove it on every exit path.
 */
export async function withWorkspace<T>(
  fs: OutputFileSystem,
  prefix: string,
  work: (workspace: Workspace) => Promise<T>
): Promise<T> {
  const dir = await fs.makeTempDir(prefix);
  try {
    return await work(new Workspace(dir, fs));
  } finally {
    await fs.remove(dir);
  }
}
