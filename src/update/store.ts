/**
 * File stores: the read/write collaborators of the update orchestrator.
 *
 * - NodeFileStore   : the real filesystem; writes atomically (temp + rename)
 * - MemoryFileStore : in-process map, used by tests and embedders
 * - PreviewFileStore: reads through to another store, keeps writes in
 *                      memory (the CLI's --dry-run)
 */

import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { found, NOT_FOUND, type ReadOutcome } from "../types/file.js";

export interface FileStore {
  /**
   * Read a file. A missing file is `not_found`, not an error.
   * @throws on any other read failure
   */
  read(path: string): ReadOutcome;

  /**
   * Replace a file's content in one step, creating parent directories.
   * @throws on failure; the previous content is left in place
   */
  write(path: string, text: string): void;
}

function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// ---------------------------------------------------------------------------
// Filesystem
// ---------------------------------------------------------------------------

export class NodeFileStore implements FileStore {
  read(path: string): ReadOutcome {
    try {
      return found(readFileSync(path, "utf-8"));
    } catch (err) {
      if (isMissingFileError(err)) return NOT_FOUND;
      throw err;
    }
  }

  write(path: string, text: string): void {
    mkdirSync(dirname(path), { recursive: true });

    const tempPath = `${path}.${process.pid}.tmp`;
    try {
      writeFileSync(tempPath, text, "utf-8");
      renameSync(tempPath, path);
    } catch (err) {
      rmSync(tempPath, { force: true });
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// In memory
// ---------------------------------------------------------------------------

export class MemoryFileStore implements FileStore {
  private readonly files = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [path, text] of Object.entries(initial)) {
      this.files.set(path, text);
    }
  }

  read(path: string): ReadOutcome {
    const text = this.files.get(path);
    return text === undefined ? NOT_FOUND : found(text);
  }

  write(path: string, text: string): void {
    this.files.set(path, text);
  }

  /** Current content of `path`, or undefined if it was never written. */
  get(path: string): string | undefined {
    return this.files.get(path);
  }

  paths(): string[] {
    return [...this.files.keys()];
  }
}

// ---------------------------------------------------------------------------
// Preview
// ---------------------------------------------------------------------------

export class PreviewFileStore implements FileStore {
  private readonly pending = new Map<string, string>();

  constructor(private readonly base: FileStore = new NodeFileStore()) {}

  read(path: string): ReadOutcome {
    const text = this.pending.get(path);
    return text === undefined ? this.base.read(path) : found(text);
  }

  write(path: string, text: string): void {
    this.pending.set(path, text);
  }

  /** Writes captured so far, in the order they were made. */
  writes(): Array<{ path: string; text: string }> {
    return [...this.pending].map(([path, text]) => ({ path, text }));
  }
}
