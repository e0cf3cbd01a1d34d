/**
 * Update orchestrator.
 *
 * For each target file:
 *
 *   disabled section  → skipped: no read, no compose, no write
 *   compose fails     → failed: nothing is written
 *   compose succeeds  → written through the FileStore
 *
 * The two files are independent. A failure on one never stops the other,
 * and the result reports both so callers know the state of each artifact.
 * Store errors are surfaced once, wrapped in FileIoError; there are no
 * retries at this layer.
 *
 * The changelog read → prepend → write sequence assumes a single writer.
 */

import { join } from "node:path";
import { DebyError, FileIoError } from "../errors.js";
import type { ResolvedConfig } from "../config/deby/schema.js";
import { composeChangelog, type ChangelogComposeOptions } from "../changelog/composer.js";
import { composeControl } from "../control/composer.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type { ReadOutcome } from "../types/file.js";
import { NodeFileStore, type FileStore } from "./store.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TargetFile = "changelog" | "control";

export type FileOutcome =
  | { readonly file: TargetFile; readonly status: "skipped"; readonly path: string; readonly message: string }
  | { readonly file: TargetFile; readonly status: "written"; readonly path: string; readonly message: string }
  | { readonly file: TargetFile; readonly status: "failed"; readonly path: string; readonly error: DebyError };

/**
 * - success        : every attempted file was written (or none was attempted)
 * - partial_failure: some attempted files were written, some failed
 * - total_failure  : every attempted file failed
 */
export type UpdateStatus = "success" | "partial_failure" | "total_failure";

export interface UpdateResult {
  readonly status: UpdateStatus;
  readonly changelog: FileOutcome;
  readonly control: FileOutcome;
}

export interface DebianUpdaterOptions {
  /** Resolved configuration; shared read-only between updaters */
  config: ResolvedConfig;
  /** Defaults to the real filesystem */
  store?: FileStore;
  /** Directory holding changelog and control (default: "debian") */
  debianDir?: string;
  /** Clock and zone used for changelog timestamps */
  changelog?: ChangelogComposeOptions;
  logger?: Logger;
}

export const DEFAULT_DEBIAN_DIR = "debian";

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export function summarizeStatus(outcomes: readonly FileOutcome[]): UpdateStatus {
  const attempted = outcomes.filter((outcome) => outcome.status !== "skipped");
  const failed = attempted.filter((outcome) => outcome.status === "failed");

  if (failed.length === 0) return "success";
  if (failed.length === attempted.length) return "total_failure";
  return "partial_failure";
}

// ---------------------------------------------------------------------------
// Updater
// ---------------------------------------------------------------------------

export class DebianUpdater {
  readonly changelogPath: string;
  readonly controlPath: string;

  private readonly config: ResolvedConfig;
  private readonly store: FileStore;
  private readonly composeOptions: ChangelogComposeOptions;
  private readonly logger: Logger;

  constructor(options: DebianUpdaterOptions) {
    const debianDir = options.debianDir ?? DEFAULT_DEBIAN_DIR;

    this.config = options.config;
    this.store = options.store ?? new NodeFileStore();
    this.composeOptions = options.changelog ?? {};
    this.logger = options.logger ?? silentLogger;
    this.changelogPath = join(debianDir, "changelog");
    this.controlPath = join(debianDir, "control");
  }

  /**
   * Add a new entry on top of the changelog.
   */
  updateChangelog(version: string, changes: string): FileOutcome {
    const section = this.config.changelog;
    const path = this.changelogPath;

    if (!section.update) {
      this.logger.debug("Changelog section disabled", { path });
      return {
        file: "changelog",
        status: "skipped",
        path,
        message: `${path} not updated due to config file setting`,
      };
    }

    let existing: ReadOutcome;
    try {
      existing = this.store.read(path);
    } catch (err) {
      return this.failed("changelog", path, new FileIoError(path, "read", err));
    }

    const composed = composeChangelog(section, version, changes, existing, this.composeOptions);
    if (!composed.success) {
      return this.failed("changelog", path, composed.error);
    }

    const written = this.write("changelog", path, composed.text);
    if (written) return written;

    this.logger.info("Changelog entry added", {
      path,
      version: composed.entry.version,
      firstEntry: existing.kind === "not_found",
    });
    return {
      file: "changelog",
      status: "written",
      path,
      message: `Successfully created a new entry in ${path}`,
    };
  }

  /**
   * Rewrite the control file.
   */
  updateControl(extraFields: readonly string[]): FileOutcome {
    const section = this.config.control;
    const path = this.controlPath;

    if (!section.update) {
      this.logger.debug("Control section disabled", { path });
      return {
        file: "control",
        status: "skipped",
        path,
        message: `${path} not updated due to config file setting`,
      };
    }

    const composed = composeControl(section, extraFields);
    if (!composed.success) {
      return this.failed("control", path, composed.error);
    }

    const written = this.write("control", path, composed.text);
    if (written) return written;

    this.logger.info("Control file written", { path, extraFields: extraFields.length });
    return {
      file: "control",
      status: "written",
      path,
      message: `Successfully updated ${path}`,
    };
  }

  /**
   * Update both files. Each is attempted regardless of the other's outcome.
   */
  update(version: string, changes: string, extraFields: readonly string[]): UpdateResult {
    const changelog = this.updateChangelog(version, changes);
    const control = this.updateControl(extraFields);

    return { status: summarizeStatus([changelog, control]), changelog, control };
  }

  /** Returns a failed outcome, or undefined when the write went through. */
  private write(file: TargetFile, path: string, text: string): FileOutcome | undefined {
    try {
      this.store.write(path, text);
      return undefined;
    } catch (err) {
      return this.failed(file, path, new FileIoError(path, "write", err));
    }
  }

  private failed(file: TargetFile, path: string, error: DebyError): FileOutcome {
    this.logger.error(`Failed to update ${path}`, { code: error.code, message: error.message });
    return { file, status: "failed", path, error };
  }
}

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

export function formatOutcome(outcome: FileOutcome): string {
  switch (outcome.status) {
    case "skipped":
      return `- ${outcome.message}`;
    case "written":
      return `✓ ${outcome.message}`;
    case "failed":
      return `✗ ${outcome.path}: ${outcome.error.format()}`;
  }
}

export function formatUpdateReport(result: UpdateResult): string {
  return [formatOutcome(result.changelog), formatOutcome(result.control)].join("\n");
}
