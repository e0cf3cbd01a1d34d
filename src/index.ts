/**
 * deby: generate debian/changelog and debian/control from .debyrc.
 *
 * Usage:
 *   import { update } from "deby";
 *
 *   const result = update("1.2.0-1", "Fix crash on empty input", ["Rules-Requires-Root: no"]);
 *   if (!result.success) console.error(result.error.format());
 *   else if (result.value.status !== "success") console.error(formatUpdateReport(result.value));
 *
 * Each call loads and resolves the configuration file (".debyrc" unless
 * `configFile` or an already-resolved `config` is given). A configuration
 * that cannot be loaded comes back as `{ success: false, error }` with a
 * ConfigFileError or ConfigResolveError; per-file problems after that are
 * reported in the returned outcome.
 */

import { CONFIG_FILE, ConfigFileError, loadConfigFile } from "./config/deby/loader.js";
import type { ConfigResolveError, ConfigResolveResult } from "./config/deby/resolver.js";
import type { ResolvedConfig } from "./config/deby/schema.js";
import type { Logger } from "./logging/logger.js";
import {
  DebianUpdater,
  type FileOutcome,
  type UpdateResult,
} from "./update/orchestrator.js";
import type { FileStore } from "./update/store.js";

export interface UpdateOptions {
  /** Path of the configuration file (default: ".debyrc") */
  configFile?: string;
  /** Use this configuration instead of reading configFile */
  config?: ResolvedConfig;
  /** Directory holding changelog and control (default: "debian") */
  debianDir?: string;
  /** Defaults to the real filesystem */
  store?: FileStore;
  /** Clock for the changelog timestamp */
  now?: () => Date;
  /** Zone for the changelog timestamp, minutes east of UTC */
  utcOffsetMinutes?: number;
  logger?: Logger;
}

/** The configuration could not be loaded; nothing was read or written. */
export type ConfigLoadError = ConfigFileError | ConfigResolveError;

export type LibraryResult<T> =
  | { success: true; value: T }
  | { success: false; error: ConfigLoadError };

function loadConfig(options: UpdateOptions): LibraryResult<ResolvedConfig> {
  if (options.config !== undefined) {
    return { success: true, value: options.config };
  }

  let loaded: ConfigResolveResult;
  try {
    loaded = loadConfigFile(options.configFile ?? CONFIG_FILE);
  } catch (err) {
    if (err instanceof ConfigFileError) {
      return { success: false, error: err };
    }
    throw err;
  }

  return loaded.success
    ? { success: true, value: loaded.config }
    : { success: false, error: loaded.error };
}

function withUpdater<T>(
  options: UpdateOptions,
  run: (updater: DebianUpdater) => T
): LibraryResult<T> {
  const config = loadConfig(options);
  if (!config.success) return config;

  const updater = new DebianUpdater({
    config: config.value,
    store: options.store,
    debianDir: options.debianDir,
    changelog: { now: options.now, utcOffsetMinutes: options.utcOffsetMinutes },
    logger: options.logger,
  });
  return { success: true, value: run(updater) };
}

/**
 * Update debian/changelog and debian/control.
 *
 * @param version     - Version for the new changelog entry
 * @param changes     - Change description; one bullet per line
 * @param extraFields - "Key: Value" fields appended to the source stanza
 */
export function update(
  version: string,
  changes: string,
  extraFields: readonly string[],
  options: UpdateOptions = {}
): LibraryResult<UpdateResult> {
  return withUpdater(options, (updater) => updater.update(version, changes, extraFields));
}

/**
 * Add a new entry to debian/changelog only.
 */
export function updateChangelogFile(
  version: string,
  changes: string,
  options: UpdateOptions = {}
): LibraryResult<FileOutcome> {
  return withUpdater(options, (updater) => updater.updateChangelog(version, changes));
}

/**
 * Rewrite debian/control only.
 */
export function updateControlFile(
  extraFields: readonly string[],
  options: UpdateOptions = {}
): LibraryResult<FileOutcome> {
  return withUpdater(options, (updater) => updater.updateControl(extraFields));
}

export { DebyError, FileIoError, type DebyErrorCode } from "./errors.js";
export * from "./config/deby/index.js";
export * from "./changelog/index.js";
export * from "./control/index.js";
export * from "./update/index.js";
export * from "./types/index.js";
export { createLogger, type Logger, type LogLevel, type LoggerOptions } from "./logging/index.js";
