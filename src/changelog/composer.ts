/**
 * Changelog composer.
 *
 * Builds one Debian changelog entry and places it above any existing
 * history. Existing content is never parsed or reformatted: it is appended
 * after the new entry byte for byte.
 *
 * Entry layout:
 *
 *   <package> (<version>) <distribution>; urgency=<urgency>
 *
 *     * <change line 1>
 *     * <change line 2>
 *
 *    -- <name> <<email>>  <RFC 2822 date>
 *
 */

import { DebyError } from "../errors.js";
import type { ChangelogConfig, Maintainer } from "../config/deby/schema.js";
import type { ReadOutcome } from "../types/file.js";
import { formatRfc2822, localUtcOffset } from "./date.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class EmptyVersionError extends DebyError {
  readonly code = "empty_version";

  constructor() {
    super("Version must not be empty");
    this.name = "EmptyVersionError";
  }
}

export class InvalidVersionError extends DebyError {
  readonly code = "invalid_version";

  constructor(public readonly version: string) {
    super(`Version ${JSON.stringify(version)} must not contain whitespace`);
    this.name = "InvalidVersionError";
  }
}

export class EmptyChangesError extends DebyError {
  readonly code = "empty_changes";

  constructor() {
    super("Changes must not be empty");
    this.name = "EmptyChangesError";
  }
}

export type ChangelogComposeError = EmptyVersionError | InvalidVersionError | EmptyChangesError;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * One changelog entry, as rendered. Exists only as text in the file.
 */
export interface ChangelogEntry {
  readonly package: string;
  readonly version: string;
  readonly distribution: string;
  readonly urgency: string;
  /** Bullet lines without the "  * " prefix */
  readonly changes: readonly string[];
  readonly maintainer: Maintainer;
  readonly timestamp: string;
}

export interface ChangelogComposeOptions {
  /** Clock; defaults to the current time */
  now?: () => Date;
  /** Zone for the trailer date, minutes east of UTC; defaults to local */
  utcOffsetMinutes?: number;
}

export type ChangelogComposeResult =
  | { success: true; text: string; entry: ChangelogEntry }
  | { success: false; error: ChangelogComposeError };

/** Fixed prefix put in front of every change line. */
export const BULLET_PREFIX = "  * ";

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

/**
 * Split change text into bullet lines.
 *
 * Not every input line becomes a bullet: blank lines are dropped, so
 * "a\n\nb" gives two bullets, not three. Trailing whitespace is removed
 * and nothing is wrapped.
 */
export function splitChanges(changes: string): string[] {
  return changes
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "")
    .map((line) => line.trimEnd());
}

/**
 * Render an entry block, including the blank line that separates it from
 * the entry below.
 */
export function formatChangelogEntry(entry: ChangelogEntry): string {
  return [
    `${entry.package} (${entry.version}) ${entry.distribution}; urgency=${entry.urgency}`,
    "",
    ...entry.changes.map((line) => `${BULLET_PREFIX}${line}`),
    "",
    ` -- ${entry.maintainer.name} <${entry.maintainer.email}>  ${entry.timestamp}`,
    "",
    "",
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Composer
// ---------------------------------------------------------------------------

/**
 * Compose the full changelog file text.
 *
 * @param config   - Resolved, enabled changelog section
 * @param version  - New version; trimmed, then must be non-empty with no inner whitespace
 * @param changes  - Change description, one bullet per non-blank line
 * @param existing - Current file content, or not_found on first run
 * @param options  - Clock and zone overrides
 */
export function composeChangelog(
  config: ChangelogConfig,
  version: string,
  changes: string,
  existing: ReadOutcome,
  options: ChangelogComposeOptions = {}
): ChangelogComposeResult {
  const trimmedVersion = version.trim();
  if (trimmedVersion === "") {
    return { success: false, error: new EmptyVersionError() };
  }
  if (/\s/.test(trimmedVersion)) {
    return { success: false, error: new InvalidVersionError(trimmedVersion) };
  }

  const lines = splitChanges(changes);
  if (lines.length === 0) {
    return { success: false, error: new EmptyChangesError() };
  }

  const now = (options.now ?? (() => new Date()))();
  const entry: ChangelogEntry = Object.freeze({
    package: config.package,
    version: trimmedVersion,
    distribution: config.distribution,
    urgency: config.urgency,
    changes: Object.freeze(lines),
    maintainer: { name: config.maintainer.name, email: config.maintainer.email },
    timestamp: formatRfc2822(now, options.utcOffsetMinutes ?? localUtcOffset(now)),
  });

  const block = formatChangelogEntry(entry);

  switch (existing.kind) {
    case "not_found":
      return { success: true, text: block, entry };
    case "found":
      return { success: true, text: block + existing.text, entry };
  }
}
