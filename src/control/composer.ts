/**
 * Control file composer.
 *
 * Produces debian/control as two stanzas, source first, separated by one
 * blank line. Field order within each stanza is fixed; caller-supplied
 * extra fields go at the end of the source stanza in the order given.
 *
 * The file has no history: composing replaces it entirely, and identical
 * input always yields identical output.
 */

import { DebyError } from "../errors.js";
import type { BinaryControl, ControlConfig, Maintainer, SourceControl } from "../config/deby/schema.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class MalformedExtraFieldError extends DebyError {
  readonly code = "malformed_extra_field";

  constructor(
    public readonly entry: string,
    public readonly reason: string
  ) {
    super(`Malformed extra field "${entry}": ${reason}. Expected "Key: Value"`);
    this.name = "MalformedExtraFieldError";
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ControlField {
  readonly key: string;
  readonly value: string;
}

export type ExtraFieldParseResult =
  | { success: true; field: ControlField | null }
  | { success: false; error: MalformedExtraFieldError };

export type ControlComposeResult =
  | { success: true; text: string }
  | { success: false; error: MalformedExtraFieldError };

// ---------------------------------------------------------------------------
// Extra fields
// ---------------------------------------------------------------------------

/**
 * Parse one "Key: Value" entry.
 *
 * Only the first ":" separates key from value, so values may contain
 * colons ("Note: see http://host:80"). A blank entry yields `field: null`
 * and is skipped by the composer.
 */
export function parseExtraField(entry: string): ExtraFieldParseResult {
  if (entry.trim() === "") {
    return { success: true, field: null };
  }

  const separator = entry.indexOf(":");
  if (separator === -1) {
    return {
      success: false,
      error: new MalformedExtraFieldError(entry, "missing ':' separator"),
    };
  }

  const key = entry.slice(0, separator).trim();
  const value = entry.slice(separator + 1).trim();

  if (key === "") {
    return { success: false, error: new MalformedExtraFieldError(entry, "empty field name") };
  }
  if (/\s/.test(key)) {
    return {
      success: false,
      error: new MalformedExtraFieldError(entry, "field name must not contain whitespace"),
    };
  }
  if (value === "") {
    return { success: false, error: new MalformedExtraFieldError(entry, "empty field value") };
  }
  if (/[\r\n]/.test(value)) {
    return {
      success: false,
      error: new MalformedExtraFieldError(entry, "field value must be a single line"),
    };
  }

  return { success: true, field: { key, value } };
}

// ---------------------------------------------------------------------------
// Stanzas
// ---------------------------------------------------------------------------

function formatMaintainer(maintainer: Maintainer): string {
  return `${maintainer.name} <${maintainer.email}>`;
}

/**
 * Keep fields that have a value. An empty optional field would otherwise
 * render as a value-less "Key: " line.
 */
function present(fields: ControlField[]): ControlField[] {
  return fields.filter((field) => field.value !== "");
}

/** Fixed source-stanza keys, in output order. Extra fields may not reuse them. */
export const SOURCE_FIELD_KEYS = [
  "Source",
  "Section",
  "Priority",
  "Maintainer",
  "Build-Depends",
  "Standards-Version",
  "Homepage",
  "Vcs-Browser",
] as const;

export function sourceStanza(
  source: SourceControl,
  extra: readonly ControlField[] = []
): ControlField[] {
  return [
    ...present([
      { key: "Source", value: source.source },
      { key: "Section", value: source.section },
      { key: "Priority", value: source.priority },
      { key: "Maintainer", value: formatMaintainer(source.maintainer) },
      { key: "Build-Depends", value: source.buildDepends.join(", ") },
      { key: "Standards-Version", value: source.standardsVersion },
      { key: "Homepage", value: source.homepage },
      { key: "Vcs-Browser", value: source.vcsBrowser },
    ]),
    ...extra,
  ];
}

export function binaryStanza(binary: BinaryControl): ControlField[] {
  return present([
    { key: "Package", value: binary.package },
    { key: "Architecture", value: binary.architecture },
    { key: "Section", value: binary.section },
    { key: "Priority", value: binary.priority },
    { key: "Pre-Depends", value: binary.preDepends },
    { key: "Description", value: binary.description },
  ]);
}

/**
 * Render one field. Lines after the first become continuation lines: one
 * leading space, and " ." for a blank line. Only Description can span
 * lines; every other value is single-line by the time it gets here.
 */
export function formatField(field: ControlField): string {
  const [first = "", ...rest] = field.value.trimEnd().split(/\r?\n/);
  const continuation = rest.map((line) => (line.trim() === "" ? " ." : ` ${line.trimEnd()}`));
  return [`${field.key}: ${first.trimEnd()}`, ...continuation].join("\n");
}

export function formatStanza(fields: readonly ControlField[]): string {
  return fields.map(formatField).join("\n");
}

// ---------------------------------------------------------------------------
// Composer
// ---------------------------------------------------------------------------

/**
 * Compose the full control file text.
 *
 * @param config      - Resolved, enabled control section
 * @param extraFields - "Key: Value" entries appended to the source stanza
 * @returns The file text (ending in one newline), or the first malformed
 *          entry. Field names compare case-insensitively, so an extra field
 *          may not repeat a fixed source field or an earlier extra field.
 */
export function composeControl(
  config: ControlConfig,
  extraFields: readonly string[]
): ControlComposeResult {
  const extra: ControlField[] = [];
  const taken = new Set(SOURCE_FIELD_KEYS.map((key) => key.toLowerCase()));

  for (const entry of extraFields) {
    const parsed = parseExtraField(entry);
    if (!parsed.success) {
      return { success: false, error: parsed.error };
    }
    if (parsed.field === null) continue;

    const key = parsed.field.key.toLowerCase();
    if (taken.has(key)) {
      return {
        success: false,
        error: new MalformedExtraFieldError(
          entry,
          `duplicate field "${parsed.field.key}" in the source stanza`
        ),
      };
    }
    taken.add(key);
    extra.push(parsed.field);
  }

  const text = [
    formatStanza(sourceStanza(config.sourceControl, extra)),
    formatStanza(binaryStanza(config.binaryControl)),
  ].join("\n\n");

  return { success: true, text: text + "\n" };
}
