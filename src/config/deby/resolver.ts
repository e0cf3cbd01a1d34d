/**
 * .debyrc resolver.
 *
 * Turns a parsed (but untrusted) configuration value into a ResolvedConfig:
 *
 * - structural validation against the partial zod schema
 * - documented defaults for absent fields
 * - case-sensitive matching of enum fields against Debian value sets
 * - required-field checks for enabled sections only
 * - single-line values wherever a field is written on one line
 * - deep freeze of the result
 *
 * Issues are collected rather than thrown one at a time, so a single run
 * reports every problem in the file.
 */

import type { ZodIssue } from "zod";
import { DebyError } from "../../errors.js";
import { Architecture, Distribution, Priority, Urgency } from "./enums.js";
import {
  BINARY_CONTROL_DEFAULTS,
  CHANGELOG_DEFAULTS,
  SOURCE_CONTROL_DEFAULTS,
} from "./defaults.js";
import {
  PartialDebyConfigSchema,
  type BinaryControl,
  type ChangelogConfig,
  type ControlConfig,
  type Maintainer,
  type PartialBinaryControl,
  type PartialChangelog,
  type PartialControl,
  type PartialMaintainer,
  type PartialSourceControl,
  type ResolvedConfig,
  type SectionState,
  type SourceControl,
} from "./schema.js";

// ---------------------------------------------------------------------------
// Issues and errors
// ---------------------------------------------------------------------------

/** An enum field holds a value outside its allowed set. */
export interface InvalidEnumValue {
  kind: "invalid_enum";
  field: string;
  got: string;
  allowed: readonly string[];
  message: string;
}

/** A field required by an enabled section is absent or blank. */
export interface MissingRequiredField {
  kind: "missing_required";
  field: string;
  message: string;
}

/** The value does not match the .debyrc shape (wrong type, unknown key). */
export interface SchemaMismatch {
  kind: "schema";
  field: string;
  message: string;
  /** Zod error code */
  code: string;
}

export type ConfigIssue = InvalidEnumValue | MissingRequiredField | SchemaMismatch;

export class ConfigResolveError extends DebyError {
  readonly code = "config_invalid";

  constructor(
    message: string,
    public readonly issues: readonly ConfigIssue[]
  ) {
    super(message);
    this.name = "ConfigResolveError";
  }

  override format(): string {
    const lines = ["Configuration validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.field}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export type ConfigResolveResult =
  | { success: true; config: ResolvedConfig }
  | { success: false; error: ConfigResolveError };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function formatZodIssues(zodIssues: ZodIssue[]): ConfigIssue[] {
  return zodIssues.map((issue) => ({
    kind: "schema" as const,
    field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function isMember<T extends string>(allowed: readonly T[], value: string): value is T {
  return allowed.some((option) => option === value);
}

class IssueCollector {
  readonly issues: ConfigIssue[] = [];

  enumValue<T extends string>(
    field: string,
    allowed: readonly T[],
    value: string | undefined,
    fallback: T
  ): T {
    if (value === undefined) return fallback;
    if (isMember(allowed, value)) return value;

    this.issues.push({
      kind: "invalid_enum",
      field,
      got: value,
      allowed,
      message: `"${value}" is not a valid value. Allowed: ${allowed.join(", ")}`,
    });
    return fallback;
  }

  required(field: string, value: string | undefined): string {
    if (value === undefined || value.trim() === "") {
      this.issues.push({
        kind: "missing_required",
        field,
        message:
          value === undefined
            ? "is required when the section has update: true"
            : "must not be empty when the section has update: true",
      });
      return "";
    }
    return value;
  }

  /** Required multi-line text whose first line is a non-blank summary. */
  summarized(field: string, value: string | undefined): string {
    const text = this.required(field, value);
    if (text !== "" && text.split(/\r?\n/, 1)[0]?.trim() === "") {
      this.issues.push({
        kind: "missing_required",
        field,
        message: "must start with a one-line summary",
      });
      return "";
    }
    return text;
  }

  maintainer(field: string, value: PartialMaintainer | undefined): Maintainer {
    return {
      name: this.required(`${field}.name`, value?.name),
      email: this.required(`${field}.email`, value?.email),
    };
  }
}

/**
 * Normalize Build-Depends into a list of non-empty relations.
 *
 * The comma-separated string form is what earlier .debyrc files used.
 */
export function normalizeBuildDepends(value: readonly string[] | string | undefined): string[] {
  if (value === undefined) return [...SOURCE_CONTROL_DEFAULTS.buildDepends];

  const entries = typeof value === "string" ? value.split(",") : value;
  return entries.map((entry) => entry.trim()).filter((entry) => entry.length > 0);
}

// ---------------------------------------------------------------------------
// Section resolvers
// ---------------------------------------------------------------------------

function resolveChangelog(
  partial: PartialChangelog | undefined,
  collect: IssueCollector
): SectionState<ChangelogConfig> {
  const raw = partial ?? {};

  // Enum fields are checked even for a disabled section: a bad literal is a
  // mistake in the file regardless of whether it is used this run.
  const distribution = collect.enumValue(
    "changelog.distribution",
    Distribution.options,
    raw.distribution,
    CHANGELOG_DEFAULTS.distribution
  );
  const urgency = collect.enumValue(
    "changelog.urgency",
    Urgency.options,
    raw.urgency,
    CHANGELOG_DEFAULTS.urgency
  );

  if (raw.update !== true) return { update: false };

  return {
    update: true,
    package: collect.required("changelog.package", raw.package),
    distribution,
    urgency,
    maintainer: collect.maintainer("changelog.maintainer", raw.maintainer),
  };
}

function resolveSourceControl(
  raw: PartialSourceControl,
  collect: IssueCollector
): SourceControl {
  return {
    source: collect.required("control.sourceControl.source", raw.source),
    section: raw.section ?? SOURCE_CONTROL_DEFAULTS.section,
    priority: collect.enumValue(
      "control.sourceControl.priority",
      Priority.options,
      raw.priority,
      SOURCE_CONTROL_DEFAULTS.priority
    ),
    buildDepends: normalizeBuildDepends(raw.buildDepends),
    standardsVersion: raw.standardsVersion ?? SOURCE_CONTROL_DEFAULTS.standardsVersion,
    homepage: raw.homepage ?? SOURCE_CONTROL_DEFAULTS.homepage,
    vcsBrowser: raw.vcsBrowser ?? SOURCE_CONTROL_DEFAULTS.vcsBrowser,
    maintainer: collect.maintainer("control.sourceControl.maintainer", raw.maintainer),
  };
}

function resolveBinaryControl(
  raw: PartialBinaryControl,
  collect: IssueCollector
): BinaryControl {
  return {
    package: collect.required("control.binaryControl.package", raw.package),
    description: collect.summarized("control.binaryControl.description", raw.description),
    section: raw.section ?? BINARY_CONTROL_DEFAULTS.section,
    priority: collect.enumValue(
      "control.binaryControl.priority",
      Priority.options,
      raw.priority,
      BINARY_CONTROL_DEFAULTS.priority
    ),
    preDepends: raw.preDepends ?? BINARY_CONTROL_DEFAULTS.preDepends,
    architecture: collect.enumValue(
      "control.binaryControl.architecture",
      Architecture.options,
      raw.architecture,
      BINARY_CONTROL_DEFAULTS.architecture
    ),
  };
}

function resolveControl(
  partial: PartialControl | undefined,
  collect: IssueCollector
): SectionState<ControlConfig> {
  const raw = partial ?? {};

  if (raw.update !== true) {
    // Run the enum checks only; required fields are not this run's concern.
    const inert = new IssueCollector();
    resolveSourceControl(raw.sourceControl ?? {}, inert);
    resolveBinaryControl(raw.binaryControl ?? {}, inert);
    collect.issues.push(...inert.issues.filter((issue) => issue.kind === "invalid_enum"));
    return { update: false };
  }

  return {
    update: true,
    sourceControl: resolveSourceControl(raw.sourceControl ?? {}, collect),
    binaryControl: resolveBinaryControl(raw.binaryControl ?? {}, collect),
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Resolve a parsed .debyrc value.
 *
 * @param input - Parsed JSON (any shape; validated here)
 * @returns The frozen ResolvedConfig, or every issue found
 */
export function resolveConfig(input: unknown): ConfigResolveResult {
  const parsed = PartialDebyConfigSchema.safeParse(input ?? {});

  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error.issues);
    return {
      success: false,
      error: new ConfigResolveError(
        `Invalid configuration: ${issues.length} validation error(s)`,
        issues
      ),
    };
  }

  const collect = new IssueCollector();
  const changelog = resolveChangelog(parsed.data.changelog, collect);
  const control = resolveControl(parsed.data.control, collect);

  if (collect.issues.length > 0) {
    return {
      success: false,
      error: new ConfigResolveError(
        `Invalid configuration: ${collect.issues.length} validation error(s)`,
        collect.issues
      ),
    };
  }

  return { success: true, config: deepFreeze({ changelog, control }) };
}

/**
 * Resolve a parsed .debyrc value, throwing on error.
 *
 * @throws ConfigResolveError if any issue is found
 */
export function resolveConfigOrThrow(input: unknown): ResolvedConfig {
  const result = resolveConfig(input);
  if (!result.success) throw result.error;
  return result.config;
}
