/**
 * Documented defaults for .debyrc.
 *
 * Defaults fill ABSENT fields only. A field the user set explicitly, even to
 * an empty string, is kept as written.
 *
 * package, description, source and the maintainer fields have no default:
 * they are required whenever their section is enabled.
 */

import type { Architecture, Distribution, Priority, Urgency } from "./enums.js";

export interface ChangelogDefaults {
  readonly distribution: Distribution;
  readonly urgency: Urgency;
}

export interface SourceControlDefaults {
  readonly section: string;
  readonly priority: Priority;
  readonly buildDepends: readonly string[];
  readonly standardsVersion: string;
  readonly homepage: string;
  readonly vcsBrowser: string;
}

export interface BinaryControlDefaults {
  readonly section: string;
  readonly priority: Priority;
  readonly preDepends: string;
  readonly architecture: Architecture;
}

export const CHANGELOG_DEFAULTS: ChangelogDefaults = Object.freeze({
  distribution: "unstable",
  urgency: "low",
});

export const SOURCE_CONTROL_DEFAULTS: SourceControlDefaults = Object.freeze({
  section: "",
  priority: "optional",
  buildDepends: Object.freeze([]),
  standardsVersion: "",
  homepage: "",
  vcsBrowser: "",
});

export const BINARY_CONTROL_DEFAULTS: BinaryControlDefaults = Object.freeze({
  section: "",
  priority: "optional",
  preDepends: "",
  architecture: "any",
});
