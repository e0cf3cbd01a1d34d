/**
 * .debyrc schema definition.
 *
 * Configuration is modelled in two stages:
 *
 * 1. PartialDebyConfig: what a user writes. Every field is optional and
 *    enum fields are plain strings, so the record can be parsed without
 *    deciding anything about defaults or Debian value sets.
 *
 * 2. ResolvedConfig: what the composers consume. Every field is present,
 *    enum fields are narrowed to their literal unions, and each section is a
 *    tagged variant: a disabled section carries no configuration at all, so
 *    nothing downstream can read (or forget to required-check) it.
 *
 * resolveConfig() in resolver.ts is the only path from (1) to (2).
 */

import { z } from "zod";
import type { Architecture, Distribution, Priority, Urgency } from "./enums.js";

// ---------------------------------------------------------------------------
// Partial (input) schema
// ---------------------------------------------------------------------------

/** A value written into a single header or field line. */
const SingleLine = z.string().regex(/^[^\r\n]*$/, "must not contain line breaks");

export const PartialMaintainerSchema = z
  .object({
    name: SingleLine.describe("Maintainer display name"),
    email: SingleLine.describe("Maintainer e-mail address"),
  })
  .partial()
  .strict();

export const PartialChangelogSchema = z
  .object({
    update: z.boolean().describe("Whether debian/changelog is written"),
    package: SingleLine.describe("Source package name in the entry header"),
    distribution: z.string().describe("Target distribution (unstable | experimental)"),
    urgency: z.string().describe("Upload urgency (low | medium | high | emergency | critical)"),
    maintainer: PartialMaintainerSchema,
  })
  .partial()
  .strict();

export const PartialSourceControlSchema = z
  .object({
    source: SingleLine,
    section: SingleLine,
    priority: z.string(),
    /** Either a list of relations or one comma-separated string. */
    buildDepends: z.union([z.array(SingleLine), SingleLine]),
    standardsVersion: SingleLine,
    homepage: SingleLine,
    vcsBrowser: SingleLine,
    maintainer: PartialMaintainerSchema,
  })
  .partial()
  .strict();

export const PartialBinaryControlSchema = z
  .object({
    package: SingleLine,
    /** Summary line, optionally followed by the long description. */
    description: z.string(),
    section: SingleLine,
    priority: z.string(),
    preDepends: SingleLine,
    architecture: z.string(),
  })
  .partial()
  .strict();

export const PartialControlSchema = z
  .object({
    update: z.boolean().describe("Whether debian/control is written"),
    sourceControl: PartialSourceControlSchema,
    binaryControl: PartialBinaryControlSchema,
  })
  .partial()
  .strict();

export const PartialDebyConfigSchema = z
  .object({
    changelog: PartialChangelogSchema,
    control: PartialControlSchema,
  })
  .partial()
  .strict();

export type PartialMaintainer = z.infer<typeof PartialMaintainerSchema>;
export type PartialChangelog = z.infer<typeof PartialChangelogSchema>;
export type PartialSourceControl = z.infer<typeof PartialSourceControlSchema>;
export type PartialBinaryControl = z.infer<typeof PartialBinaryControlSchema>;
export type PartialControl = z.infer<typeof PartialControlSchema>;
export type PartialDebyConfig = z.infer<typeof PartialDebyConfigSchema>;

// ---------------------------------------------------------------------------
// Resolved types
// ---------------------------------------------------------------------------

export interface Maintainer {
  readonly name: string;
  readonly email: string;
}

export interface ChangelogConfig {
  readonly package: string;
  readonly distribution: Distribution;
  readonly urgency: Urgency;
  readonly maintainer: Maintainer;
}

export interface SourceControl {
  readonly source: string;
  readonly section: string;
  readonly priority: Priority;
  /** Relations in order; empty means no Build-Depends line. */
  readonly buildDepends: readonly string[];
  readonly standardsVersion: string;
  readonly homepage: string;
  readonly vcsBrowser: string;
  readonly maintainer: Maintainer;
}

export interface BinaryControl {
  readonly package: string;
  readonly description: string;
  readonly section: string;
  readonly priority: Priority;
  /** Empty means no Pre-Depends line. */
  readonly preDepends: string;
  readonly architecture: Architecture;
}

export interface ControlConfig {
  readonly sourceControl: SourceControl;
  readonly binaryControl: BinaryControl;
}

/**
 * A toggleable section: either disabled (inert, nothing to read) or
 * enabled together with its fully resolved configuration.
 */
export type SectionState<T> =
  | { readonly update: false }
  | ({ readonly update: true } & T);

export interface ResolvedConfig {
  readonly changelog: SectionState<ChangelogConfig>;
  readonly control: SectionState<ControlConfig>;
}
