/**
 * Debian policy value sets used by .debyrc.
 *
 * Matching is case-sensitive: "Unstable" is not "unstable". The allowed
 * literals are exposed through each enum's `.options` so resolver errors can
 * list them.
 */

import { z } from "zod";

/**
 * Target distribution written in the changelog header.
 * Only the two development suites are accepted.
 */
export const Distribution = z.enum(["unstable", "experimental"]);
export type Distribution = z.infer<typeof Distribution>;

/**
 * Upload urgency written as `urgency=<value>` in the changelog header.
 */
export const Urgency = z.enum(["low", "medium", "high", "emergency", "critical"]);
export type Urgency = z.infer<typeof Urgency>;

/**
 * Package priority (Debian policy §2.5).
 * "extra" is deprecated upstream but still accepted by dpkg.
 */
export const Priority = z.enum(["required", "important", "standard", "optional", "extra"]);
export type Priority = z.infer<typeof Priority>;

export const Architecture = z.enum(["all", "any"]);
export type Architecture = z.infer<typeof Architecture>;
