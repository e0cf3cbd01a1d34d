/**
 * debian/changelog composition.
 */

export {
  composeChangelog,
  formatChangelogEntry,
  splitChanges,
  BULLET_PREFIX,
  EmptyVersionError,
  InvalidVersionError,
  EmptyChangesError,
  type ChangelogEntry,
  type ChangelogComposeError,
  type ChangelogComposeOptions,
  type ChangelogComposeResult,
} from "./composer.js";
export { formatRfc2822, formatUtcOffset, localUtcOffset } from "./date.js";
