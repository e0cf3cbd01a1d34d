/**
 * .debyrc configuration module.
 *
 * Usage:
 *   import { loadConfigFileOrThrow, resolveConfig } from "./config/deby/index.js";
 *
 *   // From disk
 *   const config = loadConfigFileOrThrow(".debyrc");
 *
 *   // From an already-parsed object
 *   const result = resolveConfig({ changelog: { update: true, ... } });
 *   if (!result.success) console.error(result.error.format());
 */

// Debian value sets
export { Distribution, Urgency, Priority, Architecture } from "./enums.js";

// Schema types
export type {
  Maintainer,
  ChangelogConfig,
  SourceControl,
  BinaryControl,
  ControlConfig,
  SectionState,
  ResolvedConfig,
  PartialDebyConfig,
  PartialChangelog,
  PartialControl,
  PartialSourceControl,
  PartialBinaryControl,
  PartialMaintainer,
} from "./schema.js";

export { PartialDebyConfigSchema } from "./schema.js";

// Resolution
export {
  resolveConfig,
  resolveConfigOrThrow,
  normalizeBuildDepends,
  ConfigResolveError,
  type ConfigIssue,
  type ConfigResolveResult,
  type InvalidEnumValue,
  type MissingRequiredField,
  type SchemaMismatch,
} from "./resolver.js";

// Loading
export {
  CONFIG_FILE,
  ConfigFileError,
  readConfigFile,
  loadConfigFile,
  loadConfigFileOrThrow,
} from "./loader.js";

// Defaults
export { CHANGELOG_DEFAULTS, SOURCE_CONTROL_DEFAULTS, BINARY_CONTROL_DEFAULTS } from "./defaults.js";
