/**
 * debian/control composition.
 */

export {
  composeControl,
  parseExtraField,
  sourceStanza,
  binaryStanza,
  formatStanza,
  formatField,
  SOURCE_FIELD_KEYS,
  MalformedExtraFieldError,
  type ControlField,
  type ControlComposeResult,
  type ExtraFieldParseResult,
} from "./composer.js";
