/**
 * .debyrc loader.
 *
 * Reads the configuration file, parses it as JSON and hands the value to
 * resolveConfig(). File and JSON problems are reported as ConfigFileError;
 * everything about the content itself is the resolver's job.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { DebyError } from "../../errors.js";
import { resolveConfig, type ConfigResolveResult } from "./resolver.js";
import type { ResolvedConfig } from "./schema.js";

/** Default configuration file name, looked up in the working directory. */
export const CONFIG_FILE = ".debyrc";

export class ConfigFileError extends DebyError {
  readonly code = "config_file";

  constructor(
    public readonly filePath: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ConfigFileError";
  }
}

/**
 * Read and JSON-parse a configuration file without resolving it.
 *
 * @throws ConfigFileError if the file is missing, unreadable or not JSON
 */
export function readConfigFile(filePath: string = CONFIG_FILE): unknown {
  const absolute = resolve(filePath);

  if (!existsSync(absolute)) {
    throw new ConfigFileError(absolute, `Configuration file not found: ${absolute}`);
  }

  let source: string;
  try {
    source = readFileSync(absolute, "utf-8");
  } catch (err) {
    throw new ConfigFileError(
      absolute,
      `Failed to read configuration file ${absolute}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  try {
    return JSON.parse(source);
  } catch (err) {
    throw new ConfigFileError(
      absolute,
      `Failed to parse ${absolute} as JSON: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}

/**
 * Load and resolve a configuration file.
 *
 * @throws ConfigFileError if the file cannot be read or parsed
 */
export function loadConfigFile(filePath: string = CONFIG_FILE): ConfigResolveResult {
  return resolveConfig(readConfigFile(filePath));
}

/**
 * Load and resolve a configuration file, throwing on any error.
 *
 * @throws ConfigFileError    if the file cannot be read or parsed
 * @throws ConfigResolveError if the content is invalid
 */
export function loadConfigFileOrThrow(filePath: string = CONFIG_FILE): ResolvedConfig {
  const result = loadConfigFile(filePath);
  if (!result.success) throw result.error;
  return result.config;
}
