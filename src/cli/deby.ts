/**
 * deby command line.
 *
 * Usage:
 *   deby update    --version <v> --changes <text> [--field "K: V"]... [--fields "K: V;K2: V2"]
 *   deby changelog --version <v> --changes <text>
 *   deby control   [--field "K: V"]... [--fields "K: V;K2: V2"]
 *   deby validate
 *
 * Options:
 *   --config <path>      Configuration file (default: $DEBY_CONFIG or .debyrc)
 *   --debian-dir <dir>   Output directory (default: $DEBY_DEBIAN_DIR or debian)
 *   --dry-run            Print the files instead of writing them
 *   --json               Print the result as JSON
 *   --no-color           Disable colored output
 *   -h, --help           Show help
 *
 * Exit codes:
 *   0 - every requested file was written or skipped by configuration
 *   1 - usage, configuration or update error
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";

import { ConfigError, loadAppConfig, validateConfig } from "../config/index.js";
import { ConfigFileError, loadConfigFile } from "../config/deby/loader.js";
import type { ConfigResolveResult } from "../config/deby/resolver.js";
import type { ResolvedConfig } from "../config/deby/schema.js";
import { createLogger, initRunId, type LogLevel } from "../logging/index.js";
import {
  DebianUpdater,
  summarizeStatus,
  type FileOutcome,
  type UpdateStatus,
} from "../update/orchestrator.js";
import { NodeFileStore, PreviewFileStore, type FileStore } from "../update/store.js";

// ============================================================
// IO
// ============================================================

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Base for relative --config / --debian-dir paths */
  cwd: string;
  color: boolean;
}

export const consoleIo: CliIo = {
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
  cwd: process.cwd(),
  color: Boolean(process.stdout.isTTY) && !process.env.NO_COLOR,
};

const COMMANDS = ["update", "changelog", "control", "validate"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

const USAGE = `
Usage: deby <command> [options]

Commands:
  update      Add a changelog entry and rewrite the control file
  changelog   Add a changelog entry only
  control     Rewrite the control file only
  validate    Check the configuration file

Options:
  -v, --version <v>     Version of the new changelog entry
  -c, --changes <text>  Changes, one bullet per line
  -f, --field <K: V>    Extra control field (repeatable)
  --fields <list>       Extra control fields separated by ";"
  --config <path>       Configuration file (default: .debyrc)
  --debian-dir <dir>    Output directory (default: debian)
  --dry-run             Print the files instead of writing them
  --json                Print the result as JSON
  --no-color            Disable colored output
  -h, --help            Show this help message
`;

// ============================================================
// Argument helpers
// ============================================================

/**
 * Collect extra control fields from repeated --field flags and the
 * ";"-separated --fields list, in that order.
 */
export function collectExtraFields(
  field: readonly string[] | undefined,
  fields: string | undefined
): string[] {
  const listed = fields === undefined ? [] : fields.split(";");
  return [...(field ?? []), ...listed];
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      version: { type: "string", short: "v" },
      changes: { type: "string", short: "c" },
      field: { type: "string", short: "f", multiple: true },
      fields: { type: "string" },
      config: { type: "string" },
      "debian-dir": { type: "string" },
      "dry-run": { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
} as const;

function painter(enabled: boolean) {
  return (color: keyof typeof COLORS, text: string): string =>
    enabled ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function outcomeToJson(outcome: FileOutcome): Record<string, unknown> {
  if (outcome.status === "failed") {
    return {
      file: outcome.file,
      status: outcome.status,
      path: outcome.path,
      error: { code: outcome.error.code, message: outcome.error.message },
    };
  }
  return { file: outcome.file, status: outcome.status, path: outcome.path, message: outcome.message };
}

function describeSections(config: ResolvedConfig): string[] {
  const lines: string[] = [];

  if (config.changelog.update) {
    const { package: name, distribution, urgency } = config.changelog;
    lines.push(`changelog: enabled (${name}, ${distribution}, urgency=${urgency})`);
  } else {
    lines.push("changelog: disabled");
  }

  if (config.control.update) {
    const { sourceControl, binaryControl } = config.control;
    lines.push(
      `control: enabled (source ${sourceControl.source}, package ${binaryControl.package}, ` +
        `architecture ${binaryControl.architecture})`
    );
  } else {
    lines.push("control: disabled");
  }

  return lines;
}

// ============================================================
// Main
// ============================================================

/**
 * Run the CLI and return its exit code.
 */
export function runCli(argv: string[], io: CliIo = consoleIo): number {
  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    io.stderr(`Error: ${err instanceof Error ? err.message : String(err)}`);
    io.stderr(USAGE);
    return 1;
  }

  const { values, positionals } = args;
  const c = painter(io.color && !values["no-color"]);

  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }

  const command = positionals[0];
  if (!isCommand(command)) {
    io.stderr(c("red", command === undefined ? "Error: missing command" : `Error: unknown command "${command}"`));
    io.stderr(USAGE);
    return 1;
  }

  const appConfig = loadAppConfig();
  let level: LogLevel;
  try {
    level = validateConfig(appConfig);
  } catch (err) {
    if (err instanceof ConfigError) {
      io.stderr(c("red", `Error: ${err.message}`));
      return 1;
    }
    throw err;
  }

  const runId = initRunId();
  const logger = createLogger({
    level,
    logFile: appConfig.logFile,
    sink: (_level, line) => io.stderr(line),
  });

  const configFile = resolve(io.cwd, values.config ?? appConfig.configFile);
  const debianDir = resolve(io.cwd, values["debian-dir"] ?? appConfig.debianDir);
  logger.debug("deby starting", { runId, command, configFile, debianDir });

  let loaded: ConfigResolveResult;
  try {
    loaded = loadConfigFile(configFile);
  } catch (err) {
    if (err instanceof ConfigFileError) {
      io.stderr(c("red", `Error: ${err.message}`));
      return 1;
    }
    throw err;
  }

  if (!loaded.success) {
    if (values.json) {
      io.stdout(JSON.stringify({ valid: false, issues: loaded.error.issues }, null, 2));
    } else {
      io.stderr(c("red", loaded.error.format()));
    }
    return 1;
  }

  const config = loaded.config;

  if (command === "validate") {
    if (values.json) {
      io.stdout(JSON.stringify({ valid: true, config }, null, 2));
    } else {
      io.stdout(`${c("green", "✓")} ${c("bold", configFile)} is valid`);
      for (const line of describeSections(config)) {
        io.stdout(`  ${c("dim", "•")} ${line}`);
      }
    }
    return 0;
  }

  const wantsChangelog = command === "update" || command === "changelog";
  const version = values.version ?? "";
  const changes = values.changes ?? "";
  if (wantsChangelog && config.changelog.update) {
    if (values.version === undefined) {
      io.stderr(c("red", "Error: --version is required"));
      return 1;
    }
    if (values.changes === undefined) {
      io.stderr(c("red", "Error: --changes is required"));
      return 1;
    }
  }

  const extraFields = collectExtraFields(values.field, values.fields);
  const preview = values["dry-run"] ? new PreviewFileStore() : undefined;
  const store: FileStore = preview ?? new NodeFileStore();
  const updater = new DebianUpdater({ config, store, debianDir, logger });

  const outcomes: FileOutcome[] = [];
  if (wantsChangelog) outcomes.push(updater.updateChangelog(version, changes));
  if (command === "update" || command === "control") outcomes.push(updater.updateControl(extraFields));

  const status: UpdateStatus = summarizeStatus(outcomes);

  if (values.json) {
    io.stdout(
      JSON.stringify(
        {
          status,
          dryRun: preview !== undefined,
          outcomes: outcomes.map(outcomeToJson),
          ...(preview ? { files: preview.writes() } : {}),
        },
        null,
        2
      )
    );
  } else {
    for (const outcome of outcomes) {
      switch (outcome.status) {
        case "skipped":
          io.stdout(`${c("dim", "-")} ${outcome.message}`);
          break;
        case "written":
          io.stdout(`${c("green", "✓")} ${preview ? `Would write ${outcome.path}` : outcome.message}`);
          break;
        case "failed":
          io.stdout(`${c("red", "✗")} ${c("bold", outcome.path)}: ${outcome.error.format()}`);
          break;
      }
    }
    for (const write of preview?.writes() ?? []) {
      io.stdout(`\n${c("bold", `── ${write.path} ──`)}\n${write.text}`);
    }
  }

  return status === "success" ? 0 : 1;
}
