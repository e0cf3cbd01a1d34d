/**
 * Logging and process configuration tests.
 *
 * Run: node --import tsx src/logging/logging.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import {
  createLogger,
  formatLogEntry,
  generateRunId,
  getRunId,
  initRunId,
  isLogLevel,
  type LogLevel,
} from "./index.js";
import { ConfigError, loadAppConfig, validateConfig, type AppConfig } from "../config/index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function withEnv(vars: Record<string, string | undefined>, fn: () => void): void {
  const saved: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(vars)) {
    saved[key] = process.env[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
  try {
    fn();
  } finally {
    for (const [key, value] of Object.entries(saved)) {
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  }
}

const FIXED = new Date(Date.UTC(2024, 0, 15, 10, 30, 5));

const BASE_CONFIG: AppConfig = {
  env: "test",
  debug: false,
  logLevel: "info",
  configFile: ".debyrc",
  debianDir: "debian",
  logFile: undefined,
};

// ═══════════════════════════════════════════════════════════════════════════
// LOG FORMAT
// ═══════════════════════════════════════════════════════════════════════════

section("Log format");

test("entry before any run ID is initialized", () => {
  assert.equal(getRunId(), null);
  assert.equal(
    formatLogEntry("info", "hello", { a: 1 }, FIXED),
    '[2024-01-15T10:30:05.000Z] [INFO ] [no-run-id] hello {"a":1}'
  );
});

test("empty context is omitted", () => {
  assert.equal(
    formatLogEntry("error", "boom", {}, FIXED),
    "[2024-01-15T10:30:05.000Z] [ERROR] [no-run-id] boom"
  );
});

test("generated run ID has a date prefix and random suffix", () => {
  assert.match(generateRunId(FIXED), /^20240115-[0-9a-f]{6}$/);
});

test("initialized run ID tags every line", () => {
  const runId = initRunId();
  assert.equal(getRunId(), runId);
  assert.equal(
    formatLogEntry("warn", "careful", undefined, FIXED),
    `[2024-01-15T10:30:05.000Z] [WARN ] [${runId}] careful`
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════════════════

section("Logger");

test("lines below the minimum level are dropped", () => {
  const lines: LogLevel[] = [];
  const logger = createLogger({ level: "warn", sink: (level) => lines.push(level) });
  logger.debug("d");
  logger.info("i");
  logger.warn("w");
  logger.error("e");
  assert.deepEqual(lines, ["warn", "error"]);
});

test("default level is info", () => {
  const lines: LogLevel[] = [];
  const logger = createLogger({ sink: (level) => lines.push(level) });
  logger.debug("d");
  logger.info("i");
  assert.deepEqual(lines, ["info"]);
});

test("log file receives one line per entry", () => {
  const dir = mkdtempSync(join(tmpdir(), "deby-log-"));
  try {
    const logFile = join(dir, "nested", "deby.log");
    const logger = createLogger({ console: false, logFile });
    logger.info("first", { n: 1 });
    logger.error("second");

    const lines = readFileSync(logFile, "utf-8").split("\n");
    assert.equal(lines.length, 3);
    assert.match(lines[0] ?? "", /\[INFO \] \[[^\]]+\] first \{"n":1\}$/);
    assert.match(lines[1] ?? "", /\[ERROR\] \[[^\]]+\] second$/);
    assert.equal(lines[2], "");
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("isLogLevel", () => {
  assert.equal(isLogLevel("debug"), true);
  assert.equal(isLogLevel("DEBUG"), false);
  assert.equal(isLogLevel("trace"), false);
});

// ═══════════════════════════════════════════════════════════════════════════
// PROCESS CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

section("Process configuration");

test("environment defaults", () => {
  withEnv(
    {
      NODE_ENV: undefined,
      DEBUG: undefined,
      LOG_LEVEL: undefined,
      DEBY_CONFIG: undefined,
      DEBY_DEBIAN_DIR: undefined,
      DEBY_LOG_FILE: undefined,
    },
    () => {
      assert.deepEqual(loadAppConfig(), {
        env: "development",
        debug: false,
        logLevel: "info",
        configFile: ".debyrc",
        debianDir: "debian",
        logFile: undefined,
      });
    }
  );
});

test("environment overrides", () => {
  withEnv(
    { DEBY_CONFIG: "pkg.debyrc", DEBY_DEBIAN_DIR: "out", DEBUG: "yes", DEBY_LOG_FILE: "" },
    () => {
      const config = loadAppConfig();
      assert.equal(config.configFile, "pkg.debyrc");
      assert.equal(config.debianDir, "out");
      assert.equal(config.debug, true);
      assert.equal(config.logFile, undefined);
    }
  );
});

test("non-boolean DEBUG throws ConfigError", () => {
  withEnv({ DEBUG: "maybe" }, () => {
    assert.throws(() => loadAppConfig(), ConfigError);
  });
});

test("validateConfig returns the log level", () => {
  assert.equal(validateConfig(BASE_CONFIG), "info");
  assert.equal(validateConfig({ ...BASE_CONFIG, logLevel: "error" }), "error");
});

test("debug mode forces the debug level", () => {
  assert.equal(validateConfig({ ...BASE_CONFIG, debug: true, logLevel: "error" }), "debug");
});

test("unknown LOG_LEVEL is rejected", () => {
  assert.throws(() => validateConfig({ ...BASE_CONFIG, logLevel: "verbose" }), {
    name: "ConfigError",
    message: "Invalid LOG_LEVEL: verbose. Must be debug, info, warn, error.",
  });
});

test("unknown NODE_ENV is rejected", () => {
  assert.throws(() => validateConfig({ ...BASE_CONFIG, env: "staging" }), ConfigError);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
