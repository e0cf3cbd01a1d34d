/**
 * Changelog composer tests.
 *
 * Run: node --import tsx src/changelog/changelog.test.ts
 *
 * Tests cover:
 *   1. RFC 2822 timestamps with numeric offsets
 *   2. Entry layout and bullet formatting
 *   3. First run versus prepend to existing history
 *   4. Empty version / changes rejection
 */

import { strict as assert } from "node:assert";

import {
  composeChangelog,
  splitChanges,
  EmptyChangesError,
  EmptyVersionError,
  InvalidVersionError,
  type ChangelogComposeOptions,
} from "./composer.js";
import { formatRfc2822, formatUtcOffset, localUtcOffset } from "./date.js";
import type { ChangelogConfig } from "../config/deby/schema.js";
import { found, NOT_FOUND } from "../types/file.js";

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

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

/** Monday 15 January 2024, 10:30:05 UTC */
const FIXED = new Date(Date.UTC(2024, 0, 15, 10, 30, 5));

const CLOCK: ChangelogComposeOptions = { now: () => FIXED, utcOffsetMinutes: 0 };

const CONFIG: ChangelogConfig = {
  package: "hello",
  distribution: "unstable",
  urgency: "low",
  maintainer: { name: "Jane Doe", email: "jane@example.org" },
};

const FIX_BUG_BLOCK = [
  "hello (1.0.0) unstable; urgency=low",
  "",
  "  * fix bug",
  "",
  " -- Jane Doe <jane@example.org>  Mon, 15 Jan 2024 10:30:05 +0000",
  "",
  "",
].join("\n");

// ═══════════════════════════════════════════════════════════════════════════
// DATES
// ═══════════════════════════════════════════════════════════════════════════

section("RFC 2822 dates");

test("UTC instant formats with +0000", () => {
  assert.equal(formatRfc2822(FIXED, 0), "Mon, 15 Jan 2024 10:30:05 +0000");
});

test("positive offset shifts wall-clock time", () => {
  assert.equal(formatRfc2822(FIXED, 120), "Mon, 15 Jan 2024 12:30:05 +0200");
});

test("half-hour offset", () => {
  assert.equal(formatRfc2822(FIXED, 330), "Mon, 15 Jan 2024 16:00:05 +0530");
});

test("negative offset can cross into the previous day", () => {
  assert.equal(formatRfc2822(FIXED, -660), "Sun, 14 Jan 2024 23:30:05 -1100");
});

test("offset rendering", () => {
  assert.equal(formatUtcOffset(0), "+0000");
  assert.equal(formatUtcOffset(-300), "-0500");
  assert.equal(formatUtcOffset(-570), "-0930");
  assert.equal(formatUtcOffset(345), "+0545");
});

test("local offset default matches the explicit local offset", () => {
  assert.equal(formatRfc2822(FIXED), formatRfc2822(FIXED, localUtcOffset(FIXED)));
});

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY FORMAT
// ═══════════════════════════════════════════════════════════════════════════

section("Entry format");

test("first run produces exactly one entry block", () => {
  const result = composeChangelog(CONFIG, "1.0.0", "fix bug", NOT_FOUND, CLOCK);
  assert.ok(result.success);
  assert.equal(result.text, FIX_BUG_BLOCK);
});

test("entry carries the header and trailer values", () => {
  const result = composeChangelog(
    { ...CONFIG, distribution: "experimental", urgency: "critical" },
    "2.1.0-1",
    "fix bug",
    NOT_FOUND,
    CLOCK
  );
  assert.ok(result.success);
  assert.deepEqual(result.entry, {
    package: "hello",
    version: "2.1.0-1",
    distribution: "experimental",
    urgency: "critical",
    changes: ["fix bug"],
    maintainer: { name: "Jane Doe", email: "jane@example.org" },
    timestamp: "Mon, 15 Jan 2024 10:30:05 +0000",
  });
  assert.equal(result.text.split("\n")[0], "hello (2.1.0-1) experimental; urgency=critical");
  assert.ok(Object.isFrozen(result.entry));
});

test("each non-blank change line becomes one bullet", () => {
  const result = composeChangelog(
    CONFIG,
    "1.0.0",
    "first\n\n  second indented\r\nthird  \n",
    NOT_FOUND,
    CLOCK
  );
  assert.ok(result.success);
  assert.deepEqual(result.text.split("\n").slice(2, 5), [
    "  * first",
    "  *   second indented",
    "  * third",
  ]);
  assert.equal(result.text.split("\n")[5], "");
});

test("splitChanges drops blank lines only", () => {
  assert.deepEqual(splitChanges("a\n \n\tb\t\n"), ["a", "\tb"]);
});

test("version is trimmed in the header", () => {
  const result = composeChangelog(CONFIG, " 1.0.0 ", "fix bug", NOT_FOUND, CLOCK);
  assert.ok(result.success);
  assert.equal(result.text, FIX_BUG_BLOCK);
});

// ═══════════════════════════════════════════════════════════════════════════
// HISTORY
// ═══════════════════════════════════════════════════════════════════════════

section("History");

test("new entry is prepended to existing content byte for byte", () => {
  const result = composeChangelog(CONFIG, "1.0.0", "fix bug", found("OLD_CONTENT"), CLOCK);
  assert.ok(result.success);
  assert.equal(result.text, FIX_BUG_BLOCK + "OLD_CONTENT");
});

test("existing content is not reformatted", () => {
  const old = "hello (0.9.0) unstable; urgency=low\n\n  * initial\n\n -- Jane Doe <jane@example.org>  Sun, 14 Jan 2024 09:00:00 +0000\n\n\n";
  const result = composeChangelog(CONFIG, "1.0.0", "fix bug", found(old), CLOCK);
  assert.ok(result.success);
  assert.equal(result.text.slice(FIX_BUG_BLOCK.length), old);
});

test("existing empty file is history, not a first run", () => {
  const result = composeChangelog(CONFIG, "1.0.0", "fix bug", found(""), CLOCK);
  assert.ok(result.success);
  assert.equal(result.text, FIX_BUG_BLOCK);
});

// ═══════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════

section("Errors");

test("blank version fails with EmptyVersionError", () => {
  const result = composeChangelog(CONFIG, "  ", "fix bug", NOT_FOUND, CLOCK);
  assert.equal(result.success, false);
  if (result.success) return;
  assert.ok(result.error instanceof EmptyVersionError);
  assert.equal(result.error.code, "empty_version");
});

test("blank changes fail with EmptyChangesError", () => {
  const result = composeChangelog(CONFIG, "1.0.0", "\n   \n", found("OLD"), CLOCK);
  assert.equal(result.success, false);
  if (result.success) return;
  assert.ok(result.error instanceof EmptyChangesError);
  assert.equal(result.error.message, "Changes must not be empty");
});

test("version with inner whitespace or line breaks is rejected", () => {
  for (const version of ["1.0\n\nbogus", "1.0 beta", "1.0\t2"]) {
    const result = composeChangelog(CONFIG, version, "fix bug", NOT_FOUND, CLOCK);
    assert.equal(result.success, false);
    if (result.success) return;
    assert.ok(result.error instanceof InvalidVersionError);
    assert.equal(result.error.code, "invalid_version");
  }
});

test("invalid version message shows the value escaped", () => {
  const result = composeChangelog(CONFIG, " 1.0\nbogus ", "fix bug", NOT_FOUND, CLOCK);
  assert.equal(result.success, false);
  if (result.success) return;
  assert.equal(result.error.message, 'Version "1.0\\nbogus" must not contain whitespace');
});

test("version is checked before changes", () => {
  const result = composeChangelog(CONFIG, "", "", NOT_FOUND, CLOCK);
  assert.equal(result.success, false);
  if (result.success) return;
  assert.equal(result.error.code, "empty_version");
});

test("default clock produces a well-formed timestamp", () => {
  const result = composeChangelog(CONFIG, "1.0.0", "fix bug", NOT_FOUND);
  assert.ok(result.success);
  assert.match(
    result.entry.timestamp,
    /^(Mon|Tue|Wed|Thu|Fri|Sat|Sun), \d{2} [A-Z][a-z]{2} \d{4} \d{2}:\d{2}:\d{2} [+-]\d{4}$/
  );
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
