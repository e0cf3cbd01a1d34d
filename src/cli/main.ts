#!/usr/bin/env node
/**
 * Executable entry for the deby CLI.
 */

import { runCli } from "./deby.js";

process.exitCode = runCli(process.argv.slice(2));
