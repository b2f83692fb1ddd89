#!/usr/bin/env node

/**
 * tablemat CLI entry point
 */

import { processIo } from "./lib/io.js";
import { run } from "./program.js";

process.exitCode = await run(process.argv.slice(2), processIo());
