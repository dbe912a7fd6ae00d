#!/usr/bin/env node
/**
 * CLI entry point for hostprep.
 */

import { cleanup, onExit } from "./cleanup.js";
import { main } from "./program.js";

onExit(cleanup);

process.exitCode = await main(process.argv);
