#!/usr/bin/env node
/**
 * task-ledger CLI entry point.
 */

import { runCli } from './program.js';

process.exitCode = await runCli(process.argv);
