#!/usr/bin/env node
/**
 * lsconf CLI
 *
 * Usage:
 *   lsconf check <file>
 *   lsconf fmt <file> [--write]
 *   lsconf tree <file> [--format json|yaml]
 *   lsconf from-tree <file>
 *   lsconf --explain LSC-P001
 */

import { runCli } from './cli-run.js';

process.exitCode = await runCli(process.argv.slice(2));
