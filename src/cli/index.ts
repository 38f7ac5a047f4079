#!/usr/bin/env node
/**
 * Strategy Draft Gate - CLI Entry Point
 *
 * Usage:
 *   draft-gate --drafts-dir <dir> [options]   Review every draft in a directory
 *   draft-gate --draft <file> [options]       Review a single draft
 */

import { CLI } from './cli-interface';

process.exitCode = new CLI().run(process.argv.slice(2));
