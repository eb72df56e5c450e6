#!/usr/bin/env tsx
/**
 * Docket Resolver CLI Entry Point
 *
 * @module docket-resolver-cli
 */

import { run } from '../src/cli/program.js';

process.exitCode = await run(process.argv);
