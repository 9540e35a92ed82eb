#!/usr/bin/env node
/**
 * @module tasks/scenarios/cli
 * @description Command-line entry for the bundled scenarios
 *
 * Usage:
 *   npx tsx src/tasks/scenarios/cli.ts --list
 *   npx tsx src/tasks/scenarios/cli.ts 1 3 5 --out output
 *   npm run scenarios -- --log output/run.jsonl
 */

import { runCli } from './command';

process.exitCode = runCli(process.argv.slice(2));
