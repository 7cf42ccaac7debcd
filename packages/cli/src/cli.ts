#!/usr/bin/env -S node --import tsx
/**
 * @graphlint/cli - command line for the graph program linter
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { scanCommand } from './commands/scan.js';
import { checksCommand } from './commands/checks.js';

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const manifestPath = join(__dirname, '..', 'package.json');
const pkg: unknown = existsSync(manifestPath) ? JSON.parse(readFileSync(manifestPath, 'utf-8')) : null;
const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
  ? pkg.version
  : '0.0.0';

const program = new Command();

program
  .name('graphlint')
  .description('Static analysis for visual node-graph programs')
  .version(version);

program.addCommand(scanCommand);
program.addCommand(checksCommand);

await program.parseAsync();
