/**
 * Checks command - list available detectors
 */

import { Command } from 'commander';
import { DEFAULT_CONFIG, createDetectors, ALL_ISSUE_TYPES } from '@graphlint/core';

export const checksCommand = new Command('checks')
  .description('List available checks')
  .option('-j, --json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    const detectors = createDetectors(new Set(ALL_ISSUE_TYPES));
    const enabled = new Set(DEFAULT_CONFIG.checks);

    if (options.json) {
      console.log(JSON.stringify(detectors.map(detector => ({
        check: detector.metadata.issueType,
        description: detector.metadata.description ?? '',
        enabledByDefault: enabled.has(detector.metadata.issueType),
      })), null, 2));
      return;
    }

    console.log('Available checks:');
    console.log('');
    for (const detector of detectors) {
      const { issueType, description } = detector.metadata;
      const marker = enabled.has(issueType) ? '' : ' (opt-in)';
      console.log(`  ${issueType.padEnd(16)}${description ?? ''}${marker}`);
    }
  });
