/**
 * Scan command - run the detectors over an exported corpus
 *
 * Reads programs from a corpus JSON file, applies .graphlint/config.yaml
 * from the project directory plus command-line overrides, and prints
 * issues grouped by severity (or JSON with --json).
 */

import { Command } from 'commander';
import { existsSync } from 'fs';
import { resolve } from 'path';
import {
  LintError,
  MultiLogger,
  StaticLinter,
  createLogger,
  loadConfig,
  loadCorpusFile,
  toScanConfiguration,
} from '@graphlint/core';
import type { InMemoryAssetSource, LintConfig, Logger, LogLevel, Severity } from '@graphlint/core';
import { exitWithError } from '../utils/errorFormatter.js';
import { formatIssueReport, formatSummary } from '../utils/formatIssue.js';
import { ProgressRenderer } from '../utils/progressRenderer.js';
import { applyOverrides, parseLogLevel, parseSeverity, reachesSeverity } from '../utils/scanOptions.js';
import type { ScanCommandOptions } from '../utils/scanOptions.js';

export const scanCommand = new Command('scan')
  .description('Scan an exported corpus for graph issues')
  .argument('<corpus>', 'Path to corpus JSON file')
  .option('-p, --project <path>', 'Project path (where .graphlint/config.yaml lives)', '.')
  .option('-c, --checks <list>', 'Comma-separated checks to run, or "all"')
  .option('-i, --include <pattern...>', 'Only scan programs matching these patterns')
  .option('-e, --exclude <pattern...>', 'Skip programs matching these patterns')
  .option('-f, --folder <path...>', 'Scan these content folders instead of the root')
  .option('--no-concurrency', 'Analyze all programs synchronously')
  .option('-j, --json', 'Output results as JSON')
  .option('-q, --quiet', 'Suppress progress output')
  .option('--log-level <level>', 'Log level: silent, errors, warnings, info, debug', 'warnings')
  .option('--log-file <path>', 'Write all log output to a file')
  .option('--fail-on <severity>', 'Exit with code 2 if an issue of this severity or higher is found')
  .addHelpText('after', `
Examples:
  graphlint scan corpus.json                         Scan with project config
  graphlint scan corpus.json --checks all            Run every check
  graphlint scan corpus.json -c UnusedFunction       Only unused functions
  graphlint scan corpus.json -f /Game/Characters     Scan one folder
  graphlint scan corpus.json -e Developers           Skip developer content
  graphlint scan corpus.json --json                  Machine-readable output
  graphlint scan corpus.json --fail-on high          CI mode
`)
  .action(async (corpus: string, options: ScanCommandOptions) => {
    const projectPath = resolve(options.project);
    const corpusPath = resolve(corpus);

    let logLevel: LogLevel;
    let failOn: Severity | undefined;
    try {
      logLevel = parseLogLevel(options.logLevel);
      failOn = options.failOn ? parseSeverity(options.failOn) : undefined;
    } catch (error) {
      exitWithError(error instanceof Error ? error.message : String(error));
    }

    if (!existsSync(corpusPath)) {
      exitWithError(`Corpus file not found: ${corpusPath}`, [
        'Export the project corpus from the editor',
        'Or pass the path: graphlint scan <corpus.json>',
      ]);
    }

    const logger = createLogger(logLevel, { logFile: options.logFile });

    let config: LintConfig;
    let source: InMemoryAssetSource;
    try {
      config = applyOverrides(loadConfig(projectPath, logger), options);
      source = loadCorpusFile(corpusPath);
    } catch (error) {
      await closeLogger(logger);
      if (error instanceof LintError) {
        exitWithError(error.message, error.suggestion ? [error.suggestion] : undefined);
      }
      exitWithError(error instanceof Error ? error.message : String(error));
    }

    const scanConfig = toScanConfiguration(config);
    const linter = new StaticLinter({ source, logger });

    const showProgress = !options.quiet && !options.json;
    const renderer = new ProgressRenderer({
      isInteractive: process.stderr.isTTY ?? false,
      write: text => process.stderr.write(text),
    });
    if (showProgress) {
      linter.onScanProgress(() => renderer.update(linter.getScanProgress()));
    }

    const onInterrupt = (): void => {
      linter.cancelScan().catch((error: unknown) => {
        logger.error('Cancel failed', { error: error instanceof Error ? error.message : String(error) });
      });
    };
    process.once('SIGINT', onInterrupt);

    try {
      if (options.folder && options.folder.length > 0) {
        linter.scanSelectedFolders(options.folder, scanConfig);
      } else {
        linter.scanProject(scanConfig);
      }
      const issues = await linter.waitForCompletion();
      const progress = linter.getScanProgress();
      const diagnostics = linter.getDiagnostics();

      if (showProgress) {
        process.stderr.write(renderer.finish(progress) + '\n');
      }

      if (options.json) {
        console.log(JSON.stringify({
          issues,
          progress,
          diagnostics,
        }, null, 2));
      } else {
        console.log(formatIssueReport(issues));
        console.log('');
        console.log(`Summary: ${formatSummary(issues)}`);
        if (diagnostics.length > 0) {
          console.log(`${diagnostics.length} program(s) could not be fully analyzed (run with --log-level info for details)`);
        }
      }

      if (failOn && reachesSeverity(issues, failOn)) {
        process.exitCode = 2;
      }
    } finally {
      process.off('SIGINT', onInterrupt);
      await linter.dispose();
      await closeLogger(logger);
    }
  });

async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof MultiLogger) {
    await logger.close();
  }
}
