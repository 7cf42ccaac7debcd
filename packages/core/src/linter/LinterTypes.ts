/**
 * Types for StaticLinter and its scan lifecycle
 */

import type { AssetSource, LintIssue, Logger, LogLevel } from '@graphlint/types';
import type { Coordinator } from '../core/Coordinator.js';
import type { Detector } from '../plugins/Detector.js';

export const SCAN_STATE = {
  IDLE: 'idle',
  SCANNING: 'scanning',
  COMPLETED: 'completed',
  CANCELLED: 'cancelled',
} as const;

export type ScanState = typeof SCAN_STATE[keyof typeof SCAN_STATE];

export type ScanProgressListener = (processed: number, total: number) => void;
export type ScanCompleteListener = (issues: LintIssue[]) => void;

export interface StaticLinterOptions {
  source: AssetSource;
  /** Logger instance for structured logging */
  logger?: Logger;
  /** Log level for the default logger. Ignored if logger is provided. */
  logLevel?: LogLevel;
  /** Shared coordinator queue; a private one is created otherwise */
  coordinator?: Coordinator;
  /**
   * Replaces the built-in detector set. Only detectors whose issue type
   * is enabled in the scan configuration run.
   */
  detectors?: Detector[];
}
