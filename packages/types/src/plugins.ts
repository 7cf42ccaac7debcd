/**
 * Detector contract types
 */

import type { IssueType } from './issues.js';

// === LOGGING ===

/**
 * Log level, from quietest to most verbose
 */
export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
}

// === DETECTORS ===

export interface DetectorMetadata {
  name: string;
  /** Issue type every finding of this detector carries */
  issueType: IssueType;
  description?: string;
}
