/**
 * Scan Types - configuration, progress and collaborator contracts
 */

import type { IssueType } from './issues.js';
import type { Program, ProgramDescriptor, ProgramId } from './programs.js';

/**
 * Immutable configuration of one scan
 */
export interface ScanConfiguration {
  /** Root path that counts as project content (e.g. "/Game") */
  readonly rootPath: string;
  readonly includePaths: readonly string[];
  readonly excludePaths: readonly string[];
  readonly enabledChecks: ReadonlySet<IssueType>;
  readonly useConcurrency: boolean;
  readonly maxConcurrentTasks: number;
  /** Granularity of the cancellation-aware hand-off wait */
  readonly waitSliceMs: number;
}

export interface ScanProgress {
  totalAssets: number;
  processedAssets: number;
  issuesFound: number;
  currentAsset: string;
  /** Fraction in [0, 1] */
  percentage: number;
  /** Seconds */
  estimatedTimeRemaining: number;
  /** Epoch milliseconds, 0 before the first scan */
  startTime: number;
  completed: boolean;
  cancelled: boolean;
}

/**
 * Host collaborator that enumerates and materializes programs.
 * Loading is synchronous: it runs on the coordinator, which owns program data.
 */
export interface AssetSource {
  listCandidatePrograms(pathFilters: readonly string[]): ProgramDescriptor[];
  /**
   * Returns null when the identifier cannot be materialized.
   */
  loadProgram(id: ProgramId): Program | null;
}
