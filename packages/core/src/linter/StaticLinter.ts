/**
 * StaticLinter - scan orchestrator
 *
 * State machine: idle → scanning → completed | cancelled. A new scan can
 * start from any state except scanning; a request while scanning is
 * ignored with a warning.
 *
 * Small or non-concurrent scans run synchronously inside the scan call.
 * Otherwise a ScanTask feeds assets to the Coordinator, which runs the
 * detectors. Either way issues are appended per asset, so a cancelled
 * scan still reports everything found so far.
 *
 * Each scan builds a fresh ResourceRegistry and ProgramCorpus; nothing
 * cross-program survives between scans.
 */

import { EventEmitter } from 'events';
import type {
  AssetSource,
  IssueType,
  LintIssue,
  Logger,
  Program,
  ProgramDescriptor,
  ScanConfiguration,
  ScanProgress,
} from '@graphlint/types';
import { Coordinator } from '../core/Coordinator.js';
import { ProgramCorpus } from '../core/ProgramCorpus.js';
import { ResourceRegistryImpl } from '../core/ResourceRegistry.js';
import { DiagnosticCollector } from '../diagnostics/DiagnosticCollector.js';
import type { Diagnostic } from '../diagnostics/DiagnosticCollector.js';
import { AssetLoadError, DetectorError } from '../errors/LintError.js';
import { GraphView } from '../graph/GraphView.js';
import { createLogger } from '../logging/Logger.js';
import { createScanConfiguration } from '../config/ConfigLoader.js';
import type { Detector, DetectorContext } from '../plugins/Detector.js';
import { createDetectors } from '../plugins/detectors/index.js';
import { ScanTask } from './ScanTask.js';
import { dedupeAssets, shouldProcessAsset } from './assetFilter.js';
import { SCAN_STATE } from './LinterTypes.js';
import type {
  ScanCompleteListener,
  ScanProgressListener,
  ScanState,
  StaticLinterOptions,
} from './LinterTypes.js';

const DEFAULT_DISPOSE_TIMEOUT_MS = 5000;

/**
 * State owned by one scan
 */
interface ActiveScan {
  config: ScanConfiguration;
  detectors: Detector[];
  resources: ResourceRegistryImpl;
  corpus: ProgramCorpus;
  abort: AbortController;
  task: ScanTask | null;
  cancelling: Promise<void> | null;
}

function emptyProgress(): ScanProgress {
  return {
    totalAssets: 0,
    processedAssets: 0,
    issuesFound: 0,
    currentAsset: '',
    percentage: 0,
    estimatedTimeRemaining: 0,
    startTime: 0,
    completed: false,
    cancelled: false,
  };
}

export class StaticLinter extends EventEmitter {
  private readonly source: AssetSource;
  private readonly logger: Logger;
  private readonly coordinator: Coordinator;
  private readonly customDetectors: Detector[] | null;
  private readonly diagnostics = new DiagnosticCollector();

  private state: ScanState = SCAN_STATE.IDLE;
  private issues: LintIssue[] = [];
  private progress: ScanProgress = emptyProgress();
  private active: ActiveScan | null = null;
  private completionWaiters: Array<(issues: LintIssue[]) => void> = [];
  private disposed = false;

  constructor(options: StaticLinterOptions) {
    super();
    this.source = options.source;
    this.logger = options.logger ?? createLogger(options.logLevel ?? 'info');
    this.coordinator = options.coordinator ?? new Coordinator();
    this.customDetectors = options.detectors ?? null;
  }

  // === SCAN ENTRY POINTS ===

  /**
   * Scan everything under the configured root path
   */
  scanProject(config: ScanConfiguration = createScanConfiguration()): void {
    this.scanFolder(config.rootPath, config);
  }

  scanFolder(folderPath: string, config: ScanConfiguration = createScanConfiguration()): void {
    this.scanSelectedFolders([folderPath], config);
  }

  scanSelectedFolders(folderPaths: readonly string[], config: ScanConfiguration = createScanConfiguration()): void {
    if (this.rejectIfBusy()) return;
    const candidates = dedupeAssets(this.source.listCandidatePrograms(folderPaths));
    this.logger.debug('Candidate programs listed', { folders: folderPaths.length, candidates: candidates.length });
    this.scanBlueprints(candidates, config);
  }

  /**
   * Scan the given programs. Returns once the scan has started, or, for
   * synchronous scans (empty, single asset, concurrency off), once it
   * has completed.
   */
  scanBlueprints(assets: readonly ProgramDescriptor[], config: ScanConfiguration = createScanConfiguration()): void {
    if (this.rejectIfBusy()) return;

    const eligible = assets.filter(asset => shouldProcessAsset(asset, config));
    this.logger.info('Scan requested', { candidates: assets.length, eligible: eligible.length });

    this.issues = [];
    this.diagnostics.clear();
    this.progress = { ...emptyProgress(), totalAssets: eligible.length, startTime: Date.now() };

    if (eligible.length === 0) {
      this.progress.completed = true;
      this.state = SCAN_STATE.COMPLETED;
      this.broadcastComplete();
      return;
    }

    this.startScan(eligible, config);
  }

  // === CANCELLATION & TEARDOWN ===

  /**
   * Stop the running scan. Assets already analyzed keep their issues;
   * completion is broadcast once the background task has stopped.
   * No-op when no scan is running.
   */
  cancelScan(): Promise<void> {
    const active = this.active;
    if (this.state !== SCAN_STATE.SCANNING || !active) {
      return Promise.resolve();
    }
    if (active.cancelling) {
      return active.cancelling;
    }

    this.logger.info('Cancelling scan', {
      processed: this.progress.processedAssets,
      total: this.progress.totalAssets,
    });
    active.abort.abort();
    this.progress.cancelled = true;

    active.cancelling = this.finishCancellation(active);
    return active.cancelling;
  }

  /**
   * Release the linter. A running scan is cancelled and given up to
   * `timeoutMs` to deliver its completion; after that the state is
   * released regardless and late callbacks become no-ops.
   */
  async dispose(timeoutMs: number = DEFAULT_DISPOSE_TIMEOUT_MS): Promise<void> {
    if (this.disposed) return;

    if (this.isScanInProgress()) {
      const stopped = await settlesWithin(this.cancelScan(), timeoutMs);
      if (!stopped) {
        this.logger.warn('Scan did not stop before dispose timeout, releasing state', { timeoutMs });
      }
    }

    this.disposed = true;
    if (this.state === SCAN_STATE.SCANNING) {
      this.state = SCAN_STATE.CANCELLED;
    }
    this.active?.abort.abort();
    this.active?.resources.clear();
    this.active = null;
    this.issues = [];
    this.completionWaiters = [];
    this.removeAllListeners();
  }

  // === EVENTS ===

  onScanProgress(listener: ScanProgressListener): () => void {
    this.on('progress', listener);
    return () => {
      this.off('progress', listener);
    };
  }

  onScanComplete(listener: ScanCompleteListener): () => void {
    this.on('complete', listener);
    return () => {
      this.off('complete', listener);
    };
  }

  /**
   * Resolves with the final issue list of the running scan (partial if
   * it gets cancelled), or right away when idle.
   */
  waitForCompletion(): Promise<LintIssue[]> {
    if (!this.isScanInProgress()) {
      return Promise.resolve(this.getIssues());
    }
    return new Promise(resolve => {
      this.completionWaiters.push(resolve);
    });
  }

  // === QUERIES ===

  isScanInProgress(): boolean {
    return this.state === SCAN_STATE.SCANNING;
  }

  getState(): ScanState {
    return this.state;
  }

  getIssues(): LintIssue[] {
    return [...this.issues];
  }

  getIssuesByType(type: IssueType): LintIssue[] {
    return this.issues.filter(issue => issue.type === type);
  }

  getScanProgress(): ScanProgress {
    return { ...this.progress };
  }

  getDiagnostics(): Diagnostic[] {
    return this.diagnostics.getAll();
  }

  // === PROGRESS ===

  /**
   * Record progress and broadcast it. ETA extrapolates the average time
   * per processed asset.
   */
  updateScanProgress(processed: number, total: number, currentAsset = ''): void {
    const progress = this.progress;
    progress.processedAssets = processed;
    progress.totalAssets = total;
    progress.percentage = total > 0 ? processed / total : 0;
    progress.issuesFound = this.issues.length;
    if (currentAsset) {
      progress.currentAsset = currentAsset;
    }

    if (processed > 0 && progress.startTime > 0) {
      const elapsedSeconds = (Date.now() - progress.startTime) / 1000;
      progress.estimatedTimeRemaining = (elapsedSeconds / processed) * (total - processed);
    } else {
      progress.estimatedTimeRemaining = 0;
    }

    this.broadcast('progress', processed, total);
  }

  // === SCAN EXECUTION ===

  private startScan(assets: ProgramDescriptor[], config: ScanConfiguration): void {
    const active: ActiveScan = {
      config,
      detectors: this.customDetectors
        ? this.customDetectors.filter(detector => config.enabledChecks.has(detector.metadata.issueType))
        : createDetectors(config.enabledChecks),
      resources: new ResourceRegistryImpl(),
      corpus: new ProgramCorpus(this.source, config.rootPath, this.logger),
      abort: new AbortController(),
      task: null,
      cancelling: null,
    };
    this.active = active;
    this.state = SCAN_STATE.SCANNING;

    const concurrent = config.useConcurrency && assets.length > 1;
    this.logger.info('Scan started', {
      assets: assets.length,
      detectors: active.detectors.map(d => d.metadata.name),
      concurrent,
    });

    if (concurrent) {
      active.task = new ScanTask({
        host: {
          processAsset: asset => this.processAsset(active, asset),
          completeScan: () => this.completeScan(active),
        },
        assets,
        coordinator: this.coordinator,
        signal: active.abort.signal,
        depth: config.maxConcurrentTasks,
        waitSliceMs: config.waitSliceMs,
        logger: this.logger,
      });
      active.task.start();
      return;
    }

    for (const asset of assets) {
      if (active.abort.signal.aborted) break;
      this.processAsset(active, asset);
    }
    this.completeScan(active);
  }

  /**
   * Analyze one asset and record the result. Runs on the coordinator.
   */
  private processAsset(active: ActiveScan, asset: ProgramDescriptor): void {
    if (this.active !== active || this.state !== SCAN_STATE.SCANNING) {
      return;
    }

    const found = this.processProgram(active, asset);
    this.issues.push(...found);
    this.updateScanProgress(this.progress.processedAssets + 1, this.progress.totalAssets, asset.name);
  }

  /**
   * Load a program and run every enabled detector on it. Load failures
   * and detector faults are logged and recorded, never thrown.
   */
  private processProgram(active: ActiveScan, asset: ProgramDescriptor): LintIssue[] {
    const program = this.loadProgram(asset);
    if (!program) {
      return [];
    }

    if (program.graphs.length === 0) {
      this.logger.debug('Skipping program without graphs', { program: program.path });
      return [];
    }

    const context: DetectorContext = {
      program,
      graphs: program.graphs.map(graph => new GraphView(graph)),
      resources: active.resources,
      corpus: active.corpus,
      config: active.config,
      logger: this.logger,
    };

    const found: LintIssue[] = [];
    for (const detector of active.detectors) {
      try {
        found.push(...detector.detect(context));
      } catch (err) {
        const error = new DetectorError(
          `${detector.metadata.name} failed: ${err instanceof Error ? err.message : String(err)}`,
          { programPath: program.path, detector: detector.metadata.name },
          err
        );
        this.logger.error('Detector failed', { program: program.path, detector: detector.metadata.name, error: error.message });
        this.diagnostics.addError('detect', error);
      }
    }

    this.logger.debug('Program analyzed', { program: program.path, issues: found.length });
    return found;
  }

  private loadProgram(asset: ProgramDescriptor): Program | null {
    let program: Program | null;
    try {
      program = this.source.loadProgram(asset.id);
    } catch (err) {
      const error = new AssetLoadError(
        `Failed to load program: ${err instanceof Error ? err.message : String(err)}`,
        { programPath: asset.id }
      );
      this.logger.error('Failed to load program', { program: asset.id, error: error.message });
      this.diagnostics.addError('load', error);
      return null;
    }

    if (!program) {
      this.logger.error('Failed to load program', { program: asset.id });
      this.diagnostics.addError('load', new AssetLoadError('Program could not be loaded', { programPath: asset.id }));
    }
    return program;
  }

  /**
   * Final step of a scan that ran to the end. Ignored when the scan was
   * cancelled or already finalized by dispose.
   */
  private completeScan(active: ActiveScan): void {
    if (this.active !== active || this.state !== SCAN_STATE.SCANNING) {
      return;
    }
    // Cancelled after the last asset; finishCancellation ends the scan
    if (active.abort.signal.aborted) {
      return;
    }

    this.progress.completed = true;
    this.progress.issuesFound = this.issues.length;
    this.state = SCAN_STATE.COMPLETED;
    this.release(active);

    this.logger.info('Scan completed', {
      assets: this.progress.processedAssets,
      issues: this.issues.length,
      durationMs: Date.now() - this.progress.startTime,
    });
    this.broadcastComplete();
  }

  private async finishCancellation(active: ActiveScan): Promise<void> {
    if (active.task) {
      await active.task.done;
    }
    if (this.active !== active || this.state !== SCAN_STATE.SCANNING) {
      return;
    }

    this.progress.issuesFound = this.issues.length;
    this.state = SCAN_STATE.CANCELLED;
    this.release(active);

    this.logger.info('Scan cancelled', {
      processed: this.progress.processedAssets,
      total: this.progress.totalAssets,
      issues: this.issues.length,
    });
    this.broadcastComplete();
  }

  private release(active: ActiveScan): void {
    active.task = null;
    active.resources.clear();
    this.active = null;
  }

  private rejectIfBusy(): boolean {
    if (this.disposed) {
      this.logger.warn('Scan requested on a disposed linter, ignoring');
      return true;
    }
    if (this.isScanInProgress()) {
      this.logger.warn('Scan already in progress, ignoring request');
      return true;
    }
    return false;
  }

  private broadcastComplete(): void {
    const issues = this.getIssues();
    this.broadcast('complete', issues);

    const waiters = this.completionWaiters;
    this.completionWaiters = [];
    for (const resolve of waiters) {
      resolve(this.getIssues());
    }
  }

  /**
   * Listener errors are logged; they must not break the scan loop
   */
  private broadcast(event: 'progress' | 'complete', ...args: unknown[]): void {
    if (this.disposed) return;
    try {
      this.emit(event, ...args);
    } catch (err) {
      this.logger.error(`Scan ${event} listener failed`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

function settlesWithin(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
  return new Promise(resolve => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    promise.then(
      () => {
        clearTimeout(timer);
        resolve(true);
      },
      () => {
        clearTimeout(timer);
        resolve(true);
      }
    );
  });
}
