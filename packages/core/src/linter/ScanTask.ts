/**
 * ScanTask - background batch loop of an asynchronous scan
 *
 * The task never touches program data. For each asset it posts the
 * analysis to the Coordinator and waits in short slices, checking the
 * abort signal on every wake-up. Up to `depth` hand-offs may be queued
 * at once; on abort, hand-offs that have not started are withdrawn and
 * the one already running finishes.
 */

import { setTimeout as sleep } from 'timers/promises';
import type { Logger, ProgramDescriptor } from '@graphlint/types';
import type { Coordinator, CoordinatorTask } from '../core/Coordinator.js';

/**
 * Coordinator-side callbacks. The task holds the host for its whole run.
 */
export interface ScanTaskHost {
  processAsset(asset: ProgramDescriptor): void;
  completeScan(): void;
}

export interface ScanTaskOptions {
  host: ScanTaskHost;
  assets: readonly ProgramDescriptor[];
  coordinator: Coordinator;
  signal: AbortSignal;
  /** Maximum hand-offs queued on the coordinator */
  depth: number;
  waitSliceMs: number;
  logger: Logger;
}

export class ScanTask {
  private readonly options: ScanTaskOptions;
  private running: Promise<void> | null = null;

  constructor(options: ScanTaskOptions) {
    this.options = options;
  }

  start(): void {
    if (this.running) return;
    this.running = this.run().catch((error: unknown) => {
      this.options.logger.error('Scan task failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  /** Resolves once the loop has stopped, including the completion hand-off */
  get done(): Promise<void> {
    return this.running ?? Promise.resolve();
  }

  private async run(): Promise<void> {
    const { assets, coordinator, signal, host, logger } = this.options;
    const depth = Math.max(1, this.options.depth);
    const inFlight: CoordinatorTask<void>[] = [];
    let next = 0;

    while (next < assets.length || inFlight.length > 0) {
      while (!signal.aborted && next < assets.length && inFlight.length < depth) {
        const asset = assets[next++];
        inFlight.push(coordinator.post(() => host.processAsset(asset)));
      }

      const head = inFlight.shift();
      if (!head) break;

      const outcome = await this.waitFor(head);
      if (outcome === 'failed') {
        logger.warn('Asset hand-off failed, continuing with next asset');
      }

      if (signal.aborted) {
        const dropped = inFlight.filter(task => task.withdraw()).length;
        logger.debug('Scan task stopping on cancellation', { dropped, remaining: assets.length - next });
        return;
      }
    }

    const completion = coordinator.post(() => host.completeScan());
    await completion.result;
  }

  /**
   * Slice-bounded wait; a task that has not started when the signal
   * fires is withdrawn.
   */
  private async waitFor(task: CoordinatorTask<void>): Promise<'done' | 'failed' | 'withdrawn'> {
    const { signal, waitSliceMs } = this.options;

    while (!task.settled) {
      if (signal.aborted && task.withdraw()) {
        return 'withdrawn';
      }
      const slice = new AbortController();
      try {
        await Promise.race([task.result, sleep(waitSliceMs, undefined, { signal: slice.signal })]);
      } finally {
        slice.abort();
      }
    }

    const outcome = await task.result;
    return outcome.status;
  }
}
