/**
 * ProgressRenderer - Formats and displays scan progress for CLI.
 *
 * @example
 * ```typescript
 * const renderer = new ProgressRenderer({ isInteractive: true });
 * linter.onScanProgress(() => renderer.update(linter.getScanProgress()));
 * console.log(renderer.finish(linter.getScanProgress()));
 * ```
 */

import type { ScanProgress } from '@graphlint/core';

export interface ProgressRendererOptions {
  /** Whether output is to a TTY (enables spinner and line overwriting) */
  isInteractive?: boolean;
  /** Minimum milliseconds between display updates (default: 100) */
  throttle?: number;
  /** Custom write function for output (default: process.stdout.write) */
  write?: (text: string) => void;
}

export class ProgressRenderer {
  private progress: ScanProgress | null = null;
  private spinnerIndex: number = 0;
  private isInteractive: boolean;
  private lastDisplayTime: number = 0;
  private displayThrottle: number;
  private write: (text: string) => void;
  private spinnerFrames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

  constructor(options?: ProgressRendererOptions) {
    this.isInteractive = options?.isInteractive ?? process.stdout.isTTY ?? false;
    this.displayThrottle = options?.throttle ?? 100;
    this.write = options?.write ?? ((text: string) => process.stdout.write(text));
  }

  /**
   * Take a progress snapshot and display it if the throttle allows.
   * The last asset of a scan is always displayed.
   */
  update(progress: ScanProgress): void {
    this.progress = progress;
    this.spinnerIndex = (this.spinnerIndex + 1) % this.spinnerFrames.length;

    const now = Date.now();
    const last = progress.processedAssets >= progress.totalAssets;
    if (!last && now - this.lastDisplayTime < this.displayThrottle) {
      return;
    }
    this.lastDisplayTime = now;

    this.display();
  }

  private display(): void {
    const output = this.formatOutput();

    if (this.isInteractive) {
      // Overwrite previous line, pad to clear old content
      this.write(`\r${output.padEnd(80, ' ')}`);
    } else {
      this.write(`${output}\n`);
    }
  }

  formatOutput(): string {
    const progress = this.progress;
    if (!progress) {
      return '';
    }

    const percent = Math.round(progress.percentage * 100);
    const counts = `${progress.processedAssets}/${progress.totalAssets} (${percent}%)`;
    const asset = progress.currentAsset ? ` ${progress.currentAsset}` : '';
    const eta = progress.processedAssets < progress.totalAssets
      ? ` | ETA ${formatSeconds(progress.estimatedTimeRemaining)}`
      : '';

    if (this.isInteractive) {
      // Format: ⠋ Scanning 5/10 (50%) BP_Hero | ETA 3.0s
      return `${this.spinnerFrames[this.spinnerIndex]} Scanning ${counts}${asset}${eta}`;
    }
    return `[scan] ${counts}${asset}${eta}`;
  }

  /**
   * Summary line once the scan has ended
   */
  finish(progress: ScanProgress): string {
    const prefix = this.isInteractive ? '\n' : '';
    const duration = progress.startTime > 0 ? formatSeconds((Date.now() - progress.startTime) / 1000) : '0.0s';
    if (progress.cancelled) {
      return `${prefix}Scan cancelled after ${progress.processedAssets}/${progress.totalAssets} programs, ` +
        `${progress.issuesFound} issues (${duration})`;
    }
    return `${prefix}Scanned ${progress.processedAssets} programs, ${progress.issuesFound} issues (${duration})`;
  }
}

/**
 * "4.2s" below a minute, "2m5s" above
 */
export function formatSeconds(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const rest = Math.floor(seconds % 60);
  return `${minutes}m${rest}s`;
}
