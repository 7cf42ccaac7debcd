/**
 * DiagnosticCollector - Collects faults raised while scanning programs
 *
 * Load failures and detector faults never stop a scan. They are logged
 * and recorded here so callers can inspect them after the scan.
 *
 * Usage:
 *   const collector = new DiagnosticCollector();
 *   collector.addError('load', error, { programPath });
 *
 *   if (collector.hasErrors()) {
 *     console.log(collector.toDiagnosticsLog());
 *   }
 */

import { LintError } from '../errors/LintError.js';

/**
 * Where in per-program processing the fault happened
 */
export type DiagnosticPhase = 'load' | 'detect';

export interface Diagnostic {
  code: string;
  severity: 'fatal' | 'error' | 'warning' | 'info';
  message: string;
  phase: DiagnosticPhase;
  programPath?: string;
  detector?: string;
  timestamp: number;
  suggestion?: string;
}

/**
 * Diagnostic input (timestamp is set on add)
 */
export type DiagnosticInput = Omit<Diagnostic, 'timestamp'>;

export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];

  /**
   * Record a thrown value. LintError instances keep their code and
   * severity; anything else becomes ERR_UNKNOWN.
   */
  addError(phase: DiagnosticPhase, error: unknown, fallback: { programPath?: string; detector?: string } = {}): void {
    if (error instanceof LintError) {
      const programPath = typeof error.context.programPath === 'string' ? error.context.programPath : fallback.programPath;
      const detector = typeof error.context.detector === 'string' ? error.context.detector : fallback.detector;
      this.add({
        code: error.code,
        severity: error.severity,
        message: error.message,
        phase,
        programPath,
        detector,
        suggestion: error.suggestion,
      });
      return;
    }

    this.add({
      code: 'ERR_UNKNOWN',
      severity: 'error',
      message: error instanceof Error ? error.message : String(error),
      phase,
      ...fallback,
    });
  }

  add(diagnostic: DiagnosticInput): void {
    this.diagnostics.push({
      ...diagnostic,
      timestamp: Date.now(),
    });
  }

  /**
   * Copy of all diagnostics
   */
  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getByPhase(phase: DiagnosticPhase): Diagnostic[] {
    return this.diagnostics.filter(d => d.phase === phase);
  }

  getByCode(code: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.code === code);
  }

  hasErrors(): boolean {
    return this.diagnostics.some(d => d.severity === 'error' || d.severity === 'fatal');
  }

  count(): number {
    return this.diagnostics.length;
  }

  /**
   * One JSON object per line
   */
  toDiagnosticsLog(): string {
    return this.diagnostics.map(d => JSON.stringify(d)).join('\n');
  }

  clear(): void {
    this.diagnostics = [];
  }
}
