/**
 * Diagnostics - faults collected during a scan
 */

export { DiagnosticCollector } from './DiagnosticCollector.js';
export type { Diagnostic, DiagnosticInput, DiagnosticPhase } from './DiagnosticCollector.js';
