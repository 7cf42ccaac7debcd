/**
 * @graphlint/core - Static analysis engine for visual node-graph programs
 */

// Error types
export {
  LintError,
  ConfigError,
  AssetLoadError,
  DetectorError,
  CorpusFormatError,
} from './errors/LintError.js';
export type { ErrorContext, ErrorSeverity, LintErrorJSON } from './errors/LintError.js';

// Logging
export {
  ConsoleLogger,
  FileLogger,
  MultiLogger,
  createLogger,
  isLogLevel,
  safeStringify,
  formatMessage,
} from './logging/Logger.js';
export type { Logger, LogLevel } from './logging/Logger.js';

// Diagnostics
export { DiagnosticCollector } from './diagnostics/index.js';
export type { Diagnostic, DiagnosticInput, DiagnosticPhase } from './diagnostics/index.js';

// Config
export {
  loadConfig,
  DEFAULT_CONFIG,
  validateVersion,
  validatePatterns,
  validateChecks,
  validateConcurrency,
  toScanConfiguration,
  createScanConfiguration,
} from './config/index.js';
export type { LintConfig } from './config/index.js';

// Version
export { LINT_VERSION, getSchemaVersion } from './version.js';

// Scan orchestrator
export { StaticLinter } from './linter/StaticLinter.js';
export { SCAN_STATE } from './linter/LinterTypes.js';
export type {
  ScanState,
  StaticLinterOptions,
  ScanProgressListener,
  ScanCompleteListener,
} from './linter/LinterTypes.js';
export { ScanTask } from './linter/ScanTask.js';
export type { ScanTaskHost, ScanTaskOptions } from './linter/ScanTask.js';
export { shouldProcessAsset, matchesPathPattern, dedupeAssets } from './linter/assetFilter.js';

// Coordinator and per-scan state
export { Coordinator } from './core/Coordinator.js';
export type { CoordinatorTask, TaskOutcome } from './core/Coordinator.js';
export { ResourceRegistryImpl } from './core/ResourceRegistry.js';
export { ProgramCorpus } from './core/ProgramCorpus.js';

// Graph traversal
export { GraphView, pinsOf, hasAnyLink, findPin } from './graph/GraphView.js';
export { countConnectedNodes, isNodeInContext } from './graph/traversal.js';
export type { NodePredicate } from './graph/traversal.js';
export {
  isTickEvent,
  isLoopNode,
  isPureNode,
  hasExecPins,
  classChain,
  isChildOf,
  isEntryPointClass,
  isInterfaceProgram,
  isHardReferenceTarget,
  overridesParentFunction,
  allInterfaces,
} from './graph/conventions.js';

// Cross-program references
export {
  ReferenceRegistry,
  REFERENCE_REGISTRY_ID,
  timerFunctionName,
  boundCustomEvents,
} from './references/ReferenceRegistry.js';

// Detectors
export { Detector } from './plugins/Detector.js';
export type { DetectorContext, DetectorMetadata, IssueFields } from './plugins/Detector.js';
export {
  DeadNodeDetector,
  OrphanNodeDetector,
  CastAbuseDetector,
  TickAbuseDetector,
  UnusedFunctionDetector,
  createDetectors,
  classifyCastContext,
  tickSeverity,
  TICK_COMPLEXITY_THRESHOLD,
} from './plugins/detectors/index.js';
export type { CastContext } from './plugins/detectors/index.js';

// Asset sources
export { InMemoryAssetSource } from './sources/InMemoryAssetSource.js';
export { parseCorpus, parseProgram } from './sources/parseCorpus.js';
export { loadCorpusFile } from './sources/corpusFile.js';

// Re-export shared types for convenience
export * from '@graphlint/types';
