/**
 * Configuration loading utilities
 */
export {
  loadConfig,
  DEFAULT_CONFIG,
  validateVersion,
  validatePatterns,
  validateChecks,
  validateConcurrency,
  toScanConfiguration,
  createScanConfiguration,
} from './ConfigLoader.js';
export type { LintConfig } from './ConfigLoader.js';
