import { minimatch } from 'minimatch';
import type { ProgramDescriptor, ScanConfiguration } from '@graphlint/types';
import { isEntryPointClass } from '../graph/conventions.js';

const GLOB_CHARS = /[*?[\]{}]/;

/**
 * Glob patterns go through minimatch, anything else is a substring match
 */
export function matchesPathPattern(path: string, pattern: string): boolean {
  if (GLOB_CHARS.test(pattern)) {
    return minimatch(path, pattern);
  }
  return path.includes(pattern);
}

/**
 * Exclude wins over include; an empty include list accepts everything.
 * Entry-point (game instance) programs are global singletons and skipped.
 */
export function shouldProcessAsset(asset: ProgramDescriptor, config: ScanConfiguration): boolean {
  if (config.excludePaths.some(pattern => matchesPathPattern(asset.id, pattern))) {
    return false;
  }
  if (config.includePaths.length > 0
    && !config.includePaths.some(pattern => matchesPathPattern(asset.id, pattern))) {
    return false;
  }
  return !isEntryPointClass(asset.parent);
}

/**
 * First occurrence of each program id wins
 */
export function dedupeAssets(assets: readonly ProgramDescriptor[]): ProgramDescriptor[] {
  const seen = new Set<string>();
  const result: ProgramDescriptor[] = [];
  for (const asset of assets) {
    if (seen.has(asset.id)) continue;
    seen.add(asset.id);
    result.push(asset);
  }
  return result;
}
