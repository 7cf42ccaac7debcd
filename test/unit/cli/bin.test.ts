/**
 * CLI entry point packaging tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

const root = join(dirname(fileURLToPath(import.meta.url)), '..', '..', '..');

function runtimeDependencies(manifestPath: string): string[] {
  const manifest: unknown = JSON.parse(readFileSync(join(root, manifestPath), 'utf-8'));
  if (typeof manifest !== 'object' || manifest === null || !('dependencies' in manifest)) {
    return [];
  }
  const dependencies = manifest.dependencies;
  return typeof dependencies === 'object' && dependencies !== null ? Object.keys(dependencies) : [];
}

describe('graphlint bin', () => {
  it('should load its TypeScript source through tsx', () => {
    const shebang = readFileSync(join(root, 'packages/cli/src/cli.ts'), 'utf-8').split('\n')[0];

    assert.strictEqual(shebang, '#!/usr/bin/env -S node --import tsx');
  });

  it('should install tsx with the packages that ship the bin', () => {
    assert.ok(runtimeDependencies('package.json').includes('tsx'));
    assert.ok(runtimeDependencies('packages/cli/package.json').includes('tsx'));
  });
});
