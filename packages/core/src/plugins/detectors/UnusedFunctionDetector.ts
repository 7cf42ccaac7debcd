/**
 * UnusedFunctionDetector - finds functions and macros nothing calls
 *
 * A function may only be called from another program, so the check
 * runs against the scan's corpus-wide ReferenceRegistry, built on first
 * use, plus a substring scan of every other program's call nodes.
 *
 * Never reported:
 * - functions of interface programs and of entry-point programs
 * - lifecycle hooks and engine naming patterns
 * - overrides of parent functions and interface-mandated functions
 * - programs outside the analyzed root
 */

import type { LintIssue, Program } from '@graphlint/types';
import { ISSUE_TYPE, SEVERITY } from '@graphlint/types';
import { Detector } from '../Detector.js';
import type { DetectorContext, DetectorMetadata } from '../Detector.js';
import type { ReferenceRegistry } from '../../references/ReferenceRegistry.js';
import {
  ENGINE_FUNCTION_PATTERNS,
  ENGINE_MACRO_PREFIXES,
  ENGINE_ROOT,
  LIFECYCLE_PREFIX,
  allInterfaces,
  isEntryPointClass,
  isInterfaceProgram,
  overridesParentFunction,
} from '../../graph/conventions.js';

export class UnusedFunctionDetector extends Detector {
  get metadata(): DetectorMetadata {
    return {
      name: 'UnusedFunctionDetector',
      issueType: ISSUE_TYPE.UNUSED_FUNCTION,
      description: 'Functions and macros never called anywhere in the project',
    };
  }

  detect(context: DetectorContext): LintIssue[] {
    const { program, config } = context;
    const logger = this.log(context);

    if (isInterfaceProgram(program) || isEntryPointClass(program.parent)) {
      return [];
    }
    if (!isUnderRoot(program.path, config.rootPath)) {
      return [];
    }

    const registry = this.references(context);
    if (!registry.isCorpusCollected) {
      const corpus = context.corpus.programs();
      registry.collectCorpus(corpus);
      logger.debug('Reference registry built', { programs: corpus.length, names: registry.size });
    }

    const issues: LintIssue[] = [];

    for (const view of context.graphs) {
      if (view.category === 'function') {
        const name = view.name;
        if (this.isExempt(program, name)) continue;
        if (isCalled(name, program, registry, context.corpus.programs())) continue;

        issues.push(this.issue(context, {
          nodeName: name,
          description: `Function '${name}' is defined but never called`,
          severity: SEVERITY.MEDIUM,
          graphName: name,
        }));
      } else if (view.category === 'macro') {
        const name = view.name;
        if (ENGINE_MACRO_PREFIXES.some(prefix => name.startsWith(prefix))) continue;
        if (registry.isMacroUsed(name)) continue;

        issues.push(this.issue(context, {
          nodeName: name,
          description: `Macro '${name}' is defined but never used`,
          severity: SEVERITY.LOW,
          graphName: name,
        }));
      }
    }

    return issues;
  }

  private isExempt(program: Program, name: string): boolean {
    if (name.startsWith(LIFECYCLE_PREFIX)) return true;
    if (ENGINE_FUNCTION_PATTERNS.some(pattern => name.includes(pattern))) return true;
    if (overridesParentFunction(program, name)) return true;
    return allInterfaces(program).some(iface => iface.functions.includes(name));
  }
}

function isUnderRoot(path: string, rootPath: string): boolean {
  if (path.startsWith(ENGINE_ROOT)) {
    return false;
  }
  const root = rootPath.endsWith('/') ? rootPath : `${rootPath}/`;
  return path.startsWith(root);
}

function isCalled(
  name: string,
  program: Program,
  registry: ReferenceRegistry,
  corpus: readonly Program[]
): boolean {
  if (registry.isReferenced(name)) {
    return true;
  }

  for (const other of corpus) {
    if (other.path === program.path) continue;
    for (const graph of other.graphs) {
      for (const node of graph.nodes) {
        if (node.kind === 'CallFunction'
          && (node.functionName === name || node.functionName.includes(name))) {
          return true;
        }
      }
    }
  }
  return false;
}
