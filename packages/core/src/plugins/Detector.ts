/**
 * Base Detector class
 *
 * DETECTOR CONTRACT:
 *
 * 1. Metadata - name and the issue type it emits
 * 2. Detect - pure analysis of one program's graphs
 * 3. Return value - issues in discovery order
 *
 * Detectors never mutate program data. Shared cross-program state goes
 * through the scan's ResourceRegistry.
 */

import type {
  DetectorMetadata,
  LintIssue,
  Logger,
  Program,
  ResourceRegistry,
  ScanConfiguration,
  Severity,
} from '@graphlint/types';
import type { GraphView } from '../graph/GraphView.js';
import type { ProgramCorpus } from '../core/ProgramCorpus.js';
import { ReferenceRegistry, REFERENCE_REGISTRY_ID } from '../references/ReferenceRegistry.js';

export type { DetectorMetadata };

/**
 * Everything a detector sees for one program
 */
export interface DetectorContext {
  program: Program;
  graphs: readonly GraphView[];
  /** Scan-scoped shared state */
  resources: ResourceRegistry;
  corpus: ProgramCorpus;
  config: ScanConfiguration;
  logger?: Logger;
}

export interface IssueFields {
  nodeName: string;
  description: string;
  severity: Severity;
  nodeId?: string;
  graphName?: string;
}

export abstract class Detector {
  abstract get metadata(): DetectorMetadata;

  abstract detect(context: DetectorContext): LintIssue[];

  protected issue(context: DetectorContext, fields: IssueFields): LintIssue {
    return {
      type: this.metadata.issueType,
      programPath: context.program.path,
      ...fields,
    };
  }

  /**
   * The scan's reference registry, created on first use
   */
  protected references(context: DetectorContext): ReferenceRegistry {
    return context.resources.getOrCreate(REFERENCE_REGISTRY_ID, () => new ReferenceRegistry());
  }

  /**
   * Logger from context, console otherwise
   */
  protected log(context: DetectorContext): Logger {
    if (context.logger) {
      return context.logger;
    }

    const format = (msg: string, ctx?: Record<string, unknown>) =>
      ctx ? `${msg} ${JSON.stringify(ctx)}` : msg;

    return {
      error: (msg: string, ctx?: Record<string, unknown>) =>
        console.error(`[ERROR] [${this.metadata.name}] ${format(msg, ctx)}`),
      warn: (msg: string, ctx?: Record<string, unknown>) =>
        console.warn(`[WARN] [${this.metadata.name}] ${format(msg, ctx)}`),
      info: (msg: string, ctx?: Record<string, unknown>) =>
        console.log(`[INFO] [${this.metadata.name}] ${format(msg, ctx)}`),
      debug: (msg: string, ctx?: Record<string, unknown>) =>
        console.debug(`[DEBUG] [${this.metadata.name}] ${format(msg, ctx)}`),
      trace: (msg: string, ctx?: Record<string, unknown>) =>
        console.debug(`[TRACE] [${this.metadata.name}] ${format(msg, ctx)}`),
    };
  }
}
