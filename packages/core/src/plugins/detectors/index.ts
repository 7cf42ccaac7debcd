import type { IssueType } from '@graphlint/types';
import type { Detector } from '../Detector.js';
import { DeadNodeDetector } from './DeadNodeDetector.js';
import { OrphanNodeDetector } from './OrphanNodeDetector.js';
import { CastAbuseDetector } from './CastAbuseDetector.js';
import { TickAbuseDetector } from './TickAbuseDetector.js';
import { UnusedFunctionDetector } from './UnusedFunctionDetector.js';

export { DeadNodeDetector, OrphanNodeDetector, CastAbuseDetector, TickAbuseDetector, UnusedFunctionDetector };
export { classifyCastContext } from './CastAbuseDetector.js';
export type { CastContext } from './CastAbuseDetector.js';
export { TICK_COMPLEXITY_THRESHOLD, tickSeverity } from './TickAbuseDetector.js';

/**
 * Detectors in execution order, filtered by the enabled checks
 */
export function createDetectors(enabled: ReadonlySet<IssueType>): Detector[] {
  const all: Detector[] = [
    new DeadNodeDetector(),
    new OrphanNodeDetector(),
    new CastAbuseDetector(),
    new TickAbuseDetector(),
    new UnusedFunctionDetector(),
  ];
  return all.filter(detector => enabled.has(detector.metadata.issueType));
}
