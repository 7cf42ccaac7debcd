/**
 * @graphlint/types - Type definitions for graphlint
 */

// Graph nodes and pins
export * from './nodes.js';

// Programs and graphs
export * from './programs.js';

// Issues and severities
export * from './issues.js';

// Logger and detector contracts
export * from './plugins.js';

// Resource types
export * from './resources.js';

// Scan configuration, progress and asset source
export * from './scan.js';
