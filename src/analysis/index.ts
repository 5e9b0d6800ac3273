/**
 * Rule analysis and maturity scoring.
 *
 * @packageDocumentation
 */

export { analyze, detectDomains } from './analyzer.js';
export { score, EMPTY_DESIGN_REASON } from './scorer.js';
export type { Finding, MaturityResult } from './types.js';
