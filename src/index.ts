/**
 * Design Mentor
 *
 * Rule-based design analysis engine: missing-concept detection, maturity
 * scoring, a suggestion lifecycle and version tracking for system-design
 * documents, with optional LLM enrichment.
 *
 * @packageDocumentation
 */

export * from './analysis/index.js';
export * from './concepts/index.js';
export * from './config/index.js';
export * from './engine/index.js';
export * from './enrichment/index.js';
export * from './lifecycle/index.js';
export * from './store/index.js';
export { Logger, toError } from './utils/logger.js';
export type { LogEntry, LogLevel, LoggerOptions } from './utils/logger.js';
