/**
 * Design Analysis Engine.
 *
 * @packageDocumentation
 */

export { DesignAnalysisEngine } from './engine.js';
export type { DesignAnalysisEngineOptions } from './engine.js';
export { createEngine } from './factory.js';
export type { CreateEngineOptions } from './factory.js';
export { emptyAnalysisPayload, NO_DESIGN_CONTENT_REASON } from './types.js';
export type { AnalysisPayload } from './types.js';
