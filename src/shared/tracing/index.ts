/**
 * Span Tracing
 *
 * Nested spans forming a tree, a current span carried through async
 * execution, and the store-independent contracts the backends implement.
 *
 * ## Usage
 *
 * ```typescript
 * import { trace, withTrace } from './tracing';
 *
 * const load = trace(async function load(id: string) { ... });
 *
 * await tracing.run(async () => {
 *   await withTrace('batch', async () => {
 *     await load('a');
 *   });
 * });
 * ```
 *
 * @module tracing
 */

export * from './types.js';
export * from './ids.js';
export * from './constants.js';
export * from './context.js';
export * from './span.js';
export * from './tracing.js';
export * from './trace.js';
export * from './span-ref.js';
export * from './propagation.js';
export * from './tree.js';
