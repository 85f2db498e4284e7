/**
 * # Arbor Kernel
 *
 * Low-level primitives the composition engine builds upon.
 *
 * - **Context** - Pass-scoped state (composer id, pass number) with automatic propagation
 * - **Logger** - Structured pino logging with context injection
 *
 * ```typescript
 * import { Context, Logger } from 'arbor-kernel';
 *
 * Context.run(Context.create({ composerId: 'app', pass: 1 }), () => {
 *   Logger.for('Host').info('inside pass 1');
 * });
 * ```
 *
 * @see {@link KernelContext} - Pass-scoped context
 * @see {@link Logger} - Logger singleton
 *
 * @module arbor-kernel
 */

export * from "./context";
export * from "./logger";
