/**
 * # Arbor Shared
 *
 * Platform-independent pieces shared across all Arbor packages: the error
 * hierarchy and its type guards.
 *
 * ```typescript
 * import { ContextError, isHookOrderError } from 'arbor-shared';
 * ```
 *
 * Test helpers live under `arbor-shared/testing`.
 *
 * @module arbor-shared
 */

export * from "./errors";
