/**
 * # Arbor
 *
 * Reactive composition runtime. A tree of stateful composables is built
 * from a root and recomposed incrementally: only nodes whose own state or an
 * ancestor's state changed run `compose` again.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Composer, fromFn, useMut, useTask } from 'arbor';
 *
 * const Counter = fromFn((cx) => {
 *   const count = useMut(cx, () => 0);
 *   useTask(cx, async () => count.update((n) => n + 1));
 *   return null;
 * }, 'Counter');
 *
 * const composer = new Composer(Counter);
 * await composer.compose();
 * ```
 *
 * ## Building Blocks
 *
 * - **Composer** - runs passes: local tasks, queued updates, then the tree
 * - **Hooks** - `useRef`, `useMut`, `useMemo`, `useProvider`, `useTask` and more
 * - **Combinators** - `seq`, `optional`, `dynamic`, `memo`, `fromIter`, `catchError`
 * - **Runtime** - scope arena, update queue and task queue behind one composer
 *
 * @see {@link Composer}
 * @see {@link Composable}
 *
 * @module arbor
 */

// Composition contract
export * from "./compose/types";
export { ContextFrame, ContextKey, createContext, provide, type ContextProvision } from "./compose/context";
export { Scope, ScopeState, type ScopeKey } from "./compose/scope";
export { ErasedNode } from "./compose/node";
export { ChildSlot, driveNode, toComposable } from "./compose/child-slot";

// Combinators
export * from "./compose/sequence";
export * from "./compose/optional";
export * from "./compose/catch";
export * from "./compose/result";
export * from "./compose/dynamic";
export * from "./compose/memo";
export * from "./compose/from-iter";
export * from "./compose/from-fn";

// State
export * from "./state/hooks";
export { Mut } from "./state/mut";

// Runtime
export { Runtime, type LocalTaskGenerator, type PassStats, type TaskKey } from "./runtime/runtime";
export * from "./runtime/executor";
export * from "./runtime/updater";
export { SlotMap, type SlotKey } from "./runtime/slot-map";

// Composer
export * from "./composer";
export * from "./config";

export {
  AbortError,
  ArborError,
  CompositionError,
  ContextError,
  HookOrderError,
  ScopeError,
  StateError,
  ValidationError,
} from "arbor-shared";
