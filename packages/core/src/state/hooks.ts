/**
 * Hooks
 *
 * Persistent per-scope state addressed by call order. Each hook takes the
 * pass-scoped `Scope` as its first argument and consumes exactly one slot.
 *
 * Rules of Hooks:
 * 1. Only call hooks at the top level of `compose`
 * 2. Call the same hooks in the same order every pass
 *
 * Breaking rule 2 throws `HookOrderError` instead of reading the wrong slot.
 */

import { AbortError, ContextError } from "arbor-shared";
import type { ContextKey } from "../compose/context";
import type { Scope } from "../compose/scope";
import { HookTag } from "../compose/types";
import { ExecutorContext } from "../runtime/executor";
import type { LocalTaskGenerator } from "../runtime/runtime";
import { dependencyEquals, snapshotDependency } from "../utils/dependency";
import { Mut } from "./mut";

// ============================================================================
// STATE HOOKS
// ============================================================================

/**
 * Value created once with `make` and returned on every later pass.
 * Mutating it does not recompose anything.
 */
export function useRef<T>(cx: Scope, make: () => T): T {
  return cx.access("useRef").slot(HookTag.Ref, make).value;
}

/**
 * State cell whose writes recompose this node on the next pass.
 */
export function useMut<T>(cx: Scope, make: () => T): Mut<T> {
  const state = cx.access("useMut");
  return state.slot(HookTag.Mut, () => new Mut(make(), state)).value;
}

// ============================================================================
// CONTEXT HOOKS
// ============================================================================

/**
 * Nearest ancestor's value for `key`. Throws `ContextError` when none provides it.
 * Does not consume a hook slot.
 */
export function useContext<T>(cx: Scope, key: ContextKey<T>): T {
  const entry = key.read(cx.access("useContext").contexts);
  if (!entry) {
    throw ContextError.notFound(key.name);
  }
  return entry.value;
}

export function tryUseContext<T>(cx: Scope, key: ContextKey<T>): T | undefined {
  return key.read(cx.access("tryUseContext").contexts)?.value;
}

/**
 * Provide a value for `key` to every descendant. `make` runs once; the same
 * value is provided on every pass.
 */
export function useProvider<T>(cx: Scope, key: ContextKey<T>, make: () => T): T {
  const state = cx.access("useProvider");
  const { value } = state.slot(HookTag.Provider, make);
  key.write(state.provided, value);
  return value;
}

// ============================================================================
// MEMOIZATION HOOKS
// ============================================================================

/**
 * Recompute `make` only when `dependency` changed since the last pass.
 */
export function useMemo<T>(cx: Scope, dependency: unknown, make: () => T): T {
  const memo = cx.access("useMemo").slot(HookTag.Memo, () => ({
    value: make(),
    dependency: snapshotDependency(dependency),
  })).value;

  if (!dependencyEquals(memo.dependency, dependency)) {
    memo.value = make();
    memo.dependency = snapshotDependency(dependency);
  }
  return memo.value;
}

/**
 * Stable function identity whose body always calls the latest `fn`.
 */
export function useCallback<Args extends unknown[], R>(
  cx: Scope,
  fn: (...args: Args) => R,
): (...args: Args) => R {
  const holder = cx.access("useCallback").slot(HookTag.Callback, () => {
    const created: { target: (...args: Args) => R; handle: (...args: Args) => R } = {
      target: fn,
      handle: (...args) => created.target(...args),
    };
    return created;
  }).value;
  holder.target = fn;
  return holder.handle;
}

// ============================================================================
// LIFECYCLE HOOKS
// ============================================================================

/**
 * Run `fn` once when this scope is torn down. The latest `fn` wins.
 */
export function useDrop(cx: Scope, fn: () => void): void {
  const state = cx.access("useDrop");
  const holder = state.slot(HookTag.Drop, () => {
    const created = { fn };
    state.onTeardown(() => created.fn());
    return created;
  }).value;
  holder.fn = fn;
}

// ============================================================================
// TASK HOOKS
// ============================================================================

/**
 * Start a cooperative task on the composer's own loop on the first pass.
 *
 * The generator is resumed once per pass while it is ready. Yielding a
 * promise parks it until the promise settles; the settled value (or error)
 * is sent back in. Teardown of the scope cancels it.
 *
 * @example
 * ```typescript
 * const status = useMut(cx, () => 'loading');
 * useLocalTask(cx, function* () {
 *   const data = yield fetchData();
 *   status.set(`loaded ${data}`);
 * });
 * ```
 */
export function useLocalTask(cx: Scope, make: () => LocalTaskGenerator): void {
  const state = cx.access("useLocalTask");
  state.slot(HookTag.LocalTask, () => {
    const key = state.runtime.spawnLocal(state.key, make());
    state.onTeardown(() => state.runtime.cancelLocal(key));
    return key;
  });
}

/**
 * Start an asynchronous task on the contextual executor on the first pass.
 * The signal aborts with an `AbortError` when this scope is torn down.
 *
 * @example
 * ```typescript
 * const ticks = useMut(cx, () => 0);
 * useTask(cx, async (signal) => {
 *   for await (const _ of setInterval(1000, null, { signal })) {
 *     ticks.update((n) => n + 1);
 *   }
 * });
 * ```
 */
export function useTask(cx: Scope, make: (signal: AbortSignal) => Promise<void>): void {
  const state = cx.access("useTask");
  const executor = useContext(cx, ExecutorContext);
  state.slot(HookTag.Task, () => {
    const controller = new AbortController();
    state.runtime.spawn(executor, () => make(controller.signal));
    state.onTeardown(() => controller.abort(new AbortError("Scope torn down")));
    return controller;
  });
}
