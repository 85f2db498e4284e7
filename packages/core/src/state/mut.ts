/**
 * Mut
 *
 * Shared, deferred-update state cell returned by `useMut`.
 */

import type { ScopeState } from "../compose/scope";

/**
 * A state cell owned by one scope. Reading is immediate; writes are deferred
 * through the runtime's updater and applied before or during the next pass.
 *
 * Handles may be stored and called from anywhere: event handlers, tasks,
 * other scopes. Writes to a cell whose scope was torn down are ignored.
 *
 * @example
 * ```typescript
 * const count = useMut(cx, () => 0);
 * count.update((n) => n + 1); // recomposes the owner next pass
 * count.with((n) => n + 1);   // mutates without recomposing
 * ```
 */
export class Mut<T> {
  constructor(
    private current: T,
    private readonly owner: ScopeState,
  ) {}

  get value(): T {
    return this.current;
  }

  /** Replace the value and mark the owner changed */
  update(fn: (value: T) => T): void {
    this.schedule(fn, true);
  }

  /** Replace the value without marking the owner changed */
  with(fn: (value: T) => T): void {
    this.schedule(fn, false);
  }

  set(value: T): void {
    this.schedule(() => value, true);
  }

  private schedule(fn: (value: T) => T, markChanged: boolean): void {
    const owner = this.owner;
    owner.runtime.update(() => {
      if (owner.disposed) {
        return;
      }
      this.current = fn(this.current);
      if (markChanged) {
        owner.markChanged();
      }
    });
  }
}
