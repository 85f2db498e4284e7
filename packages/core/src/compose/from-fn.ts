/**
 * FromFn
 *
 * Composable from a plain function.
 */

import type { Scope } from "./scope";
import { STRUCTURAL_ID, type Child, type Composable, type StructuralId } from "./types";

export type ComposeFn = (cx: Scope) => Child;

export class FromFn implements Composable {
  readonly [STRUCTURAL_ID]: StructuralId;
  readonly displayName: string;

  constructor(
    readonly fn: ComposeFn,
    name?: string,
  ) {
    // Unnamed functions all share one id and exchange in place with each other.
    this[STRUCTURAL_ID] = name ?? FromFn;
    this.displayName = name ?? "FromFn";
  }

  compose(cx: Scope): Child {
    return this.fn(cx);
  }
}

/**
 * @example
 * ```typescript
 * const Clock = fromFn((cx) => {
 *   const now = useMut(cx, () => Date.now());
 *   useTask(cx, async (signal) => { ... });
 *   return new Label(String(now.value));
 * }, 'Clock');
 * ```
 */
export function fromFn(fn: ComposeFn, name?: string): FromFn {
  return new FromFn(fn, name);
}
