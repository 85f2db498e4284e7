/**
 * Composable Types
 *
 * The compose contract, child values and structural identity.
 */

import type { Scope } from "./scope";

/**
 * Property a composable may set to override its structural id.
 * Values without it are identified by their constructor.
 */
export const STRUCTURAL_ID: unique symbol = Symbol.for("arbor.structural-id");

/**
 * Tag deciding whether two composables are interchangeable.
 * Equal ids exchange in place (hooks survive); different ids rebuild.
 */
// eslint-disable-next-line @typescript-eslint/ban-types
export type StructuralId = Function | string | symbol;

/**
 * A unit of behavior: `compose` runs whenever the node's own state or an
 * ancestor's state changed, and returns the node's single child.
 *
 * Field data is read from `this`. Anything that must outlive the pass goes
 * through hooks on `cx`; the scope itself must never be stored.
 *
 * @example
 * ```typescript
 * class Greeting implements Composable {
 *   constructor(readonly name: string) {}
 *
 *   compose(cx: Scope) {
 *     const visits = useRef(cx, () => ({ count: 0 }));
 *     visits.count++;
 *     return new Label(`Hello ${this.name}`);
 *   }
 * }
 * ```
 */
export interface Composable {
  compose(cx: Scope): Child;
  readonly [STRUCTURAL_ID]?: StructuralId;
  /** Name shown in logs and debug trees */
  readonly displayName?: string;
}

/**
 * What `compose` may return.
 * `null`, `undefined` and no return at all are the unit composable;
 * arrays compose as a sequence.
 */
export type Child = Composable | readonly Child[] | null | undefined | void;

/**
 * Hook slot tags, recorded on the first pass and checked on every later one.
 */
export const HookTag = {
  Ref: "ref",
  Mut: "mut",
  Provider: "provider",
  Memo: "memo",
  Drop: "drop",
  Callback: "callback",
  LocalTask: "local-task",
  Task: "task",
} as const;

export type HookTag = (typeof HookTag)[keyof typeof HookTag];

export function isComposable(value: unknown): value is Composable {
  return (
    typeof value === "object" &&
    value !== null &&
    "compose" in value &&
    typeof value.compose === "function"
  );
}

export function structuralIdOf(value: Composable): StructuralId {
  return value[STRUCTURAL_ID] ?? value.constructor;
}

export function composableName(value: Composable): string {
  if (value.displayName) {
    return value.displayName;
  }
  const name = value.constructor.name;
  return name && name !== "Object" ? name : "Anonymous";
}
