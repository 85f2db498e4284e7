/**
 * Child Slots and Driving
 *
 * A `ChildSlot` is one child position: the erased node mounted there and the
 * key of its scope. Every combinator builds on it to mount, exchange in place,
 * tear down and drive children.
 */

import { ValidationError, ensureError } from "arbor-shared";
import type { Runtime } from "../runtime/runtime";
import { ErasedNode } from "./node";
import type { ScopeKey, ScopeState } from "./scope";
import { Sequence } from "./sequence";
import { isComposable, type Child, type Composable } from "./types";

function isChildList(child: Child): child is readonly Child[] {
  return Array.isArray(child);
}

/**
 * Normalize a child value: unit becomes `null`, arrays become a `Sequence`.
 */
export function toComposable(child: Child): Composable | null {
  if (child === null || child === undefined) {
    return null;
  }
  if (isChildList(child)) {
    return new Sequence(child);
  }
  if (isComposable(child)) {
    return child;
  }
  throw ValidationError.type("child", "a composable, an array of children or null", typeof child);
}

/**
 * Drive one node: decide skip or run, then recurse into its primary child.
 *
 * A node runs when it never completed a run, when its own changed flag is set
 * (the flag is cleared here), when its parent changed, or when it is a
 * container. A skipped node still recurses with `parentChanged = false`, so
 * descendants that changed themselves recompose.
 *
 * An exception thrown while running the node is reported to the runtime. The
 * node's mounted child is torn down and the node runs again on the next pass;
 * its siblings are still driven.
 */
export function driveNode(node: ErasedNode, state: ScopeState): void {
  const runtime = state.runtime;
  const changed = state.changed;
  state.changed = false;

  if (state.mounted && !changed && !state.parentChanged && !state.container) {
    runtime.recordSkip(state);
    state.child.drive(state, false);
    return;
  }

  let next: Composable | null;
  try {
    const child = node.compose(state);
    // Containers drive their own children from inside compose.
    next = state.container ? null : toComposable(child);
  } catch (error) {
    // The cached subtree is stale; tear it down and run again next pass.
    state.child.clear(runtime);
    state.changed = true;
    runtime.reportError(ensureError(error));
    return;
  }
  runtime.recordRun(state);

  if (state.container) {
    return;
  }
  if (next === null) {
    state.empty = true;
    state.child.clear(runtime);
    return;
  }

  state.empty = false;
  state.child.set(state, next);
  state.child.drive(state, true);
}

export class ChildSlot {
  private node: ErasedNode | null = null;
  private scopeKey: ScopeKey | null = null;

  get current(): ErasedNode | null {
    return this.node;
  }

  get key(): ScopeKey | null {
    return this.scopeKey;
  }

  get isMounted(): boolean {
    return this.node !== null;
  }

  /**
   * Place `value` in the slot. Exchanges in place when the structural ids
   * match; otherwise tears down what is mounted and mounts fresh.
   *
   * @returns true when a fresh node was mounted
   */
  set(parent: ScopeState, value: Composable): boolean {
    if (this.node && this.node.accepts(value)) {
      this.node.exchange(value);
      return false;
    }

    this.clear(parent.runtime);
    const node = new ErasedNode(value);
    this.scopeKey = parent.runtime.createScope(parent, node.name).key;
    this.node = node;
    return true;
  }

  /** Tear down whatever is mounted; its drop callbacks run. */
  clear(runtime: Runtime): void {
    const key = this.scopeKey;
    this.node = null;
    this.scopeKey = null;
    if (key !== null) {
      runtime.removeScope(key);
    }
  }

  /**
   * Refresh the mounted child's contexts from `parent` and drive it.
   */
  drive(parent: ScopeState, parentChanged: boolean): void {
    if (this.node === null || this.scopeKey === null) {
      return;
    }
    const state = parent.runtime.scope(this.scopeKey);
    state.contexts = parent.childContexts();
    state.parentChanged = parentChanged;
    driveNode(this.node, state);
  }

  /**
   * Normalize `child`, then clear the slot for unit or set and drive it otherwise.
   */
  sync(parent: ScopeState, child: Child, parentChanged: boolean): void {
    const next = toComposable(child);
    if (next === null) {
      this.clear(parent.runtime);
      return;
    }
    this.set(parent, next);
    this.drive(parent, parentChanged);
  }
}
