/**
 * Erased Node
 *
 * Uniform wrapper around any composable: structural id, checked in-place
 * exchange, and one run of `compose` under a pass-scoped handle.
 */

import { StateError } from "arbor-shared";
import { Scope, type ScopeState } from "./scope";
import {
  composableName,
  structuralIdOf,
  type Child,
  type Composable,
  type StructuralId,
} from "./types";

export class ErasedNode {
  private current: Composable;
  readonly id: StructuralId;
  readonly name: string;

  constructor(value: Composable) {
    this.current = value;
    this.id = structuralIdOf(value);
    this.name = composableName(value);
  }

  get value(): Composable {
    return this.current;
  }

  /** Whether `next` may replace the stored value in place */
  accepts(next: Composable): boolean {
    return structuralIdOf(next) === this.id;
  }

  /**
   * Replace the stored value, keeping the node's scope and hooks.
   * Throws when the structural ids differ.
   */
  exchange(next: Composable): void {
    if (!this.accepts(next)) {
      throw StateError.structuralMismatch(this.name, composableName(next));
    }
    this.current = next;
  }

  /**
   * Run `compose` once against `state`. The handle given to `compose` is
   * revoked when it returns, and the hook sequence is verified.
   */
  compose(state: ScopeState): Child {
    const cx = new Scope(state);
    state.beginPass();
    try {
      const child = this.current.compose(cx);
      state.endPass();
      return child;
    } finally {
      cx.revoke();
    }
  }
}
