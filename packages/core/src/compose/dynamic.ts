/**
 * Dynamic
 *
 * Type-erased child position. Content with the same structural id is exchanged
 * in place; different content replaces the subtree.
 */

import { useRef } from "../state/hooks";
import { ChildSlot } from "./child-slot";
import type { Scope } from "./scope";
import type { Child, Composable } from "./types";

export class Dynamic implements Composable {
  readonly displayName = "Dynamic";
  private pending: Composable | null;

  constructor(content: Composable) {
    this.pending = content;
  }

  compose(cx: Scope): Child {
    cx.setContainer();
    const slot = useRef(cx, () => new ChildSlot());
    const state = cx.state;

    // Content is consumed by the first run after construction.
    const next = this.pending;
    this.pending = null;
    if (next) {
      slot.set(state, next);
    }
    slot.drive(state, cx.isParentChanged);
    return null;
  }
}

export function dynamic(content: Composable): Dynamic {
  return new Dynamic(content);
}
