/**
 * Optional
 *
 * Zero or one child. Switching to `null` tears the child down; switching back
 * mounts it fresh.
 */

import { useRef } from "../state/hooks";
import { ChildSlot } from "./child-slot";
import type { Scope } from "./scope";
import type { Child, Composable } from "./types";

export class Optional implements Composable {
  readonly displayName = "Optional";

  constructor(readonly content: Composable | null | undefined) {}

  compose(cx: Scope): Child {
    cx.setContainer();
    const slot = useRef(cx, () => new ChildSlot());
    const state = cx.state;

    if (this.content === null || this.content === undefined) {
      slot.clear(state.runtime);
    } else {
      slot.set(state, this.content);
      slot.drive(state, cx.isParentChanged);
    }
    return null;
  }
}

export function optional(content: Composable | null | undefined): Optional {
  return new Optional(content);
}
