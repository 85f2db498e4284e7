/**
 * Sequence
 *
 * Fixed fan-out: one persistent child scope per position. Any array returned
 * from `compose` becomes a sequence.
 */

import { useRef } from "../state/hooks";
import { ChildSlot } from "./child-slot";
import type { Scope } from "./scope";
import type { Child, Composable } from "./types";

export class Sequence implements Composable {
  readonly displayName = "Sequence";

  constructor(readonly children: readonly Child[]) {}

  compose(cx: Scope): Child {
    cx.setContainer();
    const slots = useRef(cx, (): ChildSlot[] => []);
    const state = cx.state;
    const parentChanged = cx.isParentChanged;

    while (slots.length > this.children.length) {
      slots.pop()?.clear(state.runtime);
    }

    this.children.forEach((child, index) => {
      const slot = slots[index] ?? new ChildSlot();
      slots[index] = slot;
      slot.sync(state, child, parentChanged);
    });

    return null;
  }
}

/**
 * Compose several children side by side.
 *
 * @example
 * ```typescript
 * compose(cx) {
 *   return seq(new Header(), new Body(), new Footer());
 * }
 * ```
 */
export function seq(...children: Child[]): Sequence {
  return new Sequence(children);
}
