/**
 * FromIter
 *
 * Dynamic fan-out keyed by position. Growing keeps existing entries' state;
 * shrinking tears down the tail.
 */

import { useRef } from "../state/hooks";
import { ChildSlot } from "./child-slot";
import type { Scope } from "./scope";
import type { Child, Composable } from "./types";

export class FromIter<T> implements Composable {
  readonly displayName = "FromIter";

  constructor(
    readonly items: Iterable<T>,
    readonly makeItem: (item: T, index: number) => Child,
  ) {}

  compose(cx: Scope): Child {
    cx.setContainer();
    const slots = useRef(cx, (): ChildSlot[] => []);
    const state = cx.state;
    const parentChanged = cx.isParentChanged;
    const items = Array.from(this.items);

    while (slots.length > items.length) {
      slots.pop()?.clear(state.runtime);
    }

    items.forEach((item, index) => {
      const slot = slots[index] ?? new ChildSlot();
      slots[index] = slot;
      slot.sync(state, this.makeItem(item, index), parentChanged);
    });

    return null;
  }
}

/**
 * One child per item.
 *
 * @example
 * ```typescript
 * compose(cx) {
 *   const todos = useMut(cx, () => ['write', 'test']);
 *   return fromIter(todos.value, (title) => new TodoItem(title));
 * }
 * ```
 */
export function fromIter<T>(items: Iterable<T>, makeItem: (item: T, index: number) => Child): FromIter<T> {
  return new FromIter(items, makeItem);
}
