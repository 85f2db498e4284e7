/**
 * Memo
 *
 * Gate on a dependency. The content is only recomposed by its parent when the
 * dependency changed; its own updates still recompose it.
 */

import { useRef } from "../state/hooks";
import { dependencyEquals, snapshotDependency } from "../utils/dependency";
import { ChildSlot } from "./child-slot";
import type { Scope } from "./scope";
import type { Child, Composable } from "./types";

interface Snapshot {
  initialized: boolean;
  dependency?: unknown;
}

export class Memo implements Composable {
  readonly displayName = "Memo";

  constructor(
    readonly dependency: unknown,
    readonly content: Child,
  ) {}

  compose(cx: Scope): Child {
    cx.setContainer();
    const slot = useRef(cx, () => new ChildSlot());
    const last = useRef(cx, (): Snapshot => ({ initialized: false }));

    const changed = !last.initialized || !dependencyEquals(last.dependency, this.dependency);
    if (changed) {
      last.initialized = true;
      last.dependency = snapshotDependency(this.dependency);
    }

    slot.sync(cx.state, this.content, changed);
    return null;
  }
}

/**
 * @example
 * ```typescript
 * compose(cx) {
 *   return memo([this.userId], new Profile(this.userId));
 * }
 * ```
 */
export function memo(dependency: unknown, content: Child): Memo {
  return new Memo(dependency, content);
}
