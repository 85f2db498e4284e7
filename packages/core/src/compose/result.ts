/**
 * Result
 *
 * Fallible child. `ok` composes its content; `err` tears the content down and
 * reports the error to the nearest catch handler.
 */

import { ensureError } from "arbor-shared";
import { useRef } from "../state/hooks";
import { reportError } from "./catch";
import { ChildSlot } from "./child-slot";
import type { Scope } from "./scope";
import type { Child, Composable } from "./types";

export type Outcome = { readonly ok: true; readonly content: Child } | { readonly ok: false; readonly error: Error };

export class Result implements Composable {
  readonly displayName = "Result";

  constructor(readonly outcome: Outcome) {}

  compose(cx: Scope): Child {
    cx.setContainer();
    const slot = useRef(cx, () => new ChildSlot());
    const state = cx.state;

    if (this.outcome.ok) {
      slot.sync(state, this.outcome.content, cx.isParentChanged);
      return null;
    }

    // The failed subtree is rebuilt from scratch once the result turns ok.
    slot.clear(state.runtime);
    // Reported once per parent recomposition, not on every pass.
    if (cx.isParentChanged) {
      reportError(cx, this.outcome.error);
    }
    return null;
  }
}

export function ok(content: Child): Result {
  return new Result({ ok: true, content });
}

export function err(error: unknown): Result {
  return new Result({ ok: false, error: ensureError(error) });
}

/**
 * Build a child with `build`, turning a thrown error into an `err` result.
 *
 * @example
 * ```typescript
 * compose(cx) {
 *   return fallible(() => new Chart(parseSeries(this.raw)));
 * }
 * ```
 */
export function fallible(build: () => Child): Result {
  try {
    return ok(build());
  } catch (error) {
    return err(error);
  }
}
