/**
 * Catch
 *
 * Error boundary. Failures reported by `err` results below it go to the
 * nearest handler instead of failing the pass.
 */

import { useCallback, useContext, useProvider } from "../state/hooks";
import { createContext } from "./context";
import type { Scope } from "./scope";
import type { Child, Composable } from "./types";

export type CatchHandler = (error: Error) => void;

/**
 * Nearest error handler. The composer provides one at the root that collects
 * errors into the pass result.
 */
export const CatchContext = createContext<CatchHandler>("Catch");

export class Catch implements Composable {
  readonly displayName = "Catch";

  constructor(
    readonly onError: CatchHandler,
    readonly content: Child,
  ) {}

  compose(cx: Scope): Child {
    const handler = useCallback(cx, this.onError);
    useProvider(cx, CatchContext, () => handler);
    return this.content;
  }
}

/**
 * Route errors reported below `content` to `onError`.
 *
 * @example
 * ```typescript
 * catchError((error) => log.warn({ err: error }, 'Widget failed'), new Widget());
 * ```
 */
export function catchError(onError: CatchHandler, content: Child): Catch {
  return new Catch(onError, content);
}

/**
 * Report `error` to the nearest catch handler of `cx`.
 */
export function reportError(cx: Scope, error: Error): void {
  useContext(cx, CatchContext)(error);
}
