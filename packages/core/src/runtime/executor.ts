/**
 * Executor
 *
 * Boundary between the engine and whatever runs asynchronous work.
 * Only `useTask` spawns onto it.
 */

import { Logger } from "arbor-kernel";
import { isAbortError } from "arbor-shared";
import { createContext } from "../compose/context";

const log = Logger.for("Executor");

export interface Executor {
  /** Start `task`. The executor owns it from here; it must run it to completion. */
  spawn(task: () => Promise<void>): void;
}

export function isExecutor(value: unknown): value is Executor {
  return (
    typeof value === "object" &&
    value !== null &&
    "spawn" in value &&
    typeof value.spawn === "function"
  );
}

/**
 * Default executor: starts each task on the microtask queue and logs rejections.
 * Tasks rejected with an AbortError after their scope was torn down are only
 * logged at debug level.
 */
export class MicrotaskExecutor implements Executor {
  private running = 0;

  /** Number of spawned tasks that have not settled yet */
  get active(): number {
    return this.running;
  }

  spawn(task: () => Promise<void>): void {
    this.running++;
    queueMicrotask(() => {
      void task()
        .catch((error: unknown) => {
          if (isAbortError(error)) {
            log.debug({ err: error }, "Task aborted");
          } else {
            log.error({ err: error }, "Task rejected");
          }
        })
        .finally(() => {
          this.running--;
        });
    });
  }
}

/**
 * Executor used by `useTask`. The composer provides it at the root.
 */
export const ExecutorContext = createContext<Executor>("Executor");
