/**
 * Runtime
 *
 * Shared state of one composition: the scope arena, the update queue, the
 * local task queue and the per-pass counters. One runtime belongs to one
 * composer; `Runtime.current()` reaches it during a pass and inside tasks
 * spawned from it.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { EventEmitter } from "node:events";
import { Context, Logger } from "arbor-kernel";
import { ContextError, StateError, ensureError } from "arbor-shared";
import { ScopeState, type ScopeKey } from "../compose/scope";
import type { Executor } from "./executor";
import { SlotMap, type SlotKey } from "./slot-map";
import { QueueUpdater, type Update, type Updater } from "./updater";

const log = Logger.for("Runtime");

const storage = new AsyncLocalStorage<Runtime>();

/**
 * Body of a local task. Yielding a promise (or any value) parks the task
 * until the value settles; the settled value is sent back in.
 */
export type LocalTaskGenerator = Generator<unknown, void, unknown>;

export type TaskKey = SlotKey;

type TaskInput = { kind: "next"; value: unknown } | { kind: "throw"; error: unknown };

interface LocalTask {
  readonly owner: ScopeKey;
  readonly generator: LocalTaskGenerator;
  input: TaskInput;
}

export interface PassStats {
  recomposed: number;
  skipped: number;
}

export class Runtime extends EventEmitter {
  readonly scopes = new SlotMap<ScopeState>();
  readonly tasks = new SlotMap<LocalTask>();

  private readonly ready = new Set<TaskKey>();
  private readonly updates: Update[] = [];
  private readonly errors: Error[] = [];
  private readonly updater: Updater;
  private guarded = false;
  private pending = false;
  private stats: PassStats = { recomposed: 0, skipped: 0 };

  constructor(updater?: Updater) {
    super();
    this.updater = updater ?? new QueueUpdater(this);
  }

  // ==========================================================================
  // Ambient access
  // ==========================================================================

  /**
   * Runtime of the pass or task in progress.
   * Throws `ContextError` outside of both.
   */
  static current(): Runtime {
    const runtime = storage.getStore();
    if (!runtime) {
      throw new ContextError(
        "No runtime is active. Runtime.current() is only available during a pass or inside a task spawned from one.",
      );
    }
    return runtime;
  }

  static tryCurrent(): Runtime | undefined {
    return storage.getStore();
  }

  /** Run `fn` with this runtime as the current one */
  enter<T>(fn: () => T): T {
    return storage.run(this, fn);
  }

  // ==========================================================================
  // Scopes
  // ==========================================================================

  createScope(parent: ScopeState | null, name: string): ScopeState {
    const key = this.scopes.insertWith(
      (created) => new ScopeState(created, parent?.key ?? null, this, name),
    );
    parent?.children.add(key);
    return this.scope(key);
  }

  scope(key: ScopeKey): ScopeState {
    const state = this.scopes.get(key);
    if (!state) {
      throw new StateError("missing", "live", `No live scope for key ${key}`);
    }
    return state;
  }

  /**
   * Tear down a scope and everything below it. The scope's own drop callbacks
   * run before its descendants'. Errors they throw are reported, not thrown.
   */
  removeScope(key: ScopeKey): void {
    const state = this.scopes.remove(key);
    if (!state) {
      return;
    }
    if (state.parentKey !== null) {
      this.scopes.get(state.parentKey)?.children.delete(key);
    }
    for (const error of state.dispose()) {
      this.reportError(error);
    }
    for (const child of [...state.children]) {
      this.removeScope(child);
    }
    log.trace({ composable: state.name }, "Scope removed");
  }

  // ==========================================================================
  // Updates
  // ==========================================================================

  /**
   * Defer `fn` through the updater. It runs exactly once, under the update
   * guard; applied while the tree is being driven it is queued for the next pass.
   */
  update(fn: () => void): void {
    let applied = false;
    const update: Update = {
      apply: () => {
        if (applied) {
          return;
        }
        if (this.guarded) {
          this.enqueue(update);
          return;
        }
        applied = true;
        this.withGuard(fn);
      },
    };
    this.updater.update(update);
  }

  enqueue(update: Update): void {
    this.updates.push(update);
    this.wake();
  }

  /**
   * Apply every queued update in submission order.
   * Updates queued while draining wait for the next drain.
   */
  drainUpdates(): number {
    const batch = this.updates.splice(0);
    for (const update of batch) {
      try {
        update.apply();
      } catch (error) {
        this.reportError(ensureError(error));
      }
    }
    return batch.length;
  }

  get isGuarded(): boolean {
    return this.guarded;
  }

  /**
   * Run `fn` with exclusive access to state. Re-entry throws `StateError`.
   */
  withGuard<T>(fn: () => T): T {
    if (this.guarded) {
      throw new StateError(
        "guarded",
        "idle",
        "State is already being mutated; nested passes and updates are not allowed",
      );
    }
    this.guarded = true;
    try {
      return fn();
    } finally {
      this.guarded = false;
    }
  }

  // ==========================================================================
  // Tasks
  // ==========================================================================

  spawnLocal(owner: ScopeKey, generator: LocalTaskGenerator): TaskKey {
    const key = this.tasks.insert({ owner, generator, input: { kind: "next", value: undefined } });
    this.schedule(key);
    return key;
  }

  /** Mark a task ready for the next pass. Ignored for finished or cancelled tasks. */
  schedule(key: TaskKey): void {
    if (!this.tasks.has(key)) {
      return;
    }
    this.ready.add(key);
    this.wake();
  }

  /**
   * Cancel a local task: it is never resumed again and its `finally` blocks run.
   */
  cancelLocal(key: TaskKey): void {
    const task = this.tasks.remove(key);
    this.ready.delete(key);
    if (!task) {
      return;
    }
    try {
      task.generator.return(undefined);
    } catch (error) {
      this.reportError(ensureError(error));
    }
  }

  /**
   * Resume every ready task once, in the order they became ready.
   * Returns the number of tasks resumed.
   */
  pollReady(): number {
    const batch = [...this.ready];
    this.ready.clear();

    let polled = 0;
    for (const key of batch) {
      const task = this.tasks.get(key);
      if (!task) {
        continue;
      }
      polled++;
      this.resume(key, task);
    }
    return polled;
  }

  private resume(key: TaskKey, task: LocalTask): void {
    let step: IteratorResult<unknown, void>;
    try {
      step =
        task.input.kind === "next"
          ? task.generator.next(task.input.value)
          : task.generator.throw(task.input.error);
    } catch (error) {
      this.tasks.remove(key);
      this.reportError(ensureError(error));
      return;
    }

    if (step.done) {
      this.tasks.remove(key);
      return;
    }

    void Promise.resolve(step.value).then(
      (value) => {
        task.input = { kind: "next", value };
        this.schedule(key);
      },
      (error: unknown) => {
        task.input = { kind: "throw", error };
        this.schedule(key);
      },
    );
  }

  /**
   * Start `task` on `executor` with this runtime and the current kernel context.
   */
  spawn(executor: Executor, task: () => Promise<void>): void {
    const context = Context.tryGet();
    executor.spawn(() => this.enter(() => (context ? Context.run(context, task) : task())));
  }

  /** Drop every pending local task without resuming it */
  clearTasks(): void {
    for (const task of this.tasks.values()) {
      try {
        task.generator.return(undefined);
      } catch (error) {
        this.reportError(ensureError(error));
      }
    }
    this.tasks.clear();
    this.ready.clear();
  }

  // ==========================================================================
  // Wake-ups, errors and counters
  // ==========================================================================

  /** Signal that another pass has work to do */
  wake(): void {
    this.pending = true;
    this.emit("wake");
  }

  get hasPendingWork(): boolean {
    return this.pending || this.updates.length > 0 || this.ready.size > 0;
  }

  /** @internal Clear the wake flag at the start of a pass */
  acknowledgeWake(): void {
    this.pending = false;
  }

  reportError(error: Error): void {
    this.errors.push(error);
  }

  /** @internal */
  takeErrors(): Error[] {
    return this.errors.splice(0);
  }

  /** @internal */
  recordRun(state: ScopeState): void {
    if (state.container) {
      return;
    }
    this.stats.recomposed++;
    log.trace({ composable: state.name }, "Recomposed");
  }

  /** @internal */
  recordSkip(state: ScopeState): void {
    this.stats.skipped++;
    log.trace({ composable: state.name }, "Skipped");
  }

  /** @internal Return the counters of the pass that ended and start from zero */
  resetStats(): PassStats {
    const stats = this.stats;
    this.stats = { recomposed: 0, skipped: 0 };
    return stats;
  }
}
