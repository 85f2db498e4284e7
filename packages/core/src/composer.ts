/**
 * Composer
 *
 * Owns the root of a composition and the runtime behind it, and runs passes:
 * resume ready local tasks, apply queued updates, then drive the tree from the
 * root. Passes are incremental; only nodes whose own state or ancestors
 * changed recompose.
 *
 * @example
 * ```typescript
 * const composer = new Composer(new App(), { name: 'app' });
 *
 * composer.tryCompose();       // synchronous single pass
 * await composer.compose();    // waits for work, then one pass
 * await composer.run({ signal });
 *
 * composer.dispose();
 * ```
 */

import { randomUUID } from "node:crypto";
import { setImmediate as yieldToHost } from "node:timers/promises";
import { Context, Logger } from "arbor-kernel";
import { AbortError, CompositionError, StateError, ValidationError, ensureError, isAbortError } from "arbor-shared";
import { CatchContext } from "./compose/catch";
import { driveNode } from "./compose/child-slot";
import { ContextFrame, provide } from "./compose/context";
import { ErasedNode } from "./compose/node";
import type { ScopeKey, ScopeState } from "./compose/scope";
import { isComposable, type Composable } from "./compose/types";
import { resolveComposerOptions, type ComposerOptions, type ResolvedComposerOptions } from "./config";
import { ExecutorContext, MicrotaskExecutor, type Executor } from "./runtime/executor";
import { Runtime } from "./runtime/runtime";

const log = Logger.for("Composer");

export interface PassReport {
  /** 1-based pass number */
  pass: number;
  /** Non-container nodes whose `compose` ran */
  recomposed: number;
  /** Nodes that were visited without running */
  skipped: number;
  tasksPolled: number;
  updatesApplied: number;
  durationMs: number;
}

export type ComposeResult =
  | { status: "composed"; report: PassReport }
  | { status: "idle"; report: PassReport }
  | { status: "error"; report: PassReport; error: CompositionError };

export interface RunOptions {
  signal?: AbortSignal;
  /** Called after every pass */
  onPass?: (result: ComposeResult) => void;
}

export class Composer {
  readonly id: string;
  readonly runtime: Runtime;
  readonly executor: Executor;

  private readonly options: ResolvedComposerOptions;
  private readonly root: ErasedNode;
  private readonly rootState: ScopeState;
  private passes = 0;
  private disposed = false;

  constructor(root: Composable, options: ComposerOptions = {}) {
    if (!isComposable(root)) {
      throw ValidationError.type("root", "a composable", typeof root);
    }
    this.options = resolveComposerOptions(options);
    this.id = this.options.name ?? randomUUID();
    this.runtime = new Runtime(this.options.updater);
    this.executor = this.options.executor ?? new MicrotaskExecutor();

    this.root = new ErasedNode(root);
    this.rootState = this.runtime.createScope(null, this.root.name);

    const frame = new ContextFrame();
    provide(ExecutorContext, this.executor).apply(frame);
    provide(CatchContext, (error: Error) => this.runtime.reportError(error)).apply(frame);
    for (const provision of this.options.contexts) {
      provision.apply(frame);
    }
    this.rootState.contexts = frame;

    log.debug({ composer: this.id, root: this.root.name }, "Composer created");
  }

  /** Number of passes run so far */
  get passCount(): number {
    return this.passes;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Whether the next pass has anything to do */
  get hasPendingWork(): boolean {
    return this.passes === 0 || this.runtime.hasPendingWork;
  }

  /**
   * Run exactly one pass now.
   *
   * Errors reported to the root catch handler, errors thrown by drop callbacks,
   * local tasks and updates, and any exception thrown while driving are
   * collected into one `CompositionError`.
   */
  tryCompose(): ComposeResult {
    if (this.disposed) {
      throw StateError.disposed("Composer");
    }

    const pass = ++this.passes;
    const runtime = this.runtime;
    const started = performance.now();

    return Context.run(Context.create({ composerId: this.id, pass }), () =>
      runtime.enter(() => this.runPass(pass, started)),
    );
  }

  private runPass(pass: number, started: number): ComposeResult {
    const runtime = this.runtime;
    const tasksPolled = runtime.pollReady();
    const updatesApplied = runtime.drainUpdates();
    // Wake-ups so far are served by this pass.
    runtime.acknowledgeWake();

    runtime.resetStats();
    this.rootState.parentChanged = pass === 1;

    const errors: Error[] = [];
    try {
      runtime.withGuard(() => driveNode(this.root, this.rootState));
    } catch (error) {
      errors.push(ensureError(error));
    }
    errors.unshift(...runtime.takeErrors());

    const stats = runtime.resetStats();
    const report: PassReport = {
      pass,
      recomposed: stats.recomposed,
      skipped: stats.skipped,
      tasksPolled,
      updatesApplied,
      durationMs: performance.now() - started,
    };

    log.debug({ ...report }, "Pass complete");
    if (this.options.dev) {
      log.debug({ tree: this.debugTree() }, "Composition tree");
    }

    if (errors.length > 0) {
      const error = new CompositionError(errors, { pass });
      log.warn({ err: error }, "Pass failed");
      return { status: "error", report, error };
    }
    return { status: report.recomposed > 0 ? "composed" : "idle", report };
  }

  /**
   * Wait until there is work (the first pass never waits), then run one pass.
   * Rejects with the pass's `CompositionError`.
   */
  async compose(options: { signal?: AbortSignal } = {}): Promise<PassReport> {
    await this.waitForWork(options.signal);
    const result = this.tryCompose();
    if (result.status === "error") {
      throw result.error;
    }
    return result.report;
  }

  /**
   * Run passes whenever there is work, until `signal` aborts or the composer
   * is disposed. Rejects with the first failed pass's `CompositionError`.
   */
  async run(options: RunOptions = {}): Promise<void> {
    const { signal, onPass } = options;
    log.info({ composer: this.id }, "Composer running");

    while (!signal?.aborted && !this.disposed) {
      try {
        await this.waitForWork(signal);
      } catch (error) {
        if (isAbortError(error)) {
          break;
        }
        throw error;
      }
      if (this.disposed) {
        break;
      }

      const result = this.tryCompose();
      onPass?.(result);
      if (result.status === "error") {
        throw result.error;
      }
      // Let timers and I/O run between passes.
      await yieldToHost();
    }

    log.info({ composer: this.id, passes: this.passes }, "Composer stopped");
  }

  /**
   * Tear down the whole tree. Drop callbacks run parent first; the errors they
   * throw are collected into one `CompositionError`.
   */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;

    const runtime = this.runtime;
    runtime.enter(() => {
      runtime.removeScope(this.rootState.key);
      runtime.clearTasks();
    });
    // Wake anyone blocked in waitForWork so they observe the disposal.
    runtime.wake();
    runtime.removeAllListeners();

    const errors = runtime.takeErrors();
    log.debug({ composer: this.id }, "Composer disposed");
    if (errors.length > 0) {
      throw new CompositionError(errors, { phase: "dispose" });
    }
  }

  /**
   * Indented outline of the live tree, one node per line.
   */
  debugTree(): string {
    const lines: string[] = [];
    const visit = (key: ScopeKey, depth: number): void => {
      const state = this.runtime.scopes.get(key);
      if (!state) {
        return;
      }
      const flags = [state.container && "container", state.empty && "empty"].filter(Boolean);
      const suffix = flags.length > 0 ? ` [${flags.join(", ")}]` : "";
      lines.push(`${"  ".repeat(depth)}${state.name}${suffix}`);
      for (const child of state.children) {
        visit(child, depth + 1);
      }
    };
    visit(this.rootState.key, 0);
    return lines.join("\n");
  }

  private waitForWork(signal?: AbortSignal): Promise<void> {
    if (this.disposed) {
      return Promise.reject(StateError.disposed("Composer"));
    }
    if (signal?.aborted) {
      return Promise.reject(AbortError.fromSignal(signal));
    }
    if (this.hasPendingWork) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const onWake = (): void => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };
      const onAbort = (): void => {
        this.runtime.off("wake", onWake);
        reject(new AbortError("Composer run aborted", "ABORT_SIGNAL"));
      };
      this.runtime.once("wake", onWake);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
