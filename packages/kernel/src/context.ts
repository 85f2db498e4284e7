import { AsyncLocalStorage } from "node:async_hooks";
import { randomUUID } from "node:crypto";
import { ContextError } from "arbor-shared";

export interface ContextMetadata extends Record<string, unknown> {}

/**
 * Base KernelContext interface with core properties.
 * The composer enters one for every pass and every spawned task, so logs and
 * nested code can tell which composer and which pass they belong to.
 *
 * @example
 * ```typescript
 * const ctx = Context.create({ composerId: 'app', pass: 3 });
 * Context.run(ctx, () => Logger.get().info('inside pass 3'));
 * ```
 */
export interface KernelContext {
  /** Id of the composer driving the current pass */
  composerId: string;
  /** Pass number, starting at 1 for the first pass; 0 outside a pass */
  pass: number;
  metadata: ContextMetadata;
}

const storage = new AsyncLocalStorage<KernelContext>();

export class Context {
  /**
   * Creates a new context object with defaults.
   */
  static create(overrides: Partial<KernelContext> = {}): KernelContext {
    return {
      composerId: overrides.composerId ?? randomUUID(),
      pass: overrides.pass ?? 0,
      metadata: overrides.metadata ?? {},
    };
  }

  /**
   * Runs a function within the given context.
   * Works for synchronous passes and for async task bodies alike.
   */
  static run<T>(context: KernelContext, fn: () => T): T {
    return storage.run(context, fn);
  }

  /**
   * Creates a child context that inherits from the current context (or creates a new root).
   * The child is a shallow copy: `metadata` is shared with the parent.
   *
   * @example
   * ```typescript
   * const passCtx = Context.child({ pass: 2 });
   * Context.run(passCtx, () => drive(root));
   * ```
   */
  static child(overrides: Partial<KernelContext> = {}): KernelContext {
    const parent = Context.tryGet();
    if (!parent) {
      return Context.create(overrides);
    }
    return {
      ...parent,
      ...overrides,
    };
  }

  /**
   * Gets the current context. Throws if not found.
   */
  static get(): KernelContext {
    const store = storage.getStore();
    if (!store) {
      throw ContextError.notFound();
    }
    return store;
  }

  /**
   * Gets the current context or returns undefined if not found.
   */
  static tryGet(): KernelContext | undefined {
    return storage.getStore();
  }
}
