/**
 * Scope and Hook Storage
 *
 * `ScopeState` is the persistent state of one node position: hook slots,
 * change flags, contexts and teardown callbacks. `Scope` is the handle a
 * composable receives for exactly one run of `compose`.
 *
 * Rules of Hooks:
 * 1. Only call hooks at the top level of `compose`
 * 2. Call the same hooks in the same order every pass
 * 3. Never store the scope; store `Mut` or `useCallback` handles instead
 */

import { HookOrderError, ScopeError, ensureError } from "arbor-shared";
import type { Runtime } from "../runtime/runtime";
import type { SlotKey } from "../runtime/slot-map";
import { ChildSlot } from "./child-slot";
import { ContextFrame } from "./context";
import type { HookTag } from "./types";

export type ScopeKey = SlotKey;

interface HookSlot {
  readonly tag: HookTag;
  readonly box: { value: unknown };
}

// ============================================================================
// Scope State
// ============================================================================

export class ScopeState {
  private readonly hooks: HookSlot[] = [];
  private readonly drops: Array<() => void> = [];
  private cursor = 0;
  /** Hook count of the first completed pass */
  private hookCount: number | null = null;

  /** Set by the node's own logic; read and cleared when the node is driven */
  changed = false;
  /** Set by the parent for the pass in progress only */
  parentChanged = false;
  /** Fan-out node that drives its own children and always runs */
  container = false;
  /** Last run produced the unit composable */
  empty = false;
  /** `compose` completed at least once */
  mounted = false;
  /** Torn down; late updates are ignored */
  disposed = false;

  /** Values visible to this scope */
  contexts = new ContextFrame();
  /** Values this scope provides to its descendants */
  readonly provided = new ContextFrame();

  /** Keys of every scope whose parent is this one */
  readonly children = new Set<ScopeKey>();
  /** Slot holding the primary child produced by `compose` */
  readonly child = new ChildSlot();

  constructor(
    readonly key: ScopeKey,
    readonly parentKey: ScopeKey | null,
    readonly runtime: Runtime,
    public name: string,
  ) {}

  get hookLength(): number {
    return this.hooks.length;
  }

  /** Contexts handed to children: own contexts shadowed by own provisions */
  childContexts(): ContextFrame {
    return ContextFrame.merge(this.contexts, this.provided);
  }

  /**
   * Mark this scope changed and wake the composer.
   * Ignored once the scope is torn down.
   */
  markChanged(): void {
    if (this.disposed) {
      return;
    }
    this.changed = true;
    this.runtime.wake();
  }

  /**
   * Return the slot at the cursor and advance, creating it with `make` on the first pass.
   */
  slot<T>(tag: HookTag, make: () => T): { value: T } {
    const index = this.cursor++;

    if (this.hookCount !== null && index >= this.hookCount) {
      throw HookOrderError.countMismatch(this.name, this.hookCount, index + 1);
    }

    const existing = this.hooks[index];
    if (existing) {
      if (existing.tag !== tag) {
        throw HookOrderError.tagMismatch(this.name, index, existing.tag, tag);
      }
      // Slot types are fixed by the tag check above and the call site order.
      return existing.box as { value: T };
    }

    const box = { value: make() };
    this.hooks.push({ tag, box });
    return box;
  }

  /** Register a callback run once at teardown */
  onTeardown(fn: () => void): void {
    this.drops.push(fn);
  }

  /** @internal Called before `compose` */
  beginPass(): void {
    this.cursor = 0;
  }

  /** @internal Called after `compose` returned */
  endPass(): void {
    if (this.hookCount === null) {
      this.hookCount = this.cursor;
    } else if (this.cursor !== this.hookCount) {
      throw HookOrderError.countMismatch(this.name, this.hookCount, this.cursor);
    }
    this.mounted = true;
  }

  /**
   * @internal Run teardown callbacks in registration order.
   * Returns the errors they threw.
   */
  dispose(): Error[] {
    this.disposed = true;
    const errors: Error[] = [];
    for (const drop of this.drops.splice(0)) {
      try {
        drop();
      } catch (error) {
        errors.push(ensureError(error));
      }
    }
    return errors;
  }
}

// ============================================================================
// Scope (pass-scoped handle)
// ============================================================================

/**
 * Handle passed to `compose`. Valid only until that call returns; every
 * access afterwards throws `ScopeError`.
 */
export class Scope {
  private live = true;

  constructor(private readonly scopeState: ScopeState) {}

  /** Name of the composable this scope belongs to */
  get name(): string {
    return this.scopeState.name;
  }

  get state(): ScopeState {
    return this.access("state");
  }

  get runtime(): Runtime {
    return this.access("runtime").runtime;
  }

  /** Whether the parent recomposed (or forced this node to run) this pass */
  get isParentChanged(): boolean {
    return this.access("isParentChanged").parentChanged;
  }

  get isLive(): boolean {
    return this.live;
  }

  /** Recompose this node on the next pass */
  setChanged(): void {
    this.access("setChanged").markChanged();
  }

  /** Mark this node a container: it always runs and drives its own children */
  setContainer(): void {
    this.access("setContainer").container = true;
  }

  /**
   * State behind this handle, for hooks. Throws once the pass ended.
   */
  access(operation: string): ScopeState {
    if (!this.live) {
      throw new ScopeError(this.scopeState.name, operation);
    }
    return this.scopeState;
  }

  /** @internal */
  revoke(): void {
    this.live = false;
  }
}
