/**
 * Context Keys
 *
 * Ancestor-to-descendant values. A key owns the storage for its values, so
 * lookups stay typed without a shared heterogeneous map.
 */

/**
 * One set of context values: the values a scope can see, or the values a
 * scope provides to its descendants.
 */
export class ContextFrame {
  /** @internal */
  readonly keys = new Set<ContextKey<unknown>>();

  get size(): number {
    return this.keys.size;
  }

  /**
   * New frame holding every value of `base`, shadowed by the values of `overrides`.
   */
  static merge(base: ContextFrame, overrides: ContextFrame): ContextFrame {
    if (overrides.size === 0) {
      return base;
    }
    const frame = new ContextFrame();
    for (const key of base.keys) {
      key.copy(base, frame);
    }
    for (const key of overrides.keys) {
      key.copy(overrides, frame);
    }
    return frame;
  }
}

/**
 * Identity of a context value. Keys compare by identity, so two keys created
 * with the same name never see each other's values.
 */
export class ContextKey<T> {
  private readonly values = new WeakMap<ContextFrame, { value: T }>();

  constructor(readonly name: string) {}

  /** @internal */
  write(frame: ContextFrame, value: T): void {
    this.values.set(frame, { value });
    frame.keys.add(this);
  }

  /** @internal */
  read(frame: ContextFrame): { value: T } | undefined {
    return this.values.get(frame);
  }

  /** @internal */
  copy(from: ContextFrame, to: ContextFrame): void {
    const entry = this.values.get(from);
    if (entry) {
      this.values.set(to, entry);
      to.keys.add(this);
    }
  }

  toString(): string {
    return `ContextKey(${this.name})`;
  }
}

/**
 * Create a context key.
 *
 * @example
 * ```typescript
 * const ThemeContext = createContext<Theme>('Theme');
 *
 * // provider
 * useProvider(cx, ThemeContext, () => ({ color: 'dark' }));
 *
 * // any descendant
 * const theme = useContext(cx, ThemeContext);
 * ```
 */
export function createContext<T>(name: string): ContextKey<T> {
  return new ContextKey<T>(name);
}

/**
 * A context value supplied from outside the tree, e.g. as a composer root provision.
 */
export interface ContextProvision {
  readonly key: ContextKey<unknown>;
  apply(frame: ContextFrame): void;
}

export function provide<T>(key: ContextKey<T>, value: T): ContextProvision {
  return {
    key,
    apply: (frame) => key.write(frame, value),
  };
}
