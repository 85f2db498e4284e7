/**
 * Test Helpers
 *
 * Deferred promises, microtask flushing and ordered call recording for
 * composition tests.
 */

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

/**
 * Promise settled from the outside. Tests hand `promise` to a task and
 * settle it once the pass under test has run.
 */
export function createDeferred<T = void>(): Deferred<T> {
  const settle: { resolve?: (value: T) => void; reject?: (error: Error) => void } = {};
  const promise = new Promise<T>((resolve, reject) => {
    settle.resolve = resolve;
    settle.reject = reject;
  });

  return {
    promise,
    resolve: (value) => settle.resolve?.(value),
    reject: (error) => settle.reject?.(error),
  };
}

/**
 * Resolve after every queued microtask (and promise continuation) has run.
 */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export interface Recorder<T = string> {
  readonly entries: readonly T[];
  record(entry: T): void;
  /** Occurrences of `entry`, compared with `Object.is` */
  count(entry: T): number;
  clear(): void;
}

/**
 * Ordered log of labelled events, shared between the callbacks of one test.
 *
 * @example
 * ```typescript
 * const drops = createRecorder();
 * useDrop(cx, () => drops.record('parent'));
 * // ...
 * expect(drops.entries).toEqual(['parent', 'child']);
 * ```
 */
export function createRecorder<T = string>(): Recorder<T> {
  const entries: T[] = [];

  return {
    get entries() {
      return entries;
    },
    record(entry) {
      entries.push(entry);
    },
    count(entry) {
      return entries.filter((e) => Object.is(e, entry)).length;
    },
    clear() {
      entries.length = 0;
    },
  };
}
