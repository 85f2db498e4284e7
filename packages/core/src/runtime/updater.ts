/**
 * Updater
 *
 * Boundary between the engine and the host loop for deferred state updates.
 */

/**
 * A deferred state change. Applying it runs the change exactly once; applying
 * it while the tree is being driven queues it for the next pass instead.
 */
export interface Update {
  apply(): void;
}

/**
 * Accepts pending updates and guarantees they are applied before or during
 * the next pass.
 *
 * @example Applying updates from a host event loop
 * ```typescript
 * class HostUpdater implements Updater {
 *   update(update: Update) {
 *     setImmediate(() => update.apply());
 *   }
 * }
 * ```
 */
export interface Updater {
  update(update: Update): void;
}

export function isUpdater(value: unknown): value is Updater {
  return (
    typeof value === "object" &&
    value !== null &&
    "update" in value &&
    typeof value.update === "function"
  );
}

/**
 * Minimal view of the runtime the default updater needs.
 */
export interface UpdateQueue {
  enqueue(update: Update): void;
}

/**
 * Default updater: queues into the runtime's update queue, which the composer
 * drains at the start of the next pass.
 */
export class QueueUpdater implements Updater {
  constructor(private readonly queue: UpdateQueue) {}

  update(update: Update): void {
    this.queue.enqueue(update);
  }
}
