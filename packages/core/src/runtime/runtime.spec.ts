import { Context } from "arbor-kernel";
import { isContextError, isStateError } from "arbor-shared";
import { createDeferred, createRecorder, flushMicrotasks } from "arbor-shared/testing";
import { MicrotaskExecutor } from "./executor";
import { Runtime, type LocalTaskGenerator } from "./runtime";

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("Runtime", () => {
  let runtime: Runtime;

  beforeEach(() => {
    runtime = new Runtime();
  });

  describe("scopes", () => {
    it("should link children to their parent", () => {
      const root = runtime.createScope(null, "Root");
      const child = runtime.createScope(root, "Child");

      expect(child.parentKey).toBe(root.key);
      expect([...root.children]).toEqual([child.key]);
      expect(runtime.scope(child.key)).toBe(child);
    });

    it("should tear down parents before their descendants", () => {
      const drops = createRecorder();
      const root = runtime.createScope(null, "Root");
      const child = runtime.createScope(root, "Child");
      const grandchild = runtime.createScope(child, "Grandchild");
      root.onTeardown(() => drops.record("root"));
      child.onTeardown(() => drops.record("child"));
      grandchild.onTeardown(() => drops.record("grandchild"));

      runtime.removeScope(root.key);

      expect(drops.entries).toEqual(["root", "child", "grandchild"]);
      expect(runtime.scopes.size).toBe(0);
      expect(grandchild.disposed).toBe(true);
      expect(isStateError(caught(() => runtime.scope(child.key)))).toBe(true);
    });

    it("should detach a removed child from its parent", () => {
      const root = runtime.createScope(null, "Root");
      const child = runtime.createScope(root, "Child");

      runtime.removeScope(child.key);

      expect(root.children.size).toBe(0);
      expect(root.disposed).toBe(false);
    });

    it("should report errors thrown by drop callbacks and keep tearing down", () => {
      const drops = createRecorder();
      const root = runtime.createScope(null, "Root");
      const child = runtime.createScope(root, "Child");
      root.onTeardown(() => {
        throw new Error("root drop failed");
      });
      child.onTeardown(() => drops.record("child"));

      runtime.removeScope(root.key);

      expect(drops.entries).toEqual(["child"]);
      expect(runtime.takeErrors().map((error) => error.message)).toEqual(["root drop failed"]);
      expect(runtime.takeErrors()).toEqual([]);
    });
  });

  describe("updates", () => {
    it("should defer updates until drained", () => {
      const applied = createRecorder();

      runtime.update(() => applied.record("first"));
      runtime.update(() => applied.record("second"));

      expect(applied.entries).toEqual([]);
      expect(runtime.hasPendingWork).toBe(true);
      expect(runtime.drainUpdates()).toBe(2);
      expect(applied.entries).toEqual(["first", "second"]);
      expect(runtime.drainUpdates()).toBe(0);
    });

    it("should emit wake when an update is queued", () => {
      const wake = vi.fn();
      runtime.on("wake", wake);

      runtime.update(() => undefined);

      expect(wake).toHaveBeenCalledTimes(1);
    });

    it("should requeue updates applied while the guard is held", () => {
      const applied = createRecorder();
      runtime.update(() => applied.record("update"));

      const drained = runtime.withGuard(() => runtime.drainUpdates());

      expect(drained).toBe(1);
      expect(applied.entries).toEqual([]);

      runtime.drainUpdates();

      expect(applied.entries).toEqual(["update"]);
    });

    it("should report updates that throw", () => {
      runtime.update(() => {
        throw new Error("update failed");
      });

      runtime.drainUpdates();

      expect(runtime.takeErrors().map((error) => error.message)).toEqual(["update failed"]);
    });

    it("should reject nested guards", () => {
      const error = caught(() => runtime.withGuard(() => runtime.withGuard(() => 1)));

      expect(isStateError(error)).toBe(true);
      expect(runtime.isGuarded).toBe(false);
    });
  });

  describe("local tasks", () => {
    it("should resume a task with the value its promise resolved to", async () => {
      const owner = runtime.createScope(null, "Owner");
      const steps: unknown[] = [];
      const gate = createDeferred<string>();

      const key = runtime.spawnLocal(
        owner.key,
        (function* (): LocalTaskGenerator {
          steps.push("started");
          const value: unknown = yield gate.promise;
          steps.push(value);
        })(),
      );

      expect(runtime.pollReady()).toBe(1);
      expect(steps).toEqual(["started"]);
      expect(runtime.pollReady()).toBe(0);

      gate.resolve("done");
      await flushMicrotasks();

      expect(runtime.pollReady()).toBe(1);
      expect(steps).toEqual(["started", "done"]);
      expect(runtime.tasks.has(key)).toBe(false);
    });

    it("should throw a rejection back into the task", async () => {
      const owner = runtime.createScope(null, "Owner");
      const steps: string[] = [];
      const gate = createDeferred<string>();

      runtime.spawnLocal(
        owner.key,
        (function* (): LocalTaskGenerator {
          try {
            yield gate.promise;
          } catch (error) {
            steps.push(error instanceof Error ? error.message : "unknown");
          }
        })(),
      );

      runtime.pollReady();
      gate.reject(new Error("fetch failed"));
      await flushMicrotasks();
      runtime.pollReady();

      expect(steps).toEqual(["fetch failed"]);
      expect(runtime.takeErrors()).toEqual([]);
    });

    it("should report a task that throws and forget it", () => {
      const owner = runtime.createScope(null, "Owner");
      const key = runtime.spawnLocal(
        owner.key,
        (function* (): LocalTaskGenerator {
          throw new Error("task crashed");
        })(),
      );

      runtime.pollReady();

      expect(runtime.tasks.has(key)).toBe(false);
      expect(runtime.takeErrors().map((error) => error.message)).toEqual(["task crashed"]);
    });

    it("should run finally blocks when cancelled and never resume again", async () => {
      const owner = runtime.createScope(null, "Owner");
      const steps: string[] = [];
      const gate = createDeferred();

      const key = runtime.spawnLocal(
        owner.key,
        (function* (): LocalTaskGenerator {
          try {
            yield gate.promise;
            steps.push("resumed");
          } finally {
            steps.push("finally");
          }
        })(),
      );

      runtime.pollReady();
      runtime.cancelLocal(key);
      gate.resolve();
      await flushMicrotasks();

      expect(runtime.pollReady()).toBe(0);
      expect(steps).toEqual(["finally"]);
    });
  });

  describe("ambient access", () => {
    it("should expose the entered runtime", () => {
      expect(runtime.enter(() => Runtime.current())).toBe(runtime);
      expect(Runtime.tryCurrent()).toBeUndefined();
    });

    it("should throw outside of a pass or task", () => {
      expect(isContextError(caught(() => Runtime.current()))).toBe(true);
    });

    it("should run spawned tasks with the runtime and kernel context", async () => {
      const seen: Array<{ runtime: boolean; pass: number | undefined }> = [];

      Context.run(Context.create({ composerId: "spawner", pass: 4 }), () => {
        runtime.spawn(new MicrotaskExecutor(), async () => {
          seen.push({
            runtime: Runtime.tryCurrent() === runtime,
            pass: Context.tryGet()?.pass,
          });
        });
      });
      await flushMicrotasks();

      expect(seen).toEqual([{ runtime: true, pass: 4 }]);
    });
  });

  describe("stats", () => {
    it("should count runs and skips, excluding containers", () => {
      const node = runtime.createScope(null, "Node");
      const container = runtime.createScope(null, "Container");
      container.container = true;

      runtime.recordRun(node);
      runtime.recordRun(container);
      runtime.recordSkip(node);

      expect(runtime.resetStats()).toEqual({ recomposed: 1, skipped: 1 });
      expect(runtime.resetStats()).toEqual({ recomposed: 0, skipped: 0 });
    });
  });
});
