import { Composer } from "../composer";
import { dynamic } from "../compose/dynamic";
import { fromFn } from "../compose/from-fn";
import { fromIter } from "../compose/from-iter";
import { memo } from "../compose/memo";
import type { Scope } from "../compose/scope";
import type { Child, Composable } from "../compose/types";
import type { LocalTaskGenerator } from "../runtime/runtime";
import { useDrop, useLocalTask, useMut, useRef } from "../state/hooks";
import type { Mut } from "../state/mut";
import { composeTimes, createRecorder, probe } from "../testing";

describe("composition properties", () => {
  describe("no-op idempotence", () => {
    it("should recompose nothing when no state changed between passes", () => {
      const runs = createRecorder();
      const root = probe("root", runs, () => [
        probe("a", runs),
        probe("b", runs, () => probe("c", runs)),
      ]);
      const composer = new Composer(root);

      expect(composer.tryCompose().status).toBe("composed");
      expect(runs.entries).toEqual(["root", "a", "b", "c"]);

      const second = composer.tryCompose();
      expect(second.status).toBe("idle");
      expect(second.report.recomposed).toBe(0);
      expect(second.report.skipped).toBe(4);
      expect(runs.entries).toEqual(["root", "a", "b", "c"]);
    });
  });

  describe("linear update count", () => {
    it("should run a self-changing node once per pass", () => {
      const counter = { value: 0 };
      const root = fromFn((cx) => {
        counter.value++;
        cx.setChanged();
        return null;
      }, "SelfChanging");
      const composer = new Composer(root);

      const reports = composeTimes(composer, 5);

      expect(counter.value).toBe(5);
      expect(reports.map((report) => report.recomposed)).toEqual([1, 1, 1, 1, 1]);
    });
  });

  describe("skip propagation", () => {
    it("should run an unchanged parent and child exactly once", () => {
      const runs = createRecorder();
      const composer = new Composer(probe("parent", runs, () => probe("child", runs)));

      composeTimes(composer, 10);

      expect(runs.count("parent")).toBe(1);
      expect(runs.count("child")).toBe(1);
    });

    it("should still reach a self-changing grandchild below skipped nodes", () => {
      const runs = createRecorder();
      const leaf = probe("leaf", runs, (cx) => {
        cx.setChanged();
        return null;
      });
      const composer = new Composer(probe("root", runs, () => probe("middle", runs, () => leaf)));

      composeTimes(composer, 3);

      expect(runs.count("root")).toBe(1);
      expect(runs.count("middle")).toBe(1);
      expect(runs.count("leaf")).toBe(3);
    });
  });

  describe("memo gating", () => {
    it("should force the content only when the dependency changes", () => {
      let key = "K";
      const parentDriven: boolean[] = [];
      const content = fromFn((cx) => {
        parentDriven.push(cx.isParentChanged);
        cx.setChanged();
        return null;
      }, "Content");
      const root = fromFn((cx) => {
        cx.setChanged();
        return memo(key, content);
      }, "Root");
      const composer = new Composer(root);

      composeTimes(composer, 2);
      key = "K2";
      composeTimes(composer, 2);

      expect(parentDriven).toEqual([true, false, true, false]);
    });

    it("should not run unchanged content when the dependency is equal", () => {
      const runs = createRecorder();
      const root = fromFn((cx) => {
        cx.setChanged();
        return memo([1, 2], probe("content", runs));
      }, "Root");
      const composer = new Composer(root);

      composeTimes(composer, 4);

      expect(runs.count("content")).toBe(1);
    });
  });

  describe("dynamic swap lifecycle", () => {
    it("should drop the old type and build the new one with fresh state", () => {
      const drops = createRecorder();
      const instances: string[] = [];
      let constructed = 0;

      class A implements Composable {
        compose(cx: Scope): Child {
          const instance = useRef(cx, () => `A#${++constructed}`);
          instances.push(instance);
          useDrop(cx, () => drops.record(`drop ${instance}`));
          return null;
        }
      }

      class B implements Composable {
        compose(cx: Scope): Child {
          const instance = useRef(cx, () => `B#${++constructed}`);
          instances.push(instance);
          useDrop(cx, () => drops.record(`drop ${instance}`));
          return null;
        }
      }

      const handles: { which?: Mut<"a" | "b"> } = {};
      const root = fromFn((cx) => {
        const which = useMut(cx, (): "a" | "b" => "a");
        handles.which = which;
        return dynamic(which.value === "a" ? new A() : new B());
      }, "Switcher");
      const composer = new Composer(root);

      composer.tryCompose();
      expect(instances).toEqual(["A#1"]);

      handles.which?.set("b");
      composer.tryCompose();
      expect(drops.entries).toEqual(["drop A#1"]);
      expect(instances).toEqual(["A#1", "B#2"]);

      handles.which?.set("a");
      composer.tryCompose();
      expect(drops.entries).toEqual(["drop A#1", "drop B#2"]);
      expect(instances).toEqual(["A#1", "B#2", "A#3"]);
    });
  });

  describe("iteration resize", () => {
    it("should keep existing entries when growing and drop the tail when shrinking", () => {
      const drops = createRecorder<number>();
      const initial: number[] = [];
      let created = 0;

      const item = (index: number) =>
        fromFn((cx) => {
          const ref = useRef(cx, () => created++);
          initial[index] = ref;
          useDrop(cx, () => drops.record(index));
          return null;
        }, "Item");

      const handles: { items?: Mut<number[]> } = {};
      const root = fromFn((cx) => {
        const items = useMut(cx, () => [0, 1, 2]);
        handles.items = items;
        return fromIter(items.value, (value) => item(value));
      }, "List");
      const composer = new Composer(root);

      composer.tryCompose();
      expect(initial).toEqual([0, 1, 2]);

      handles.items?.set([0, 1, 2, 3, 4]);
      composer.tryCompose();
      expect(initial).toEqual([0, 1, 2, 3, 4]);
      expect(created).toBe(5);
      expect(drops.entries).toEqual([]);

      handles.items?.set([0, 1]);
      composer.tryCompose();
      expect(drops.entries).toEqual([4, 3, 2]);
      expect(created).toBe(5);
    });
  });

  describe("update visibility ordering", () => {
    it("should apply updates from local tasks before node bodies run", () => {
      const observed: number[] = [];
      const root = fromFn((cx) => {
        const value = useMut(cx, () => 0);
        observed.push(value.value);
        useLocalTask(cx, function* (): LocalTaskGenerator {
          value.set(42);
        });
        return null;
      }, "Root");
      const composer = new Composer(root);

      composer.tryCompose();
      const second = composer.tryCompose();

      expect(observed).toEqual([0, 42]);
      expect(second.report.tasksPolled).toBe(1);
      expect(second.report.updatesApplied).toBe(1);
    });
  });

  describe("end-to-end", () => {
    interface Shared {
      value: number;
    }

    class Counter implements Composable {
      constructor(readonly x: Shared) {}

      compose(cx: Scope): Child {
        this.x.value++;
        cx.setChanged();
        return null;
      }
    }

    class Wrap implements Composable {
      constructor(readonly x: Shared) {}

      compose(): Child {
        return new Counter(this.x);
      }
    }

    class Root implements Composable {
      constructor(readonly x: Shared) {}

      compose(): Child {
        return new Wrap(this.x);
      }
    }

    it("should count one increment per pass", () => {
      const x: Shared = { value: 0 };
      const composer = new Composer(new Root(x));

      const reports = composeTimes(composer, 3);

      expect(x.value).toBe(3);
      expect(reports[0]?.recomposed).toBe(3);
      expect(reports[1]).toMatchObject({ recomposed: 1, skipped: 2 });
      expect(reports[2]).toMatchObject({ recomposed: 1, skipped: 2 });
    });
  });
});
