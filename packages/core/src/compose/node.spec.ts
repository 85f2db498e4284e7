import { isStateError } from "arbor-shared";
import { Runtime } from "../runtime/runtime";
import { ErasedNode } from "./node";
import type { Scope } from "./scope";
import { STRUCTURAL_ID, composableName, structuralIdOf, type Child, type Composable } from "./types";

class Label implements Composable {
  constructor(readonly text: string) {}

  compose(): Child {
    return null;
  }
}

class Button implements Composable {
  compose(): Child {
    return null;
  }
}

class Tagged implements Composable {
  readonly [STRUCTURAL_ID] = "shared-tag";
  readonly displayName = "Tagged";

  compose(): Child {
    return null;
  }
}

describe("structural identity", () => {
  it("should default to the constructor", () => {
    expect(structuralIdOf(new Label("a"))).toBe(Label);
    expect(composableName(new Label("a"))).toBe("Label");
  });

  it("should prefer an explicit structural id and display name", () => {
    expect(structuralIdOf(new Tagged())).toBe("shared-tag");
    expect(composableName(new Tagged())).toBe("Tagged");
  });

  it("should name plain objects anonymously", () => {
    expect(composableName({ compose: () => null })).toBe("Anonymous");
  });
});

describe("ErasedNode", () => {
  it("should exchange values with the same structural id", () => {
    const node = new ErasedNode(new Label("before"));
    const next = new Label("after");

    expect(node.accepts(next)).toBe(true);
    node.exchange(next);

    expect(node.value).toBe(next);
    expect(node.name).toBe("Label");
  });

  it("should refuse values with a different structural id", () => {
    const node = new ErasedNode(new Label("a"));

    expect(node.accepts(new Button())).toBe(false);

    let thrown: unknown;
    try {
      node.exchange(new Button());
    } catch (error) {
      thrown = error;
    }

    expect(isStateError(thrown)).toBe(true);
    expect(thrown).toMatchObject({ code: "STATE_STRUCTURAL_MISMATCH" });
  });

  it("should run compose with a handle that is revoked afterwards", () => {
    const state = new Runtime().createScope(null, "Probe");
    const handles: Scope[] = [];
    const node = new ErasedNode({
      compose: (cx: Scope) => {
        handles.push(cx);
        return null;
      },
    });

    expect(node.compose(state)).toBeNull();
    expect(handles).toHaveLength(1);
    expect(handles[0]?.isLive).toBe(false);
    expect(state.mounted).toBe(true);
  });

  it("should revoke the handle even when compose throws", () => {
    const state = new Runtime().createScope(null, "Throwing");
    const handles: Scope[] = [];
    const node = new ErasedNode({
      compose: (cx: Scope): Child => {
        handles.push(cx);
        throw new Error("boom");
      },
    });

    expect(() => node.compose(state)).toThrow("boom");
    expect(handles[0]?.isLive).toBe(false);
    expect(state.mounted).toBe(false);
  });
});
