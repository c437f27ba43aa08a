import { assert, createRng, describe, test } from "@panelstack/testkit";
import type { DiagnosticDetail } from "../../diagnostics/types.js";
import { type HeadlessBackend, createHeadlessBackend } from "../../testing/index.js";
import type { ContainerKind } from "../kinds.js";
import { type ReconcileHost, closeContainer, forceCloseAll, openContainer } from "../reconcile.js";
import { ContainerStack } from "../stack.js";

type TestHost = ReconcileHost & {
  readonly backend: HeadlessBackend;
  readonly reported: DiagnosticDetail[];
  flagged: boolean;
};

const RECT = { x: 0, y: 0, width: 200, height: 100 };

function createHost(): TestHost {
  const backend = createHeadlessBackend({ treenodeOpen: () => true });
  backend.startFrame();
  const host: TestHost = {
    backend,
    stack: new ContainerStack(),
    reported: [],
    flagged: false,
    report(detail) {
      host.reported.push(detail);
    },
    flagError() {
      host.flagged = true;
    },
  };
  return host;
}

function open(host: TestHost, kind: Exclude<ContainerKind, "popup">, name: string): void {
  switch (kind) {
    case "panel":
      host.backend.startPanel(name, RECT);
      break;
    case "inset":
      host.backend.startInset(name);
      break;
    case "treenode":
      host.backend.startTreenode(name);
      break;
    case "column":
      host.backend.startColumn();
      break;
  }
  openContainer(host, kind, name, true);
}

describe("openContainer", () => {
  test("pushes only when the backend reports the container open", () => {
    const host = createHost();
    openContainer(host, "treenode", "collapsed", false);
    assert.equal(host.stack.size, 0);
    openContainer(host, "panel", "p", true);
    assert.deepEqual(host.stack.refs(), [{ kind: "panel", name: "p" }]);
  });

  test("accepts any open without reporting, even a duplicate of the top", () => {
    const host = createHost();
    open(host, "panel", "p");
    open(host, "panel", "p");
    assert.equal(host.stack.size, 2);
    assert.deepEqual(host.reported, []);
    assert.equal(host.flagged, false);
  });

  test("pushes the new top's layout to the backend", () => {
    const host = createHost();
    open(host, "panel", "p");
    assert.deepEqual(host.backend.calls.at(-1), { op: "setLayout", args: [[-1], 0] });
  });
});

describe("closeContainer", () => {
  test("well-nested closes pair backend ends with pops in LIFO order", () => {
    const host = createHost();
    open(host, "panel", "a");
    open(host, "column", "");
    open(host, "inset", "i");
    host.backend.clearCalls();

    assert.deepEqual(closeContainer(host, "inset", "i"), { kind: "closed" });
    assert.deepEqual(closeContainer(host, "column", ""), { kind: "closed" });
    assert.deepEqual(closeContainer(host, "panel", "a"), { kind: "closed" });

    assert.deepEqual(host.backend.opsExcept("setLayout"), ["endInset", "endColumn", "endPanel"]);
    assert.equal(host.stack.size, 0);
    assert.deepEqual(host.backend.openKinds(), []);
    assert.equal(host.flagged, false);
    assert.deepEqual(host.reported, []);
  });

  test("a matching close re-pushes the layout of the container underneath", () => {
    const host = createHost();
    open(host, "panel", "a");
    host.stack.peek()?.layoutWidths.push(40);
    open(host, "column", "");
    host.backend.clearCalls();

    closeContainer(host, "column", "");

    assert.deepEqual(host.backend.calls, [
      { op: "endColumn", args: [] },
      { op: "setLayout", args: [[-1, 40], 0] },
    ]);
  });

  test("closing with nothing open is a backend no-op that flags the frame", () => {
    const host = createHost();
    host.backend.clearCalls();

    assert.deepEqual(closeContainer(host, "panel", "p"), { kind: "orphan" });

    assert.equal(host.stack.size, 0);
    assert.deepEqual(host.backend.calls, []);
    assert.equal(host.flagged, true);
    assert.deepEqual(host.reported, [
      { code: "orphanClose", container: { kind: "panel", name: "p" }, expected: null },
    ]);
  });

  test("closing the outermost of three unwinds C, B, A exactly once each", () => {
    const host = createHost();
    open(host, "panel", "A");
    open(host, "inset", "B");
    open(host, "treenode", "C");
    host.backend.clearCalls();

    const outcome = closeContainer(host, "panel", "A");

    assert.deepEqual(host.backend.ops(), ["endTreenode", "setLayout", "endInset", "setLayout", "endPanel"]);
    assert.deepEqual(outcome, {
      kind: "unwound",
      closed: [
        { kind: "treenode", name: "C" },
        { kind: "inset", name: "B" },
        { kind: "panel", name: "A" },
      ],
    });
    assert.equal(host.stack.size, 0);
    assert.deepEqual(host.backend.openKinds(), []);
    assert.equal(host.flagged, true);
    assert.deepEqual(host.reported, [
      {
        code: "prematureClose",
        container: { kind: "panel", name: "A" },
        unclosed: [
          { kind: "treenode", name: "C" },
          { kind: "inset", name: "B" },
        ],
      },
    ]);
  });

  test("unwinding stops at the innermost match and keeps outer containers", () => {
    const host = createHost();
    open(host, "treenode", "t");
    open(host, "panel", "p");
    open(host, "treenode", "t");
    open(host, "column", "");
    host.backend.clearCalls();

    closeContainer(host, "treenode", "t");

    assert.deepEqual(host.backend.opsExcept("setLayout"), ["endColumn", "endTreenode"]);
    assert.deepEqual(host.stack.refs(), [
      { kind: "panel", name: "p" },
      { kind: "treenode", name: "t" },
    ]);
    assert.deepEqual(host.backend.openKinds(), ["treenode", "panel"]);
    assert.deepEqual(host.backend.calls.at(-1), { op: "setLayout", args: [[-1], 0] });
  });

  test("an unwind re-pushes the layout of each container it uncovers", () => {
    const host = createHost();
    open(host, "panel", "A");
    host.stack.peek()?.layoutWidths.push(40);
    open(host, "inset", "B");
    host.stack.peek()?.layoutWidths.push(25);
    open(host, "treenode", "C");
    open(host, "column", "");
    host.backend.clearCalls();

    closeContainer(host, "inset", "B");

    assert.deepEqual(host.backend.calls, [
      { op: "endColumn", args: [] },
      { op: "setLayout", args: [[-1], 0] },
      { op: "endTreenode", args: [] },
      { op: "setLayout", args: [[-1, 25], 0] },
      { op: "endInset", args: [] },
      { op: "setLayout", args: [[-1, 40], 0] },
    ]);
  });

  test("the diagnostic is reported once the unwind has finished", () => {
    const host = createHost();
    open(host, "panel", "p");
    open(host, "column", "");
    const depthsSeen: number[] = [];
    const reentrant: ReconcileHost = {
      backend: host.backend,
      stack: host.stack,
      report(detail) {
        depthsSeen.push(host.stack.size);
        host.reported.push(detail);
        if (detail.code === "prematureClose") closeContainer(host, "column", "");
      },
      flagError() {
        host.flagged = true;
      },
    };

    const outcome = closeContainer(reentrant, "panel", "p");

    assert.deepEqual(outcome, {
      kind: "unwound",
      closed: [
        { kind: "column", name: "" },
        { kind: "panel", name: "p" },
      ],
    });
    assert.deepEqual(depthsSeen, [0]);
    assert.equal(host.stack.size, 0);
    assert.deepEqual(host.backend.openKinds(), []);
    assert.deepEqual(
      host.reported.map((d) => d.code),
      ["prematureClose", "orphanClose"],
    );
  });

  test("closing a container that is not open anywhere leaves everything unchanged", () => {
    const host = createHost();
    open(host, "panel", "a");
    open(host, "treenode", "t");
    const before = JSON.stringify(host.stack.refs());
    const layoutBefore = JSON.stringify(host.stack.peek());
    host.backend.clearCalls();

    assert.deepEqual(closeContainer(host, "inset", "x"), { kind: "orphan" });

    assert.equal(JSON.stringify(host.stack.refs()), before);
    assert.equal(JSON.stringify(host.stack.peek()), layoutBefore);
    assert.deepEqual(host.backend.calls, []);
    assert.equal(host.flagged, true);
    assert.deepEqual(host.reported, [
      {
        code: "orphanClose",
        container: { kind: "inset", name: "x" },
        expected: { kind: "treenode", name: "t" },
      },
    ]);
  });

  test("names are matched exactly, so a typo is an orphan close", () => {
    const host = createHost();
    open(host, "panel", "Settings");
    host.backend.clearCalls();

    closeContainer(host, "panel", "settings");

    assert.equal(host.stack.size, 1);
    assert.deepEqual(host.backend.calls, []);
  });

  test("random well-nested sequences always balance", () => {
    const kinds = ["panel", "inset", "treenode", "column"] as const;
    for (let seed = 1; seed <= 25; seed++) {
      const rng = createRng(seed);
      const host = createHost();
      const opened: { kind: (typeof kinds)[number]; name: string }[] = [];
      const expectedEnds: string[] = [];

      for (let step = 0; step < 40; step++) {
        const shouldOpen = opened.length === 0 || (opened.length < 8 && rng.u32() % 100 < 55);
        if (shouldOpen) {
          const kind = kinds[rng.u32() % kinds.length] ?? "panel";
          const name = kind === "column" ? "" : `c${step}`;
          open(host, kind, name);
          opened.push({ kind, name });
        } else {
          const top = opened.pop();
          if (top === undefined) continue;
          closeContainer(host, top.kind, top.name);
          expectedEnds.push(top.kind);
        }
      }
      while (opened.length > 0) {
        const top = opened.pop();
        if (top === undefined) break;
        closeContainer(host, top.kind, top.name);
        expectedEnds.push(top.kind);
      }

      const ends = host.backend
        .ops()
        .filter((op) => op.startsWith("end"))
        .map((op) => op.slice(3).toLowerCase());
      assert.deepEqual(ends, expectedEnds, `seed ${seed}`);
      assert.equal(host.stack.size, 0, `seed ${seed}`);
      assert.equal(host.flagged, false, `seed ${seed}`);
    }
  });
});

describe("forceCloseAll", () => {
  test("closes innermost first, reports each container, and empties the stack", () => {
    const host = createHost();
    open(host, "panel", "X");
    open(host, "treenode", "Y");
    host.backend.clearCalls();

    const closed = forceCloseAll(host);

    assert.deepEqual(host.backend.ops(), ["endTreenode", "setLayout", "endPanel"]);
    assert.deepEqual(closed, [
      { kind: "treenode", name: "Y" },
      { kind: "panel", name: "X" },
    ]);
    assert.equal(host.stack.size, 0);
    assert.equal(host.flagged, true);
    assert.deepEqual(
      host.reported.map((d) => d.code),
      ["unclosedAtDraw", "unclosedAtDraw"],
    );
  });

  test("re-pushes the outer layout after each forced close", () => {
    const host = createHost();
    open(host, "panel", "X");
    host.stack.peek()?.layoutWidths.push(40);
    open(host, "column", "");
    host.backend.clearCalls();

    forceCloseAll(host);

    assert.deepEqual(host.backend.calls, [
      { op: "endColumn", args: [] },
      { op: "setLayout", args: [[-1, 40], 0] },
      { op: "endPanel", args: [] },
    ]);
  });

  test("a report that closes containers itself does not cause extra closes", () => {
    const host = createHost();
    open(host, "panel", "X");
    open(host, "treenode", "Y");
    const reentrant: ReconcileHost = {
      backend: host.backend,
      stack: host.stack,
      report(detail) {
        host.reported.push(detail);
        if (host.stack.size > 0) closeContainer(host, "panel", "X");
      },
      flagError() {
        host.flagged = true;
      },
    };
    host.backend.clearCalls();

    const closed = forceCloseAll(reentrant);

    assert.deepEqual(closed, [{ kind: "treenode", name: "Y" }]);
    assert.deepEqual(host.backend.opsExcept("setLayout"), ["endTreenode", "endPanel"]);
    assert.equal(host.stack.size, 0);
  });

  test("does nothing when the stack is already empty", () => {
    const host = createHost();
    host.backend.clearCalls();
    assert.deepEqual(forceCloseAll(host), []);
    assert.deepEqual(host.backend.calls, []);
    assert.equal(host.flagged, false);
  });
});
