import { assert, captureConsoleWarn, test } from "../index.js";

test("captureConsoleWarn records joined arguments and restores console.warn", () => {
  const before = console.warn;
  const lines = captureConsoleWarn(() => {
    console.warn("first");
    console.warn("a", 1, true);
  });
  assert.deepEqual(lines, ["first", "a 1 true"]);
  assert.equal(console.warn, before);
});

test("captureConsoleWarn restores console.warn when the callback throws", () => {
  const before = console.warn;
  assert.throws(
    () =>
      captureConsoleWarn(() => {
        throw new Error("boom");
      }),
    /boom/,
  );
  assert.equal(console.warn, before);
});
