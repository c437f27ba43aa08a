import { assert, createRng, describe, test } from "../index.js";

describe("createRng", () => {
  test("the same seed yields the same sequence", () => {
    const a = createRng(7);
    const b = createRng(7);
    for (let i = 0; i < 16; i++) assert.equal(a.u32(), b.u32());
  });

  test("steps a 32-bit linear congruential generator", () => {
    const rng = createRng(0);
    assert.equal(rng.u32(), 1013904223);
    assert.equal(rng.u32(), 1196435762);
  });

  test("float stays in [0, 1)", () => {
    const rng = createRng(42);
    for (let i = 0; i < 100; i++) {
      const v = rng.float();
      assert.ok(v >= 0 && v < 1);
    }
  });
});
