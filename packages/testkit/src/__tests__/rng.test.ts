import { assert, createRng, describe, test } from "../index.js";

describe("createRng", () => {
  test("same seed yields the same sequence", () => {
    const a = createRng(42);
    const b = createRng(42);
    assert.deepEqual(a.ints(8, 0, 1000), b.ints(8, 0, 1000));
  });

  test("int stays inside the inclusive range", () => {
    const rng = createRng(7);
    for (const n of rng.ints(500, -3, 3)) {
      assert.ok(Number.isInteger(n) && n >= -3 && n <= 3, String(n));
    }
  });

  test("a single-value range always returns that value", () => {
    assert.deepEqual(createRng(1).ints(3, 5, 5), [5, 5, 5]);
  });

  test("max below min throws", () => {
    assert.throws(() => createRng(1).int(2, 1), RangeError);
  });
});
