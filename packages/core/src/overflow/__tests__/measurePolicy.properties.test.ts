import { assert, createRng, describe, test } from "@railkit/testkit";
import { maxConstraints } from "../../layout/constraints.js";
import { fixedMeasurable } from "../../testing/index.js";
import { type OverflowMeasureResult, createOverflowMeasurePolicy } from "../measurePolicy.js";
import { createOverflowState } from "../state.js";

const RESERVED = 10;
const ITERATIONS = 200;

function run(extents: readonly number[], mainMax: number, maxItemCount?: number): OverflowMeasureResult {
  const policy = createOverflowMeasurePolicy({
    orientation: "horizontal",
    state: createOverflowState(),
    ...(maxItemCount === undefined ? {} : { maxItemCount }),
  });
  return policy.measure(
    extents.map((w) => fixedMeasurable(w, 1)),
    [fixedMeasurable(RESERVED, 1)],
    maxConstraints(mainMax, 1),
  );
}

/**
 * Largest prefix that fits before the reservation, plus the trailing-item
 * allowance. Items are measured inside the incoming box, so extents are
 * capped at `mainMax`.
 */
function expectedVisible(extents: readonly number[], mainMax: number): number {
  const budget = mainMax - RESERVED;
  let sum = 0;
  let k = 0;
  while (k < extents.length) {
    const e = Math.min(extents[k] ?? 0, mainMax);
    const isLast = k === extents.length - 1;
    if (sum + e <= budget || (isLast && sum + e <= budget + RESERVED)) {
      sum += e;
      k++;
      continue;
    }
    break;
  }
  return k;
}

describe("overflow measure policy - properties", () => {
  test("visible count is the longest prefix that fits", () => {
    const rng = createRng(0x5eed);
    for (let i = 0; i < ITERATIONS; i++) {
      const extents = rng.ints(rng.int(0, 8), 1, 30);
      const mainMax = rng.int(RESERVED, 200);
      const res = run(extents, mainMax);
      assert.equal(
        res.visibleItemCount,
        expectedVisible(extents, mainMax),
        `extents=${JSON.stringify(extents)} mainMax=${String(mainMax)}`,
      );
      assert.equal(res.totalItemCount, extents.length);
      assert.ok(res.visibleItemCount <= res.totalItemCount);
    }
  });

  test("more room never shows fewer items", () => {
    const rng = createRng(7);
    for (let i = 0; i < ITERATIONS; i++) {
      const extents = rng.ints(rng.int(1, 8), 1, 30);
      const mainMax = rng.int(RESERVED, 150);
      const smaller = run(extents, mainMax);
      const larger = run(extents, mainMax + rng.int(1, 50));
      assert.ok(larger.visibleItemCount >= smaller.visibleItemCount);
    }
  });

  test("a cap below the item count always leaves a slot for the indicator", () => {
    const rng = createRng(42);
    for (let i = 0; i < ITERATIONS; i++) {
      const n = rng.int(2, 8);
      const extents = rng.ints(n, 1, 30);
      const cap = rng.int(1, n - 1);
      const res = run(extents, rng.int(RESERVED, 200), cap);
      assert.ok(res.visibleItemCount <= cap - 1);

      const roomy = run(extents, 10_000, cap);
      assert.equal(roomy.visibleItemCount, cap - 1);
      assert.equal(roomy.totalItemCount, n);
    }
  });

  test("caps at or above the item count, and caps <= 0, never trigger", () => {
    const rng = createRng(99);
    for (let i = 0; i < ITERATIONS; i++) {
      const n = rng.int(0, 8);
      const extents = rng.ints(n, 1, 30);
      const mainMax = rng.int(RESERVED, 200);
      const unbounded = run(extents, mainMax).visibleItemCount;
      assert.equal(run(extents, mainMax, n).visibleItemCount, unbounded);
      assert.equal(run(extents, mainMax, n + rng.int(1, 5)).visibleItemCount, unbounded);
      assert.equal(run(extents, mainMax, 0).visibleItemCount, unbounded);
      assert.equal(run(extents, mainMax, -rng.int(1, 5)).visibleItemCount, unbounded);
    }
  });

  test("identical inputs give identical results", () => {
    const rng = createRng(1234);
    const state = createOverflowState();
    const policy = createOverflowMeasurePolicy({ orientation: "vertical", maxItemCount: 5, state });
    for (let i = 0; i < 50; i++) {
      const content = rng.ints(rng.int(0, 8), 1, 30).map((h) => fixedMeasurable(2, h));
      const incoming = maxConstraints(3, rng.int(0, 200));
      const first = policy.measure(content, [fixedMeasurable(1, RESERVED)], incoming);
      const firstCounts = [state.totalItemCount, state.visibleItemCount];
      const second = policy.measure(content, [fixedMeasurable(1, RESERVED)], incoming);
      assert.deepEqual(second, first);
      assert.deepEqual([state.totalItemCount, state.visibleItemCount], firstCounts);
    }
  });

  test("final size never leaves the incoming box", () => {
    const rng = createRng(2024);
    for (let i = 0; i < ITERATIONS; i++) {
      const extents = rng.ints(rng.int(0, 8), 1, 30);
      const mainMax = rng.int(0, 200);
      const res = run(extents, mainMax);
      assert.ok(res.size.w >= 0 && res.size.w <= mainMax);
      assert.ok(res.size.h >= 0 && res.size.h <= 1);
      for (const p of res.placements) assert.ok(p.rect.x >= 0);
    }
  });
});

describe("overflow measure policy - trailing item allowance", () => {
  test("the last item may use the reserved slot exactly", () => {
    const res = run([80, 20], 100);
    assert.equal(res.visibleItemCount, 2);
    assert.deepEqual(res.size, { w: 100, h: 1 });
    assert.equal(res.placements.length, 2);
  });

  test("one cell past the reserved slot overflows", () => {
    const res = run([80, 21], 100);
    assert.equal(res.visibleItemCount, 1);
    assert.deepEqual(res.size, { w: 90, h: 1 });
    assert.deepEqual(res.placements[1], { kind: "overflow", rect: { x: 80, y: 0, w: 10, h: 1 } });
  });

  test("interior items never use the reserved slot", () => {
    // 45 fits in remaining + reserved (40 + 10) but is not the last item.
    const res = run([50, 45, 5], 100);
    assert.equal(res.visibleItemCount, 1);
    assert.equal(res.totalItemCount, 3);
  });

  test("the allowance applies to a lone item", () => {
    assert.equal(run([95], 100).visibleItemCount, 1);
    assert.equal(run([50, 51], 100).visibleItemCount, 1);
  });
});
