import { assert, describe, test } from "@railkit/testkit";
import { RailError } from "../../errors.js";
import {
  createOverflowState,
  hasOverflow,
  isValidOverflowCounts,
  overflowRange,
  overflowStateSaver,
} from "../state.js";

describe("overflow state", () => {
  test("starts at zero on first run", () => {
    assert.deepEqual(createOverflowState(), { totalItemCount: 0, visibleItemCount: 0 });
  });

  test("accepts a valid restored pair", () => {
    const state = createOverflowState({ totalItemCount: 5, visibleItemCount: 3 });
    assert.equal(state.totalItemCount, 5);
    assert.equal(state.visibleItemCount, 3);
    assert.equal(hasOverflow(state), true);
    assert.deepEqual(overflowRange(state), { start: 3, end: 5 });
  });

  test("rejects visible > total", () => {
    assert.throws(
      () => createOverflowState({ totalItemCount: 2, visibleItemCount: 3 }),
      (err: unknown) => err instanceof RailError && err.code === "RAIL_INVALID_STATE",
    );
  });

  test("rejects negative and fractional counts", () => {
    assert.equal(isValidOverflowCounts(-1, 0), false);
    assert.equal(isValidOverflowCounts(3, 1.5), false);
    assert.equal(isValidOverflowCounts("3", 1), false);
    assert.equal(isValidOverflowCounts(3, 3), true);
    assert.equal(isValidOverflowCounts(0, 0), true);
  });

  test("no overflow when everything is visible", () => {
    const state = createOverflowState({ totalItemCount: 4, visibleItemCount: 4 });
    assert.equal(hasOverflow(state), false);
    assert.deepEqual(overflowRange(state), { start: 4, end: 4 });
  });
});

describe("overflow state saver", () => {
  test("saves total first, then visible", () => {
    const saved = overflowStateSaver.save(createOverflowState({ totalItemCount: 7, visibleItemCount: 2 }));
    assert.deepEqual(saved, [7, 2]);
  });

  test("round trips the two counts exactly", () => {
    for (const [total, visible] of [
      [0, 0],
      [1, 0],
      [9, 9],
      [12, 5],
    ] as const) {
      const state = createOverflowState({ totalItemCount: total, visibleItemCount: visible });
      const restored = overflowStateSaver.restore(JSON.parse(JSON.stringify(overflowStateSaver.save(state))));
      assert.deepEqual(restored, { totalItemCount: total, visibleItemCount: visible });
    }
  });

  test("restore rejects anything that is not a valid pair", () => {
    assert.equal(overflowStateSaver.restore(null), null);
    assert.equal(overflowStateSaver.restore({ totalItemCount: 1, visibleItemCount: 0 }), null);
    assert.equal(overflowStateSaver.restore([3]), null);
    assert.equal(overflowStateSaver.restore([3, 1, 0]), null);
    assert.equal(overflowStateSaver.restore([1, 3]), null);
    assert.equal(overflowStateSaver.restore([3, -1]), null);
    assert.equal(overflowStateSaver.restore(["3", "1"]), null);
  });

  test("restored state is a fresh writable record", () => {
    const restored = overflowStateSaver.restore([4, 1]);
    if (restored === null) throw new Error("expected a restored state");
    restored.visibleItemCount = 4;
    assert.deepEqual(restored, { totalItemCount: 4, visibleItemCount: 4 });
  });
});
