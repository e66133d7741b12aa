import { assert, beforeEach, describe, test } from "@railkit/testkit";
import {
  clearTextMeasureCache,
  getTextMeasureCacheSize,
  measureTextCells,
  segmentGraphemes,
  truncateWithEllipsis,
} from "../textMeasure.js";

describe("measureTextCells", () => {
  beforeEach(() => {
    clearTextMeasureCache();
  });

  test("ascii is one cell per character, controls are zero", () => {
    assert.equal(measureTextCells(""), 0);
    assert.equal(measureTextCells("Save"), 4);
    assert.equal(measureTextCells("a\tb\n"), 2);
  });

  test("wide scripts take two cells", () => {
    assert.equal(measureTextCells("日本語"), 6);
    assert.equal(measureTextCells("한"), 2);
    assert.equal(measureTextCells("ｱ"), 1);
  });

  test("combining marks merge with their base", () => {
    assert.equal(measureTextCells("e\u0301"), 1);
    assert.equal(measureTextCells("\u0301"), 0);
  });

  test("emoji clusters take two cells", () => {
    assert.equal(measureTextCells("💾"), 2);
    assert.equal(measureTextCells("\u2702\ufe0f"), 2);
    assert.equal(measureTextCells("\u2702"), 1);
    assert.equal(measureTextCells("👍🏽"), 2);
  });

  test("menu glyphs used by toolbars are narrow", () => {
    assert.equal(measureTextCells("⋮"), 1);
    assert.equal(measureTextCells("…"), 1);
  });

  test("short strings are cached, long ones are not", () => {
    measureTextCells("cached");
    measureTextCells("cached");
    assert.equal(getTextMeasureCacheSize(), 1);
    measureTextCells("x".repeat(200));
    assert.equal(getTextMeasureCacheSize(), 1);
  });
});

describe("segmentGraphemes", () => {
  test("reports one entry per cluster", () => {
    assert.deepEqual(segmentGraphemes("a日e\u0301"), [
      { segment: "a", width: 1 },
      { segment: "日", width: 2 },
      { segment: "e\u0301", width: 1 },
    ]);
  });
});

describe("truncateWithEllipsis", () => {
  test("returns text unchanged when it fits", () => {
    assert.equal(truncateWithEllipsis("Copy", 4), "Copy");
  });

  test("cuts and appends an ellipsis", () => {
    assert.equal(truncateWithEllipsis("Mark unread", 6), "Mark …");
    assert.equal(truncateWithEllipsis("Copy", 1), "…");
    assert.equal(truncateWithEllipsis("Copy", 0), "");
  });

  test("never splits a wide cluster", () => {
    assert.equal(truncateWithEllipsis("日本語", 4), "日…");
    assert.equal(measureTextCells(truncateWithEllipsis("日本語", 4)), 3);
  });
});
