import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  containsIgnoreCase,
  equalsIgnoreCase,
  isDecimalDigits,
  splitWords,
  truncateWithEllipsis
} from "../text";

describe("truncateWithEllipsis", () => {
  it("leaves strings within the limit untouched", () => {
    assert.strictEqual(truncateWithEllipsis("Example", 10), "Example");
    assert.strictEqual(truncateWithEllipsis("0123456789", 10), "0123456789");
  });

  it("cuts long strings to exactly the limit and marks them", () => {
    const truncated = truncateWithEllipsis("abcdefghijklmnop", 10);

    assert.strictEqual(truncated, "abcdefg...");
    assert.strictEqual(truncated.length, 10);
  });

  it("keeps the prefix when the title limit is applied", () => {
    const source = "x".repeat(40) + "y".repeat(40);
    const truncated = truncateWithEllipsis(source, 63);

    assert.strictEqual(truncated.length, 63);
    assert.strictEqual(truncated, source.slice(0, 60) + "...");
  });
});

describe("case-insensitive helpers", () => {
  it("finds substrings regardless of case", () => {
    assert.strictEqual(containsIgnoreCase("TypeScript Handbook", "script hand"), true);
    assert.strictEqual(containsIgnoreCase("TypeScript Handbook", "rust"), false);
    assert.strictEqual(containsIgnoreCase("anything", ""), true);
  });

  it("compares whole strings regardless of case", () => {
    assert.strictEqual(equalsIgnoreCase("Tools", "tOOLS"), true);
    assert.strictEqual(equalsIgnoreCase("Tools", "Tool"), false);
  });
});

describe("token helpers", () => {
  it("recognises all-digit tokens only", () => {
    assert.strictEqual(isDecimalDigits("42"), true);
    assert.strictEqual(isDecimalDigits("4x"), false);
    assert.strictEqual(isDecimalDigits(""), false);
  });

  it("splits on spaces and drops empty words", () => {
    assert.deepStrictEqual(splitWords(" tools  3 reading "), ["tools", "3", "reading"]);
  });
});
