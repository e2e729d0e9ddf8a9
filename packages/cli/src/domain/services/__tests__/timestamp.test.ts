import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { formatTimestamp, isCanonicalTimestamp, parseTimestamp } from "../timestamp";

describe("timestamps", () => {
  it("formats local time as YYYY-MM-DD HH:MM:SS", () => {
    assert.strictEqual(formatTimestamp(new Date(2024, 0, 5, 7, 8, 9)), "2024-01-05 07:08:09");
  });

  it("parses canonical text back to the same wall-clock time", () => {
    const parsed = parseTimestamp("2023-11-30 23:59:58");

    assert.ok(parsed);
    assert.strictEqual(parsed.getFullYear(), 2023);
    assert.strictEqual(parsed.getMonth(), 10);
    assert.strictEqual(parsed.getDate(), 30);
    assert.strictEqual(parsed.getHours(), 23);
    assert.strictEqual(parsed.getMinutes(), 59);
    assert.strictEqual(parsed.getSeconds(), 58);
  });

  it("rejects text that is not in canonical form", () => {
    assert.strictEqual(isCanonicalTimestamp("2024-1-5 7:08:09"), false);
    assert.strictEqual(isCanonicalTimestamp("2024-02-30 10:00:00"), false);
    assert.strictEqual(isCanonicalTimestamp("2024-01-05T07:08:09"), false);
    assert.strictEqual(isCanonicalTimestamp("yesterday"), false);
    assert.strictEqual(isCanonicalTimestamp(""), false);
  });

  it("rejects times of day outside the clock", () => {
    assert.strictEqual(isCanonicalTimestamp("2024-01-05 24:00:00"), false);
    assert.strictEqual(isCanonicalTimestamp("2024-01-05 23:60:00"), false);
    assert.strictEqual(isCanonicalTimestamp("2024-01-05 23:59:60"), false);
    assert.strictEqual(isCanonicalTimestamp("2024-02-29 23:59:59"), true);
    assert.strictEqual(isCanonicalTimestamp("2023-02-29 12:00:00"), false);
  });

  it("accepts wall-clock times skipped by a local daylight-saving jump", () => {
    const originalTz = process.env.TZ;
    process.env.TZ = "America/New_York";

    try {
      assert.notStrictEqual(parseTimestamp("2024-03-10 02:30:00"), null);
      assert.strictEqual(isCanonicalTimestamp("2024-03-10 02:30:00"), true);
      assert.strictEqual(isCanonicalTimestamp("2024-11-03 01:30:00"), true);
    } finally {
      if (originalTz === undefined) {
        delete process.env.TZ;
      } else {
        process.env.TZ = originalTz;
      }
    }
  });
});
