import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { NotFoundError, ValidationError } from "../../models/errors";
import { TagRegistry, normalizeTagName } from "../tag-registry";

describe("normalizeTagName", () => {
  it("replaces internal spaces with hyphens", () => {
    assert.strictEqual(normalizeTagName("read later"), "read-later");
    assert.strictEqual(normalizeTagName("a b  c"), "a-b--c");
  });

  it("rejects names that start with a digit", () => {
    assert.throws(() => normalizeTagName("9lives"), ValidationError);
  });

  it("rejects reserved command words in any case", () => {
    for (const name of ["add", "Update", "RENAME", "remove"]) {
      assert.throws(() => normalizeTagName(name), ValidationError);
    }
  });

  it("truncates long names to the tag name limit", () => {
    assert.strictEqual(normalizeTagName("n".repeat(40)), "n".repeat(28) + "...");
  });
});

describe("TagRegistry", () => {
  it("allocates ids monotonically across removals", () => {
    const registry = new TagRegistry();
    const tools = registry.add("tools");
    registry.add("news");
    registry.remove(tools.id);
    const reading = registry.add("reading");

    assert.strictEqual(reading.id, 3);
    assert.strictEqual(registry.nextId, 4);
    assert.deepStrictEqual(
      [...registry].map((tag) => tag.name),
      ["news", "reading"]
    );
  });

  it("resolves digit tokens as ids and others by case-insensitive name", () => {
    const registry = new TagRegistry();
    registry.add("tools");
    registry.add("read-later");

    assert.strictEqual(registry.resolve("2").name, "read-later");
    assert.strictEqual(registry.resolve("TOOLS").id, 1);
    assert.strictEqual(registry.resolve("read later").id, 2);
  });

  it("reports unknown ids and names as NotFound", () => {
    const registry = new TagRegistry();
    registry.add("tools");

    assert.throws(() => registry.resolve("5"), NotFoundError);
    assert.throws(() => registry.resolve("missing"), NotFoundError);
  });

  it("permits duplicate names and resolves to the first one", () => {
    const registry = new TagRegistry();
    registry.add("dup");
    registry.add("dup");

    assert.strictEqual(registry.resolve("dup").id, 1);
  });

  it("renames in place", () => {
    const registry = new TagRegistry();
    registry.add("tools");

    registry.rename(1, "utilities");

    assert.deepStrictEqual(registry.get(1), { id: 1, name: "utilities" });
    assert.throws(() => registry.rename(9, "x"), NotFoundError);
  });
});
