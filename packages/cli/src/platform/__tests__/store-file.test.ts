import { after, before, describe, it } from "node:test";
import assert from "node:assert/strict";
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { DecodeError, IOError } from "../../domain/models/errors";
import { createEmptyStore, serializeStore } from "../../domain/services/store-codec";
import { loadStore, saveStore } from "../store-file";

const EMPTY_STORE_TEXT = '{\n\t"tags": {},\n\t"rows": {}\n}\n';

let workDir = "";

before(async () => {
  workDir = await mkdtemp(join(tmpdir(), "linkshelf-store-"));
});

after(async () => {
  await rm(workDir, { recursive: true, force: true });
});

async function freshDir(name: string): Promise<string> {
  const dir = join(workDir, name);
  await mkdir(dir, { recursive: true });
  return dir;
}

function answering(answer: boolean) {
  const questions: string[] = [];
  const confirm = async (question: string) => {
    questions.push(question);
    return answer;
  };
  return { confirm, questions };
}

describe("saveStore", () => {
  it("creates missing directories and leaves no temporary files", async () => {
    const dir = await freshDir("save");
    const path = join(dir, "nested", "store.json");
    const store = createEmptyStore();
    store.tags.add("tools");

    await saveStore(path, store);

    assert.strictEqual(await readFile(path, "utf-8"), serializeStore(store));
    assert.deepStrictEqual(await readdir(join(dir, "nested")), ["store.json"]);
  });

  it("replaces an existing file", async () => {
    const dir = await freshDir("replace");
    const path = join(dir, "store.json");
    await writeFile(path, "old contents", "utf-8");

    await saveStore(path, createEmptyStore());

    assert.strictEqual(await readFile(path, "utf-8"), EMPTY_STORE_TEXT);
  });

  it("fails with an IOError and cleans up when the target cannot be replaced", async () => {
    const dir = await freshDir("blocked");
    const path = join(dir, "store.json");
    await mkdir(path);

    await assert.rejects(saveStore(path, createEmptyStore()), (error: unknown) => {
      assert.ok(error instanceof IOError);
      assert.strictEqual(error.message, `Could not write '${path}'`);
      return true;
    });
    assert.deepStrictEqual(await readdir(dir), ["store.json"]);
  });
});

describe("loadStore", () => {
  it("offers to create a missing store and writes it when accepted", async () => {
    const dir = await freshDir("create");
    const path = join(dir, "store.json");
    const { confirm, questions } = answering(true);

    const result = await loadStore(path, confirm);

    assert.strictEqual(result.status, "created");
    assert.deepStrictEqual(questions, [`Could not find '${path}'. Create a new store?`]);
    assert.strictEqual(await readFile(path, "utf-8"), EMPTY_STORE_TEXT);
  });

  it("creates nothing when the offer is declined", async () => {
    const dir = await freshDir("decline");
    const path = join(dir, "store.json");

    const result = await loadStore(path, answering(false).confirm);

    assert.deepStrictEqual(result, { status: "declined" });
    assert.deepStrictEqual(await readdir(dir), []);
  });

  it("decodes an existing store without asking", async () => {
    const dir = await freshDir("existing");
    const path = join(dir, "store.json");
    await writeFile(
      path,
      JSON.stringify({
        tags: { "2": "reading" },
        rows: {
          "4": ["https://example.test", "Example", "", "2024-03-05 08:09:10", ["2", "0"]]
        }
      }),
      "utf-8"
    );
    const { confirm, questions } = answering(true);

    const result = await loadStore(path, confirm);

    assert.strictEqual(result.status, "loaded");
    assert.deepStrictEqual(questions, []);
    if (result.status === "loaded") {
      assert.deepStrictEqual(result.store.tags.get(2), { id: 2, name: "reading" });
      assert.strictEqual(result.store.table.get(4)?.title, "Example");
      assert.strictEqual(result.store.table.nextId, 5);
    }
  });

  it("prefixes decode failures with the store path", async () => {
    const dir = await freshDir("corrupt");
    const path = join(dir, "store.json");
    await writeFile(path, JSON.stringify({ tags: {}, rows: { "0": [] } }), "utf-8");

    await assert.rejects(loadStore(path, answering(true).confirm), (error: unknown) => {
      assert.ok(error instanceof DecodeError);
      assert.strictEqual(error.message, `${path}: 'rows' key '0' is not a positive decimal id`);
      return true;
    });
  });

  it("fails with an IOError when the path cannot be read", async () => {
    const dir = await freshDir("unreadable");

    await assert.rejects(loadStore(dir, answering(true).confirm), (error: unknown) => {
      assert.ok(error instanceof IOError);
      assert.strictEqual(error.message, `Could not read '${dir}'`);
      return true;
    });
  });
});
