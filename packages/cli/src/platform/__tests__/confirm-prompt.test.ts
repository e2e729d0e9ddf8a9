import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { PassThrough } from "node:stream";

import { createPrompter, isAffirmative } from "../confirm-prompt";

function createStreams() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = "";
  output.on("data", (chunk: Buffer) => {
    written += chunk.toString("utf-8");
  });

  return { input, output, written: () => written };
}

describe("isAffirmative", () => {
  it("accepts y and yes in any case", () => {
    assert.deepStrictEqual(
      ["y", "Y", "yes", " YES ", "Yes"].map(isAffirmative),
      [true, true, true, true, true]
    );
  });

  it("treats everything else as no", () => {
    assert.deepStrictEqual(
      ["", "n", "no", "yep", "ye", "y e s"].map(isAffirmative),
      [false, false, false, false, false, false]
    );
  });
});

describe("createPrompter", () => {
  it("writes the question with its default and resolves true on yes", async () => {
    const streams = createStreams();
    const prompter = createPrompter(streams);

    const answer = prompter.confirm("Delete it?");
    streams.input.write("yes\n");

    assert.strictEqual(await answer, true);
    assert.strictEqual(streams.written(), "Delete it? [y/N] ");
    prompter.close();
  });

  it("resolves false on a blank line", async () => {
    const streams = createStreams();
    const prompter = createPrompter(streams);

    const answer = prompter.confirm("Delete it?");
    streams.input.write("\n");

    assert.strictEqual(await answer, false);
    prompter.close();
  });

  it("answers consecutive questions from input piped in one chunk", async () => {
    const streams = createStreams();
    const prompter = createPrompter(streams);
    streams.input.end("y\nn\ny\n");

    const answers = [
      await prompter.confirm("First?"),
      await prompter.confirm("Second?"),
      await prompter.confirm("Third?")
    ];

    await new Promise((resolve) => setImmediate(resolve));

    assert.deepStrictEqual(answers, [true, false, true]);
    assert.strictEqual(streams.written(), "First? [y/N] Second? [y/N] Third? [y/N] ");
    prompter.close();
  });

  it("resolves false for every question once input has run out", async () => {
    const streams = createStreams();
    const prompter = createPrompter(streams);
    streams.input.end("y\n");

    const answers = [
      await prompter.confirm("First?"),
      await prompter.confirm("Second?"),
      await prompter.confirm("Third?")
    ];

    assert.deepStrictEqual(answers, [true, false, false]);
    prompter.close();
  });

  it("resolves false when input ends while a question is pending", async () => {
    const streams = createStreams();
    const prompter = createPrompter(streams);

    const answer = prompter.confirm("Delete it?");
    streams.input.end();

    assert.strictEqual(await answer, false);
  });

  it("does not read the input when no question was asked", () => {
    const streams = createStreams();
    const prompter = createPrompter(streams);

    prompter.close();

    assert.strictEqual(streams.input.listenerCount("data"), 0);
  });
});
