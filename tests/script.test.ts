import assert from "node:assert/strict";
import { test } from "node:test";
import { combineScript, generateScript } from "../src/script/generate.js";
import { RetryingCaller } from "../src/pipeline/caller.js";
import { CancelledError, ServiceResponseError } from "../src/pipeline/errors.js";
import type { TextGenerator, TextResult } from "../src/generation/types.js";
import { noSleep } from "./helpers.js";

type Call = { prompt: string; continuationId?: string };

function scriptedClient(results: TextResult[], calls: Call[]): TextGenerator {
  return {
    async generateText(prompt, continuationId) {
      calls.push({ prompt, continuationId });
      const next = results.shift();
      if (!next) throw new Error("no scripted result left");
      return next;
    },
  };
}

const caller = (isCancelled = () => false) =>
  new RetryingCaller({ maxRetries: 3, baseDelayMs: 0, isCancelled, sleep: noSleep });

const prompts = { introPrompt: "INTRO", loopingPrompt: "LOOP", outroPrompt: "OUTRO", loopLength: 2 };

test("chains the continuation id from intro through loops to the outro", async () => {
  const calls: Call[] = [];
  const client = scriptedClient(
    [
      { ok: true, text: "Hello world.", continuationId: "ctx1" },
      { ok: true, text: "Loop one.", continuationId: "ctx2" },
      { ok: true, text: "Loop two.", continuationId: "ctx3" },
      { ok: true, text: "Bye.", continuationId: "ctx4" },
    ],
    calls
  );
  const progress: number[] = [];

  const script = await generateScript(client, caller(), prompts, (p) => progress.push(p));

  assert.deepEqual(calls, [
    { prompt: "INTRO", continuationId: undefined },
    { prompt: "LOOP", continuationId: "ctx1" },
    { prompt: "LOOP", continuationId: "ctx2" },
    { prompt: "OUTRO", continuationId: "ctx3" },
  ]);
  assert.equal(script.intro, "Hello world.");
  assert.equal(script.script, "Hello world.\\n\\nLoop one.\\n\\nLoop two.\\n\\nBye.");
  assert.equal(script.calls, 4);
  assert.deepEqual(progress, [6, 7, 9, 10]);
});

test("a failed text result aborts with the service's error", async () => {
  const calls: Call[] = [];
  const client = scriptedClient(
    [
      { ok: true, text: "Intro.", continuationId: "ctx1" },
      { ok: false, error: "rate limited" },
    ],
    calls
  );
  await assert.rejects(
    generateScript(client, caller(), prompts),
    (error: unknown) =>
      error instanceof ServiceResponseError &&
      error.message === "Failed to generate looping script 1: rate limited"
  );
  assert.equal(calls.length, 2);
});

test("cancellation stops before the next call", async () => {
  const calls: Call[] = [];
  const client = scriptedClient([{ ok: true, text: "Intro.", continuationId: "ctx1" }], calls);
  await assert.rejects(
    generateScript(client, caller(() => calls.length >= 1), prompts),
    CancelledError
  );
  assert.equal(calls.length, 1);
});

test("combineScript separates parts with blank lines", () => {
  assert.equal(combineScript("a", ["b", "c"], "d"), "a\n\nb\n\nc\n\nd");
  assert.equal(combineScript("a", [], "d"), "a\n\nd");
});
