import assert from "node:assert/strict";
import { test } from "node:test";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { GenerationPipeline, type PipelineDeps } from "../src/pipeline/run.js";
import type { PipelineEvent } from "../src/pipeline/events.js";
import type { AssemblyInput, MediaAssemblerOptions } from "../src/pipeline/media.js";
import type { GenerationRequest } from "../src/pipeline/types.js";
import type { ServiceClient, TextResult } from "../src/generation/types.js";
import { ServiceResponseError } from "../src/pipeline/errors.js";
import { fileExists } from "../src/utils/fs.js";
import { makeTempDir, noSleep, testConfig } from "./helpers.js";

const request: GenerationRequest = Object.freeze({
  apiKey: "test-key",
  videoTitle: "Test-Video",
  thumbnailPrompt: "A calm thumbnail",
  imagesPrompt: "Draw $chunk now",
  introPrompt: "INTRO",
  loopingPrompt: "LOOP",
  outroPrompt: "OUTRO",
  loopLength: 1,
  audioWordLimit: 4,
  imageCount: 2,
  imageWordLimit: 3,
  workflowPath: "workflow.json",
});

const TEXTS: Record<string, TextResult> = {
  INTRO: { ok: true, text: "Welcome friends. Enjoy the calm.", continuationId: "ctx1" },
  LOOP: { ok: true, text: "Rain falls softly.", continuationId: "ctx2" },
  OUTRO: { ok: true, text: "Goodbye now.", continuationId: "ctx3" },
};

type Harness = {
  events: PipelineEvent[];
  imagePrompts: string[];
  assemblies: AssemblyInput[];
  outputDir: string;
  tempDir: string;
  config: ReturnType<typeof testConfig>;
  deps: Partial<PipelineDeps>;
};

async function harness(client: Partial<ServiceClient> = {}): Promise<Harness> {
  const root = await makeTempDir();
  const config = testConfig({
    outputDir: join(root, "out"),
    tempDir: join(root, "tmp"),
    audioWorkers: 2,
  });
  const imagePrompts: string[] = [];
  const assemblies: AssemblyInput[] = [];
  let clock = 0;
  const service: ServiceClient = {
    generateText: async (prompt) => TEXTS[prompt] ?? { ok: false, error: `unknown prompt ${prompt}` },
    generateImage: async (prompt) => {
      imagePrompts.push(prompt);
      return new Uint8Array([0xff, 0xd8]);
    },
    generateSpeech: async () => new Uint8Array([0x52, 0x49]),
    ...client,
  };
  const deps: Partial<PipelineDeps> = {
    createServiceClient: () => service,
    createAssembler: (options: MediaAssemblerOptions) => ({
      async assemble(input) {
        assemblies.push(input);
        options.onProgress?.(0.5);
        options.onProgress?.(1);
        return { videoPath: join(options.outputDir, "final_slideshow_with_audio.mp4"), audioDurationSeconds: 30, overlayLoops: 3 };
      },
    }),
    resolveMediaTools: async () => ({ ffmpeg: "ffmpeg", ffprobe: "ffprobe" }),
    loadWorkflow: async () => ({ "3": { _meta: { title: "KSampler" } } }),
    now: () => (clock += 1000),
    sleep: noSleep,
  };
  return {
    events: [],
    imagePrompts,
    assemblies,
    outputDir: join(config.outputDir, "Test-Video"),
    tempDir: join(config.tempDir, "Test-Video"),
    config,
    deps,
  };
}

function pipelineFor(h: Harness, abortSignal?: AbortSignal) {
  return new GenerationPipeline(request, h.config, {
    emitter: { emit: (e) => h.events.push(e) },
    deps: h.deps,
    ...(abortSignal ? { abortSignal } : {}),
  });
}

const finishedEvents = (events: PipelineEvent[]) =>
  events.filter((e) => e.type === "generation:finished");

test("a successful run walks every stage and writes the artifacts", async () => {
  const h = await harness();
  const pipeline = pipelineFor(h);

  const result = await pipeline.run();

  assert.equal(result.status, "completed");
  assert.equal(result.description, "Welcome friends. Enjoy the calm.");
  assert.equal(result.videoPath, join(h.outputDir, "final_slideshow_with_audio.mp4"));
  assert.equal(result.thumbnailPath, join(h.outputDir, "thumbnail.jpg"));
  assert.equal(pipeline.state, "done");
  assert.deepEqual(Object.keys(result.stepTimes), ["init", "script", "thumbnail", "images", "audio", "video"]);

  assert.deepEqual(h.imagePrompts, ["A calm thumbnail", "Draw Welcome friends. now", "Draw Enjoy the calm. now"]);
  assert.deepEqual(h.assemblies, [{ audioCount: 4, imageCount: 2 }]);
  assert.equal(
    await readFile(join(h.outputDir, "script.txt"), "utf8"),
    "Welcome friends. Enjoy the calm.\\n\\nRain falls softly.\\n\\nGoodbye now."
  );
  assert.equal(await readFile(join(h.outputDir, "image2-prompt.txt"), "utf8"), "Draw Enjoy the calm. now");
  for (const name of ["thumbnail.jpg", "image1.jpg", "image2.jpg", "audio1.wav", "audio4.wav"]) {
    assert.equal(await fileExists(join(h.outputDir, name)), true, name);
  }
  assert.equal(await fileExists(join(h.outputDir, "audio5.wav")), false);
  assert.equal(await fileExists(h.tempDir), false);

  const progress = h.events.flatMap((e) => (e.type === "generation:progress" ? [e.percent] : []));
  assert.deepEqual(progress, [5, 6, 9, 10, 25, 35, 45, 50, 55, 60, 65, 82, 100]);
  const stages = h.events.flatMap((e) => (e.type === "generation:stage" ? [`${e.step}:${e.stage}`] : []));
  assert.deepEqual(stages, ["1:init", "2:script", "3:thumbnail", "4:images", "5:audio", "6:video"]);

  const finished = finishedEvents(h.events);
  assert.equal(finished.length, 1);
  assert.equal(finished[0]?.type === "generation:finished" && finished[0].status, "completed");
  assert.equal(h.events[0]?.type, "generation:start");
});

test("an image failure aborts the run and still cleans up", async () => {
  let images = 0;
  const h = await harness({
    generateImage: async () => {
      images += 1;
      if (images === 3) throw new ServiceResponseError("No image data found in response");
      return new Uint8Array([1]);
    },
  });

  const result = await pipelineFor(h).run();

  assert.equal(result.status, "error");
  assert.equal(result.failedStage, "images");
  assert.equal(result.error, "[image 2] No image data found in response");
  assert.equal(result.description, "Welcome friends. Enjoy the calm.");
  assert.equal(result.videoPath, undefined);
  assert.deepEqual(h.assemblies, []);
  assert.equal(await fileExists(h.tempDir), false);

  const finished = finishedEvents(h.events);
  assert.equal(finished.length, 1);
  const event = finished[0];
  assert.ok(event?.type === "generation:finished");
  assert.equal(event.status, "error");
  assert.equal(event.stage, "images");
  assert.ok(event.summary.includes("Status: error"));
});

test("a failed intro degrades the description", async () => {
  const h = await harness({
    generateText: async () => ({ ok: false, error: "quota exceeded" }),
  });

  const result = await pipelineFor(h).run();

  assert.equal(result.status, "error");
  assert.equal(result.failedStage, "script");
  assert.equal(result.error, "Failed to generate intro script: quota exceeded");
  assert.equal(result.description, "Generation failed");
});

test("cancelling during audio stops new clips and reports cancelled", async () => {
  let pipeline: GenerationPipeline | undefined;
  let speechCalls = 0;
  const h = await harness({
    generateSpeech: async () => {
      speechCalls += 1;
      pipeline?.cancel();
      return new Uint8Array([1]);
    },
  });
  pipeline = pipelineFor(h);

  const result = await pipeline.run();

  assert.equal(result.status, "cancelled");
  assert.equal(result.failedStage, "audio");
  assert.equal(result.error, "Operation cancelled by user");
  assert.equal(result.description, "Welcome friends. Enjoy the calm.");
  assert.equal(pipeline.state, "cancelled");
  assert.ok(speechCalls <= 2);
  assert.deepEqual(h.assemblies, []);
  assert.equal(finishedEvents(h.events).length, 1);
  assert.equal(await fileExists(h.tempDir), false);
});

test("an aborted signal cancels before any work", async () => {
  const h = await harness();
  const controller = new AbortController();
  controller.abort();

  const result = await pipelineFor(h, controller.signal).run();

  assert.equal(result.status, "cancelled");
  assert.equal(result.failedStage, "init");
  assert.equal(result.description, "Generation cancelled");
  assert.deepEqual(result.stepTimes, {});
  assert.deepEqual(h.imagePrompts, []);
});

test("a pipeline runs only once", async () => {
  const h = await harness();
  const pipeline = pipelineFor(h);
  await pipeline.run();
  await assert.rejects(pipeline.run(), /can only run once/);
});
