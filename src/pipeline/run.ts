import { join } from "node:path";
import { loadWorkflowFile, type WorkflowDescriptor } from "../config/preset.js";
import type { AppConfig } from "../config/schema.js";
import { createServiceClient, type ServiceClientFactory } from "../generation/factory.js";
import type { ServiceClient } from "../generation/types.js";
import { generateScript } from "../script/generate.js";
import { splitTextIntoChunks } from "../script/chunks.js";
import { getFirstParagraph } from "../script/sanitize.js";
import { validateFfmpegInstalled, validateFfprobeInstalled } from "../utils/deps.js";
import { formatDuration } from "../utils/duration.js";
import { ensureDir, removeDir, writeBytes, writeText } from "../utils/fs.js";
import { logError, logInfo, logStep, logWarn } from "../utils/logger.js";
import { sleepMs } from "../utils/retry.js";
import { ParallelAudioGenerator } from "./audio.js";
import { RetryingCaller } from "./caller.js";
import { CancelledError, errorMessage } from "./errors.js";
import {
  nowIso,
  type GenerationStage,
  type GenerationStatus,
  type PipelineEventEmitter,
} from "./events.js";
import { MediaAssembler, type MediaAssemblerOptions, type VideoAssembler } from "./media.js";
import { ProgressTracker } from "./progress.js";
import { isGenerationStage, PipelineStateMachine, STAGE_LABELS, STAGE_ORDER } from "./state.js";
import { formatRuntimeSummary, type StepTimes } from "./summary.js";
import {
  CHUNK_PLACEHOLDER,
  FINAL_VIDEO_NAME,
  imageFileName,
  imagePromptFileName,
  SCRIPT_NAME,
  THUMBNAIL_NAME,
  type GenerationRequest,
} from "./types.js";

export type MediaTools = { ffmpeg: string; ffprobe: string };

export type PipelineDeps = {
  createServiceClient: ServiceClientFactory;
  createAssembler: (options: MediaAssemblerOptions) => VideoAssembler;
  resolveMediaTools: (config: AppConfig) => Promise<MediaTools>;
  loadWorkflow: (path: string) => Promise<WorkflowDescriptor>;
  now: () => number;
  sleep: (ms: number) => Promise<void>;
};

export type GenerationPipelineOptions = {
  emitter?: PipelineEventEmitter;
  abortSignal?: AbortSignal;
  deps?: Partial<PipelineDeps>;
};

export type GenerationResult = {
  status: GenerationStatus;
  /** First paragraph of the intro; seeds the upload description. */
  description: string;
  error?: string;
  failedStage?: GenerationStage;
  outputDir: string;
  videoPath?: string;
  thumbnailPath?: string;
  summary: string;
  stepTimes: StepTimes;
};

const defaultDeps: PipelineDeps = {
  createServiceClient,
  createAssembler: (options) => new MediaAssembler(options),
  resolveMediaTools: async (config) => ({
    ffmpeg: await validateFfmpegInstalled(config.ffmpegPath),
    ffprobe: await validateFfprobeInstalled(config.ffprobePath),
  }),
  loadWorkflow: loadWorkflowFile,
  now: Date.now,
  sleep: sleepMs,
};

const STAGE_OPERATIONS: Record<GenerationStage, string> = {
  init: "Initializing",
  script: "Generating Scripts",
  thumbnail: "Generating Thumbnail",
  images: "Generating Images",
  audio: "Generating Audios",
  video: "Generating Video",
};

type RunContext = {
  client?: ServiceClient;
  tools?: MediaTools;
  workflow?: WorkflowDescriptor;
  intro?: string;
  script?: string;
  scriptCalls: number;
  imageCount: number;
  audioClipCount: number;
};

/**
 * One narrated-slideshow run: init, script, thumbnail, images, audio, video.
 * Any failure aborts the run; the temp directory is always removed and exactly
 * one `generation:finished` event is emitted.
 */
export class GenerationPipeline {
  private readonly deps: PipelineDeps;
  private readonly machine = new PipelineStateMachine();
  private readonly caller: RetryingCaller;
  private readonly progress: ProgressTracker;
  private readonly stepTimes: StepTimes = {};
  private readonly outputDir: string;
  private readonly tempDir: string;
  private cancelRequested = false;
  private started = false;

  constructor(
    private request: GenerationRequest,
    private config: AppConfig,
    private options: GenerationPipelineOptions = {}
  ) {
    this.deps = { ...defaultDeps, ...options.deps };
    this.outputDir = join(config.outputDir, request.videoTitle);
    this.tempDir = join(config.tempDir, request.videoTitle);
    this.caller = new RetryingCaller({
      maxRetries: config.maxRetries,
      baseDelayMs: config.retryBaseDelayMs,
      isCancelled: () => this.isCancelled(),
      sleep: this.deps.sleep,
    });
    this.progress = new ProgressTracker((percent) =>
      this.options.emitter?.emit({ type: "generation:progress", percent, timestamp: nowIso() })
    );
    const signal = options.abortSignal;
    if (signal?.aborted) this.cancelRequested = true;
    signal?.addEventListener("abort", () => this.cancel(), { once: true });
  }

  get state() {
    return this.machine.state;
  }

  /** Stops before the next service call or media command; in-flight work finishes. */
  cancel(): void {
    this.cancelRequested = true;
  }

  isCancelled(): boolean {
    return this.cancelRequested || this.options.abortSignal?.aborted === true;
  }

  private operation(message: string) {
    this.options.emitter?.emit({ type: "generation:operation", message, timestamp: nowIso() });
  }

  private async runStage(stage: GenerationStage, body: () => Promise<void>): Promise<void> {
    this.caller.throwIfCancelled();
    const step = STAGE_ORDER.indexOf(stage) + 1;
    logStep(stage, `Step ${step}/${STAGE_ORDER.length}: ${STAGE_LABELS[stage]}`);
    this.options.emitter?.emit({
      type: "generation:stage",
      stage,
      step,
      totalSteps: STAGE_ORDER.length,
      timestamp: nowIso(),
    });
    this.operation(STAGE_OPERATIONS[stage]);

    const startedAt = this.deps.now();
    try {
      await body();
    } catch (error) {
      const elapsed = (this.deps.now() - startedAt) / 1000;
      if (!(error instanceof CancelledError)) {
        logError(`${STAGE_LABELS[stage]} failed after ${formatDuration(elapsed)}: ${errorMessage(error)}`);
      }
      throw error;
    }
    const seconds = (this.deps.now() - startedAt) / 1000;
    this.stepTimes[stage] = seconds;
    logInfo(`${STAGE_LABELS[stage]} completed in ${seconds.toFixed(2)} seconds`);
    this.machine.advanceFrom(stage);
  }

  private async init(ctx: RunContext) {
    await ensureDir(this.outputDir);
    await ensureDir(this.tempDir);
    ctx.workflow = await this.deps.loadWorkflow(this.request.workflowPath);
    ctx.tools = await this.deps.resolveMediaTools(this.config);
    const apiKey = this.request.apiKey || this.config.openaiApiKey;
    if (!apiKey) throw new Error("No text generation API key in preset or config");
    ctx.client = this.deps.createServiceClient(this.config, apiKey, ctx.workflow);
    this.progress.report(5);
  }

  private async writeScript(ctx: RunContext, client: ServiceClient) {
    const generated = await generateScript(
      client,
      this.caller,
      {
        introPrompt: this.request.introPrompt,
        loopingPrompt: this.request.loopingPrompt,
        outroPrompt: this.request.outroPrompt,
        loopLength: this.request.loopLength,
      },
      (percent) => this.progress.report(percent)
    );
    ctx.intro = generated.intro;
    ctx.script = generated.script;
    ctx.scriptCalls = generated.calls;
    await writeText(join(this.outputDir, SCRIPT_NAME), generated.script);
  }

  private async renderThumbnail(client: ServiceClient) {
    this.caller.throwIfCancelled();
    const image = await this.caller.call("thumbnail", () =>
      client.generateImage(this.request.thumbnailPrompt, "thumbnail")
    );
    await writeBytes(join(this.outputDir, THUMBNAIL_NAME), image);
    logStep("thumbnail", "Thumbnail image generated successfully");
    this.progress.report(25);
  }

  private async renderImages(ctx: RunContext, client: ServiceClient, script: string) {
    const chunks = splitTextIntoChunks(script, this.request.imageCount, this.request.imageWordLimit);
    if (chunks.length === 0) throw new Error("Script produced no text for images");
    const onProgress = this.progress.window(25, 20);

    for (const [idx, chunk] of chunks.entries()) {
      this.caller.throwIfCancelled();
      const prompt = this.request.imagesPrompt.replaceAll(CHUNK_PLACEHOLDER, chunk);
      await writeText(join(this.outputDir, imagePromptFileName(idx)), prompt);
      const image = await this.caller.call(`image ${idx + 1}`, () =>
        client.generateImage(prompt, "landscape")
      );
      await writeBytes(join(this.outputDir, imageFileName(idx)), image);
      ctx.imageCount = idx + 1;
      onProgress((idx + 1) / chunks.length);
      logStep("images", `Generated image ${idx + 1}/${chunks.length}`);
    }
  }

  private async renderAudio(ctx: RunContext, client: ServiceClient, script: string) {
    const chunks = splitTextIntoChunks(script, -1, this.request.audioWordLimit);
    if (chunks.length === 0) throw new Error("Script produced no text for narration");
    const generator = new ParallelAudioGenerator({
      speech: client,
      caller: this.caller,
      maxWorkers: this.config.audioWorkers,
      onProgress: this.progress.window(45, 20),
    });
    await generator.generate(chunks, this.outputDir);
    ctx.audioClipCount = chunks.length;
  }

  private async assembleVideo(ctx: RunContext, tools: MediaTools) {
    const assembler = this.deps.createAssembler({
      ffmpeg: tools.ffmpeg,
      ffprobe: tools.ffprobe,
      overlayClipPath: this.config.overlayClipPath,
      outputDir: this.outputDir,
      tempDir: this.tempDir,
      isCancelled: () => this.isCancelled(),
      onProgress: this.progress.window(65, 35),
    });
    await assembler.assemble({ audioCount: ctx.audioClipCount, imageCount: ctx.imageCount });
    logStep("video", "Final video with audio created successfully");
    this.progress.report(100);
  }

  private async execute(ctx: RunContext) {
    await this.runStage("init", () => this.init(ctx));
    const { client, tools } = ctx;
    if (!client || !tools) throw new Error("Initialization did not produce service clients");

    await this.runStage("script", () => this.writeScript(ctx, client));
    const script = ctx.script ?? "";
    await this.runStage("thumbnail", () => this.renderThumbnail(client));
    await this.runStage("images", () => this.renderImages(ctx, client, script));
    await this.runStage("audio", () => this.renderAudio(ctx, client, script));
    await this.runStage("video", () => this.assembleVideo(ctx, tools));
  }

  async run(): Promise<GenerationResult> {
    if (this.started) throw new Error("A generation pipeline can only run once");
    this.started = true;

    const startedAt = this.deps.now();
    const ctx: RunContext = { scriptCalls: 0, imageCount: 0, audioClipCount: 0 };
    this.options.emitter?.emit({
      type: "generation:start",
      title: this.request.videoTitle,
      timestamp: nowIso(),
    });

    let status: GenerationStatus = "completed";
    let error: string | undefined;
    let failedStage: GenerationStage | undefined;
    try {
      await this.execute(ctx);
    } catch (err) {
      const current = this.machine.state;
      failedStage = isGenerationStage(current) ? current : undefined;
      error = errorMessage(err);
      if (err instanceof CancelledError) {
        status = "cancelled";
        this.machine.transition("cancel");
      } else {
        status = "error";
        this.machine.transition("fail");
      }
    } finally {
      try {
        await removeDir(this.tempDir);
      } catch (cleanupError) {
        logWarn(`Failed to remove temp directory ${this.tempDir}: ${errorMessage(cleanupError)}`);
      }
    }

    const totalSeconds = (this.deps.now() - startedAt) / 1000;
    const summary = formatRuntimeSummary({
      title: this.request.videoTitle,
      status,
      totalSeconds,
      stepTimes: this.stepTimes,
      scriptCalls: ctx.scriptCalls,
      imageCount: ctx.imageCount,
      audioClipCount: ctx.audioClipCount,
      completedAt: new Date(this.deps.now()),
    });
    for (const line of summary.split("\n")) logStep("summary", line);

    if (status === "error") {
      logError(`Video generation failed after ${formatDuration(totalSeconds)}: ${error ?? ""}`);
    } else if (status === "cancelled") {
      logWarn(`Video generation cancelled after ${formatDuration(totalSeconds)}`);
    } else {
      logStep("done", `Video ready in ${this.outputDir}`);
    }

    const description = ctx.intro
      ? getFirstParagraph(ctx.intro)
      : status === "cancelled"
        ? "Generation cancelled"
        : "Generation failed";

    this.operation(status === "completed" ? "Completed" : `${status === "error" ? "Error" : "Cancelled"}: ${error ?? ""}`);
    this.options.emitter?.emit({
      type: "generation:finished",
      status,
      description,
      ...(error !== undefined ? { error } : {}),
      ...(failedStage ? { stage: failedStage } : {}),
      summary,
      timestamp: nowIso(),
    });

    return {
      status,
      description,
      ...(error !== undefined ? { error } : {}),
      ...(failedStage ? { failedStage } : {}),
      outputDir: this.outputDir,
      ...(status === "completed"
        ? {
            videoPath: join(this.outputDir, FINAL_VIDEO_NAME),
            thumbnailPath: join(this.outputDir, THUMBNAIL_NAME),
          }
        : {}),
      summary,
      stepTimes: { ...this.stepTimes },
    };
  }
}
