import type { AppConfig } from "../config/schema.js";
import { errorMessage } from "../pipeline/errors.js";
import {
  nowIso,
  type BatchEventEmitter,
  type BatchItemStatus,
  type PipelineEvent,
} from "../pipeline/events.js";
import { ProgressTracker } from "../pipeline/progress.js";
import {
  GenerationPipeline,
  type GenerationPipelineOptions,
  type GenerationResult,
} from "../pipeline/run.js";
import type { GenerationRequest } from "../pipeline/types.js";
import type { CredentialProvider, Publisher } from "../publish/types.js";
import { logErrorRecord, type ErrorPhase } from "../storage/errors.js";
import { logError, logStep, logWarn } from "../utils/logger.js";
import { formatBatchReport } from "./report.js";
import type { BatchItem, BatchRunState, RunSummary } from "./types.js";
import { validateBatchItem, type ValidatedItem } from "./validate.js";

export interface PipelineRun {
  run(): Promise<GenerationResult>;
  cancel(): void;
}

export type PipelineFactory = (
  request: GenerationRequest,
  config: AppConfig,
  options: GenerationPipelineOptions
) => PipelineRun;

export type BatchRunnerOptions = {
  config: AppConfig;
  emitter?: BatchEventEmitter;
  /** Without a publisher items complete once their video exists. */
  publisher?: Publisher;
  credentials?: CredentialProvider;
  /** JSON lines of failed items are appended here. */
  errorLogPath?: string;
  createPipeline?: PipelineFactory;
  now?: () => Date;
};

class ItemFailure extends Error {
  constructor(
    public readonly phase: ErrorPhase,
    message: string
  ) {
    super(message);
    this.name = "ItemFailure";
  }
}

const defaultPipelineFactory: PipelineFactory = (request, config, options) =>
  new GenerationPipeline(request, config, options);

/**
 * Runs batch items one at a time in input order. A failing item is recorded and
 * the batch moves on; cancellation stops at the next item boundary.
 */
export class BatchRunner {
  private runState: BatchRunState = "running";
  private cancelRequested = false;
  private started = false;
  private current?: PipelineRun;
  private successful = 0;
  private failed = 0;
  private readonly errorMessages: string[] = [];
  private readonly progress: ProgressTracker;
  private readonly createPipeline: PipelineFactory;
  private readonly now: () => Date;

  constructor(
    private readonly batch: BatchItem[],
    private options: BatchRunnerOptions
  ) {
    this.createPipeline = options.createPipeline ?? defaultPipelineFactory;
    this.now = options.now ?? (() => new Date());
    this.progress = new ProgressTracker((percent) =>
      this.options.emitter?.emit({ type: "batch:progress", percent, timestamp: nowIso() })
    );
  }

  get state(): BatchRunState {
    return this.runState;
  }

  get items(): readonly BatchItem[] {
    return this.batch;
  }

  /** Stops before the next item and asks the in-flight pipeline to stop too. */
  cancel(): void {
    this.cancelRequested = true;
    this.current?.cancel();
  }

  private setStatus(index: number, status: BatchItemStatus, progress: string) {
    const item = this.batch[index];
    if (!item) return;
    item.status = status;
    item.progress = progress;
    this.options.emitter?.emit({
      type: "item:status",
      index,
      total: this.batch.length,
      status,
      progress,
      timestamp: nowIso(),
    });
  }

  private operation(index: number, message: string) {
    logStep("batch", message);
    this.options.emitter?.emit({
      type: "item:operation",
      index,
      total: this.batch.length,
      message,
      timestamp: nowIso(),
    });
  }

  private itemProgress(index: number, percent: number) {
    const total = this.batch.length;
    const base = Math.floor((index / total) * 100);
    this.progress.report(Math.min(base + Math.floor(percent / total), 100));
    this.setStatus(index, "Processing", String(percent));
  }

  private forwardPipelineEvents(index: number) {
    const total = this.batch.length;
    return {
      emit: (event: PipelineEvent) => {
        if (event.type === "generation:progress") {
          this.itemProgress(index, event.percent);
        } else if (event.type === "generation:operation") {
          this.options.emitter?.emit({
            type: "item:operation",
            index,
            total,
            message: `[${index + 1}/${total}] ${event.message}`,
            timestamp: nowIso(),
          });
        }
      },
    };
  }

  private async recordFailure(index: number, failure: ItemFailure) {
    const item = this.batch[index];
    const label = `Item ${index + 1}/${this.batch.length}: [${failure.phase}] ${failure.message}`;
    this.failed += 1;
    this.errorMessages.push(label);
    this.setStatus(index, failure.phase === "validation" ? "Error (Validation)" : "Error", "0");
    logError(label);
    this.operation(index, label);

    if (!this.options.errorLogPath || !item) return;
    try {
      await logErrorRecord(this.options.errorLogPath, {
        index: index + 1,
        videoTitle: item.videoTitle,
        phase: failure.phase,
        message: failure.message,
        timestamp: nowIso(),
      });
    } catch (error) {
      logWarn(`Could not write error log ${this.options.errorLogPath}: ${errorMessage(error)}`);
    }
  }

  private async validate(index: number, item: BatchItem): Promise<ValidatedItem> {
    this.setStatus(index, "Validating", "0");
    this.operation(index, `Validating item ${index + 1}/${this.batch.length}`);
    try {
      return await validateBatchItem(item, {
        defaultPrivacy: this.options.config.defaultPrivacy,
        now: this.now(),
      });
    } catch (error) {
      throw new ItemFailure("validation", errorMessage(error));
    }
  }

  private async generate(index: number, validated: ValidatedItem): Promise<GenerationResult> {
    this.setStatus(index, "Processing", "0");
    this.progress.report(Math.floor((index / this.batch.length) * 100));
    this.operation(index, `Starting generation for item ${index + 1}/${this.batch.length}`);

    const pipeline = this.createPipeline(validated.request, this.options.config, {
      emitter: this.forwardPipelineEvents(index),
    });
    this.current = pipeline;
    if (this.cancelRequested) pipeline.cancel();
    try {
      const result = await pipeline.run();
      if (result.status !== "completed") {
        throw new ItemFailure("generation", result.error ?? `Generation ${result.status}`);
      }
      return result;
    } catch (error) {
      if (error instanceof ItemFailure) throw error;
      throw new ItemFailure("generation", errorMessage(error));
    } finally {
      this.current = undefined;
    }
  }

  private async publish(
    index: number,
    item: BatchItem,
    validated: ValidatedItem,
    result: GenerationResult
  ): Promise<string | undefined> {
    const { publisher, credentials, config } = this.options;
    if (!publisher) return undefined;
    try {
      if (!result.videoPath) throw new Error("Generation produced no video file");
      const creds = await credentials?.getCredentials(item.account);
      if (!creds) throw new Error(`No credentials for account: ${item.account}`);

      this.operation(index, `Uploading item ${index + 1}/${this.batch.length} to account ${item.account}`);
      const uploaded = await publisher.upload(
        creds,
        {
          videoPath: result.videoPath,
          title: item.videoTitle,
          description: `${result.description}\n\n${validated.preset.disclaimer}`,
          category: item.category,
          tags: [],
          privacyStatus: validated.publish.privacyStatus,
          ...(validated.publish.publishAt ? { publishAt: validated.publish.publishAt } : {}),
          ...(result.thumbnailPath ? { thumbnailPath: result.thumbnailPath } : {}),
          madeForKids: config.madeForKids,
        },
        (fraction) => this.setStatus(index, "Processing", String(Math.floor(fraction * 100)))
      );
      return uploaded.url;
    } catch (error) {
      throw new ItemFailure("upload", errorMessage(error));
    }
  }

  private async processItem(index: number): Promise<void> {
    const item = this.batch[index];
    if (!item) return;
    try {
      const validated = await this.validate(index, item);
      const result = await this.generate(index, validated);
      const url = await this.publish(index, item, validated, result);

      if (url) item.videoUrl = url;
      this.successful += 1;
      this.setStatus(index, "Completed", "100");
      this.operation(index, `Completed item ${index + 1}/${this.batch.length}`);
    } catch (error) {
      const failure =
        error instanceof ItemFailure ? error : new ItemFailure("generation", errorMessage(error));
      await this.recordFailure(index, failure);
    }
  }

  summary(): RunSummary {
    return {
      total: this.batch.length,
      successful: this.successful,
      failed: this.failed,
      errorMessages: [...this.errorMessages],
      state: this.cancelRequested ? "cancelled" : "completed",
    };
  }

  async run(): Promise<RunSummary> {
    if (this.started) throw new Error("A batch runner can only run once");
    this.started = true;
    const total = this.batch.length;
    logStep("batch", `Starting batch generation of ${total} items`);
    this.options.emitter?.emit({ type: "batch:start", total, timestamp: nowIso() });
    for (let index = 0; index < total; index += 1) this.setStatus(index, "Ready", "0");

    for (let index = 0; index < total; index += 1) {
      if (this.cancelRequested) break;
      await this.processItem(index);
    }

    const summary = this.summary();
    this.runState = summary.state;
    const report = formatBatchReport(summary);
    for (const line of report.split("\n")) logStep("summary", line);

    if (summary.state === "cancelled") {
      this.options.emitter?.emit({
        type: "batch:cancelled",
        total,
        successful: summary.successful,
        failed: summary.failed,
        report,
        timestamp: nowIso(),
      });
    } else {
      this.progress.report(100);
      this.options.emitter?.emit({
        type: "batch:done",
        total,
        successful: summary.successful,
        failed: summary.failed,
        report,
        timestamp: nowIso(),
      });
    }
    return summary;
  }
}
