import { join } from "node:path";
import pLimit from "p-limit";
import type { SpeechGenerator } from "../generation/types.js";
import { fileExists, writeBytes } from "../utils/fs.js";
import { logError, logStep } from "../utils/logger.js";
import { reclaimMemory } from "../utils/memory.js";
import type { RetryingCaller } from "./caller.js";
import { AudioGenerationError, CancelledError, errorMessage } from "./errors.js";
import { audioFileName, type AudioTask, type AudioTaskResult } from "./types.js";

export type ParallelAudioOptions = {
  speech: SpeechGenerator;
  caller: RetryingCaller;
  maxWorkers?: number;
  /** Receives the share of finished clips, 0..1. */
  onProgress?: (fraction: number) => void;
};

export class ParallelAudioGenerator {
  private completed = 0;
  private total = 0;

  constructor(private options: ParallelAudioOptions) {}

  private async generateSingle(task: AudioTask): Promise<AudioTaskResult> {
    const label = `audio ${task.index + 1}`;
    try {
      this.options.caller.throwIfCancelled();
      let audio: Uint8Array | undefined = await this.options.caller.call(label, () =>
        this.options.speech.generateSpeech(task.text)
      );
      await writeBytes(join(task.outputDir, audioFileName(task.index)), audio);
      audio = undefined;

      // Counter update and progress report happen in one synchronous step.
      this.completed += 1;
      this.options.onProgress?.(this.completed / this.total);

      logStep("audio", `Generated audio ${task.index + 1}/${this.total}`);
      reclaimMemory();
      return { index: task.index, ok: true };
    } catch (error) {
      if (!(error instanceof CancelledError)) {
        logError(`Failed to generate audio ${task.index + 1}: ${errorMessage(error)}`);
      }
      return { index: task.index, ok: false, error: errorMessage(error) };
    }
  }

  /**
   * Generates every clip with at most `maxWorkers` in flight. A failing clip does
   * not stop its siblings; the stage fails afterwards with every failed index.
   */
  async generate(chunks: string[], outputDir: string): Promise<void> {
    const maxWorkers = this.options.maxWorkers ?? 4;
    logStep("audio", `Starting parallel audio generation with ${maxWorkers} workers`);
    this.completed = 0;
    this.total = chunks.length;

    const limit = pLimit(maxWorkers);
    const tasks: AudioTask[] = chunks.map((text, index) => ({ index, text, outputDir }));
    const results = await Promise.all(
      tasks.map((task) => limit(() => this.generateSingle(task)))
    );

    this.options.caller.throwIfCancelled();

    const failed = results
      .filter((r) => !r.ok)
      .map((r) => r.index + 1)
      .sort((a, b) => a - b);
    if (failed.length > 0) {
      throw new AudioGenerationError(
        `Failed to generate audio files: ${failed.join(", ")}`,
        failed
      );
    }

    const missing: number[] = [];
    for (const task of tasks) {
      if (!(await fileExists(join(outputDir, audioFileName(task.index))))) {
        missing.push(task.index + 1);
      }
    }
    if (missing.length > 0) {
      throw new AudioGenerationError(
        `Missing audio files after generation: ${missing.map((n) => `audio${n}.wav`).join(", ")}`,
        missing
      );
    }

    logStep("audio", `Successfully generated ${chunks.length} audio files in parallel`);
  }
}
