import type { GenerationStage } from "./events.js";

export type PipelineState = GenerationStage | "done" | "error" | "cancelled";

export type PipelineTransition = "advance" | "fail" | "cancel";

export const STAGE_ORDER: readonly GenerationStage[] = [
  "init",
  "script",
  "thumbnail",
  "images",
  "audio",
  "video",
];

export const STAGE_LABELS: Record<GenerationStage, string> = {
  init: "Initialization",
  script: "Script Generation",
  thumbnail: "Thumbnail Generation",
  images: "Image Generation",
  audio: "Audio Generation",
  video: "Video Assembly",
};

const TERMINAL_STATES: ReadonlySet<PipelineState> = new Set(["done", "error", "cancelled"]);

export function isTerminalState(state: PipelineState): boolean {
  return TERMINAL_STATES.has(state);
}

export function isGenerationStage(state: PipelineState): state is GenerationStage {
  return !isTerminalState(state);
}

/**
 * Stages run strictly in STAGE_ORDER; `fail` and `cancel` are accepted from any
 * stage and nothing leaves a terminal state.
 */
export function nextState(state: PipelineState, event: PipelineTransition): PipelineState {
  if (!isGenerationStage(state)) {
    throw new Error(`Invalid transition "${event}" from terminal state "${state}"`);
  }
  switch (event) {
    case "fail":
      return "error";
    case "cancel":
      return "cancelled";
    case "advance": {
      const idx = STAGE_ORDER.indexOf(state);
      return STAGE_ORDER[idx + 1] ?? "done";
    }
  }
}

export class PipelineStateMachine {
  private current: PipelineState = "init";

  get state(): PipelineState {
    return this.current;
  }

  get isTerminal(): boolean {
    return isTerminalState(this.current);
  }

  transition(event: PipelineTransition): PipelineState {
    this.current = nextState(this.current, event);
    return this.current;
  }

  /** Moves forward from `from` to the stage after it; rejects skipping. */
  advanceFrom(from: GenerationStage): PipelineState {
    if (this.current !== from) {
      throw new Error(`Cannot complete "${from}" while in "${this.current}"`);
    }
    return this.transition("advance");
  }
}
