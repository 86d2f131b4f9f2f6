import { formatLocalTimestamp } from "../utils/date.js";
import { formatDuration } from "../utils/duration.js";
import type { GenerationStage, GenerationStatus } from "./events.js";
import { STAGE_LABELS, STAGE_ORDER } from "./state.js";

/** Seconds per finished stage, in completion order. */
export type StepTimes = Partial<Record<GenerationStage, number>>;

export type RuntimeSummaryInput = {
  title: string;
  status: GenerationStatus;
  totalSeconds: number;
  stepTimes: StepTimes;
  scriptCalls: number;
  imageCount: number;
  audioClipCount: number;
  completedAt: Date;
};

const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(40);

function rate(count: number, seconds: number | undefined, unit: string): string | undefined {
  if (seconds === undefined || seconds <= 0 || count <= 0) return undefined;
  return `${(count / seconds).toFixed(2)} ${unit}/second`;
}

export function formatRuntimeSummary(input: RuntimeSummaryInput): string {
  const lines = [RULE, "VIDEO GENERATION RUNTIME SUMMARY", RULE];
  lines.push(`TOTAL RUNTIME: ${formatDuration(input.totalSeconds)}`, THIN_RULE);

  lines.push("STEP-BY-STEP BREAKDOWN:");
  for (const stage of STAGE_ORDER) {
    const seconds = input.stepTimes[stage];
    if (seconds === undefined) continue;
    const share = input.totalSeconds > 0 ? (seconds / input.totalSeconds) * 100 : 0;
    lines.push(`   ${STAGE_LABELS[stage]}: ${formatDuration(seconds)} (${share.toFixed(1)}%)`);
  }
  lines.push(THIN_RULE);

  const rates: Array<[string, string | undefined]> = [
    ["Script generation rate", rate(input.scriptCalls, input.stepTimes.script, "scripts")],
    ["Image generation rate", rate(input.imageCount, input.stepTimes.images, "images")],
    ["Audio generation rate", rate(input.audioClipCount, input.stepTimes.audio, "clips")],
  ];
  for (const [label, value] of rates) {
    if (value) lines.push(`${label}: ${value}`);
  }

  lines.push(
    THIN_RULE,
    `Video Title: ${input.title}`,
    `Status: ${input.status}`,
    `Completed at: ${formatLocalTimestamp(input.completedAt)}`,
    RULE
  );
  return lines.join("\n");
}
