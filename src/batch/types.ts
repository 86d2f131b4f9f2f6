import type { BatchItemStatus } from "../pipeline/events.js";

export type BatchItem = {
  videoTitle: string;
  presetPath: string;
  workflowPath: string;
  account: string;
  category: string;
  /** Local date-time (`YYYY-MM-DDTHH:mm`) or ISO-8601 with offset; empty publishes immediately. */
  schedule?: string;
  status: BatchItemStatus;
  progress: string;
  videoUrl?: string;
};

export type BatchRunState = "running" | "completed" | "cancelled";

export type RunSummary = {
  total: number;
  successful: number;
  failed: number;
  errorMessages: string[];
  state: Exclude<BatchRunState, "running">;
};
