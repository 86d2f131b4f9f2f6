import { appendLine } from "../utils/fs.js";

export type ErrorPhase = "validation" | "generation" | "upload";

export type ErrorRecord = {
  /** 1-based position in the batch. */
  index: number;
  videoTitle: string;
  phase: ErrorPhase;
  message: string;
  timestamp: string;
};

export async function logErrorRecord(path: string, record: ErrorRecord) {
  await appendLine(path, JSON.stringify(record));
}
