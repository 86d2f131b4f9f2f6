import type { RunSummary } from "./types.js";

export const ERROR_PREVIEW_LIMIT = 5;

export function formatBatchReport(summary: RunSummary): string {
  const counts = `Total: ${summary.total}, Successful: ${summary.successful}, Failed: ${summary.failed}`;
  const lines = [
    summary.state === "cancelled"
      ? `Batch generation cancelled by user. ${counts}`
      : `Batch generation completed! ${counts}`,
  ];

  if (summary.errorMessages.length > 0) {
    lines.push("", "Failed items:");
    summary.errorMessages
      .slice(-ERROR_PREVIEW_LIMIT)
      .forEach((message, idx) => lines.push(`${idx + 1}. ${message}`));
    const hidden = summary.errorMessages.length - ERROR_PREVIEW_LIMIT;
    if (hidden > 0) {
      lines.push(`... and ${hidden} more errors (see logs for details)`);
    }
  }
  return lines.join("\n");
}
