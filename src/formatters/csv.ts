import { BATCH_COLUMNS } from "../config/batch.js";
import type { BatchItem } from "../batch/types.js";

function escapeCsv(value: string) {
  const escaped = value.replace(/"/g, '""');
  return `"${escaped}"`;
}

export function formatBatchCsv(items: BatchItem[]): string {
  const lines = [
    BATCH_COLUMNS.join(","),
    ...items.map((item) =>
      [
        item.videoTitle,
        item.presetPath,
        item.workflowPath,
        item.account,
        item.category,
        item.schedule ?? "",
        item.status,
        item.progress,
        item.videoUrl ?? "",
      ]
        .map(escapeCsv)
        .join(",")
    ),
  ];
  return lines.join("\n") + "\n";
}
