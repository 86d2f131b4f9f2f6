import { existsSync, readFileSync } from "node:fs";
import { extname, resolve } from "node:path";
import YAML from "yaml";
import { z } from "zod";
import type { BatchItem } from "../batch/types.js";

// Cells are read leniently; per-row checks happen when the row is validated.
const cell = z
  .union([z.string(), z.number(), z.boolean(), z.null()])
  .optional()
  .transform((value) => (value === null || value === undefined ? "" : String(value)));

const batchRowSchema = z.object({
  video_title: cell,
  preset_path: cell,
  workflow_path: cell,
  account: cell,
  category: cell,
  schedule: cell,
  video_url: cell,
});

const batchFileSchema = z.union([
  z.object({ items: z.array(batchRowSchema).min(1) }),
  z.array(batchRowSchema).min(1),
]);

export type BatchRow = z.infer<typeof batchRowSchema>;

export const BATCH_COLUMNS = [
  "video_title",
  "preset_path",
  "workflow_path",
  "account",
  "category",
  "schedule",
  "status",
  "progress",
  "video_url",
] as const;

/** RFC 4180-style parsing: quoted fields may hold commas, newlines and doubled quotes. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i += 1;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        field += ch;
      }
      continue;
    }
    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i += 1;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += ch;
    }
  }
  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows.filter((r) => r.some((cell) => cell.trim().length > 0));
}

export function csvToRecords(text: string): Record<string, string>[] {
  const [header, ...rows] = parseCsv(text.replace(/^\uFEFF/, ""));
  if (!header) return [];
  const keys = header.map((h) => h.trim());
  return rows.map((cells) =>
    Object.fromEntries(keys.map((key, idx) => [key, (cells[idx] ?? "").trim()]))
  );
}

function toBatchItem(row: BatchRow): BatchItem {
  return {
    videoTitle: row.video_title.trim(),
    presetPath: row.preset_path,
    workflowPath: row.workflow_path,
    account: row.account.trim(),
    category: row.category,
    schedule: row.schedule.trim() || undefined,
    status: "Ready",
    progress: "0",
    videoUrl: row.video_url || undefined,
  };
}

export function parseBatchFile(raw: string, format: "csv" | "yaml"): BatchItem[] {
  const parsed = format === "csv" ? csvToRecords(raw) : YAML.parse(raw);
  const validated = batchFileSchema.parse(parsed);
  const rows = Array.isArray(validated) ? validated : validated.items;
  return rows.map(toBatchItem);
}

export function loadBatchFile(path: string): BatchItem[] {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new Error(`Batch file not found: ${fullPath}`);
  }
  const raw = readFileSync(fullPath, "utf8");
  const format = extname(fullPath).toLowerCase() === ".csv" ? "csv" : "yaml";
  return parseBatchFile(raw, format);
}
