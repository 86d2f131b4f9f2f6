import assert from "node:assert/strict";
import { test } from "node:test";
import { formatRuntimeSummary } from "../src/pipeline/summary.js";
import { formatDuration } from "../src/utils/duration.js";
import { formatLocalTimestamp } from "../src/utils/date.js";

test("formatDuration picks the largest unit present", () => {
  assert.equal(formatDuration(3.04), "3.0s");
  assert.equal(formatDuration(123), "2m 3.0s");
  assert.equal(formatDuration(3723.5), "1h 2m 3.5s");
});

test("formatLocalTimestamp pads every field", () => {
  assert.equal(formatLocalTimestamp(new Date(2025, 0, 5, 7, 8, 9)), "2025-01-05 07:08:09");
});

test("formatRuntimeSummary lists stage shares and rates in stage order", () => {
  const summary = formatRuntimeSummary({
    title: "Calm-Forest",
    status: "completed",
    totalSeconds: 200,
    stepTimes: { images: 40, init: 2, script: 8, audio: 50 },
    scriptCalls: 4,
    imageCount: 10,
    audioClipCount: 25,
    completedAt: new Date(2025, 5, 1, 12, 0, 0),
  });
  const lines = summary.split("\n");

  assert.equal(lines[0], "=".repeat(60));
  assert.equal(lines[1], "VIDEO GENERATION RUNTIME SUMMARY");
  assert.equal(lines[3], "TOTAL RUNTIME: 3m 20.0s");
  assert.deepEqual(lines.slice(5, 10), [
    "STEP-BY-STEP BREAKDOWN:",
    "   Initialization: 2.0s (1.0%)",
    "   Script Generation: 8.0s (4.0%)",
    "   Image Generation: 40.0s (20.0%)",
    "   Audio Generation: 50.0s (25.0%)",
  ]);
  assert.deepEqual(lines.slice(11, 14), [
    "Script generation rate: 0.50 scripts/second",
    "Image generation rate: 0.25 images/second",
    "Audio generation rate: 0.50 clips/second",
  ]);
  assert.ok(lines.includes("Video Title: Calm-Forest"));
  assert.ok(lines.includes("Status: completed"));
  assert.ok(lines.includes("Completed at: 2025-06-01 12:00:00"));
});

test("formatRuntimeSummary omits rates for stages that never finished", () => {
  const summary = formatRuntimeSummary({
    title: "t",
    status: "error",
    totalSeconds: 5,
    stepTimes: { init: 1 },
    scriptCalls: 0,
    imageCount: 0,
    audioClipCount: 0,
    completedAt: new Date(2025, 5, 1),
  });
  assert.equal(summary.includes("rate:"), false);
  assert.ok(summary.includes("   Initialization: 1.0s (20.0%)"));
});
