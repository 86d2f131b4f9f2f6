import assert from "node:assert/strict";
import { test } from "node:test";
import { ProgressTracker } from "../src/pipeline/progress.js";

test("ProgressTracker floors, clamps and never goes backwards", () => {
  const seen: number[] = [];
  const tracker = new ProgressTracker((p) => seen.push(p));
  tracker.report(5);
  tracker.report(5.9);
  tracker.report(3);
  tracker.report(6.2);
  tracker.report(250);
  tracker.report(99);
  assert.deepEqual(seen, [5, 6, 100]);
  assert.equal(tracker.value, 100);
});

test("ProgressTracker reports a zero start and ignores negatives", () => {
  const seen: number[] = [];
  const tracker = new ProgressTracker((p) => seen.push(p));
  assert.equal(tracker.value, 0);
  tracker.report(-4);
  assert.deepEqual(seen, [0]);
});

test("window maps a stage fraction onto its slice of overall progress", () => {
  const seen: number[] = [];
  const tracker = new ProgressTracker((p) => seen.push(p));
  const audio = tracker.window(45, 20);
  audio(0.25);
  audio(0.5);
  audio(2);
  assert.deepEqual(seen, [50, 55, 65]);
});
