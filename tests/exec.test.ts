import assert from "node:assert/strict";
import { test } from "node:test";
import { execCommand } from "../src/utils/exec.js";
import { CommandTimeoutError } from "../src/pipeline/errors.js";

test("execCommand captures output and the exit code", async () => {
  const res = await execCommand(process.execPath, [
    "-e",
    "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)",
  ]);
  assert.deepEqual(res, { stdout: "out", stderr: "err", exitCode: 3 });
});

test("execCommand kills the child and rejects on timeout", async () => {
  await assert.rejects(
    execCommand(process.execPath, ["-e", "setTimeout(() => {}, 10000)"], { timeoutMs: 100 }),
    (error: unknown) =>
      error instanceof CommandTimeoutError && error.timeoutMs === 100 && error.command === process.execPath
  );
});

test("execCommand rejects when the binary does not exist", async () => {
  await assert.rejects(execCommand("slideshow-missing-binary-for-test", []), /ENOENT/);
});
