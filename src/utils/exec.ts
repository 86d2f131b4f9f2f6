import { spawn } from "node:child_process";
import { CommandTimeoutError } from "../pipeline/errors.js";

export type ExecResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type ExecOptions = {
  cwd?: string;
  timeoutMs?: number;
};

export function execCommand(
  command: string,
  args: string[],
  options: ExecOptions = {}
): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      shell: false,
      windowsHide: true,
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    const timer =
      options.timeoutMs && options.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, options.timeoutMs)
        : undefined;

    child.stdout.on("data", (chunk) => (stdout += chunk.toString()));
    child.stderr.on("data", (chunk) => (stderr += chunk.toString()));

    child.on("error", (error) => {
      if (timer) clearTimeout(timer);
      reject(error);
    });
    child.on("close", (exitCode) => {
      if (timer) clearTimeout(timer);
      if (timedOut) {
        reject(new CommandTimeoutError(command, options.timeoutMs ?? 0, stderr));
        return;
      }
      resolve({ stdout, stderr, exitCode: exitCode ?? -1 });
    });
  });
}
