import { execCommand } from "./exec.js";
import { fileExists } from "./fs.js";

async function tryCommand(cmd: string): Promise<boolean> {
  const res = await execCommand(cmd, ["-version"], { timeoutMs: 10_000 });
  return res.exitCode === 0;
}

async function resolveBinary(
  binaryName: string,
  explicitPath?: string
): Promise<string | undefined> {
  if (explicitPath) {
    try {
      if (await fileExists(explicitPath) && (await tryCommand(explicitPath))) {
        return explicitPath;
      }
    } catch {
      return undefined;
    }
  }
  const candidates = [binaryName, `${binaryName}.exe`];
  for (const candidate of candidates) {
    try {
      if (await tryCommand(candidate)) return candidate;
    } catch {
      // continue
    }
  }
  return undefined;
}

export async function validateFfmpegInstalled(
  explicitPath?: string
): Promise<string> {
  const resolved =
    (await resolveBinary("ffmpeg", explicitPath)) ||
    (await resolveBinary("ffmpeg", process.env.FFMPEG_PATH));
  if (resolved) return resolved;
  throw new Error(
    "ffmpeg not found. Install it:\n" +
      "  https://ffmpeg.org/download.html\n" +
      "If installed, ensure it is on PATH or set FFMPEG_PATH."
  );
}

export async function validateFfprobeInstalled(
  explicitPath?: string
): Promise<string> {
  const resolved =
    (await resolveBinary("ffprobe", explicitPath)) ||
    (await resolveBinary("ffprobe", process.env.FFPROBE_PATH));
  if (resolved) return resolved;
  throw new Error(
    "ffprobe not found. Install ffmpeg (ffprobe is bundled):\n" +
      "  https://ffmpeg.org/download.html\n" +
      "If installed, ensure it is on PATH or set FFPROBE_PATH."
  );
}
