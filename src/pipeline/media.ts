import { resolve, join } from "node:path";
import { execCommand, type ExecResult } from "../utils/exec.js";
import { writeText } from "../utils/fs.js";
import { logStep } from "../utils/logger.js";
import { CancelledError, MediaToolError } from "./errors.js";
import { audioFileName, FINAL_VIDEO_NAME, imageFileName } from "./types.js";

export type ToolRunner = (
  command: string,
  args: string[],
  timeoutMs: number
) => Promise<ExecResult>;

export type MediaAssemblerOptions = {
  ffmpeg: string;
  ffprobe: string;
  overlayClipPath: string;
  outputDir: string;
  tempDir: string;
  isCancelled: () => boolean;
  /** Receives the share of the assembly that is done, 0..1. */
  onProgress?: (fraction: number) => void;
  random?: () => number;
  runner?: ToolRunner;
};

export type AssemblyInput = {
  audioCount: number;
  imageCount: number;
};

export type AssemblyResult = {
  videoPath: string;
  audioDurationSeconds: number;
  overlayLoops: number;
};

export interface VideoAssembler {
  assemble(input: AssemblyInput): Promise<AssemblyResult>;
}

const ZOOM_SECONDS = 4;
const OUTPUT_SIZE = "1920x1080";
const ZOOM_SPEED = 0.001;

const TIMEOUTS = {
  concatAudio: 180_000,
  transcodeAudio: 120_000,
  probe: 30_000,
  zoomClip: 120_000,
  overlay: 180_000,
  extend: 120_000,
  remux: 120_000,
  concatVideo: 300_000,
  mux: 600_000,
};

// Centre plus the four corners; 120 frames at 30 fps = ZOOM_SECONDS.
export const ZOOM_FILTERS: readonly string[] = [
  ["trunc(iw/2-(iw/zoom/2))", "trunc(ih/2-(ih/zoom/2))"],
  ["0", "0"],
  ["trunc(iw-(iw/zoom))", "0"],
  ["0", "trunc(ih-(ih/zoom))"],
  ["trunc(iw-(iw/zoom))", "trunc(ih-(ih/zoom))"],
].map(
  ([x, y]) =>
    `scale=8000x4500,zoompan=z='zoom+${ZOOM_SPEED}':x='${x}':y='${y}':d=${ZOOM_SECONDS * 30}:fps=30,scale=1920:1080`
);

const OVERLAY_FILTER =
  "[0:v]scale=1920:1080,setsar=1[bg];" +
  "[1:v]scale=1920:1080,format=rgba,colorchannelmixer=aa=0.3[particles];" +
  "[bg][particles]overlay=format=auto";

export function concatListLine(path: string): string {
  return `file '${resolve(path).replace(/'/g, "'\\''")}'`;
}

export function overlayLoopCount(audioSeconds: number, overlaySeconds: number): number {
  if (!(overlaySeconds > 0)) {
    throw new Error(`Invalid overlay clip duration: ${overlaySeconds}`);
  }
  return Math.max(1, Math.ceil(audioSeconds / overlaySeconds));
}

const defaultRunner: ToolRunner = (command, args, timeoutMs) =>
  execCommand(command, args, { timeoutMs });

/**
 * Turns numbered images and narration clips into the final slideshow:
 * merged audio, one zoom clip per image, the last image under the looping
 * overlay, MPEG-TS concat, then the audio/video mux.
 */
export class MediaAssembler implements VideoAssembler {
  private readonly runner: ToolRunner;
  private readonly random: () => number;

  constructor(private options: MediaAssemblerOptions) {
    this.runner = options.runner ?? defaultRunner;
    this.random = options.random ?? Math.random;
  }

  private async run(
    command: string,
    args: string[],
    timeoutMs: number
  ): Promise<ExecResult> {
    if (this.options.isCancelled()) throw new CancelledError();
    logStep("video", `Running command: ${[command, ...args.slice(0, 2)].join(" ")}...`);
    const res = await this.runner(command, args, timeoutMs);
    if (res.exitCode !== 0) {
      const detail = res.stderr.trim() || res.stdout.trim();
      throw new MediaToolError(
        `${command} failed with exit code ${res.exitCode}: ${detail}`,
        res.exitCode,
        res.stderr
      );
    }
    return res;
  }

  private progress(fraction: number) {
    this.options.onProgress?.(fraction);
  }

  async probeDuration(path: string): Promise<number> {
    const res = await this.run(
      this.options.ffprobe,
      [
        "-v",
        "error",
        "-show_entries",
        "format=duration",
        "-of",
        "default=noprint_wrappers=1:nokey=1",
        path,
      ],
      TIMEOUTS.probe
    );
    const raw = res.stdout.trim();
    const duration = Number(raw);
    if (!Number.isFinite(duration) || duration <= 0) {
      throw new Error(`Invalid duration from ffprobe for ${path}: ${raw}`);
    }
    return duration;
  }

  private async mergeAudio(audioCount: number): Promise<string> {
    const { ffmpeg, outputDir, tempDir } = this.options;
    const listFile = join(tempDir, "audios.txt");
    const lines: string[] = [];
    for (let idx = 0; idx < audioCount; idx += 1) {
      lines.push(concatListLine(join(outputDir, audioFileName(idx))));
    }
    await writeText(listFile, lines.join("\n") + "\n");

    const mergedWav = join(tempDir, "merged_audio.wav");
    logStep("video", "Merging WAV audio files...");
    await this.run(
      ffmpeg,
      ["-y", "-f", "concat", "-safe", "0", "-i", listFile, "-c", "copy", mergedWav],
      TIMEOUTS.concatAudio
    );

    const mergedMp3 = join(tempDir, "merged_audio.mp3");
    logStep("video", "Converting merged audio to MP3...");
    await this.run(
      ffmpeg,
      ["-y", "-i", mergedWav, "-c:a", "libmp3lame", "-b:a", "128k", "-ar", "44100", mergedMp3],
      TIMEOUTS.transcodeAudio
    );
    return mergedMp3;
  }

  private async renderZoomClip(image: string, outClip: string): Promise<void> {
    const filter = ZOOM_FILTERS[Math.floor(this.random() * ZOOM_FILTERS.length)] ?? ZOOM_FILTERS[0];
    logStep("video", `Creating zoom clip for ${image} (duration: ${ZOOM_SECONDS}s)`);
    await this.run(
      this.options.ffmpeg,
      [
        "-y",
        "-loop",
        "1",
        "-i",
        image,
        "-preset",
        "ultrafast",
        "-threads",
        "4",
        "-vf",
        filter,
        "-s",
        OUTPUT_SIZE,
        "-t",
        String(ZOOM_SECONDS),
        "-pix_fmt",
        "yuv420p",
        outClip,
      ],
      TIMEOUTS.zoomClip
    );
  }

  private async renderOverlayClip(image: string, loops: number): Promise<string> {
    const { ffmpeg, tempDir, overlayClipPath } = this.options;
    const composite = join(tempDir, "last_with_particles.mp4");
    const extended = join(tempDir, "extended_last_with_particles.mp4");

    logStep("video", `Applying overlay effect to ${image}`);
    await this.run(
      ffmpeg,
      [
        "-loop",
        "1",
        "-i",
        image,
        "-i",
        overlayClipPath,
        "-filter_complex",
        OVERLAY_FILTER,
        "-shortest",
        "-pix_fmt",
        "yuv420p",
        "-s",
        OUTPUT_SIZE,
        "-y",
        composite,
      ],
      TIMEOUTS.overlay
    );

    logStep("video", `Extending overlay clip (${loops} loops)`);
    await this.run(
      ffmpeg,
      ["-y", "-stream_loop", String(loops), "-i", composite, "-c", "copy", extended],
      TIMEOUTS.extend
    );
    return extended;
  }

  private async concatClips(clips: string[]): Promise<string> {
    const { ffmpeg, tempDir } = this.options;
    const tsClips: string[] = [];
    for (const clip of clips) {
      const tsPath = clip.replace(/\.mp4$/, ".ts");
      await this.run(
        ffmpeg,
        ["-y", "-i", clip, "-c", "copy", "-bsf:v", "h264_mp4toannexb", "-f", "mpegts", tsPath],
        TIMEOUTS.remux
      );
      tsClips.push(tsPath);
    }

    const fullVideo = join(tempDir, "slideshow.mp4");
    await this.run(
      ffmpeg,
      ["-y", "-i", `concat:${tsClips.join("|")}`, "-c", "copy", "-bsf:a", "aac_adtstoasc", fullVideo],
      TIMEOUTS.concatVideo
    );
    return fullVideo;
  }

  async assemble(input: AssemblyInput): Promise<AssemblyResult> {
    if (input.imageCount < 1) throw new Error("No images to assemble");
    if (input.audioCount < 1) throw new Error("No audio clips to assemble");
    const { ffmpeg, outputDir, tempDir, overlayClipPath } = this.options;

    const mergedAudio = await this.mergeAudio(input.audioCount);
    const audioDurationSeconds = await this.probeDuration(mergedAudio);
    const overlaySeconds = await this.probeDuration(overlayClipPath);
    const overlayLoops = overlayLoopCount(audioDurationSeconds, overlaySeconds);
    logStep("video", `Total audio duration: ${audioDurationSeconds.toFixed(2)}s`);
    this.progress(0.15);

    const clips: string[] = [];
    for (let idx = 0; idx < input.imageCount; idx += 1) {
      const image = join(outputDir, imageFileName(idx));
      if (idx < input.imageCount - 1) {
        const outClip = resolve(join(tempDir, `zoom${idx + 1}.mp4`));
        await this.renderZoomClip(image, outClip);
        clips.push(outClip);
      } else {
        clips.push(resolve(await this.renderOverlayClip(image, overlayLoops)));
      }
      this.progress(0.15 + ((idx + 1) / input.imageCount) * 0.6);
    }

    const fullVideo = await this.concatClips(clips);
    this.progress(0.85);

    const videoPath = join(outputDir, FINAL_VIDEO_NAME);
    logStep("video", `Combining video and audio into ${FINAL_VIDEO_NAME}...`);
    await this.run(
      ffmpeg,
      ["-y", "-i", fullVideo, "-i", mergedAudio, "-c:v", "copy", "-c:a", "aac", "-shortest", videoPath],
      TIMEOUTS.mux
    );
    this.progress(1);

    return { videoPath, audioDurationSeconds, overlayLoops };
  }
}
