import { z } from "zod";
import { readJsonFile, fileExists, sanitizeFilename } from "../utils/fs.js";
import { ValidationError, errorMessage } from "../pipeline/errors.js";
import type { GenerationRequest } from "../pipeline/types.js";

export const presetSchema = z.object({
  api_key: z.string(),
  video_title: z.string(),
  thumbnail_prompt: z.string(),
  images_prompt: z.string(),
  disclaimer: z.string(),
  intro_prompt: z.string(),
  looping_prompt: z.string(),
  outro_prompt: z.string(),
  loop_length: z.number().int().min(1),
  audio_word_limit: z.number().int().positive(),
  thumbnail_count: z.number().int().positive(),
  thumbnail_word_limit: z.number().int().positive(),
});

export type Preset = z.infer<typeof presetSchema>;

/** Opaque image-service graph keyed by node id. */
export type WorkflowDescriptor = Record<string, unknown>;

const WORKFLOW_NODE_TITLES = new Set(["prompt", "width", "height", "KSampler"]);

function nodeTitle(node: unknown): string | undefined {
  if (typeof node !== "object" || node === null) return undefined;
  const meta: unknown = Reflect.get(node, "_meta");
  if (typeof meta !== "object" || meta === null) return undefined;
  const title: unknown = Reflect.get(meta, "title");
  return typeof title === "string" ? title : undefined;
}

export function isWorkflowDescriptor(data: unknown): data is WorkflowDescriptor {
  if (typeof data !== "object" || data === null || Array.isArray(data)) return false;
  return Object.values(data).some((node) => {
    const title = nodeTitle(node);
    return title !== undefined && WORKFLOW_NODE_TITLES.has(title);
  });
}

async function readDescriptor(path: string, kind: string): Promise<unknown> {
  if (!path || !(await fileExists(path))) {
    throw new ValidationError(`${kind} file not found: ${path}`);
  }
  try {
    return await readJsonFile(path);
  } catch (error) {
    throw new ValidationError(`${kind} file is not valid JSON: ${path} (${errorMessage(error)})`);
  }
}

export async function loadPresetFile(path: string): Promise<Preset> {
  const data = await readDescriptor(path, "Preset");
  const parsed = presetSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid preset content: ${path} (${issues})`);
  }
  return parsed.data;
}

export async function loadWorkflowFile(path: string): Promise<WorkflowDescriptor> {
  const data = await readDescriptor(path, "Workflow");
  if (!isWorkflowDescriptor(data)) {
    throw new ValidationError(`Invalid workflow content: ${path}`);
  }
  return data;
}

export function presetToRequest(
  preset: Preset,
  opts: { workflowPath: string; title?: string }
): GenerationRequest {
  const title = opts.title?.trim() || preset.video_title;
  return Object.freeze({
    apiKey: preset.api_key,
    videoTitle: sanitizeFilename(title, { maxLength: 100 }),
    thumbnailPrompt: preset.thumbnail_prompt,
    imagesPrompt: preset.images_prompt,
    introPrompt: preset.intro_prompt,
    loopingPrompt: preset.looping_prompt,
    outroPrompt: preset.outro_prompt,
    loopLength: preset.loop_length,
    audioWordLimit: preset.audio_word_limit,
    imageCount: preset.thumbnail_count,
    imageWordLimit: preset.thumbnail_word_limit,
    workflowPath: opts.workflowPath,
  });
}
