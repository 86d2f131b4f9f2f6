import { join } from "node:path";
import { writeJson } from "../src/utils/fs.js";

export const validPreset = {
  api_key: "test-key",
  video_title: "Quiet Forest Walk",
  thumbnail_prompt: "forest at dawn",
  images_prompt: "painting of $chunk",
  disclaimer: "Made with generated media.",
  intro_prompt: "Write an intro",
  looping_prompt: "Continue the story",
  outro_prompt: "Write an outro",
  loop_length: 2,
  audio_word_limit: 40,
  thumbnail_count: 5,
  thumbnail_word_limit: 30,
};

export const validWorkflow = {
  "6": { class_type: "CLIPTextEncode", _meta: { title: "prompt" } },
  "3": { class_type: "KSampler", _meta: { title: "KSampler" } },
};

export async function writeDescriptors(dir: string) {
  const presetPath = join(dir, "preset.json");
  const workflowPath = join(dir, "workflow.json");
  await writeJson(presetPath, validPreset);
  await writeJson(workflowPath, validWorkflow);
  return { presetPath, workflowPath };
}
