/** Everything one generation run needs; never mutated once built. */
export type GenerationRequest = Readonly<{
  apiKey: string;
  /** Slug-safe; names the output directory. */
  videoTitle: string;
  thumbnailPrompt: string;
  /** Contains `$chunk`, replaced by each image's slice of the script. */
  imagesPrompt: string;
  introPrompt: string;
  loopingPrompt: string;
  outroPrompt: string;
  loopLength: number;
  audioWordLimit: number;
  imageCount: number;
  imageWordLimit: number;
  workflowPath: string;
}>;

export type AudioTask = {
  /** 0-based; files are named with index + 1. */
  index: number;
  text: string;
  outputDir: string;
};

export type AudioTaskResult = {
  index: number;
  ok: boolean;
  error?: string;
};

export const CHUNK_PLACEHOLDER = "$chunk";
export const FINAL_VIDEO_NAME = "final_slideshow_with_audio.mp4";
export const THUMBNAIL_NAME = "thumbnail.jpg";
export const SCRIPT_NAME = "script.txt";

export const audioFileName = (index: number) => `audio${index + 1}.wav`;
export const imageFileName = (index: number) => `image${index + 1}.jpg`;
export const imagePromptFileName = (index: number) => `image${index + 1}-prompt.txt`;
