export type TextResult =
  | { ok: true; text: string; continuationId: string }
  | { ok: false; error: string };

export type ImageSizeClass = "square" | "landscape" | "portrait" | "thumbnail";

export type ImageQuality = "high" | "medium" | "low";

export const IMAGE_SIZES: Record<ImageSizeClass, { width: number; height: number }> = {
  square: { width: 1024, height: 1024 },
  landscape: { width: 1920, height: 1080 },
  portrait: { width: 1080, height: 1920 },
  thumbnail: { width: 1280, height: 720 },
};

export interface TextGenerator {
  /** A failed generation resolves with `ok: false`; only transport problems throw. */
  generateText(prompt: string, continuationId?: string): Promise<TextResult>;
}

export interface ImageGenerator {
  generateImage(
    prompt: string,
    size: ImageSizeClass,
    quality?: ImageQuality
  ): Promise<Uint8Array>;
}

export interface SpeechGenerator {
  generateSpeech(text: string): Promise<Uint8Array>;
}

export type ServiceClient = TextGenerator & ImageGenerator & SpeechGenerator;
