import { postJson, isRecord, decodeBase64 } from "../http.js";
import { ServiceResponseError } from "../../pipeline/errors.js";
import type { SpeechGenerator } from "../types.js";

export type LocalSpeechOptions = {
  baseUrl: string;
  voice: string;
  speed: number;
  language: string;
  timeoutMs: number;
};

export class LocalSpeechClient implements SpeechGenerator {
  constructor(private options: LocalSpeechOptions) {}

  async generateSpeech(text: string): Promise<Uint8Array> {
    const data = await postJson(
      `${this.options.baseUrl.replace(/\/+$/, "")}/tts/base64`,
      {
        text,
        voice: this.options.voice,
        speed: this.options.speed,
        language: this.options.language,
      },
      { service: "Speech service", timeoutMs: this.options.timeoutMs }
    );
    if (!isRecord(data) || typeof data.audio_base64 !== "string" || !data.audio_base64) {
      throw new ServiceResponseError("No audio data in TTS response");
    }
    return decodeBase64(data.audio_base64);
  }
}
