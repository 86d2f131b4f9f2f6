import type { AppConfig } from "../config/schema.js";
import type { WorkflowDescriptor } from "../config/preset.js";
import { LocalImageClient } from "./local/image.js";
import { LocalSpeechClient } from "./local/speech.js";
import { OpenAiTextClient } from "./openai/index.js";
import type { ServiceClient } from "./types.js";

export type ServiceClientFactory = (
  config: AppConfig,
  apiKey: string,
  workflow: WorkflowDescriptor
) => ServiceClient;

/** Hosted text generation plus the two same-host media services. */
export const createServiceClient: ServiceClientFactory = (config, apiKey, workflow) => {
  const text = new OpenAiTextClient(apiKey, {
    model: config.textModel,
    maxOutputTokens: config.textMaxOutputTokens,
    timeoutMs: config.requestTimeoutMs,
  });
  const image = new LocalImageClient({
    baseUrl: config.imageServiceUrl,
    workflow,
    timeoutMs: config.requestTimeoutMs,
  });
  const speech = new LocalSpeechClient({
    baseUrl: config.speechServiceUrl,
    voice: config.speechVoice,
    speed: config.speechSpeed,
    language: config.speechLanguage,
    timeoutMs: config.speechTimeoutMs,
  });
  return {
    generateText: (prompt, continuationId) => text.generateText(prompt, continuationId),
    generateImage: (prompt, size, quality) => image.generateImage(prompt, size, quality),
    generateSpeech: (input) => speech.generateSpeech(input),
  };
};
