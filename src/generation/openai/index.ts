import { postJson, isRecord } from "../http.js";
import type { TextGenerator, TextResult } from "../types.js";

const RESPONSES_URL = "https://api.openai.com/v1/responses";

export type OpenAiTextOptions = {
  model: string;
  maxOutputTokens: number;
  temperature?: number;
  topP?: number;
  timeoutMs: number;
  baseUrl?: string;
};

// Concatenates every output_text part of every message item.
export function extractOutputText(data: Record<string, unknown>): string | undefined {
  if (typeof data.output_text === "string") return data.output_text;
  if (!Array.isArray(data.output)) return undefined;
  const parts: string[] = [];
  for (const item of data.output) {
    if (!isRecord(item) || item.type !== "message" || !Array.isArray(item.content)) continue;
    for (const part of item.content) {
      if (isRecord(part) && part.type === "output_text" && typeof part.text === "string") {
        parts.push(part.text);
      }
    }
  }
  return parts.length > 0 ? parts.join("") : undefined;
}

export class OpenAiTextClient implements TextGenerator {
  constructor(
    private apiKey: string,
    private options: OpenAiTextOptions
  ) {}

  async generateText(prompt: string, continuationId?: string): Promise<TextResult> {
    const data = await postJson(
      this.options.baseUrl ?? RESPONSES_URL,
      {
        model: this.options.model,
        input: prompt,
        max_output_tokens: this.options.maxOutputTokens,
        temperature: this.options.temperature ?? 1,
        top_p: this.options.topP ?? 1,
        ...(continuationId ? { previous_response_id: continuationId } : {}),
      },
      {
        service: "OpenAI",
        timeoutMs: this.options.timeoutMs,
        headers: { Authorization: `Bearer ${this.apiKey}` },
      }
    );

    if (!isRecord(data)) {
      return { ok: false, error: "OpenAI returned an unexpected body" };
    }
    if (isRecord(data.error)) {
      const message = typeof data.error.message === "string" ? data.error.message : JSON.stringify(data.error);
      return { ok: false, error: message };
    }
    const text = extractOutputText(data);
    if (text === undefined || typeof data.id !== "string") {
      return { ok: false, error: "OpenAI response has no output text" };
    }
    return { ok: true, text, continuationId: data.id };
  }
}
