import type { TextGenerator, TextResult } from "../generation/types.js";
import type { RetryingCaller } from "../pipeline/caller.js";
import { ServiceResponseError } from "../pipeline/errors.js";
import { logStep } from "../utils/logger.js";
import { sanitizeForScript } from "./sanitize.js";

/** Links a follow-up prompt to the text generated before it. */
export type ConversationContext = Readonly<{ continuationId?: string }>;

export const FRESH_CONTEXT: ConversationContext = Object.freeze({});

export type ScriptPrompts = {
  introPrompt: string;
  loopingPrompt: string;
  outroPrompt: string;
  loopLength: number;
};

export type GeneratedScript = {
  /** Sanitized intro, kept apart for the upload description. */
  intro: string;
  /** Sanitized intro, loops and outro. */
  script: string;
  /** Number of text generations that produced the script. */
  calls: number;
};

export type ScriptProgress = (percent: number) => void;

export function combineScript(intro: string, loops: string[], outro: string): string {
  return [intro, ...loops, outro].join("\n\n");
}

async function generatePart(
  client: TextGenerator,
  caller: RetryingCaller,
  label: string,
  prompt: string,
  context: ConversationContext
): Promise<{ text: string; context: ConversationContext }> {
  caller.throwIfCancelled();
  const result: TextResult = await caller.call(label, () =>
    client.generateText(prompt, context.continuationId)
  );
  if (!result.ok) {
    throw new ServiceResponseError(`Failed to generate ${label}: ${result.error}`);
  }
  return { text: result.text, context: { continuationId: result.continuationId } };
}

/**
 * Intro on a fresh conversation, `loopLength` looping parts each continuing the
 * previous one, then the outro continuing the last loop. Reports 6% after the
 * intro, up to 9% across the loops and 10% after the outro.
 */
export async function generateScript(
  client: TextGenerator,
  caller: RetryingCaller,
  prompts: ScriptPrompts,
  onProgress?: ScriptProgress
): Promise<GeneratedScript> {
  logStep("script", "Generating intro script...");
  const intro = await generatePart(client, caller, "intro script", prompts.introPrompt, FRESH_CONTEXT);
  onProgress?.(6);

  const loops: string[] = [];
  let context = intro.context;
  for (let idx = 1; idx <= prompts.loopLength; idx += 1) {
    logStep("script", `Generating looping script (${idx}/${prompts.loopLength})...`);
    const part = await generatePart(
      client,
      caller,
      `looping script ${idx}`,
      prompts.loopingPrompt,
      context
    );
    loops.push(part.text);
    context = part.context;
    onProgress?.(Math.floor(6 + (idx / prompts.loopLength) * 3));
  }

  logStep("script", "Generating outro script...");
  const outro = await generatePart(client, caller, "outro script", prompts.outroPrompt, context);
  onProgress?.(10);

  return {
    intro: sanitizeForScript(intro.text),
    script: sanitizeForScript(combineScript(intro.text, loops, outro.text)),
    calls: prompts.loopLength + 2,
  };
}
