import { z } from "zod";

export const privacyStatusSchema = z.enum(["public", "unlisted", "private"]);
export type PrivacyStatus = z.infer<typeof privacyStatusSchema>;

export const configSchema = z.object({
  openaiApiKey: z.string().min(1).optional(),
  textModel: z.string().default("gpt-4o-mini"),
  textMaxOutputTokens: z.number().int().positive().default(16000),
  imageServiceUrl: z.string().url().default("http://localhost:5000"),
  speechServiceUrl: z.string().url().default("http://localhost:8000"),
  speechVoice: z.string().default("am_michael"),
  speechSpeed: z.number().positive().default(1),
  speechLanguage: z.string().default("a"),
  outputDir: z.string().default("output"),
  // Shared scratch space; one pipeline at a time writes below it.
  tempDir: z.string().default("__temp__"),
  overlayClipPath: z.string().default("reference/particles.webm"),
  audioWorkers: z.number().int().positive().default(4),
  maxRetries: z.number().int().positive().default(3),
  retryBaseDelayMs: z.number().int().nonnegative().default(1000),
  requestTimeoutMs: z.number().int().positive().default(300_000),
  speechTimeoutMs: z.number().int().positive().default(180_000),
  ffmpegPath: z.string().optional(),
  ffprobePath: z.string().optional(),
  accountsFile: z.string().default("accounts.json"),
  oauthClientId: z.string().optional(),
  oauthClientSecret: z.string().optional(),
  defaultPrivacy: privacyStatusSchema.default("public"),
  madeForKids: z.boolean().default(false),
});

export type AppConfig = z.infer<typeof configSchema>;
