import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import dotenv from "dotenv";
import YAML from "yaml";
import { configSchema, type AppConfig } from "./schema.js";

type PartialConfig = Partial<Record<keyof AppConfig, unknown>>;

function loadYamlConfig(path: string): PartialConfig {
  if (!existsSync(path)) return {};
  const raw = readFileSync(path, "utf8");
  return YAML.parse(raw) ?? {};
}

const parseOptionalNumber = (raw: string | undefined): number | undefined =>
  raw ? Number(raw) : undefined;

const parseOptionalBool = (raw: string | undefined): boolean | undefined => {
  if (raw === undefined) return undefined;
  const v = raw.trim().toLowerCase();
  return v === "true" || v === "1" || v === "yes";
};

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  return {
    openaiApiKey: env.OPENAI_API_KEY,
    textModel: env.TEXT_MODEL,
    textMaxOutputTokens: parseOptionalNumber(env.TEXT_MAX_OUTPUT_TOKENS),
    imageServiceUrl: env.IMAGE_SERVICE_URL,
    speechServiceUrl: env.SPEECH_SERVICE_URL,
    speechVoice: env.SPEECH_VOICE,
    speechSpeed: parseOptionalNumber(env.SPEECH_SPEED),
    speechLanguage: env.SPEECH_LANGUAGE,
    outputDir: env.OUTPUT_DIR,
    tempDir: env.TEMP_DIR,
    overlayClipPath: env.OVERLAY_CLIP_PATH,
    audioWorkers: parseOptionalNumber(env.AUDIO_WORKERS),
    maxRetries: parseOptionalNumber(env.MAX_RETRIES),
    retryBaseDelayMs: parseOptionalNumber(env.RETRY_BASE_DELAY_MS),
    requestTimeoutMs: parseOptionalNumber(env.REQUEST_TIMEOUT_MS),
    speechTimeoutMs: parseOptionalNumber(env.SPEECH_TIMEOUT_MS),
    ffmpegPath: env.FFMPEG_PATH,
    ffprobePath: env.FFPROBE_PATH,
    accountsFile: env.ACCOUNTS_FILE,
    oauthClientId: env.OAUTH_CLIENT_ID,
    oauthClientSecret: env.OAUTH_CLIENT_SECRET,
    defaultPrivacy: env.DEFAULT_PRIVACY,
    madeForKids: parseOptionalBool(env.MADE_FOR_KIDS),
  };
}

function filterUndefined(obj: PartialConfig): PartialConfig {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  );
}

export function loadConfig(
  configPath = "config.yaml",
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  if (env === process.env) dotenv.config();
  const yamlConfig = loadYamlConfig(resolve(configPath));
  const envConfig = filterUndefined(loadEnvConfig(env));

  // Precedence: config.yaml (lowest) < .env / environment (highest)
  const merged = { ...yamlConfig, ...envConfig };
  return configSchema.parse(merged);
}
