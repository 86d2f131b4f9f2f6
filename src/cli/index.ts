#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { loadBatchFile } from "../config/batch.js";
import { loadConfig } from "../config/loader.js";
import { loadPresetFile, presetToRequest } from "../config/preset.js";
import type { AppConfig } from "../config/schema.js";
import { BatchRunner } from "../batch/runner.js";
import { formatBatchCsv } from "../formatters/csv.js";
import { JsonLinesEventEmitter } from "../pipeline/jsonlEmitter.js";
import { GenerationPipeline } from "../pipeline/run.js";
import { FileCredentialProvider } from "../publish/accounts.js";
import { YouTubePublisher } from "../publish/youtube.js";
import { writeText } from "../utils/fs.js";
import { logError, logInfo, logWarn, routeLogsToStderr } from "../utils/logger.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const pkg: unknown = JSON.parse(readFileSync(join(__dirname, "../../package.json"), "utf8"));
const version =
  typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";

type CommonOptions = {
  config: string;
  outDir?: string;
  jsonEvents?: boolean;
};

function resolveConfig(opts: CommonOptions): AppConfig {
  const config = loadConfig(opts.config);
  if (opts.jsonEvents) routeLogsToStderr();
  return opts.outDir ? { ...config, outputDir: opts.outDir } : config;
}

function credentialProvider(config: AppConfig): FileCredentialProvider {
  return new FileCredentialProvider({
    path: resolve(config.accountsFile),
    ...(config.oauthClientId ? { clientId: config.oauthClientId } : {}),
    ...(config.oauthClientSecret ? { clientSecret: config.oauthClientSecret } : {}),
  });
}

/** First Ctrl-C cancels cooperatively, the second one exits. */
function onInterrupt(cancel: () => void) {
  let interrupted = false;
  process.on("SIGINT", () => {
    if (interrupted) {
      logError("Interrupted again, exiting");
      process.exit(130);
    }
    interrupted = true;
    logWarn("Cancelling; waiting for the current step to finish (Ctrl-C again to force)");
    cancel();
  });
}

const program = new Command();

program
  .name("slideshow-studio")
  .description("Generate narrated slideshow videos and publish them in batches")
  .version(version);

program
  .command("generate")
  .description("Generate one video from a preset and an image workflow")
  .requiredOption("--preset <file>", "Preset JSON with prompts and limits")
  .requiredOption("--workflow <file>", "Image service workflow JSON")
  .option("--title <title>", "Video title (defaults to the preset's)")
  .option("--config <file>", "Config file", "config.yaml")
  .option("--out-dir <path>", "Output directory")
  .option("--json-events", "Emit JSONL pipeline events to stdout")
  .action(async (opts: CommonOptions & { preset: string; workflow: string; title?: string }) => {
    const config = resolveConfig(opts);
    const preset = await loadPresetFile(resolve(opts.preset));
    const request = presetToRequest(preset, {
      workflowPath: resolve(opts.workflow),
      ...(opts.title ? { title: opts.title } : {}),
    });

    const pipeline = new GenerationPipeline(request, config, {
      ...(opts.jsonEvents ? { emitter: new JsonLinesEventEmitter() } : {}),
    });
    onInterrupt(() => pipeline.cancel());

    const result = await pipeline.run();
    if (result.status === "completed") {
      logInfo(`Description: ${result.description}`);
      return;
    }
    process.exitCode = result.status === "cancelled" ? 130 : 1;
  });

program
  .command("batch")
  .description("Generate (and upload) every row of a CSV or YAML batch file")
  .argument("<file>", "Batch file (.csv, .yaml or .yml)")
  .option("--no-publish", "Generate videos without uploading them")
  .option("--results <csv>", "Write item statuses to this CSV when done")
  .option("--config <file>", "Config file", "config.yaml")
  .option("--out-dir <path>", "Output directory")
  .option("--json-events", "Emit JSONL batch events to stdout")
  .action(
    async (
      file: string,
      opts: CommonOptions & { publish: boolean; results?: string }
    ) => {
      const config = resolveConfig(opts);
      const items = loadBatchFile(file);
      const runner = new BatchRunner(items, {
        config,
        ...(opts.jsonEvents ? { emitter: new JsonLinesEventEmitter() } : {}),
        ...(opts.publish
          ? {
              publisher: new YouTubePublisher(),
              credentials: credentialProvider(config),
            }
          : {}),
        errorLogPath: join(config.outputDir, "_errors.jsonl"),
      });
      onInterrupt(() => runner.cancel());

      const summary = await runner.run();
      if (opts.results) {
        await writeText(resolve(opts.results), formatBatchCsv([...runner.items]));
        logInfo(`Results written to ${opts.results}`);
      }
      if (summary.state === "cancelled") process.exitCode = 130;
      else if (summary.failed > 0) process.exitCode = 1;
    }
  );

program
  .command("accounts")
  .description("List the upload accounts in the accounts file")
  .option("--config <file>", "Config file", "config.yaml")
  .action(async (opts: { config: string }) => {
    const config = loadConfig(opts.config);
    const names = await credentialProvider(config).listAccounts();
    if (names.length === 0) {
      logWarn(`No accounts in ${resolve(config.accountsFile)}`);
      return;
    }
    for (const name of names) logInfo(name);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logError(error instanceof Error ? error.stack ?? error.message : String(error));
  process.exit(1);
});
