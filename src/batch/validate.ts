import { loadPresetFile, loadWorkflowFile, presetToRequest, type Preset } from "../config/preset.js";
import type { PrivacyStatus } from "../config/schema.js";
import { ValidationError } from "../pipeline/errors.js";
import type { GenerationRequest } from "../pipeline/types.js";
import { resolvePublishSettings, type PublishSettings } from "../publish/schedule.js";
import { fileExists } from "../utils/fs.js";
import type { BatchItem } from "./types.js";

export type ValidatedItem = {
  preset: Preset;
  request: GenerationRequest;
  publish: PublishSettings;
};

/**
 * Checks one batch row before any generation work: the row has a title, both
 * descriptor files exist and have the expected shape, an account is named and
 * the schedule parses.
 */
export async function validateBatchItem(
  item: BatchItem,
  opts: { defaultPrivacy: PrivacyStatus; now?: Date }
): Promise<ValidatedItem> {
  if (!item.videoTitle.trim()) {
    throw new ValidationError("Video title is required");
  }
  if (!item.presetPath || !(await fileExists(item.presetPath))) {
    throw new ValidationError(`Preset file not found: ${item.presetPath}`);
  }
  if (!item.workflowPath || !(await fileExists(item.workflowPath))) {
    throw new ValidationError(`Workflow file not found: ${item.workflowPath}`);
  }
  if (!item.account.trim()) {
    throw new ValidationError("Account name is required");
  }

  const preset = await loadPresetFile(item.presetPath);
  await loadWorkflowFile(item.workflowPath);
  const publish = resolvePublishSettings(item.schedule, opts.defaultPrivacy, opts.now);

  return {
    preset,
    request: presetToRequest(preset, { workflowPath: item.workflowPath, title: item.videoTitle }),
    publish,
  };
}
