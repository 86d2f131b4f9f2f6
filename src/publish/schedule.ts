import type { PrivacyStatus } from "../config/schema.js";
import { ValidationError } from "../pipeline/errors.js";
import { parseTimestamp } from "../utils/date.js";

export type PublishSettings = {
  privacyStatus: PrivacyStatus;
  publishAt?: Date;
};

/**
 * An empty schedule publishes with the default privacy. A scheduled upload is
 * always private until `publishAt`, which must lie in the future.
 */
export function resolvePublishSettings(
  schedule: string | undefined,
  defaultPrivacy: PrivacyStatus,
  now: Date = new Date()
): PublishSettings {
  if (!schedule?.trim()) return { privacyStatus: defaultPrivacy };

  const publishAt = parseTimestamp(schedule);
  if (!publishAt) {
    throw new ValidationError(`Invalid schedule: ${schedule}`);
  }
  if (publishAt.getTime() <= now.getTime()) {
    throw new ValidationError(`Schedule is in the past: ${schedule}`);
  }
  return { privacyStatus: "private", publishAt };
}
