import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { TransientServiceError, UploadError, errorMessage } from "../pipeline/errors.js";
import { logStep, logWarn } from "../utils/logger.js";
import {
  createYouTubeClient,
  httpStatusOf,
  isNetworkFailure,
  type YouTubeClientFactory,
} from "./google.js";
import type { AccessCredentials, Publisher, UploadRequest, UploadResult } from "./types.js";

export type YouTubePublisherOptions = {
  createClient?: YouTubeClientFactory;
};

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function buildVideoResource(request: UploadRequest) {
  return {
    snippet: {
      title: request.title,
      description: request.description,
      tags: request.tags,
      categoryId: request.category,
    },
    status: {
      privacyStatus: request.publishAt ? "private" : request.privacyStatus,
      selfDeclaredMadeForKids: request.madeForKids,
      ...(request.publishAt ? { publishAt: request.publishAt.toISOString() } : {}),
    },
  };
}

function toPublishError(step: string, error: unknown): Error {
  if (error instanceof UploadError || error instanceof TransientServiceError) return error;
  const status = httpStatusOf(error);
  if (status === undefined && isNetworkFailure(error)) {
    return new TransientServiceError(`YouTube ${step} failed: ${errorMessage(error)}`, error);
  }
  return new UploadError(
    `YouTube ${step} failed${status === undefined ? "" : ` with ${status}`}: ${errorMessage(error)}`,
    status
  );
}

/** YouTube Data API v3 upload followed by a best-effort thumbnail. */
export class YouTubePublisher implements Publisher {
  private readonly createClient: YouTubeClientFactory;

  constructor(options: YouTubePublisherOptions = {}) {
    this.createClient = options.createClient ?? createYouTubeClient;
  }

  async upload(
    credentials: AccessCredentials,
    request: UploadRequest,
    onProgress?: (fraction: number) => void
  ): Promise<UploadResult> {
    const { size } = await stat(request.videoPath);
    if (size === 0) throw new UploadError(`Video file is empty: ${request.videoPath}`);

    logStep("publish", `Uploading ${request.title} (${(size / 1024 / 1024).toFixed(1)} MB)`);
    const youtube = this.createClient(credentials.accessToken);

    let videoId: string;
    try {
      const response = await youtube.videos.insert(
        {
          part: ["snippet", "status"],
          requestBody: buildVideoResource(request),
          media: { mimeType: "video/mp4", body: createReadStream(request.videoPath) },
        },
        { onUploadProgress: (event) => onProgress?.(Math.min(1, event.bytesRead / size)) }
      );
      if (!response.data.id) throw new UploadError("YouTube upload response has no video id");
      videoId = response.data.id;
    } catch (error) {
      throw toPublishError("upload", error);
    }
    onProgress?.(1);
    logStep("publish", `Video uploaded: ${watchUrl(videoId)}`);

    if (request.thumbnailPath) {
      try {
        await youtube.thumbnails.set({
          videoId,
          media: { mimeType: "image/jpeg", body: createReadStream(request.thumbnailPath) },
        });
        logStep("publish", "Thumbnail set successfully");
      } catch (error) {
        logWarn(`Thumbnail upload failed: ${toPublishError("thumbnail upload", error).message}`);
      }
    }
    return { videoId, url: watchUrl(videoId) };
  }
}
