import assert from "node:assert/strict";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { test } from "node:test";
import { TransientServiceError, UploadError } from "../src/pipeline/errors.js";
import { httpStatusOf, isNetworkFailure, type YouTubeClient } from "../src/publish/google.js";
import { YouTubePublisher, buildVideoResource, watchUrl } from "../src/publish/youtube.js";
import type { UploadRequest } from "../src/publish/types.js";
import { makeTempDir } from "./helpers.js";

function uploadRequest(overrides: Partial<UploadRequest> = {}): UploadRequest {
  return {
    videoPath: "/unused.mp4",
    title: "Quiet Forest Walk",
    description: "A walk.",
    category: "22",
    tags: [],
    privacyStatus: "public",
    madeForKids: false,
    ...overrides,
  };
}

async function readAll(body: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

function httpError(message: string, status: number): Error {
  return Object.assign(new Error(message), { response: { status } });
}

async function videoFile(content = "0123456789") {
  const dir = await makeTempDir();
  const videoPath = join(dir, "final.mp4");
  const thumbnailPath = join(dir, "thumbnail.jpg");
  await writeFile(videoPath, content);
  await writeFile(thumbnailPath, "jpeg");
  return { videoPath, thumbnailPath };
}

test("buildVideoResource keeps the default privacy without a schedule", () => {
  assert.deepEqual(buildVideoResource(uploadRequest()), {
    snippet: { title: "Quiet Forest Walk", description: "A walk.", tags: [], categoryId: "22" },
    status: { privacyStatus: "public", selfDeclaredMadeForKids: false },
  });
});

test("buildVideoResource schedules a private upload", () => {
  const resource = buildVideoResource(
    uploadRequest({ publishAt: new Date("2030-03-01T09:00:00Z"), madeForKids: true })
  );
  assert.deepEqual(resource.status, {
    privacyStatus: "private",
    selfDeclaredMadeForKids: true,
    publishAt: "2030-03-01T09:00:00.000Z",
  });
});

test("httpStatusOf and isNetworkFailure read API client errors", () => {
  assert.equal(httpStatusOf(httpError("quota", 403)), 403);
  assert.equal(httpStatusOf(new Error("plain")), undefined);
  assert.equal(isNetworkFailure(Object.assign(new Error("reset"), { code: "ECONNRESET" })), true);
  assert.equal(isNetworkFailure(Object.assign(new Error("bad"), { code: "ERR_BAD_REQUEST" })), false);
});

test("YouTubePublisher streams the video, reports progress and tolerates a failed thumbnail", async () => {
  const { videoPath, thumbnailPath } = await videoFile();
  const seen: { tokens: string[]; inserted: string[]; thumbnails: string[] } = {
    tokens: [],
    inserted: [],
    thumbnails: [],
  };
  let resource: unknown;
  let part: string[] = [];
  const client: YouTubeClient = {
    videos: {
      async insert(params, options) {
        part = params.part;
        resource = params.requestBody;
        seen.inserted.push(`${params.media.mimeType} ${await readAll(params.media.body)}`);
        options?.onUploadProgress?.({ bytesRead: 4 });
        options?.onUploadProgress?.({ bytesRead: 10 });
        return { data: { id: "vid123" } };
      },
    },
    thumbnails: {
      async set(params) {
        seen.thumbnails.push(`${params.videoId} ${params.media.mimeType} ${await readAll(params.media.body)}`);
        throw httpError("thumbnail backend down", 500);
      },
    },
  };
  const publisher = new YouTubePublisher({
    createClient: (token) => {
      seen.tokens.push(token);
      return client;
    },
  });

  const progress: number[] = [];
  const request = uploadRequest({ videoPath, thumbnailPath });
  const result = await publisher.upload({ accessToken: "test-token" }, request, (f) => progress.push(f));

  assert.deepEqual(result, { videoId: "vid123", url: watchUrl("vid123") });
  assert.equal(result.url, "https://www.youtube.com/watch?v=vid123");
  assert.deepEqual(progress, [0.4, 1, 1]);
  assert.deepEqual(part, ["snippet", "status"]);
  assert.deepEqual(resource, buildVideoResource(request));
  assert.deepEqual(seen, {
    tokens: ["test-token"],
    inserted: ["video/mp4 0123456789"],
    thumbnails: ["vid123 image/jpeg jpeg"],
  });
});

test("YouTubePublisher skips the thumbnail call without a thumbnail", async () => {
  const { videoPath } = await videoFile();
  let thumbnailCalls = 0;
  const publisher = new YouTubePublisher({
    createClient: () => ({
      videos: {
        async insert(params) {
          await readAll(params.media.body);
          return { data: { id: "vid9" } };
        },
      },
      thumbnails: {
        async set() {
          thumbnailCalls += 1;
        },
      },
    }),
  });
  const result = await publisher.upload({ accessToken: "test-token" }, uploadRequest({ videoPath }));
  assert.equal(result.videoId, "vid9");
  assert.equal(thumbnailCalls, 0);
});

function failingPublisher(error: unknown): YouTubePublisher {
  return new YouTubePublisher({
    createClient: () => ({
      videos: {
        async insert(params) {
          await readAll(params.media.body);
          throw error;
        },
      },
      thumbnails: { set: async () => undefined },
    }),
  });
}

test("YouTubePublisher maps an API rejection to UploadError", async () => {
  const { videoPath } = await videoFile();
  await assert.rejects(
    failingPublisher(httpError("quotaExceeded", 403)).upload(
      { accessToken: "test-token" },
      uploadRequest({ videoPath })
    ),
    (error: unknown) => {
      assert.ok(error instanceof UploadError);
      assert.equal(error.status, 403);
      assert.equal(error.message, "YouTube upload failed with 403: quotaExceeded");
      return true;
    }
  );
});

test("YouTubePublisher maps a dropped connection to TransientServiceError", async () => {
  const { videoPath } = await videoFile();
  const dropped = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
  await assert.rejects(
    failingPublisher(dropped).upload({ accessToken: "test-token" }, uploadRequest({ videoPath })),
    (error: unknown) => {
      assert.ok(error instanceof TransientServiceError);
      assert.equal(error.message, "YouTube upload failed: socket hang up");
      return true;
    }
  );
});

test("YouTubePublisher rejects a response without a video id", async () => {
  const { videoPath } = await videoFile();
  const publisher = new YouTubePublisher({
    createClient: () => ({
      videos: {
        async insert(params) {
          await readAll(params.media.body);
          return { data: {} };
        },
      },
      thumbnails: { set: async () => undefined },
    }),
  });
  await assert.rejects(publisher.upload({ accessToken: "test-token" }, uploadRequest({ videoPath })), {
    name: "UploadError",
    message: "YouTube upload response has no video id",
  });
});

test("YouTubePublisher refuses an empty video file", async () => {
  const { videoPath } = await videoFile("");
  const publisher = new YouTubePublisher({
    createClient: () => {
      throw new Error("client should not be created");
    },
  });
  await assert.rejects(publisher.upload({ accessToken: "test-token" }, uploadRequest({ videoPath })), {
    message: `Video file is empty: ${videoPath}`,
  });
});
