import { postJson, isRecord, decodeBase64 } from "../http.js";
import { ServiceResponseError } from "../../pipeline/errors.js";
import { IMAGE_SIZES, type ImageGenerator, type ImageQuality, type ImageSizeClass } from "../types.js";

export type LocalImageOptions = {
  baseUrl: string;
  workflow: unknown;
  timeoutMs: number;
};

// Reply shape: { images: { <nodeId>: [base64, ...] } }; the first image of any node wins.
export function pickFirstImage(data: unknown): string | undefined {
  if (!isRecord(data) || !isRecord(data.images)) return undefined;
  for (const nodeImages of Object.values(data.images)) {
    if (Array.isArray(nodeImages) && typeof nodeImages[0] === "string" && nodeImages[0]) {
      return nodeImages[0];
    }
  }
  return undefined;
}

export class LocalImageClient implements ImageGenerator {
  constructor(private options: LocalImageOptions) {}

  async generateImage(
    prompt: string,
    size: ImageSizeClass,
    quality: ImageQuality = "high"
  ): Promise<Uint8Array> {
    const { width, height } = IMAGE_SIZES[size];
    const data = await postJson(
      `${this.options.baseUrl.replace(/\/+$/, "")}/generate`,
      {
        prompt,
        workflow: this.options.workflow,
        width,
        height,
        quality,
        format: "base64",
      },
      { service: "Image service", timeoutMs: this.options.timeoutMs }
    );
    const image = pickFirstImage(data);
    if (!image) {
      throw new ServiceResponseError("No image data found in response");
    }
    return decodeBase64(image);
  }
}
