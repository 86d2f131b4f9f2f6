import { fetchWithTimeout, isAbortError, isConnectionError } from "../utils/fetch.js";
import { ServiceResponseError, TransientServiceError } from "../pipeline/errors.js";

export type PostJsonOptions = {
  timeoutMs: number;
  headers?: Record<string, string>;
  service: string;
};

export function sanitizeErrorText(text: string, maxLen = 300): string {
  const out = text.replace(/[\r\n\t]+/g, " ").trim();
  return out.length > maxLen ? `${out.slice(0, maxLen)}...` : out;
}

/**
 * POSTs a JSON body and parses a JSON reply. Timeouts and connection failures
 * surface as TransientServiceError, everything else as ServiceResponseError.
 */
export async function postJson(
  url: string,
  body: unknown,
  opts: PostJsonOptions
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetchWithTimeout(
      url,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Connection: "close",
          ...(opts.headers ?? {}),
        },
        body: JSON.stringify(body),
      },
      opts.timeoutMs
    );
  } catch (error) {
    if (isAbortError(error)) {
      throw new TransientServiceError(
        `${opts.service} request timed out after ${opts.timeoutMs}ms`,
        error
      );
    }
    if (isConnectionError(error)) {
      throw new TransientServiceError(`${opts.service} connection failed`, error);
    }
    throw error;
  }

  if (!response.ok) {
    const text = await response.text();
    throw new ServiceResponseError(
      `${opts.service} error ${response.status}: ${sanitizeErrorText(text || response.statusText)}`,
      response.status
    );
  }

  try {
    return await response.json();
  } catch {
    throw new ServiceResponseError(`${opts.service} returned a non-JSON body`, response.status);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeBase64(data: string): Uint8Array {
  return Buffer.from(data, "base64");
}
