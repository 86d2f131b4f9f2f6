export class CancelledError extends Error {
  constructor(message = "Operation cancelled by user") {
    super(message);
    this.name = "CancelledError";
  }
}

/** Network timeout or connection failure; safe to retry. */
export class TransientServiceError extends Error {
  name = "TransientServiceError";
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

/** Non-OK status or a body missing the fields we need; retrying will not help. */
export class ServiceResponseError extends Error {
  name = "ServiceResponseError";
  constructor(message: string, public readonly status?: number) {
    super(message);
  }
}

export class MediaToolError extends Error {
  name = "MediaToolError";
  constructor(
    message: string,
    public readonly exitCode: number,
    public readonly stderr: string
  ) {
    super(message);
  }
}

export class CommandTimeoutError extends Error {
  name = "CommandTimeoutError";
  constructor(
    public readonly command: string,
    public readonly timeoutMs: number,
    public readonly stderr = ""
  ) {
    super(`${command} timed out after ${Math.round(timeoutMs / 1000)} seconds`);
  }
}

export class AudioGenerationError extends Error {
  name = "AudioGenerationError";
  constructor(
    message: string,
    public readonly failedIndices: number[]
  ) {
    super(message);
  }
}

export function isTransientError(error: unknown): boolean {
  return error instanceof TransientServiceError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ValidationError extends Error {
  name = "ValidationError";
  constructor(message: string) {
    super(message);
  }
}

export class UploadError extends Error {
  name = "UploadError";
  constructor(message: string, public readonly status?: number) {
    super(message);
  }
}
