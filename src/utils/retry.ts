import { CancelledError } from "../pipeline/errors.js";
import { logWarn } from "./logger.js";

export type RetryOptions = {
  /** Total number of attempts, including the first one. */
  retries: number;
  baseDelayMs: number;
  /** Call-site name used in warnings and attached to the final error. */
  label?: string;
  isTransient?: (error: unknown) => boolean;
  isCancelled?: () => boolean;
  sleep?: (ms: number) => Promise<void>;
  /** Runs after every successful attempt. */
  onSuccess?: () => void;
};

export const sleepMs = (ms: number) =>
  new Promise<void>((r) => setTimeout(r, ms));

export function tagError(error: unknown, label: string): unknown {
  if (error instanceof Error && !error.message.startsWith(`[${label}]`)) {
    error.message = `[${label}] ${error.message}`;
  }
  return error;
}

export function backoffDelayMs(
  attempt: number,
  opts: Pick<RetryOptions, "baseDelayMs">
): number {
  return opts.baseDelayMs * 2 ** attempt;
}

export async function retry<T>(
  operation: () => Promise<T>,
  opts: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, opts.retries);
  const isTransient = opts.isTransient ?? (() => true);
  const sleep = opts.sleep ?? sleepMs;
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt += 1) {
    if (opts.isCancelled?.()) {
      throw new CancelledError();
    }
    try {
      const result = await operation();
      opts.onSuccess?.();
      return result;
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      lastError = error;
      if (!isTransient(error)) break;
      if (attempt === attempts - 1) break;
      const message = error instanceof Error ? error.message : String(error);
      logWarn(
        `${opts.label ?? "call"} failed, attempt ${attempt + 1}/${attempts}: ${message}`
      );
      await sleep(backoffDelayMs(attempt, opts));
    }
  }

  throw opts.label ? tagError(lastError, opts.label) : lastError;
}
