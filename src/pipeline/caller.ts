import { retry, sleepMs } from "../utils/retry.js";
import { reclaimMemory } from "../utils/memory.js";
import { CancelledError, isTransientError } from "./errors.js";

export type RetryingCallerOptions = {
  maxRetries: number;
  baseDelayMs: number;
  isCancelled: () => boolean;
  sleep?: (ms: number) => Promise<void>;
};

/**
 * Runs service calls with the run's cancellation flag and backoff budget:
 * attempt k waits baseDelayMs * 2^k after failing, only transient errors are retried.
 */
export class RetryingCaller {
  constructor(private options: RetryingCallerOptions) {}

  call<T>(label: string, operation: () => Promise<T>, maxRetries = this.options.maxRetries): Promise<T> {
    return retry(operation, {
      retries: maxRetries,
      baseDelayMs: this.options.baseDelayMs,
      label,
      isTransient: isTransientError,
      isCancelled: this.options.isCancelled,
      sleep: this.options.sleep ?? sleepMs,
      onSuccess: reclaimMemory,
    });
  }

  throwIfCancelled(): void {
    if (this.options.isCancelled()) throw new CancelledError();
  }
}
