export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

// undici rejects with a TypeError("fetch failed") whose cause carries the socket error.
export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof TypeError)) return false;
  if (error.message === "fetch failed") return true;
  const cause = error.cause;
  return (
    cause instanceof Error &&
    /ECONNREFUSED|ECONNRESET|ENOTFOUND|EAI_AGAIN|EPIPE|UND_ERR_SOCKET/.test(
      `${cause.name} ${cause.message} ${"code" in cause ? String(cause.code) : ""}`
    )
  );
}

export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs?: number
): Promise<Response> {
  if (!timeoutMs || timeoutMs <= 0) {
    return await fetch(url, init);
  }
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { ...init, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
  }
}
