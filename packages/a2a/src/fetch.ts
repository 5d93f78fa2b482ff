/**
 * fetch with a bounded timeout that also honors a caller's AbortSignal.
 *
 * The timeout covers the whole exchange: headers and body. A peer that sends
 * headers and then stalls is cut off like one that never answers.
 */

export interface FetchedText {
  readonly status: number;
  readonly ok: boolean;
  readonly body: string;
}

/** True for the rejection fetch produces when its signal aborts */
export function isAbortError(error: unknown): boolean {
  return error instanceof DOMException && error.name === "AbortError";
}

/** True for the rejection fetchTextWithTimeout produces when its timer fires */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof DOMException && error.name === "TimeoutError";
}

export async function fetchTextWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<FetchedText> {
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);

  const onExternalAbort = (): void => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  }
  signal?.addEventListener("abort", onExternalAbort, { once: true });

  try {
    const response = await fetch(url, {
      ...init,
      signal: controller.signal,
    });
    const body = await response.text();
    return { status: response.status, ok: response.ok, body };
  } catch (error) {
    if (timedOut && !signal?.aborted) {
      throw new DOMException(`Request timed out after ${timeoutMs}ms`, "TimeoutError");
    }
    throw error;
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", onExternalAbort);
  }
}
