import { asError, stratusError } from "../errors.js";

export interface TimedFetchInit extends RequestInit {
  timeoutMs?: number;
  where?: string;
}

/**
 * Wrap fetch with timeout and location context for debugging.
 * The timeout covers the wait for response headers only. A caller's signal
 * stays linked after the response arrives so it can still cancel the body.
 */
export async function timedFetch(url: string, init: TimedFetchInit = {}): Promise<Response> {
  const { timeoutMs, where, signal: userSignal, ...rest } = init;
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | null = null;
  const linkAbort = () => controller.abort();

  if (userSignal) {
    if (userSignal.aborted) controller.abort();
    else userSignal.addEventListener("abort", linkAbort, { once: true });
  }
  if (timeoutMs && timeoutMs > 0) {
    timer = setTimeout(() => controller.abort(), timeoutMs);
  }

  try {
    return await fetch(url, { ...rest, signal: controller.signal });
  } catch (e: unknown) {
    if (userSignal) userSignal.removeEventListener("abort", linkAbort);
    const wrapped = asError(e);
    const isAbort = wrapped.name === "AbortError";
    const tag = isAbort ? "fetch timeout" : "fetch error";
    const detail = wrapped.cause ? ` (${asError(wrapped.cause).message})` : "";
    throw stratusError(
      "transport_failure",
      `[${tag}] ${where ?? ""} ${url} -> ${wrapped.name}: ${wrapped.message}${detail}`,
      { retryable: true, cause: e },
    );
  } finally {
    if (timer) clearTimeout(timer);
  }
}
