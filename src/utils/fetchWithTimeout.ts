type FetchOptions = Parameters<typeof fetch>[1];

export type FetchLike = typeof fetch;

export async function fetchWithTimeout(
  url: string,
  opts: FetchOptions & { timeoutMs?: number; fetchImpl?: FetchLike } = {}
): Promise<Response> {
  const { timeoutMs = 10_000, signal, fetchImpl = fetch, ...rest } = opts;

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(new Error("timeout")), timeoutMs);
  const forward = () => controller.abort(signal?.reason);
  if (signal?.aborted) forward();
  else signal?.addEventListener("abort", forward, { once: true });

  try {
    return await fetchImpl(url, { ...rest, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", forward);
  }
}
