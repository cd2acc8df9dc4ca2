export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type FetchWithTimeoutOptions = {
  timeoutMs: number;
  fetchImpl: FetchLike;
};

export class FetchTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'FetchTimeoutError';
  }
}

/**
 * Single outbound attempt bounded by `timeoutMs`. Failures surface to the caller,
 * which decides whether to degrade (FX rates, job types) or fail the request.
 */
export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  options: Partial<FetchWithTimeoutOptions> = {}
): Promise<Response> {
  const timeoutMs = options.timeoutMs ?? 5000;
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, requestInit) => fetch(input, requestInit));

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetchImpl(url, { ...init, signal: controller.signal });
  } catch (err) {
    if (controller.signal.aborted) {
      throw new FetchTimeoutError(url, timeoutMs);
    }
    throw err;
  } finally {
    clearTimeout(timeoutId);
  }
}
