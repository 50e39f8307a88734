export const DEFAULT_FETCH_HEADERS = { 'User-Agent': 'RouteWeatherPlanner/1.0 (trip weather sampling client)' };

export type FetchImpl = (url: string, init?: RequestInit) => Promise<Response>;
export type FetchWithTimeout = (url: string, options?: RequestInit, timeoutMs?: number) => Promise<Response>;

const defaultFetchImpl: FetchImpl = (url, init) => globalThis.fetch(url, init);

export const createFetchWithTimeout = (defaultTimeoutMs: number, fetchImpl: FetchImpl = defaultFetchImpl): FetchWithTimeout => async (url, options = {}, timeoutMs = defaultTimeoutMs) => {
  const controller = new AbortController();
  const upstreamSignal = options.signal;
  const abortFromUpstream = () => {
    controller.abort(upstreamSignal?.reason);
  };
  if (upstreamSignal) {
    if (upstreamSignal.aborted) {
      abortFromUpstream();
    } else {
      upstreamSignal.addEventListener('abort', abortFromUpstream, { once: true });
    }
  }
  const timeout = setTimeout(() => controller.abort(new Error(`Request timed out after ${timeoutMs}ms`)), timeoutMs);
  try {
    return await fetchImpl(url, { ...options, signal: controller.signal });
  } finally {
    clearTimeout(timeout);
    if (upstreamSignal) {
      upstreamSignal.removeEventListener('abort', abortFromUpstream);
    }
  }
};

export const readErrorMessage = (error: unknown): string => {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return String(error);
};
