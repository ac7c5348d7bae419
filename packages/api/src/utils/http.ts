import axios, { AxiosInstance } from 'axios';

export interface RequestOptions {
  /** Aborts the request, e.g. when the stage attempt times out. */
  signal?: AbortSignal;
}

export interface HttpClientOptions {
  /** Preconfigured instance; `timeoutMs` then does not apply. */
  client?: AxiosInstance;
  timeoutMs?: number;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export function createHttpClient(baseURL: string, options: HttpClientOptions = {}): AxiosInstance {
  return options.client || axios.create({
    baseURL,
    timeout: options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    headers: {
      'Content-Type': 'application/json'
    }
  });
}

/**
 * Maps a client-side HTTP failure (4xx) to a rejection reason. Returns
 * undefined for anything else so the caller rethrows: server errors and
 * network failures are failures, not rejections.
 */
export function rejectionReason(error: unknown): string | undefined {
  if (!axios.isAxiosError(error) || !error.response || error.response.status >= 500) {
    return undefined;
  }
  const data: unknown = error.response.data;
  if (typeof data === 'string' && data.trim()) {
    return data.trim();
  }
  if (data && typeof data === 'object') {
    for (const key of ['error', 'reason', 'message']) {
      const value: unknown = Reflect.get(data, key);
      if (typeof value === 'string' && value) {
        return value;
      }
    }
  }
  return `HTTP ${error.response.status}`;
}
