import fetch from 'node-fetch';
import type { RequestInit, Response } from 'node-fetch';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export class RequestTimeoutError extends Error {
  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`Request timed out after ${timeoutMs} ms`);
    this.name = 'RequestTimeoutError';
  }
}

/**
 * Issues a request and reads its body with `readBody`. The timeout covers both
 * the response headers and the body; when it elapses the request is aborted
 * and the call rejects with `RequestTimeoutError`.
 */
export async function fetchWithTimeout<T>(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  readBody: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timeout: NodeJS.Timeout | undefined;
  const timedOut = new Promise<never>((_resolve, reject) => {
    timeout = setTimeout(() => {
      controller.abort();
      reject(new RequestTimeoutError(url, timeoutMs));
    }, timeoutMs);
  });

  const exchange = async () => {
    const response = await fetchImpl(url, { ...init, signal: controller.signal });
    return readBody(response);
  };

  try {
    return await Promise.race([exchange(), timedOut]);
  } catch (error) {
    if (controller.signal.aborted) {
      throw new RequestTimeoutError(url, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeout);
  }
}

export async function readErrorSnippet(response: Response, maxLength = 300): Promise<string> {
  const text = await response.text().catch(() => '');
  return text.slice(0, maxLength);
}
