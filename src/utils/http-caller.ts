/**
 * HTTP caller with a request timeout and custom User-Agent support
 *
 * Lightweight wrapper around native fetch(). Every call is a single attempt:
 * failures are reported to the caller, never retried.
 */

import { HTTP_TIMEOUT_MS } from '../config/constants.js';

const DEFAULT_USER_AGENT = 'lictool';

export interface HttpCallOptions {
  /** Custom User-Agent string */
  userAgent?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Additional HTTP headers */
  headers?: Record<string, string>;
}

/**
 * Thrown when the request never produced a response (DNS, refused connection, timeout).
 */
export class HttpCallError extends Error {
  public name = 'HttpCallError';

  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Call HTTP endpoint once
 *
 * @param url - URL to fetch
 * @param options - Request options
 * @returns Response object, whatever its status
 */
export async function callHttp(
  url: string,
  options?: HttpCallOptions
): Promise<Response> {
  const userAgent = options?.userAgent || DEFAULT_USER_AGENT;
  const timeout = options?.timeout || HTTP_TIMEOUT_MS || 30000;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    return await fetch(url, {
      headers: {
        'User-Agent': userAgent,
        ...options?.headers || {}
      },
      signal: controller.signal
    });
  } catch (error: unknown) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new HttpCallError(`Request to ${url} timed out after ${timeout}ms`, url, { cause: error });
    }
    // Node.js fetch reports the network failure as the cause of a generic "fetch failed"
    let detail = String(error);
    if (error instanceof Error) {
      detail = error.cause instanceof Error ? error.cause.message : error.message;
    }
    throw new HttpCallError(`Request to ${url} failed: ${detail}`, url, { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}
