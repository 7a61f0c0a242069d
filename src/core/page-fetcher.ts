/**
 * Page Fetcher
 *
 * Downloads the documentation page the parser consumes. Any non-success
 * status is a fetch failure, raised before parsing starts.
 */

import { PageFetchError } from '../types/errors.js';
import { isTransientError, withRetry } from '../utils/retry.js';
import { logger } from '../utils/logger.js';

const log = logger.pageFetcher;

export interface FetchPageOptions {
  /** @default 30000 */
  timeoutMs?: number;
  /** Total attempts, including the first. @default 3 */
  maxAttempts?: number;
  /** Delay before the first retry. @default 1000 */
  retryDelayMs?: number;
  /** Extra request headers */
  headers?: Record<string, string>;
}

const RETRYABLE_STATUS = new Set([502, 503, 504]);

function shouldRetry(error: Error): boolean {
  if (error instanceof PageFetchError && error.status !== undefined) {
    return RETRYABLE_STATUS.has(error.status);
  }
  return isTransientError(error);
}

async function requestPage(url: string, timeoutMs: number, headers: Record<string, string>): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      headers: { Accept: 'text/html', ...headers },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new PageFetchError(url, `Request to ${url} failed with ${response.status}`, response.status);
    }

    return await response.text();
  } catch (error) {
    if (error instanceof PageFetchError) {
      throw error;
    }
    const reason = controller.signal.aborted
      ? `timeout after ${timeoutMs}ms`
      : error instanceof Error ? error.message : String(error);
    throw new PageFetchError(url, `Request to ${url} failed: ${reason}`);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetch the HTML of a documentation page.
 * @throws PageFetchError
 */
export async function fetchDocumentationPage(url: string, options: FetchPageOptions = {}): Promise<string> {
  const timeoutMs = options.timeoutMs ?? 30000;
  const startTime = Date.now();

  const html = await withRetry(() => requestPage(url, timeoutMs, options.headers ?? {}), {
    maxAttempts: options.maxAttempts ?? 3,
    initialDelayMs: options.retryDelayMs ?? 1000,
    retryOn: shouldRetry,
  });

  log.timed('Fetched documentation page', startTime, { url, bytes: html.length });
  return html;
}
