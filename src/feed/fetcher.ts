// NDBC feed fetcher - one GET per run, body returned as text

import { logger } from '../logger.js';
import { APP_NAME, VERSION } from '../config.js';

const DEFAULT_TIMEOUT = 30000; // 30 seconds

// Feed Error Types
export class FeedError extends Error {
  constructor(
    message: string,
    public url: string,
    public statusCode?: number
  ) {
    super(message);
    this.name = 'FeedError';
  }
}

export class FeedRequestError extends FeedError {
  constructor(url: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Request to ${url} failed: ${reason}`, url);
    this.name = 'FeedRequestError';
    this.cause = cause;
  }
}

export class FeedHttpError extends FeedError {
  constructor(url: string, statusCode: number, statusText: string) {
    super(`Feed request failed: ${statusCode} ${statusText} (${url})`, url, statusCode);
    this.name = 'FeedHttpError';
  }
}

export class FeedParseError extends FeedError {
  constructor(message: string, url = '') {
    super(message, url);
    this.name = 'FeedParseError';
  }
}

export interface FetchFeedOptions {
  timeoutMs?: number;
}

/**
 * Fetch a feed and return the full response body. No retry: any failure is fatal to the caller.
 */
export async function fetchFeed(url: string, options: FetchFeedOptions = {}): Promise<string> {
  const { timeoutMs = DEFAULT_TIMEOUT } = options;

  logger.info('Fetching feed: %s', url);

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': `${APP_NAME}/${VERSION}`,
        },
        signal: controller.signal,
      });
    } catch (error) {
      throw new FeedRequestError(url, error);
    }

    if (!response.ok) {
      throw new FeedHttpError(url, response.status, response.statusText);
    }

    // The timeout covers the body as well as the headers
    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      throw new FeedRequestError(url, error);
    }

    logger.info('Fetched feed: %s (%d bytes)', url, body.length);
    return body;
  } finally {
    clearTimeout(timeoutId);
  }
}
