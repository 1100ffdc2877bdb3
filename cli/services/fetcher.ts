import type { AppConfig } from '../../shared/config';
import { NetworkError, describeError } from '../errors';
import type { Logger } from '../obs/logger';
import { withRetry } from '../utils/async';

type FetchConfig = Pick<AppConfig, 'fetch' | 'expectedHosts'>;

const RETRYABLE_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

const BASE_HEADERS: Record<string, string> = {
  Accept:
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
  'Upgrade-Insecure-Requests': '1',
  'Sec-Fetch-Dest': 'document',
  'Sec-Fetch-Mode': 'navigate',
  'Sec-Fetch-User': '?1',
  'Sec-Ch-Ua': '"Google Chrome";v="131", "Chromium";v="131", "Not_A Brand";v="24"',
  'Sec-Ch-Ua-Mobile': '?0',
  'Sec-Ch-Ua-Platform': '"macOS"',
  'Cache-Control': 'max-age=0',
  DNT: '1',
};

const SEARCH_REFERER = 'https://www.google.com/';

export const isExpectedHost = (hostname: string, expectedHosts: readonly string[]): boolean => {
  const host = hostname.toLowerCase();
  return expectedHosts.some((expected) => host === expected || host.endsWith(`.${expected}`));
};

/**
 * Browser-like request headers. In-family pages are requested as if navigated to from the
 * family's own front page; anything else looks like a search-result click.
 */
export const buildRequestHeaders = (url: URL, config: FetchConfig): Record<string, string> => {
  const expected = config.expectedHosts.find((host) => isExpectedHost(url.hostname, [host]));
  return {
    ...BASE_HEADERS,
    'User-Agent': config.fetch.userAgent,
    'Accept-Language': config.fetch.acceptLanguage,
    Referer: expected ? `https://${expected}/` : SEARCH_REFERER,
    'Sec-Fetch-Site': expected ? 'same-origin' : 'cross-site',
  };
};

const parseHttpUrl = (rawUrl: string): URL => {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch (error) {
    throw new NetworkError(`Invalid URL: ${rawUrl}`, rawUrl, { cause: error });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new NetworkError(`Unsupported URL scheme ${url.protocol} (only http and https can be fetched)`, rawUrl);
  }
  return url;
};

// undici reports "fetch failed" and keeps the useful part in `cause`
const transportMessage = (error: unknown): string => {
  if (error instanceof Error && error.cause instanceof Error) {
    return `${error.message} (${error.cause.message})`;
  }
  return describeError(error);
};

const statusHint = (status: number): string | undefined => {
  if (status === 401 || status === 403) return 'The site refused the request; it may block automated clients.';
  if (status === 404 || status === 410) return 'Check that the URL points to an existing article.';
  if (status === 429) return 'The site is rate limiting requests; try again later.';
  return undefined;
};

export const isRetryableFetchError = (error: unknown): boolean => {
  if (!(error instanceof NetworkError)) return false;
  return error.status === undefined || RETRYABLE_STATUSES.has(error.status);
};

/**
 * GETs the page and returns its HTML. Transient failures (transport errors, timeouts, 408, 429,
 * 5xx) are retried with linear backoff; every failure surfaces as a NetworkError.
 */
export const fetchArticleHtml = async (
  rawUrl: string,
  config: FetchConfig,
  logger: Logger,
  signal?: AbortSignal,
): Promise<string> => {
  const url = parseHttpUrl(rawUrl);
  const headers = buildRequestHeaders(url, config);
  const { timeoutMs, retries, retryDelayMs } = config.fetch;

  const attemptFetch = async (attempt: number): Promise<string> => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const startedAt = Date.now();

    try {
      const response = await fetch(url, { method: 'GET', headers, redirect: 'follow', signal: controller.signal });
      if (!response.ok) {
        throw new NetworkError(`HTTP ${response.status} while fetching ${url.href}`, url.href, {
          status: response.status,
          hint: statusHint(response.status),
        });
      }
      const html = await response.text();
      logger.debug('Fetched page', {
        url: url.href,
        finalUrl: response.url || url.href,
        status: response.status,
        attempt,
        bytes: html.length,
        durationMs: Date.now() - startedAt,
      });
      return html;
    } catch (error) {
      if (error instanceof NetworkError) throw error;
      if (signal?.aborted) {
        throw new NetworkError(`Fetch of ${url.href} was cancelled`, url.href, { cause: error });
      }
      if (controller.signal.aborted) {
        throw new NetworkError(`Timed out after ${timeoutMs} ms fetching ${url.href}`, url.href, { cause: error });
      }
      throw new NetworkError(`Could not reach ${url.host}: ${transportMessage(error)}`, url.href, { cause: error });
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  };

  try {
    return await withRetry(attemptFetch, {
      retries,
      delayMs: retryDelayMs,
      signal,
      shouldRetry: (error) => !signal?.aborted && isRetryableFetchError(error),
      onRetry: (error, attempt) =>
        logger.warn('Fetch attempt failed, retrying', {
          url: url.href,
          attempt,
          retriesLeft: retries - attempt + 1,
          error,
        }),
    });
  } catch (error) {
    // an abort during the backoff sleep surfaces as a plain Error
    if (error instanceof NetworkError || !signal?.aborted) throw error;
    throw new NetworkError(`Fetch of ${url.href} was cancelled`, url.href, { cause: error });
  }
};
