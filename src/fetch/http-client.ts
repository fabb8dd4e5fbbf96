/**
 * Shared got client used by the page fetcher.
 * Redirects are followed, nothing is retried, and HTTP error statuses are returned
 * rather than thrown so the caller decides what counts as fetchable.
 */
import got, { type Got } from 'got';
import { logger } from '../logger.js';

/** Configuration constants */
const DEFAULT_REQUEST_TIMEOUT_MS = 20000;
const MAX_RESPONSE_SIZE = 10 * 1024 * 1024; // 10MB

export interface HttpResponse {
  success: boolean;
  statusCode: number;
  url: string;
  html?: string;
  headers: Record<string, string>;
  error?: string;
}

export interface HttpRequestOptions {
  timeout?: number;
  userAgent?: string;
  headers?: Record<string, string>;
}

const client: Got = got.extend({
  followRedirect: true,
  throwHttpErrors: false,
  retry: { limit: 0 },
  headers: {
    accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8',
  },
});

/** Flatten Node's header shape (string | string[] | undefined) into plain strings. */
function flattenHeaders(raw: Record<string, string | string[] | undefined>): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    headers[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
}

function failure(url: string, statusCode: number, error: string): HttpResponse {
  return { success: false, statusCode, url, headers: {}, error };
}

/**
 * Make an HTTP GET request. Never throws: transport errors come back as
 * `{ success: false, statusCode: 0, error }`.
 */
export async function httpRequest(
  url: string,
  options: HttpRequestOptions = {}
): Promise<HttpResponse> {
  const timeoutMs = options.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const headers: Record<string, string> = { ...options.headers };
  if (options.userAgent) headers['user-agent'] = options.userAgent;

  logger.debug({ url, timeoutMs }, 'Making http request');

  try {
    const response = await client.get(url, {
      headers,
      timeout: { request: timeoutMs },
      responseType: 'text',
    });

    const responseHeaders = flattenHeaders(response.headers);

    const contentLength = responseHeaders['content-length'];
    if (contentLength) {
      const size = parseInt(contentLength, 10);
      if (!isNaN(size) && size > MAX_RESPONSE_SIZE) {
        logger.warn(
          { url, contentLength: size, limit: MAX_RESPONSE_SIZE },
          'Content-Length exceeds size limit'
        );
        return failure(url, response.statusCode, 'response_too_large');
      }
    }

    // Chunked and compressed responses carry no usable Content-Length
    if (response.body.length > MAX_RESPONSE_SIZE) {
      logger.warn(
        { url, size: response.body.length, limit: MAX_RESPONSE_SIZE },
        'Response exceeds size limit'
      );
      return failure(url, response.statusCode, 'response_too_large');
    }

    logger.debug(
      { url, statusCode: response.statusCode, bodyLength: response.body.length },
      'http request complete'
    );

    return {
      success: response.statusCode >= 200 && response.statusCode < 300,
      statusCode: response.statusCode,
      url: response.url,
      html: response.body,
      headers: responseHeaders,
    };
  } catch (error) {
    logger.warn({ url, error: String(error) }, 'http request failed');
    return failure(url, 0, String(error));
  }
}
