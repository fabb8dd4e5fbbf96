/**
 * Page fetcher: GET a URL and return its HTML, or a "not fetchable" result
 */
import { httpRequest } from './http-client.js';
import { validateDocument } from './content-validator.js';
import type { FetchError, FetchOptions, FetchPage, PageFetchResult } from './types.js';

function toFetchError(error: string | undefined): FetchError {
  return error === 'response_too_large' ? 'response_too_large' : 'network_error';
}

export async function fetchPage(url: string, options: FetchOptions = {}): Promise<PageFetchResult> {
  const startTime = Date.now();
  const response = await httpRequest(url, {
    timeout: options.timeout,
    userAgent: options.userAgent,
  });
  const latencyMs = Date.now() - startTime;

  // statusCode 0 means the request never produced a response
  if (response.statusCode === 0 || response.error) {
    return {
      success: false,
      url,
      latencyMs,
      error: toFetchError(response.error),
      errorDetails: { statusCode: response.statusCode, message: response.error },
    };
  }

  const contentType = response.headers['content-type'];
  const validation = validateDocument(response.statusCode, contentType);
  if (!validation.valid) {
    return {
      success: false,
      url,
      latencyMs,
      error: validation.error ?? 'wrong_content_type',
      errorDetails: validation.errorDetails,
    };
  }

  return {
    success: true,
    url,
    latencyMs,
    statusCode: response.statusCode,
    contentType: contentType ?? '',
    html: response.html ?? '',
  };
}

/** Bind fetch options into the collaborator the crawler calls. */
export function createPageFetcher(options: FetchOptions = {}): FetchPage {
  return (url: string) => fetchPage(url, options);
}
