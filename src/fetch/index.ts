/**
 * Public API exports for the fetch module
 */
export { fetchPage, createPageFetcher } from './page-fetcher.js';
export { httpRequest } from './http-client.js';
export { validateDocument } from './content-validator.js';
export type {
  FetchError,
  FetchOptions,
  FetchPage,
  FetchSuccess,
  FetchFailure,
  PageFetchResult,
  ValidationResult,
  ValidationError,
} from './types.js';
export type { HttpResponse, HttpRequestOptions } from './http-client.js';
