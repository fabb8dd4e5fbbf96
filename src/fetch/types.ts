/**
 * Shared types for the fetch module
 */

export type ValidationError = 'http_status_error' | 'wrong_content_type';

export type FetchError = ValidationError | 'network_error' | 'response_too_large';

export interface ValidationResult {
  valid: boolean;
  error?: ValidationError;
  errorDetails?: {
    statusCode?: number;
    contentType?: string;
  };
}

export interface FetchSuccess {
  success: true;
  url: string;
  latencyMs: number;
  statusCode: number;
  contentType: string;
  html: string;
}

export interface FetchFailure {
  success: false;
  url: string;
  latencyMs: number;
  error: FetchError;
  errorDetails?: {
    statusCode?: number;
    contentType?: string;
    message?: string;
  };
}

/** Either a document body tagged with its content type, or a "not fetchable" result. */
export type PageFetchResult = FetchSuccess | FetchFailure;

/** Page-fetcher collaborator: never rejects for ordinary fetch failures. */
export type FetchPage = (url: string) => Promise<PageFetchResult>;

export interface FetchOptions {
  timeout?: number;
  userAgent?: string;
}
