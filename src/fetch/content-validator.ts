/**
 * Decide whether an HTTP response is a document the crawler can expand
 */
import type { ValidationResult } from './types.js';

const DOCUMENT_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * Validate the status and declared content type of a response.
 * Checks 2 signals in order, bailing early on failure.
 */
export function validateDocument(
  statusCode: number,
  contentType?: string | string[]
): ValidationResult {
  // Check 1: HTTP status (200-299)
  if (statusCode < 200 || statusCode >= 300) {
    return {
      valid: false,
      error: 'http_status_error',
      errorDetails: { statusCode },
    };
  }

  // Check 2: Content-Type (HTML only). HTTP headers can be arrays.
  const ctValue = (Array.isArray(contentType) ? contentType[0] : contentType) ?? '';
  const mediaType = ctValue.split(';')[0].trim().toLowerCase();
  if (!DOCUMENT_CONTENT_TYPES.includes(mediaType)) {
    return {
      valid: false,
      error: 'wrong_content_type',
      errorDetails: { contentType: ctValue },
    };
  }

  return { valid: true };
}
