import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../fetch/http-client.js', () => ({
  httpRequest: vi.fn(),
}));

import { fetchPage, createPageFetcher } from '../fetch/page-fetcher.js';
import { httpRequest } from '../fetch/http-client.js';

const URL_A = 'https://wiki.test/wiki/A';

describe('fetch/page-fetcher', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns the HTML of a document response', async () => {
    vi.mocked(httpRequest).mockResolvedValue({
      success: true,
      statusCode: 200,
      url: URL_A,
      html: '<html><body>A</body></html>',
      headers: { 'content-type': 'text/html; charset=UTF-8' },
    });

    const result = await fetchPage(URL_A);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.url).toBe(URL_A);
      expect(result.html).toBe('<html><body>A</body></html>');
      expect(result.contentType).toBe('text/html; charset=UTF-8');
      expect(result.statusCode).toBe(200);
    }
  });

  it('reports non-HTML responses as wrong_content_type', async () => {
    vi.mocked(httpRequest).mockResolvedValue({
      success: true,
      statusCode: 200,
      url: URL_A,
      html: '%PDF-1.7',
      headers: { 'content-type': 'application/pdf' },
    });

    const result = await fetchPage(URL_A);

    expect(result).toMatchObject({
      success: false,
      error: 'wrong_content_type',
      errorDetails: { contentType: 'application/pdf' },
    });
  });

  it('reports error statuses as http_status_error', async () => {
    vi.mocked(httpRequest).mockResolvedValue({
      success: false,
      statusCode: 404,
      url: URL_A,
      html: '<html>Not found</html>',
      headers: { 'content-type': 'text/html' },
    });

    const result = await fetchPage(URL_A);

    expect(result).toMatchObject({
      success: false,
      error: 'http_status_error',
      errorDetails: { statusCode: 404 },
    });
  });

  it('reports transport failures as network_error', async () => {
    vi.mocked(httpRequest).mockResolvedValue({
      success: false,
      statusCode: 0,
      url: URL_A,
      headers: {},
      error: 'Error: ECONNRESET',
    });

    const result = await fetchPage(URL_A);

    expect(result).toMatchObject({
      success: false,
      error: 'network_error',
      errorDetails: { statusCode: 0, message: 'Error: ECONNRESET' },
    });
  });

  it('passes response_too_large through', async () => {
    vi.mocked(httpRequest).mockResolvedValue({
      success: false,
      statusCode: 200,
      url: URL_A,
      headers: {},
      error: 'response_too_large',
    });

    const result = await fetchPage(URL_A);

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error).toBe('response_too_large');
  });

  it('createPageFetcher forwards its options to every request', async () => {
    vi.mocked(httpRequest).mockResolvedValue({
      success: true,
      statusCode: 200,
      url: URL_A,
      html: '',
      headers: { 'content-type': 'text/html' },
    });

    const fetcher = createPageFetcher({ timeout: 1000, userAgent: 'test-agent' });
    await fetcher(URL_A);

    expect(httpRequest).toHaveBeenCalledWith(URL_A, { timeout: 1000, userAgent: 'test-agent' });
  });
});
