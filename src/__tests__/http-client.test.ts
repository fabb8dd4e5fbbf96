import { describe, it, expect, vi, beforeEach } from 'vitest';

const mocks = vi.hoisted(() => {
  const get = vi.fn();
  return { get, extend: vi.fn(() => ({ get })) };
});

vi.mock('../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('got', () => ({
  default: { extend: mocks.extend },
}));

import { httpRequest } from '../fetch/http-client.js';

const URL_A = 'https://wiki.test/wiki/A';

function gotResponse(overrides: Record<string, unknown> = {}) {
  return {
    statusCode: 200,
    url: URL_A,
    body: '<html><body>A</body></html>',
    headers: { 'content-type': 'text/html' },
    ...overrides,
  };
}

describe('fetch/http-client', () => {
  beforeEach(() => {
    mocks.get.mockReset();
  });

  it('builds a client that follows redirects without retries or thrown HTTP errors', () => {
    expect(mocks.extend).toHaveBeenCalledWith(
      expect.objectContaining({
        followRedirect: true,
        throwHttpErrors: false,
        retry: { limit: 0 },
      })
    );
  });

  it('returns the body, status and flattened headers', async () => {
    mocks.get.mockResolvedValue(
      gotResponse({
        headers: { 'content-type': 'text/html', 'set-cookie': ['a=1', 'b=2'] },
      })
    );

    const response = await httpRequest(URL_A);

    expect(response).toEqual({
      success: true,
      statusCode: 200,
      url: URL_A,
      html: '<html><body>A</body></html>',
      headers: { 'content-type': 'text/html', 'set-cookie': 'a=1, b=2' },
    });
  });

  it('sends the user agent and timeout', async () => {
    mocks.get.mockResolvedValue(gotResponse());

    await httpRequest(URL_A, { userAgent: 'test-agent', timeout: 500 });

    expect(mocks.get).toHaveBeenCalledWith(URL_A, {
      headers: { 'user-agent': 'test-agent' },
      timeout: { request: 500 },
      responseType: 'text',
    });
  });

  it('uses a 20s timeout by default', async () => {
    mocks.get.mockResolvedValue(gotResponse());

    await httpRequest(URL_A);

    expect(mocks.get).toHaveBeenCalledWith(URL_A, {
      headers: {},
      timeout: { request: 20000 },
      responseType: 'text',
    });
  });

  it('marks error statuses as unsuccessful but keeps the body', async () => {
    mocks.get.mockResolvedValue(gotResponse({ statusCode: 404, body: 'missing' }));

    const response = await httpRequest(URL_A);

    expect(response.success).toBe(false);
    expect(response.statusCode).toBe(404);
    expect(response.html).toBe('missing');
  });

  it('refuses responses whose Content-Length exceeds the limit', async () => {
    mocks.get.mockResolvedValue(
      gotResponse({
        headers: { 'content-type': 'text/html', 'content-length': String(11 * 1024 * 1024) },
      })
    );

    const response = await httpRequest(URL_A);

    expect(response).toEqual({
      success: false,
      statusCode: 200,
      url: URL_A,
      headers: {},
      error: 'response_too_large',
    });
  });

  it('refuses oversized bodies without a Content-Length', async () => {
    mocks.get.mockResolvedValue(gotResponse({ body: 'x'.repeat(10 * 1024 * 1024 + 1) }));

    const response = await httpRequest(URL_A);

    expect(response.success).toBe(false);
    expect(response.error).toBe('response_too_large');
  });

  it('returns transport errors instead of throwing', async () => {
    mocks.get.mockRejectedValue(new Error('ECONNREFUSED'));

    const response = await httpRequest(URL_A);

    expect(response).toEqual({
      success: false,
      statusCode: 0,
      url: URL_A,
      headers: {},
      error: 'Error: ECONNREFUSED',
    });
  });
});
