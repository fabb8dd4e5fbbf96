import { describe, it, expect } from 'vitest';
import { resolveCrawlOptions, DEFAULT_USER_AGENT } from '../config.js';

describe('resolveCrawlOptions', () => {
  it('fills in defaults', () => {
    expect(resolveCrawlOptions()).toEqual({
      concurrency: 25,
      workers: 25,
      keywords: [],
      timeout: 20000,
      userAgent: DEFAULT_USER_AGENT,
      linkPrefix: '/wiki/',
      exclude: [],
    });
  });

  it('defaults workers to the concurrency', () => {
    const options = resolveCrawlOptions({ concurrency: 4 });
    expect(options.workers).toBe(4);
  });

  it('keeps an explicit worker count', () => {
    const options = resolveCrawlOptions({ concurrency: 4, workers: 12 });
    expect(options.concurrency).toBe(4);
    expect(options.workers).toBe(12);
  });

  it('treats undefined fields as absent', () => {
    const options = resolveCrawlOptions({ concurrency: undefined, keywords: undefined });
    expect(options.concurrency).toBe(25);
    expect(options.keywords).toEqual([]);
  });

  it('rejects a zero concurrency', () => {
    expect(() => resolveCrawlOptions({ concurrency: 0 })).toThrow(/Invalid crawl options:\nconcurrency:/);
  });

  it('rejects fractional page limits', () => {
    expect(() => resolveCrawlOptions({ maxPages: 2.5 })).toThrow(/maxPages/);
  });

  it('rejects empty keywords', () => {
    expect(() => resolveCrawlOptions({ keywords: ['physics', ''] })).toThrow(/keywords\.1/);
  });

  it('rejects a link prefix that is not a path', () => {
    expect(() => resolveCrawlOptions({ linkPrefix: 'wiki/' })).toThrow(/linkPrefix/);
  });
});
