/**
 * Extract article links (href + visible text) from HTML
 */
import { parseHTML } from 'linkedom';
import picomatch from 'picomatch';
import { DEFAULT_LINK_PREFIX } from '../config.js';
import type { ExtractLinks, LinkAnchor } from './types.js';

export interface LinkExtractorOptions {
  /** An href must start with this to be surfaced. */
  linkPrefix?: string;
  /** Globs on the href path (query and fragment removed); matches are dropped. */
  exclude?: string[];
}

function hrefPath(href: string): string {
  const end = href.search(/[?#]/);
  return end === -1 ? href : href.slice(0, end);
}

/**
 * Return the in-scope `<a href>` anchors of a page in document order.
 * Hrefs are returned as written (usually site-relative); duplicates are kept.
 */
export function extractArticleLinks(html: string, options: LinkExtractorOptions = {}): LinkAnchor[] {
  const prefix = options.linkPrefix ?? DEFAULT_LINK_PREFIX;
  const excludeMatcher =
    options.exclude && options.exclude.length > 0
      ? picomatch(options.exclude, { dot: true })
      : null;

  const { document } = parseHTML(html);
  const links: LinkAnchor[] = [];

  for (const anchor of document.querySelectorAll('a[href]')) {
    const href = anchor.getAttribute('href');
    if (!href || !href.startsWith(prefix)) continue;
    if (excludeMatcher && excludeMatcher(hrefPath(href))) continue;

    links.push({ href, text: (anchor.textContent ?? '').trim() });
  }

  return links;
}

/** Bind extractor options into the collaborator the crawler calls. */
export function createLinkExtractor(options: LinkExtractorOptions = {}): ExtractLinks {
  return (html: string) => extractArticleLinks(html, options);
}
