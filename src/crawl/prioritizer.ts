/**
 * Rank discovered links by keyword relevance
 */
import type { LinkAnchor, PrioritizedLink } from './types.js';

/**
 * Assign each link the index of the first keyword (case-insensitive) found in its
 * text or href, or `keywords.length` when none match. Output order follows input order;
 * sorting is the frontier's job.
 */
export function prioritizeLinks(
  links: readonly LinkAnchor[],
  keywords: readonly string[] = []
): PrioritizedLink[] {
  const lowered = keywords.map((keyword) => keyword.toLowerCase());

  return links.map((link) => {
    const text = link.text.toLowerCase();
    const href = link.href.toLowerCase();
    const index = lowered.findIndex((word) => text.includes(word) || href.includes(word));
    return { priority: index === -1 ? lowered.length : index, href: link.href };
  });
}
