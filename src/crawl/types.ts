/**
 * Types for the crawl module
 */
import type { FetchError, FetchPage } from '../fetch/types.js';
import type { LinkGraph } from './link-graph.js';

/** An outbound anchor as found on a page: raw href plus visible text. */
export interface LinkAnchor {
  href: string;
  text: string;
}

/** Link-extractor collaborator. */
export type ExtractLinks = (html: string) => LinkAnchor[];

export interface PrioritizedLink {
  priority: number;
  href: string;
}

export interface FrontierEntry {
  priority: number;
  node: string;
}

export type ExpansionOutcome =
  | { status: 'expanded'; links: number; targetFound: boolean }
  | { status: 'not_fetchable'; error: FetchError | 'fetch_threw' }
  | { status: 'cancelled' };

export type PathOutcome = 'found' | 'unreachable' | 'start_not_fetchable' | 'page_limit';

export interface Collaborators {
  fetchPage?: FetchPage;
  extractLinks?: ExtractLinks;
}

export interface PathSearchResult {
  /** Start first, target last; empty when no path was found. */
  path: string[];
  outcome: PathOutcome;
  start: string;
  target: string;
  pagesExpanded: number;
  pagesFailed: number;
  edgeCount: number;
  durationMs: number;
  /** The graph as recorded when crawling stopped. */
  graph: LinkGraph;
}
