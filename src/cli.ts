#!/usr/bin/env node
/**
 * CLI entry point for linkpath
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { crawlForPath } from './crawl/crawler.js';
import type { CrawlOptions } from './config.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export interface CliOptions extends CrawlOptions {
  start: string;
  target: string;
  json: boolean;
}

export type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

type IntFlag = { value: number } | { error: string };

/** Parse the positive integer value of `flag` at args[i + 1], capped at `max`. */
function parseIntFlag(args: string[], i: number, flag: string, max: number): IntFlag {
  if (i + 1 >= args.length) return { error: `${flag} requires a value` };
  const v = parseInt(args[i + 1], 10);
  if (isNaN(v) || v <= 0) return { error: `${flag} must be a positive integer` };
  if (v > max) return { error: `${flag} must not exceed ${max}` };
  return { value: v };
}

function isHttpUrl(value: string): boolean {
  return value.startsWith('http://') || value.startsWith('https://');
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const v = parseInt(raw, 10);
  return isNaN(v) || v <= 0 ? undefined : v;
}

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  const keywords: string[] = [];
  let json = false;
  let concurrency = envInt('LINKPATH_CONCURRENCY');
  let workers: number | undefined;
  let maxPages: number | undefined;
  let timeout: number | undefined;
  let linkPrefix: string | undefined;
  let exclude: string[] | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      case '--json':
        json = true;
        break;
      case '-c':
      case '--concurrency': {
        const r = parseIntFlag(args, i++, arg, 100);
        if ('error' in r) return { kind: 'error', message: r.error };
        concurrency = r.value;
        break;
      }
      case '-w':
      case '--workers': {
        const r = parseIntFlag(args, i++, arg, 200);
        if ('error' in r) return { kind: 'error', message: r.error };
        workers = r.value;
        break;
      }
      case '--limit': {
        const r = parseIntFlag(args, i++, arg, 1_000_000);
        if ('error' in r) return { kind: 'error', message: r.error };
        maxPages = r.value;
        break;
      }
      case '--timeout': {
        const r = parseIntFlag(args, i++, arg, 600_000);
        if ('error' in r) return { kind: 'error', message: r.error };
        timeout = r.value;
        break;
      }
      case '-k':
      case '--keyword':
        if (i + 1 >= args.length) return { kind: 'error', message: `${arg} requires a value` };
        if (args[++i].trim() === '') return { kind: 'error', message: `${arg} must not be empty` };
        keywords.push(args[i].trim());
        break;
      case '--keywords':
        if (i + 1 >= args.length) return { kind: 'error', message: '--keywords requires a value' };
        keywords.push(
          ...args[++i]
            .split(',')
            .map((s) => s.trim())
            .filter((s) => s.length > 0)
        );
        break;
      case '--prefix':
        if (i + 1 >= args.length) return { kind: 'error', message: '--prefix requires a value' };
        linkPrefix = args[++i];
        if (!linkPrefix.startsWith('/')) {
          return { kind: 'error', message: '--prefix must start with /' };
        }
        break;
      case '--exclude':
        if (i + 1 >= args.length) return { kind: 'error', message: '--exclude requires a value' };
        exclude = args[++i]
          .split(',')
          .map((s) => s.trim())
          .filter((s) => s.length > 0);
        break;
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length < 2) {
    return { kind: 'error', message: 'Missing required <start> and <target> arguments' };
  }
  if (positional.length > 2) {
    warnings.push(`Ignoring extra arguments: ${positional.slice(2).join(' ')}`);
  }

  const [start, target] = positional;
  if (!isHttpUrl(start) || !isHttpUrl(target)) {
    return { kind: 'error', message: 'Start and target URLs must start with http:// or https://' };
  }

  return {
    kind: 'ok',
    opts: {
      start,
      target,
      json,
      concurrency,
      workers,
      keywords,
      maxPages,
      timeout,
      linkPrefix,
      exclude,
      userAgent: process.env.LINKPATH_USER_AGENT || undefined,
    },
    warnings,
  };
}

function printUsage(): void {
  console.log(`Usage: linkpath <start-url> <target-url> [options]

Crawls from the start page, following article links in keyword order, until a page
links to the target. Prints the shortest path found, space-separated.

Options:
  -c, --concurrency <n>  Max simultaneous fetches (default: 25, env: LINKPATH_CONCURRENCY)
  -w, --workers <n>      Worker count (default: same as --concurrency)
  -k, --keyword <word>   Prioritize links mentioning <word>; repeatable, earlier wins
  --keywords <a,b,...>   Comma-separated keywords, appended in order
  --limit <n>            Stop after expanding <n> pages (default: unlimited)
  --timeout <ms>         Request timeout in milliseconds (default: 20000)
  --prefix <path>        Only follow links whose href starts with <path> (default: /wiki/)
  --exclude <globs>      Link path globs to skip (comma-separated)
  --json                 JSON output (path, outcome and crawl statistics)
  -v, --version          Show version number
  -h, --help             Show this help message

Logs go to stderr; set LINKPATH_LOG_LEVEL (or LOG_LEVEL) to trace, debug, info,
warn, error, fatal or silent.

The path found is the shortest among the links seen before the target turned up,
which is not necessarily the shortest path on the site.`);
}

export async function main(): Promise<void> {
  const result = parseArgs(process.argv.slice(2));

  switch (result.kind) {
    case 'version':
      console.log(`linkpath ${getVersion()}`);
      process.exit(0);
      break;
    case 'help':
      printUsage();
      process.exit(0);
      break;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      process.exit(1);
      break;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  const { start, target, json, ...crawlOptions } = opts;
  const search = await crawlForPath(start, target, crawlOptions);

  if (json) {
    const { graph: _graph, ...summary } = search;
    console.log(JSON.stringify(summary, null, 2));
  } else if (search.path.length > 0) {
    console.log(search.path.join(' '));
  } else if (search.outcome === 'start_not_fetchable') {
    console.error(`Error: could not fetch start page ${search.start}`);
  } else if (search.outcome === 'page_limit') {
    console.error(`No path found within ${search.pagesExpanded} pages`);
  } else {
    console.error(`No path found after ${search.pagesExpanded} pages`);
  }

  if (search.path.length === 0) process.exit(1);
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then(() => {
      // got's keep-alive sockets would otherwise hold the event loop open
      process.exit(0);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
