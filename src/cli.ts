#!/usr/bin/env node
/**
 * CLI entry point for websift
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { loadConfig } from './config.js';
import { crawl } from './crawl/coordinator.js';
import type { CrawlEvent, CrawlOptions, DocumentFetcher, FailureEntry } from './crawl/types.js';
import { isConfigError } from './errors.js';
import type { ExtractedRecord } from './extract/types.js';
import { toCsv } from './export/csv.js';
import { serializeRecords, toJson, toJsonLines } from './export/json.js';
import { Fetcher } from './fetch/fetcher.js';
import { createFetchPolicy } from './rules/fetch-policy.js';
import { parseRuleShorthand } from './rules/selector-rule.js';
import { createTarget } from './rules/target.js';
import { SCRAPE_TYPES, type ScrapeType, type SelectorRule } from './rules/types.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? 'unknown';
  } catch {
    return 'unknown';
  }
}

export const OUTPUT_FORMATS = ['json', 'csv', 'jsonl'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface CliOptions {
  command: 'scrape' | 'search';
  /** Seed URLs (scrape) */
  urls: string[];
  /** Search keywords (search) */
  keywords: string[];
  engine?: string;
  scrapeType?: ScrapeType;
  fields: SelectorRule[];
  delay?: number;
  retries?: number;
  concurrency?: number;
  timeout?: number;
  depth?: number;
  follow?: string;
  limit?: number;
  results?: number;
  maxItems?: number;
  countKeywords?: string[];
  ignoreRobots: boolean;
  format: OutputFormat;
}

export type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

type IntFlagResult = { value: number; index: number } | { error: string };

function readIntFlag(args: string[], i: number, min: 0 | 1): IntFlagResult {
  const flag = args[i];
  if (i + 1 >= args.length) return { error: `${flag} requires a value` };
  const raw = args[i + 1];
  const v = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(v) || v < min) {
    return {
      error: `${flag} must be a ${min === 0 ? 'non-negative' : 'positive'} integer`,
    };
  }
  return { value: v, index: i + 1 };
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function isScrapeType(value: string): value is ScrapeType {
  return SCRAPE_TYPES.some((type) => type === value);
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function isCommand(value: string): value is CliOptions['command'] {
  return value === 'scrape' || value === 'search';
}

const INT_FLAGS = {
  '--delay': { key: 'delay', min: 0 },
  '--retries': { key: 'retries', min: 0 },
  '--concurrency': { key: 'concurrency', min: 1 },
  '--timeout': { key: 'timeout', min: 1 },
  '--depth': { key: 'depth', min: 0 },
  '--limit': { key: 'limit', min: 1 },
  '--results': { key: 'results', min: 1 },
  '--max-items': { key: 'maxItems', min: 1 },
} as const;

type IntFlag = keyof typeof INT_FLAGS;

function isIntFlag(arg: string): arg is IntFlag {
  return Object.hasOwn(INT_FLAGS, arg);
}

export function parseArgs(args: string[]): ParseResult {
  if (args.length === 0) return { kind: 'help' };

  const [command, ...rest] = args;
  if (command === '-h' || command === '--help') return { kind: 'help' };
  if (command === '-v' || command === '--version') return { kind: 'version' };
  if (!isCommand(command)) {
    return { kind: 'error', message: `Unknown command: ${command}` };
  }

  const positional: string[] = [];
  const warnings: string[] = [];
  const opts: CliOptions = {
    command,
    urls: [],
    keywords: [],
    fields: [],
    ignoreRobots: false,
    format: 'json',
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (isIntFlag(arg)) {
      const parsed = readIntFlag(rest, i, INT_FLAGS[arg].min);
      if ('error' in parsed) return { kind: 'error', message: parsed.error };
      opts[INT_FLAGS[arg].key] = parsed.value;
      i = parsed.index;
      continue;
    }

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      case '--type': {
        if (i + 1 >= rest.length) return { kind: 'error', message: '--type requires a value' };
        const value = rest[++i];
        if (!isScrapeType(value)) {
          return { kind: 'error', message: `--type must be one of: ${SCRAPE_TYPES.join(', ')}` };
        }
        opts.scrapeType = value;
        break;
      }
      case '--field': {
        if (i + 1 >= rest.length) return { kind: 'error', message: '--field requires a value' };
        try {
          opts.fields.push(parseRuleShorthand(rest[++i]));
        } catch (error) {
          if (!isConfigError(error)) throw error;
          return { kind: 'error', message: error.message };
        }
        break;
      }
      case '--engine':
        if (i + 1 >= rest.length) return { kind: 'error', message: '--engine requires a value' };
        opts.engine = rest[++i];
        break;
      case '--follow':
        if (i + 1 >= rest.length) return { kind: 'error', message: '--follow requires a value' };
        opts.follow = rest[++i];
        break;
      case '--keywords':
        if (i + 1 >= rest.length) return { kind: 'error', message: '--keywords requires a value' };
        opts.countKeywords = splitList(rest[++i]);
        break;
      case '--ignore-robots':
        opts.ignoreRobots = true;
        break;
      case '--format': {
        if (i + 1 >= rest.length) return { kind: 'error', message: '--format requires a value' };
        const value = rest[++i];
        if (!isOutputFormat(value)) {
          return { kind: 'error', message: `--format must be one of: ${OUTPUT_FORMATS.join(', ')}` };
        }
        opts.format = value;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (command === 'scrape') {
    if (positional.length === 0) {
      return { kind: 'error', message: 'Missing required <url> argument' };
    }
    const badUrl = positional.find((url) => !/^https?:\/\//i.test(url));
    if (badUrl) {
      return { kind: 'error', message: `URL must start with http:// or https://: ${badUrl}` };
    }
    opts.urls = positional;
  } else {
    opts.keywords = positional.flatMap(splitList);
    if (opts.keywords.length === 0) {
      return { kind: 'error', message: 'Missing required <keywords> argument' };
    }
    if (!opts.engine) {
      return { kind: 'error', message: 'search requires --engine <url with {query}>' };
    }
  }

  return { kind: 'ok', opts, warnings };
}

function printUsage(write: (text: string) => void): void {
  write(`Usage: websift scrape <url...> [options]
       websift search <keyword,...> --engine <url> [options]

Scrapes pages with CSS selector rules and prints the records.

Options:
  --type <type>        Scrape type: ${SCRAPE_TYPES.join(', ')} (default: generic)
  --field <spec>       Custom field, repeatable: name=css[|text|number|attr:<name>|url[:<name>]|multiple|required]
                       Custom fields replace the scrape type's defaults.
  --delay <ms>         Minimum spacing between requests to one host (env: WEBSIFT_DELAY_MS)
  --retries <n>        Retries for transient failures (env: WEBSIFT_MAX_RETRIES)
  --concurrency <n>    Pages processed at once (env: WEBSIFT_CONCURRENCY)
  --timeout <ms>       Per-request timeout (env: WEBSIFT_TIMEOUT_MS)
  --depth <n>          Follow links this many levels deep (default: 0, or 1 with --follow)
  --follow <css>       Selector for links to follow (default: a[href])
  --limit <n>          Maximum number of pages fetched
  --results <n>        Search results taken per keyword (default: 10)
  --max-items <n>      Maximum values kept per multiple field
  --keywords <a,b>     Count these keywords on every page
  --ignore-robots      Do not check robots.txt (env: WEBSIFT_RESPECT_ROBOTS=false)
  --format <fmt>       Output format: ${OUTPUT_FORMATS.join(', ')} (default: json)
  -v, --version        Show version number
  -h, --help           Show this help message

Search engine URLs take a {query} placeholder, e.g.
  websift search "rust,zig" --engine "https://html.duckduckgo.com/html/?q={query}" --type news

Disclaimer:
  Users are responsible for complying with website terms of service,
  robots.txt directives, and applicable laws.
`);
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Overrides the HTTP fetcher built from configuration */
  fetcher?: DocumentFetcher;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function describeFailure(failure: FailureEntry): string {
  const status = failure.statusCode !== undefined ? ` HTTP ${failure.statusCode}` : '';
  return `Failed: ${failure.url} (${failure.errorKind}${status}, ${failure.attempts} attempts): ${failure.message}\n`;
}

function buildCrawlOptions(opts: CliOptions, fetcher: DocumentFetcher, signal?: AbortSignal): CrawlOptions {
  const selectors = opts.fields.length > 0 ? opts.fields : undefined;
  const followDepth = opts.depth ?? (opts.follow ? 1 : 0);

  return {
    fetcher,
    signal,
    maxPages: opts.limit,
    maxItems: opts.maxItems,
    keywords: opts.countKeywords,
    ...(followDepth > 0 ? { follow: { maxDepth: followDepth, selector: opts.follow } } : {}),
    ...(opts.command === 'search' && opts.engine
      ? {
          search: {
            keywords: opts.keywords,
            searchUrl: opts.engine,
            scrapeType: opts.scrapeType,
            selectors,
            maxResults: opts.results,
          },
        }
      : {}),
  };
}

/**
 * Run a parsed command. Records go to stdout in the chosen format, failures
 * and the summary to stderr. Resolves with the process exit code.
 */
export async function runCommand(opts: CliOptions, io: CliIO = defaultIO): Promise<number> {
  const config = loadConfig(io.env);
  const policy = createFetchPolicy(
    { delayMs: opts.delay, maxRetries: opts.retries, maxConcurrency: opts.concurrency },
    config.policy
  );
  const fetcher =
    io.fetcher ??
    new Fetcher({
      timeoutMs: opts.timeout ?? config.timeoutMs,
      userAgent: config.userAgent,
      respectRobots: config.respectRobots && !opts.ignoreRobots,
    });

  const selectors = opts.fields.length > 0 ? opts.fields : undefined;
  const targets = opts.urls.map((url) =>
    createTarget({ url, scrapeType: opts.scrapeType, selectors })
  );

  const records: ExtractedRecord[] = [];
  let summary: Extract<CrawlEvent, { type: 'summary' }> | undefined;

  for await (const event of crawl(targets, policy, buildCrawlOptions(opts, fetcher, io.signal))) {
    switch (event.type) {
      case 'record':
        records.push(event.record);
        // JSON Lines streams as records arrive
        if (opts.format === 'jsonl') io.stdout(toJsonLines(serializeRecords([event.record])));
        break;
      case 'failure':
        io.stderr(describeFailure(event.failure));
        break;
      case 'search':
        io.stderr(`Search "${event.keyword}": ${event.targetsAdded} targets\n`);
        break;
      case 'summary':
        summary = event;
        break;
    }
  }

  if (opts.format === 'json') io.stdout(toJson(records));
  else if (opts.format === 'csv') io.stdout(toCsv(records));

  if (summary) {
    const { stats, status } = summary;
    io.stderr(
      `\nScrape ${status}: ${stats.targetsDone}/${stats.targetsQueued} pages, ${stats.targetsFailed} failed, ${stats.duplicatesSkipped} duplicates skipped, ${stats.durationMs}ms\n`
    );
  }

  if (summary?.status === 'stalled') return 1;
  return records.length === 0 && (summary?.stats.targetsFailed ?? 0) > 0 ? 1 : 0;
}

export async function main(argv: string[] = process.argv.slice(2), io: CliIO = defaultIO): Promise<number> {
  const result = parseArgs(argv);

  switch (result.kind) {
    case 'version':
      io.stdout(`websift ${getVersion()}\n`);
      return 0;
    case 'help':
      printUsage(io.stdout);
      return 0;
    case 'error':
      io.stderr(`Error: ${result.message}\n`);
      printUsage(io.stderr);
      return 1;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    io.stderr(`Warning: ${warning}\n`);
  }

  try {
    return await runCommand(opts, io);
  } catch (error) {
    if (isConfigError(error)) {
      io.stderr(`Error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  const controller = new AbortController();
  // First Ctrl-C cancels and still prints the partial result; the second exits
  process.once('SIGINT', () => {
    process.stderr.write('\nCancelling...\n');
    controller.abort();
    process.once('SIGINT', () => process.exit(130));
  });

  main(process.argv.slice(2), { ...defaultIO, signal: controller.signal })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
