#!/usr/bin/env node
/**
 * CLI entry point for logo-crawler
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { loadConfig, type CrawlerConfig } from './config.js';
import { crawlDomains, emptyStatusCounts, formatSummary } from './crawl/crawler.js';
import type { CrawlContext } from './crawl/types.js';
import { SessionPool } from './fetch/http-client.js';
import { IdentityPool } from './fetch/identity-pool.js';
import { logger } from './logger.js';
import {
  evaluate,
  formatMetricsReport,
  parseResultsCsv,
  parseTruthCsv,
} from './metrics/metrics.js';
import { RESULT_HEADER, formatResultJson, formatResultRow, readDomains } from './output/csv.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    return typeof pkg === 'object' && pkg !== null && 'version' in pkg
      ? String(pkg.version)
      : 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export interface CliOptions {
  file?: string;
  column?: string;
  json: boolean;
  quiet: boolean;
  concurrency?: number;
  timeout?: number;
  maxRedirects?: number;
  proxy?: string;
  noFavicon: boolean;
  probeAbout: boolean;
  unordered: boolean;
}

type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

type IntegerFlagResult = { value: number; index: number } | { error: string };

/** Parse the integer value following a flag at position i. */
function parseIntegerFlag(
  args: string[],
  i: number,
  min: number,
  max: number
): IntegerFlagResult {
  const flag = args[i];
  if (i + 1 >= args.length) return { error: `${flag} requires a value` };
  const raw = args[i + 1];
  const v = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (isNaN(v) || v < min) {
    return {
      error:
        min > 0
          ? `${flag} must be a positive integer`
          : `${flag} must be a non-negative integer`,
    };
  }
  if (v > max) return { error: `${flag} must not exceed ${max}` };
  return { value: v, index: i + 1 };
}

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  const opts: CliOptions = {
    json: false,
    quiet: false,
    noFavicon: false,
    probeAbout: false,
    unordered: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--json':
        opts.json = true;
        break;
      case '-q':
      case '--quiet':
        opts.quiet = true;
        break;
      case '--no-favicon':
        opts.noFavicon = true;
        break;
      case '--probe-about':
        opts.probeAbout = true;
        break;
      case '--unordered':
        opts.unordered = true;
        break;
      case '--column':
        if (i + 1 >= args.length) return { kind: 'error', message: '--column requires a value' };
        opts.column = args[++i];
        break;
      case '--proxy':
        if (i + 1 >= args.length) return { kind: 'error', message: '--proxy requires a value' };
        opts.proxy = args[++i];
        break;
      case '--concurrency': {
        const parsed = parseIntegerFlag(args, i, 1, 50);
        if ('error' in parsed) return { kind: 'error', message: parsed.error };
        opts.concurrency = parsed.value;
        i = parsed.index;
        break;
      }
      case '--timeout': {
        const parsed = parseIntegerFlag(args, i, 1, 600_000);
        if ('error' in parsed) return { kind: 'error', message: parsed.error };
        opts.timeout = parsed.value;
        i = parsed.index;
        break;
      }
      case '--max-redirects': {
        const parsed = parseIntegerFlag(args, i, 0, 10);
        if ('error' in parsed) return { kind: 'error', message: parsed.error };
        opts.maxRedirects = parsed.value;
        i = parsed.index;
        break;
      }
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      default:
        if (arg.startsWith('-') && arg !== '-') {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  if (positional.length > 1) {
    warnings.push(`Ignoring extra arguments: ${positional.slice(1).join(' ')}`);
  }
  const file = positional[0];
  if (file !== undefined && file !== '-') opts.file = file;

  return { kind: 'ok', opts, warnings };
}

export interface EvaluateCliOptions {
  resultsFile: string;
  truthFile: string;
  json: boolean;
}

type EvaluateParseResult =
  | { kind: 'ok'; opts: EvaluateCliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

export function parseEvaluateArgs(args: string[]): EvaluateParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  let json = false;

  for (const arg of args) {
    switch (arg) {
      case '--json':
        json = true;
        break;
      case '-h':
      case '--help':
        return { kind: 'help' };
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  const [resultsFile, truthFile] = positional;
  if (resultsFile === undefined || truthFile === undefined) {
    return { kind: 'error', message: 'evaluate requires <results.csv> and <truth.csv>' };
  }

  return { kind: 'ok', opts: { resultsFile, truthFile, json }, warnings };
}

/** Map CLI flags onto configuration overrides; unset flags leave env/defaults in place. */
export function configOverrides(opts: CliOptions): Partial<CrawlerConfig> {
  return {
    timeoutMs: opts.timeout,
    concurrency: opts.concurrency,
    maxRedirects: opts.maxRedirects,
    proxy: opts.proxy,
    includeFavicon: opts.noFavicon ? false : undefined,
    probeAboutPages: opts.probeAbout ? true : undefined,
    preserveOrder: opts.unordered ? false : undefined,
  };
}

function printUsage(): void {
  console.log(`Usage: logo-crawler [file] [options]
       logo-crawler evaluate <results.csv> <truth.csv> [--json]

Reads domains (one per line) from [file] or stdin and writes
domain,logo_url,favicon_url,status rows to stdout.

Options:
  --column <name>       Read domains from this column of a CSV file with a header row
  --concurrency <n>     Domains crawled in parallel, 1-50 (default: 1, env: LOGO_CRAWLER_CONCURRENCY)
  --timeout <ms>        Per-attempt request timeout (default: 10000, env: LOGO_CRAWLER_TIMEOUT)
  --max-redirects <n>   Redirect hops followed, 0-10 (default: 5, env: LOGO_CRAWLER_MAX_REDIRECTS)
  --proxy <url>         HTTP/SOCKS proxy URL (env: LOGO_CRAWLER_PROXY, HTTPS_PROXY, HTTP_PROXY)
  --no-favicon          Skip favicon lookup
  --probe-about         Also try about.<domain> and <domain>/about when no logo is found
  --unordered           Emit rows as domains finish instead of in input order
  --json                JSON lines output instead of CSV
  -q, --quiet           No summary on stderr
  -v, --version         Show version number
  -h, --help            Show this help message

Evaluate:
  Scores a results CSV against ground truth (domain,logo_url; empty or "none"
  means no logo) and prints precision, recall and F1.

Environment:
  LOG_LEVEL                 trace, debug, info, warn, error, fatal or silent (default: info)
  LOGO_CRAWLER_IDENTITIES   JSON file with [{ name, userAgent, preset }, ...]`);
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function runEvaluate(args: string[]): void {
  const result = parseEvaluateArgs(args);

  if (result.kind === 'help') {
    printUsage();
    process.exit(0);
  }
  if (result.kind === 'error') {
    console.error(`Error: ${result.message}`);
    printUsage();
    process.exit(1);
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  let evaluation: ReturnType<typeof evaluate>;
  try {
    const results = parseResultsCsv(readFileSync(opts.resultsFile, 'utf-8'));
    const truth = parseTruthCsv(readFileSync(opts.truthFile, 'utf-8'));
    evaluation = evaluate(results, truth);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }

  if (opts.json) {
    console.log(JSON.stringify(evaluation, null, 2));
    return;
  }
  console.log(formatMetricsReport(evaluation.metrics));
}

export async function main(): Promise<void> {
  // Check for 'evaluate' subcommand
  const rawArgs = process.argv.slice(2);
  if (rawArgs[0] === 'evaluate') {
    runEvaluate(rawArgs.slice(1));
    return;
  }

  const result = parseArgs(rawArgs);

  switch (result.kind) {
    case 'version':
      console.log(`logo-crawler ${getVersion()}`);
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

  if (opts.file === undefined && process.stdin.isTTY) {
    console.error('Error: No input. Pass a file or pipe domains on stdin.');
    printUsage();
    process.exit(1);
  }

  let config: CrawlerConfig;
  let domains: string[];
  try {
    config = loadConfig(configOverrides(opts));
    const input = opts.file === undefined ? await readStdin() : readFileSync(opts.file, 'utf-8');
    domains = readDomains(input, opts.column);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exit(1);
  }

  const pool = new SessionPool({ proxy: config.proxy });
  const ctx: CrawlContext = {
    pool,
    identities: new IdentityPool(config.identities),
    timeoutMs: config.timeoutMs,
    dnsTimeoutMs: config.dnsTimeoutMs,
    maxRedirects: config.maxRedirects,
    parseBudgetMs: config.parseBudgetMs,
    includeFavicon: config.includeFavicon,
    probeAboutPages: config.probeAboutPages,
  };

  logger.info(
    { domains: domains.length, concurrency: config.concurrency, proxy: Boolean(config.proxy) },
    'Crawl started'
  );

  const startTime = Date.now();
  const counts = emptyStatusCounts();
  let total = 0;

  if (!opts.json) console.log(RESULT_HEADER.join(','));

  try {
    for await (const row of crawlDomains(domains, ctx, {
      concurrency: config.concurrency,
      preserveOrder: config.preserveOrder,
    })) {
      console.log(opts.json ? formatResultJson(row) : formatResultRow(row));
      counts[row.status]++;
      total++;
    }
  } finally {
    pool.closeAll();
  }

  if (!opts.quiet) {
    console.error(formatSummary({ total, counts, durationMs: Date.now() - startTime }));
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then(() => {
      // httpcloak's native library holds handles that keep the event loop alive
      process.exit(0);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
