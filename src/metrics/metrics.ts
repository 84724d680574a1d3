/**
 * Precision / recall scoring of crawl results against labeled data.
 */
import { CRAWL_STATUSES, type CrawlStatus } from '../crawl/types.js';
import { findColumn, normalizeDomain, parseCsv } from '../output/csv.js';

/** Manual validation verdicts for a crawled domain. */
export type ValidationLabel = 'correct' | 'wrong' | 'missed' | 'not_working';

export type Outcome =
  | 'true_positive'
  | 'false_positive'
  | 'false_negative'
  | 'true_negative'
  | 'not_working';

export interface OutcomeCounts {
  truePositives: number;
  falsePositives: number;
  falseNegatives: number;
  trueNegatives: number;
  notWorking: number;
}

export interface Metrics extends OutcomeCounts {
  total: number;
  precision: number;
  recall: number;
  f1: number;
}

export interface ResultRow {
  status: CrawlStatus;
  logoUrl: string | null;
}

export interface DomainOutcome {
  domain: string;
  outcome: Outcome;
  expected: string | null;
  actual: string | null;
}

export interface Evaluation {
  metrics: Metrics;
  outcomes: DomainOutcome[];
}

const LABEL_OUTCOMES: Record<ValidationLabel, Outcome> = {
  correct: 'true_positive',
  wrong: 'false_positive',
  missed: 'false_negative',
  not_working: 'not_working',
};

function ratio(numerator: number, denominator: number): number {
  return denominator > 0 ? numerator / denominator : 0;
}

function countOutcomes(outcomes: readonly Outcome[]): OutcomeCounts {
  const counts: OutcomeCounts = {
    truePositives: 0,
    falsePositives: 0,
    falseNegatives: 0,
    trueNegatives: 0,
    notWorking: 0,
  };
  for (const outcome of outcomes) {
    switch (outcome) {
      case 'true_positive':
        counts.truePositives++;
        break;
      case 'false_positive':
        counts.falsePositives++;
        break;
      case 'false_negative':
        counts.falseNegatives++;
        break;
      case 'true_negative':
        counts.trueNegatives++;
        break;
      case 'not_working':
        counts.notWorking++;
        break;
    }
  }
  return counts;
}

/**
 * Precision, recall and F1; each is 0 when its denominator is 0. Not-working
 * sites are counted but excluded from all three.
 */
export function metricsFromOutcomes(outcomes: readonly Outcome[]): Metrics {
  const counts = countOutcomes(outcomes);
  const precision = ratio(counts.truePositives, counts.truePositives + counts.falsePositives);
  const recall = ratio(counts.truePositives, counts.truePositives + counts.falseNegatives);
  const f1 = precision + recall > 0 ? (2 * precision * recall) / (precision + recall) : 0;

  return { ...counts, total: outcomes.length, precision, recall, f1 };
}

export function computeMetrics(labels: readonly ValidationLabel[]): Metrics {
  return metricsFromOutcomes(labels.map((label) => LABEL_OUTCOMES[label]));
}

/** Comparable form of a logo URL: no fragment, no trailing slash; data URIs as-is. */
export function normalizeLogoUrl(url: string): string {
  const trimmed = url.trim();
  if (/^data:/i.test(trimmed)) return trimmed;
  try {
    const parsed = new URL(trimmed);
    parsed.hash = '';
    return parsed.href.endsWith('/') && parsed.pathname !== '/'
      ? parsed.href.slice(0, -1)
      : parsed.href;
  } catch {
    return trimmed;
  }
}

/**
 * Score one labeled domain. `expected` null means the site has no logo;
 * `result` undefined means the domain is missing from the results.
 */
export function classifyOutcome(expected: string | null, result: ResultRow | undefined): Outcome {
  if (!result) return expected ? 'false_negative' : 'true_negative';
  if (result.status === 'unreachable') return 'not_working';

  const actual = result.logoUrl;
  if (expected && actual) {
    return normalizeLogoUrl(expected) === normalizeLogoUrl(actual)
      ? 'true_positive'
      : 'false_positive';
  }
  if (expected) return 'false_negative';
  return actual ? 'false_positive' : 'true_negative';
}

export function evaluate(
  results: ReadonlyMap<string, ResultRow>,
  truth: ReadonlyMap<string, string | null>
): Evaluation {
  const outcomes: DomainOutcome[] = [];
  for (const [domain, expected] of truth) {
    const result = results.get(domain);
    outcomes.push({
      domain,
      outcome: classifyOutcome(expected, result),
      expected,
      actual: result?.logoUrl ?? null,
    });
  }
  return { metrics: metricsFromOutcomes(outcomes.map((entry) => entry.outcome)), outcomes };
}

function requireColumn(headers: readonly string[], name: string, file: string): string {
  const column = findColumn(headers, name);
  if (column === undefined) {
    throw new Error(`${file} is missing the "${name}" column`);
  }
  return column;
}

function isCrawlStatus(value: string): value is CrawlStatus {
  return (CRAWL_STATUSES as readonly string[]).includes(value);
}

/** Results CSV (`domain,logo_url,favicon_url,status`) keyed by domain; the first row wins. */
export function parseResultsCsv(text: string): Map<string, ResultRow> {
  const { headers, rows } = parseCsv(text);
  const domainColumn = requireColumn(headers, 'domain', 'Results file');
  const logoColumn = requireColumn(headers, 'logo_url', 'Results file');
  const statusColumn = requireColumn(headers, 'status', 'Results file');

  const results = new Map<string, ResultRow>();
  for (const row of rows) {
    const domain = normalizeDomain(row[domainColumn] ?? '');
    const status = (row[statusColumn] ?? '').toLowerCase();
    if (!domain || results.has(domain) || !isCrawlStatus(status)) continue;

    const logoUrl = row[logoColumn] ?? '';
    results.set(domain, { status, logoUrl: logoUrl ? logoUrl : null });
  }
  return results;
}

/** Ground truth CSV (`domain,logo_url`); an empty URL or `none` means the site has no logo. */
export function parseTruthCsv(text: string): Map<string, string | null> {
  const { headers, rows } = parseCsv(text);
  const domainColumn = requireColumn(headers, 'domain', 'Truth file');
  const logoColumn = requireColumn(headers, 'logo_url', 'Truth file');

  const truth = new Map<string, string | null>();
  for (const row of rows) {
    const domain = normalizeDomain(row[domainColumn] ?? '');
    if (!domain || truth.has(domain)) continue;

    const logoUrl = row[logoColumn] ?? '';
    truth.set(domain, logoUrl && logoUrl.toLowerCase() !== 'none' ? logoUrl : null);
  }
  return truth;
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

export function formatMetricsReport(metrics: Metrics): string {
  return [
    `Total cases: ${metrics.total}`,
    `True positives: ${metrics.truePositives}`,
    `False positives: ${metrics.falsePositives}`,
    `False negatives: ${metrics.falseNegatives}`,
    `True negatives: ${metrics.trueNegatives}`,
    `Not working sites: ${metrics.notWorking}`,
    `Precision: ${formatPercent(metrics.precision)}`,
    `Recall: ${formatPercent(metrics.recall)}`,
    `F1 Score: ${formatPercent(metrics.f1)}`,
  ].join('\n');
}
