// CSV reading and writing for domain lists, crawl results and ground truth

import type { CrawlResult } from '../crawl/types.js';

export const RESULT_HEADER = ['domain', 'logo_url', 'favicon_url', 'status'] as const;

export interface CsvParseResult {
  headers: string[];
  rows: Record<string, string>[];
  errors: string[];
}

/** Quote a field when it holds a comma, a quote or a line break. */
export function escapeCsvField(value: string | null | undefined): string {
  const text = value ?? '';
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvRow(fields: readonly (string | null | undefined)[]): string {
  return fields.map(escapeCsvField).join(',');
}

export function formatResultRow(result: CrawlResult): string {
  return formatCsvRow([result.domain, result.logoUrl, result.faviconUrl, result.status]);
}

export function formatResultJson(result: CrawlResult): string {
  return JSON.stringify(result);
}

export function parseCsvLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    const nextChar = line[i + 1];

    if (inQuotes) {
      if (char === '"' && nextChar === '"') {
        current += '"';
        i++; // Skip escaped quote
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      values.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  values.push(current.trim());
  return values;
}

function splitLines(text: string): string[] {
  return text.replace(/^\uFEFF/, '').split(/\r?\n/);
}

/**
 * Parse CSV text with a header row. Blank lines are skipped; rows whose
 * column count differs from the header are reported in `errors` and skipped.
 */
export function parseCsv(text: string): CsvParseResult {
  const lines = splitLines(text);
  const headerIndex = lines.findIndex((line) => line.trim() !== '');
  if (headerIndex === -1) {
    return { headers: [], rows: [], errors: ['Empty CSV file'] };
  }

  const headers = parseCsvLine(lines[headerIndex] ?? '');
  const rows: Record<string, string>[] = [];
  const errors: string[] = [];

  for (let i = headerIndex + 1; i < lines.length; i++) {
    const line = lines[i]?.trim();
    if (!line) continue;

    const values = parseCsvLine(line);
    if (values.length !== headers.length) {
      errors.push(`Row ${i + 1}: Expected ${headers.length} columns, got ${values.length}`);
      continue;
    }

    const row: Record<string, string> = {};
    headers.forEach((header, index) => {
      row[header] = values[index] ?? '';
    });
    rows.push(row);
  }

  return { headers, rows, errors };
}

/** Header of `headers` matching `name`, ignoring case. */
export function findColumn(headers: readonly string[], name: string): string | undefined {
  const wanted = name.trim().toLowerCase();
  return headers.find((header) => header.toLowerCase() === wanted);
}

/**
 * Bare hostname from user input: `https://www.Example.com:443/path` →
 * `www.example.com`. Returns null for blank input.
 */
export function normalizeDomain(raw: string): string | null {
  const domain = raw
    .trim()
    .toLowerCase()
    .replace(/^[a-z][a-z0-9+.-]*:\/\//, '')
    .replace(/[/?#].*$/, '')
    .replace(/^[^@]*@/, '')
    .replace(/:\d*$/, '')
    .replace(/\.+$/, '');
  return domain ? domain : null;
}

/**
 * Domains from an input file: one per line, or the named column of a CSV
 * with a header row. Duplicates are kept so every input record gets a row.
 */
export function readDomains(text: string, column?: string): string[] {
  if (column === undefined) {
    return splitLines(text).flatMap((line) => normalizeDomain(line) ?? []);
  }

  const { headers, rows } = parseCsv(text);
  const header = findColumn(headers, column);
  if (header === undefined) {
    throw new Error(`Column "${column}" not found in header: ${headers.join(', ')}`);
  }
  return rows.flatMap((row) => normalizeDomain(row[header] ?? '') ?? []);
}
