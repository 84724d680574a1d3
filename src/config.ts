/**
 * Crawler configuration: defaults, then environment, then explicit overrides
 * (CLI flags), validated as a whole with zod.
 */
import { z } from 'zod';
import { readFileSync } from 'fs';
import { DEFAULT_IDENTITIES } from './fetch/identity-pool.js';

// --- Zod validation schema ---

export const IdentitySchema = z.object({
  name: z.string().min(1),
  userAgent: z.string().min(1),
  preset: z.string().min(1),
});

export const CrawlerConfigSchema = z.object({
  timeoutMs: z.number().int().positive(),
  dnsTimeoutMs: z.number().int().positive(),
  parseBudgetMs: z.number().int().positive(),
  maxRedirects: z.number().int().min(0).max(10),
  concurrency: z.number().int().min(1).max(50),
  preserveOrder: z.boolean(),
  includeFavicon: z.boolean(),
  probeAboutPages: z.boolean(),
  proxy: z.string().url().optional(),
  identities: z.array(IdentitySchema).min(2),
});

export type CrawlerConfig = z.infer<typeof CrawlerConfigSchema>;

export const DEFAULT_CONFIG: CrawlerConfig = {
  timeoutMs: 10000,
  dnsTimeoutMs: 5000,
  parseBudgetMs: 2000,
  maxRedirects: 5,
  concurrency: 1,
  preserveOrder: true,
  includeFavicon: true,
  probeAboutPages: false,
  identities: [...DEFAULT_IDENTITIES],
};

type Env = Record<string, string | undefined>;

function envValue(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/** Numeric env value; unparseable input stays NaN so validation reports it. */
function envNumber(env: Env, name: string): number | undefined {
  const value = envValue(env, name);
  return value === undefined ? undefined : Number(value);
}

/** Identity list from a JSON file holding an array of `{ name, userAgent, preset }`. */
export function readIdentitiesFile(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (e) {
    throw new Error(
      `Cannot read identities file ${path}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
}

function withoutUndefined(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function configFromEnv(env: Env): Record<string, unknown> {
  const identitiesPath = envValue(env, 'LOGO_CRAWLER_IDENTITIES');
  return withoutUndefined({
    timeoutMs: envNumber(env, 'LOGO_CRAWLER_TIMEOUT'),
    concurrency: envNumber(env, 'LOGO_CRAWLER_CONCURRENCY'),
    maxRedirects: envNumber(env, 'LOGO_CRAWLER_MAX_REDIRECTS'),
    proxy:
      envValue(env, 'LOGO_CRAWLER_PROXY') ??
      envValue(env, 'HTTPS_PROXY') ??
      envValue(env, 'HTTP_PROXY'),
    identities: identitiesPath ? readIdentitiesFile(identitiesPath) : undefined,
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  ${field}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Build the effective configuration. Throws one error listing every invalid
 * field.
 */
export function loadConfig(
  overrides: Partial<CrawlerConfig> = {},
  env: Env = process.env
): CrawlerConfig {
  const result = CrawlerConfigSchema.safeParse({
    ...DEFAULT_CONFIG,
    ...configFromEnv(env),
    ...withoutUndefined(overrides),
  });

  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatIssues(result.error)}`);
  }
  return result.data;
}
