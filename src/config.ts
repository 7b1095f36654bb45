import 'dotenv/config';
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { SOURCE_IDS, sourceForUrl, type ListingTarget, type SourceId } from './sources/index.js';
import { parseCityRegion } from './utils/address.js';
import type { DelayBounds } from './utils/sleep.js';

export const CFG = {
  sources: process.env.SOURCES ?? SOURCE_IDS.join(','),
  maxPages: Number(process.env.MAX_PAGES ?? '3'),
  maxRecords: Number(process.env.MAX_RECORDS ?? '200'),
  followManagement: (process.env.FOLLOW_MGMT ?? 'true').toLowerCase() === 'true',
  delayMin: Number(process.env.DELAY_MIN ?? '0.6'),
  delayMax: Number(process.env.DELAY_MAX ?? '1.5'),
  referer: process.env.REFERER ?? '',
  timeoutMs: Number(process.env.REQUEST_TIMEOUT_MS ?? '20000'),
  outBasename: process.env.OUT_BASENAME ?? '',
  outreachSender: process.env.OUTREACH_SENDER ?? '',
  google: {
    enabled: (process.env.GOOGLE_SHEETS_ENABLED ?? 'false').toLowerCase() === 'true',
    sheetId: process.env.GOOGLE_SHEETS_ID ?? '',
    tab: process.env.GOOGLE_SHEETS_TAB ?? 'Leads',
  },
};

export type ScanTarget = ListingTarget | { kind: 'url-list'; urls: string[] };

export type ScanConfig = Readonly<{
  target: Readonly<ScanTarget>;
  sources: readonly SourceId[];
  maxPages: number;
  maxRecords: number;
  followManagement: boolean;
  delay: Readonly<DelayBounds>;
  referer?: string;
  timeoutMs: number;
}>;

/** Raw values from the CLI or environment; anything omitted falls back to CFG. */
export type ScanInput = {
  target?: string;
  city?: string;
  state?: string;
  url?: string;
  urls?: string[];
  sources?: string | string[];
  pages?: number | string;
  maxRecords?: number | string;
  follow?: boolean;
  delayMin?: number | string;
  delayMax?: number | string;
  referer?: string;
  timeoutMs?: number | string;
};

const OptionsSchema = z.object({
  sources: z.array(z.enum(SOURCE_IDS)).min(1, 'select at least one source'),
  maxPages: z.coerce.number().int().min(1).max(50),
  maxRecords: z.coerce.number().int().min(1).max(2000),
  followManagement: z.boolean(),
  delay: z
    .object({
      minSeconds: z.coerce.number().min(0),
      maxSeconds: z.coerce.number().min(0),
    })
    .refine(d => d.minSeconds <= d.maxSeconds, {
      message: 'minimum delay must not exceed the maximum delay',
      path: ['minSeconds'],
    }),
  referer: z.string().trim().optional(),
  timeoutMs: z.coerce.number().int().positive(),
});

export function splitList(value: string | string[] | undefined): string[] {
  const parts = Array.isArray(value) ? value : (value ?? '').split(',');
  return parts.map(s => s.trim()).filter(Boolean);
}

/** Newline-delimited URLs; blank lines and `#` comments are ignored. */
export function parseUrlList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line && !line.startsWith('#'));
}

export async function loadUrlList(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigError('urls-file', `Could not read the URL list ${path}: ${reason}`);
  }
  return parseUrlList(text);
}

function resolveTarget(input: ScanInput): { target: ScanTarget; sources?: SourceId[] } {
  if (input.urls) {
    const urls = input.urls.map(u => u.trim()).filter(Boolean);
    if (!urls.length) throw new ConfigError('urls', 'The URL list is empty.');
    return { target: { kind: 'url-list', urls } };
  }

  const searchUrl = input.url?.trim();
  if (searchUrl) {
    let parsed: URL;
    try {
      parsed = new URL(searchUrl);
    } catch {
      throw new ConfigError('url', `Not a valid search URL: ${searchUrl}`);
    }
    const family = sourceForUrl(parsed.toString());
    if (!family) throw new ConfigError('url', `No supported source for host ${parsed.hostname}.`);
    return { target: { kind: 'search-url', url: parsed.toString() }, sources: [family.id] };
  }

  const fromTarget = parseCityRegion(input.target);
  if (input.target?.trim() && !fromTarget) {
    throw new ConfigError('target', `Expected "City, ST" but got "${input.target}".`);
  }
  const city = (fromTarget?.city ?? input.city ?? '').trim();
  const region = (fromTarget?.region ?? input.state ?? '').trim();
  if (!city) throw new ConfigError('city', 'City is required (or pass a search URL).');
  if (!region) throw new ConfigError('state', 'State is required (2-letter code).');
  if (!/^[A-Za-z]{2}$/.test(region)) throw new ConfigError('state', `State must be a 2-letter code, got "${region}".`);
  return { target: { kind: 'city', city, region: region.toUpperCase() } };
}

export function buildScanConfig(input: ScanInput, defaults: typeof CFG = CFG): ScanConfig {
  const { target, sources } = resolveTarget(input);

  const parsed = OptionsSchema.safeParse({
    sources: sources ?? splitList(input.sources ?? defaults.sources),
    maxPages: input.pages ?? defaults.maxPages,
    maxRecords: input.maxRecords ?? defaults.maxRecords,
    followManagement: input.follow ?? defaults.followManagement,
    delay: {
      minSeconds: input.delayMin ?? defaults.delayMin,
      maxSeconds: input.delayMax ?? defaults.delayMax,
    },
    referer: input.referer ?? defaults.referer,
    timeoutMs: input.timeoutMs ?? defaults.timeoutMs,
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'config';
    throw new ConfigError(field, `Invalid ${field}: ${issue?.message ?? 'unknown problem'}`);
  }

  const opts = parsed.data;
  return Object.freeze({
    target: Object.freeze(target),
    sources: Object.freeze([...new Set(opts.sources)]),
    maxPages: opts.maxPages,
    maxRecords: opts.maxRecords,
    followManagement: opts.followManagement,
    delay: Object.freeze(opts.delay),
    referer: opts.referer || undefined,
    timeoutMs: opts.timeoutMs,
  });
}
