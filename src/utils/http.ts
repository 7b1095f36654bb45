import axios from 'axios';
import { log } from './log.js';
import { isRecord } from './guards.js';
import { sleep as defaultSleep, type Sleep } from './sleep.js';

export type FetchResult =
  | { status: 'ok'; body: string; finalUrl: string; httpStatus: number }
  | { status: 'blocked'; finalUrl: string; reason: string; httpStatus?: number }
  | { status: 'failed'; finalUrl: string; reason: string; httpStatus?: number };

export type TransportResponse = {
  status: number;
  body: string;
  finalUrl: string;
};

export type Transport = (
  url: string,
  init: { headers: Record<string, string>; timeoutMs: number }
) => Promise<TransportResponse>;

export interface Fetcher {
  fetch(url: string, timeoutMs?: number): Promise<FetchResult>;
}

// Interstitial wording changes over time; bump the version when editing the list.
export const SOFT_BLOCK_SIGNATURES_VERSION = '2026.10';
export const SOFT_BLOCK_SIGNATURES: readonly RegExp[] = [
  /please verify you are (?:a )?human/i,
  /unusual traffic/i,
  /pardon our interruption/i,
  /are you a robot\??/i,
  /px-captcha/i,
  /checking your browser before accessing/i,
  /<title>\s*just a moment\.{3}\s*<\/title>/i,
  /access to this page has been denied/i,
];
export const SOFT_BLOCK_SCAN_CHARS = 5000;

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_4) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
];

const RETRYABLE_STATUS = new Set([500, 502, 503, 504]);
const DENIED_STATUS = new Set([403, 429]);

export function detectSoftBlock(body: string): RegExp | undefined {
  const head = body.slice(0, SOFT_BLOCK_SCAN_CHARS);
  return SOFT_BLOCK_SIGNATURES.find(sig => sig.test(head));
}

function redirectedUrl(request: unknown): string | undefined {
  if (!isRecord(request) || !isRecord(request.res)) return undefined;
  const { responseUrl } = request.res;
  return typeof responseUrl === 'string' ? responseUrl : undefined;
}

export const axiosTransport: Transport = async (url, { headers, timeoutMs }) => {
  const res = await axios.get<string>(url, {
    headers,
    timeout: timeoutMs,
    maxRedirects: 5,
    responseType: 'text',
    transformResponse: [(data: unknown) => data],
    validateStatus: () => true,
  });
  return {
    status: res.status,
    body: typeof res.data === 'string' ? res.data : '',
    finalUrl: redirectedUrl(res.request) ?? url,
  };
};

export type PageFetcherOptions = {
  transport?: Transport;
  sleep?: Sleep;
  random?: () => number;
  userAgents?: readonly string[];
  maxAttempts?: number;
  backoffMs?: number;
  referer?: string;
};

export class PageFetcher implements Fetcher {
  private readonly transport: Transport;
  private readonly wait: Sleep;
  private readonly random: () => number;
  private readonly userAgents: readonly string[];
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly referer?: string;
  private identity = 0;

  constructor(opts: PageFetcherOptions = {}) {
    this.transport = opts.transport ?? axiosTransport;
    this.wait = opts.sleep ?? defaultSleep;
    this.random = opts.random ?? Math.random;
    this.userAgents = opts.userAgents?.length ? opts.userAgents : USER_AGENTS;
    this.maxAttempts = opts.maxAttempts ?? 4;
    this.backoffMs = opts.backoffMs ?? 600;
    this.referer = opts.referer;
  }

  get userAgent(): string {
    return this.userAgents[this.identity % this.userAgents.length] ?? USER_AGENTS[0];
  }

  rotateIdentity(): void {
    this.identity = (this.identity + 1) % this.userAgents.length;
  }

  async fetch(url: string, timeoutMs = 20_000): Promise<FetchResult> {
    let attempt = 0;
    let identityRetried = false;

    for (;;) {
      attempt++;
      let res: TransportResponse;
      try {
        res = await this.transport(url, { headers: this.headers(), timeoutMs });
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        if (attempt < this.maxAttempts) {
          log.debug(`Fetch error (attempt ${attempt}) for ${url}: ${reason}`);
          await this.wait(this.backoff(attempt));
          continue;
        }
        return { status: 'failed', finalUrl: url, reason };
      }

      if (RETRYABLE_STATUS.has(res.status)) {
        if (attempt < this.maxAttempts) {
          await this.wait(this.backoff(attempt));
          continue;
        }
        return { status: 'failed', finalUrl: res.finalUrl, reason: `HTTP ${res.status}`, httpStatus: res.status };
      }

      if (DENIED_STATUS.has(res.status)) {
        if (!identityRetried) {
          identityRetried = true;
          this.rotateIdentity();
          await this.wait(1000 + Math.round(this.random() * 1000));
          continue;
        }
        return { status: 'blocked', finalUrl: res.finalUrl, reason: `HTTP ${res.status}`, httpStatus: res.status };
      }

      if (res.status < 200 || res.status >= 300) {
        return { status: 'failed', finalUrl: res.finalUrl, reason: `HTTP ${res.status}`, httpStatus: res.status };
      }

      const signature = detectSoftBlock(res.body);
      if (signature) {
        return {
          status: 'blocked',
          finalUrl: res.finalUrl,
          reason: `soft block matched ${signature.source}`,
          httpStatus: res.status,
        };
      }

      return { status: 'ok', body: res.body, finalUrl: res.finalUrl, httpStatus: res.status };
    }
  }

  private backoff(attempt: number): number {
    return this.backoffMs * 2 ** (attempt - 1);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.9',
    };
    if (this.referer) headers.Referer = this.referer;
    return headers;
  }
}
