import { readFileSync } from 'node:fs';
import type { Fetcher, FetchResult } from '../../utils/http.js';

export function fixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');
}

export const ok = (url: string, body: string): FetchResult => ({ status: 'ok', body, finalUrl: url, httpStatus: 200 });

/** Serves canned results by URL; anything unknown is a 404. */
export class FakeFetcher implements Fetcher {
  readonly calls: string[] = [];

  constructor(private readonly pages: Record<string, FetchResult>) {}

  async fetch(url: string): Promise<FetchResult> {
    this.calls.push(url);
    return this.pages[url] ?? { status: 'failed', finalUrl: url, reason: 'HTTP 404', httpStatus: 404 };
  }
}

export function html(body: string, head = ''): string {
  return `<!DOCTYPE html><html><head>${head}</head><body>${body}</body></html>`;
}

export function jsonLd(data: unknown): string {
  return `<script type="application/ld+json">${JSON.stringify(data)}</script>`;
}
