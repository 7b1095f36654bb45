import type { ScanConfig } from '../config.js';
import { getSource, SOURCES, sourceForUrl, type SourceFamily, type SourceId } from '../sources/index.js';
import type { Fetcher, FetchResult } from '../utils/http.js';
import { log } from '../utils/log.js';
import { politeDelay, sleep as defaultSleep, type Sleep } from '../utils/sleep.js';
import { canonicalUrl, toAbsoluteUrl } from '../utils/url.js';
import { finalize } from './dedupe.js';
import { loadDocument } from './document.js';
import { enrich } from './enrich.js';
import { hasIdentity, type Lead } from './normalize.js';

export type Candidate = {
  url: string;
  source: SourceId;
};

export type ScanOutcome = 'ok' | 'no-links' | 'no-records';

export type ScanStats = {
  fetched: number;
  blocked: number;
  failed: number;
  rejected: number;
};

/** Everything one scan produced; created per run and returned to the caller. */
export type ScanState = {
  config: ScanConfig;
  listingUrls: string[];
  candidates: Candidate[];
  leads: Lead[];
  warnings: string[];
  stats: ScanStats;
  outcome: ScanOutcome;
};

export type ScanDeps = {
  fetcher: Fetcher;
  sleep?: Sleep;
  random?: () => number;
  families?: readonly SourceFamily[];
  onProgress?: (message: string) => void;
};

export function createScanState(config: ScanConfig): ScanState {
  return {
    config,
    listingUrls: [],
    candidates: [],
    leads: [],
    warnings: [],
    stats: { fetched: 0, blocked: 0, failed: 0, rejected: 0 },
    outcome: 'ok',
  };
}

function warn(state: ScanState, message: string): void {
  state.warnings.push(message);
  log.warn(message);
}

class ScanRunner {
  private readonly wait: Sleep;
  private readonly families: readonly SourceFamily[];
  private readonly seen = new Set<string>();

  constructor(private readonly state: ScanState, private readonly deps: ScanDeps) {
    this.wait = deps.sleep ?? defaultSleep;
    this.families = deps.families ?? SOURCES;
  }

  private progress(message: string): void {
    log.info(message);
    this.deps.onProgress?.(message);
  }

  private async politeFetch(url: string): Promise<FetchResult> {
    const { config } = this.state;
    await politeDelay(config.delay, this.wait, this.deps.random);
    const res = await this.deps.fetcher.fetch(url, config.timeoutMs);
    this.state.stats.fetched++;
    if (res.status === 'blocked') {
      this.state.stats.blocked++;
      warn(this.state, `Blocked by anti-bot page at ${url} (${res.reason}); skipping.`);
    } else if (res.status === 'failed') {
      this.state.stats.failed++;
      log.debug(`Fetch failed for ${url}: ${res.reason}`);
    }
    return res;
  }

  private addCandidate(url: string, source: SourceId): void {
    if (this.seen.has(url)) return;
    this.seen.add(url);
    this.state.candidates.push({ url, source });
  }

  private activeFamilies(): SourceFamily[] {
    return this.state.config.sources.flatMap(id => getSource(id, this.families) ?? []);
  }

  async collectFromListings(): Promise<void> {
    const { config } = this.state;
    if (config.target.kind === 'url-list') return;
    const target = config.target;

    for (const family of this.activeFamilies()) {
      const listingUrls = family.buildListingUrls(target, config.maxPages);
      this.state.listingUrls.push(...listingUrls);
      this.progress(`${family.label}: crawling up to ${listingUrls.length} listing pages`);

      for (const listingUrl of listingUrls) {
        const res = await this.politeFetch(listingUrl);
        if (res.status !== 'ok') continue;
        const links = family.harvestLinks(loadDocument(res.body), res.finalUrl);
        log.debug(`${listingUrl}: ${links.length} candidate links`);
        for (const link of links) this.addCandidate(link, family.id);
      }
    }
  }

  collectFromUrlList(urls: string[]): void {
    for (const raw of urls) {
      const url = toAbsoluteUrl(raw);
      const family = url ? sourceForUrl(url.toString(), this.families) : undefined;
      if (!url || !family) {
        warn(this.state, `No supported source for ${raw}; skipping.`);
        continue;
      }
      this.addCandidate(canonicalUrl(url), family.id);
    }
  }

  async processCandidates(): Promise<Lead[]> {
    const { config } = this.state;
    const batch = this.state.candidates.slice(0, config.maxRecords);
    const collected: Lead[] = [];

    for (const [i, candidate] of batch.entries()) {
      this.progress(`Processing ${i + 1}/${batch.length}: ${candidate.url}`);
      const family = getSource(candidate.source, this.families);
      if (!family) continue;

      const res = await this.politeFetch(candidate.url);
      if (res.status !== 'ok') continue;

      const extracted = family.extractFields(loadDocument(res.body), candidate.url);
      if (!extracted) {
        this.state.stats.rejected++;
        continue;
      }

      const lead = await enrich(extracted, {
        follow: config.followManagement,
        delay: config.delay,
        fetcher: this.deps.fetcher,
        timeoutMs: config.timeoutMs,
        sleep: this.wait,
        random: this.deps.random,
      });
      if (hasIdentity(lead)) collected.push(lead);
      else this.state.stats.rejected++;
    }
    return collected;
  }
}

/**
 * Runs one scan: listing pages (or a manual URL list) to candidates, then
 * each candidate through extraction and enrichment. Requests are strictly
 * sequential with a random delay before each.
 */
export async function runScan(config: ScanConfig, deps: ScanDeps): Promise<ScanState> {
  const state = createScanState(config);
  const runner = new ScanRunner(state, deps);

  if (config.target.kind === 'url-list') runner.collectFromUrlList(config.target.urls);
  else await runner.collectFromListings();

  if (!state.candidates.length) {
    state.outcome = 'no-links';
    warn(state, 'No candidate property links found. Try fewer pages or a different city/URL.');
    return state;
  }
  log.info(`Found ${state.candidates.length} candidate property links.`);

  state.leads = finalize(await runner.processCandidates());
  if (!state.leads.length) {
    state.outcome = 'no-records';
    warn(state, 'No valid property detail pages parsed. Try more pages, longer delays or another input mode.');
  }
  return state;
}
