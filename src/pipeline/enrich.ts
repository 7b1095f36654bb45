import type { CheerioAPI } from 'cheerio';
import type { Fetcher } from '../utils/http.js';
import { log } from '../utils/log.js';
import { politeDelay, type DelayBounds, type Sleep } from '../utils/sleep.js';
import { cleanText, findEmail, findPhone } from '../utils/text.js';
import { loadDocument, visibleText } from './document.js';
import type { Lead } from './normalize.js';
import { telLinkNumber } from './strategies.js';

export type EnrichOptions = {
  follow: boolean;
  delay: DelayBounds;
  fetcher: Fetcher;
  timeoutMs?: number;
  sleep?: Sleep;
  random?: () => number;
};

export function mailtoAddress($: CheerioAPI): string {
  for (const el of $('a[href^="mailto:" i]').toArray()) {
    const target = ($(el).attr('href') ?? '').slice('mailto:'.length).split('?')[0] ?? '';
    const email = cleanText(target);
    if (email) return email;
  }
  return '';
}

export function contactEmail($: CheerioAPI): string {
  return findEmail(visibleText($)) || mailtoAddress($);
}

export function contactPhone($: CheerioAPI): string {
  return telLinkNumber($) ?? findPhone(visibleText($));
}

/**
 * Visits the management company site and fills phone/email only where the
 * lead has none. Any fetch problem leaves the lead as it was.
 */
export async function enrich(lead: Lead, opts: EnrichOptions): Promise<Lead> {
  if (!opts.follow || !lead.managementUrl) return lead;
  if (lead.phone && lead.email) return lead;

  await politeDelay(opts.delay, opts.sleep, opts.random);
  const res = await opts.fetcher.fetch(lead.managementUrl, opts.timeoutMs);
  if (res.status === 'blocked') {
    log.warn('Management site blocked the request:', lead.managementUrl);
    return lead;
  }
  if (res.status === 'failed') {
    log.debug(`Management site fetch failed (${res.reason}):`, lead.managementUrl);
    return lead;
  }

  const { $ } = loadDocument(res.body);
  return {
    ...lead,
    email: lead.email || contactEmail($),
    phone: lead.phone || contactPhone($),
  };
}
