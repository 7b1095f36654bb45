import { load } from 'cheerio';

export const EMAIL_RE = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;
export const PHONE_RE = /(?<!\d)(?:\+?1[\s.-]?)?\(?\d{3}\)?[\s.-]?\d{3}[\s.-]?\d{4}(?!\d)/;

const ASSET_SUFFIX_RE = /\.(?:png|jpe?g|gif|webp|svg|css|js)$/i;

function stripAndDecode(input: string): string {
  return load(input, null, false).text();
}

/**
 * Strips markup, decodes entities and collapses whitespace. Runs until the
 * value stops changing so that cleaning a cleaned value is a no-op.
 */
export function cleanText(input?: string | null): string {
  if (!input) return '';
  let current = input;
  for (let pass = 0; pass < 5; pass++) {
    const next = stripAndDecode(current).replace(/\s+/g, ' ').trim();
    if (next === current) return next;
    current = next;
  }
  return current;
}

export function findEmail(text: string): string {
  for (const match of text.matchAll(EMAIL_RE)) {
    if (!ASSET_SUFFIX_RE.test(match[0])) return match[0];
  }
  return '';
}

export function findPhone(text: string): string {
  return text.match(PHONE_RE)?.[0]?.trim() ?? '';
}
