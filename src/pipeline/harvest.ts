import type { LinkHint, SourceProfile } from '../sources/types.js';
import { isRecord } from '../utils/guards.js';
import { canonicalUrl, hostMatches, pathSegments, toAbsoluteUrl } from '../utils/url.js';
import { hasTypeMatching, recordField, textField, type JsonLdNode, type PageDocument } from './document.js';

const DETAIL_FRAGMENT_RE = /\/(?:property|apartments)\//i;

function itemUrl(entry: unknown): string | undefined {
  if (typeof entry === 'string') return entry;
  if (!isRecord(entry)) return undefined;
  const item = recordField(entry, 'item');
  return (
    textField(entry, 'url') ??
    textField(item, 'url') ??
    textField(item, '@id') ??
    textField(entry, 'item') ??
    textField(entry, '@id')
  );
}

function listNodes(node: JsonLdNode): JsonLdNode[] {
  const main = recordField(node, 'mainEntity');
  return [node, ...(main ? [main] : [])].filter(n => hasTypeMatching(n, /^ItemList$/));
}

/** URLs declared by JSON-LD ItemList blocks, in document order. */
export function structuredDataLinks(doc: PageDocument): string[] {
  const out: string[] = [];
  for (const list of doc.structured.flatMap(listNodes)) {
    const elements = list.itemListElement;
    const entries: unknown[] = Array.isArray(elements) ? elements : [elements];
    for (const entry of entries) {
      const href = itemUrl(entry);
      if (href) out.push(href);
    }
  }
  return out;
}

export function selectorLinks(doc: PageDocument, baseUrl: string, hints: readonly LinkHint[]): string[] {
  const { $ } = doc;
  const out: string[] = [];
  for (const hint of hints) {
    $(hint.selector).each((_, el) => {
      const href = $(el).attr(hint.attr ?? 'href');
      if (!href) return;
      if (hint.path) {
        const url = toAbsoluteUrl(href, baseUrl);
        if (!url || !hint.path.test(url.pathname)) return;
      }
      out.push(href);
    });
  }
  return out;
}

/** Same-domain anchors whose path looks like a property page rather than a results page. */
export function fallbackLinks(doc: PageDocument, baseUrl: string, domain: string): string[] {
  const { $ } = doc;
  const out: string[] = [];
  $('a[href]').each((_, el) => {
    const href = $(el).attr('href');
    const url = toAbsoluteUrl(href, baseUrl);
    if (!href || !url || !hostMatches(url.hostname, domain)) return;
    const segments = pathSegments(url);
    const last = segments[segments.length - 1] ?? '';
    if (DETAIL_FRAGMENT_RE.test(url.pathname) || (segments.length >= 2 && !/^\d+$/.test(last))) {
      out.push(href);
    }
  });
  return out;
}

export function harvest(
  doc: PageDocument,
  baseUrl: string,
  profile: Pick<SourceProfile, 'domain' | 'linkHints' | 'fallbackScan'>
): string[] {
  const base = toAbsoluteUrl(baseUrl, baseUrl);
  const self = base ? canonicalUrl(base) : '';
  const seen = new Set<string>();
  const links: string[] = [];

  const accept = (href: string) => {
    const url = toAbsoluteUrl(href, baseUrl);
    if (!url || !hostMatches(url.hostname, profile.domain)) return;
    const candidate = canonicalUrl(url);
    if (candidate === self || seen.has(candidate)) return;
    seen.add(candidate);
    links.push(candidate);
  };

  structuredDataLinks(doc).forEach(accept);
  selectorLinks(doc, baseUrl, profile.linkHints).forEach(accept);
  if (profile.fallbackScan) fallbackLinks(doc, baseUrl, profile.domain).forEach(accept);
  return links;
}
