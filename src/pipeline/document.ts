import { load, type CheerioAPI } from 'cheerio';
import { isRecord } from '../utils/guards.js';
import { log } from '../utils/log.js';

export type JsonLdNode = Record<string, unknown>;

/** A parsed page: the cheerio root plus its flattened JSON-LD nodes. */
export type PageDocument = {
  $: CheerioAPI;
  structured: JsonLdNode[];
};

const NON_VISIBLE = 'script, style, noscript, template, head, title, meta, link';

export function loadDocument(html: string): PageDocument {
  const $ = load(html);
  return { $, structured: parseStructuredData($) };
}

function collectNodes(data: unknown, out: JsonLdNode[]): void {
  if (Array.isArray(data)) {
    for (const item of data) collectNodes(item, out);
    return;
  }
  if (!isRecord(data)) return;
  const graph = data['@graph'];
  if (Array.isArray(graph)) {
    collectNodes(graph, out);
    return;
  }
  out.push(data);
}

export function parseStructuredData($: CheerioAPI): JsonLdNode[] {
  const nodes: JsonLdNode[] = [];
  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).text().trim();
    if (!raw) return;
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (e) {
      log.debug('Skipping unparsable JSON-LD block:', e);
      return;
    }
    collectNodes(data, nodes);
  });
  return nodes;
}

export function nodeTypes(node: JsonLdNode): string[] {
  const t = node['@type'];
  if (typeof t === 'string') return [t];
  if (Array.isArray(t)) return t.filter((x): x is string => typeof x === 'string');
  return [];
}

export function hasTypeMatching(node: JsonLdNode, pattern: RegExp): boolean {
  return nodeTypes(node).some(t => pattern.test(t));
}

/** String (or number) value of `key`, if any. */
export function textField(node: JsonLdNode | undefined, key: string): string | undefined {
  const value = node?.[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

export function recordField(node: JsonLdNode | undefined, key: string): JsonLdNode | undefined {
  const value = node?.[key];
  return isRecord(value) ? value : undefined;
}

// Text inside these runs on with its neighbours; every other element is a word break.
const INLINE =
  'a, abbr, b, bdi, bdo, cite, code, data, dfn, em, font, i, kbd, label, mark, q, s, samp, small, span, strong, sub, sup, time, u, var';

/** Visible page text in document order, whitespace collapsed. */
export function visibleText($: CheerioAPI): string {
  const root = $.root().clone();
  root.find(NON_VISIBLE).remove();
  root
    .find('*')
    .not(INLINE)
    .each((_, el) => {
      $(el).prepend(' ').append(' ');
    });
  return root.text().replace(/\s+/g, ' ').trim();
}

/** Elements whose own (non-descendant) text matches `label`. */
export function findLabelElements($: CheerioAPI, label: RegExp) {
  return $.root()
    .find('*')
    .not(NON_VISIBLE)
    .filter((_, el) => label.test($(el).contents().filter((__, n) => n.nodeType === 3).text()));
}
