import type { CheerioAPI } from 'cheerio';
import type { DetailContext, FieldStrategy } from '../sources/types.js';
import { isRecord } from '../utils/guards.js';
import { cleanText, findPhone } from '../utils/text.js';
import { toAbsoluteUrl } from '../utils/url.js';
import {
  findLabelElements,
  hasTypeMatching,
  recordField,
  textField,
  visibleText,
  type JsonLdNode,
  type PageDocument,
} from './document.js';

export const MANAGED_BY_RE = /managed\s+by|management\s+company/i;

const PROPERTY_TYPE_RE = /Apartment|Place|Residence/;
const ORGANIZATION_TYPE_RE = /Organization/;

/** Property-like JSON-LD nodes first, then organisations. */
export function subjectNodes(doc: PageDocument): JsonLdNode[] {
  const property = doc.structured.filter(n => hasTypeMatching(n, PROPERTY_TYPE_RE));
  const orgs = doc.structured.filter(
    n => hasTypeMatching(n, ORGANIZATION_TYPE_RE) && !hasTypeMatching(n, PROPERTY_TYPE_RE)
  );
  return [...property, ...orgs];
}

function firstFromNodes(doc: PageDocument, pick: (node: JsonLdNode) => string | undefined): string | undefined {
  for (const node of subjectNodes(doc)) {
    const value = cleanText(pick(node));
    if (value) return value;
  }
  return undefined;
}

export function formatPostalAddress(node: JsonLdNode): string {
  return ['streetAddress', 'addressLocality', 'addressRegion', 'postalCode']
    .map(key => cleanText(textField(node, key)))
    .filter(Boolean)
    .join(', ');
}

function nameOrText(node: JsonLdNode, key: string): string | undefined {
  return textField(recordField(node, key), 'name') ?? textField(node, key);
}

export const structuredName: FieldStrategy = ({ doc }) => firstFromNodes(doc, n => textField(n, 'name'));

export const structuredAddress: FieldStrategy = ({ doc }) =>
  firstFromNodes(doc, n => {
    const addr = recordField(n, 'address');
    return addr ? formatPostalAddress(addr) : textField(n, 'address');
  });

function contactTelephone(node: JsonLdNode): string | undefined {
  const contact = node.contactPoint;
  const points: unknown[] = Array.isArray(contact) ? contact : [contact];
  for (const point of points) {
    const phone = isRecord(point) ? textField(point, 'telephone') : undefined;
    if (phone) return phone;
  }
  return undefined;
}

export const structuredPhone: FieldStrategy = ({ doc }) =>
  firstFromNodes(doc, n => textField(n, 'telephone') || contactTelephone(n));

export const structuredManager: FieldStrategy = ({ doc }) =>
  firstFromNodes(doc, n => cleanText(nameOrText(n, 'brand')) || nameOrText(n, 'provider'));

/** Text of the first element, across selectors in order, that has any. */
export function selectorText(...selectors: string[]): FieldStrategy {
  return ({ doc }) => {
    const { $ } = doc;
    for (const selector of selectors) {
      for (const el of $(selector).toArray()) {
        const text = cleanText($(el).text());
        if (text) return text;
      }
    }
    return undefined;
  };
}

export function telLinkNumber($: CheerioAPI): string | undefined {
  for (const el of $('a[href^="tel:"]').toArray()) {
    const a = $(el);
    const value = cleanText(a.text()) || cleanText((a.attr('href') ?? '').slice('tel:'.length));
    if (value) return value;
  }
  return undefined;
}

export const telLink: FieldStrategy = ({ doc }) => telLinkNumber(doc.$);

export const phonePattern: FieldStrategy = ({ doc }) => findPhone(visibleText(doc.$)) || undefined;

type ManagementAnchor = { text: string; href?: string; blockText: string };

function managementAnchor({ doc, url }: DetailContext, label: RegExp): ManagementAnchor | undefined {
  const { $ } = doc;
  const block = findLabelElements($, label).not('a').first();
  if (!block.length) return undefined;

  const candidates = [
    ...block.find('a[href]').toArray(),
    ...block.nextAll('a[href]').toArray(),
    ...block.nextAll().find('a[href]').toArray(),
    ...block.parent().nextAll('a[href]').toArray(),
    ...block.parent().nextAll().find('a[href]').toArray(),
  ];
  const anchor = candidates.find(el => toAbsoluteUrl($(el).attr('href'), url));
  return {
    text: anchor ? cleanText($(anchor).text()) : '',
    href: anchor ? toAbsoluteUrl($(anchor).attr('href'), url)?.toString() : undefined,
    blockText: cleanText(block.text()),
  };
}

export function managedByLinkText(label: RegExp = MANAGED_BY_RE): FieldStrategy {
  return page => managementAnchor(page, label)?.text || undefined;
}

/** Whatever follows the label inside its own block, e.g. "Managed by: Acme" → "Acme". */
export function managedByTrailingText(label: RegExp = MANAGED_BY_RE): FieldStrategy {
  return page => {
    const found = managementAnchor(page, label);
    if (!found) return undefined;
    const m = found.blockText.match(label);
    if (!m || m.index === undefined) return undefined;
    return found.blockText.slice(m.index + m[0].length).replace(/^[\s:–-]+/, '') || undefined;
  };
}

export function managedByUrl(label: RegExp = MANAGED_BY_RE): FieldStrategy {
  return page => managementAnchor(page, label)?.href;
}
