import {
  managedByLinkText,
  managedByTrailingText,
  managedByUrl,
  phonePattern,
  selectorText,
  structuredAddress,
  structuredManager,
  structuredName,
  structuredPhone,
  telLink,
} from '../pipeline/strategies.js';
import { slugify } from '../utils/address.js';
import { defineSource, uniqueInOrder } from './define.js';
import type { ListingTarget } from './types.js';

const ORIGIN = 'https://www.apartments.com';

/**
 * Page 1 is the bare search path. Later pages exist under both `?page=N` and
 * `/N/` depending on the market, so both are emitted.
 */
function pagedUrls(start: URL, pages: number): string[] {
  const root = new URL(start.toString());
  if (!root.pathname.endsWith('/')) root.pathname += '/';

  const urls = [root.toString()];
  for (let p = 2; p <= pages; p++) {
    const byQuery = new URL(root.toString());
    byQuery.searchParams.set('page', String(p));
    urls.push(byQuery.toString());

    const byPath = new URL(`${p}/`, root);
    byPath.search = root.search;
    urls.push(byPath.toString());
  }
  return uniqueInOrder(urls);
}

export function buildApartmentsListingUrls(target: ListingTarget, pages: number): string[] {
  if (target.kind === 'search-url') return pagedUrls(new URL(target.url.trim()), pages);
  const slug = `${slugify(target.city)}-${slugify(target.region)}`;
  return pagedUrls(new URL(`/${slug}/`, ORIGIN), pages);
}

export const apartments = defineSource(
  {
    id: 'apartments',
    label: 'Apartments.com',
    domain: 'apartments.com',
    linkHints: [
      { selector: 'article.placard[data-url]', attr: 'data-url' },
      { selector: 'a.property-link[href]' },
      { selector: 'a.placardTitle[href]' },
    ],
    fallbackScan: true,
    detailMarkers: ['#pricingView', '.pricingGridItem', '#propertyHeader', '.propertyNameRow'],
    fields: {
      propertyName: [structuredName, selectorText('#propertyName', '.propertyName'), selectorText('h1, h2')],
      address: [
        structuredAddress,
        selectorText('[data-testid*="address" i]', 'address', 'div[class*="address" i]'),
      ],
      phone: [structuredPhone, telLink, phonePattern],
      managementCompany: [structuredManager, managedByLinkText(), managedByTrailingText()],
      managementUrl: [managedByUrl()],
    },
  },
  buildApartmentsListingUrls
);
