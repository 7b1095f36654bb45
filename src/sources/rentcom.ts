import { readFileSync } from 'node:fs';
import { z } from 'zod';
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

const ORIGIN = 'https://www.rent.com';

const StateNames = z.record(z.string());
const STATE_NAMES = StateNames.parse(
  JSON.parse(readFileSync(new URL('../../data/us-states.json', import.meta.url), 'utf8'))
);

export function stateSlug(region: string): string {
  return slugify(STATE_NAMES[region.toUpperCase()] ?? region);
}

function pagedUrls(start: URL, pages: number): string[] {
  const urls = [start.toString()];
  for (let p = 2; p <= pages; p++) {
    const next = new URL(start.toString());
    next.searchParams.set('page', String(p));
    urls.push(next.toString());
  }
  return uniqueInOrder(urls);
}

export function buildRentComListingUrls(target: ListingTarget, pages: number): string[] {
  if (target.kind === 'search-url') return pagedUrls(new URL(target.url.trim()), pages);
  const path = `/${stateSlug(target.region)}/${slugify(target.city)}-apartments`;
  return pagedUrls(new URL(path, ORIGIN), pages);
}

export const rentcom = defineSource(
  {
    id: 'rentcom',
    label: 'Rent.com',
    domain: 'rent.com',
    linkHints: [
      { selector: 'a[data-tid="property-title"][href]' },
      { selector: 'a[data-tid="listing-card-link"][href]' },
      { selector: 'a[href]', path: /^\/[a-z-]+\/[a-z0-9-]+-apartments\/[a-z0-9-]+-\d+\/?$/i },
    ],
    fallbackScan: false,
    detailMarkers: ['[data-tid="floor-plans"]', '[data-tid="pdp-header"]', '#floorplans'],
    fields: {
      propertyName: [structuredName, selectorText('h1[data-tid="property-title"]'), selectorText('h1, h2')],
      address: [structuredAddress, selectorText('[data-tid="property-address"]', '[data-tid="pdp-address"]')],
      phone: [structuredPhone, telLink, phonePattern],
      managementCompany: [structuredManager, managedByLinkText(), managedByTrailingText()],
      managementUrl: [managedByUrl()],
    },
  },
  buildRentComListingUrls
);
