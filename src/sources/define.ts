import { isDetailPage } from '../pipeline/classify.js';
import { extract } from '../pipeline/extract.js';
import { harvest } from '../pipeline/harvest.js';
import type { ListingTarget, SourceFamily, SourceProfile } from './types.js';

export type ListingUrlBuilder = (target: ListingTarget, pages: number) => string[];

/** Binds the shared pipeline stages to one site's profile. */
export function defineSource(profile: SourceProfile, buildListingUrls: ListingUrlBuilder): SourceFamily {
  return {
    ...profile,
    buildListingUrls,
    harvestLinks: (doc, baseUrl) => harvest(doc, baseUrl, profile),
    isDetailPage: doc => isDetailPage(doc, profile),
    extractFields: (doc, sourceUrl) => extract(doc, sourceUrl, profile),
  };
}

export function uniqueInOrder(urls: string[]): string[] {
  return [...new Set(urls)];
}
