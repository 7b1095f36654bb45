import { hostMatches, toAbsoluteUrl } from '../utils/url.js';
import { apartments } from './apartments.js';
import { rentcom } from './rentcom.js';
import type { SourceFamily, SourceId } from './types.js';

export const SOURCES: readonly SourceFamily[] = [apartments, rentcom];

export function getSource(id: SourceId, families: readonly SourceFamily[] = SOURCES): SourceFamily | undefined {
  return families.find(s => s.id === id);
}

export function sourceForUrl(href: string, families: readonly SourceFamily[] = SOURCES): SourceFamily | undefined {
  const url = toAbsoluteUrl(href);
  if (!url) return undefined;
  return families.find(s => hostMatches(url.hostname, s.domain));
}

export type { ListingTarget, SourceFamily, SourceId } from './types.js';
export { SOURCE_IDS } from './types.js';
