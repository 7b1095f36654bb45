import type { SourceProfile } from '../sources/types.js';
import { hasTypeMatching, visibleText, type PageDocument } from './document.js';
import { MANAGED_BY_RE } from './strategies.js';

export const DETAIL_TYPE_RE = /Apartment|Place|Residence/;

/**
 * Best-effort check that a page describes a single property. False positives
 * are tolerated; extraction drops pages that yield neither name nor address.
 */
export function isDetailPage(doc: PageDocument, profile: Pick<SourceProfile, 'detailMarkers'>): boolean {
  if (MANAGED_BY_RE.test(visibleText(doc.$))) return true;
  if (profile.detailMarkers.some(selector => doc.$(selector).length > 0)) return true;
  return doc.structured.some(node => hasTypeMatching(node, DETAIL_TYPE_RE));
}
