import type { PageDocument } from '../pipeline/document.js';
import type { Lead } from '../pipeline/normalize.js';

export const SOURCE_IDS = ['apartments', 'rentcom'] as const;
export type SourceId = (typeof SOURCE_IDS)[number];

export type ListingTarget =
  | { kind: 'city'; city: string; region: string }
  | { kind: 'search-url'; url: string };

/** An anchor-ish element on a listing page that usually points at a detail page. */
export type LinkHint = {
  selector: string;
  /** Attribute carrying the URL; defaults to `href`. */
  attr?: string;
  /** Resolved pathname must match, when set. */
  path?: RegExp;
};

export type DetailContext = {
  doc: PageDocument;
  url: string;
};

export type FieldStrategy = (page: DetailContext) => string | undefined;

/** Ordered strategies per field; the first non-empty cleaned value wins. */
export type FieldPlan = {
  propertyName: readonly FieldStrategy[];
  address: readonly FieldStrategy[];
  phone: readonly FieldStrategy[];
  managementCompany: readonly FieldStrategy[];
  managementUrl: readonly FieldStrategy[];
};

export interface SourceProfile {
  readonly id: SourceId;
  readonly label: string;
  readonly domain: string;
  readonly linkHints: readonly LinkHint[];
  /** Scan every same-domain anchor when the hints are not specific enough. */
  readonly fallbackScan: boolean;
  readonly detailMarkers: readonly string[];
  readonly fields: FieldPlan;
}

export interface SourceFamily extends SourceProfile {
  buildListingUrls(target: ListingTarget, pages: number): string[];
  harvestLinks(doc: PageDocument, baseUrl: string): string[];
  isDetailPage(doc: PageDocument): boolean;
  extractFields(doc: PageDocument, sourceUrl: string): Lead | null;
}
