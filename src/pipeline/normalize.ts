import type { SourceId } from '../sources/types.js';
import { cleanText } from '../utils/text.js';

export type Lead = {
  propertyName: string;
  address: string;
  managementCompany: string;
  phone: string;
  email: string;
  sourceUrl: string;
  managementUrl: string;
  source: SourceId;
};

export type LeadInput = Partial<Lead> & { source: SourceId; sourceUrl: string };

/** Cleans text fields; URLs are only trimmed so query strings survive untouched. */
export function normalize(input: LeadInput): Lead {
  return {
    propertyName: cleanText(input.propertyName),
    address: cleanText(input.address),
    managementCompany: cleanText(input.managementCompany),
    phone: cleanText(input.phone),
    email: cleanText(input.email),
    sourceUrl: input.sourceUrl.trim(),
    managementUrl: input.managementUrl?.trim() ?? '',
    source: input.source,
  };
}

export function hasIdentity(lead: Pick<Lead, 'propertyName' | 'address'>): boolean {
  return Boolean(lead.propertyName || lead.address);
}
