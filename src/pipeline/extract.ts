import type { DetailContext, FieldStrategy, SourceProfile } from '../sources/types.js';
import { log } from '../utils/log.js';
import { cleanText } from '../utils/text.js';
import { isDetailPage } from './classify.js';
import type { PageDocument } from './document.js';
import { normalize, type Lead } from './normalize.js';

export function resolveField(strategies: readonly FieldStrategy[], page: DetailContext): string {
  for (const strategy of strategies) {
    const value = cleanText(strategy(page));
    if (value) return value;
  }
  return '';
}

function resolveUrl(strategies: readonly FieldStrategy[], page: DetailContext): string {
  for (const strategy of strategies) {
    const value = strategy(page)?.trim();
    if (value) return value;
  }
  return '';
}

export function extract(
  doc: PageDocument,
  sourceUrl: string,
  profile: Pick<SourceProfile, 'id' | 'detailMarkers' | 'fields'>
): Lead | null {
  if (!isDetailPage(doc, profile)) {
    log.debug('Not a detail page, skipping:', sourceUrl);
    return null;
  }

  const page: DetailContext = { doc, url: sourceUrl };
  const { fields } = profile;
  return normalize({
    source: profile.id,
    sourceUrl,
    propertyName: resolveField(fields.propertyName, page),
    address: resolveField(fields.address, page),
    phone: resolveField(fields.phone, page),
    managementCompany: resolveField(fields.managementCompany, page),
    managementUrl: resolveUrl(fields.managementUrl, page),
    email: '',
  });
}
