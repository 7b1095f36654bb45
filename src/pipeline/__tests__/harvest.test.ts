import { describe, expect, it } from 'vitest';
import { apartments } from '../../sources/apartments.js';
import { rentcom } from '../../sources/rentcom.js';
import { loadDocument } from '../document.js';
import { harvest, structuredDataLinks } from '../harvest.js';
import { fixture, html, jsonLd } from './helpers.js';

const MIAMI = 'https://www.apartments.com/miami-fl/';

describe('harvest', () => {
  it('reads ItemList URLs in order without query strings', () => {
    const doc = loadDocument(fixture('apartments-listing.html'));
    expect(harvest(doc, MIAMI, apartments)).toEqual([
      'https://www.apartments.com/oakwood-gardens-miami-fl/abc123',
      'https://www.apartments.com/bay-pointe-miami-fl/def456',
      'https://www.apartments.com/coral-view-miami-fl/ghi789',
    ]);
  });

  it('dedupes across strategies, keeping first-seen order', () => {
    const doc = loadDocument(
      html(
        `<article class="placard" data-url="https://www.apartments.com/bay-pointe-miami-fl/def456/"></article>
         <a class="property-link" href="https://www.apartments.com/oakwood-gardens-miami-fl/abc123/">Oakwood</a>`,
        jsonLd({ '@type': 'ItemList', itemListElement: [{ url: 'https://www.apartments.com/oakwood-gardens-miami-fl/abc123' }] })
      )
    );
    expect(harvest(doc, MIAMI, apartments)).toEqual([
      'https://www.apartments.com/oakwood-gardens-miami-fl/abc123',
      'https://www.apartments.com/bay-pointe-miami-fl/def456',
    ]);
  });

  it('keeps same-domain property paths from the fallback scan', () => {
    const doc = loadDocument(
      html(`
        <a href="https://www.zillow.com/homedetails/x/1">Elsewhere</a>
        <a href="/miami-fl/">This page</a>
        <a href="/miami-fl/2/">Next</a>
        <a href="/about">About</a>
        <a href="/oakwood-gardens-miami-fl/abc123/">Oakwood Gardens</a>
      `)
    );
    expect(harvest(doc, MIAMI, apartments)).toEqual(['https://www.apartments.com/oakwood-gardens-miami-fl/abc123']);
  });

  it('skips the fallback scan for families that do not use it', () => {
    const base = 'https://www.rent.com/florida/miami-apartments';
    const doc = loadDocument(
      html(`
        <a href="/florida/miami-apartments/bay-pointe-4-100012345">Bay Pointe</a>
        <a href="/florida/miami-apartments/some/deep/path">Guide</a>
        <a data-tid="property-title" href="https://www.rent.com/florida/miami-apartments/coral-view-9-100054321?utm=1">Coral View</a>
      `)
    );
    expect(harvest(doc, base, rentcom)).toEqual([
      'https://www.rent.com/florida/miami-apartments/coral-view-9-100054321',
      'https://www.rent.com/florida/miami-apartments/bay-pointe-4-100012345',
    ]);
  });
});

describe('structuredDataLinks', () => {
  it('looks inside @graph and mainEntity', () => {
    const doc = loadDocument(
      html(
        '',
        jsonLd({
          '@graph': [
            {
              '@type': 'SearchResultsPage',
              mainEntity: { '@type': 'ItemList', itemListElement: [{ url: 'https://www.rent.com/a/b-apartments/x-1' }] },
            },
          ],
        })
      )
    );
    expect(structuredDataLinks(doc)).toEqual(['https://www.rent.com/a/b-apartments/x-1']);
  });

  it('ignores malformed blocks', () => {
    const doc = loadDocument(html('', '<script type="application/ld+json">{not json</script>'));
    expect(structuredDataLinks(doc)).toEqual([]);
  });
});
