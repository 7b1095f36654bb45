import { describe, expect, it } from 'vitest';
import { buildApartmentsListingUrls } from '../apartments.js';
import { getSource, sourceForUrl } from '../index.js';
import { buildRentComListingUrls, stateSlug } from '../rentcom.js';

describe('apartments listing URLs', () => {
  it('emits both pagination variants after page 1', () => {
    expect(buildApartmentsListingUrls({ kind: 'city', city: 'Miami', region: 'FL' }, 2)).toEqual([
      'https://www.apartments.com/miami-fl/',
      'https://www.apartments.com/miami-fl/?page=2',
      'https://www.apartments.com/miami-fl/2/',
    ]);
  });

  it('slugs multi-word cities', () => {
    expect(buildApartmentsListingUrls({ kind: 'city', city: 'St. Louis', region: 'mo' }, 1)).toEqual([
      'https://www.apartments.com/st-louis-mo/',
    ]);
  });

  it('pages a pasted search URL', () => {
    const target = { kind: 'search-url' as const, url: 'https://www.apartments.com/miami-fl/2-bedrooms' };
    expect(buildApartmentsListingUrls(target, 2)).toEqual([
      'https://www.apartments.com/miami-fl/2-bedrooms/',
      'https://www.apartments.com/miami-fl/2-bedrooms/?page=2',
      'https://www.apartments.com/miami-fl/2-bedrooms/2/',
    ]);
  });
});

describe('rent.com listing URLs', () => {
  it('uses the state name in the path', () => {
    expect(buildRentComListingUrls({ kind: 'city', city: 'Miami', region: 'FL' }, 3)).toEqual([
      'https://www.rent.com/florida/miami-apartments',
      'https://www.rent.com/florida/miami-apartments?page=2',
      'https://www.rent.com/florida/miami-apartments?page=3',
    ]);
    expect(buildRentComListingUrls({ kind: 'city', city: 'New York', region: 'NY' }, 1)).toEqual([
      'https://www.rent.com/new-york/new-york-apartments',
    ]);
  });

  it('falls back to the code for unknown regions', () => {
    expect(stateSlug('dc')).toBe('district-of-columbia');
    expect(stateSlug('ZZ')).toBe('zz');
  });
});

describe('source registry', () => {
  it('routes URLs by host', () => {
    expect(sourceForUrl('https://www.rent.com/florida/miami-apartments')?.id).toBe('rentcom');
    expect(sourceForUrl('https://apartments.com/miami-fl/')?.id).toBe('apartments');
    expect(sourceForUrl('https://www.example.org/listing')).toBeUndefined();
    expect(sourceForUrl('not a url')).toBeUndefined();
  });

  it('looks families up by id', () => {
    expect(getSource('apartments')?.label).toBe('Apartments.com');
    expect(getSource('rentcom', [])).toBeUndefined();
  });
});
