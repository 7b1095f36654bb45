export type CityRegion = {
  city: string;
  region: string;
};

const CITY_STATE_RE = /^\s*([A-Za-z][A-Za-z\s.'-]*?)\s*,\s*([A-Za-z]{2})\s*$/;

/** Parses a "Miami, FL" style target. */
export function parseCityRegion(text?: string): CityRegion | undefined {
  if (!text) return undefined;
  const m = text.match(CITY_STATE_RE);
  if (!m?.[1] || !m[2]) return undefined;
  return { city: m[1].replace(/\s+/g, ' '), region: m[2].toUpperCase() };
}

export function slugify(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/[\s_]+/g, '-')
    .replace(/[^a-z0-9-]/g, '')
    .replace(/-+/g, '-')
    .replace(/^-|-$/g, '');
}
