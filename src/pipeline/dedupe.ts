import { hasIdentity, normalize, type Lead } from './normalize.js';

function dropRepeats(leads: Lead[], keyOf: (l: Lead) => string): Lead[] {
  const seen = new Set<string>();
  const out: Lead[] = [];
  for (const l of leads) {
    const key = keyOf(l);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(l);
  }
  return out;
}

/** First occurrence wins: by source URL, then by (name, address). */
export function dedupe(leads: Lead[]): Lead[] {
  const byUrl = dropRepeats(leads, l => l.sourceUrl);
  return dropRepeats(byUrl, l => JSON.stringify([l.propertyName, l.address]));
}

export function finalize(leads: Lead[]): Lead[] {
  return dedupe(leads.map(normalize).filter(hasIdentity));
}
