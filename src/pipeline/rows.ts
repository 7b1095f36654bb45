import { buildOutreach } from './messaging.js';
import type { Lead } from './normalize.js';

export const LEAD_COLUMNS = [
  { key: 'propertyName', title: 'Property Name' },
  { key: 'address', title: 'Address' },
  { key: 'managementCompany', title: 'Management Company' },
  { key: 'phone', title: 'Phone' },
  { key: 'email', title: 'Email' },
  { key: 'sourceUrl', title: 'Source URL' },
  { key: 'managementUrl', title: 'Mgmt URL' },
  { key: 'source', title: 'Source' },
] as const satisfies ReadonlyArray<{ key: keyof Lead; title: string }>;

export const MESSAGE_COLUMNS = ['Call Script', 'Email Subject', 'Email Body'] as const;

/** A row keyed by column title. */
export type SheetRow = Record<string, string>;

export type RowOptions = {
  withMessages?: boolean;
  sender?: string;
};

export function columnTitles(withMessages = false): string[] {
  return [...LEAD_COLUMNS.map(c => c.title), ...(withMessages ? MESSAGE_COLUMNS : [])];
}

export function toRows(leads: Lead[], opts: RowOptions = {}): SheetRow[] {
  return leads.map(lead => {
    const row: SheetRow = {};
    for (const { key, title } of LEAD_COLUMNS) row[title] = lead[key];
    if (opts.withMessages) {
      const outreach = buildOutreach(lead, opts.sender);
      row['Call Script'] = outreach.callScript;
      row['Email Subject'] = outreach.email.subject;
      row['Email Body'] = outreach.email.body;
    }
    return row;
  });
}
