import { google } from 'googleapis';
import { isRecord } from '../utils/guards.js';
import { log } from '../utils/log.js';
import { columnTitles, toRows, type RowOptions } from './rows.js';
import type { Lead } from './normalize.js';

/** The handful of Sheets calls the append flow needs. */
export interface SheetsGateway {
  listTabs(spreadsheetId: string): Promise<string[]>;
  addTab(spreadsheetId: string, title: string): Promise<void>;
  readRange(spreadsheetId: string, range: string): Promise<string[][]>;
  appendRows(spreadsheetId: string, range: string, rows: string[][]): Promise<void>;
}

export type SheetsFailureReason = 'auth' | 'not-found' | 'access-denied' | 'unknown';

export type SheetsAppendResult =
  | { ok: true; appended: number }
  | { ok: false; reason: SheetsFailureReason; message: string };

export type SheetsTarget = RowOptions & {
  spreadsheetId: string;
  tab: string;
};

export function createGoogleSheetsGateway(): SheetsGateway {
  const auth = new google.auth.GoogleAuth({
    scopes: ['https://www.googleapis.com/auth/spreadsheets'],
  });
  const sheets = google.sheets({ version: 'v4', auth });

  return {
    async listTabs(spreadsheetId) {
      const res = await sheets.spreadsheets.get({ spreadsheetId, fields: 'sheets.properties.title' });
      return (res.data.sheets ?? []).map(s => s.properties?.title ?? '').filter(Boolean);
    },
    async addTab(spreadsheetId, title) {
      await sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        requestBody: { requests: [{ addSheet: { properties: { title } } }] },
      });
    },
    async readRange(spreadsheetId, range) {
      const res = await sheets.spreadsheets.values.get({ spreadsheetId, range });
      return (res.data.values ?? []).map(row => row.map(cell => String(cell)));
    },
    async appendRows(spreadsheetId, range, rows) {
      await sheets.spreadsheets.values.append({
        spreadsheetId,
        range,
        valueInputOption: 'RAW',
        insertDataOption: 'INSERT_ROWS',
        requestBody: { values: rows },
      });
    },
  };
}

function httpStatusOf(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined;
  if (isRecord(err.response) && typeof err.response.status === 'number') return err.response.status;
  if (typeof err.status === 'number') return err.status;
  if (typeof err.code === 'number') return err.code;
  if (typeof err.code === 'string' && /^\d{3}$/.test(err.code)) return Number(err.code);
  return undefined;
}

export function classifySheetsError(err: unknown): SheetsFailureReason {
  const status = httpStatusOf(err);
  if (status === 401) return 'auth';
  if (status === 403) return 'access-denied';
  if (status === 404) return 'not-found';
  const message = err instanceof Error ? err.message : String(err);
  if (/default credentials|invalid_grant|unauthenticated|invalid_client/i.test(message)) return 'auth';
  return 'unknown';
}

export function tabRange(tab: string, cells: string): string {
  return `'${tab.replace(/'/g, "''")}'!${cells}`;
}

/**
 * Creates the tab when missing, writes the header row into an empty tab, then
 * appends one row per lead in export column order.
 */
export async function googleSheetsAppend(
  leads: Lead[],
  target: SheetsTarget,
  gateway?: SheetsGateway
): Promise<SheetsAppendResult> {
  if (!target.spreadsheetId) {
    return { ok: false, reason: 'not-found', message: 'GOOGLE_SHEETS_ID is not set.' };
  }
  if (!leads.length) return { ok: true, appended: 0 };
  const api = gateway ?? createGoogleSheetsGateway();

  const { spreadsheetId, tab } = target;
  const titles = columnTitles(target.withMessages);
  const rows = toRows(leads, target).map(row => titles.map(t => row[t] ?? ''));

  try {
    const tabs = await api.listTabs(spreadsheetId);
    if (!tabs.includes(tab)) {
      log.info(`Creating Sheets tab "${tab}".`);
      await api.addTab(spreadsheetId, tab);
    }
    const header = await api.readRange(spreadsheetId, tabRange(tab, '1:1'));
    const values = header.some(r => r.length > 0) ? rows : [titles, ...rows];
    await api.appendRows(spreadsheetId, tabRange(tab, 'A1'), values);
  } catch (e) {
    const reason = classifySheetsError(e);
    return { ok: false, reason, message: e instanceof Error ? e.message : String(e) };
  }

  log.info(`Appended ${rows.length} rows to Google Sheets tab "${tab}".`);
  return { ok: true, appended: rows.length };
}
