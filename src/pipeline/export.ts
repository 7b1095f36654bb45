import { writeFile } from 'node:fs/promises';
import { createObjectCsvWriter } from 'csv-writer';
import { DateTime } from 'luxon';
import * as XLSX from 'xlsx';
import { CFG } from '../config.js';
import { ExportError } from '../errors.js';
import { log } from '../utils/log.js';
import type { Lead } from './normalize.js';
import { columnTitles, toRows, type RowOptions, type SheetRow } from './rows.js';
import { googleSheetsAppend } from './sheets.js';

export type ExportFormat = 'csv' | 'xlsx';
export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'xlsx'];

export async function writeCsv(rows: SheetRow[], titles: string[], path: string): Promise<void> {
  const csv = createObjectCsvWriter({
    path,
    header: titles.map(title => ({ id: title, title })),
    alwaysQuote: true,
  });
  try {
    await csv.writeRecords(rows);
  } catch (e) {
    throw new ExportError(`Could not write CSV to ${path}`, path, { cause: e });
  }
}

export async function writeXlsx(rows: SheetRow[], titles: string[], path: string, sheetName = 'Leads'): Promise<void> {
  const workbook = XLSX.utils.book_new();
  const worksheet = XLSX.utils.json_to_sheet(rows, { header: titles });
  XLSX.utils.book_append_sheet(workbook, worksheet, sheetName);
  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  try {
    await writeFile(path, buffer);
  } catch (e) {
    throw new ExportError(`Could not write XLSX to ${path}`, path, { cause: e });
  }
}

export function defaultBasename(now: DateTime = DateTime.now()): string {
  return `multifamily_leads_${now.toFormat('yyyyLLdd_HHmm')}`;
}

export type ExportOptions = RowOptions & {
  basename?: string;
  formats?: readonly ExportFormat[];
  sheets?: boolean;
};

/** Writes the requested files and returns their paths. */
export async function exportLeads(leads: Lead[], opts: ExportOptions = {}): Promise<string[]> {
  if (!leads.length) {
    log.warn('No leads to export.');
    return [];
  }

  const basename = opts.basename || CFG.outBasename || defaultBasename();
  const titles = columnTitles(opts.withMessages);
  const rows = toRows(leads, opts);
  const written: string[] = [];

  for (const format of opts.formats ?? EXPORT_FORMATS) {
    const path = `${basename}.${format}`;
    if (format === 'csv') await writeCsv(rows, titles, path);
    else await writeXlsx(rows, titles, path);
    log.info(`Wrote ${leads.length} leads to`, path);
    written.push(path);
  }

  if (opts.sheets) {
    const result = await googleSheetsAppend(leads, {
      spreadsheetId: CFG.google.sheetId,
      tab: CFG.google.tab,
      withMessages: opts.withMessages,
      sender: opts.sender,
    });
    if (!result.ok) log.error(`Google Sheets append failed (${result.reason}): ${result.message}`);
  }

  return written;
}
