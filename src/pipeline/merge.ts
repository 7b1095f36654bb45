import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { ExportError } from '../errors.js';
import { writeCsv, writeXlsx } from './export.js';
import type { SheetRow } from './rows.js';

const Rows = z.array(z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String)));

function isXlsx(path: string): boolean {
  return ['.xlsx', '.xls'].includes(extname(path).toLowerCase());
}

/** Reads a CSV or XLSX export (first sheet) into title-keyed rows. */
export async function readRows(path: string): Promise<SheetRow[]> {
  let content: Buffer;
  try {
    content = await readFile(path);
  } catch (e) {
    throw new ExportError(`Could not read ${path}`, path, { cause: e });
  }

  if (isXlsx(path)) {
    const workbook = XLSX.read(content, { type: 'buffer' });
    const first = workbook.SheetNames[0];
    const sheet = first ? workbook.Sheets[first] : undefined;
    if (!sheet) return [];
    return Rows.parse(XLSX.utils.sheet_to_json(sheet, { defval: '', raw: false }));
  }

  const records: unknown = parse(content, { columns: true, skip_empty_lines: true, bom: true });
  return Rows.parse(records);
}

/** Appends `incoming` to `base`, keeping the first row for each key built from `by`. */
export function mergeRows(base: SheetRow[], incoming: SheetRow[], by: string[]): SheetRow[] {
  const seen = new Set<string>();
  const out: SheetRow[] = [];
  for (const row of [...base, ...incoming]) {
    const key = JSON.stringify(by.map(col => (row[col] ?? '').trim()));
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(row);
  }
  return out;
}

/** Column titles in first-seen order across all rows. */
export function columnsOf(rows: SheetRow[]): string[] {
  const titles = new Set<string>();
  for (const row of rows) for (const key of Object.keys(row)) titles.add(key);
  return [...titles];
}

export async function writeRows(rows: SheetRow[], path: string): Promise<void> {
  const titles = columnsOf(rows);
  if (isXlsx(path)) await writeXlsx(rows, titles, path);
  else await writeCsv(rows, titles, path);
}

export async function mergeFiles(paths: string[], by: string[], outPath: string): Promise<SheetRow[]> {
  let merged: SheetRow[] = [];
  for (const path of paths) merged = mergeRows(merged, await readRows(path), by);
  await writeRows(merged, outPath);
  return merged;
}
