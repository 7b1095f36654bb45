import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ExportError } from '../../errors.js';
import { columnsOf, mergeFiles, mergeRows, readRows, writeRows } from '../merge.js';

let dir = '';
beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'merge-'));
});
afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('mergeRows', () => {
  it('keeps the first row for each key', () => {
    const base = [{ URL: 'a', Name: 'Oakwood' }];
    const incoming = [
      { URL: ' a ', Name: 'Oakwood Gardens' },
      { URL: 'b', Name: 'Bay Pointe' },
    ];
    expect(mergeRows(base, incoming, ['URL'])).toEqual([
      { URL: 'a', Name: 'Oakwood' },
      { URL: 'b', Name: 'Bay Pointe' },
    ]);
  });

  it('treats a missing key column as empty', () => {
    expect(mergeRows([{ Name: 'x' }], [{ Name: 'y' }], ['URL'])).toEqual([{ Name: 'x' }]);
  });
});

describe('columnsOf', () => {
  it('collects titles in first-seen order', () => {
    expect(columnsOf([{ A: '1' }, { B: '2', A: '3' }])).toEqual(['A', 'B']);
  });
});

describe('mergeFiles', () => {
  it('merges a CSV and an XLSX export', async () => {
    const first = join(dir, 'miami.csv');
    const second = join(dir, 'tampa.xlsx');
    await writeRows([{ 'Source URL': 'https://www.rent.com/x/1', Name: 'Bay Pointe' }], first);
    await writeRows(
      [
        { 'Source URL': 'https://www.rent.com/x/1', Name: 'Bay Pointe (dup)' },
        { 'Source URL': 'https://www.rent.com/x/2', Name: 'Harbor Lofts' },
      ],
      second
    );

    const out = join(dir, 'merged.csv');
    const merged = await mergeFiles([first, second], ['Source URL'], out);

    expect(merged.map(r => r.Name)).toEqual(['Bay Pointe', 'Harbor Lofts']);
    expect(await readRows(out)).toEqual(merged);
  });

  it('reports unreadable files', async () => {
    await expect(readRows(join(dir, 'missing.csv'))).rejects.toBeInstanceOf(ExportError);
  });
});
