#!/usr/bin/env node
import { Command } from 'commander';
import { buildScanConfig, CFG, loadUrlList, splitList } from './config.js';
import { ConfigError, ExportError } from './errors.js';
import { EXPORT_FORMATS, exportLeads, type ExportFormat } from './pipeline/export.js';
import { mergeFiles } from './pipeline/merge.js';
import { runScan } from './pipeline/scan.js';
import { PageFetcher } from './utils/http.js';
import { log } from './utils/log.js';

type ScanCommandOptions = {
  target?: string;
  city?: string;
  state?: string;
  url?: string;
  urlsFile?: string;
  sources: string;
  pages: string;
  maxRecords: string;
  follow: boolean;
  delayMin: string;
  delayMax: string;
  referer: string;
  timeout: string;
  out?: string;
  format: string;
  messages: boolean;
  sheets: boolean;
};

type MergeCommandOptions = {
  by: string;
  out: string;
};

function parseFormats(value: string): ExportFormat[] {
  const formats: ExportFormat[] = [];
  for (const name of splitList(value)) {
    const format = EXPORT_FORMATS.find(f => f === name.toLowerCase());
    if (!format) throw new ConfigError('format', `Unknown export format "${name}" (use ${EXPORT_FORMATS.join(', ')}).`);
    formats.push(format);
  }
  return formats;
}

const program = new Command();
program
  .name('multifamily-lead-finder')
  .description('Find multifamily property leads on rental listing sites and export to CSV/XLSX/Sheets');

program
  .command('scan', { isDefault: true })
  .description('Crawl listing pages (or a URL list) and extract property leads')
  .option('-t, --target <city-state>', 'City and state, e.g. "Miami, FL"')
  .option('--city <city>', 'City name')
  .option('--state <code>', '2-letter state code')
  .option('-u, --url <searchUrl>', 'A full search URL from a supported site')
  .option('--urls-file <path>', 'Newline-delimited list of property detail URLs')
  .option('-s, --sources <list>', 'Comma-separated sources (apartments, rentcom)', CFG.sources)
  .option('-p, --pages <n>', 'Max listing pages to crawl', String(CFG.maxPages))
  .option('-n, --max-records <n>', 'Max properties to process', String(CFG.maxRecords))
  .option('--no-follow', 'Do not follow "Managed by" links for email/phone')
  .option('--delay-min <seconds>', 'Minimum random delay before each request', String(CFG.delayMin))
  .option('--delay-max <seconds>', 'Maximum random delay before each request', String(CFG.delayMax))
  .option('--referer <url>', 'Referer header to send', CFG.referer)
  .option('--timeout <ms>', 'Per-request timeout', String(CFG.timeoutMs))
  .option('-o, --out <basename>', 'Output file name without extension')
  .option('-f, --format <list>', 'Export formats', EXPORT_FORMATS.join(','))
  .option('--messages', 'Add call script and email columns', false)
  .option('--sheets', 'Append results to Google Sheets', CFG.google.enabled)
  .action(async (opts: ScanCommandOptions) => {
    const formats = parseFormats(opts.format);
    const urls = opts.urlsFile ? await loadUrlList(opts.urlsFile) : undefined;
    const config = buildScanConfig({
      target: opts.target,
      city: opts.city,
      state: opts.state,
      url: opts.url,
      urls,
      sources: opts.sources,
      pages: opts.pages,
      maxRecords: opts.maxRecords,
      follow: opts.follow && CFG.followManagement,
      delayMin: opts.delayMin,
      delayMax: opts.delayMax,
      referer: opts.referer,
      timeoutMs: opts.timeout,
    });

    log.info('Starting scan:', config.target);
    const fetcher = new PageFetcher({ referer: config.referer });
    const state = await runScan(config, { fetcher });

    const { fetched, blocked, failed, rejected } = state.stats;
    log.info(`Requests: ${fetched} (blocked ${blocked}, failed ${failed}); pages skipped: ${rejected}`);
    if (state.outcome !== 'ok') {
      process.exitCode = 2;
      return;
    }

    log.info(`Parsed ${state.leads.length} properties.`);
    await exportLeads(state.leads, {
      basename: opts.out,
      formats,
      withMessages: opts.messages,
      sender: CFG.outreachSender,
      sheets: opts.sheets,
    });
    log.info('Done.');
  });

program
  .command('merge')
  .description('Merge exported CSV/XLSX files and drop duplicate rows')
  .argument('<files...>', 'Files to merge, in priority order')
  .option('--by <columns>', 'Comma-separated columns that identify a duplicate', 'Source URL')
  .option('-o, --out <path>', 'Output file (.csv or .xlsx)', 'merged_leads.csv')
  .action(async (files: string[], opts: MergeCommandOptions) => {
    const rows = await mergeFiles(files, splitList(opts.by), opts.out);
    log.info(`Merged ${files.length} files into ${rows.length} rows at ${opts.out}`);
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  if (e instanceof ConfigError || e instanceof ExportError) log.error(e.message);
  else log.error('Unexpected failure:', e instanceof Error ? (e.stack ?? e.message) : e);
  process.exitCode = 1;
});
