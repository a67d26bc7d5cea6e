import { Command, InvalidArgumentError } from 'commander';
import {
  buildPipelineConfig,
  createFileSources,
  loadEnv,
  runUnshippedReconciliation,
  VENDOR_COUNT_HEADERS,
  type PipelineOverrides,
  type RunResult,
} from '@unshipped/pipeline';
import { heading, field, success, warn, table } from '../format.js';
import { reportFailure } from '../errors.js';

export interface RunOptions {
  uploadDir?: string;
  outputDir?: string;
  enrichment?: boolean;
  notify?: boolean;
  bulkBuy?: boolean;
  concurrency?: number;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/** Only flags the user actually passed become overrides */
export function toOverrides(opts: RunOptions): PipelineOverrides {
  const overrides: PipelineOverrides = {};
  if (opts.uploadDir !== undefined) overrides.uploadDir = opts.uploadDir;
  if (opts.outputDir !== undefined) overrides.outputDir = opts.outputDir;
  if (opts.enrichment !== undefined) overrides.enableEnrichment = opts.enrichment;
  if (opts.notify !== undefined) overrides.notify = opts.notify;
  if (opts.bulkBuy !== undefined) overrides.enableBulkBuyCheck = opts.bulkBuy;
  if (opts.concurrency !== undefined) overrides.vendorConcurrency = opts.concurrency;
  return overrides;
}

function printResult(result: RunResult): void {
  const { counts, aggregate } = result;

  heading('Unshipped Orders Summary');
  field('Label vendors', counts.labelVendorOrders);
  field('Non-label vendors', counts.nonLabelVendorOrders);
  field('Unknown vendors', aggregate.partitions.unknown.length);
  field('Total orders', counts.totalOrders);
  field('New SKUs', counts.newSkuOrders);
  field('Removed (RET/INV)', counts.removedRows);
  field('Batch duplicates', result.duplicateRows.length);
  if (counts.bulkBuyOrders !== undefined) field('Bulk buys', counts.bulkBuyOrders);
  if (result.enrichment) {
    field('Enriched SKUs', `${result.enrichment.enrichedSkus}/${result.enrichment.requestedSkus}`);
  }
  field('Notification', result.notification);

  heading('Orders per vendor');
  table(VENDOR_COUNT_HEADERS, aggregate.vendorOrderCounts.map((c) => [c.vendor, c.orderCount]));

  if (result.warnings.length > 0) {
    heading(`Warnings (${result.warnings.length})`);
    for (const w of result.warnings) {
      warn(`[${w.stage}] ${w.message}`);
    }
  }

  console.log();
  success(`Report written to ${result.reportFile}`);
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Reconcile the unshipped batch against the master sheets and write the report')
    .option('--upload-dir <dir>', 'Folder with the .txt batch and the new master workbook')
    .option('--output-dir <dir>', 'Folder the report workbook is written to')
    .option('--enrichment', 'Fetch SKU attributes (overrides ENABLE_ENRICHMENT)')
    .option('--no-enrichment', 'Skip SKU attribute enrichment')
    .option('--notify', 'Send the summary to Discord (default when a webhook is set)')
    .option('--no-notify', 'Do not send the Discord summary')
    .option('--bulk-buy', 'List bulk-buy orders on their own sheet')
    .option('--concurrency <n>', 'Vendors reconciled concurrently', parsePositiveInt)
    .action(async (opts: RunOptions) => {
      try {
        const config = buildPipelineConfig(loadEnv(), toOverrides(opts));
        const result = await runUnshippedReconciliation(config, { sources: createFileSources(config) });
        printResult(result);
      } catch (err: unknown) {
        reportFailure(err);
      }
    });
}
