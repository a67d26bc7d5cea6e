import { Command } from 'commander';
import { buildPipelineConfig, createFileSources, loadEnv } from '@unshipped/pipeline';
import { createVendorClassifier, extractVendorPrefix } from '@unshipped/shared';
import { heading, field, labelColor, json, table, warn } from '../format.js';
import { reportFailure } from '../errors.js';

async function loadRegistry() {
  const config = buildPipelineConfig(loadEnv(), { notify: false });
  return createFileSources(config).loadVendorRegistry();
}

export function registerVendorCommands(program: Command): void {
  const vendors = program
    .command('vendors')
    .description('Vendor registry lookups');

  vendors
    .command('list')
    .description('Show every registered prefix and its label type')
    .option('--json', 'Output as JSON')
    .action(async (opts: { json?: boolean }) => {
      try {
        const { registry, warnings } = await loadRegistry();
        const rows = [...registry.entries()].map(([prefix, label]) => ({ prefix, label }));

        if (opts.json) {
          json(rows);
          return;
        }

        heading(`Vendor registry (${rows.length})`);
        table(['Prefix', 'Label'], rows.map((r) => [r.prefix, r.label]));
        for (const w of warnings) warn(w.message);
      } catch (err: unknown) {
        reportFailure(err);
      }
    });

  vendors
    .command('classify <sku>')
    .description('Show the vendor prefix and label type a SKU resolves to')
    .action(async (sku: string) => {
      try {
        const { registry } = await loadRegistry();
        const prefix = extractVendorPrefix(sku);
        heading(`SKU: ${sku}`);
        field('Prefix', prefix);
        field('Label type', labelColor(createVendorClassifier(registry).classify(prefix)));
      } catch (err: unknown) {
        reportFailure(err);
      }
    });
}
