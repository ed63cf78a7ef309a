import path from 'node:path';

import type { Command } from 'commander';

import { describeDownloadCommand, readBulkRows } from '../lib/bulkInput';
import { parsePositiveInteger } from '../lib/config';
import { downloadLocation } from '../lib/download';
import { runPool } from '../lib/workerPool';
import type { ContextResolver } from '../types';

type BulkOptions = {
  csv: string;
  maxWorkers?: string;
  dryRun: boolean;
};

function describeError(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}

export function registerBulkDownloadCommand(program: Command, resolveContext: ContextResolver): void {
  program
    .command('bulk-download')
    .description('Download every location listed in a CSV with name,country,lat,lon columns')
    .requiredOption('--csv <path>', 'CSV file with name,country,lat,lon columns')
    .option('--max-workers <count>', 'Maximum parallel downloads (default: 5)')
    .option('--dry-run', 'Print the downloads without running them', false)
    .action(async (cmdOptions: BulkOptions) => {
      const context = await resolveContext();
      const maxWorkers = parsePositiveInteger('--max-workers', cmdOptions.maxWorkers, context.config.bulkMaxWorkers);
      const rows = await readBulkRows(path.resolve(cmdOptions.csv));

      if (rows.length === 0) {
        context.print('No rows found in CSV; nothing to do.');
        return;
      }

      if (cmdOptions.dryRun) {
        for (const row of rows) {
          context.print(`DRY RUN: ${describeDownloadCommand(row)}`);
        }
        return;
      }

      context.print(`Starting downloads for ${rows.length} cities with up to ${maxWorkers} workers...`);
      const outcomes = await runPool(
        rows,
        async (row) => {
          const outcome = await downloadLocation(context, {
            name: row.name,
            latitude: row.lat,
            longitude: row.lon,
            country: row.country || null
          });
          context.logger.info({ name: row.name, status: outcome.status, path: outcome.datasetPath }, 'Bulk item done');
          return outcome;
        },
        { concurrency: maxWorkers }
      );

      const failures = outcomes.filter((outcome) => outcome.status === 'rejected');
      if (failures.length === 0) {
        context.print('All downloads finished successfully.');
        return;
      }
      context.print(`Completed with ${failures.length} failure(s):`);
      for (const failure of failures) {
        context.print(`- ${describeDownloadCommand(failure.item)}`);
        if (failure.status === 'rejected') {
          context.print(`  error: ${describeError(failure.reason)}`);
        }
      }
    });
}
