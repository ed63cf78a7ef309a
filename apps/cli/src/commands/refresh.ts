import { rebuildCache } from '@era5-weather/core';
import type { Command } from 'commander';

import type { ContextResolver } from '../types';

export function registerRefreshCommand(program: Command, resolveContext: ContextResolver): void {
  program
    .command('refresh-database')
    .description('Rebuild the SQLite cache from every downloaded archive')
    .option('--granular', 'Also store per-timestamp weather rows', false)
    .action(async (cmdOptions: { granular: boolean }) => {
      const context = await resolveContext();
      const result = await rebuildCache(context.workspace, { granular: cmdOptions.granular });

      if (result.datasets === 0) {
        context.print('No datasets found to refresh.');
        return;
      }
      for (const skipped of result.skipped) {
        context.logger.warn({ path: skipped.path, reason: skipped.reason }, 'Skipped dataset');
      }
      context.print(`Refreshed database at ${result.databasePath}`);
      context.print(`Processed: ${result.processed}, Skipped (invalid/empty): ${result.skipped.length}`);
    });
}
