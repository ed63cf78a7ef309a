import { listLocations } from '@era5-weather/core';
import type { Command } from 'commander';

import { formatTable } from '../lib/table';
import type { ContextResolver } from '../types';

export const LIST_HEADERS = ['Name', 'Country', 'Lat', 'Lon'];

export function registerListCommand(program: Command, resolveContext: ContextResolver): void {
  program
    .command('list')
    .description('List cached locations')
    .option('--filter <expression>', "Filter such as \"country = SE and lat > 60\" or \"name contains holm\"")
    .action(async (cmdOptions: { filter?: string }) => {
      const context = await resolveContext();
      const result = await listLocations(context.workspace, cmdOptions.filter);
      if (result.status !== 'ok') {
        context.print(result.message ?? '');
        return;
      }
      const rows = result.items.map((item) => [item.name, item.country, item.latitude, item.longitude]);
      context.print(formatTable(LIST_HEADERS, rows));
    });
}
