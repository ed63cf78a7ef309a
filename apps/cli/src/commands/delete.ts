import { deleteLocation } from '@era5-weather/core';
import type { Command } from 'commander';

import type { ContextResolver } from '../types';

export function registerDeleteCommand(program: Command, resolveContext: ContextResolver): void {
  program
    .command('delete')
    .description('Remove a location from the cache and delete its archive files')
    .requiredOption('--name <name>', 'Location display name or slug')
    .action(async (cmdOptions: { name: string }) => {
      const context = await resolveContext();
      const result = await deleteLocation(context.workspace, cmdOptions.name);

      if (result.locationRows > 0 || result.weatherRows > 0) {
        const displayName = result.location?.name || result.filename;
        const country = result.location?.country || 'Unknown';
        context.print(
          `Deleted '${displayName}' (${country}) from database (${result.weatherRows} records)`
        );
      }
      for (const file of result.deletedFiles) {
        context.print(`Deleted file: ${file}`);
      }
      if (!result.found) {
        context.print(`Location '${cmdOptions.name}' was not found.`);
      }
    });
}
