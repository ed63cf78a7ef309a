import type { Command } from 'commander';

import { downloadLocation } from '../lib/download';
import type { ContextResolver } from '../types';

type DownloadOptions = {
  name: string;
  lat: string;
  lon: string;
  country?: string;
};

export function registerDownloadCommand(program: Command, resolveContext: ContextResolver): void {
  program
    .command('download')
    .description('Download the ERA5-Land time series (2016-2025) for a single point')
    .requiredOption('--name <name>', 'Location name')
    .requiredOption('--lat <latitude>', 'Latitude in degrees (-90 to 90)')
    .requiredOption('--lon <longitude>', 'Longitude in degrees (-180 to 360)')
    .option('--country <code>', 'Country code stored with the location')
    .action(async (cmdOptions: DownloadOptions) => {
      const context = await resolveContext();
      const outcome = await downloadLocation(context, {
        name: cmdOptions.name,
        latitude: cmdOptions.lat,
        longitude: cmdOptions.lon,
        country: cmdOptions.country ?? null
      });
      if (outcome.status === 'skipped') {
        context.print(`Skipping ${outcome.name}: already present at ${outcome.datasetPath}`);
        return;
      }
      context.print('Download complete.');
    });
}
