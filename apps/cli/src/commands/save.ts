import path from 'node:path';

import { loadLocationTimeseries, slugify } from '@era5-weather/core';
import type { Command } from 'commander';

import { saveFrameAsCsv } from '../lib/export';
import type { ContextResolver } from '../types';

export function registerSaveCommand(program: Command, resolveContext: ContextResolver): void {
  program
    .command('save')
    .description('Save the canonical time series of a downloaded location to CSV')
    .requiredOption('--name <name>', 'Location name')
    .option('--output <path>', 'Output file (default: <data dir>/<slug>.csv)')
    .action(async (cmdOptions: { name: string; output?: string }) => {
      const context = await resolveContext();
      const { dataDir } = context.workspace;
      const frame = await loadLocationTimeseries(dataDir, cmdOptions.name);
      const outputPath = cmdOptions.output
        ? path.resolve(cmdOptions.output)
        : path.join(dataDir, `${slugify(cmdOptions.name)}.csv`);
      await saveFrameAsCsv(frame, outputPath);
      context.print(`Saved data to ${outputPath}`);
    });
}
