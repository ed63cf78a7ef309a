import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { loadLocationTimeseries, slugify } from '@era5-weather/core';
import type { Command } from 'commander';

import { renderReport } from '../lib/report/page';
import type { ContextResolver } from '../types';

export function registerReportCommand(program: Command, resolveContext: ContextResolver): void {
  program
    .command('report')
    .description('Generate an HTML report (summary table and climatology plots) for a location')
    .requiredOption('--name <name>', 'Location name')
    .option('--no-open', 'Do not open the report in a browser')
    .action(async (cmdOptions: { name: string; open: boolean }) => {
      const context = await resolveContext();
      const { dataDir } = context.workspace;
      const frame = await loadLocationTimeseries(dataDir, cmdOptions.name);
      const outputHtml = path.join(dataDir, `${slugify(cmdOptions.name)}.html`);
      await renderReport(frame, cmdOptions.name, outputHtml);
      context.print(`Saved plot to ${outputHtml}`);

      if (cmdOptions.open) {
        try {
          await context.openBrowser(pathToFileURL(outputHtml).href);
        } catch (err) {
          context.logger.warn({ err, outputHtml }, 'Failed to open report in a browser');
        }
      }
    });
}
