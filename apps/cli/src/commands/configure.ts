import { InputValidationError } from '@era5-weather/core';
import type { Command } from 'commander';

import { DEFAULT_CDS_URL, writeCdsApiRc } from '../lib/config';
import type { ContextResolver } from '../types';

export function registerConfigureCommand(program: Command, resolveContext: ContextResolver): void {
  program
    .command('configure')
    .description('Write the CDS/ADS API token to ~/.cdsapirc (pass the ADS endpoint via --url)')
    .requiredOption('--token <token>', 'CDS/ADS personal access token')
    .option('--url <url>', 'API endpoint', DEFAULT_CDS_URL)
    .action(async (cmdOptions: { token: string; url: string }) => {
      const token = cmdOptions.token.trim();
      if (!token) {
        throw new InputValidationError('Token cannot be empty.');
      }
      const context = await resolveContext();
      const target = context.config.cds.rcPath;
      await writeCdsApiRc(target, cmdOptions.url.trim() || DEFAULT_CDS_URL, token);
      context.print(`Wrote CDS/ADS token to ${target}`);
    });
}
