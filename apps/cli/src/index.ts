#!/usr/bin/env node

import { Command } from 'commander';

import { registerBulkDownloadCommand } from './commands/bulk';
import { registerConfigureCommand } from './commands/configure';
import { registerDeleteCommand } from './commands/delete';
import { registerDownloadCommand } from './commands/download';
import { registerListCommand } from './commands/list';
import { registerRefreshCommand } from './commands/refresh';
import { registerReportCommand } from './commands/report';
import { registerSaveCommand } from './commands/save';
import { createContextResolver } from './lib/context';
import type { CliDependencies } from './types';

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('weather')
    .description('Download, cache and report ERA5-Land point time series')
    .version('0.1.0')
    .option('--workspace <dir>', 'Directory holding .weather_era5 (default: home directory)')
    .option('--log-level <level>', 'Log level: fatal, error, warn, info, debug, trace or silent');

  const resolveContext = createContextResolver(program, deps);
  registerConfigureCommand(program, resolveContext);
  registerDownloadCommand(program, resolveContext);
  registerSaveCommand(program, resolveContext);
  registerReportCommand(program, resolveContext);
  registerListCommand(program, resolveContext);
  registerDeleteCommand(program, resolveContext);
  registerRefreshCommand(program, resolveContext);
  registerBulkDownloadCommand(program, resolveContext);

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
