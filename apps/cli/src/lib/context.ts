import { openWorkspace } from '@era5-weather/core';
import type { Command } from 'commander';

import type { CliDependencies, CommandContext, ContextResolver, GlobalOptions } from '../types';
import { openInBrowser } from './browser';
import { CdsClient } from './cdsClient';
import type { DatasetRetriever } from './cdsClient';
import { loadConfig, resolveCdsCredentials } from './config';
import type { CdsCredentials, WeatherCliConfig } from './config';
import { ensureDir } from './fs';
import { createLogger } from './logger';

export const USER_AGENT = 'era5-weather-cli/0.1.0';

function createRetriever(credentials: CdsCredentials, config: WeatherCliConfig): DatasetRetriever {
  return new CdsClient({
    url: credentials.url,
    key: credentials.key,
    pollIntervalMs: config.cds.pollIntervalMs,
    userAgent: USER_AGENT
  });
}

/**
 * Builds the per-invocation context from the program's global options. The
 * retriever is created on first use so that commands which never reach the
 * network do not need credentials.
 */
export function createContextResolver(program: Command, deps: CliDependencies = {}): ContextResolver {
  const retrieverFactory = deps.retrieverFactory ?? createRetriever;

  return async (): Promise<CommandContext> => {
    const options = program.opts<GlobalOptions>();
    const config = loadConfig(deps.env ?? process.env, {
      workspace: options.workspace,
      logLevel: options.logLevel,
      homeDir: deps.homeDir
    });
    const logger = deps.logger ?? createLogger(config.logLevel);
    await ensureDir(config.dataDir);

    let retriever: Promise<DatasetRetriever> | null = null;
    return {
      config,
      logger,
      workspace: openWorkspace(config.dataDir, config.databasePath),
      print: deps.print ?? ((line: string) => console.log(line)),
      openBrowser: deps.openBrowser ?? openInBrowser,
      retriever: () => {
        if (!retriever) {
          retriever = resolveCdsCredentials(config).then((credentials) => retrieverFactory(credentials, config));
        }
        return retriever;
      }
    };
  };
}
