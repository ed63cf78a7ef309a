import type { Workspace } from '@era5-weather/core';
import type { Logger } from 'pino';

import type { DatasetRetriever } from './lib/cdsClient';
import type { CdsCredentials, WeatherCliConfig } from './lib/config';

export type GlobalOptions = {
  workspace?: string;
  logLevel?: string;
};

export type CliDependencies = {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  print?: (line: string) => void;
  logger?: Logger;
  retrieverFactory?: (credentials: CdsCredentials, config: WeatherCliConfig) => DatasetRetriever;
  openBrowser?: (target: string) => Promise<void>;
};

export interface CommandContext {
  config: WeatherCliConfig;
  logger: Logger;
  workspace: Workspace;
  print: (line: string) => void;
  openBrowser: (target: string) => Promise<void>;
  retriever: () => Promise<DatasetRetriever>;
}

export type ContextResolver = () => Promise<CommandContext>;
