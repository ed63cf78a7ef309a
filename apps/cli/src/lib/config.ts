import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { DEFAULT_DATABASE_FILENAME } from '@era5-weather/core';
import YAML from 'yaml';
import { z } from 'zod';

import { ConfigurationError } from './errors';
import { pathExists, writeFile } from './fs';
import { LOG_LEVELS } from './logger';
import type { LogLevel } from './logger';

export const DATA_FOLDER_NAME = '.weather_era5';
export const CDSAPIRC_FILENAME = '.cdsapirc';
export const DEFAULT_CDS_URL = 'https://cds.climate.copernicus.eu/api';
export const DEFAULT_BULK_MAX_WORKERS = 5;
export const DEFAULT_POLL_INTERVAL_MS = 5_000;

export interface WeatherCliConfig {
  homeDir: string;
  workspace: string;
  dataDir: string;
  databasePath: string;
  logLevel: LogLevel;
  bulkMaxWorkers: number;
  cds: {
    rcPath: string;
    url: string | null;
    key: string | null;
    pollIntervalMs: number;
  };
}

export interface ConfigOverrides {
  workspace?: string;
  logLevel?: string;
  homeDir?: string;
}

export interface CdsCredentials {
  url: string;
  key: string;
}

const optionalText = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
);

const envSchema = z.object({
  WEATHER_WORKSPACE: optionalText,
  WEATHER_LOG_LEVEL: optionalText,
  WEATHER_BULK_MAX_WORKERS: optionalText,
  WEATHER_CDS_POLL_INTERVAL_MS: optionalText,
  CDSAPI_URL: optionalText,
  CDSAPI_KEY: optionalText
});

const rcValue = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .optional();

const cdsApiRcSchema = z.object({
  url: rcValue,
  key: rcValue
});

export type CdsApiRc = z.infer<typeof cdsApiRcSchema>;

const logLevelSchema = z.enum(LOG_LEVELS);

function parseLogLevel(value: string): LogLevel {
  const result = logLevelSchema.safeParse(value.toLowerCase());
  if (!result.success) {
    throw new ConfigurationError(`Invalid log level '${value}'. Expected one of: ${LOG_LEVELS.join(', ')}`);
  }
  return result.data;
}

export function parsePositiveInteger(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || Number.isNaN(parsed) || parsed <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer`);
  }
  return parsed;
}

/**
 * Resolves configuration from the environment and command line overrides.
 * The workspace defaults to the home directory; data lives under
 * `<workspace>/.weather_era5`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): WeatherCliConfig {
  const values = envSchema.parse(env);
  const homeDir = overrides.homeDir ?? os.homedir();
  const workspace = path.resolve(overrides.workspace?.trim() || values.WEATHER_WORKSPACE || homeDir);
  const dataDir = path.join(workspace, DATA_FOLDER_NAME);

  return {
    homeDir,
    workspace,
    dataDir,
    databasePath: path.join(dataDir, DEFAULT_DATABASE_FILENAME),
    logLevel: parseLogLevel(overrides.logLevel?.trim() || values.WEATHER_LOG_LEVEL || 'info'),
    bulkMaxWorkers: parsePositiveInteger(
      'WEATHER_BULK_MAX_WORKERS',
      values.WEATHER_BULK_MAX_WORKERS,
      DEFAULT_BULK_MAX_WORKERS
    ),
    cds: {
      rcPath: path.join(homeDir, CDSAPIRC_FILENAME),
      url: values.CDSAPI_URL ?? null,
      key: values.CDSAPI_KEY ?? null,
      pollIntervalMs: parsePositiveInteger(
        'WEATHER_CDS_POLL_INTERVAL_MS',
        values.WEATHER_CDS_POLL_INTERVAL_MS,
        DEFAULT_POLL_INTERVAL_MS
      )
    }
  };
}

export async function readCdsApiRc(rcPath: string): Promise<CdsApiRc | null> {
  if (!(await pathExists(rcPath))) {
    return null;
  }
  const text = await fs.readFile(rcPath, 'utf8');
  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Failed to parse ${rcPath}: ${reason}`);
  }
  const result = cdsApiRcSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigurationError(`${rcPath} must contain 'url' and 'key' entries`);
  }
  return result.data;
}

/** Environment variables take precedence over `~/.cdsapirc`. */
export async function resolveCdsCredentials(config: WeatherCliConfig): Promise<CdsCredentials> {
  const rc = config.cds.key && config.cds.url ? null : await readCdsApiRc(config.cds.rcPath);
  const key = config.cds.key ?? (rc?.key || null);
  if (!key) {
    throw new ConfigurationError(
      "Missing CDS API key. Run 'weather configure --token <token>' or set CDSAPI_KEY."
    );
  }
  return {
    url: config.cds.url ?? (rc?.url || DEFAULT_CDS_URL),
    key
  };
}

export async function writeCdsApiRc(rcPath: string, url: string, token: string): Promise<void> {
  await writeFile(rcPath, `url: ${url}\nkey: ${token}\n`, 0o600);
}
