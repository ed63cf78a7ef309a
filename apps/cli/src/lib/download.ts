import path from 'node:path';

import { cacheDataset, datasetFilename, validateCoordinates } from '@era5-weather/core';
import type { Workspace } from '@era5-weather/core';
import type { Logger } from 'pino';

import type { CdsRequest, DatasetRetriever } from './cdsClient';
import { ensureDir, pathExists } from './fs';

export const ERA5_DATASET = 'reanalysis-era5-land-timeseries';
export const DATE_RANGE = '2016-01-01/2025-12-31';
export const ERA5_VARIABLES = [
  '2m_dewpoint_temperature',
  '2m_temperature',
  'total_precipitation',
  'surface_solar_radiation_downwards',
  'surface_thermal_radiation_downwards',
  'surface_pressure',
  'snow_cover',
  '10m_u_component_of_wind',
  '10m_v_component_of_wind'
] as const;

export interface DownloadTarget {
  name: string;
  latitude: unknown;
  longitude: unknown;
  country?: string | null;
}

export interface DownloadContext {
  workspace: Workspace;
  logger: Logger;
  retriever: () => Promise<DatasetRetriever>;
}

export type DownloadOutcome =
  | { status: 'skipped'; name: string; datasetPath: string }
  | { status: 'downloaded'; name: string; datasetPath: string };

export function buildTimeseriesRequest(latitude: number, longitude: number): CdsRequest {
  return {
    variable: [...ERA5_VARIABLES],
    location: { longitude, latitude },
    date: [DATE_RANGE],
    data_format: 'csv'
  };
}

/** Archives always land with a `.zip` suffix; the service delivers zipped CSV. */
export function archivePath(targetPath: string): string {
  const extension = path.extname(targetPath);
  if (extension.toLowerCase() === '.zip') {
    return targetPath;
  }
  return `${targetPath.slice(0, targetPath.length - extension.length)}.zip`;
}

export async function downloadTimeseries(
  retriever: DatasetRetriever,
  targetPath: string,
  latitude: number,
  longitude: number,
  logger: Logger
): Promise<string> {
  const destination = archivePath(targetPath);
  logger.info({ latitude, longitude, destination }, 'Requesting ERA5-Land time-series');
  await retriever.retrieve(ERA5_DATASET, buildTimeseriesRequest(latitude, longitude), destination);
  logger.info({ destination }, 'Saved dataset');
  return destination;
}

/**
 * Downloads one location unless its archive is already present, then records
 * the location (display name, country) in the cache.
 */
export async function downloadLocation(context: DownloadContext, target: DownloadTarget): Promise<DownloadOutcome> {
  const { latitude, longitude } = validateCoordinates(target.latitude, target.longitude);
  const { dataDir } = context.workspace;
  const datasetPath = path.join(dataDir, datasetFilename(target.name, latitude, longitude, target.country));

  await ensureDir(dataDir);
  if (await pathExists(datasetPath)) {
    return { status: 'skipped', name: target.name, datasetPath };
  }

  const retriever = await context.retriever();
  await downloadTimeseries(retriever, datasetPath, latitude, longitude, context.logger);
  await cacheDataset(context.workspace, datasetPath, {
    name: target.name,
    country: target.country ?? null
  });
  return { status: 'downloaded', name: target.name, datasetPath };
}
