import { promises as fs } from 'node:fs';
import path from 'node:path';

import fg from 'fast-glob';

import { CacheStore } from './cacheStore';
import type { LocationRow } from './cacheStore';
import {
  listDownloadedDatasets,
  loadLocationTimeseries,
  parseDatasetFilename,
  humanizeSlug,
  slugify
} from './datasets';
import { AmbiguousDatasetError, CacheStoreError, DatasetIntegrityError, WeatherError } from './errors';
import { parseFilter } from './filter';
import { firstNonNull } from './frame';
import { hasUsableData } from './integrity';

export const NO_CACHE_MESSAGE = "No cached datasets found. Run 'weather refresh-database' after downloading data.";
export const NO_MATCH_MESSAGE = 'No cached datasets match the filter.';

/** Explicit handle on one data directory and the cache that mirrors it. */
export interface Workspace {
  dataDir: string;
  store: CacheStore;
}

export function openWorkspace(dataDir: string, databaseFile?: string): Workspace {
  const resolved = path.resolve(dataDir);
  return {
    dataDir: resolved,
    store: databaseFile ? new CacheStore(databaseFile) : CacheStore.forDataDir(resolved)
  };
}

export interface CacheDatasetOptions {
  name?: string | null;
  country?: string | null;
  granular?: boolean;
}

export interface CachedDataset {
  location: LocationRow;
  weatherRows: number;
}

export interface RebuildOptions {
  granular?: boolean;
}

export interface SkippedDataset {
  path: string;
  reason: string;
}

export interface RebuildResult {
  databasePath: string;
  datasets: number;
  processed: number;
  skipped: SkippedDataset[];
}

export interface DeleteResult {
  name: string;
  filename: string;
  location: LocationRow | null;
  locationRows: number;
  weatherRows: number;
  deletedFiles: string[];
  found: boolean;
}

export interface LocationListing {
  filename: string;
  name: string;
  country: string;
  latitude: string;
  longitude: string;
}

export type ListStatus = 'ok' | 'no-cache' | 'no-match';

export interface ListResult {
  status: ListStatus;
  items: LocationListing[];
  message: string | null;
}

function datasetKey(datasetPath: string): string {
  return path.basename(datasetPath, path.extname(datasetPath));
}

/**
 * Loads, validates and indexes one archive. Display name and country fall
 * back to what the file name encodes.
 */
export async function cacheDataset(
  workspace: Workspace,
  datasetPath: string,
  options: CacheDatasetOptions = {}
): Promise<CachedDataset> {
  const filename = datasetKey(datasetPath);
  const parts = parseDatasetFilename(filename);
  const label = options.name ?? filename;
  const frame = await loadLocationTimeseries(workspace.dataDir, label, datasetPath);
  if (!hasUsableData(frame)) {
    throw new DatasetIntegrityError(label);
  }

  const location: LocationRow = {
    filename,
    name: options.name?.trim() || null,
    country: options.country?.trim() || parts.country,
    latitude: firstNonNull(frame.column('latitude') ?? []) ?? parts.latitude,
    longitude: firstNonNull(frame.column('longitude') ?? []) ?? parts.longitude
  };
  await workspace.store.upsertLocation(location);

  let weatherRows = 0;
  if (options.granular) {
    weatherRows = await workspace.store.replaceWeatherRows(location, frame);
  }
  return { location, weatherRows };
}

// An unreadable cache has no display names to carry over.
async function readPreviousLocations(workspace: Workspace): Promise<Map<string, LocationRow>> {
  try {
    const rows = await workspace.store.listLocations();
    return new Map(rows.map((row) => [row.filename, row] as const));
  } catch (error) {
    if (error instanceof CacheStoreError) {
      return new Map();
    }
    throw error;
  }
}

/**
 * Rebuilds the cache from every archive in the data directory. Archives that
 * cannot be loaded or hold no usable data are skipped. Display names and
 * countries recorded before the rebuild are carried over.
 */
export async function rebuildCache(workspace: Workspace, options: RebuildOptions = {}): Promise<RebuildResult> {
  const previous = await readPreviousLocations(workspace);
  await workspace.store.reset();

  const datasets = await listDownloadedDatasets(workspace.dataDir);
  const skipped: SkippedDataset[] = [];
  let processed = 0;

  for (const dataset of datasets) {
    const known = previous.get(dataset.slug);
    try {
      await cacheDataset(workspace, dataset.path, {
        name: known?.name,
        country: known?.country,
        granular: options.granular
      });
      processed += 1;
    } catch (error) {
      if (!(error instanceof WeatherError)) {
        throw error;
      }
      skipped.push({ path: dataset.path, reason: error.message });
    }
  }

  return {
    databasePath: workspace.store.getDatabasePath(),
    datasets: datasets.length,
    processed,
    skipped
  };
}

function uniqueFilenames(rows: LocationRow[]): string[] {
  return Array.from(new Set(rows.map((row) => row.filename))).sort();
}

/**
 * Resolves a location to its cache key: display name first (case-insensitive),
 * then slug equivalence. Returns `null` when nothing matches.
 */
export async function resolveCacheKey(workspace: Workspace, name: string): Promise<string | null> {
  const rows = await workspace.store.listLocations();
  const wanted = name.trim().toLowerCase();
  const slug = slugify(name);

  const byName = uniqueFilenames(rows.filter((row) => row.name?.trim().toLowerCase() === wanted));
  const candidates =
    byName.length > 0
      ? byName
      : uniqueFilenames(
          rows.filter(
            (row) =>
              row.filename === slug ||
              parseDatasetFilename(row.filename).slug === slug ||
              (row.name !== null && slugify(row.name) === slug)
          )
        );

  const [match, ...others] = candidates;
  if (!match) {
    return null;
  }
  if (others.length > 0) {
    throw new AmbiguousDatasetError(name, candidates);
  }
  return match;
}

/** Removes a location's cache rows and its archive files. */
export async function deleteLocation(workspace: Workspace, name: string): Promise<DeleteResult> {
  const filename = (await resolveCacheKey(workspace, name)) ?? slugify(name);
  const deleted = await workspace.store.deleteByFilename(filename);

  const key = fg.escapePath(filename);
  const patterns = [`${key}.zip`, `${key}.csv`, `${key}_*.zip`, `${key}_*.csv`];
  const files = await fg(patterns, { cwd: workspace.dataDir, absolute: true, onlyFiles: true, unique: true });
  const deletedFiles: string[] = [];
  for (const file of files.sort()) {
    await fs.unlink(file);
    deletedFiles.push(path.basename(file));
  }

  return {
    name,
    filename,
    location: deleted.location,
    locationRows: deleted.locationRows,
    weatherRows: deleted.weatherRows,
    deletedFiles,
    found: deleted.locationRows > 0 || deleted.weatherRows > 0 || deletedFiles.length > 0
  };
}

/** Stored display name unless it merely repeats the file name; else the humanized slug. */
export function friendlyName(filename: string, name: string | null): string {
  const trimmed = name?.trim();
  if (trimmed && trimmed.toLowerCase() !== filename.trim().toLowerCase()) {
    return trimmed;
  }
  const base = filename.includes('_') ? (filename.split('_')[0] ?? filename) : filename;
  return humanizeSlug(base) || filename;
}

export function formatCoordinate(value: number | null): string {
  return value === null || !Number.isFinite(value) ? '-' : value.toFixed(4);
}

function compareText(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

/** Lists cached locations, optionally narrowed by a filter expression. */
export async function listLocations(workspace: Workspace, filterExpression?: string | null): Promise<ListResult> {
  const filter = filterExpression ? parseFilter(filterExpression) : null;

  if (!(await workspace.store.exists())) {
    return { status: 'no-cache', items: [], message: NO_CACHE_MESSAGE };
  }

  const rows = await workspace.store.listLocations(filter);
  if (rows.length === 0) {
    return filter
      ? { status: 'no-match', items: [], message: NO_MATCH_MESSAGE }
      : { status: 'no-cache', items: [], message: NO_CACHE_MESSAGE };
  }

  const items = rows
    .map((row) => ({
      filename: row.filename,
      name: friendlyName(row.filename, row.name),
      country: row.country?.trim() || '-',
      latitude: formatCoordinate(row.latitude),
      longitude: formatCoordinate(row.longitude)
    }))
    .sort((a, b) => compareText(a.country, b.country) || compareText(a.name, b.name));

  return { status: 'ok', items, message: null };
}
