import { promises as fs } from 'node:fs';
import path from 'node:path';

import fg from 'fast-glob';

import { readDatasetArchive } from './archive';
import { toCanonicalFrame } from './canonical';
import { AmbiguousDatasetError, DatasetNotFoundError, InputValidationError } from './errors';
import { TimeSeriesFrame } from './frame';

export const DATASET_EXTENSIONS = ['.zip', '.csv'] as const;

export interface DownloadedDataset {
  slug: string;
  path: string;
}

export interface DatasetFilenameParts {
  slug: string;
  country: string | null;
  latitude: number | null;
  longitude: number | null;
}

export function slugify(value: string): string {
  const slug = value.trim().toLowerCase().split(/\s+/).filter(Boolean).join('-');
  return slug || 'dataset';
}

/** Dashes to spaces, title-cased. */
export function humanizeSlug(slug: string): string {
  return slug
    .replace(/-/g, ' ')
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

function coerceCoordinate(label: string, value: unknown): number {
  if (typeof value === 'number') {
    if (Number.isFinite(value)) {
      return value;
    }
  } else if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  throw new InputValidationError(`${label} must be a number, got ${JSON.stringify(value)}`);
}

/** Validates a coordinate pair and returns it as numbers. */
export function validateCoordinates(lat: unknown, lon: unknown): { latitude: number; longitude: number } {
  const latitude = coerceCoordinate('Latitude', lat);
  const longitude = coerceCoordinate('Longitude', lon);
  if (latitude < -90 || latitude > 90) {
    throw new InputValidationError('Latitude must be between -90 and 90');
  }
  if (longitude < -180 || longitude > 360) {
    throw new InputValidationError('Longitude must be between -180 and 360');
  }
  return { latitude, longitude };
}

export function datasetFilename(name: string, latitude: number, longitude: number, country?: string | null): string {
  const countrySegment = country?.trim() ? `_${country.trim().toUpperCase()}` : '';
  return `${slugify(name)}${countrySegment}_${latitude.toFixed(4)}_${longitude.toFixed(4)}.zip`;
}

/**
 * Splits a dataset file stem (`slug[_CC]_lat_lon`) into its parts. Stems
 * without coordinate segments come back with only the slug set.
 */
export function parseDatasetFilename(stem: string): DatasetFilenameParts {
  const segments = stem.split('_');
  const parts: DatasetFilenameParts = { slug: segments[0] ?? stem, country: null, latitude: null, longitude: null };
  if (segments.length < 3) {
    return parts;
  }
  const latitude = Number(segments[segments.length - 2]);
  const longitude = Number(segments[segments.length - 1]);
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    return parts;
  }
  parts.latitude = latitude;
  parts.longitude = longitude;
  if (segments.length >= 4) {
    const country = segments[segments.length - 3];
    parts.country = country && /^[A-Za-z]{2,3}$/.test(country) ? country.toUpperCase() : null;
  }
  return parts;
}

function datasetStem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

async function globSorted(dataDir: string, pattern: string): Promise<string[]> {
  const matches = await fg(pattern, { cwd: dataDir, absolute: true, onlyFiles: true, caseSensitiveMatch: true });
  return matches.sort();
}

/** Archives first, then legacy CSV files, each group sorted by name. */
export async function listDownloadedDatasets(dataDir: string): Promise<DownloadedDataset[]> {
  const archives = await globSorted(dataDir, '*.zip');
  const legacy = await globSorted(dataDir, '*.csv');
  return [...archives, ...legacy].map((filePath) => ({ slug: datasetStem(filePath), path: filePath }));
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

export async function findDatasetPath(dataDir: string, name: string): Promise<string> {
  const slug = fg.escapePath(slugify(name));
  let matches = await globSorted(dataDir, `${slug}_*.zip`);
  if (matches.length === 0) {
    matches = await globSorted(dataDir, `${slug}_*.csv`);
  }

  const [match, ...others] = matches;
  if (!match) {
    for (const extension of DATASET_EXTENSIONS) {
      const legacy = path.join(dataDir, `${slugify(name)}${extension}`);
      if (await fileExists(legacy)) {
        return legacy;
      }
    }
    throw new DatasetNotFoundError(name);
  }
  if (others.length > 0) {
    throw new AmbiguousDatasetError(name, matches);
  }
  return match;
}

/** Loads the canonical time series for a named location. */
export async function loadLocationTimeseries(
  dataDir: string,
  name: string,
  datasetPath?: string
): Promise<TimeSeriesFrame> {
  const resolved = datasetPath ?? (await findDatasetPath(dataDir, name));
  const raw = await readDatasetArchive(resolved);
  return toCanonicalFrame(raw, name);
}
