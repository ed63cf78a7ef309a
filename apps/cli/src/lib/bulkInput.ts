import { promises as fs } from 'node:fs';

import { InputValidationError } from '@era5-weather/core';
import { parse } from 'csv-parse/sync';

import { pathExists } from './fs';

export const BULK_COLUMNS = ['name', 'country', 'lat', 'lon'] as const;

export type BulkColumn = (typeof BULK_COLUMNS)[number];

export type BulkRow = Record<BulkColumn, string>;

/**
 * Reads the bulk download list. Header names are matched case-insensitively
 * after trimming; every cell is trimmed.
 */
export async function readBulkRows(csvPath: string): Promise<BulkRow[]> {
  if (!(await pathExists(csvPath))) {
    throw new InputValidationError(`CSV not found: ${csvPath}`);
  }
  const text = await fs.readFile(csvPath, 'utf8');
  const records: string[][] = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true
  });

  const [header, ...body] = records;
  if (!header || header.length === 0) {
    throw new InputValidationError('CSV is missing a header row.');
  }

  const positions = new Map(header.map((name, index) => [name.trim().toLowerCase(), index] as const));
  const missing = BULK_COLUMNS.filter((column) => !positions.has(column)).sort();
  if (missing.length > 0) {
    throw new InputValidationError(`CSV missing required columns: ${missing.join(', ')}`);
  }

  const cell = (row: string[], column: BulkColumn): string => {
    const index = positions.get(column);
    return index === undefined ? '' : (row[index] ?? '').trim();
  };

  return body.map((row) => ({
    name: cell(row, 'name'),
    country: cell(row, 'country'),
    lat: cell(row, 'lat'),
    lon: cell(row, 'lon')
  }));
}

export function describeDownloadCommand(row: BulkRow): string {
  return ['weather', 'download', '--name', row.name, '--country', row.country, '--lat', row.lat, '--lon', row.lon].join(
    ' '
  );
}
