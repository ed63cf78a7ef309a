import { promises as fs } from 'node:fs';
import path from 'node:path';

import { parse } from 'csv-parse/sync';
import { strFromU8, unzipSync } from 'fflate';

import { DatasetIoError, MissingDataError } from './errors';
import { TimeSeriesFrame, firstNonNull } from './frame';
import type { CellValue } from './frame';

export const TIME_COLUMNS = ['timestamp', 'valid_time', 'time'] as const;
export const LATITUDE_COLUMNS = ['latitude', 'lat'] as const;
export const LONGITUDE_COLUMNS = ['longitude', 'lon'] as const;

export interface CsvFragment {
  name: string;
  rows: string[][];
}

const NAIVE_DATETIME = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/**
 * Parses a timestamp cell. Offset-less date-times are read as UTC; anything
 * `Date.parse` rejects yields `null`.
 */
export function parseTimestamp(raw: string | undefined): number | null {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return null;
  }
  const naive = NAIVE_DATETIME.exec(trimmed);
  const candidate = naive ? `${naive[1]}T${naive[2]}Z` : trimmed;
  const parsed = Date.parse(candidate);
  return Number.isNaN(parsed) ? null : parsed;
}

export function parseNumericCell(raw: string | undefined): CellValue {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

function findColumn(header: string[], candidates: readonly string[]): number {
  for (const candidate of candidates) {
    const index = header.indexOf(candidate);
    if (index >= 0) {
      return index;
    }
  }
  return -1;
}

export function parseCsvText(name: string, text: string): CsvFragment {
  const rows: string[][] = parse(text, {
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    bom: true
  });
  return { name, rows };
}

/**
 * Merges CSV fragments into one frame keyed by timestamp.
 *
 * Columns are unioned across fragments. Where two fragments carry the same
 * column for the same timestamp the first non-null value is kept. Latitude
 * and longitude are taken from the first fragment that has a non-null value
 * and attached once as constant leading columns.
 */
export function mergeFragments(fragments: CsvFragment[]): TimeSeriesFrame {
  let latitude: CellValue = null;
  let longitude: CellValue = null;
  const cells = new Map<number, Map<string, CellValue>>();
  const columnOrder: string[] = [];
  let parsedFragments = 0;

  for (const fragment of fragments) {
    const [header, ...body] = fragment.rows;
    if (!header || header.length === 0) {
      continue;
    }

    const timeIndex = findColumn(header, TIME_COLUMNS);
    if (timeIndex < 0) {
      throw new MissingDataError(
        `CSV ${fragment.name} is missing required time column ('timestamp' or 'valid_time' or 'time').`,
        ['timestamp']
      );
    }
    const latIndex = findColumn(header, LATITUDE_COLUMNS);
    const lonIndex = findColumn(header, LONGITUDE_COLUMNS);

    if (latIndex >= 0 && latitude === null) {
      latitude = firstNonNull(body.map((row) => parseNumericCell(row[latIndex])));
    }
    if (lonIndex >= 0 && longitude === null) {
      longitude = firstNonNull(body.map((row) => parseNumericCell(row[lonIndex])));
    }

    const dataColumns: Array<{ name: string; index: number }> = [];
    header.forEach((name, index) => {
      if (index === timeIndex || index === latIndex || index === lonIndex) {
        return;
      }
      dataColumns.push({ name, index });
      if (!columnOrder.includes(name)) {
        columnOrder.push(name);
      }
    });

    for (const row of body) {
      const timestamp = parseTimestamp(row[timeIndex]);
      if (timestamp === null) {
        continue;
      }
      let rowCells = cells.get(timestamp);
      if (!rowCells) {
        rowCells = new Map();
        cells.set(timestamp, rowCells);
      }
      for (const column of dataColumns) {
        const existing = rowCells.get(column.name);
        if (existing === undefined || existing === null) {
          rowCells.set(column.name, parseNumericCell(row[column.index]));
        }
      }
    }
    parsedFragments += 1;
  }

  if (parsedFragments === 0) {
    throw new MissingDataError('CSV archive is empty after parsing.', []);
  }

  const timestamps = Array.from(cells.keys()).sort((a, b) => a - b);
  const frame = new TimeSeriesFrame(timestamps);
  if (latitude !== null) {
    frame.setConstantColumn('latitude', latitude);
  }
  if (longitude !== null) {
    frame.setConstantColumn('longitude', longitude);
  }
  for (const name of columnOrder) {
    frame.setColumn(
      name,
      timestamps.map((timestamp) => cells.get(timestamp)?.get(name) ?? null)
    );
  }
  return frame;
}

function datasetLabel(datasetPath: string): string {
  return path.basename(datasetPath, path.extname(datasetPath));
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function readArchiveFragments(datasetPath: string): Promise<CsvFragment[]> {
  const label = datasetLabel(datasetPath);
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(datasetPath);
  } catch (error) {
    throw new DatasetIoError(label, datasetPath, describe(error));
  }

  try {
    if (path.extname(datasetPath).toLowerCase() === '.csv') {
      return [parseCsvText(path.basename(datasetPath), buffer.toString('utf8'))];
    }

    const members = unzipSync(new Uint8Array(buffer), {
      filter: (file) => file.name.toLowerCase().endsWith('.csv')
    });
    const names = Object.keys(members).sort();
    if (names.length === 0) {
      throw new DatasetIoError(label, datasetPath, 'archive contains no CSV files');
    }
    return names.map((name) => parseCsvText(name, strFromU8(members[name] ?? new Uint8Array())));
  } catch (error) {
    if (error instanceof DatasetIoError) {
      throw error;
    }
    throw new DatasetIoError(label, datasetPath, describe(error));
  }
}

/** Reads a single CSV or a ZIP of CSV fragments into one merged frame. */
export async function readDatasetArchive(datasetPath: string): Promise<TimeSeriesFrame> {
  const fragments = await readArchiveFragments(datasetPath);
  return mergeFragments(fragments);
}
