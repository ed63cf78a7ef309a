import { promises as fs } from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';
import type { Database as SqliteDatabase } from 'better-sqlite3';
import { z } from 'zod';

import { CANONICAL_COLUMN_NAMES, HUMIDITY_COLUMN, WIND_SPEED_COLUMN } from './canonical';
import { CacheStoreError } from './errors';
import { compileFilter } from './filter';
import type { FilterNode } from './filter';
import { TimeSeriesFrame } from './frame';

export const DEFAULT_DATABASE_FILENAME = 'weather.sqlite';

export const WEATHER_METRIC_COLUMNS: readonly string[] = [
  ...CANONICAL_COLUMN_NAMES,
  HUMIDITY_COLUMN,
  WIND_SPEED_COLUMN
];

export const locationRowSchema = z.object({
  filename: z.string(),
  name: z.string().nullable(),
  country: z.string().nullable(),
  latitude: z.number().nullable(),
  longitude: z.number().nullable()
});

export type LocationRow = z.infer<typeof locationRowSchema>;

export interface DeletedRows {
  location: LocationRow | null;
  locationRows: number;
  weatherRows: number;
}

const countSchema = z.object({ count: z.number().int() });

const LOCATION_COLUMNS = 'filename, name, country, latitude, longitude';

const DATABASE_FILE_SUFFIXES = ['', '-journal', '-wal', '-shm'] as const;

function createSchemaSql(): string {
  const metricColumns = WEATHER_METRIC_COLUMNS.map((column) => `        ${column} REAL`).join(',\n');
  return `
      CREATE TABLE IF NOT EXISTS locations (
        filename TEXT NOT NULL UNIQUE,
        name TEXT,
        country TEXT,
        latitude REAL,
        longitude REAL
      );
      CREATE TABLE IF NOT EXISTS weather (
        filename TEXT NOT NULL,
        name TEXT,
        country TEXT,
        timestamp TEXT NOT NULL,
        latitude REAL,
        longitude REAL,
${metricColumns}
      );
      CREATE INDEX IF NOT EXISTS weather_filename_idx ON weather (filename);
    `;
}

/**
 * SQLite index over the archives of one data directory. Every call opens its
 * own connection and closes it before returning.
 */
export class CacheStore {
  private readonly databaseFile: string;

  constructor(databaseFile: string) {
    this.databaseFile = path.resolve(databaseFile);
  }

  static forDataDir(dataDir: string): CacheStore {
    return new CacheStore(path.join(dataDir, DEFAULT_DATABASE_FILENAME));
  }

  getDatabasePath(): string {
    return this.databaseFile;
  }

  async exists(): Promise<boolean> {
    try {
      const stats = await fs.stat(this.databaseFile);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  /** Deletes the database file, readable or not, and recreates the schema. */
  async reset(): Promise<void> {
    for (const suffix of DATABASE_FILE_SUFFIXES) {
      await fs.rm(`${this.databaseFile}${suffix}`, { force: true });
    }
    await this.withConnection(() => undefined);
  }

  async upsertLocation(row: LocationRow): Promise<void> {
    await this.withConnection((db) => {
      db.prepare(
        `INSERT INTO locations (${LOCATION_COLUMNS})
         VALUES (@filename, @name, @country, @latitude, @longitude)
         ON CONFLICT(filename) DO UPDATE SET
           name = excluded.name,
           country = excluded.country,
           latitude = excluded.latitude,
           longitude = excluded.longitude`
      ).run(row);
    });
  }

  /** Replaces the per-timestamp rows stored for one dataset. */
  async replaceWeatherRows(location: LocationRow, frame: TimeSeriesFrame): Promise<number> {
    const metrics = WEATHER_METRIC_COLUMNS.filter((column) => frame.hasColumn(column));
    const columns = ['filename', 'name', 'country', 'timestamp', 'latitude', 'longitude', ...metrics];
    const insertSql = `INSERT INTO weather (${columns.join(', ')}) VALUES (${columns
      .map((column) => `@${column}`)
      .join(', ')})`;

    return this.withConnection((db) => {
      const remove = db.prepare('DELETE FROM weather WHERE filename = ?');
      const insert = db.prepare(insertSql);
      const write = db.transaction(() => {
        remove.run(location.filename);
        let inserted = 0;
        for (const { timestamp, values } of frame.rows()) {
          const params: Record<string, string | number | null> = {
            filename: location.filename,
            name: location.name,
            country: location.country,
            timestamp: new Date(timestamp).toISOString(),
            latitude: values.latitude ?? location.latitude,
            longitude: values.longitude ?? location.longitude
          };
          for (const metric of metrics) {
            params[metric] = values[metric] ?? null;
          }
          insert.run(params);
          inserted += 1;
        }
        return inserted;
      });
      return write();
    });
  }

  async listLocations(filter: FilterNode | null = null): Promise<LocationRow[]> {
    if (!(await this.exists())) {
      return [];
    }
    const compiled = filter ? compileFilter(filter) : null;
    const where = compiled ? ` WHERE ${compiled.sql}` : '';
    return this.withConnection((db) => {
      const rows = db
        .prepare(`SELECT ${LOCATION_COLUMNS} FROM locations${where} ORDER BY COALESCE(country, '-'), name ASC`)
        .all(...(compiled?.params ?? []));
      return locationRowSchema.array().parse(rows);
    });
  }

  async getLocation(filename: string): Promise<LocationRow | null> {
    if (!(await this.exists())) {
      return null;
    }
    return this.withConnection((db) => {
      const row = db.prepare(`SELECT ${LOCATION_COLUMNS} FROM locations WHERE filename = ?`).get(filename);
      return row === undefined ? null : locationRowSchema.parse(row);
    });
  }

  async countWeatherRows(filename: string): Promise<number> {
    if (!(await this.exists())) {
      return 0;
    }
    return this.withConnection((db) => {
      const row = db.prepare('SELECT COUNT(*) AS count FROM weather WHERE filename = ?').get(filename);
      return countSchema.parse(row).count;
    });
  }

  /** Removes the dataset from both tables in one transaction. */
  async deleteByFilename(filename: string): Promise<DeletedRows> {
    if (!(await this.exists())) {
      return { location: null, locationRows: 0, weatherRows: 0 };
    }
    return this.withConnection((db) => {
      const remove = db.transaction((key: string): DeletedRows => {
        const existing = db.prepare(`SELECT ${LOCATION_COLUMNS} FROM locations WHERE filename = ?`).get(key);
        const weatherRows = db.prepare('DELETE FROM weather WHERE filename = ?').run(key).changes;
        const locationRows = db.prepare('DELETE FROM locations WHERE filename = ?').run(key).changes;
        return {
          location: existing === undefined ? null : locationRowSchema.parse(existing),
          locationRows,
          weatherRows
        };
      });
      return remove(filename);
    });
  }

  private async withConnection<T>(operation: (db: SqliteDatabase) => T): Promise<T> {
    await fs.mkdir(path.dirname(this.databaseFile), { recursive: true });
    let db: SqliteDatabase;
    try {
      db = new Database(this.databaseFile);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      const message = `Failed to open weather cache at ${this.databaseFile}: ${reason}`;
      throw new CacheStoreError(message);
    }

    try {
      db.pragma('busy_timeout = 5000');
      db.exec(createSchemaSql());
      return operation(db);
    } catch (error) {
      if (error instanceof Database.SqliteError) {
        throw new CacheStoreError(
          `Weather cache at ${this.databaseFile} is unusable (${error.code}): ${error.message}. ` +
            "Run 'weather refresh-database' to rebuild it."
        );
      }
      throw error;
    } finally {
      db.close();
    }
  }
}
