import { EmptyDatasetError, MissingDataError } from './errors';
import { TimeSeriesFrame } from './frame';
import type { CellValue } from './frame';

const KELVIN_OFFSET = 273.15;
const MAGNUS_A = 17.27;
const MAGNUS_B = 237.7;

export const HUMIDITY_COLUMN = 'rh_perc';
export const WIND_SPEED_COLUMN = 'windspeed_ms';

export const CANONICAL_COLUMN_NAMES = [
  'temperature_c',
  'dewpoint_c',
  'total_precipitation',
  'surface_solar_radiation_downwards',
  'surface_thermal_radiation_downwards',
  'surface_pressure',
  'snow_cover',
  'windspeed_u_ms',
  'windspeed_v_ms'
] as const;

export type CanonicalColumn = (typeof CANONICAL_COLUMN_NAMES)[number];

/**
 * Canonical column name -> accepted raw column names. The first raw name
 * present in the merged frame wins.
 */
export const CANONICAL_COLUMNS: Readonly<Record<CanonicalColumn, readonly string[]>> = {
  temperature_c: ['t2m', '2m_temperature'],
  dewpoint_c: ['d2m', '2m_dewpoint_temperature'],
  total_precipitation: ['tp', 'total_precipitation'],
  surface_solar_radiation_downwards: ['ssrd', 'surface_solar_radiation_downwards'],
  surface_thermal_radiation_downwards: ['strd', 'surface_thermal_radiation_downwards'],
  surface_pressure: ['sp', 'surface_pressure'],
  snow_cover: ['snowc', 'snow_cover'],
  windspeed_u_ms: ['u10', '10m_u_component_of_wind'],
  windspeed_v_ms: ['v10', '10m_v_component_of_wind']
};

const KELVIN_COLUMNS: ReadonlySet<CanonicalColumn> = new Set(['temperature_c', 'dewpoint_c']);

export const METADATA_COLUMNS: ReadonlySet<string> = new Set([
  'latitude',
  'longitude',
  'country',
  'name',
  'timestamp'
]);

export function kelvinToCelsius(value: number): number {
  return value - KELVIN_OFFSET;
}

export function resolveRawColumn(frame: TimeSeriesFrame, candidates: readonly string[]): string | null {
  return candidates.find((candidate) => frame.hasColumn(candidate)) ?? null;
}

/** Relative humidity in percent from dewpoint and air temperature, both in °C. */
export function magnusRelativeHumidity(dewpointC: number, temperatureC: number): number {
  const rh =
    100 *
    Math.exp((MAGNUS_A * dewpointC) / (MAGNUS_B + dewpointC) - (MAGNUS_A * temperatureC) / (MAGNUS_B + temperatureC));
  return Math.min(100, Math.max(0, rh));
}

/**
 * Derives relative humidity from raw dewpoint and temperature columns given in
 * Kelvin.
 */
export function relativeHumidity(
  raw: TimeSeriesFrame,
  dewpointColumn = 'd2m',
  temperatureColumn = 't2m'
): CellValue[] {
  const missing = [dewpointColumn, temperatureColumn].filter((column) => !raw.hasColumn(column));
  if (missing.length > 0) {
    throw new MissingDataError(`Missing required column(s): ${missing.join(', ')}`, missing);
  }
  const dewpoint = raw.requireColumn(dewpointColumn);
  const temperature = raw.requireColumn(temperatureColumn);
  return dewpoint.map((td, index) => {
    const t = temperature[index];
    if (td === null || t === null || t === undefined) {
      return null;
    }
    return magnusRelativeHumidity(kelvinToCelsius(td), kelvinToCelsius(t));
  });
}

/** Copy of `raw` with `rh_perc` derived from its dewpoint and temperature columns. */
export function addRelativeHumidity(
  raw: TimeSeriesFrame,
  dewpointColumn = 'd2m',
  temperatureColumn = 't2m'
): TimeSeriesFrame {
  const frame = raw.select(raw.columnNames);
  frame.setColumn(HUMIDITY_COLUMN, relativeHumidity(raw, dewpointColumn, temperatureColumn));
  return frame;
}

export function windSpeed(u: readonly CellValue[], v: readonly CellValue[]): CellValue[] {
  return u.map((east, index) => {
    const north = v[index];
    if (east === null || north === null || north === undefined) {
      return null;
    }
    return Math.hypot(east, north);
  });
}

/**
 * Maps a merged raw frame onto the canonical schema and adds the derived
 * humidity and wind speed columns.
 */
export function toCanonicalFrame(raw: TimeSeriesFrame, locationName: string): TimeSeriesFrame {
  const frame = new TimeSeriesFrame([...raw.timestamps]);
  for (const metadata of ['latitude', 'longitude']) {
    const values = raw.column(metadata);
    if (values) {
      frame.setColumn(metadata, [...values]);
    }
  }

  const missing: string[] = [];
  const sources = new Map<CanonicalColumn, string>();
  for (const canonical of CANONICAL_COLUMN_NAMES) {
    const source = resolveRawColumn(raw, CANONICAL_COLUMNS[canonical]);
    if (!source) {
      missing.push(canonical);
      continue;
    }
    sources.set(canonical, source);
    const values = raw.requireColumn(source);
    frame.setColumn(
      canonical,
      KELVIN_COLUMNS.has(canonical)
        ? values.map((value) => (value === null ? null : kelvinToCelsius(value)))
        : [...values]
    );
  }

  const dewpointSource = sources.get('dewpoint_c');
  const temperatureSource = sources.get('temperature_c');
  if (dewpointSource && temperatureSource) {
    frame.setColumn(HUMIDITY_COLUMN, relativeHumidity(raw, dewpointSource, temperatureSource));
  }

  const uSource = sources.get('windspeed_u_ms');
  const vSource = sources.get('windspeed_v_ms');
  if (uSource && vSource) {
    frame.setColumn(WIND_SPEED_COLUMN, windSpeed(raw.requireColumn(uSource), raw.requireColumn(vSource)));
  }

  if (missing.length > 0) {
    throw new MissingDataError(`Missing variables in dataset: ${missing.join(', ')}`, missing);
  }

  if (frame.isEmpty) {
    throw new EmptyDatasetError(locationName);
  }
  return frame;
}
