import { MissingDataError } from '@era5-weather/core';
import type { CellValue, TimeSeriesFrame } from '@era5-weather/core';

export interface PlotlyTrace {
  type: 'scatter' | 'histogram' | 'table';
  [key: string]: unknown;
}

export interface PlotlyFigure {
  data: PlotlyTrace[];
  layout: Record<string, unknown>;
}

export type DailyReducer = 'mean' | 'max' | 'sum';

export interface DailyValue {
  day: number;
  value: number;
}

export interface DayOfYearStats {
  x: string;
  mean: number;
  max: number;
  min: number;
}

export const SUMMARY_HEADERS = ['Variable', 'Points', 'Start', 'End', 'Mean', 'Median', 'Max (time)', 'Min (time)'];

const DAY_MS = 86_400_000;
const DAY_TICK_FORMAT = '%b %d';
const LEGEND_ABOVE = { orientation: 'h', yanchor: 'bottom', y: 1.02, xanchor: 'right', x: 1 };

function requireData(frame: TimeSeriesFrame): void {
  if (frame.rowCount === 0) {
    throw new MissingDataError('No data available for plotting.', []);
  }
}

function resolveColumn(frame: TimeSeriesFrame, candidates: string[]): string {
  const match = candidates.find((candidate) => frame.hasColumn(candidate));
  if (!match) {
    throw new MissingDataError(`Missing columns: ${candidates.join(', ')}`, candidates);
  }
  return match;
}

function dayStart(timestamp: number): number {
  return Math.floor(timestamp / DAY_MS) * DAY_MS;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatMinute(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 16).replace('T', ' ');
}

function mean(values: number[]): number {
  return values.reduce((total, value) => total + value, 0) / values.length;
}

function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? Number.NaN;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  return ((sorted[middle - 1] ?? upper) + upper) / 2;
}

function reduceValues(values: number[], how: DailyReducer): number {
  switch (how) {
    case 'mean':
      return mean(values);
    case 'max':
      return Math.max(...values);
    case 'sum':
      return values.reduce((total, value) => total + value, 0);
  }
}

/**
 * Buckets values into UTC days, ignoring nulls. For `mean` and `max`, days
 * without values are absent; for `sum`, every day from the first timestamp to
 * the last is present and an empty day sums to 0.
 */
export function dailyAggregate(
  timestamps: readonly number[],
  values: readonly CellValue[],
  how: DailyReducer
): DailyValue[] {
  const buckets = new Map<number, number[]>();
  values.forEach((value, index) => {
    const timestamp = timestamps[index];
    if (value === null || timestamp === undefined) {
      return;
    }
    const day = dayStart(timestamp);
    const bucket = buckets.get(day);
    if (bucket) {
      bucket.push(value);
    } else {
      buckets.set(day, [value]);
    }
  });

  const first = timestamps[0];
  const last = timestamps[timestamps.length - 1];
  if (how === 'sum' && first !== undefined && last !== undefined) {
    for (let day = dayStart(first); day <= dayStart(last); day += DAY_MS) {
      if (!buckets.has(day)) {
        buckets.set(day, []);
      }
    }
  }

  return Array.from(buckets.entries())
    .sort(([a], [b]) => a - b)
    .map(([day, bucket]) => ({ day, value: reduceValues(bucket, how) }));
}

/**
 * Groups daily values by calendar day across years. The x values are dates in
 * the leap year 2000 so that 29 February has a place on the axis.
 */
export function aggregateByDayOfYear(daily: readonly DailyValue[]): DayOfYearStats[] {
  const groups = new Map<string, number[]>();
  for (const { day, value } of daily) {
    const date = new Date(day);
    const key = `${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
    const group = groups.get(key);
    if (group) {
      group.push(value);
    } else {
      groups.set(key, [value]);
    }
  }

  return Array.from(groups.keys())
    .sort()
    .map((key) => {
      const values = groups.get(key) ?? [];
      return { x: `2000-${key}`, mean: mean(values), max: Math.max(...values), min: Math.min(...values) };
    });
}

function bandTraces(
  stats: DayOfYearStats[],
  color: { line: string; band: string; fill: string; mean: string },
  precision: number
): PlotlyTrace[] {
  const x = stats.map((entry) => entry.x);
  return [
    {
      type: 'scatter',
      x,
      y: stats.map((entry) => entry.min),
      mode: 'lines',
      name: 'Min',
      line: { color: color.line, width: 1.5 },
      hovertemplate: `%{x|%b %d}<br>Min: %{y:.${precision}f}<extra></extra>`,
      showlegend: false
    },
    {
      type: 'scatter',
      x,
      y: stats.map((entry) => entry.max),
      mode: 'lines',
      name: 'Range (min-max)',
      line: { color: color.band },
      fill: 'tonexty',
      fillcolor: color.fill,
      hovertemplate: `%{x|%b %d}<br>Max: %{y:.${precision}f}<extra></extra>`
    },
    {
      type: 'scatter',
      x,
      y: stats.map((entry) => entry.mean),
      mode: 'lines',
      name: 'Mean',
      line: { color: color.mean },
      hovertemplate: `%{x|%b %d}<br>Mean: %{y:.${precision}f}<extra></extra>`
    }
  ];
}

/** Per column: point count, time span, mean, median and timed extremes. */
export function createSummaryTable(frame: TimeSeriesFrame): PlotlyFigure {
  requireData(frame);
  const start = formatMinute(frame.timestamps[0] ?? 0);
  const end = formatMinute(frame.timestamps[frame.rowCount - 1] ?? 0);

  const rows: string[][] = [];
  for (const column of frame.columnNames) {
    const points: Array<{ timestamp: number; value: number }> = [];
    frame.requireColumn(column).forEach((value, index) => {
      const timestamp = frame.timestamps[index];
      if (value !== null && timestamp !== undefined) {
        points.push({ timestamp, value });
      }
    });
    const [first, ...rest] = points;
    if (!first) {
      continue;
    }

    let max = first;
    let min = first;
    for (const point of rest) {
      if (point.value > max.value) {
        max = point;
      }
      if (point.value < min.value) {
        min = point;
      }
    }
    const values = points.map((point) => point.value);
    rows.push([
      column,
      String(points.length),
      start,
      end,
      mean(values).toFixed(2),
      median(values).toFixed(2),
      `${max.value.toFixed(2)} (${formatMinute(max.timestamp)})`,
      `${min.value.toFixed(2)} (${formatMinute(min.timestamp)})`
    ]);
  }

  const columns = SUMMARY_HEADERS.map((_, index) => rows.map((row) => row[index] ?? ''));
  return {
    data: [
      {
        type: 'table',
        header: { values: SUMMARY_HEADERS, fill: { color: '#1f77b4' }, font: { color: 'white' } },
        cells: { values: columns }
      }
    ],
    layout: { title: { text: 'Summary' } }
  };
}

export function createTemperatureClimatology(frame: TimeSeriesFrame, name: string): PlotlyFigure {
  requireData(frame);
  const temperature = frame.column('temperature_c');
  if (!temperature) {
    throw new MissingDataError('temperature_c column required for temperature plot.', ['temperature_c']);
  }
  const stats = aggregateByDayOfYear(dailyAggregate(frame.timestamps, temperature, 'mean'));

  return {
    data: bandTraces(
      stats,
      { line: 'rgba(214,39,40,0.45)', band: 'rgba(214,39,40,0.55)', fill: 'rgba(214,39,40,0.10)', mean: '#1f77b4' },
      2
    ),
    layout: {
      title: { text: `Temperature daily climatology for ${name}` },
      xaxis: { title: { text: 'Day of year' }, tickformat: DAY_TICK_FORMAT },
      yaxis: { title: { text: 'Temperature (°C)' } },
      plot_bgcolor: 'white',
      hovermode: 'x unified',
      legend: LEGEND_ABOVE
    }
  };
}

export function createTemperatureHistogram(frame: TimeSeriesFrame): PlotlyFigure {
  requireData(frame);
  const temperature = frame.column('temperature_c');
  if (!temperature) {
    throw new MissingDataError('temperature_c column required for histogram.', ['temperature_c']);
  }

  return {
    data: [
      {
        type: 'histogram',
        x: temperature.filter((value): value is number => value !== null),
        name: 'temperature_c',
        marker: { color: '#1f77b4' },
        opacity: 0.85,
        hovertemplate: '%{x}<br>Count: %{y}<extra></extra>'
      }
    ],
    layout: {
      title: { text: 'Hourly temperature distribution' },
      xaxis: { title: { text: 'Temperature (°C)' } },
      yaxis: { title: { text: 'Counts' } },
      plot_bgcolor: 'white'
    }
  };
}

export function createDailyRadiationMax(frame: TimeSeriesFrame, name: string): PlotlyFigure {
  requireData(frame);
  const solar = resolveColumn(frame, ['surface_solar_radiation_downwards', 'surface-solar-radiation-downwards']);
  const thermal = resolveColumn(frame, ['surface_thermal_radiation_downwards', 'surface-thermal-radiation-downwards']);

  const climatology = (column: string) =>
    aggregateByDayOfYear(dailyAggregate(frame.timestamps, frame.requireColumn(column), 'max'));
  const solarStats = climatology(solar);
  const thermalStats = climatology(thermal);

  return {
    data: [
      {
        type: 'scatter',
        x: solarStats.map((entry) => entry.x),
        y: solarStats.map((entry) => entry.mean),
        mode: 'lines',
        name: 'Solar (daily max mean)',
        line: { color: '#1f77b4' },
        hovertemplate: '%{x|%b %d}<br>Solar mean max: %{y:.2f}<extra></extra>'
      },
      {
        type: 'scatter',
        x: thermalStats.map((entry) => entry.x),
        y: thermalStats.map((entry) => entry.mean),
        mode: 'lines',
        name: 'Thermal (daily max mean)',
        line: { color: '#ff7f0e' },
        hovertemplate: '%{x|%b %d}<br>Thermal mean max: %{y:.2f}<extra></extra>'
      }
    ],
    layout: {
      title: { text: `Daily max radiation climatology for ${name}` },
      xaxis: { title: { text: 'Day of year' }, tickformat: DAY_TICK_FORMAT },
      yaxis: { title: { text: 'W/m²' } },
      plot_bgcolor: 'white',
      hovermode: 'x unified'
    }
  };
}

export function createDailyPrecipitation(frame: TimeSeriesFrame, name: string): PlotlyFigure {
  requireData(frame);
  const column = resolveColumn(frame, ['total_precipitation', 'total-precipitation']);
  const stats = aggregateByDayOfYear(dailyAggregate(frame.timestamps, frame.requireColumn(column), 'sum'));

  return {
    data: bandTraces(
      stats,
      { line: 'rgba(44,160,44,0.45)', band: 'rgba(44,160,44,0.55)', fill: 'rgba(44,160,44,0.10)', mean: '#2ca02c' },
      3
    ),
    layout: {
      title: { text: `Daily total precipitation climatology for ${name}` },
      xaxis: { title: { text: 'Day of year' }, tickformat: DAY_TICK_FORMAT },
      yaxis: { title: { text: 'Precipitation (m)' } },
      plot_bgcolor: 'white',
      hovermode: 'x unified',
      legend: LEGEND_ABOVE
    }
  };
}

export function buildReportFigures(frame: TimeSeriesFrame, name: string): PlotlyFigure[] {
  return [
    createSummaryTable(frame),
    createTemperatureClimatology(frame, name),
    createTemperatureHistogram(frame),
    createDailyRadiationMax(frame, name),
    createDailyPrecipitation(frame, name)
  ];
}
