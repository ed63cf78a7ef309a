import type { TimeSeriesFrame } from '@era5-weather/core';

import { writeFile } from './fs';

/** One row per timestamp, `timestamp` first, empty cells for missing values. */
export function frameToCsv(frame: TimeSeriesFrame): string {
  const columns = frame.columnNames;
  const lines: string[] = [['timestamp', ...columns].join(',')];
  for (const { timestamp, values } of frame.rows()) {
    const cells = columns.map((column) => {
      const value = values[column];
      return value === null || value === undefined ? '' : String(value);
    });
    lines.push([new Date(timestamp).toISOString(), ...cells].join(','));
  }
  return `${lines.join('\n')}\n`;
}

export async function saveFrameAsCsv(frame: TimeSeriesFrame, outputPath: string): Promise<void> {
  await writeFile(outputPath, frameToCsv(frame));
}
