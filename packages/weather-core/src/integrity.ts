import { METADATA_COLUMNS } from './canonical';
import { TimeSeriesFrame } from './frame';

/**
 * A frame is usable when at least one non-metadata column holds a non-null
 * value. Empty frames and frames carrying only coordinates or labels are not.
 */
export function hasUsableData(frame: TimeSeriesFrame): boolean {
  if (frame.rowCount === 0) {
    return false;
  }
  return frame.columnNames
    .filter((name) => !METADATA_COLUMNS.has(name))
    .some((name) => frame.requireColumn(name).some((value) => value !== null));
}
