export type CellValue = number | null;

/**
 * Column-oriented time series keyed by epoch milliseconds.
 *
 * Timestamps are kept ascending and unique; every column holds exactly one
 * cell per timestamp.
 */
export class TimeSeriesFrame {
  readonly timestamps: readonly number[];
  private readonly columnData: Map<string, CellValue[]>;

  constructor(timestamps: number[], columns: Iterable<[string, CellValue[]]> = []) {
    this.timestamps = timestamps;
    this.columnData = new Map();
    for (const [name, values] of columns) {
      this.setColumn(name, values);
    }
  }

  get rowCount(): number {
    return this.timestamps.length;
  }

  get columnNames(): string[] {
    return Array.from(this.columnData.keys());
  }

  get isEmpty(): boolean {
    return this.rowCount === 0 || this.columnData.size === 0;
  }

  hasColumn(name: string): boolean {
    return this.columnData.has(name);
  }

  column(name: string): CellValue[] | undefined {
    return this.columnData.get(name);
  }

  requireColumn(name: string): CellValue[] {
    const values = this.columnData.get(name);
    if (!values) {
      throw new Error(`Column ${name} is not present`);
    }
    return values;
  }

  setColumn(name: string, values: CellValue[]): void {
    if (values.length !== this.timestamps.length) {
      throw new Error(
        `Column ${name} has ${values.length} values but the frame has ${this.timestamps.length} rows`
      );
    }
    this.columnData.set(name, values);
  }

  /** Adds a column repeating one value on every row. */
  setConstantColumn(name: string, value: CellValue): void {
    this.setColumn(
      name,
      this.timestamps.map(() => value)
    );
  }

  /** Returns a new frame with the given columns, in the given order. */
  select(names: string[]): TimeSeriesFrame {
    return new TimeSeriesFrame(
      [...this.timestamps],
      names.map((name) => [name, [...this.requireColumn(name)]] as [string, CellValue[]])
    );
  }

  *rows(): IterableIterator<{ timestamp: number; values: Record<string, CellValue> }> {
    const names = this.columnNames;
    for (let index = 0; index < this.timestamps.length; index += 1) {
      const values: Record<string, CellValue> = {};
      for (const name of names) {
        values[name] = this.requireColumn(name)[index] ?? null;
      }
      yield { timestamp: this.timestamps[index] ?? 0, values };
    }
  }
}

export function firstNonNull(values: readonly CellValue[]): CellValue {
  for (const value of values) {
    if (value !== null && Number.isFinite(value)) {
      return value;
    }
  }
  return null;
}
