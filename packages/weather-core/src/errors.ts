export class WeatherError extends Error {
  readonly code: string = 'WEATHER_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'WeatherError';
  }
}

export class InputValidationError extends WeatherError {
  readonly code = 'INPUT_INVALID';

  constructor(message: string) {
    super(message);
    this.name = 'InputValidationError';
  }
}

export class MissingDataError extends WeatherError {
  readonly code = 'DATA_MISSING';
  readonly missing: string[];

  constructor(message: string, missing: string[]) {
    super(message);
    this.name = 'MissingDataError';
    this.missing = [...missing];
  }
}

export class EmptyDatasetError extends WeatherError {
  readonly code = 'DATASET_EMPTY';

  constructor(name: string) {
    super(`Dataset for '${name}' contains no data.`);
    this.name = 'EmptyDatasetError';
  }
}

export class DatasetIntegrityError extends WeatherError {
  readonly code = 'DATASET_INVALID';

  constructor(name: string) {
    super(`Dataset for '${name}' has no usable data columns.`);
    this.name = 'DatasetIntegrityError';
  }
}

export class DatasetIoError extends WeatherError {
  readonly code = 'DATASET_UNREADABLE';
  readonly datasetPath: string;

  constructor(dataset: string, datasetPath: string, reason: string) {
    super(
      `Failed to open dataset for '${dataset}': ${reason}. ` +
        `The file may be incomplete or corrupt. Delete the file and re-run download: ${datasetPath}`
    );
    this.name = 'DatasetIoError';
    this.datasetPath = datasetPath;
  }
}

export class DatasetNotFoundError extends WeatherError {
  readonly code = 'DATASET_NOT_FOUND';

  constructor(name: string) {
    super(`No dataset found for '${name}'. Run 'weather download --name ${name} --lat ... --lon ...' first.`);
    this.name = 'DatasetNotFoundError';
  }
}

export class AmbiguousDatasetError extends WeatherError {
  readonly code = 'DATASET_AMBIGUOUS';
  readonly candidates: string[];

  constructor(name: string, candidates: string[]) {
    super(
      `Multiple datasets found for '${name}':\n${candidates.join('\n')}\n` +
        'Please delete duplicates or specify a unique name.'
    );
    this.name = 'AmbiguousDatasetError';
    this.candidates = [...candidates];
  }
}

export class FilterSyntaxError extends WeatherError {
  readonly code: string = 'FILTER_INVALID';

  constructor(message: string) {
    super(`Invalid filter: ${message}`);
    this.name = 'FilterSyntaxError';
  }
}

export class UnknownFilterFieldError extends FilterSyntaxError {
  readonly code = 'FILTER_UNKNOWN_FIELD';
  readonly field: string;

  constructor(field: string) {
    super(`Unknown field: ${field}`);
    this.name = 'UnknownFilterFieldError';
    this.field = field;
  }
}

export class CacheStoreError extends WeatherError {
  readonly code = 'CACHE_STORE_FAILED';

  constructor(message: string) {
    super(message);
    this.name = 'CacheStoreError';
  }
}
