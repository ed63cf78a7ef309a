import { WeatherError } from '@era5-weather/core';

export class ConfigurationError extends WeatherError {
  readonly code = 'CONFIG_INVALID';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class CdsClientError extends WeatherError {
  readonly code = 'CDS_REQUEST_FAILED';
  readonly statusCode: number;
  readonly reason: string | null;
  readonly details: unknown;

  constructor(message: string, options: { statusCode: number; reason?: string | null; details?: unknown }) {
    super(message);
    this.name = 'CdsClientError';
    this.statusCode = options.statusCode;
    this.reason = options.reason ?? null;
    this.details = options.details;
  }
}
