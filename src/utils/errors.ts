export class EngineError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'EngineError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends EngineError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(message, `ADAPTER_${adapter.toUpperCase()}`, options);
    this.name = 'AdapterError';
  }
}

export class WeatherFetchError extends AdapterError {
  public readonly status: number | undefined;

  constructor(message: string, status?: number, options?: ErrorOptions) {
    super('WEATHER', message, options);
    this.name = 'WeatherFetchError';
    this.status = status;
  }
}

export class ValidationError extends EngineError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, 'VALIDATION_ERROR', options);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class ConfigError extends EngineError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
