export class WeatherAppError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WeatherAppError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class AdapterError extends WeatherAppError {
  public readonly adapter: string;

  constructor(adapter: string, message: string, code: string, options?: ErrorOptions) {
    super(message, code, options);
    this.name = 'AdapterError';
    this.adapter = adapter;
  }
}

/** The outbound call could not complete: network, timeout, non-2xx or an unreadable body. */
export class TransportError extends AdapterError {
  public readonly status: number | undefined;

  constructor(adapter: string, message: string, options?: ErrorOptions & { status?: number }) {
    super(adapter, message, `TRANSPORT_${adapter.toUpperCase()}`, options);
    this.name = 'TransportError';
    this.status = options?.status;
  }
}

export class NotFoundError extends AdapterError {
  constructor(adapter: string, message: string, options?: ErrorOptions) {
    super(adapter, message, `NOT_FOUND_${adapter.toUpperCase()}`, options);
    this.name = 'NotFoundError';
  }
}

export class PersistenceError extends WeatherAppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'PERSISTENCE_ERROR', options);
    this.name = 'PersistenceError';
  }
}

export class ConfigError extends WeatherAppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

/**
 * Non-fatal condition the user should see. Returned alongside a result,
 * never thrown.
 */
export class UserNotice extends WeatherAppError {
  constructor(message: string, code = 'USER_NOTICE') {
    super(message, code);
    this.name = 'UserNotice';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
