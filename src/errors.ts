export type LocationOperation = 'geocode' | 'reverseGeocode' | 'route' | 'health';

// Failure of a single provider call: network, non-2xx status or unparseable body
export class ProviderError extends Error {
  readonly provider: string;
  readonly operation: LocationOperation;
  readonly status?: number;

  constructor(
    provider: string,
    operation: LocationOperation,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(`${provider} ${operation} failed: ${message}`, { cause: options.cause });
    this.name = 'ProviderError';
    this.provider = provider;
    this.operation = operation;
    this.status = options.status;
  }
}

export type CacheStoreOperation = 'get' | 'set' | 'remove' | 'exists';

// I/O fault in a cache tier's backing storage
export class CacheBackendError extends Error {
  readonly store: string;
  readonly operation: CacheStoreOperation;

  constructor(store: string, operation: CacheStoreOperation, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${store} cache ${operation} failed: ${reason}`, { cause });
    this.name = 'CacheBackendError';
    this.store = store;
    this.operation = operation;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
