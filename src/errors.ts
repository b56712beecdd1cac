export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A checkpoint or database file exists but cannot be read back.
 * Fatal at startup: prior progress is never discarded silently.
 */
export class PersistenceCorruptionError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${filePath})`, options);
    this.name = 'PersistenceCorruptionError';
    this.filePath = filePath;
  }
}

/** Network failure, timeout, rate limiting or a 5xx answer from the catalog. */
export class TransientCatalogError extends Error {
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(message: string, details: { status?: number; retryAfterMs?: number; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.name = 'TransientCatalogError';
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
  }
}

/** The catalog answered, but not in a way that retrying would fix. */
export class CatalogResponseError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'CatalogResponseError';
    this.status = status;
  }
}

export class AssetFetchError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssetFetchError';
    this.code = code;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
