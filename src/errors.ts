export class HttpError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

/** The product catalog file could not be turned into a set of valid products. */
export class CatalogError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
    this.name = 'CatalogError';
  }
}

export class ConfigError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(500, message, details);
    this.name = 'ConfigError';
  }
}

/** Status to answer with: HttpError's own, or a numeric `statusCode`/`status` set by middleware such as body-parser. */
export function statusCodeOf(err: unknown): number {
  if (err instanceof HttpError) return err.statusCode;
  if (typeof err === 'object' && err !== null) {
    if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
    if ('status' in err && typeof err.status === 'number') return err.status;
  }
  return 500;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
