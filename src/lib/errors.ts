/**
 * Errors raised when an upstream collaborator fails or returns data we
 * cannot use. User-correctable input problems are notices, not errors
 * (see `@/lib/analysis/types`).
 */

export type AppErrorCode = 'geocoder_failed' | 'store_failed' | 'geometry_invalid' | 'grid_invalid' | 'invalid_request';

export class AppError extends Error {
  readonly code: AppErrorCode;

  constructor(code: AppErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class GeocodingError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('geocoder_failed', message, options);
  }
}

export class SpatialQueryError extends AppError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('store_failed', message, options);
    this.source = source;
  }
}

export class GeometryParseError extends AppError {
  readonly source: string;
  readonly rowIndex: number;

  constructor(source: string, rowIndex: number, reason: string) {
    super('geometry_invalid', `Invalid geography in ${source} at row ${rowIndex}: ${reason}`);
    this.source = source;
    this.rowIndex = rowIndex;
  }
}

export class GridDataError extends AppError {
  readonly cellId: string;
  readonly column: string;

  constructor(cellId: string, column: string, value: unknown) {
    super('grid_invalid', `Invalid ${column} for grid cell ${cellId}: ${JSON.stringify(value)}`);
    this.cellId = cellId;
    this.column = column;
  }
}

export class InvalidRequestError extends AppError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('invalid_request', `Invalid request: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
