/**
 * Error hierarchy shared by the pipeline, the store and the read API
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Failure talking to the Legistar API. `status` is unset for network
 * failures and timeouts.
 */
export class SourceApiError extends AppError {
  public readonly status?: number;
  public readonly retryable: boolean;

  constructor(
    message: string,
    details: { status?: number; retryable: boolean; url?: string },
    options?: { cause?: unknown }
  ) {
    super(message, 'SOURCE_API_ERROR', 502, { status: details.status, url: details.url }, options);
    this.status = details.status;
    this.retryable = details.retryable;
  }
}

export class RecordStoreError extends AppError {
  public readonly operation: string;
  public readonly collection: string;
  public readonly detail: string;

  constructor(operation: string, collection: string, detail: string, options?: { cause?: unknown }) {
    super(
      `Record store ${operation} on ${collection} failed: ${detail}`,
      'RECORD_STORE_ERROR',
      502,
      { operation, collection },
      options
    );
    this.operation = operation;
    this.collection = collection;
    this.detail = detail;
  }
}

/** The model could not be invoked. Unparseable responses are not errors. */
export class AnalysisError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'ANALYSIS_FAILED', 502, undefined, options);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    super(
      identifier ? `${resource} with identifier '${identifier}' not found` : `${resource} not found`,
      'NOT_FOUND',
      404,
      { resource, identifier }
    );
  }
}

export class ConfigError extends AppError {
  constructor(message: string, issues: string[]) {
    super(message, 'CONFIG_ERROR', 500, { issues });
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends AppError {
  public readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[]) {
    super(message, 'VALIDATION_ERROR', 422, { issues });
    this.issues = issues;
  }
}

export class InvalidWorkMessageError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_WORK_MESSAGE', 400);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
