export type AuditErrorCode =
  | 'malformed_extract'
  | 'empty_group'
  | 'reconciliation_failed'
  | 'extract_format'
  | 'concurrent_run';

export class AuditError extends Error {
  readonly code: AuditErrorCode;
  readonly details?: unknown;

  constructor(code: AuditErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class MalformedExtractError extends AuditError {
  readonly rowId: string;

  constructor(rowId: string, message: string, details?: unknown) {
    super('malformed_extract', message, details);
    this.rowId = rowId;
  }
}

export class EmptyGroupError extends AuditError {
  constructor(message = 'no records to aggregate') {
    super('empty_group', message);
  }
}

export class ReconciliationError extends AuditError {
  constructor(message: string, details?: unknown) {
    super('reconciliation_failed', message, details);
  }
}

export class ExtractFormatError extends AuditError {
  constructor(message: string, details?: unknown) {
    super('extract_format', message, details);
  }
}

export class ConcurrentRunError extends AuditError {
  constructor(message = 'another audit run holds the master table lock') {
    super('concurrent_run', message);
  }
}

export function malformed(rowId: string, message: string, details?: unknown): MalformedExtractError {
  return new MalformedExtractError(rowId, message, details);
}

export function reconciliationFailed(message: string, details?: unknown): ReconciliationError {
  return new ReconciliationError(message, details);
}

export function extractFormat(message: string, details?: unknown): ExtractFormatError {
  return new ExtractFormatError(message, details);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
