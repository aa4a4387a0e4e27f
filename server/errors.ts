export type InboxErrorCode = 'VALIDATION_FAILED' | 'CONFLICT' | 'NOT_FOUND';

export class InboxError extends Error {
  readonly code: InboxErrorCode;

  constructor(code: InboxErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends InboxError {
  declare readonly code: 'VALIDATION_FAILED';
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_FAILED', message);
    this.issues = issues;
  }
}

export class ConflictError extends InboxError {
  constructor(message: string) {
    super('CONFLICT', message);
  }
}

export class NotFoundError extends InboxError {
  readonly entity: string;
  readonly id: string;

  constructor(entity: string, id: string | number) {
    super('NOT_FOUND', `${entity} ${id} not found`);
    this.entity = entity;
    this.id = String(id);
  }
}

export function isInboxError(error: unknown): error is InboxError {
  return error instanceof InboxError;
}
