export type TaskfitErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'INSUFFICIENT_DATA'
  | 'PERSISTENCE';

/** Base class for every failure the caller surface can report. */
export abstract class TaskfitError extends Error {
  abstract readonly code: TaskfitErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface ConstraintViolation {
  /** Dotted path of the offending field, empty for the input itself */
  field: string;
  message: string;
}

export class ValidationError extends TaskfitError {
  readonly code = 'VALIDATION' as const;

  constructor(readonly violations: ConstraintViolation[]) {
    super(
      violations
        .map((v) => (v.field ? `${v.field}: ${v.message}` : v.message))
        .join('; '),
    );
  }
}

export type EntityKind = 'user' | 'task' | 'progress';

export class NotFoundError extends TaskfitError {
  readonly code = 'NOT_FOUND' as const;

  constructor(
    readonly entity: EntityKind,
    readonly key: number | string,
  ) {
    super(`${entity} not found: ${key}`);
  }
}

export class InsufficientDataError extends TaskfitError {
  readonly code = 'INSUFFICIENT_DATA' as const;
}

export class PersistenceError extends TaskfitError {
  readonly code = 'PERSISTENCE' as const;

  constructor(
    readonly filePath: string,
    action: 'read' | 'write' | 'parse',
    cause?: unknown,
  ) {
    super(`Failed to ${action} ${filePath}${describeCause(cause)}`, { cause });
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return `: ${cause.message}`;
  if (cause === undefined) return '';
  return `: ${String(cause)}`;
}

export function isTaskfitError(value: unknown): value is TaskfitError {
  return value instanceof TaskfitError;
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: TaskfitError };

export function success<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

export function failure<T = never>(error: TaskfitError): Outcome<T> {
  return { ok: false, error };
}
