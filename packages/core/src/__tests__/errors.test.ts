import { describe, it, expect } from 'vitest';
import {
  InsufficientDataError,
  NotFoundError,
  PersistenceError,
  ValidationError,
  failure,
  isTaskfitError,
  success,
} from '../errors.js';

describe('errors', () => {
  it('joins violations into the validation message', () => {
    const err = new ValidationError([
      { field: 'complexity', message: 'too big' },
      { field: '', message: 'bad input' },
    ]);
    expect(err.code).toBe('VALIDATION');
    expect(err.message).toBe('complexity: too big; bad input');
    expect(err.name).toBe('ValidationError');
  });

  it('names the missing entity', () => {
    const err = new NotFoundError('progress', '3_1');
    expect(err.code).toBe('NOT_FOUND');
    expect(err.message).toBe('progress not found: 3_1');
    expect(err.entity).toBe('progress');
  });

  it('keeps the underlying cause of a persistence failure', () => {
    const cause = new Error('EACCES');
    const err = new PersistenceError('/data/users.json', 'write', cause);
    expect(err.message).toBe('Failed to write /data/users.json: EACCES');
    expect(err.cause).toBe(cause);
    expect(new PersistenceError('/data/x.json', 'parse').message).toBe('Failed to parse /data/x.json');
  });

  it('recognises only its own errors', () => {
    expect(isTaskfitError(new InsufficientDataError('none'))).toBe(true);
    expect(isTaskfitError(new Error('plain'))).toBe(false);
    expect(isTaskfitError('VALIDATION')).toBe(false);
  });

  it('wraps values and errors as outcomes', () => {
    expect(success(3)).toEqual({ ok: true, value: 3 });
    const err = new InsufficientDataError('none');
    expect(failure(err)).toEqual({ ok: false, error: err });
  });
});
