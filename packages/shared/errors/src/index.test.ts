import { describe, expect, it } from 'vitest';
import { AppError, describeError, isAppError } from './index';

class SampleError extends AppError {
  constructor(message: string) {
    super('SAMPLE', message, { scope: 'region', context: { region: 'eu-west-1' } });
  }
}

describe('AppError', () => {
  it('carries code, scope and subclass name', () => {
    const error = new SampleError('list failed');

    expect(error.name).toBe('SampleError');
    expect(error.code).toBe('SAMPLE');
    expect(error.scope).toBe('region');
    expect(error.context).toEqual({ region: 'eu-west-1' });
    expect(isAppError(error)).toBe(true);
  });

  it('defaults to fatal scope and keeps the cause', () => {
    const cause = new Error('root');
    const error = new AppError('BOOT', 'cannot start', { cause });

    expect(error.scope).toBe('fatal');
    expect(error.cause).toBe(cause);
  });
});

describe('describeError', () => {
  it('prefixes non-generic error names', () => {
    const error = new Error('slow down');
    error.name = 'ThrottlingException';

    expect(describeError(error)).toBe('ThrottlingException: slow down');
    expect(describeError(new Error('plain'))).toBe('plain');
    expect(describeError('text')).toBe('text');
  });
});
