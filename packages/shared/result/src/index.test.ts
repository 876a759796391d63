import { describe, expect, it } from 'vitest';
import { fail, ok, toError, type Result } from './index';

const half = (value: number): Result<number, string> => (value % 2 === 0 ? ok(value / 2) : fail(`${value} is odd`));

describe('result helpers', () => {
  it('narrows on the ok flag', () => {
    const good = half(6);
    const bad = half(3);

    expect(good).toEqual({ ok: true, value: 3 });
    expect(bad.ok).toBe(false);
    if (!bad.ok) expect(bad.error).toBe('3 is odd');
  });

  it('keeps errors and wraps other causes', () => {
    const error = new Error('denied');

    expect(toError(error, 'fallback')).toBe(error);
    expect(toError('plain', 'fallback').message).toBe('plain');
    expect(toError(42, 'fallback').message).toBe('fallback');
  });
});
