import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { withRetry } from './db';

describe('withRetry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the first successful result', async () => {
    let calls = 0;
    const result = await withRetry<string>(
      async () => {
        calls++;
        return calls < 3 ? { data: null, error: { message: 'timeout' } } : { data: 'row', error: null };
      },
      3,
      0
    );
    expect(result).toEqual({ data: 'row', error: null });
    expect(calls).toBe(3);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('gives up with the last error', async () => {
    let calls = 0;
    const result = await withRetry<string>(
      async () => {
        calls++;
        return { data: null, error: { message: `failure ${calls}` } };
      },
      3,
      0
    );
    expect(result).toEqual({ data: null, error: { message: 'failure 3' } });
    expect(calls).toBe(3);
  });
});
