import { describe, expect, it } from 'vitest';
import { attempt } from '../src/utils/result';
import { DataUnavailableError, InsufficientDataError } from '../src/errors';

describe('attempt', () => {
  it('wraps a resolved value', async () => {
    expect(await attempt('fetch_ticker', async () => 42)).toEqual({ ok: true, value: 42 });
  });

  it('folds a rejection into a labelled data error', async () => {
    const cause = new Error('socket hang up');
    const result = await attempt('fetch_ticker', async () => {
      throw cause;
    });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DataUnavailableError);
    expect(result.error.message).toBe('fetch_ticker: socket hang up');
    expect(result.error.code).toBe('data_unavailable');
    expect(result.error.cause).toBe(cause);
  });

  it('passes domain errors through untouched', async () => {
    const insufficient = new InsufficientDataError('atr', 15, 3);
    const result = await attempt('fetch_candles', async () => {
      throw insufficient;
    });
    expect(result).toEqual({ ok: false, error: insufficient });
    if (result.ok) return;
    expect(result.error.code).toBe('insufficient_data');
  });
});
