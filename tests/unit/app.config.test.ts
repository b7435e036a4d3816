import { afterEach, describe, expect, it, vi } from 'vitest';
import { parseHistoryRetention, parseStoreDriver } from '../../src/connections/config/app.config';

describe('app config', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reads valid store drivers regardless of case', () => {
    const issues: string[] = [];

    expect(parseStoreDriver('Memory', issues)).toBe('memory');
    expect(parseStoreDriver(undefined, issues)).toBe('postgres');
    expect(issues).toEqual([]);
  });

  it('collects an unknown store driver as an issue instead of printing it', () => {
    const warn = vi.spyOn(console, 'warn');
    const issues: string[] = [];

    expect(parseStoreDriver('sqlite', issues)).toBe('postgres');
    expect(issues).toEqual(["Invalid STORE_DRIVER: sqlite, defaulting to 'postgres'"]);
    expect(warn).not.toHaveBeenCalled();
  });

  it('falls back to retaining history for an unknown policy', () => {
    const issues: string[] = [];

    expect(parseHistoryRetention('discard', issues)).toBe('discard');
    expect(parseHistoryRetention('forget', issues)).toBe('retain');
    expect(issues).toEqual(["Invalid HISTORY_RETENTION: forget, defaulting to 'retain'"]);
  });
});
