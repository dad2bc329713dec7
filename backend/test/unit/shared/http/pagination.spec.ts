import { describe, it, expect } from 'vitest';
import { AppError } from '../../../../src/shared/http/errors';
import { buildPagination, parsePageRequest } from '../../../../src/shared/http/pagination';

function codeOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof AppError ? err.code : 'not-an-app-error';
  }
}

describe('parsePageRequest', () => {
  it('defaults to limit 100, skip 0', () => {
    expect(parsePageRequest({})).toEqual({ limit: 100, skip: 0 });
    expect(parsePageRequest(undefined)).toEqual({ limit: 100, skip: 0 });
  });

  it('coerces query-string numbers', () => {
    expect(parsePageRequest({ limit: '25', skip: '50' })).toEqual({ limit: 25, skip: 50 });
  });

  it('accepts the bounds', () => {
    expect(parsePageRequest({ limit: '1' })).toEqual({ limit: 1, skip: 0 });
    expect(parsePageRequest({ limit: '1000' })).toEqual({ limit: 1000, skip: 0 });
  });

  it('rejects an out-of-range or non-numeric limit', () => {
    expect(codeOf(() => parsePageRequest({ limit: '0' }))).toBe('INVALID_LIMIT');
    expect(codeOf(() => parsePageRequest({ limit: '1001' }))).toBe('INVALID_LIMIT');
    expect(codeOf(() => parsePageRequest({ limit: 'ten' }))).toBe('INVALID_LIMIT');
    expect(codeOf(() => parsePageRequest({ limit: '2.5' }))).toBe('INVALID_LIMIT');
  });

  it('rejects a negative skip', () => {
    expect(codeOf(() => parsePageRequest({ skip: '-1' }))).toBe('INVALID_SKIP');
  });
});

describe('buildPagination', () => {
  it('reports has_more while items remain after this page', () => {
    expect(buildPagination({ limit: 2, skip: 0 }, 2, 5)).toEqual({
      total_count: 5,
      returned_count: 2,
      limit: 2,
      skip: 0,
      has_more: true,
    });
    expect(buildPagination({ limit: 2, skip: 4 }, 1, 5).has_more).toBe(false);
  });
});
