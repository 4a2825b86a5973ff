import { describe, it, expect } from 'vitest';
import {
  XrayDbError,
  describeValue,
  formatError,
  isXrayDbError,
  notFound,
  unresolvedIdentifier,
  upstreamError,
  validationError,
} from '../src/shared/index.js';
import { Element } from '../src/model/index.js';

describe('XrayDbError', () => {
  it('marks only upstream failures as retryable', () => {
    expect(upstreamError('sqlite3 query failed').retryable).toBe(true);
    expect(notFound('missing').retryable).toBe(false);
    expect(validationError('bad', { field: 'f', expected: 'e', actual: 1 }).retryable).toBe(false);
  });

  it('serialises its code and data', () => {
    const err = notFound('No stored transition set', { kind: 'transitionset' });
    expect(err.toJSON()).toEqual({
      name: 'XrayDbError',
      code: 'NOT_FOUND',
      message: 'No stored transition set',
      retryable: false,
      data: { kind: 'transitionset' },
    });
  });

  it('narrows by code', () => {
    const err: unknown = notFound('missing');
    expect(isXrayDbError(err)).toBe(true);
    expect(isXrayDbError(err, 'NOT_FOUND')).toBe(true);
    expect(isXrayDbError(err, 'AMBIGUOUS_MATCH')).toBe(false);
    expect(isXrayDbError(new Error('plain'))).toBe(false);
  });
});

describe('describeValue', () => {
  it('prefers a value object description', () => {
    expect(describeValue(new Element(26))).toBe('Element(z=26)');
    expect(describeValue('Fe')).toBe('"Fe"');
    expect(describeValue([1, 2])).toBe('[1,2]');
    expect(describeValue({ z: 26 })).toBe('{"z":26}');
    expect(describeValue(undefined)).toBe('undefined');
  });

  it('names the kind and the value in unresolved identifiers', () => {
    const err = unresolvedIdentifier('atomic_subshell', [2, 1]);
    expect(err.message).toBe('Cannot classify atomic_subshell identifier: [2,1]');
    expect(err.data).toEqual({ kind: 'atomic_subshell', value: [2, 1] });
  });
});

describe('formatError', () => {
  it('drops SQL text from the payload', () => {
    const payload = formatError(upstreamError('sqlite3 query failed', { status: 1, sql: 'SELECT 1' }));
    expect(payload).toEqual({
      error: { code: 'UPSTREAM_ERROR', message: 'sqlite3 query failed', data: { status: 1 } },
    });
  });

  it('omits empty data', () => {
    expect(formatError(upstreamError('failed', { sql: 'SELECT 1' }))).toEqual({
      error: { code: 'UPSTREAM_ERROR', message: 'failed' },
    });
  });

  it('reports anything else as internal', () => {
    expect(formatError(new TypeError('boom'))).toEqual({ error: { code: 'INTERNAL_ERROR', message: 'boom' } });
    expect(formatError('bare')).toEqual({ error: { code: 'INTERNAL_ERROR', message: 'bare' } });
    expect(new XrayDbError('QUERY_CONFLICT', 'x')).toBeInstanceOf(Error);
  });
});
