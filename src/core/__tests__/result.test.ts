import { describe, it, expect, vi } from 'vitest';
import { Errors, WriteConflictError, getErrorMessage, isRetryableError, isWriteConflict } from '../errors.js';
import { Err, Ok, safeAsync, safeSync, unwrap, withRetry } from '../result.js';

describe('Result helpers', () => {
  it('wraps thrown values', async () => {
    expect(safeSync(() => 2)).toEqual({ ok: true, value: 2 });
    const failed = safeSync(() => {
      throw 'boom';
    });
    expect(failed.ok).toBe(false);
    if (!failed.ok) expect(failed.error.message).toBe('boom');

    const rejected = await safeAsync(() => Promise.reject(new Error('late')));
    expect(rejected.ok).toBe(false);
  });

  it('unwraps or throws', () => {
    expect(unwrap(Ok('v'))).toBe('v');
    expect(() => unwrap(Err(new Error('nope')))).toThrow('nope');
  });
});

describe('withRetry', () => {
  it('retries until the operation succeeds', async () => {
    const onRetry = vi.fn();
    let calls = 0;

    const result = await withRetry(async (attempt) => {
      calls += 1;
      if (attempt < 2) throw Errors.writeConflict('refs/notes/x', 'abc', attempt + 1);
      return 'done';
    }, { maxRetries: 3, onRetry });

    expect(result).toEqual({ ok: true, value: 'done' });
    expect(calls).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('stops after the bounded number of retries', async () => {
    let calls = 0;
    const result = await withRetry(async () => {
      calls += 1;
      throw Errors.writeConflict('refs/notes/x', 'abc', calls);
    }, { maxRetries: 2, shouldRetry: isWriteConflict });

    expect(calls).toBe(3);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toMatchObject({ attempts: 3 });
  });

  it('does not retry errors the predicate rejects', async () => {
    let calls = 0;
    const result = await withRetry(async () => {
      calls += 1;
      throw Errors.unknownRevision('nope');
    }, { shouldRetry: isRetryableError });

    expect(calls).toBe(1);
    expect(result.ok).toBe(false);
  });
});

describe('error hierarchy', () => {
  it('serializes details for reporting', () => {
    const error = Errors.writeConflict('refs/notes/ai-provenance', 'abc123', 4);
    expect(error).toBeInstanceOf(WriteConflictError);
    expect(error.toJSON()).toMatchObject({
      code: 'WRITE_CONFLICT',
      retryable: true,
      details: { notesRef: 'refs/notes/ai-provenance', commitId: 'abc123', attempts: 4 },
    });
    expect(String(error)).toBe(
      '[WRITE_CONFLICT] Notes ref refs/notes/ai-provenance moved concurrently while writing abc123 (gave up after 4 attempts)'
    );
  });

  it('locates tag and block errors', () => {
    expect(Errors.malformedTag(3, '  // ai:x  ', 'expected ai:<tool>:<confidence>', 'src/a.ts').message).toBe(
      'src/a.ts:3: malformed provenance tag (expected ai:<tool>:<confidence>): // ai:x'
    );
    expect(Errors.malformedTag(7, '# ai:', 'empty tool').message).toBe('line 7: malformed provenance tag (empty tool): # ai:');
    expect(Errors.blockResolution('a.ts', 'gap', 3).message).toBe('Block resolution failed for a.ts at line 3: gap');
  });

  it('marks only write conflicts as retryable', () => {
    expect(isRetryableError(Errors.writeConflict('r', 'c', 1))).toBe(true);
    expect(isRetryableError(Errors.noteDecode('c', 'bad'))).toBe(false);
    expect(isRetryableError(new Error('plain'))).toBe(false);
  });

  it('extracts messages from any thrown value', () => {
    expect(getErrorMessage(new Error('broken'))).toBe('broken');
    expect(getErrorMessage('plain text')).toBe('plain text');
    expect(getErrorMessage({ message: 42 })).toBe('42');
    expect(getErrorMessage(undefined)).toBe('Unknown error');
  });
});
