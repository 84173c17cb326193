import { describe, it, expect } from 'vitest';
import { NoteDecodeError } from '../../core/errors.js';
import { unwrap } from '../../core/result.js';
import { createCommitRecord } from '../../model/types.js';
import { decodeCommitRecord, encodeCommitRecord, sameRecord } from '../codec.js';

const COMMIT = 'abc123';

describe('note codec', () => {
  it('encodes keys in a fixed order and omits absent values', () => {
    const record = createCommitRecord(COMMIT, {
      files: ['b.ts'],
      reviewedAt: '2026-01-15T10:00:00Z',
      reviewedBy: 'alice@example.com',
      trace: ['SPEC-1'],
      confidence: 'med',
      aiTool: 'copilot',
    });

    expect(encodeCommitRecord(record)).toBe(
      '{"ai_tool":"copilot","confidence":"med","trace":["SPEC-1"],"tests":[],"reviewed_by":"alice@example.com","reviewed_at":"2026-01-15T10:00:00Z","files":["b.ts"]}'
    );
    expect(encodeCommitRecord(createCommitRecord(COMMIT))).toBe('{"trace":[],"tests":[],"files":[]}');
  });

  it('decodes what it encodes', () => {
    const record = createCommitRecord(COMMIT, { aiTool: 'claude', confidence: 'high', tests: ['t1'] });
    expect(unwrap(decodeCommitRecord(COMMIT, encodeCommitRecord(record)))).toEqual(record);
  });

  it('accepts indented notes, nulls and unknown keys', () => {
    const text = JSON.stringify({ ai_tool: 'gemini', confidence: null, reviewed_by: null, extra: 1 }, null, 2);

    expect(unwrap(decodeCommitRecord(COMMIT, text))).toEqual({
      commitId: COMMIT,
      aiTool: 'gemini',
      trace: [],
      tests: [],
      files: [],
    });
  });

  it.each([
    ['not json', 'Unexpected token'],
    ['{"confidence":"certain"}', 'confidence'],
    ['{"trace":"SPEC-1"}', 'trace'],
  ])('rejects %s', (text, fragment) => {
    const result = decodeCommitRecord(COMMIT, text);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(NoteDecodeError);
    expect(result.error.commitId).toBe(COMMIT);
    expect(result.error.message).toContain(fragment);
  });

  it('compares records by encoding', () => {
    const a = createCommitRecord(COMMIT, { trace: ['A', 'A'] });
    const b = createCommitRecord(COMMIT, { trace: ['A'] });
    expect(sameRecord(a, b)).toBe(true);
    expect(sameRecord(a, createCommitRecord(COMMIT, { trace: ['B'] }))).toBe(false);
  });
});
