import { describe, it, expect } from 'vitest';
import { MalformedTagError } from '../../core/errors.js';
import { ToolRegistry } from '../../model/tools.js';
import { getCommentStyle } from '../comment_styles.js';
import { extractTagBody, parseTag, parseTagLine, scanTags, splitLines } from '../parser.js';

const typescript = getCommentStyle('typescript');
const python = getCommentStyle('python');
const markup = getCommentStyle('markup');

describe('parseTag', () => {
  it('parses every field', () => {
    const tag = parseTag('// ai:claude:high | trace:SPEC-001,SPEC-002 | test:test_auth | reviewed:2026-01-15:alice', {
      style: typescript,
    });

    expect(tag).toEqual({
      tool: 'claude',
      confidence: 'high',
      trace: ['SPEC-001', 'SPEC-002'],
      tests: ['test_auth'],
      reviewedAt: '2026-01-15',
      reviewer: 'alice',
    });
  });

  it('parses the minimal form', () => {
    expect(parseTag('# ai:copilot:med', { style: python })).toEqual({
      tool: 'copilot',
      confidence: 'med',
      trace: [],
      tests: [],
    });
  });

  it('accepts a review date without a reviewer', () => {
    const tag = parseTag('# ai:gemini:low | reviewed:2026-03-01', { style: python });
    expect(tag?.reviewedAt).toBe('2026-03-01');
    expect(tag?.reviewer).toBeUndefined();
  });

  it('reads fields in any order and skips unknown keys', () => {
    const tag = parseTag('// ai:claude:low | owner:bob | test:t1 | trace:REQ-1 , REQ-1', { style: typescript });
    expect(tag?.trace).toEqual(['REQ-1']);
    expect(tag?.tests).toEqual(['t1']);
  });

  it('normalizes tool names', () => {
    expect(parseTag('// ai:Claude:high')?.tool).toBe('claude');
    expect(parseTag('// ai:windsurf:high')?.tool).toBe('other');
    expect(parseTag('// ai:windsurf:high', { registry: new ToolRegistry(['windsurf']) })?.tool).toBe('windsurf');
  });

  it('strips block comment closers', () => {
    expect(parseTag('/* ai:gemini:low */')?.tool).toBe('gemini');
    expect(parseTag('<!-- ai:claude:high | trace:DOC-1 -->', { style: markup })?.trace).toEqual(['DOC-1']);
  });

  it('accepts repeated comment characters', () => {
    expect(parseTag('/// ai:claude:high', { style: typescript })?.confidence).toBe('high');
    expect(parseTag('## ai:claude:med', { style: python })?.confidence).toBe('med');
  });

  it('returns null for lines without a tag', () => {
    expect(parseTag('const x = 1;', { style: typescript })).toBeNull();
    expect(parseTag('// ai is everywhere', { style: typescript })).toBeNull();
    expect(parseTag('x = "# ai:claude:high"', { style: python })).toBeNull();
    expect(parseTag('// ai:end', { style: typescript })).toBeNull();
  });

  it.each([
    ['// ai:claude', 'expected ai:<tool>:<confidence>'],
    ['// ai:claude:high:extra', 'unexpected extra segment in ai:<tool>:<confidence>'],
    ['// ai::high', 'empty tool'],
    ['// ai:claude:', 'empty confidence'],
    ['// ai:claude:certain', 'unknown confidence "certain"'],
    ['// ai:claude:high | reviewed:yesterday:bob', 'invalid review date "yesterday"'],
  ])('rejects %s', (line, reason) => {
    const error = (() => {
      try {
        parseTag(line, { style: typescript });
        return null;
      } catch (e) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(MalformedTagError);
    expect(error).toMatchObject({ reason, line: 1 });
  });
});

describe('parseTagLine', () => {
  it('reports closing markers', () => {
    expect(parseTagLine('  // ai:end', 7, { style: typescript })).toEqual({ ok: true, value: { kind: 'end' } });
  });

  it('carries the line number on errors', () => {
    const result = parseTagLine('# ai:claude', 12, { style: python });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.line).toBe(12);
  });
});

describe('extractTagBody', () => {
  it('only looks at comment prefixes of the style', () => {
    expect(extractTagBody('# ai:claude:high', typescript)).toBeNull();
    expect(extractTagBody('   // ai:claude:high  ', typescript)).toBe('ai:claude:high');
  });
});

describe('splitLines', () => {
  it('does not create a line for the trailing newline', () => {
    expect(splitLines('')).toEqual([]);
    expect(splitLines('a\r\nb\r\n')).toEqual(['a', 'b']);
    expect(splitLines('a\n\n')).toEqual(['a', '']);
  });
});

describe('scanTags', () => {
  const text = [
    '// ai:claude:high | trace:SPEC-1',
    'export function a() {}',
    '// ai:end',
    '// ai:cursor:maybe',
    'const b = 1;',
  ].join('\n');

  it('collects tags, closings and errors without stopping', () => {
    const scan = scanTags(text, { path: 'src/a.ts' });

    expect(scan.style.id).toBe('typescript');
    expect(scan.tags.map((tag) => tag.line)).toEqual([1]);
    expect(scan.closings).toEqual([3]);
    expect(scan.errors).toHaveLength(1);
    expect(scan.errors[0]).toMatchObject({ line: 4, path: 'src/a.ts', reason: 'unknown confidence "maybe"' });
  });

  it('uses the configured language for unknown extensions', () => {
    const scan = scanTags('-- ai:claude:high\nSELECT 1;\n', { path: 'q.tmpl', languageOverrides: { '.tmpl': 'sql' } });
    expect(scan.style.id).toBe('sql');
    expect(scan.tags).toHaveLength(1);
  });
});
