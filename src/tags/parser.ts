/**
 * @fileoverview Inline provenance tag parser
 *
 * Grammar (after a comment prefix, fields separated by `|`):
 *
 *   ai:<tool>:<confidence> [| trace:<id>[,<id>...]] [| test:<id>[,<id>...]] [| reviewed:<date>[:<reviewer>]]
 *
 * The first field is mandatory and positional; the rest are optional and
 * unordered. Unknown keys are skipped so newer writers stay readable.
 * A comment whose body is exactly `ai:end` closes the preceding tag.
 *
 * Matching is line-anchored on comment prefixes only. A string literal that
 * starts with a comment prefix at the beginning of a line will be read as a
 * tag; without a syntax tree this cannot be told apart.
 */

import { MalformedTagError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { TagDateSchema } from '../model/schema.js';
import { DEFAULT_TOOL_REGISTRY, type ToolRegistry } from '../model/tools.js';
import { createTag, isConfidence, type LocatedTag, type Tag } from '../model/types.js';
import { FALLBACK_STYLE, commentStyleForPath, orderedPrefixes, type CommentStyle } from './comment_styles.js';

export const TAG_MARKER = 'ai:';
export const CLOSING_MARKER = 'ai:end';

const TOOL_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export type ParsedLine = { readonly kind: 'tag'; readonly tag: Tag } | { readonly kind: 'end' };

export interface ParseOptions {
  style?: CommentStyle;
  registry?: ToolRegistry;
}

export interface TagScan {
  readonly path?: string;
  readonly style: CommentStyle;
  readonly lines: readonly string[];
  readonly tags: readonly LocatedTag[];
  /** Line numbers of `ai:end` markers. */
  readonly closings: readonly number[];
  readonly errors: readonly MalformedTagError[];
}

export interface ScanOptions {
  path?: string;
  /** Takes precedence over the style derived from `path`. */
  style?: CommentStyle;
  /** extension → language id */
  languageOverrides?: Readonly<Record<string, string>>;
  registry?: ToolRegistry;
}

/**
 * Split file text into lines. A trailing newline does not start a new line,
 * and the empty string has no lines.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/**
 * Return the comment body when `line` is a comment starting with `ai:`,
 * with the comment opener and any closer removed.
 */
export function extractTagBody(line: string, style: CommentStyle = FALLBACK_STYLE): string | null {
  const trimmed = line.trimStart();
  for (const prefix of orderedPrefixes(style)) {
    if (!trimmed.startsWith(prefix)) continue;
    let rest = trimmed.slice(prefix.length);
    // `///`, `##`, `/**` and friends
    const repeat = prefix[prefix.length - 1] ?? '';
    while (repeat && rest.startsWith(repeat)) rest = rest.slice(repeat.length);
    rest = rest.trimStart();
    if (!rest.startsWith(TAG_MARKER)) return null;
    return stripSuffix(rest.trimEnd(), style);
  }
  return null;
}

function stripSuffix(body: string, style: CommentStyle): string {
  for (const suffix of style.suffixes) {
    if (body.endsWith(suffix)) return body.slice(0, -suffix.length).trimEnd();
  }
  return body;
}

function parseIdList(value: string): string[] {
  return value.split(',');
}

/**
 * Parse the body of a tag comment (everything after the comment opener).
 */
export function parseTagBody(
  body: string,
  lineNumber: number,
  raw: string,
  registry: ToolRegistry = DEFAULT_TOOL_REGISTRY
): Result<ParsedLine, MalformedTagError> {
  const fail = (reason: string) => Err(new MalformedTagError(lineNumber, raw, reason));
  if (body.trim() === CLOSING_MARKER) return Ok({ kind: 'end' });

  const [head = '', ...fields] = body.split('|');
  const segments = head.trim().split(':');
  if (segments.length < 3) return fail('expected ai:<tool>:<confidence>');
  if (segments.length > 3) return fail('unexpected extra segment in ai:<tool>:<confidence>');
  const tool = (segments[1] ?? '').trim();
  const confidence = (segments[2] ?? '').trim();
  if (!tool) return fail('empty tool');
  if (!confidence) return fail('empty confidence');
  if (!TOOL_PATTERN.test(tool)) return fail(`invalid tool "${tool}"`);
  if (!isConfidence(confidence)) return fail(`unknown confidence "${confidence}"`);

  const trace: string[] = [];
  const tests: string[] = [];
  let reviewer: string | undefined;
  let reviewedAt: string | undefined;

  for (const field of fields) {
    const separator = field.indexOf(':');
    if (separator < 0) continue;
    const key = field.slice(0, separator).trim().toLowerCase();
    const value = field.slice(separator + 1).trim();
    switch (key) {
      case 'trace':
        trace.push(...parseIdList(value));
        break;
      case 'test':
      case 'tests':
        tests.push(...parseIdList(value));
        break;
      case 'reviewed': {
        const dateEnd = value.indexOf(':');
        const date = (dateEnd < 0 ? value : value.slice(0, dateEnd)).trim();
        const who = dateEnd < 0 ? '' : value.slice(dateEnd + 1).trim();
        if (!TagDateSchema.safeParse(date).success) return fail(`invalid review date "${date}"`);
        reviewedAt = date;
        reviewer = who || undefined;
        break;
      }
      default:
        break;
    }
  }

  return Ok({
    kind: 'tag',
    tag: createTag(registry.normalize(tool), confidence, { trace, tests, reviewer, reviewedAt }),
  });
}

/**
 * Parse one line. `Ok(null)` when the line carries no tag.
 */
export function parseTagLine(
  line: string,
  lineNumber = 1,
  options: ParseOptions = {}
): Result<ParsedLine | null, MalformedTagError> {
  const body = extractTagBody(line, options.style ?? FALLBACK_STYLE);
  if (body === null) return Ok(null);
  return parseTagBody(body, lineNumber, line, options.registry);
}

/**
 * Parse a single tag line, throwing MalformedTagError on bad syntax.
 * Closing markers and plain lines yield null.
 */
export function parseTag(line: string, options: ParseOptions = {}): Tag | null {
  const result = parseTagLine(line, 1, options);
  if (!result.ok) throw result.error;
  return result.value?.kind === 'tag' ? result.value.tag : null;
}

/**
 * Scan a whole file. Bad lines are collected in `errors` and never stop the
 * scan.
 */
export function scanTags(text: string, options: ScanOptions = {}): TagScan {
  const style = options.style
    ?? (options.path !== undefined ? commentStyleForPath(options.path, options.languageOverrides) : FALLBACK_STYLE);
  const lines = splitLines(text);
  const tags: LocatedTag[] = [];
  const closings: number[] = [];
  const errors: MalformedTagError[] = [];

  lines.forEach((line, index) => {
    const lineNumber = index + 1;
    const result = parseTagLine(line, lineNumber, { style, registry: options.registry });
    if (!result.ok) {
      errors.push(options.path !== undefined ? result.error.withPath(options.path) : result.error);
      return;
    }
    if (result.value === null) return;
    if (result.value.kind === 'end') {
      closings.push(lineNumber);
      return;
    }
    tags.push({ tag: result.value.tag, line: lineNumber, raw: line });
  });

  return { path: options.path, style, lines, tags, closings, errors };
}
