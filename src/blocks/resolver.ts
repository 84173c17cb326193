/**
 * @fileoverview Block/hunk resolver
 *
 * Turns the tags of one file into a list of blocks covering every line
 * exactly once. A tag's block runs from the tag line to whichever comes
 * first: the line before the next tag, its `ai:end` marker, or end of file.
 *
 * This is a heuristic. Without a syntax tree the resolver cannot know where
 * the tagged function really ends; untagged code that follows a tagged
 * function without a closing marker is attributed to the tag.
 */

import * as path from 'node:path';
import { BlockResolutionError } from '../core/errors.js';
import type { Block, BlockKind, LocatedTag } from '../model/types.js';
import { isCommentLine, type CommentStyle } from '../tags/comment_styles.js';
import type { TagScan } from '../tags/parser.js';

export interface BlockResolution {
  readonly blocks: readonly Block[];
  /** `ai:end` markers that close no tag. */
  readonly strayClosings: readonly number[];
}

interface KindMatch {
  kind: BlockKind;
  name?: string;
}

const CONTROL_WORDS = new Set(['if', 'for', 'while', 'switch', 'catch', 'return', 'else', 'do', 'try', 'with']);

const KIND_PATTERNS: Array<{ pattern: RegExp; resolve: (match: RegExpExecArray, indented: boolean) => KindMatch | null }> = [
  {
    pattern: /^\s*(?:export\s+)?(?:default\s+)?(?:abstract\s+)?(?:public\s+|final\s+)*class\s+([A-Za-z_$][\w$]*)/,
    resolve: (m) => ({ kind: 'class', name: m[1] }),
  },
  {
    pattern: /^\s*(?:export\s+)?(?:default\s+)?(?:async\s+)?function\s*\*?\s*([A-Za-z_$][\w$]*)/,
    resolve: (m, indented) => ({ kind: indented ? 'method' : 'function', name: m[1] }),
  },
  {
    pattern: /^\s*(?:async\s+)?def\s+([A-Za-z_]\w*)/,
    resolve: (m, indented) => ({ kind: indented ? 'method' : 'function', name: m[1] }),
  },
  {
    pattern: /^\s*(?:pub(?:\([^)]*\))?\s+)?(?:async\s+)?(?:unsafe\s+)?fn\s+([A-Za-z_]\w*)/,
    resolve: (m, indented) => ({ kind: indented ? 'method' : 'function', name: m[1] }),
  },
  {
    pattern: /^\s*func\s+(\([^)]*\)\s*)?([A-Za-z_]\w*)/,
    resolve: (m) => ({ kind: m[1] ? 'method' : 'function', name: m[2] }),
  },
  {
    pattern: /^\s*(?:export\s+)?(?:const|let|var)\s+([A-Za-z_$][\w$]*)\s*(?::[^=]+)?=\s*(?:async\s+)?(?:\([^)]*\)|[A-Za-z_$][\w$]*)\s*(?::[^=]+)?=>/,
    resolve: (m) => ({ kind: 'function', name: m[1] }),
  },
  {
    pattern: /^\s+(?:(?:public|private|protected|static|async|override|readonly|final|virtual)\s+)*(?:[\w<>[\],.?]+\s+)?([A-Za-z_$][\w$]*)\s*\([^)]*\)\s*(?::\s*[^{]+)?\{\s*$/,
    resolve: (m) => (m[1] && !CONTROL_WORDS.has(m[1]) ? { kind: 'method', name: m[1] } : null),
  },
];

export function isBlank(line: string): boolean {
  return line.trim().length === 0;
}

export function isCodeLine(line: string, style: CommentStyle): boolean {
  return !isBlank(line) && !isCommentLine(line, style);
}

/** Non-blank lines between two 1-based line numbers, inclusive. */
export function countNonBlank(lines: readonly string[], startLine: number, endLine: number): number {
  let count = 0;
  for (let line = startLine; line <= endLine; line += 1) {
    if (!isBlank(lines[line - 1] ?? '')) count += 1;
  }
  return count;
}

/** Index (0-based) of the first code line, or -1. */
export function firstCodeLineIndex(lines: readonly string[], style: CommentStyle, from = 0, to = lines.length): number {
  for (let index = from; index < to; index += 1) {
    if (isCodeLine(lines[index] ?? '', style)) return index;
  }
  return -1;
}

/**
 * Guess what a block holds from its first code line.
 */
export function inferBlockKind(line: string): KindMatch {
  const indented = /^\s+\S/.test(line);
  for (const { pattern, resolve } of KIND_PATTERNS) {
    const match = pattern.exec(line);
    if (!match) continue;
    const resolved = resolve(match, indented);
    if (resolved) return resolved;
  }
  return { kind: 'block' };
}

/**
 * The tag stamped above every code line of the file, if any.
 */
export function findFileTag(scan: TagScan): LocatedTag | undefined {
  const first = scan.tags[0];
  if (!first) return undefined;
  const firstCode = firstCodeLineIndex(scan.lines, scan.style);
  return firstCode < 0 || first.line - 1 < firstCode ? first : undefined;
}

export function resolveBlocks(scan: TagScan): BlockResolution {
  const lineCount = scan.lines.length;
  if (lineCount === 0) return { blocks: [], strayClosings: [...scan.closings] };

  const tags = [...scan.tags].sort((a, b) => a.line - b.line);
  const closings = [...scan.closings].sort((a, b) => a - b);
  const consumed = new Set<number>();
  const fileTag = findFileTag(scan);
  const blocks: Block[] = [];
  let cursor = 1;

  tags.forEach((located, index) => {
    const nextTagLine = tags[index + 1]?.line ?? lineCount + 1;
    let end = Math.min(nextTagLine - 1, lineCount);
    const closing = closings.find((line) => line > located.line && line < nextTagLine);
    if (closing !== undefined) {
      end = closing;
      consumed.add(closing);
    }

    if (located.line > cursor) {
      blocks.push(untaggedBlock(scan.lines, cursor, located.line - 1));
    }

    const codeIndex = firstCodeLineIndex(scan.lines, scan.style, located.line, end);
    let match: KindMatch = codeIndex >= 0 ? inferBlockKind(scan.lines[codeIndex] ?? '') : { kind: 'block' };
    if (located === fileTag && end === lineCount) {
      match = { kind: 'module', name: scan.path !== undefined ? path.posix.basename(scan.path) : undefined };
    }

    blocks.push({
      kind: match.kind,
      ...(match.name !== undefined ? { name: match.name } : {}),
      startLine: located.line,
      endLine: end,
      countedLines: countNonBlank(scan.lines, located.line, end),
      isAi: true,
      tag: located.tag,
      tagLine: located.line,
    });
    cursor = end + 1;
  });

  if (cursor <= lineCount) {
    blocks.push(untaggedBlock(scan.lines, cursor, lineCount));
  }

  validateCoverage(blocks, lineCount, scan.path ?? '<text>');
  return { blocks, strayClosings: closings.filter((line) => !consumed.has(line)) };
}

function untaggedBlock(lines: readonly string[], startLine: number, endLine: number): Block {
  return { kind: 'block', startLine, endLine, countedLines: countNonBlank(lines, startLine, endLine), isAi: false };
}

/**
 * Check that blocks cover lines 1..lineCount exactly once, in order.
 */
export function validateCoverage(blocks: readonly Block[], lineCount: number, filePath: string): void {
  let expected = 1;
  for (const block of blocks) {
    if (block.startLine > block.endLine) {
      throw new BlockResolutionError(filePath, `block ${block.startLine}-${block.endLine} is inverted`, block.startLine);
    }
    if (block.startLine < expected) {
      throw new BlockResolutionError(filePath, `block ${block.startLine}-${block.endLine} overlaps line ${expected - 1}`, block.startLine);
    }
    if (block.startLine > expected) {
      throw new BlockResolutionError(filePath, `lines ${expected}-${block.startLine - 1} are not covered`, expected);
    }
    expected = block.endLine + 1;
  }
  if (expected !== lineCount + 1) {
    throw new BlockResolutionError(filePath, `coverage ends at line ${expected - 1} of ${lineCount}`, expected);
  }
}
