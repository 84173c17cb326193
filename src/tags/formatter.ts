import { ValidationError } from '../core/errors.js';
import { TagSchema, formatZodIssues } from '../model/schema.js';
import { DEFAULT_TOOL_REGISTRY, type ToolRegistry } from '../model/tools.js';
import type { Tag } from '../model/types.js';
import { FALLBACK_STYLE, commentStyleForPath, type CommentStyle } from './comment_styles.js';
import { CLOSING_MARKER, TAG_MARKER, extractTagBody, splitLines } from './parser.js';

export type StampPosition = 'top' | 'bottom';

// A tool outside the registry would read back as `other`.
function assertValidTag(tag: Tag, registry: ToolRegistry): void {
  const parsed = TagSchema.safeParse(tag);
  if (!parsed.success) {
    throw new ValidationError('tag', 'a well-formed provenance tag', formatZodIssues(parsed.error));
  }
  if (!registry.has(tag.tool)) {
    throw new ValidationError('tag.tool', `one of ${registry.list().join(', ')}`, tag.tool);
  }
}

/**
 * Canonical tag body: `ai:<tool>:<conf> | trace:.. | test:.. | reviewed:<date>[:<reviewer>]`.
 * Fields are always written in this order.
 */
export function formatTagBody(tag: Tag, registry: ToolRegistry = DEFAULT_TOOL_REGISTRY): string {
  assertValidTag(tag, registry);
  const parts = [`${TAG_MARKER}${tag.tool}:${tag.confidence}`];
  if (tag.trace.length > 0) parts.push(`trace:${tag.trace.join(',')}`);
  if (tag.tests.length > 0) parts.push(`test:${tag.tests.join(',')}`);
  if (tag.reviewedAt !== undefined) {
    parts.push(tag.reviewer !== undefined ? `reviewed:${tag.reviewedAt}:${tag.reviewer}` : `reviewed:${tag.reviewedAt}`);
  }
  return parts.join(' | ');
}

export function formatTag(
  tag: Tag,
  style: CommentStyle = FALLBACK_STYLE,
  registry: ToolRegistry = DEFAULT_TOOL_REGISTRY
): string {
  const body = formatTagBody(tag, registry);
  const { prefix, suffix } = style.preferred;
  return suffix ? `${prefix} ${body} ${suffix}` : `${prefix} ${body}`;
}

function isPreambleLine(line: string, index: number): boolean {
  if (index === 0 && line.startsWith('#!')) return true;
  return /coding[:=]|encoding[:=]/.test(line) && index <= 1;
}

/**
 * Insert a file-level tag, or replace the first existing tag line.
 *
 * `top` places the tag after a shebang and encoding declaration;
 * `bottom` appends it after a blank line.
 */
export function stampText(
  text: string,
  tag: Tag,
  filePath: string,
  position: StampPosition = 'top',
  languageOverrides: Readonly<Record<string, string>> = {},
  registry: ToolRegistry = DEFAULT_TOOL_REGISTRY
): string {
  const style = commentStyleForPath(filePath, languageOverrides);
  const tagLine = formatTag(tag, style, registry);
  const lines = splitLines(text);
  const trailingNewline = text.endsWith('\n') || text.length === 0;

  const existing = lines.findIndex((line) => {
    const body = extractTagBody(line, style);
    return body !== null && body.trim() !== CLOSING_MARKER;
  });

  if (existing >= 0) {
    const indent = /^\s*/.exec(lines[existing] ?? '')?.[0] ?? '';
    lines[existing] = `${indent}${tagLine}`;
  } else if (position === 'top') {
    let insertAt = 0;
    while (insertAt < lines.length && isPreambleLine(lines[insertAt] ?? '', insertAt)) insertAt += 1;
    lines.splice(insertAt, 0, tagLine);
  } else {
    while (lines.length > 0 && (lines[lines.length - 1] ?? '').trim() === '') lines.pop();
    if (lines.length > 0) lines.push('');
    lines.push(tagLine);
  }

  const joined = lines.join('\n');
  return trailingNewline ? `${joined}\n` : joined;
}
