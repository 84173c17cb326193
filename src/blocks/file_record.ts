import { MalformedTagError } from '../core/errors.js';
import type { ToolRegistry } from '../model/tools.js';
import { uniqueIds, type Block, type FileRecord } from '../model/types.js';
import type { CommentStyle } from '../tags/comment_styles.js';
import { CLOSING_MARKER, scanTags } from '../tags/parser.js';
import { findFileTag, resolveBlocks } from './resolver.js';

export interface AnalyzeOptions {
  style?: CommentStyle;
  languageOverrides?: Readonly<Record<string, string>>;
  registry?: ToolRegistry;
}

export interface FileAnalysis {
  readonly record: FileRecord;
  /** Bad tag lines; the rest of the file is still analyzed. */
  readonly warnings: readonly MalformedTagError[];
}

export interface LineCounts {
  readonly totalLines: number;
  readonly countedLines: number;
  readonly aiLines: number;
}

export function countLines(lines: readonly string[], blocks: readonly Block[]): LineCounts {
  let countedLines = 0;
  let aiLines = 0;
  for (const block of blocks) {
    countedLines += block.countedLines;
    if (block.isAi) aiLines += block.countedLines;
  }
  return { totalLines: lines.length, countedLines, aiLines };
}

/**
 * AI share of non-blank lines, at full precision. An empty file is 0; a file
 * of blank lines has no meaningful share and yields null.
 */
export function computeAiPercentage(counts: LineCounts): number | null {
  if (counts.totalLines === 0) return 0;
  if (counts.countedLines === 0) return null;
  return (counts.aiLines / counts.countedLines) * 100;
}

/**
 * Parse and resolve one file's text into a FileRecord.
 *
 * @throws BlockResolutionError when the coverage check fails
 */
export function analyzeFile(
  filePath: string,
  revision: string,
  text: string,
  options: AnalyzeOptions = {}
): FileAnalysis {
  const scan = scanTags(text, {
    path: filePath,
    style: options.style,
    languageOverrides: options.languageOverrides,
    registry: options.registry,
  });
  const { blocks, strayClosings } = resolveBlocks(scan);
  const counts = countLines(scan.lines, blocks);

  const warnings = [
    ...scan.errors,
    ...strayClosings.map((line) =>
      new MalformedTagError(line, scan.lines[line - 1] ?? CLOSING_MARKER, 'closing marker without an open tag', filePath)
    ),
  ].sort((a, b) => a.line - b.line);

  const taggedBlocks = blocks.filter((block) => block.tag !== undefined);
  const fileTag = findFileTag(scan);

  const record: FileRecord = {
    path: filePath,
    revision,
    blocks,
    tags: scan.tags,
    ...(fileTag ? { fileTag } : {}),
    ...counts,
    aiPercentage: computeAiPercentage(counts),
    trace: uniqueIds(taggedBlocks.flatMap((block) => block.tag?.trace ?? [])),
    tests: uniqueIds(taggedBlocks.flatMap((block) => block.tag?.tests ?? [])),
  };

  return { record, warnings };
}
