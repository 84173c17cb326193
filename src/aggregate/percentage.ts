import type { AiTool, FileRecord } from '../model/types.js';

export interface FilePercentage {
  readonly path: string;
  readonly aiPercentage: number | null;
  readonly aiLines: number;
  readonly countedLines: number;
}

export interface ToolShare {
  readonly tool: AiTool;
  readonly aiLines: number;
  /** Share of all counted lines. */
  readonly percentage: number;
}

export interface PercentageReport {
  /** Σ AI lines / Σ counted lines × 100 over every file. */
  readonly aiPercentage: number;
  readonly aiLines: number;
  readonly countedLines: number;
  /** Mean of the per-file values that are defined. */
  readonly averageFilePercentage: number | null;
  /** Highest share first; files without a share last. */
  readonly files: readonly FilePercentage[];
  readonly tools: readonly ToolShare[];
}

/** Display rounding. Aggregations always take the unrounded values. */
export function roundPercentage(value: number, precision = 0): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

export function percentageOf(aiLines: number, countedLines: number): number {
  return countedLines === 0 ? 0 : (aiLines / countedLines) * 100;
}

export function computePercentage(files: readonly FileRecord[]): PercentageReport {
  let aiLines = 0;
  let countedLines = 0;
  const toolLines = new Map<AiTool, number>();
  const defined: number[] = [];

  for (const file of files) {
    aiLines += file.aiLines;
    countedLines += file.countedLines;
    if (file.aiPercentage !== null) defined.push(file.aiPercentage);
    for (const block of file.blocks) {
      if (!block.tag) continue;
      toolLines.set(block.tag.tool, (toolLines.get(block.tag.tool) ?? 0) + block.countedLines);
    }
  }

  const perFile = files
    .map((file): FilePercentage => ({
      path: file.path,
      aiPercentage: file.aiPercentage,
      aiLines: file.aiLines,
      countedLines: file.countedLines,
    }))
    .sort(compareFilePercentage);

  const tools = [...toolLines]
    .map(([tool, lines]): ToolShare => ({ tool, aiLines: lines, percentage: percentageOf(lines, countedLines) }))
    .sort((a, b) => b.aiLines - a.aiLines || a.tool.localeCompare(b.tool));

  return {
    aiPercentage: percentageOf(aiLines, countedLines),
    aiLines,
    countedLines,
    averageFilePercentage: defined.length > 0 ? defined.reduce((sum, value) => sum + value, 0) / defined.length : null,
    files: perFile,
    tools,
  };
}

function compareFilePercentage(a: FilePercentage, b: FilePercentage): number {
  if (a.aiPercentage === null && b.aiPercentage !== null) return 1;
  if (a.aiPercentage !== null && b.aiPercentage === null) return -1;
  const diff = (b.aiPercentage ?? 0) - (a.aiPercentage ?? 0);
  return diff !== 0 ? diff : a.path.localeCompare(b.path);
}

