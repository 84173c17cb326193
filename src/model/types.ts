/**
 * @fileoverview Provenance metadata model
 *
 * Hierarchy: Tag (one comment line) → Block (line range) → FileRecord (one
 * file at one revision) → CommitRecord (one commit, stored in git notes).
 * TraceEntry is derived by the aggregator and never stored.
 *
 * All records are treated as immutable values once constructed.
 */

// ============================================================================
// ENUMS
// ============================================================================

export const DEFAULT_AI_TOOLS = ['claude', 'copilot', 'chatgpt', 'gemini', 'cursor', 'other'] as const;
export type DefaultAiTool = (typeof DEFAULT_AI_TOOLS)[number];

/** Tool identifier. The default set is extended through configuration. */
export type AiTool = string;

export const CONFIDENCE_LEVELS = ['high', 'med', 'low'] as const;
/** high: pasted with minor edits; med: significantly modified; low: AI-assisted, mostly human. */
export type Confidence = (typeof CONFIDENCE_LEVELS)[number];

export const BLOCK_KINDS = ['function', 'method', 'class', 'module', 'block'] as const;
export type BlockKind = (typeof BLOCK_KINDS)[number];

/** Revision label for files read from disk rather than from a commit. */
export const WORKING_TREE = 'WORKING_TREE';

export function isConfidence(value: string): value is Confidence {
  return (CONFIDENCE_LEVELS as readonly string[]).includes(value);
}

// ============================================================================
// TAG
// ============================================================================

export interface Tag {
  readonly tool: AiTool;
  readonly confidence: Confidence;
  readonly trace: readonly string[];
  readonly tests: readonly string[];
  readonly reviewer?: string;
  /** YYYY-MM-DD */
  readonly reviewedAt?: string;
}

export interface LocatedTag {
  readonly tag: Tag;
  /** 1-based */
  readonly line: number;
  readonly raw: string;
}

// ============================================================================
// BLOCK
// ============================================================================

export interface Block {
  readonly kind: BlockKind;
  readonly name?: string;
  readonly startLine: number;
  readonly endLine: number;
  /** Non-blank lines in the range. */
  readonly countedLines: number;
  readonly isAi: boolean;
  readonly tag?: Tag;
  readonly tagLine?: number;
}

// ============================================================================
// FILE RECORD
// ============================================================================

export interface FileRecord {
  readonly path: string;
  /** Commit id, or WORKING_TREE */
  readonly revision: string;
  readonly blocks: readonly Block[];
  readonly tags: readonly LocatedTag[];
  /** Tag stamped above the first code line, if any. */
  readonly fileTag?: LocatedTag;
  readonly totalLines: number;
  /** Non-blank lines. */
  readonly countedLines: number;
  /** Non-blank lines inside AI blocks. */
  readonly aiLines: number;
  /** Full precision. 0 for an empty file, null when every line is blank. */
  readonly aiPercentage: number | null;
  /** Union of block trace ids, first-seen order. */
  readonly trace: readonly string[];
  /** Union of block test ids, first-seen order. */
  readonly tests: readonly string[];
}

// ============================================================================
// COMMIT RECORD
// ============================================================================

export interface CommitRecord {
  readonly commitId: string;
  readonly aiTool?: AiTool;
  readonly confidence?: Confidence;
  readonly trace: readonly string[];
  readonly tests: readonly string[];
  readonly reviewedBy?: string;
  /** ISO-8601 */
  readonly reviewedAt?: string;
  readonly files: readonly string[];
}

// ============================================================================
// TRACEABILITY
// ============================================================================

export type ReviewStatus = 'unlinked' | 'untested' | 'unreviewed' | 'reviewed';

export interface TraceEntry {
  readonly requirementId: string;
  /** Empty when no requirements source is configured. */
  readonly title: string;
  readonly status?: string;
  /** False when a requirements source is configured but does not know the id. */
  readonly known: boolean;
  readonly warning?: 'unknown_requirement';
  readonly commits: readonly string[];
  readonly files: readonly string[];
  readonly tests: readonly string[];
  /** Weighted over contributing files, full precision. */
  readonly aiPercentage: number;
  readonly reviewStatus: ReviewStatus;
}

// ============================================================================
// HELPERS
// ============================================================================

/** Order-preserving de-duplication of trimmed, non-empty ids. */
export function uniqueIds(values: Iterable<string>): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (!trimmed || seen.has(trimmed)) continue;
    seen.add(trimmed);
    out.push(trimmed);
  }
  return out;
}

export function createCommitRecord(
  commitId: string,
  fields: Omit<Partial<CommitRecord>, 'commitId'> = {}
): CommitRecord {
  return {
    commitId,
    ...(fields.aiTool !== undefined ? { aiTool: fields.aiTool } : {}),
    ...(fields.confidence !== undefined ? { confidence: fields.confidence } : {}),
    trace: uniqueIds(fields.trace ?? []),
    tests: uniqueIds(fields.tests ?? []),
    ...(fields.reviewedBy !== undefined ? { reviewedBy: fields.reviewedBy } : {}),
    ...(fields.reviewedAt !== undefined ? { reviewedAt: fields.reviewedAt } : {}),
    files: uniqueIds(fields.files ?? []),
  };
}

export function createTag(
  tool: AiTool,
  confidence: Confidence,
  fields: Partial<Omit<Tag, 'tool' | 'confidence'>> = {}
): Tag {
  return {
    tool,
    confidence,
    trace: uniqueIds(fields.trace ?? []),
    tests: uniqueIds(fields.tests ?? []),
    ...(fields.reviewedAt !== undefined ? { reviewedAt: fields.reviewedAt } : {}),
    ...(fields.reviewer !== undefined ? { reviewer: fields.reviewer } : {}),
  };
}
