import type { BlockResolutionError, MalformedTagError } from '../core/errors.js';
import type { CommitRecord, FileRecord } from '../model/types.js';
import { isCommitUnreviewed, isTagReviewed, taggedBlocks } from './unreviewed.js';

export interface ValidationOptions {
  /** AI commits and tags must carry a review. */
  requireReview?: boolean;
  /** Anything traced to a requirement must name tests. */
  requireTests?: boolean;
}

export type ValidationIssueKind =
  | 'unreviewed_commit'
  | 'untested_commit'
  | 'unreviewed_block'
  | 'untested_block'
  | 'malformed_tag'
  | 'block_resolution';

export interface ValidationIssue {
  readonly kind: ValidationIssueKind;
  readonly message: string;
  readonly commitId?: string;
  readonly path?: string;
  readonly line?: number;
}

export interface ValidationReport {
  readonly ok: boolean;
  readonly issues: readonly ValidationIssue[];
}

export interface ScanDiagnostics {
  readonly warnings?: readonly MalformedTagError[];
  readonly failures?: readonly BlockResolutionError[];
}

const shortId = (commitId: string): string => commitId.slice(0, 8);

export function validateProvenance(
  files: readonly FileRecord[],
  commits: readonly CommitRecord[],
  options: ValidationOptions = {},
  diagnostics: ScanDiagnostics = {}
): ValidationReport {
  const issues: ValidationIssue[] = [];

  for (const commit of commits) {
    if (options.requireReview && isCommitUnreviewed(commit)) {
      issues.push({
        kind: 'unreviewed_commit',
        commitId: commit.commitId,
        message: `Commit ${shortId(commit.commitId)} has AI code but no review`,
      });
    }
    if (options.requireTests && commit.trace.length > 0 && commit.tests.length === 0) {
      issues.push({
        kind: 'untested_commit',
        commitId: commit.commitId,
        message: `Commit ${shortId(commit.commitId)} has traces (${commit.trace.join(', ')}) but no test coverage`,
      });
    }
  }

  for (const file of files) {
    for (const block of taggedBlocks(file)) {
      if (options.requireReview && !isTagReviewed(block.tag)) {
        issues.push({
          kind: 'unreviewed_block',
          path: file.path,
          line: block.tagLine,
          message: `${file.path}:${block.tagLine} - AI code not reviewed`,
        });
      }
      if (options.requireTests && block.tag.trace.length > 0 && block.tag.tests.length === 0) {
        issues.push({
          kind: 'untested_block',
          path: file.path,
          line: block.tagLine,
          message: `${file.path}:${block.tagLine} - traces (${block.tag.trace.join(', ')}) but no test coverage`,
        });
      }
    }
  }

  for (const warning of diagnostics.warnings ?? []) {
    issues.push({
      kind: 'malformed_tag',
      ...(warning.path !== undefined ? { path: warning.path } : {}),
      line: warning.line,
      message: warning.message,
    });
  }
  for (const failure of diagnostics.failures ?? []) {
    issues.push({ kind: 'block_resolution', path: failure.path, message: failure.message });
  }

  return { ok: issues.length === 0, issues };
}
