/**
 * @fileoverview Provenance error hierarchy
 *
 * Every error carries the identifier needed to locate its cause (file path,
 * line number, commit id or ref) so callers can report it without re-running.
 *
 * Propagation:
 * - MalformedTagError and BlockResolutionError are collected by scanners and
 *   repository-wide passes; they never abort analysis of other files.
 * - Repository, revision and store errors are fatal to the single call.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class ProvenanceError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// TAG AND BLOCK ERRORS
// ============================================================================

export class MalformedTagError extends ProvenanceError {
  readonly code = 'MALFORMED_TAG';
  readonly retryable = false;

  constructor(
    readonly line: number,
    readonly raw: string,
    readonly reason: string,
    readonly path?: string,
  ) {
    super(`${path ? `${path}:` : 'line '}${line}: malformed provenance tag (${reason}): ${raw.trim()}`);
    this.name = 'MalformedTagError';
  }

  /** Copy of this error attributed to a file. */
  withPath(path: string): MalformedTagError {
    return new MalformedTagError(this.line, this.raw, this.reason, path);
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        path: this.path,
        line: this.line,
        raw: this.raw,
        reason: this.reason,
      },
    };
  }
}

export class BlockResolutionError extends ProvenanceError {
  readonly code = 'BLOCK_RESOLUTION_ERROR';
  readonly retryable = false;

  constructor(
    readonly path: string,
    readonly detail: string,
    readonly line?: number,
  ) {
    super(`Block resolution failed for ${path}${line !== undefined ? ` at line ${line}` : ''}: ${detail}`);
    this.name = 'BlockResolutionError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        path: this.path,
        detail: this.detail,
        line: this.line,
      },
    };
  }
}

// ============================================================================
// REPOSITORY AND REVISION ERRORS
// ============================================================================

export class NotARepositoryError extends ProvenanceError {
  readonly code = 'NOT_A_REPOSITORY';
  readonly retryable = false;

  constructor(readonly workspace: string) {
    super(`Not inside a git repository: ${workspace}`);
    this.name = 'NotARepositoryError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { workspace: this.workspace } };
  }
}

export class UnknownRevisionError extends ProvenanceError {
  readonly code = 'UNKNOWN_REVISION';
  readonly retryable = false;

  constructor(readonly revision: string) {
    super(`Revision cannot be resolved: ${revision}`);
    this.name = 'UnknownRevisionError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { revision: this.revision } };
  }
}

export class FileNotFoundAtRevisionError extends ProvenanceError {
  readonly code = 'FILE_NOT_FOUND_AT_REVISION';
  readonly retryable = false;

  constructor(
    readonly path: string,
    readonly revision: string,
  ) {
    super(`File ${path} does not exist at revision ${revision}`);
    this.name = 'FileNotFoundAtRevisionError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { path: this.path, revision: this.revision } };
  }
}

export class GitCommandError extends ProvenanceError {
  readonly code = 'GIT_COMMAND_ERROR';
  readonly retryable = false;

  constructor(
    readonly args: readonly string[],
    readonly exitCode: number | undefined,
    readonly stderr: string,
  ) {
    super(`git ${args.join(' ')} failed (exit ${exitCode ?? 'unknown'}): ${stderr.trim() || 'no output'}`);
    this.name = 'GitCommandError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { args: [...this.args], exitCode: this.exitCode, stderr: this.stderr },
    };
  }
}

// ============================================================================
// NOTES STORE ERRORS
// ============================================================================

export class WriteConflictError extends ProvenanceError {
  readonly code = 'WRITE_CONFLICT';
  readonly retryable = true;

  constructor(
    readonly notesRef: string,
    readonly commitId: string,
    readonly attempts: number,
  ) {
    super(`Notes ref ${notesRef} moved concurrently while writing ${commitId} (gave up after ${attempts} attempts)`);
    this.name = 'WriteConflictError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { notesRef: this.notesRef, commitId: this.commitId, attempts: this.attempts },
    };
  }
}

export class NoteDecodeError extends ProvenanceError {
  readonly code = 'NOTE_DECODE_ERROR';
  readonly retryable = false;

  constructor(
    readonly commitId: string,
    message: string,
  ) {
    super(`Note for commit ${commitId} is not a valid provenance record: ${message}`);
    this.name = 'NoteDecodeError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { commitId: this.commitId } };
  }
}

export class PromptDecodeError extends ProvenanceError {
  readonly code = 'PROMPT_DECODE_ERROR';
  readonly retryable = false;

  constructor(
    readonly promptId: string,
    message: string,
  ) {
    super(`Prompt ${promptId} is not a valid prompt record: ${message}`);
    this.name = 'PromptDecodeError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { promptId: this.promptId } };
  }
}

export class NoteMergeConflictError extends ProvenanceError {
  readonly code = 'NOTE_MERGE_CONFLICT';
  readonly retryable = false;

  constructor(
    readonly notesRef: string,
    readonly otherRef: string,
    readonly commitIds: readonly string[],
  ) {
    super(
      `Notes ${notesRef} and ${otherRef} both changed ${commitIds.length} commit(s) differently: ${commitIds.join(', ')}`
    );
    this.name = 'NoteMergeConflictError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { notesRef: this.notesRef, otherRef: this.otherRef, commitIds: [...this.commitIds] },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends ProvenanceError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends ProvenanceError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return { ...super.toJSON(), details: { configKey: this.configKey } };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isProvenanceError(error: unknown): error is ProvenanceError {
  return error instanceof ProvenanceError;
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof ProvenanceError && error.retryable;
}

export function isWriteConflict(error: unknown): error is WriteConflictError {
  return error instanceof WriteConflictError;
}

/**
 * Message text of any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

// ============================================================================
// ERROR FACTORY
// ============================================================================

export const Errors = {
  malformedTag: (line: number, raw: string, reason: string, path?: string) =>
    new MalformedTagError(line, raw, reason, path),

  blockResolution: (path: string, detail: string, line?: number) =>
    new BlockResolutionError(path, detail, line),

  notARepository: (workspace: string) =>
    new NotARepositoryError(workspace),

  unknownRevision: (revision: string) =>
    new UnknownRevisionError(revision),

  fileNotFound: (path: string, revision: string) =>
    new FileNotFoundAtRevisionError(path, revision),

  git: (args: readonly string[], exitCode: number | undefined, stderr: string) =>
    new GitCommandError(args, exitCode, stderr),

  writeConflict: (notesRef: string, commitId: string, attempts: number) =>
    new WriteConflictError(notesRef, commitId, attempts),

  noteDecode: (commitId: string, message: string) =>
    new NoteDecodeError(commitId, message),

  promptDecode: (promptId: string, message: string) =>
    new PromptDecodeError(promptId, message),

  mergeConflict: (notesRef: string, otherRef: string, commitIds: readonly string[]) =>
    new NoteMergeConflictError(notesRef, otherRef, commitIds),

  validation: (field: string, expected: string, received: string) =>
    new ValidationError(field, expected, received),

  config: (key: string, message: string) =>
    new ConfigurationError(key, message),
};
