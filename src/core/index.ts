/**
 * @fileoverview Core infrastructure
 *
 * Result types, retry and the error hierarchy shared by every module.
 */

export {
  type Result,
  type OkResult,
  type ErrResult,
  type RetryOptions,
  Ok,
  Err,
  safeAsync,
  safeSync,
  unwrap,
  withRetry,
} from './result.js';

export {
  type ErrorJSON,
  ProvenanceError,
  MalformedTagError,
  BlockResolutionError,
  NotARepositoryError,
  UnknownRevisionError,
  FileNotFoundAtRevisionError,
  GitCommandError,
  WriteConflictError,
  NoteDecodeError,
  PromptDecodeError,
  NoteMergeConflictError,
  ValidationError,
  ConfigurationError,
  isProvenanceError,
  isRetryableError,
  isWriteConflict,
  getErrorMessage,
  Errors,
} from './errors.js';
