/**
 * @fileoverview Ledger encoding for CommitRecords
 *
 * A note is one line of JSON with keys in a fixed order:
 *
 *   {"ai_tool":..,"confidence":..,"trace":[..],"tests":[..],"reviewed_by":..,"reviewed_at":..,"files":[..]}
 *
 * Absent optional values are omitted. Decoding accepts any JSON layout of
 * the same keys, including indented notes and explicit nulls written by
 * earlier tooling.
 */

import { NoteDecodeError } from '../core/errors.js';
import { Err, Ok, safeSync, type Result } from '../core/result.js';
import { NotePayloadSchema, formatZodIssues, type NotePayload } from '../model/schema.js';
import { createCommitRecord, type CommitRecord } from '../model/types.js';

export function encodeCommitRecord(record: CommitRecord): string {
  const payload: NotePayload = {};
  if (record.aiTool !== undefined) payload.ai_tool = record.aiTool;
  if (record.confidence !== undefined) payload.confidence = record.confidence;
  payload.trace = [...record.trace];
  payload.tests = [...record.tests];
  if (record.reviewedBy !== undefined) payload.reviewed_by = record.reviewedBy;
  if (record.reviewedAt !== undefined) payload.reviewed_at = record.reviewedAt;
  payload.files = [...record.files];
  return JSON.stringify(payload);
}

export function decodeCommitRecord(commitId: string, text: string): Result<CommitRecord, NoteDecodeError> {
  const json = safeSync((): unknown => JSON.parse(text));
  if (!json.ok) return Err(new NoteDecodeError(commitId, json.error.message));

  const parsed = NotePayloadSchema.safeParse(json.value);
  if (!parsed.success) return Err(new NoteDecodeError(commitId, formatZodIssues(parsed.error)));

  const payload = parsed.data;
  return Ok(createCommitRecord(commitId, {
    aiTool: payload.ai_tool ?? undefined,
    confidence: payload.confidence ?? undefined,
    trace: payload.trace ?? [],
    tests: payload.tests ?? [],
    reviewedBy: payload.reviewed_by ?? undefined,
    reviewedAt: payload.reviewed_at ?? undefined,
    files: payload.files ?? [],
  }));
}

/** Two records are equal when their encodings are. */
export function sameRecord(a: CommitRecord, b: CommitRecord): boolean {
  return a.commitId === b.commitId && encodeCommitRecord(a) === encodeCommitRecord(b);
}
