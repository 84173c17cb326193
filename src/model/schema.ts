/**
 * @fileoverview Zod validators for stored and user-supplied provenance data
 */

import { z } from 'zod';
import { CONFIDENCE_LEVELS } from './types.js';

export const ConfidenceSchema = z.enum(CONFIDENCE_LEVELS);

const IdListSchema = z.array(z.string().min(1));

/** Review dates on inline tags. */
export const TagDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

/** Ids inside inline tags cannot carry the grammar's separators. */
const TagIdSchema = z.string().regex(/^[^\s,|]+$/, 'id without whitespace, commas or pipes');

const ToolIdSchema = z.string().regex(/^[a-z0-9][a-z0-9._-]*$/, 'lowercase identifier');

export const TagSchema = z.object({
  tool: ToolIdSchema,
  confidence: ConfidenceSchema,
  trace: z.array(TagIdSchema),
  tests: z.array(TagIdSchema),
  reviewer: z.string().regex(/^[^|:\s][^|]*$/, 'reviewer without pipes').optional(),
  reviewedAt: TagDateSchema.optional(),
}).strict().refine(
  (tag) => tag.reviewer === undefined || tag.reviewedAt !== undefined,
  { message: 'reviewer requires a review date', path: ['reviewer'] }
);

/**
 * Note payload as written to the ledger. Snake-case keys are the wire
 * format shared with existing repositories.
 */
export const NotePayloadSchema = z.object({
  ai_tool: ToolIdSchema.nullish(),
  confidence: ConfidenceSchema.nullish(),
  trace: IdListSchema.nullish(),
  tests: IdListSchema.nullish(),
  reviewed_by: z.string().min(1).nullish(),
  reviewed_at: z.string().min(1).nullish(),
  files: IdListSchema.nullish(),
}).passthrough();

export type NotePayload = z.infer<typeof NotePayloadSchema>;

export const CommitRecordInputSchema = z.object({
  aiTool: ToolIdSchema.optional(),
  confidence: ConfidenceSchema.optional(),
  trace: IdListSchema.default([]),
  tests: IdListSchema.default([]),
  reviewedBy: z.string().min(1).optional(),
  reviewedAt: z.string().datetime({ offset: true, local: true }).optional(),
  files: IdListSchema.default([]),
}).strict();

export type CommitRecordInput = z.input<typeof CommitRecordInputSchema>;

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
