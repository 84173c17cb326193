import type { GitClient } from '../git/types.js';
import type { AiTool, CommitRecord, Confidence } from '../model/types.js';
import type { NotesStore } from '../notes/store.js';
import { logInfo } from '../telemetry/logger.js';
import { buildCommitMessage, type CommitMessageInput } from './message.js';

export interface ProvenanceFields {
  tool?: AiTool;
  confidence?: Confidence;
  trace?: readonly string[];
  tests?: readonly string[];
  reviewer?: string;
  /** ISO-8601; defaults to the recording time when a reviewer is given. */
  reviewedAt?: string;
}

export interface CommitWithProvenanceInput extends CommitMessageInput {
  /** Include modified tracked files, like `git commit -a`. Defaults to true. */
  all?: boolean;
}

export interface CommitOutcome {
  readonly commitId: string;
  readonly message: string;
  /** Null when no provenance field was given. */
  readonly record: CommitRecord | null;
}

export function hasProvenance(fields: ProvenanceFields): boolean {
  return Boolean(fields.tool || fields.reviewer || fields.trace?.length || fields.tests?.length);
}

/**
 * Write the CommitRecord for an existing commit, listing the files it touched.
 */
export async function recordCommit(
  store: NotesStore,
  git: GitClient,
  revision: string,
  fields: ProvenanceFields,
  now: Date = new Date()
): Promise<CommitRecord> {
  const commitId = await store.resolveCommit(revision);
  const files = await git.changedFiles(commitId);
  return store.write(commitId, {
    aiTool: fields.tool,
    confidence: fields.tool ? fields.confidence ?? 'med' : fields.confidence,
    trace: fields.trace ?? [],
    tests: fields.tests ?? [],
    reviewedBy: fields.reviewer,
    reviewedAt: fields.reviewer ? fields.reviewedAt ?? now.toISOString() : undefined,
    files,
  });
}

/**
 * Create a commit whose message follows the convention, then record its
 * provenance note when any provenance field is set.
 */
export async function commitWithProvenance(
  store: NotesStore,
  git: GitClient,
  input: CommitWithProvenanceInput,
  now: Date = new Date()
): Promise<CommitOutcome> {
  await store.ensureRepository();
  const message = buildCommitMessage(input, store.registry);
  const commitId = await git.commit(message, { all: input.all ?? true });

  if (!hasProvenance(input)) {
    return { commitId, message, record: null };
  }
  const record = await recordCommit(store, git, commitId, input, now);
  logInfo('Recorded commit provenance', { commitId, tool: record.aiTool, trace: record.trace });
  return { commitId, message, record };
}
