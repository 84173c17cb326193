/**
 * @fileoverview Commit-level provenance ledger on git notes
 *
 * One note per commit id under a dedicated notes ref. The visible ref only
 * moves by compare-and-swap: read the ref, build a new notes commit on top of
 * it, then swap. A swap that loses the race is retried a bounded number of
 * times and then surfaces as WriteConflictError.
 *
 * Nothing here talks to a remote unless `publish` or `fetch` is called.
 */

import { Errors, isWriteConflict } from '../core/errors.js';
import { withRetry } from '../core/result.js';
import type { CommitInfo, GitClient, NotesChange, NotesTreeEntry } from '../git/types.js';
import { CommitRecordInputSchema, formatZodIssues } from '../model/schema.js';
import { DEFAULT_TOOL_REGISTRY, type ToolRegistry } from '../model/tools.js';
import { createCommitRecord, type CommitRecord } from '../model/types.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import { decodeCommitRecord, encodeCommitRecord, sameRecord } from './codec.js';

export const DEFAULT_NOTES_NAMESPACE = 'ai-provenance';
export const DEFAULT_MAX_WRITE_RETRIES = 3;

export interface NotesStoreOptions {
  /** Namespace (`ai-provenance`) or full ref (`refs/notes/ai-provenance`). */
  notesRef?: string;
  /** Compare-and-swap attempts after the first one. */
  maxWriteRetries?: number;
  retryDelayMs?: number;
  registry?: ToolRegistry;
}

/** Fields of a CommitRecord other than its id. */
export type CommitFields = Omit<Partial<CommitRecord>, 'commitId'>;

export interface ListOptions {
  /** Revision (exclusive) or date (inclusive) bounding the walk from below. */
  since?: string;
  /** Revision or date to walk back from. Defaults to HEAD. */
  until?: string;
  /** Resume after this commit. */
  cursor?: string;
}

export interface NoteEntry {
  readonly commitId: string;
  readonly record: CommitRecord;
}

/** Result of comparing the local notes ref with another notes history. */
export interface NotesMergePlan {
  readonly ours: string | null;
  readonly theirs: string | null;
  readonly base: string | null;
  /** Notes to take from the other side. */
  readonly set: ReadonlyMap<string, string>;
  /** Notes the other side deleted and this side left untouched. */
  readonly remove: readonly string[];
  /** Commits changed differently on both sides. */
  readonly conflicts: readonly string[];
  /** The other history already contains this one. */
  readonly fastForward: boolean;
}

export type MergeOutcome = 'up-to-date' | 'fast-forward' | 'merged';

const DATE_BOUND = /^\d{4}-\d{2}-\d{2}(?:[T ][0-9:.+\-Z]*)?$/;

export function resolveNotesRef(value: string): string {
  const trimmed = value.trim();
  return trimmed.startsWith('refs/') ? trimmed : `refs/notes/${trimmed}`;
}

export class NotesStore {
  readonly notesRef: string;
  private readonly maxWriteRetries: number;
  private readonly retryDelayMs: number;
  readonly registry: ToolRegistry;

  constructor(private readonly git: GitClient, options: NotesStoreOptions = {}) {
    this.notesRef = resolveNotesRef(options.notesRef ?? DEFAULT_NOTES_NAMESPACE);
    this.maxWriteRetries = Math.max(0, Math.floor(options.maxWriteRetries ?? DEFAULT_MAX_WRITE_RETRIES));
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? 0);
    this.registry = options.registry ?? DEFAULT_TOOL_REGISTRY;
  }

  /** Namespace part of the notes ref, used for remote tracking refs. */
  get namespace(): string {
    return this.notesRef.replace(/^refs\/notes\//, '');
  }

  async ensureRepository(): Promise<void> {
    if (!(await this.git.isRepository())) {
      throw Errors.notARepository(this.git.workspace);
    }
  }

  async resolveCommit(revision: string): Promise<string> {
    const commitId = await this.git.resolveCommit(revision);
    if (!commitId) throw Errors.unknownRevision(revision);
    return commitId;
  }

  // ==========================================================================
  // WRITES
  // ==========================================================================

  /**
   * Store the record for a commit, replacing any earlier one.
   *
   * @throws NotARepositoryError, UnknownRevisionError, ValidationError,
   *   WriteConflictError
   */
  async write(revision: string, fields: CommitFields): Promise<CommitRecord> {
    await this.ensureRepository();
    const commitId = await this.resolveCommit(revision);
    const record = this.validate(commitId, fields);
    await this.update(commitId, { set: new Map([[commitId, encodeCommitRecord(record)]]) });
    logDebug('Wrote provenance note', { notesRef: this.notesRef, commitId });
    return record;
  }

  /**
   * Purge the note for a commit. Returns false when there was none.
   */
  async remove(revision: string): Promise<boolean> {
    await this.ensureRepository();
    const commitId = await this.resolveCommit(revision);
    const snapshot = await this.snapshotNotes();
    if (!snapshot.has(commitId)) {
      logWarning('No provenance note to purge', { notesRef: this.notesRef, commitId });
      return false;
    }
    await this.update(commitId, { remove: [commitId] });
    logInfo('Purged provenance note', { notesRef: this.notesRef, commitId });
    return true;
  }

  private validate(commitId: string, fields: CommitFields): CommitRecord {
    const parsed = CommitRecordInputSchema.safeParse({
      aiTool: fields.aiTool === undefined ? undefined : this.registry.normalize(fields.aiTool),
      confidence: fields.confidence,
      trace: [...(fields.trace ?? [])],
      tests: [...(fields.tests ?? [])],
      reviewedBy: fields.reviewedBy,
      reviewedAt: fields.reviewedAt,
      files: [...(fields.files ?? [])],
    });
    if (!parsed.success) {
      throw Errors.validation('commit record', 'valid provenance fields', formatZodIssues(parsed.error));
    }
    return createCommitRecord(commitId, parsed.data);
  }

  private async update(commitId: string, change: NotesChange): Promise<void> {
    let attempts = 0;
    const result = await withRetry(
      async () => {
        attempts += 1;
        const current = await this.git.readRef(this.notesRef);
        const next = await this.git.createNotesCommit(current, change);
        if (!next) return;
        if (!(await this.git.updateRef(this.notesRef, next, current))) {
          throw Errors.writeConflict(this.notesRef, commitId, attempts);
        }
      },
      {
        maxRetries: this.maxWriteRetries,
        delayMs: this.retryDelayMs,
        shouldRetry: isWriteConflict,
        onRetry: (_error, attempt) => logDebug('Notes ref moved, retrying', { notesRef: this.notesRef, commitId, attempt }),
      }
    );
    if (!result.ok) throw result.error;
  }

  // ==========================================================================
  // READS
  // ==========================================================================

  /**
   * Record for a commit, or null when it has none.
   *
   * @throws UnknownRevisionError, NoteDecodeError
   */
  async read(revision: string): Promise<CommitRecord | null> {
    const commitId = await this.resolveCommit(revision);
    const blobId = (await this.snapshotNotes()).get(commitId);
    if (!blobId) return null;
    const decoded = decodeCommitRecord(commitId, await this.git.readBlob(blobId));
    if (!decoded.ok) throw decoded.error;
    return decoded.value;
  }

  /**
   * Every note in the ledger, regardless of reachability, in tree order.
   * Undecodable notes are skipped with a warning.
   */
  async entries(): Promise<NoteEntry[]> {
    const out: NoteEntry[] = [];
    for (const [commitId, blobId] of await this.snapshotNotes()) {
      const record = await this.decodeOrWarn(commitId, blobId);
      if (record) out.push({ commitId, record });
    }
    return out;
  }

  /**
   * Annotated commits, newest first.
   *
   * With `since` or `until` the walk covers commits reachable from `until`
   * (default HEAD). Without either bound, notes on commits HEAD does not
   * reach (other branches, rewritten history) are merged in by committer
   * date; notes whose commit object is gone come last.
   *
   * The notes ref is read once when iteration starts; later writes are not
   * observed by this walk.
   */
  async *list(options: ListOptions = {}): AsyncGenerator<NoteEntry> {
    const notes = await this.snapshotNotes();
    if (notes.size === 0) return;

    const sinceDate = options.since !== undefined && DATE_BOUND.test(options.since) ? options.since : undefined;
    const untilDate = options.until !== undefined && DATE_BOUND.test(options.until) ? options.until : undefined;
    const bounded = options.since !== undefined || options.until !== undefined;

    const revision = options.until !== undefined && untilDate === undefined
      ? await this.resolveCommit(options.until)
      : await this.git.resolveCommit('HEAD');
    const exclude = options.since !== undefined && sinceDate === undefined
      ? await this.resolveCommit(options.since)
      : undefined;
    const cursor = options.cursor !== undefined ? await this.resolveCommit(options.cursor) : undefined;

    const reachable = revision
      ? await this.git.listCommits({
        revision,
        ...(exclude ? { exclude } : {}),
        ...(sinceDate ? { sinceDate } : {}),
        ...(untilDate ? { untilDate } : {}),
      })
      : [];
    const order = bounded
      ? reachable.map((commit) => commit.id)
      : await this.withUnreachable(reachable, notes);

    let skipping = cursor !== undefined;
    for (const commitId of order) {
      if (skipping) {
        if (commitId === cursor) skipping = false;
        continue;
      }
      const blobId = notes.get(commitId);
      if (!blobId) continue;
      const record = await this.decodeOrWarn(commitId, blobId);
      if (record) yield { commitId, record };
    }
  }

  /**
   * Interleave noted commits outside `reachable` by committer date, keeping
   * the walk order of `reachable` intact.
   */
  private async withUnreachable(reachable: readonly CommitInfo[], notes: ReadonlyMap<string, string>): Promise<string[]> {
    const seen = new Set(reachable.map((commit) => commit.id));
    const dated: CommitInfo[] = [];
    const orphaned: string[] = [];
    for (const commitId of notes.keys()) {
      if (seen.has(commitId)) continue;
      const info = await this.git.describeCommit(commitId);
      if (info) {
        dated.push(info);
      } else {
        orphaned.push(commitId);
      }
    }
    if (dated.length === 0 && orphaned.length === 0) return reachable.map((commit) => commit.id);
    logDebug('Listing notes outside HEAD', { notesRef: this.notesRef, unreachable: dated.length, orphaned: orphaned.length });

    dated.sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp));
    const order: string[] = [];
    let next = 0;
    for (const commit of reachable) {
      let pending = dated[next];
      while (pending && Date.parse(pending.timestamp) > Date.parse(commit.timestamp)) {
        order.push(pending.id);
        next += 1;
        pending = dated[next];
      }
      order.push(commit.id);
    }
    order.push(...dated.slice(next).map((commit) => commit.id));
    return [...order, ...orphaned];
  }

  private async snapshotNotes(ref: string = this.notesRef): Promise<Map<string, string>> {
    const notesCommit = await this.git.readRef(ref);
    if (!notesCommit) return new Map();
    return toNoteMap(await this.git.listNotes(notesCommit));
  }

  private async decodeOrWarn(commitId: string, blobId: string): Promise<CommitRecord | null> {
    const decoded = decodeCommitRecord(commitId, await this.git.readBlob(blobId));
    if (decoded.ok) return decoded.value;
    logWarning('Skipping undecodable provenance note', { commitId, error: decoded.error.message });
    return null;
  }

  // ==========================================================================
  // MERGE AND SYNC
  // ==========================================================================

  /**
   * Compare this ledger with another notes ref (usually a fetched remote
   * one). Notes are compared against the merge base of the two histories.
   */
  async detectConflicts(otherRef: string): Promise<NotesMergePlan> {
    const ours = await this.git.readRef(this.notesRef);
    const theirs = await this.git.readRef(resolveNotesRef(otherRef));
    const empty: NotesMergePlan = { ours, theirs, base: null, set: new Map(), remove: [], conflicts: [], fastForward: false };
    if (!theirs || ours === theirs) return empty;
    if (!ours) return { ...empty, fastForward: true };

    const base = await this.git.mergeBase(ours, theirs);
    if (base === theirs) return { ...empty, base };
    if (base === ours) return { ...empty, base, fastForward: true };

    const ourNotes = toNoteMap(await this.git.listNotes(ours));
    const theirNotes = toNoteMap(await this.git.listNotes(theirs));
    const baseNotes = base ? toNoteMap(await this.git.listNotes(base)) : new Map<string, string>();

    const set = new Map<string, string>();
    const remove: string[] = [];
    const conflicts: string[] = [];
    const commitIds = new Set([...ourNotes.keys(), ...theirNotes.keys()]);

    for (const commitId of commitIds) {
      const ourBlob = ourNotes.get(commitId);
      const theirBlob = theirNotes.get(commitId);
      const baseBlob = baseNotes.get(commitId);
      if (ourBlob === theirBlob || theirBlob === baseBlob) continue;
      if (ourBlob === baseBlob) {
        if (theirBlob) {
          set.set(commitId, await this.git.readBlob(theirBlob));
        } else {
          remove.push(commitId);
        }
        continue;
      }
      if (ourBlob && theirBlob && (await this.equivalentNotes(commitId, ourBlob, theirBlob))) continue;
      conflicts.push(commitId);
    }

    return { ours, theirs, base, set, remove, conflicts: conflicts.sort(), fastForward: false };
  }

  /**
   * Merge another notes history into this one. Disjoint changes are
   * combined; a commit changed differently on both sides is never resolved
   * automatically.
   *
   * @throws NoteMergeConflictError, WriteConflictError
   */
  async merge(otherRef: string): Promise<MergeOutcome> {
    await this.ensureRepository();
    const plan = await this.detectConflicts(otherRef);
    if (plan.conflicts.length > 0) {
      throw Errors.mergeConflict(this.notesRef, resolveNotesRef(otherRef), plan.conflicts);
    }
    if (!plan.theirs) return 'up-to-date';

    if (plan.fastForward) {
      if (!(await this.git.updateRef(this.notesRef, plan.theirs, plan.ours))) {
        throw Errors.writeConflict(this.notesRef, plan.theirs, 1);
      }
      logInfo('Fast-forwarded provenance notes', { notesRef: this.notesRef, otherRef });
      return 'fast-forward';
    }
    if (!plan.ours || plan.ours === plan.theirs || plan.base === plan.theirs) return 'up-to-date';

    const next = await this.git.createNotesCommit(plan.ours, {
      set: plan.set,
      remove: plan.remove,
      mergeParent: plan.theirs,
    });
    if (!next || !(await this.git.updateRef(this.notesRef, next, plan.ours))) {
      throw Errors.writeConflict(this.notesRef, plan.theirs, 1);
    }
    logInfo('Merged provenance notes', {
      notesRef: this.notesRef,
      otherRef,
      taken: plan.set.size,
      removed: plan.remove.length,
    });
    return 'merged';
  }

  private async equivalentNotes(commitId: string, a: string, b: string): Promise<boolean> {
    const left = decodeCommitRecord(commitId, await this.git.readBlob(a));
    const right = decodeCommitRecord(commitId, await this.git.readBlob(b));
    return left.ok && right.ok && sameRecord(left.value, right.value);
  }

  /** Ref that `fetch(remote)` writes to. */
  remoteRef(remote: string): string {
    return `refs/notes/remotes/${remote}/${this.namespace}`;
  }

  async publish(remote: string): Promise<void> {
    await this.ensureRepository();
    await this.git.push(remote, `${this.notesRef}:${this.notesRef}`);
    logInfo('Published provenance notes', { notesRef: this.notesRef, remote });
  }

  /**
   * Fetch the remote ledger into its tracking ref. Returns that ref; merging
   * it is a separate step.
   */
  async fetch(remote: string): Promise<string> {
    await this.ensureRepository();
    const target = this.remoteRef(remote);
    await this.git.fetch(remote, `+${this.notesRef}:${target}`);
    logInfo('Fetched provenance notes', { notesRef: this.notesRef, remote, target });
    return target;
  }

  async pull(remote: string): Promise<MergeOutcome> {
    return this.merge(await this.fetch(remote));
  }
}

function toNoteMap(entries: readonly NotesTreeEntry[]): Map<string, string> {
  return new Map(entries.map((entry) => [entry.commitId, entry.blobId]));
}
