/**
 * @fileoverview Git access seam
 *
 * Everything the engine needs from version control goes through GitClient.
 * The execa-backed implementation shells out to `git`; tests substitute an
 * in-process stand-in with the same contract.
 */

export interface CommitInfo {
  readonly id: string;
  /** Committer date, ISO-8601 */
  readonly timestamp: string;
  readonly subject: string;
}

export interface CommitQuery {
  /** Tip to walk back from. */
  readonly revision: string;
  /** Commits reachable from this revision are left out. */
  readonly exclude?: string;
  readonly sinceDate?: string;
  readonly untilDate?: string;
}

export interface NotesTreeEntry {
  /** Annotated commit */
  readonly commitId: string;
  /** Blob holding the note text */
  readonly blobId: string;
}

export interface NotesChange {
  readonly set?: ReadonlyMap<string, string>;
  readonly remove?: readonly string[];
  /** Second parent, recorded when the change merges another notes history. */
  readonly mergeParent?: string;
}

export interface GitClient {
  readonly workspace: string;

  isRepository(): Promise<boolean>;
  /** Full commit id, or null when the revision does not name a commit. */
  resolveCommit(revision: string): Promise<string | null>;
  /** File text at a commit, or null when the path is absent there. */
  readFileAt(revision: string, filePath: string): Promise<string | null>;
  listFilesAt(revision: string): Promise<string[]>;
  /** Paths tracked in the index. */
  listTrackedFiles(): Promise<string[]>;
  /** Newest first. */
  listCommits(query: CommitQuery): Promise<CommitInfo[]>;
  /** Null when the commit object is not in the repository. */
  describeCommit(commitId: string): Promise<CommitInfo | null>;
  changedFiles(commitId: string): Promise<string[]>;

  readRef(ref: string): Promise<string | null>;
  listNotes(notesCommit: string): Promise<NotesTreeEntry[]>;
  readBlob(blobId: string): Promise<string>;
  /**
   * Build a notes commit on top of `parent` without touching any visible ref.
   * Returns null when the result would be an empty history.
   */
  createNotesCommit(parent: string | null, change: NotesChange): Promise<string | null>;
  /**
   * Compare-and-swap. `expected` null means the ref must not exist yet.
   * Resolves false when the ref moved.
   */
  updateRef(ref: string, value: string, expected: string | null): Promise<boolean>;
  mergeBase(a: string, b: string): Promise<string | null>;

  push(remote: string, refspec: string): Promise<void>;
  fetch(remote: string, refspec: string): Promise<void>;
  /** Commit staged (or, with `all`, tracked modified) changes and return the new id. */
  commit(message: string, options?: { all?: boolean }): Promise<string>;
}
