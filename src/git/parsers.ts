import type { CommitInfo, NotesTreeEntry } from './types.js';

const OBJECT_ID = /^(?:[0-9a-f]{40}|[0-9a-f]{64})$/;

export function isObjectId(value: string): boolean {
  return OBJECT_ID.test(value);
}

export function normalizePath(value: string): string {
  return value.replace(/\\/g, '/').trim();
}

/** Split NUL-terminated git output (`-z`). */
export function splitNul(output: string): string[] {
  return output.split('\u0000').filter((entry) => entry.length > 0);
}

/**
 * Parse `git log --pretty=format:%x1e%H%x1f%cI%x1f%s`.
 *
 * Each record starts with a record separator; fields are unit-separated.
 */
export function parseCommitLog(output: string): CommitInfo[] {
  const commits: CommitInfo[] = [];
  const records = output.split('\u001e').map((chunk) => chunk.trim()).filter(Boolean);
  for (const record of records) {
    const header = record.split(/\r?\n/)[0] ?? '';
    if (!header.includes('\u001f')) continue;
    const [id = '', timestamp = '', ...subject] = header.split('\u001f');
    if (!isObjectId(id)) continue;
    commits.push({ id, timestamp, subject: subject.join('\u001f') });
  }
  return commits;
}

/**
 * Parse `git ls-tree -r -z <notes-commit>`.
 *
 * Notes trees fan out (`ab/cdef...`) once they grow; the annotated commit
 * id is the path with separators removed. Entries that are not notes are
 * skipped.
 */
export function parseNotesTree(output: string): NotesTreeEntry[] {
  const entries: NotesTreeEntry[] = [];
  for (const line of splitNul(output)) {
    const tab = line.indexOf('\t');
    if (tab < 0) continue;
    const [, type = '', blobId = ''] = line.slice(0, tab).split(' ');
    const commitId = line.slice(tab + 1).replace(/\//g, '');
    if (type !== 'blob' || !isObjectId(commitId) || !isObjectId(blobId)) continue;
    entries.push({ commitId, blobId });
  }
  return entries;
}

/** True when `git update-ref` failed because the ref moved underneath it. */
export function isRefRace(stderr: string): boolean {
  return /cannot lock ref|but expected|reference already exists|is at [0-9a-f]+ but/i.test(stderr);
}

export function isNotARepositoryMessage(stderr: string): boolean {
  return /not a git repository/i.test(stderr);
}
