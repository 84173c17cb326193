import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryGitClient } from '../../__tests__/helpers/memory_git.js';
import {
  GitCommandError,
  NoteDecodeError,
  NoteMergeConflictError,
  NotARepositoryError,
  UnknownRevisionError,
  ValidationError,
  WriteConflictError,
} from '../../core/errors.js';
import { createCommitRecord } from '../../model/types.js';
import { encodeCommitRecord } from '../codec.js';
import { NotesStore, resolveNotesRef, type NoteEntry } from '../store.js';

const REMOTE_REF = 'refs/notes/remotes/origin/ai-provenance';

async function collect(entries: AsyncIterable<NoteEntry>): Promise<string[]> {
  const ids: string[] = [];
  for await (const entry of entries) ids.push(entry.commitId);
  return ids;
}

function noteText(commitId: string, tool: string, confidence: 'high' | 'med' | 'low'): string {
  return encodeCommitRecord(createCommitRecord(commitId, { aiTool: tool, confidence }));
}

describe('NotesStore', () => {
  let git: MemoryGitClient;
  let store: NotesStore;
  let c1: string;
  let c2: string;
  let c3: string;

  beforeEach(() => {
    git = new MemoryGitClient();
    c1 = git.addCommit({ 'src/a.ts': 'a\n' });
    c2 = git.addCommit({ 'src/b.ts': 'b\n' });
    c3 = git.addCommit({ 'src/c.ts': 'c\n' });
    store = new NotesStore(git);
  });

  describe('write and read', () => {
    it('round-trips a record', async () => {
      const written = await store.write(c1, {
        aiTool: 'claude',
        confidence: 'high',
        trace: ['SPEC-001'],
        files: ['src/a.ts'],
      });

      expect(written).toEqual({
        commitId: c1,
        aiTool: 'claude',
        confidence: 'high',
        trace: ['SPEC-001'],
        tests: [],
        files: ['src/a.ts'],
      });
      expect(await store.read(c1)).toEqual(written);
    });

    it('stores the canonical single-line encoding', async () => {
      await store.write(c1, { aiTool: 'claude', confidence: 'high', trace: ['SPEC-001'], files: ['src/a.ts'] });

      const notesCommit = git.refs.get('refs/notes/ai-provenance');
      expect(notesCommit).toBeDefined();
      const [entry] = await git.listNotes(notesCommit ?? '');
      expect(await git.readBlob(entry?.blobId ?? '')).toBe(
        '{"ai_tool":"claude","confidence":"high","trace":["SPEC-001"],"tests":[],"files":["src/a.ts"]}\n'
      );
    });

    it('resolves symbolic revisions to commit ids', async () => {
      const written = await store.write('HEAD', { aiTool: 'copilot', confidence: 'low' });
      expect(written.commitId).toBe(c3);
      expect(await store.read('HEAD~2')).toBeNull();
      expect((await store.read(c3))?.aiTool).toBe('copilot');
    });

    it('returns null for a commit without a note', async () => {
      expect(await store.read(c2)).toBeNull();
    });

    it('normalizes unregistered tools to other', async () => {
      const written = await store.write(c1, { aiTool: 'Windsurf', confidence: 'med' });
      expect(written.aiTool).toBe('other');
    });

    it('lets the last write win', async () => {
      await store.write(c1, { aiTool: 'claude', confidence: 'high' });
      await store.write(c1, { aiTool: 'gemini', confidence: 'low', reviewedBy: 'reviewer@example.com' });

      const record = await store.read(c1);
      expect(record?.aiTool).toBe('gemini');
      expect(record?.confidence).toBe('low');
      expect(record?.reviewedBy).toBe('reviewer@example.com');
      expect(await store.entries()).toHaveLength(1);
    });

    it('rejects writes outside a repository', async () => {
      git.repository = false;
      await expect(store.write(c1, { aiTool: 'claude', confidence: 'high' })).rejects.toBeInstanceOf(
        NotARepositoryError
      );
    });

    it('rejects unknown revisions', async () => {
      await expect(store.write('deadbeef', { aiTool: 'claude', confidence: 'high' })).rejects.toBeInstanceOf(
        UnknownRevisionError
      );
      await expect(store.read('no-such-branch')).rejects.toBeInstanceOf(UnknownRevisionError);
    });

    it('rejects invalid fields', async () => {
      await expect(
        store.write(c1, { aiTool: 'claude', confidence: 'high', reviewedAt: 'yesterday' })
      ).rejects.toBeInstanceOf(ValidationError);
      expect(git.refs.has('refs/notes/ai-provenance')).toBe(false);
    });

    it('writes back a note read with a timezone-less review time', async () => {
      git.writeNoteDirect(
        store.notesRef,
        c1,
        '{\n  "ai_tool": "claude",\n  "confidence": "med",\n  "reviewed_by": "reviewer@example.com",\n  "reviewed_at": "2025-11-16T14:00:00.123456"\n}'
      );
      const legacy = await store.read(c1);
      if (!legacy) throw new Error('expected the existing note');
      expect(legacy.reviewedAt).toBe('2025-11-16T14:00:00.123456');

      const rewritten = await store.write(c1, { ...legacy, trace: ['SPEC-001'] });

      expect(rewritten).toEqual({ ...legacy, trace: ['SPEC-001'] });
      expect(await store.read(c1)).toEqual(rewritten);
    });

    it('raises NoteDecodeError when reading a corrupt note', async () => {
      git.writeNoteDirect(store.notesRef, c2, 'not json');
      await expect(store.read(c2)).rejects.toBeInstanceOf(NoteDecodeError);
    });
  });

  describe('concurrent writers', () => {
    it('retries when the ref moves once and keeps both notes', async () => {
      let moves = 0;
      git.beforeUpdateRef = (ref) => {
        if (moves > 0) return;
        moves += 1;
        git.writeNoteDirect(ref, c2, noteText(c2, 'copilot', 'low'));
      };

      await store.write(c1, { aiTool: 'claude', confidence: 'high' });

      const ids = (await store.entries()).map((entry) => entry.commitId).sort();
      expect(ids).toEqual([c1, c2].sort());
    });

    it('surfaces WriteConflictError after the bounded retries', async () => {
      const bounded = new NotesStore(git, { maxWriteRetries: 2 });
      let moves = 0;
      git.beforeUpdateRef = (ref) => {
        moves += 1;
        git.writeNoteDirect(ref, c2, noteText(c2, 'copilot', 'low'));
      };

      const error = await bounded.write(c1, { aiTool: 'claude', confidence: 'high' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WriteConflictError);
      expect(error).toMatchObject({ commitId: c1, attempts: 3, retryable: true });
      expect(moves).toBe(3);
      git.beforeUpdateRef = undefined;
      expect(await bounded.read(c1)).toBeNull();
      expect((await bounded.read(c2))?.aiTool).toBe('copilot');
    });
  });

  describe('list', () => {
    beforeEach(async () => {
      await store.write(c1, { aiTool: 'claude', confidence: 'high' });
      await store.write(c3, { aiTool: 'copilot', confidence: 'med' });
    });

    it('yields annotated commits newest first', async () => {
      expect(await collect(store.list())).toEqual([c3, c1]);
    });

    it('bounds the walk by revisions', async () => {
      expect(await collect(store.list({ since: c1 }))).toEqual([c3]);
      expect(await collect(store.list({ until: c2 }))).toEqual([c1]);
    });

    it('bounds the walk by dates', async () => {
      expect(await collect(store.list({ since: '2026-01-01T00:02:00Z' }))).toEqual([c3]);
      expect(await collect(store.list({ until: '2026-01-01T00:02:30Z' }))).toEqual([c1]);
    });

    it('resumes after a cursor', async () => {
      expect(await collect(store.list({ cursor: c3 }))).toEqual([c1]);
      expect(await collect(store.list({ cursor: c1 }))).toEqual([]);
    });

    it('skips undecodable notes', async () => {
      git.writeNoteDirect(store.notesRef, c2, '{"confidence":"certain"}');
      expect(await collect(store.list())).toEqual([c3, c1]);
    });

    it('reads the notes ref once per call', async () => {
      const iterator = store.list();
      const first = await iterator.next();
      await store.write(c2, { aiTool: 'gemini', confidence: 'low' });
      const rest = await collect(iterator);

      expect(first).toMatchObject({ done: false, value: { commitId: c3 } });
      expect(rest).toEqual([c1]);
    });

    it('includes notes on commits HEAD no longer reaches', async () => {
      git.refs.set('HEAD', c1);
      const c4 = git.addCommit({ 'src/d.ts': 'd\n' });
      await store.write(c4, { aiTool: 'gemini', confidence: 'low' });

      expect(await collect(store.list())).toEqual([c4, c3, c1]);
      expect((await store.entries()).map((entry) => entry.commitId).sort()).toEqual([c1, c3, c4].sort());
    });

    it('keeps bounded walks to reachable commits', async () => {
      git.refs.set('HEAD', c1);
      const c4 = git.addCommit({ 'src/d.ts': 'd\n' });
      await store.write(c4, { aiTool: 'gemini', confidence: 'low' });

      expect(await collect(store.list({ until: 'HEAD' }))).toEqual([c4, c1]);
    });

    it('lists notes whose commit is gone last', async () => {
      const missing = 'f'.repeat(40);
      git.writeNoteDirect(store.notesRef, missing, noteText(missing, 'cursor', 'med'));

      expect(await collect(store.list())).toEqual([c3, c1, missing]);
      expect(await collect(store.list({ cursor: c1 }))).toEqual([missing]);
    });

    it('is empty when no notes exist', async () => {
      const fresh = new NotesStore(git, { notesRef: 'other-namespace' });
      expect(fresh.notesRef).toBe('refs/notes/other-namespace');
      expect(await collect(fresh.list())).toEqual([]);
    });
  });

  describe('remove', () => {
    it('purges an existing note', async () => {
      await store.write(c1, { aiTool: 'claude', confidence: 'high' });
      expect(await store.remove(c1)).toBe(true);
      expect(await store.read(c1)).toBeNull();
    });

    it('reports a missing note', async () => {
      expect(await store.remove(c2)).toBe(false);
    });
  });

  describe('merge', () => {
    beforeEach(async () => {
      await store.write(c1, { aiTool: 'claude', confidence: 'high' });
      const shared = git.refs.get(store.notesRef);
      if (!shared) throw new Error('expected a notes commit');
      git.refs.set(REMOTE_REF, shared);
    });

    it('unions notes for disjoint commits', async () => {
      git.writeNoteDirect(REMOTE_REF, c2, noteText(c2, 'copilot', 'low'));
      await store.write(c3, { aiTool: 'cursor', confidence: 'med' });

      const plan = await store.detectConflicts(REMOTE_REF);
      expect(plan.conflicts).toEqual([]);
      expect([...plan.set.keys()]).toEqual([c2]);

      expect(await store.merge(REMOTE_REF)).toBe('merged');
      const ids = (await store.entries()).map((entry) => entry.commitId).sort();
      expect(ids).toEqual([c1, c2, c3].sort());
      expect(await store.merge(REMOTE_REF)).toBe('up-to-date');
    });

    it('flags a commit changed differently on both sides', async () => {
      git.writeNoteDirect(REMOTE_REF, c1, noteText(c1, 'copilot', 'low'));
      await store.write(c1, { aiTool: 'claude', confidence: 'med' });
      const before = git.refs.get(store.notesRef);

      const error = await store.merge(REMOTE_REF).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NoteMergeConflictError);
      expect(error).toMatchObject({ commitIds: [c1] });
      expect(git.refs.get(store.notesRef)).toBe(before);
      expect((await store.read(c1))?.confidence).toBe('med');
    });

    it('accepts the same change made on both sides', async () => {
      git.writeNoteDirect(REMOTE_REF, c1, noteText(c1, 'gemini', 'low'));
      await store.write(c1, { aiTool: 'gemini', confidence: 'low' });

      expect((await store.detectConflicts(REMOTE_REF)).conflicts).toEqual([]);
      expect(await store.merge(REMOTE_REF)).toBe('merged');
      expect((await store.read(c1))?.aiTool).toBe('gemini');
    });

    it('fast-forwards when this side has nothing new', async () => {
      const remoteTip = git.writeNoteDirect(REMOTE_REF, c2, noteText(c2, 'copilot', 'low'));

      expect(await store.merge(REMOTE_REF)).toBe('fast-forward');
      expect(git.refs.get(store.notesRef)).toBe(remoteTip);
    });
  });

  describe('publish and fetch', () => {
    it('pushes the notes ref to the remote', async () => {
      const remote = git.addRemote('origin');
      await store.write(c1, { aiTool: 'claude', confidence: 'high' });

      await store.publish('origin');

      expect(remote.get('refs/notes/ai-provenance')).toBe(git.refs.get('refs/notes/ai-provenance'));
    });

    it('fetches into a remote tracking ref and merges on pull', async () => {
      const remote = git.addRemote('origin');
      const remoteTip = git.writeNoteDirect('refs/notes/elsewhere', c2, noteText(c2, 'chatgpt', 'med'));
      remote.set('refs/notes/ai-provenance', remoteTip);

      expect(await store.fetch('origin')).toBe(REMOTE_REF);
      expect(git.refs.get(REMOTE_REF)).toBe(remoteTip);
      expect(await store.pull('origin')).toBe('fast-forward');
      expect((await store.read(c2))?.aiTool).toBe('chatgpt');
    });

    it('fails for an unknown remote', async () => {
      await expect(store.publish('nowhere')).rejects.toBeInstanceOf(GitCommandError);
    });
  });

  it('accepts full refs and namespaces', () => {
    expect(resolveNotesRef('ai-provenance')).toBe('refs/notes/ai-provenance');
    expect(resolveNotesRef('refs/notes/custom')).toBe('refs/notes/custom');
  });
});
