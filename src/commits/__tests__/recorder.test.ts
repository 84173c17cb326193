import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryGitClient } from '../../__tests__/helpers/memory_git.js';
import { GitCommandError } from '../../core/errors.js';
import { ToolRegistry } from '../../model/tools.js';
import { NotesStore } from '../../notes/store.js';
import { commitWithProvenance, hasProvenance, recordCommit } from '../recorder.js';

const NOW = new Date('2026-02-01T10:00:00.000Z');

describe('commit recording', () => {
  let git: MemoryGitClient;
  let store: NotesStore;

  beforeEach(() => {
    git = new MemoryGitClient();
    git.addCommit({ 'src/a.ts': 'a\n' });
    store = new NotesStore(git);
  });

  it('records the touched files of an existing commit', async () => {
    const commitId = git.addCommit({ 'src/b.ts': 'b\n', 'src/a.ts': null });

    const record = await recordCommit(store, git, 'HEAD', { tool: 'copilot', trace: ['SPEC-002'] }, NOW);

    expect(record).toEqual({
      commitId,
      aiTool: 'copilot',
      confidence: 'med',
      trace: ['SPEC-002'],
      tests: [],
      files: ['src/a.ts', 'src/b.ts'],
    });
  });

  it('commits with the conventional message and writes the note', async () => {
    git.modify({ 'src/a.ts': 'a2\n' });
    git.stage({ 'src/b.ts': 'b\n' });

    const outcome = await commitWithProvenance(
      store,
      git,
      {
        message: 'feat: add b',
        tool: 'claude',
        confidence: 'high',
        trace: ['SPEC-001'],
        reviewer: 'alice@example.com',
      },
      NOW
    );

    expect(outcome.message).toBe('[AI:claude:high] feat: add b\n\nTrace: SPEC-001\nReviewed-by: AI+alice@example.com\n');
    expect(git.messageOf(outcome.commitId)).toBe(outcome.message);
    expect(outcome.record).toEqual({
      commitId: outcome.commitId,
      aiTool: 'claude',
      confidence: 'high',
      trace: ['SPEC-001'],
      tests: [],
      reviewedBy: 'alice@example.com',
      reviewedAt: '2026-02-01T10:00:00.000Z',
      files: ['src/a.ts', 'src/b.ts'],
    });
    expect(await store.read(outcome.commitId)).toEqual(outcome.record);
  });

  it('names the same tool in the message and the note', async () => {
    const configured = new NotesStore(git, { registry: new ToolRegistry(['windsurf']) });
    git.stage({ 'src/c.ts': 'c\n' });

    const outcome = await commitWithProvenance(configured, git, { message: 'feat: add c', tool: 'Windsurf' }, NOW);

    expect(outcome.message).toBe('[AI:windsurf:med] feat: add c\n');
    expect(outcome.record?.aiTool).toBe('windsurf');
  });

  it('writes no note for a commit without provenance', async () => {
    git.stage({ 'README.md': '# readme\n' });

    const outcome = await commitWithProvenance(store, git, { message: 'docs: readme' }, NOW);

    expect(outcome.record).toBeNull();
    expect(await store.read(outcome.commitId)).toBeNull();
  });

  it('propagates a failed commit', async () => {
    await expect(commitWithProvenance(store, git, { message: 'chore: nothing', tool: 'claude' })).rejects.toBeInstanceOf(
      GitCommandError
    );
  });

  it('detects provenance fields', () => {
    expect(hasProvenance({})).toBe(false);
    expect(hasProvenance({ trace: [] })).toBe(false);
    expect(hasProvenance({ tests: ['TC-1'] })).toBe(true);
    expect(hasProvenance({ confidence: 'high' })).toBe(false);
  });
});
