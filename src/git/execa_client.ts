import { execa } from 'execa';
import { Errors } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import {
  isNotARepositoryMessage,
  isRefRace,
  normalizePath,
  parseCommitLog,
  parseNotesTree,
  splitNul,
} from './parsers.js';
import type { CommitInfo, CommitQuery, GitClient, NotesChange, NotesTreeEntry } from './types.js';

interface GitOutput {
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
}

const MAX_BUFFER = 64 * 1024 * 1024;
const LOG_FORMAT = '--pretty=format:\u001e%H\u001f%cI\u001f%s';

let scratchCounter = 0;

/**
 * GitClient backed by the `git` executable.
 */
export class ExecaGitClient implements GitClient {
  constructor(readonly workspace: string) {}

  private async run(args: string[], input?: string): Promise<GitOutput> {
    logDebug('git', { args });
    const result = await execa('git', args, {
      cwd: this.workspace,
      reject: false,
      stripFinalNewline: false,
      maxBuffer: MAX_BUFFER,
      ...(input !== undefined ? { input } : {}),
    });
    const output = { exitCode: result.exitCode, stdout: String(result.stdout), stderr: String(result.stderr) };
    if (output.exitCode !== 0 && isNotARepositoryMessage(output.stderr)) {
      throw Errors.notARepository(this.workspace);
    }
    return output;
  }

  private async runOrThrow(args: string[], input?: string): Promise<string> {
    const output = await this.run(args, input);
    if (output.exitCode !== 0) {
      throw Errors.git(args, output.exitCode, output.stderr || output.stdout);
    }
    return output.stdout;
  }

  async isRepository(): Promise<boolean> {
    try {
      const output = await this.run(['rev-parse', '--is-inside-work-tree']);
      return output.exitCode === 0 && output.stdout.trim() === 'true';
    } catch {
      return false;
    }
  }

  async resolveCommit(revision: string): Promise<string | null> {
    const output = await this.run(['rev-parse', '--verify', '--quiet', '--end-of-options', `${revision}^{commit}`]);
    const id = output.stdout.trim();
    return output.exitCode === 0 && id ? id : null;
  }

  async readFileAt(revision: string, filePath: string): Promise<string | null> {
    const output = await this.run(['show', `${revision}:${normalizePath(filePath)}`]);
    return output.exitCode === 0 ? output.stdout : null;
  }

  async listFilesAt(revision: string): Promise<string[]> {
    return splitNul(await this.runOrThrow(['ls-tree', '-r', '--name-only', '-z', revision]));
  }

  async listTrackedFiles(): Promise<string[]> {
    return splitNul(await this.runOrThrow(['ls-files', '-z']));
  }

  async listCommits(query: CommitQuery): Promise<CommitInfo[]> {
    const args = [
      'log',
      '--date-order',
      LOG_FORMAT,
      ...(query.sinceDate ? [`--since=${query.sinceDate}`] : []),
      ...(query.untilDate ? [`--until=${query.untilDate}`] : []),
      query.revision,
      ...(query.exclude ? [`^${query.exclude}`] : []),
      '--',
    ];
    return parseCommitLog(await this.runOrThrow(args));
  }

  async describeCommit(commitId: string): Promise<CommitInfo | null> {
    const output = await this.run(['log', '-1', LOG_FORMAT, '--end-of-options', `${commitId}^{commit}`, '--']);
    if (output.exitCode !== 0) return null;
    return parseCommitLog(output.stdout)[0] ?? null;
  }

  async changedFiles(commitId: string): Promise<string[]> {
    const output = await this.runOrThrow(['diff-tree', '--no-commit-id', '--name-only', '-r', '--root', '-z', commitId]);
    return splitNul(output).map(normalizePath);
  }

  async readRef(ref: string): Promise<string | null> {
    const output = await this.run(['rev-parse', '--verify', '--quiet', ref]);
    const id = output.stdout.trim();
    return output.exitCode === 0 && id ? id : null;
  }

  async listNotes(notesCommit: string): Promise<NotesTreeEntry[]> {
    return parseNotesTree(await this.runOrThrow(['ls-tree', '-r', '-z', notesCommit]));
  }

  async readBlob(blobId: string): Promise<string> {
    return this.runOrThrow(['cat-file', 'blob', blobId]);
  }

  async createNotesCommit(parent: string | null, change: NotesChange): Promise<string | null> {
    // Build on a private ref so the visible notes ref only moves through updateRef.
    scratchCounter += 1;
    const scratch = `refs/notes/provenance-scratch/${process.pid}-${Date.now()}-${scratchCounter}`;
    try {
      if (parent) await this.runOrThrow(['update-ref', scratch, parent]);
      for (const [commitId, text] of change.set ?? new Map<string, string>()) {
        await this.runOrThrow(['notes', `--ref=${scratch}`, 'add', '-f', '-F', '-', commitId], text);
      }
      for (const commitId of change.remove ?? []) {
        await this.runOrThrow(['notes', `--ref=${scratch}`, 'remove', '--ignore-missing', commitId]);
      }
      const built = await this.readRef(scratch);
      if (!built || !parent || !change.mergeParent) return built;
      const tree = (await this.runOrThrow(['rev-parse', `${built}^{tree}`])).trim();
      const merged = await this.runOrThrow(
        ['commit-tree', tree, '-p', parent, '-p', change.mergeParent, '-F', '-'],
        'Notes merged by provenance\n'
      );
      return merged.trim();
    } finally {
      await this.run(['update-ref', '-d', scratch]);
    }
  }

  async updateRef(ref: string, value: string, expected: string | null): Promise<boolean> {
    const args = ['update-ref', '-m', 'provenance: update notes', ref, value, expected ?? ''];
    const output = await this.run(args);
    if (output.exitCode === 0) return true;
    if (isRefRace(output.stderr)) return false;
    throw Errors.git(args, output.exitCode, output.stderr);
  }

  async mergeBase(a: string, b: string): Promise<string | null> {
    const output = await this.run(['merge-base', a, b]);
    const id = output.stdout.trim();
    return output.exitCode === 0 && id ? id : null;
  }

  async push(remote: string, refspec: string): Promise<void> {
    await this.runOrThrow(['push', remote, refspec]);
  }

  async fetch(remote: string, refspec: string): Promise<void> {
    await this.runOrThrow(['fetch', remote, refspec]);
  }

  async commit(message: string, options: { all?: boolean } = {}): Promise<string> {
    await this.runOrThrow(['commit', ...(options.all ? ['-a'] : []), '-F', '-'], message);
    return (await this.runOrThrow(['rev-parse', 'HEAD'])).trim();
  }
}

export function createGitClient(workspace: string): GitClient {
  return new ExecaGitClient(workspace);
}
