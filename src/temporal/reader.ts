/**
 * @fileoverview Provenance at any point in history
 *
 * File-level provenance lives in the source text, so a historical view is a
 * re-parse of the text at that revision. Commit-level provenance is keyed by
 * commit id in the notes store and needs no replay.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { analyzeFile, type FileAnalysis } from '../blocks/file_record.js';
import { BlockResolutionError, Errors, type MalformedTagError } from '../core/errors.js';
import type { GitClient } from '../git/types.js';
import type { ToolRegistry } from '../model/tools.js';
import { WORKING_TREE, type CommitRecord, type FileRecord } from '../model/types.js';
import type { NotesStore } from '../notes/store.js';
import { logDebug, logWarning } from '../telemetry/logger.js';
import { buildExcludeMatchers, isExcluded } from '../utils/glob.js';

export interface TemporalReaderOptions {
  languageOverrides?: Readonly<Record<string, string>>;
  registry?: ToolRegistry;
}

export interface SnapshotRepositoryOptions {
  /** Glob patterns of paths to leave out. */
  exclude?: readonly string[];
}

export interface RepositorySnapshot {
  /** Commit id, or WORKING_TREE */
  readonly revision: string;
  readonly files: readonly FileRecord[];
  readonly warnings: readonly MalformedTagError[];
  /** Files whose block resolution failed; they are absent from `files`. */
  readonly failures: readonly BlockResolutionError[];
  /** Binary or unreadable paths. */
  readonly skipped: readonly string[];
}

export class TemporalReader {
  constructor(
    private readonly git: GitClient,
    private readonly store: NotesStore,
    private readonly options: TemporalReaderOptions = {}
  ) {}

  /**
   * Parse one file as it was at `revision`, or as it is on disk.
   *
   * @throws UnknownRevisionError, FileNotFoundAtRevisionError
   */
  async snapshot(filePath: string, revision: string = WORKING_TREE): Promise<FileAnalysis> {
    const relative = toRelative(filePath);
    if (revision === WORKING_TREE) {
      const text = await this.readWorkingFile(relative);
      if (text === null) throw Errors.fileNotFound(relative, WORKING_TREE);
      return this.analyze(relative, WORKING_TREE, text);
    }

    const commitId = await this.resolve(revision);
    const text = await this.git.readFileAt(commitId, relative);
    if (text === null) throw Errors.fileNotFound(relative, revision);
    return this.analyze(relative, commitId, text);
  }

  /**
   * Commit-level record for a revision, or null when it was never annotated.
   */
  async commitRecord(revision: string): Promise<CommitRecord | null> {
    await this.resolve(revision);
    return this.store.read(revision);
  }

  /**
   * Analyze every tracked text file at a revision. Bad tags and files that
   * fail block resolution are reported next to the results.
   */
  async snapshotRepository(
    revision: string = WORKING_TREE,
    options: SnapshotRepositoryOptions = {}
  ): Promise<RepositorySnapshot> {
    await this.store.ensureRepository();
    const resolved = revision === WORKING_TREE ? WORKING_TREE : await this.resolve(revision);
    const paths = resolved === WORKING_TREE
      ? await this.git.listTrackedFiles()
      : await this.git.listFilesAt(resolved);
    const matchers = buildExcludeMatchers(options.exclude ?? []);

    const files: FileRecord[] = [];
    const warnings: MalformedTagError[] = [];
    const failures: BlockResolutionError[] = [];
    const skipped: string[] = [];

    for (const filePath of paths) {
      if (isExcluded(filePath, matchers)) continue;
      const text = resolved === WORKING_TREE
        ? await this.readWorkingFile(filePath)
        : await this.git.readFileAt(resolved, filePath);
      if (text === null || text.includes('\u0000')) {
        skipped.push(filePath);
        continue;
      }
      try {
        const analysis = this.analyze(filePath, resolved, text);
        files.push(analysis.record);
        warnings.push(...analysis.warnings);
      } catch (error) {
        if (!(error instanceof BlockResolutionError)) throw error;
        logWarning('Block resolution failed', { path: filePath, revision: resolved, detail: error.detail });
        failures.push(error);
      }
    }

    logDebug('Repository snapshot', { revision: resolved, files: files.length, skipped: skipped.length });
    return { revision: resolved, files, warnings, failures, skipped };
  }

  private analyze(filePath: string, revision: string, text: string): FileAnalysis {
    return analyzeFile(filePath, revision, text, {
      languageOverrides: this.options.languageOverrides,
      registry: this.options.registry,
    });
  }

  private async resolve(revision: string): Promise<string> {
    await this.store.ensureRepository();
    return this.store.resolveCommit(revision);
  }

  private async readWorkingFile(relative: string): Promise<string | null> {
    try {
      return await readFile(path.join(this.git.workspace, relative), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }
}

function toRelative(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/^\.\//, '');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR');
}
