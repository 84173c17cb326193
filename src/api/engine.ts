/**
 * @fileoverview Provenance engine facade
 *
 * Wires configuration, git access, the notes store, the prompt store, the
 * temporal reader and the requirements source for callers such as a CLI or report renderer.
 * Aggregations return plain structured values; rendering happens elsewhere.
 */

import { access, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import type { FileAnalysis } from '../blocks/file_record.js';
import {
  buildTraceMatrix,
  computePercentage,
  findUnreviewed,
  validateProvenance,
  type PercentageReport,
  type UnreviewedItem,
  type ValidationOptions,
  type ValidationReport,
} from '../aggregate/index.js';
import { commitWithProvenance, recordCommit, type CommitOutcome, type CommitWithProvenanceInput, type ProvenanceFields } from '../commits/recorder.js';
import { loadProvenanceConfig, type ProvenanceConfig } from '../config/provenance_config.js';
import { Errors } from '../core/errors.js';
import { createGitClient } from '../git/execa_client.js';
import type { GitClient } from '../git/types.js';
import { ToolRegistry } from '../model/tools.js';
import { WORKING_TREE, type CommitRecord, type Tag, type TraceEntry } from '../model/types.js';
import { NotesStore, type CommitFields, type ListOptions, type MergeOutcome, type NoteEntry } from '../notes/store.js';
import { PromptStore } from '../prompts/store.js';
import { loadYamlRequirements, type RequirementsProvider } from '../requirements/provider.js';
import { stampText, type StampPosition } from '../tags/formatter.js';
import { logDebug } from '../telemetry/logger.js';
import { TemporalReader, type RepositorySnapshot } from '../temporal/reader.js';

export interface EngineOptions {
  /** Skips reading `.provenance.yaml`. */
  config?: ProvenanceConfig;
  git?: GitClient;
  /** Null disables requirement lookups; undefined loads them from config. */
  requirements?: RequirementsProvider | null;
  env?: NodeJS.ProcessEnv;
}

export interface ProvenanceSnapshot {
  readonly repository: RepositorySnapshot;
  readonly commits: readonly CommitRecord[];
}

export class ProvenanceEngine {
  readonly store: NotesStore;
  readonly reader: TemporalReader;
  readonly prompts: PromptStore;
  readonly registry: ToolRegistry;

  constructor(
    readonly workspace: string,
    readonly config: ProvenanceConfig,
    readonly git: GitClient,
    readonly requirements: RequirementsProvider | null
  ) {
    this.registry = new ToolRegistry(config.tools);
    this.store = new NotesStore(git, {
      notesRef: config.notesRef,
      maxWriteRetries: config.maxWriteRetries,
      retryDelayMs: config.retryDelayMs,
      registry: this.registry,
    });
    this.reader = new TemporalReader(git, this.store, {
      languageOverrides: config.languages,
      registry: this.registry,
    });
    this.prompts = new PromptStore(workspace, { directory: config.promptsDir, registry: this.registry });
  }

  // ==========================================================================
  // FILES AND COMMITS
  // ==========================================================================

  snapshot(filePath: string, revision: string = WORKING_TREE): Promise<FileAnalysis> {
    return this.reader.snapshot(filePath, revision);
  }

  snapshotRepository(revision: string = WORKING_TREE, exclude: readonly string[] = this.config.exclude): Promise<RepositorySnapshot> {
    return this.reader.snapshotRepository(revision, { exclude });
  }

  commitRecord(revision: string): Promise<CommitRecord | null> {
    return this.reader.commitRecord(revision);
  }

  writeCommitRecord(revision: string, fields: CommitFields): Promise<CommitRecord> {
    return this.store.write(revision, fields);
  }

  listCommitRecords(options: ListOptions = {}): AsyncGenerator<NoteEntry> {
    return this.store.list(options);
  }

  async collectCommitRecords(options: ListOptions = {}): Promise<CommitRecord[]> {
    const records: CommitRecord[] = [];
    for await (const entry of this.store.list(options)) records.push(entry.record);
    return records;
  }

  recordCommit(revision: string, fields: ProvenanceFields): Promise<CommitRecord> {
    return recordCommit(this.store, this.git, revision, fields);
  }

  commit(input: CommitWithProvenanceInput): Promise<CommitOutcome> {
    return commitWithProvenance(this.store, this.git, input);
  }

  /**
   * Insert or replace the file-level tag of a working-tree file. Returns
   * false when the file already carried exactly this tag.
   *
   * @throws FileNotFoundAtRevisionError
   */
  async stampFile(filePath: string, tag: Tag, position: StampPosition = 'top'): Promise<boolean> {
    const absolute = path.resolve(this.workspace, filePath);
    let text: string;
    try {
      text = await readFile(absolute, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw Errors.fileNotFound(filePath, WORKING_TREE);
      }
      throw error;
    }
    const stamped = stampText(text, tag, filePath, position, this.config.languages, this.registry);
    if (stamped === text) return false;
    await writeFile(absolute, stamped, 'utf8');
    logDebug('Stamped provenance tag', { path: filePath, position });
    return true;
  }

  // ==========================================================================
  // AGGREGATION
  // ==========================================================================

  /**
   * Files at `revision` plus the commit records reachable from it. The
   * working tree view takes every note in the ledger.
   */
  async collect(revision: string = WORKING_TREE): Promise<ProvenanceSnapshot> {
    const repository = await this.snapshotRepository(revision);
    const commits = await this.collectCommitRecords(revision === WORKING_TREE ? {} : { until: revision });
    return { repository, commits };
  }

  async percentage(revision: string = WORKING_TREE): Promise<PercentageReport> {
    return computePercentage((await this.snapshotRepository(revision)).files);
  }

  async unreviewed(revision: string = WORKING_TREE): Promise<UnreviewedItem[]> {
    const { repository, commits } = await this.collect(revision);
    return findUnreviewed(repository.files, commits);
  }

  async traceability(revision: string = WORKING_TREE): Promise<TraceEntry[]> {
    const { repository, commits } = await this.collect(revision);
    return buildTraceMatrix(repository.files, commits, this.requirements);
  }

  async validate(revision: string = WORKING_TREE, options: ValidationOptions = {}): Promise<ValidationReport> {
    const { repository, commits } = await this.collect(revision);
    return validateProvenance(
      repository.files,
      commits,
      {
        requireReview: options.requireReview ?? this.config.validation.requireReview,
        requireTests: options.requireTests ?? this.config.validation.requireTests,
      },
      { warnings: repository.warnings, failures: repository.failures }
    );
  }

  // ==========================================================================
  // SYNC
  // ==========================================================================

  publish(remote: string): Promise<void> {
    return this.store.publish(remote);
  }

  fetch(remote: string): Promise<string> {
    return this.store.fetch(remote);
  }

  merge(otherRef: string): Promise<MergeOutcome> {
    return this.store.merge(otherRef);
  }

  pull(remote: string): Promise<MergeOutcome> {
    return this.store.pull(remote);
  }
}

export async function createProvenanceEngine(workspace: string, options: EngineOptions = {}): Promise<ProvenanceEngine> {
  const root = path.resolve(workspace);
  const config = options.config ?? (await loadProvenanceConfig(root, { env: options.env }));
  const git = options.git ?? createGitClient(root);
  const requirements = options.requirements !== undefined
    ? options.requirements
    : await loadConfiguredRequirements(root, config);
  return new ProvenanceEngine(root, config, git, requirements);
}

async function loadConfiguredRequirements(workspace: string, config: ProvenanceConfig): Promise<RequirementsProvider | null> {
  if (!config.requirements.enabled) return null;
  try {
    await access(path.resolve(workspace, config.requirements.path));
  } catch {
    return null;
  }
  return loadYamlRequirements(workspace, {
    path: config.requirements.path,
    mappingPath: config.requirements.mappingPath,
  });
}
