/**
 * @fileoverview AI provenance metadata engine
 *
 * Records which AI tool produced code, how confident its author was, who
 * reviewed it and which requirements and tests it traces to. File-level
 * provenance lives in inline `ai:` comment tags; commit-level provenance
 * lives in git notes under `refs/notes/ai-provenance`.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createProvenanceEngine } from 'ai-provenance';
 *
 * const engine = await createProvenanceEngine('/path/to/repo');
 * const report = await engine.percentage('HEAD');
 * const matrix = await engine.traceability();
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// PRIMARY ENTRY POINT
// ============================================================================

export {
  ProvenanceEngine,
  createProvenanceEngine,
  type EngineOptions,
  type ProvenanceSnapshot,
} from './api/engine.js';

// ============================================================================
// MODEL
// ============================================================================

export {
  WORKING_TREE,
  DEFAULT_AI_TOOLS,
  CONFIDENCE_LEVELS,
  BLOCK_KINDS,
  isConfidence,
  createTag,
  createCommitRecord,
  type AiTool,
  type Confidence,
  type BlockKind,
  type Tag,
  type LocatedTag,
  type Block,
  type FileRecord,
  type CommitRecord,
  type ReviewStatus,
  type TraceEntry,
} from './model/types.js';
export { ToolRegistry, DEFAULT_TOOL_REGISTRY } from './model/tools.js';

// ============================================================================
// TAGS AND BLOCKS
// ============================================================================

export {
  TAG_MARKER,
  CLOSING_MARKER,
  parseTag,
  parseTagLine,
  scanTags,
  type TagScan,
  type ScanOptions,
} from './tags/parser.js';
export { formatTag, formatTagBody, stampText, type StampPosition } from './tags/formatter.js';
export { commentStyleForPath, listLanguageIds, type CommentStyle } from './tags/comment_styles.js';
export { resolveBlocks, type BlockResolution } from './blocks/resolver.js';
export { analyzeFile, type FileAnalysis } from './blocks/file_record.js';

// ============================================================================
// STORAGE AND HISTORY
// ============================================================================

export {
  NotesStore,
  DEFAULT_NOTES_NAMESPACE,
  resolveNotesRef,
  type CommitFields,
  type ListOptions,
  type NoteEntry,
  type NotesMergePlan,
  type MergeOutcome,
} from './notes/store.js';
export { encodeCommitRecord, decodeCommitRecord } from './notes/codec.js';
export {
  PromptStore,
  DEFAULT_PROMPTS_DIR,
  PROMPT_TYPES,
  type PromptInput,
  type PromptRecord,
  type PromptType,
  type PromptStoreOptions,
} from './prompts/store.js';
export { TemporalReader, type RepositorySnapshot } from './temporal/reader.js';
export { createGitClient, ExecaGitClient } from './git/execa_client.js';
export type { GitClient } from './git/types.js';

// ============================================================================
// COMMITS, REQUIREMENTS, AGGREGATION
// ============================================================================

export { parseCommitMessage, buildCommitMessage, type CommitMessage, type CommitMessageInput } from './commits/message.js';
export { recordCommit, commitWithProvenance, type CommitOutcome, type ProvenanceFields } from './commits/recorder.js';
export {
  createStaticRequirements,
  loadYamlRequirements,
  type Requirement,
  type RequirementsProvider,
} from './requirements/provider.js';
export * from './aggregate/index.js';

// ============================================================================
// CONFIGURATION AND ERRORS
// ============================================================================

export {
  CONFIG_FILE_NAME,
  loadProvenanceConfig,
  parseProvenanceConfig,
  type ProvenanceConfig,
} from './config/provenance_config.js';
export * from './core/index.js';
