/**
 * @fileoverview Prompt store
 *
 * Keeps the prompts that produced code, one JSON file per prompt under
 * `.ai-prov/prompts/<id>.json`. A prompt links to files through the paths it
 * created or modified and to requirements through their ids.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { Errors } from '../core/errors.js';
import { Err, Ok, safeSync, type Result } from '../core/result.js';
import { ConfidenceSchema, formatZodIssues } from '../model/schema.js';
import { DEFAULT_TOOL_REGISTRY, type ToolRegistry } from '../model/tools.js';
import type { AiTool, Confidence } from '../model/types.js';
import { logDebug, logWarning } from '../telemetry/logger.js';

export const DEFAULT_PROMPTS_DIR = '.ai-prov/prompts';

export const PROMPT_TYPES = [
  'code_generation',
  'code_modification',
  'debugging',
  'refactoring',
  'documentation',
  'testing',
  'explanation',
  'planning',
] as const;

export type PromptType = (typeof PROMPT_TYPES)[number];

const PromptIdSchema = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'id without path separators');

const StringListSchema = z.array(z.string().min(1));

/** On-disk layout; snake_case keys and nulls for absent values. */
const PromptFileSchema = z.object({
  id: PromptIdSchema,
  timestamp: z.string().datetime({ offset: true, local: true }),
  prompt_text: z.string(),
  prompt_type: z.enum(PROMPT_TYPES).default('code_generation'),
  context: z.array(z.string()).nullish(),
  ai_tool: z.string().min(1).default('claude'),
  model: z.string().nullish(),
  temperature: z.number().nullish(),
  max_tokens: z.number().int().positive().nullish(),
  response_summary: z.string().nullish(),
  response_full: z.string().nullish(),
  confidence: ConfidenceSchema.default('high'),
  files_created: StringListSchema.nullish(),
  files_modified: StringListSchema.nullish(),
  lines_generated: z.tuple([z.number().int().positive(), z.number().int().positive()])
    .refine(([start, end]) => start <= end, { message: 'start after end' })
    .nullish(),
  requirement_ids: StringListSchema.nullish(),
  test_ids: StringListSchema.nullish(),
  commit_sha: z.string().regex(/^[0-9a-f]{4,64}$/, 'commit id').nullish(),
  conversation_id: z.string().nullish(),
  message_index: z.number().int().min(0).nullish(),
  tags: z.array(z.string()).nullish(),
  metadata: z.record(z.unknown()).nullish(),
});

type PromptFile = z.infer<typeof PromptFileSchema>;

export interface PromptRecord {
  readonly id: string;
  /** ISO-8601; files written elsewhere may carry no offset. */
  readonly timestamp: string;
  readonly promptText: string;
  readonly promptType: PromptType;
  readonly context: readonly string[];
  readonly aiTool: AiTool;
  readonly model?: string;
  readonly temperature?: number;
  readonly maxTokens?: number;
  readonly responseSummary?: string;
  readonly responseFull?: string;
  readonly confidence: Confidence;
  readonly filesCreated: readonly string[];
  readonly filesModified: readonly string[];
  /** Inclusive, 1-based. */
  readonly linesGenerated?: readonly [number, number];
  readonly requirementIds: readonly string[];
  readonly testIds: readonly string[];
  readonly commitSha?: string;
  readonly conversationId?: string;
  readonly messageIndex?: number;
  readonly tags: readonly string[];
  readonly metadata: Readonly<Record<string, unknown>>;
}

export type PromptInput = Partial<Omit<PromptRecord, 'promptText'>> & { readonly promptText: string };

export interface PromptStoreOptions {
  /** Relative to the workspace. */
  directory?: string;
  registry?: ToolRegistry;
  now?: () => Date;
  generateId?: () => string;
}

export class PromptStore {
  readonly directory: string;
  private readonly registry: ToolRegistry;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(readonly workspace: string, options: PromptStoreOptions = {}) {
    this.directory = path.resolve(workspace, options.directory ?? DEFAULT_PROMPTS_DIR);
    this.registry = options.registry ?? DEFAULT_TOOL_REGISTRY;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Write a prompt, replacing any prompt with the same id. Missing fields
   * take their defaults: a fresh id, the current time, `code_generation`,
   * `claude` and `high`.
   *
   * @throws ValidationError
   */
  async store(input: PromptInput): Promise<PromptRecord> {
    const parsed = PromptFileSchema.safeParse(this.toFile(input));
    if (!parsed.success) {
      throw Errors.validation('prompt', 'a valid prompt record', formatZodIssues(parsed.error));
    }
    const record = this.toRecord(parsed.data);
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.pathFor(record.id), `${JSON.stringify(this.toFile(record), null, 2)}\n`, 'utf8');
    logDebug('Stored prompt', { id: record.id, files: record.filesCreated.length + record.filesModified.length });
    return record;
  }

  /**
   * @returns null when no prompt has this id
   * @throws ValidationError for ids that are not plain file names
   * @throws PromptDecodeError
   */
  async get(id: string): Promise<PromptRecord | null> {
    if (!PromptIdSchema.safeParse(id).success) {
      throw Errors.validation('prompt.id', 'id without path separators', id);
    }
    let text: string;
    try {
      text = await readFile(this.pathFor(id), 'utf8');
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
    const decoded = this.decode(text);
    if (!decoded.ok) throw Errors.promptDecode(id, decoded.error.message);
    return decoded.value;
  }

  /** Every readable prompt, oldest first. Undecodable files are skipped. */
  async list(): Promise<PromptRecord[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }

    const records: PromptRecord[] = [];
    for (const name of names.filter((entry) => entry.endsWith('.json')).sort()) {
      const decoded = this.decode(await readFile(path.join(this.directory, name), 'utf8'));
      if (!decoded.ok) {
        logWarning('Skipping undecodable prompt', { file: name, error: decoded.error.message });
        continue;
      }
      records.push(decoded.value);
    }
    return records.sort(byTimestamp);
  }

  /** Prompts that created or modified `filePath`, oldest first. */
  async listForFile(filePath: string): Promise<PromptRecord[]> {
    const wanted = normalizePath(filePath);
    return (await this.list()).filter((record) =>
      [...record.filesCreated, ...record.filesModified].some((entry) => normalizePath(entry) === wanted)
    );
  }

  /** Prompts tracing to `requirementId`, oldest first. */
  async listForRequirement(requirementId: string): Promise<PromptRecord[]> {
    return (await this.list()).filter((record) => record.requirementIds.includes(requirementId));
  }

  private pathFor(id: string): string {
    return path.join(this.directory, `${id}.json`);
  }

  private decode(text: string): Result<PromptRecord, Error> {
    const raw = safeSync((): unknown => JSON.parse(text));
    if (!raw.ok) return raw;
    const parsed = PromptFileSchema.safeParse(raw.value);
    if (!parsed.success) return Err(new Error(formatZodIssues(parsed.error)));
    return Ok(this.toRecord(parsed.data));
  }

  private toFile(input: PromptInput): Record<string, unknown> {
    return {
      id: input.id ?? this.generateId(),
      timestamp: input.timestamp ?? this.now().toISOString(),
      prompt_text: input.promptText,
      prompt_type: input.promptType ?? 'code_generation',
      context: input.context ?? [],
      ai_tool: this.registry.normalize(input.aiTool ?? 'claude'),
      model: input.model ?? null,
      temperature: input.temperature ?? null,
      max_tokens: input.maxTokens ?? null,
      response_summary: input.responseSummary ?? null,
      response_full: input.responseFull ?? null,
      confidence: input.confidence ?? 'high',
      files_created: input.filesCreated ?? [],
      files_modified: input.filesModified ?? [],
      lines_generated: input.linesGenerated ?? null,
      requirement_ids: input.requirementIds ?? [],
      test_ids: input.testIds ?? [],
      commit_sha: input.commitSha ?? null,
      conversation_id: input.conversationId ?? null,
      message_index: input.messageIndex ?? null,
      tags: input.tags ?? [],
      metadata: input.metadata ?? {},
    };
  }

  private toRecord(file: PromptFile): PromptRecord {
    return {
      id: file.id,
      timestamp: file.timestamp,
      promptText: file.prompt_text,
      promptType: file.prompt_type,
      context: file.context ?? [],
      aiTool: this.registry.normalize(file.ai_tool),
      model: file.model ?? undefined,
      temperature: file.temperature ?? undefined,
      maxTokens: file.max_tokens ?? undefined,
      responseSummary: file.response_summary ?? undefined,
      responseFull: file.response_full ?? undefined,
      confidence: file.confidence,
      filesCreated: file.files_created ?? [],
      filesModified: file.files_modified ?? [],
      linesGenerated: file.lines_generated ?? undefined,
      requirementIds: file.requirement_ids ?? [],
      testIds: file.test_ids ?? [],
      commitSha: file.commit_sha ?? undefined,
      conversationId: file.conversation_id ?? undefined,
      messageIndex: file.message_index ?? undefined,
      tags: file.tags ?? [],
      metadata: file.metadata ?? {},
    };
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function normalizePath(filePath: string): string {
  return path.posix.normalize(filePath.replace(/\\/g, '/'));
}

// Offset-less times were written in UTC.
function instant(timestamp: string): number {
  return Date.parse(/(?:[zZ]|[+-]\d{2}:?\d{2})$/.test(timestamp) ? timestamp : `${timestamp}Z`);
}

function byTimestamp(a: PromptRecord, b: PromptRecord): number {
  return instant(a.timestamp) - instant(b.timestamp) || a.id.localeCompare(b.id);
}
