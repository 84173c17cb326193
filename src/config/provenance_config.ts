/**
 * @fileoverview Workspace configuration
 *
 * Read from `.provenance.yaml` at the workspace root; every key is optional.
 *
 *   notes_ref: ai-provenance
 *   max_write_retries: 3
 *   tools: [windsurf]
 *   languages: { ".tf": shell }
 *   exclude: ["dist/**"]
 *   prompts_dir: .ai-prov/prompts
 *   requirements: { path: requirements.yaml, mapping_path: .requirements-mapping.yaml }
 *   validation: { require_review: true, require_tests: false }
 *
 * Environment overrides: PROVENANCE_NOTES_REF, PROVENANCE_MAX_WRITE_RETRIES.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { Errors } from '../core/errors.js';
import { safeSync } from '../core/result.js';
import { formatZodIssues } from '../model/schema.js';
import { DEFAULT_MAX_WRITE_RETRIES, DEFAULT_NOTES_NAMESPACE } from '../notes/store.js';
import { DEFAULT_PROMPTS_DIR } from '../prompts/store.js';
import { DEFAULT_MAPPING_PATH, DEFAULT_REQUIREMENTS_PATH } from '../requirements/provider.js';
import { listLanguageIds } from '../tags/comment_styles.js';

export const CONFIG_FILE_NAME = '.provenance.yaml';

const ConfigFileSchema = z.object({
  notes_ref: z.string().min(1).default(DEFAULT_NOTES_NAMESPACE),
  max_write_retries: z.number().int().min(0).max(20).default(DEFAULT_MAX_WRITE_RETRIES),
  retry_delay_ms: z.number().int().min(0).default(0),
  tools: z.array(z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/)).default([]),
  languages: z.record(
    z.string().regex(/^\.[^./\\]+$|^[^.][^/\\]*$/, 'extension with a leading dot, or a file name'),
    z.string().refine((id) => listLanguageIds().includes(id), { message: 'unknown language id' })
  ).default({}),
  exclude: z.array(z.string().min(1)).default([]),
  prompts_dir: z.string().min(1).default(DEFAULT_PROMPTS_DIR),
  requirements: z.object({
    enabled: z.boolean().default(true),
    path: z.string().min(1).default(DEFAULT_REQUIREMENTS_PATH),
    mapping_path: z.string().min(1).default(DEFAULT_MAPPING_PATH),
  }).strict().default({}),
  validation: z.object({
    require_review: z.boolean().default(false),
    require_tests: z.boolean().default(false),
  }).strict().default({}),
}).strict();

export interface ProvenanceConfig {
  readonly notesRef: string;
  readonly maxWriteRetries: number;
  readonly retryDelayMs: number;
  /** Tool ids accepted on top of the defaults. */
  readonly tools: readonly string[];
  /** Extension or file name → language id. */
  readonly languages: Readonly<Record<string, string>>;
  readonly exclude: readonly string[];
  /** Relative to the workspace. */
  readonly promptsDir: string;
  readonly requirements: {
    readonly enabled: boolean;
    readonly path: string;
    readonly mappingPath: string;
  };
  readonly validation: {
    readonly requireReview: boolean;
    readonly requireTests: boolean;
  };
}

export interface LoadConfigOptions {
  /** Relative to the workspace. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export function parseProvenanceConfig(raw: unknown, env: NodeJS.ProcessEnv = {}, source = CONFIG_FILE_NAME): ProvenanceConfig {
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) throw Errors.config(source, formatZodIssues(parsed.error));
  const file = parsed.data;

  return {
    notesRef: env.PROVENANCE_NOTES_REF?.trim() || file.notes_ref,
    maxWriteRetries: parseRetries(env.PROVENANCE_MAX_WRITE_RETRIES) ?? file.max_write_retries,
    retryDelayMs: file.retry_delay_ms,
    tools: file.tools,
    languages: file.languages,
    exclude: file.exclude,
    promptsDir: file.prompts_dir,
    requirements: {
      enabled: file.requirements.enabled,
      path: file.requirements.path,
      mappingPath: file.requirements.mapping_path,
    },
    validation: {
      requireReview: file.validation.require_review,
      requireTests: file.validation.require_tests,
    },
  };
}

/**
 * @throws ConfigurationError when the file is not YAML of the expected shape
 *   or an override is not usable
 */
export async function loadProvenanceConfig(
  workspace: string,
  options: LoadConfigOptions = {}
): Promise<ProvenanceConfig> {
  const configPath = options.configPath ?? CONFIG_FILE_NAME;
  const env = options.env ?? process.env;
  let text: string | null = null;
  try {
    text = await readFile(path.resolve(workspace, configPath), 'utf8');
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
  }
  if (text === null) return parseProvenanceConfig({}, env, configPath);

  const source = text;
  const raw = safeSync((): unknown => YAML.parse(source));
  if (!raw.ok) throw Errors.config(configPath, raw.error.message);
  return parseProvenanceConfig(raw.value, env, configPath);
}

function parseRetries(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw Errors.config('PROVENANCE_MAX_WRITE_RETRIES', `expected a non-negative integer, got "${value}"`);
  }
  return parsed;
}
