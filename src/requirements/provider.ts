/**
 * @fileoverview Read-only requirements lookup
 *
 * Requirements are owned by an external tool. The engine only asks for a
 * title and status by id, and keeps working without any provider.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { Errors } from '../core/errors.js';
import { safeSync } from '../core/result.js';
import { formatZodIssues } from '../model/schema.js';
import { logDebug } from '../telemetry/logger.js';

export interface Requirement {
  readonly id: string;
  readonly title: string;
  readonly status?: string;
}

export interface RequirementsProvider {
  getRequirement(id: string): Requirement | null;
  listRequirements(): readonly Requirement[];
}

export interface YamlRequirementsPaths {
  /** Relative to the workspace. */
  path?: string;
  /** UUID → requirement id export, relative to the workspace. */
  mappingPath?: string;
}

export const DEFAULT_REQUIREMENTS_PATH = 'requirements.yaml';
export const DEFAULT_MAPPING_PATH = '.requirements-mapping.yaml';

const RequirementEntrySchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  spec_id: z.string().optional(),
  title: z.string().optional(),
  description: z.string().optional(),
  status: z.string().optional(),
}).passthrough();

const RequirementsFileSchema = z.object({
  requirements: z.array(RequirementEntrySchema).nullish(),
}).passthrough().nullish();

const MappingFileSchema = z.object({
  mappings: z.record(z.string()).nullish(),
}).passthrough().nullish();

export function createStaticRequirements(requirements: Iterable<Requirement>): RequirementsProvider {
  const byId = new Map<string, Requirement>();
  for (const requirement of requirements) {
    if (!byId.has(requirement.id)) byId.set(requirement.id, requirement);
  }
  const all = [...byId.values()];
  return {
    getRequirement: (id) => byId.get(id) ?? null,
    listRequirements: () => all,
  };
}

/**
 * Load requirements from the YAML export, keyed by the ids used in tags.
 * Entries whose UUID has a mapping are exposed under the mapped id. Missing
 * files yield an empty provider.
 *
 * @throws ConfigurationError when a file exists but cannot be read as YAML
 *   of the expected shape
 */
export async function loadYamlRequirements(
  workspace: string,
  paths: YamlRequirementsPaths = {}
): Promise<RequirementsProvider> {
  const requirementsPath = paths.path ?? DEFAULT_REQUIREMENTS_PATH;
  const mappingPath = paths.mappingPath ?? DEFAULT_MAPPING_PATH;

  const requirementsFile = RequirementsFileSchema.safeParse(await readYaml(workspace, requirementsPath));
  if (!requirementsFile.success) {
    throw Errors.config(requirementsPath, formatZodIssues(requirementsFile.error));
  }
  const mappingFile = MappingFileSchema.safeParse(await readYaml(workspace, mappingPath));
  if (!mappingFile.success) {
    throw Errors.config(mappingPath, formatZodIssues(mappingFile.error));
  }

  const mappings = mappingFile.data?.mappings ?? {};
  const requirements = (requirementsFile.data?.requirements ?? []).map((entry): Requirement => ({
    id: mappings[entry.id] ?? entry.spec_id ?? entry.id,
    title: entry.title ?? entry.description ?? '',
    ...(entry.status ? { status: entry.status } : {}),
  }));

  logDebug('Loaded requirements', { path: requirementsPath, count: requirements.length });
  return createStaticRequirements(requirements);
}

async function readYaml(workspace: string, relative: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path.resolve(workspace, relative), 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  }
  const parsed = safeSync((): unknown => YAML.parse(text));
  if (!parsed.ok) throw Errors.config(relative, parsed.error.message);
  return parsed.value;
}
