/**
 * @fileoverview Requirement → code → test traceability
 *
 * Every requirement id that appears in a commit record, an inline tag or the
 * requirements source gets exactly one row. Rows are sorted by id.
 */

import type { CommitRecord, FileRecord, ReviewStatus, TraceEntry } from '../model/types.js';
import type { RequirementsProvider } from '../requirements/provider.js';
import { percentageOf } from './percentage.js';
import { isCommitUnreviewed, isTagReviewed, taggedBlocks } from './unreviewed.js';

export const UNKNOWN_REQUIREMENT_TITLE = '(unknown)';

interface Links {
  commits: string[];
  files: Set<string>;
  tests: Set<string>;
  unreviewed: boolean;
}

const compareIds = (a: string, b: string): number => a.localeCompare(b, undefined, { numeric: true });

export function buildTraceMatrix(
  files: readonly FileRecord[],
  commits: readonly CommitRecord[],
  requirements?: RequirementsProvider | null
): TraceEntry[] {
  const links = new Map<string, Links>();
  const linksFor = (id: string): Links => {
    let entry = links.get(id);
    if (!entry) {
      entry = { commits: [], files: new Set(), tests: new Set(), unreviewed: false };
      links.set(id, entry);
    }
    return entry;
  };

  for (const commit of commits) {
    for (const id of commit.trace) {
      const entry = linksFor(id);
      if (!entry.commits.includes(commit.commitId)) entry.commits.push(commit.commitId);
      for (const file of commit.files) entry.files.add(file);
      for (const test of commit.tests) entry.tests.add(test);
      if (isCommitUnreviewed(commit)) entry.unreviewed = true;
    }
  }

  for (const file of files) {
    for (const block of taggedBlocks(file)) {
      for (const id of block.tag.trace) {
        const entry = linksFor(id);
        entry.files.add(file.path);
        for (const test of block.tag.tests) entry.tests.add(test);
        if (!isTagReviewed(block.tag)) entry.unreviewed = true;
      }
    }
  }

  for (const requirement of requirements?.listRequirements() ?? []) linksFor(requirement.id);

  const byPath = new Map(files.map((file) => [file.path, file]));

  return [...links.keys()].sort(compareIds).map((id): TraceEntry => {
    const entry = linksFor(id);
    const linkedFiles = [...entry.files].sort();
    const tests = [...entry.tests].sort(compareIds);

    let aiLines = 0;
    let countedLines = 0;
    for (const filePath of linkedFiles) {
      const record = byPath.get(filePath);
      if (!record) continue;
      aiLines += record.aiLines;
      countedLines += record.countedLines;
    }

    const base = {
      requirementId: id,
      commits: [...entry.commits],
      files: linkedFiles,
      tests,
      aiPercentage: percentageOf(aiLines, countedLines),
      reviewStatus: reviewStatus(entry, linkedFiles.length, tests.length),
    };

    if (!requirements) return { ...base, title: '', known: true };
    const requirement = requirements.getRequirement(id);
    if (!requirement) {
      return { ...base, title: UNKNOWN_REQUIREMENT_TITLE, known: false, warning: 'unknown_requirement' };
    }
    return {
      ...base,
      title: requirement.title,
      ...(requirement.status !== undefined ? { status: requirement.status } : {}),
      known: true,
    };
  });
}

function reviewStatus(entry: Links, fileCount: number, testCount: number): ReviewStatus {
  if (entry.commits.length === 0 && fileCount === 0) return 'unlinked';
  if (testCount === 0) return 'untested';
  return entry.unreviewed ? 'unreviewed' : 'reviewed';
}
