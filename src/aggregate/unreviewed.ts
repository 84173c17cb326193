import type { AiTool, Block, CommitRecord, Confidence, FileRecord, Tag } from '../model/types.js';

export type UnreviewedItem =
  | {
      readonly kind: 'commit';
      readonly commitId: string;
      readonly aiTool?: AiTool;
      readonly confidence: Confidence;
    }
  | {
      readonly kind: 'block';
      readonly path: string;
      readonly revision: string;
      readonly startLine: number;
      readonly endLine: number;
      readonly tagLine: number;
      readonly tool: AiTool;
      readonly confidence: Confidence;
    };

export function isCommitUnreviewed(commit: CommitRecord): boolean {
  return commit.confidence !== undefined && !commit.reviewedBy;
}

/** A tag counts as reviewed once it carries a review date. */
export function isTagReviewed(tag: Tag): boolean {
  return tag.reviewedAt !== undefined;
}

export function taggedBlocks(file: FileRecord): Array<Block & { tag: Tag; tagLine: number }> {
  const out: Array<Block & { tag: Tag; tagLine: number }> = [];
  for (const block of file.blocks) {
    if (block.tag) out.push({ ...block, tag: block.tag, tagLine: block.tagLine ?? block.startLine });
  }
  return out;
}

/**
 * Commits and tagged blocks that still need a human review. Commits come
 * first in the order given, then blocks by path and line.
 */
export function findUnreviewed(files: readonly FileRecord[], commits: readonly CommitRecord[]): UnreviewedItem[] {
  const items: UnreviewedItem[] = [];
  for (const commit of commits) {
    if (!isCommitUnreviewed(commit) || commit.confidence === undefined) continue;
    items.push({
      kind: 'commit',
      commitId: commit.commitId,
      ...(commit.aiTool !== undefined ? { aiTool: commit.aiTool } : {}),
      confidence: commit.confidence,
    });
  }

  const sortedFiles = [...files].sort((a, b) => a.path.localeCompare(b.path));
  for (const file of sortedFiles) {
    for (const block of taggedBlocks(file)) {
      if (isTagReviewed(block.tag)) continue;
      items.push({
        kind: 'block',
        path: file.path,
        revision: file.revision,
        startLine: block.startLine,
        endLine: block.endLine,
        tagLine: block.tagLine,
        tool: block.tag.tool,
        confidence: block.tag.confidence,
      });
    }
  }
  return items;
}
