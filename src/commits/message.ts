/**
 * @fileoverview Commit message convention
 *
 *   [AI:<tool>:<confidence>] <type>(<scope>): <subject>
 *
 *   Trace: SPEC-1, SPEC-2
 *   Test: TC-1
 *   Reviewed-by: AI+<reviewer>
 *
 * Parsing is lenient: a message without the convention still yields its
 * subject, and an unreadable AI tag is ignored.
 */

import { DEFAULT_TOOL_REGISTRY, type ToolRegistry } from '../model/tools.js';
import { isConfidence, uniqueIds, type AiTool, type Confidence } from '../model/types.js';

export interface CommitMessage {
  readonly raw: string;
  readonly ai?: { readonly tool: AiTool; readonly confidence: Confidence };
  readonly type?: string;
  readonly scope?: string;
  readonly subject: string;
  readonly trace: readonly string[];
  readonly tests: readonly string[];
  readonly reviewedBy?: string;
}

export interface CommitMessageInput {
  /** First line, optionally already in `type(scope): subject` form. */
  message: string;
  tool?: AiTool;
  confidence?: Confidence;
  trace?: readonly string[];
  tests?: readonly string[];
  reviewer?: string;
}

const AI_PREFIX = '[AI:';
const REVIEW_MARK = 'AI+';
const DEFAULT_CONFIDENCE: Confidence = 'med';

export function parseCommitMessage(message: string, registry: ToolRegistry = DEFAULT_TOOL_REGISTRY): CommitMessage {
  const lines = message.trim().split(/\r?\n/);
  let firstLine = lines[0]?.trim() ?? '';
  let ai: CommitMessage['ai'];

  if (firstLine.startsWith(AI_PREFIX)) {
    const close = firstLine.indexOf(']');
    if (close > 0) {
      const [, tool = '', confidence = ''] = firstLine.slice(1, close).split(':');
      if (tool && isConfidence(confidence)) ai = { tool: registry.normalize(tool), confidence };
      firstLine = firstLine.slice(close + 1).trim();
    }
  }

  let type: string | undefined;
  let scope: string | undefined;
  let subject = firstLine;
  const colon = firstLine.indexOf(':');
  if (colon > 0) {
    const prefix = firstLine.slice(0, colon);
    const scoped = /^([^()\s]+)\(([^)]*)\)!?$/.exec(prefix.trim());
    if (scoped) {
      type = scoped[1];
      scope = scoped[2]?.trim();
      subject = firstLine.slice(colon + 1).trim();
    } else if (/^[a-z]+!?$/i.test(prefix.trim())) {
      type = prefix.trim();
      subject = firstLine.slice(colon + 1).trim();
    }
  }

  const trace: string[] = [];
  const tests: string[] = [];
  let reviewedBy: string | undefined;
  for (const rawLine of lines.slice(1)) {
    const line = rawLine.trim();
    if (line.startsWith('Trace:')) {
      trace.push(...line.slice('Trace:'.length).split(','));
    } else if (line.startsWith('Test:')) {
      tests.push(...line.slice('Test:'.length).split(','));
    } else if (line.startsWith('Reviewed-by:')) {
      const reviewer = line.slice('Reviewed-by:'.length).trim();
      const bare = reviewer.startsWith(REVIEW_MARK) ? reviewer.slice(REVIEW_MARK.length) : reviewer;
      if (bare) reviewedBy = bare;
    }
  }

  return {
    raw: message,
    ...(ai ? { ai } : {}),
    ...(type ? { type } : {}),
    ...(scope ? { scope } : {}),
    subject,
    trace: uniqueIds(trace),
    tests: uniqueIds(tests),
    ...(reviewedBy ? { reviewedBy } : {}),
  };
}

/**
 * The tool is normalized with the same registry the notes store uses, so the
 * header and the recorded note name the same tool.
 */
export function buildCommitMessage(input: CommitMessageInput, registry: ToolRegistry = DEFAULT_TOOL_REGISTRY): string {
  const message = input.message.trim();
  const header = input.tool && !message.startsWith(AI_PREFIX)
    ? `[AI:${registry.normalize(input.tool)}:${input.confidence ?? DEFAULT_CONFIDENCE}] ${message}`
    : message;

  const footers: string[] = [];
  const trace = uniqueIds(input.trace ?? []);
  const tests = uniqueIds(input.tests ?? []);
  if (trace.length > 0) footers.push(`Trace: ${trace.join(', ')}`);
  if (tests.length > 0) footers.push(`Test: ${tests.join(', ')}`);
  if (input.reviewer) {
    const reviewer = input.reviewer.trim();
    footers.push(`Reviewed-by: ${reviewer.startsWith(REVIEW_MARK) ? reviewer : `${REVIEW_MARK}${reviewer}`}`);
  }

  return footers.length > 0 ? `${header}\n\n${footers.join('\n')}\n` : `${header}\n`;
}
