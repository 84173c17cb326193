import { describe, it, expect } from 'vitest';
import { analyzeFile } from '../../blocks/file_record.js';
import { WORKING_TREE, createCommitRecord } from '../../model/types.js';
import { createStaticRequirements } from '../../requirements/provider.js';
import { UNKNOWN_REQUIREMENT_TITLE, buildTraceMatrix } from '../traceability.js';

const files = [
  analyzeFile(
    'src/auth.ts',
    WORKING_TREE,
    '// ai:claude:high | trace:SPEC-001 | test:test_session | reviewed:2026-01-10\nexport const login = () => 1;\nexport const x = 2;\n'
  ).record,
  analyzeFile(
    'src/cache.ts',
    WORKING_TREE,
    'export const get = 1;\n// ai:copilot:low | trace:SPEC-002,SPEC-010\nexport const put = 2;\n'
  ).record,
];

const commits = [
  createCommitRecord('aaa111', {
    aiTool: 'claude',
    confidence: 'high',
    trace: ['SPEC-001'],
    tests: ['test_login'],
    files: ['src/auth.ts'],
    reviewedBy: 'alice',
  }),
  createCommitRecord('bbb222', { aiTool: 'copilot', confidence: 'low', trace: ['SPEC-002'], files: ['src/cache.ts'] }),
];

const requirements = createStaticRequirements([
  { id: 'SPEC-001', title: 'Login' },
  { id: 'SPEC-002', title: 'Cache', status: 'draft' },
  { id: 'SPEC-099', title: 'Rate limiting', status: 'planned' },
]);

describe('buildTraceMatrix', () => {
  it('joins commits, tags and requirements', () => {
    const matrix = buildTraceMatrix(files, commits, requirements);

    expect(matrix.map((entry) => entry.requirementId)).toEqual(['SPEC-001', 'SPEC-002', 'SPEC-010', 'SPEC-099']);
    expect(matrix[0]).toEqual({
      requirementId: 'SPEC-001',
      title: 'Login',
      known: true,
      commits: ['aaa111'],
      files: ['src/auth.ts'],
      tests: ['test_login', 'test_session'],
      aiPercentage: 100,
      reviewStatus: 'reviewed',
    });
    expect(matrix[1]).toMatchObject({
      title: 'Cache',
      status: 'draft',
      commits: ['bbb222'],
      tests: [],
      reviewStatus: 'untested',
    });
    expect(matrix[1]?.aiPercentage).toBeCloseTo(200 / 3, 10);
  });

  it('shows requirements nothing references', () => {
    const entry = buildTraceMatrix(files, commits, requirements).find((item) => item.requirementId === 'SPEC-099');

    expect(entry).toEqual({
      requirementId: 'SPEC-099',
      title: 'Rate limiting',
      status: 'planned',
      known: true,
      commits: [],
      files: [],
      tests: [],
      aiPercentage: 0,
      reviewStatus: 'unlinked',
    });
  });

  it('flags ids the requirements source does not know', () => {
    const entry = buildTraceMatrix(files, commits, requirements).find((item) => item.requirementId === 'SPEC-010');

    expect(entry).toMatchObject({
      title: UNKNOWN_REQUIREMENT_TITLE,
      known: false,
      warning: 'unknown_requirement',
      files: ['src/cache.ts'],
      reviewStatus: 'untested',
    });
  });

  it('works without a requirements source', () => {
    const matrix = buildTraceMatrix(files, commits);

    expect(matrix.map((entry) => [entry.requirementId, entry.title, entry.known])).toEqual([
      ['SPEC-001', '', true],
      ['SPEC-002', '', true],
      ['SPEC-010', '', true],
    ]);
  });

  it('marks tested work without a review as unreviewed', () => {
    const [entry] = buildTraceMatrix([], [
      createCommitRecord('ccc333', { aiTool: 'gemini', confidence: 'med', trace: ['SPEC-003'], tests: ['t3'] }),
    ]);

    expect(entry).toMatchObject({ requirementId: 'SPEC-003', reviewStatus: 'unreviewed', aiPercentage: 0 });
  });

  it('sorts ids numerically', () => {
    const matrix = buildTraceMatrix([], [createCommitRecord('d', { trace: ['REQ-10', 'REQ-9', 'REQ-100'] })]);
    expect(matrix.map((entry) => entry.requirementId)).toEqual(['REQ-9', 'REQ-10', 'REQ-100']);
  });
});
