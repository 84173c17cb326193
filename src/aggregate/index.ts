export {
  computePercentage,
  percentageOf,
  roundPercentage,
  type FilePercentage,
  type PercentageReport,
  type ToolShare,
} from './percentage.js';
export {
  findUnreviewed,
  isCommitUnreviewed,
  isTagReviewed,
  type UnreviewedItem,
} from './unreviewed.js';
export { buildTraceMatrix, UNKNOWN_REQUIREMENT_TITLE } from './traceability.js';
export {
  validateProvenance,
  type ScanDiagnostics,
  type ValidationIssue,
  type ValidationIssueKind,
  type ValidationOptions,
  type ValidationReport,
} from './validator.js';
