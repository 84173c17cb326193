/**
 * @fileoverview Test helpers
 *
 * Temporary workspaces, an in-process git stand-in and a seeded random
 * source for property tests.
 */

export {
  createTempWorkspace,
  cleanupWorkspace,
  createTestFile,
  createWorkspaceWithFiles,
} from './workspace.js';
export { MemoryGitClient, type MemoryCommitOptions } from './memory_git.js';
export { seeded, pickFrom } from './random.js';
