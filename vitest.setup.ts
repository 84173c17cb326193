/**
 * Shared Vitest setup
 *
 * Keeps provenance logging quiet unless a run asks for it with
 * PROVENANCE_LOG_LEVEL.
 */

if (!process.env.PROVENANCE_LOG_LEVEL) {
  process.env.PROVENANCE_LOG_LEVEL = 'silent';
}
