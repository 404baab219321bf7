/**
 * Shared constants and helpers for the ingestion services
 */

// ============================================================
// Constants
// ============================================================

export const DELEGATE_PAGE_SIZE = 200;
export const PROPOSAL_PAGE_SIZE = 100;
export const VOTE_PAGE_SIZE = 5000;
// Adaptive vote paging never goes below this
export const MIN_VOTE_PAGE_SIZE = 100;
export const MIN_CACHED_PROPOSALS = 1;

export const ENTITY_MAX_CONSECUTIVE_FAILURES = 15;
export const VOTE_MAX_CONSECUTIVE_FAILURES = 50;

export const STALL_BACKOFF_BASE_MS = 2000;
export const STALL_BACKOFF_MAX_MS = 5000;
export const STALL_BACKOFF_FACTOR = 1.7;
// Page size halves on every Nth consecutive failure
export const PAGE_SIZE_REDUCTION_INTERVAL = 5;

export const DELEGATE_PROGRESS_LOG_INTERVAL = 1000;

// Partial vote snapshots: every N pages or after this long, whichever first
export const VOTE_PROGRESS_SAVE_PAGES = 10;
export const VOTE_PROGRESS_SAVE_INTERVAL_MS = 60000;

// ============================================================
// Helpers
// ============================================================

/**
 * Elapsed wall time as `1h 2m 3s`.
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.round(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  if (hours > 0) return `${hours}h ${minutes}m ${seconds}s`;
  if (minutes > 0) return `${minutes}m ${seconds}s`;
  return `${seconds}s`;
}
