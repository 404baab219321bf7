/**
 * Cursor pagination driver
 *
 * `nextPaginationStep` decides what a page outcome means; `paginate` runs
 * the fetch loop around it (dedup, backoff, progress hooks, cancellation).
 */

import type { FetchError, FetchResult } from "../tally-graphql";
import {
  ENTITY_MAX_CONSECUTIVE_FAILURES,
  PAGE_SIZE_REDUCTION_INTERVAL,
  STALL_BACKOFF_BASE_MS,
  STALL_BACKOFF_FACTOR,
  STALL_BACKOFF_MAX_MS,
} from "./sync-utils";
import { sleep as defaultSleep, type SleepFn } from "./utils";

// ============================================================
// Types
// ============================================================

export interface Page<T> {
  items: T[];
  nextCursor: string | null;
}

export type FetchPage<T> = (cursor: string | null, limit: number) => Promise<FetchResult<Page<T>>>;

export type PaginationPhase =
  | "fetching"
  | "accumulating"
  | "stalled"
  | "exhausted"
  | "failed";

export type PaginationStatus = "exhausted" | "failed" | "interrupted";

export interface PaginationState {
  phase: PaginationPhase;
  cursor: string | null;
  itemCount: number;
  pageSize: number;
  pages: number;
  consecutiveFailures: number;
}

export type PageOutcome =
  | { kind: "error" }
  | { kind: "page"; received: number; added: number; nextCursor: string | null };

export interface TransitionOptions {
  maxConsecutiveFailures: number;
  expectedTotal?: number | null;
  maxItems?: number | null;
  // Enables adaptive page size when set
  minPageSize?: number | null;
}

export interface BackoffOptions {
  baseMs: number;
  maxMs: number;
  factor: number;
}

export const DEFAULT_STALL_BACKOFF: BackoffOptions = {
  baseMs: STALL_BACKOFF_BASE_MS,
  maxMs: STALL_BACKOFF_MAX_MS,
  factor: STALL_BACKOFF_FACTOR,
};

export interface PaginationProgress<T> {
  items: readonly T[];
  cursor: string | null;
  pages: number;
  added: number;
  done: boolean;
}

export interface PaginateOptions<T> extends TransitionOptions {
  fetchPage: FetchPage<T>;
  identify: (item: T) => string;
  pageSize: number;
  seed?: readonly T[];
  startCursor?: string | null;
  signal?: AbortSignal;
  sleep?: SleepFn;
  backoff?: Partial<BackoffOptions>;
  onProgress?: (progress: PaginationProgress<T>) => void | Promise<void>;
  label?: string;
}

export interface PaginationResult<T> {
  status: PaginationStatus;
  items: T[];
  // null once exhausted, otherwise where to resume
  cursor: string | null;
  pages: number;
  consecutiveFailures: number;
  lastError: FetchError | null;
}

// ============================================================
// Transition Function
// ============================================================

export function initialPaginationState(
  pageSize: number,
  startCursor: string | null = null,
  itemCount = 0
): PaginationState {
  return {
    phase: "fetching",
    cursor: startCursor,
    itemCount,
    pageSize,
    pages: 0,
    consecutiveFailures: 0,
  };
}

export function isTerminalPhase(phase: PaginationPhase): boolean {
  return phase === "exhausted" || phase === "failed";
}

function stall(
  state: PaginationState,
  cursor: string | null,
  options: TransitionOptions
): PaginationState {
  const consecutiveFailures = state.consecutiveFailures + 1;
  let pageSize = state.pageSize;
  if (options.minPageSize != null && consecutiveFailures % PAGE_SIZE_REDUCTION_INTERVAL === 0) {
    pageSize = Math.max(options.minPageSize, Math.floor(pageSize / 2));
  }

  return {
    ...state,
    phase: consecutiveFailures >= options.maxConsecutiveFailures ? "failed" : "stalled",
    cursor,
    pageSize,
    consecutiveFailures,
  };
}

function exhaust(state: PaginationState): PaginationState {
  return { ...state, phase: "exhausted", cursor: null };
}

/**
 * Classifies one page outcome. An unchanged cursor on a non-empty page is a
 * stall unless the expected total is known and already reached. An empty
 * page ends pagination unless it advances the cursor or the expected total
 * says more items are due.
 */
export function nextPaginationStep(
  state: PaginationState,
  outcome: PageOutcome,
  options: TransitionOptions
): PaginationState {
  if (outcome.kind === "error") {
    return stall(state, state.cursor, options);
  }

  const counted: PaginationState = {
    ...state,
    itemCount: state.itemCount + outcome.added,
    pages: state.pages + 1,
  };
  const { nextCursor } = outcome;
  const cursorAdvanced = nextCursor !== null && nextCursor !== state.cursor;
  const expected = options.expectedTotal ?? null;
  const hintPending = expected !== null && counted.itemCount < expected;

  if (options.maxItems != null && counted.itemCount >= options.maxItems) {
    return exhaust(counted);
  }

  if (outcome.received === 0) {
    if (cursorAdvanced) return stall(counted, nextCursor, options);
    if (hintPending) return stall(counted, state.cursor, options);
    return exhaust(counted);
  }

  if (nextCursor === null) {
    return exhaust(counted);
  }

  if (!cursorAdvanced) {
    return expected !== null && !hintPending
      ? exhaust(counted)
      : stall(counted, state.cursor, options);
  }

  return {
    ...counted,
    phase: "accumulating",
    cursor: nextCursor,
    consecutiveFailures: 0,
  };
}

/**
 * `min(maxMs, baseMs * factor^(failures - 1))`
 */
export function stallBackoff(options: BackoffOptions, consecutiveFailures: number): number {
  const exponent = Math.max(0, consecutiveFailures - 1);
  return Math.min(options.maxMs, options.baseMs * Math.pow(options.factor, exponent));
}

// ============================================================
// Driver
// ============================================================

export async function paginate<T>(options: PaginateOptions<T>): Promise<PaginationResult<T>> {
  const label = options.label ?? "Paginator";
  const sleep = options.sleep ?? defaultSleep;
  const backoff: BackoffOptions = { ...DEFAULT_STALL_BACKOFF, ...options.backoff };
  const transition: TransitionOptions = {
    maxConsecutiveFailures: options.maxConsecutiveFailures || ENTITY_MAX_CONSECUTIVE_FAILURES,
    expectedTotal: options.expectedTotal,
    maxItems: options.maxItems,
    minPageSize: options.minPageSize,
  };

  const items: T[] = [];
  const seen = new Set<string>();
  const append = (batch: readonly T[]): number => {
    let added = 0;
    for (const item of batch) {
      if (transition.maxItems != null && items.length >= transition.maxItems) break;
      const key = options.identify(item);
      if (seen.has(key)) continue;
      seen.add(key);
      items.push(item);
      added++;
    }
    return added;
  };

  append(options.seed ?? []);
  let state = initialPaginationState(options.pageSize, options.startCursor ?? null, items.length);
  let lastError: FetchError | null = null;

  if (transition.maxItems != null && items.length >= transition.maxItems) {
    state = exhaust(state);
  }

  while (!isTerminalPhase(state.phase)) {
    if (options.signal?.aborted) {
      console.log(`[${label}] Interrupted with ${items.length} items at cursor ${state.cursor ?? "start"}`);
      return {
        status: "interrupted",
        items,
        cursor: state.cursor,
        pages: state.pages,
        consecutiveFailures: state.consecutiveFailures,
        lastError,
      };
    }

    const result = await options.fetchPage(state.cursor, state.pageSize);
    const previous = state;
    let added = 0;

    if (result.ok) {
      added = append(result.data.items);
      state = nextPaginationStep(
        state,
        {
          kind: "page",
          received: result.data.items.length,
          added,
          nextCursor: result.data.nextCursor,
        },
        transition
      );
    } else {
      lastError = result.error;
      state = nextPaginationStep(state, { kind: "error" }, transition);
    }

    if (options.onProgress && (added > 0 || state.cursor !== previous.cursor)) {
      await options.onProgress({
        items,
        cursor: state.cursor,
        pages: state.pages,
        added,
        done: state.phase === "exhausted",
      });
    }

    if (state.phase === "stalled") {
      const wait = stallBackoff(backoff, state.consecutiveFailures);
      const reason = result.ok ? "Cursor stalled" : `Fetch failed (${result.error.kind})`;
      console.warn(
        `[${label}] ${reason} with ${items.length} items ` +
          `(failure ${state.consecutiveFailures}/${transition.maxConsecutiveFailures}). ` +
          `Waiting ${Math.round(wait)}ms`
      );
      if (state.pageSize !== previous.pageSize) {
        console.warn(`[${label}] Reducing page size to ${state.pageSize}`);
      }
      await sleep(wait);
    }
  }

  if (state.phase === "failed") {
    console.error(
      `[${label}] Giving up after ${state.consecutiveFailures} consecutive failures ` +
        `with ${items.length} items; resume cursor ${state.cursor ?? "start"}`
    );
  }

  return {
    status: state.phase === "failed" ? "failed" : "exhausted",
    items,
    cursor: state.cursor,
    pages: state.pages,
    consecutiveFailures: state.consecutiveFailures,
    lastError,
  };
}
