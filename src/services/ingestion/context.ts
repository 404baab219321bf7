import type { GraphQLClient } from "../tally-graphql";
import type { CheckpointStore } from "./checkpoint-store";
import {
  DELEGATE_PAGE_SIZE,
  MIN_CACHED_PROPOSALS,
  PROPOSAL_PAGE_SIZE,
  VOTE_PAGE_SIZE,
} from "./sync-utils";
import type { SleepFn } from "./utils";

export interface IngestionSettings {
  delegatePageSize: number;
  proposalPageSize: number;
  votePageSize: number;
  minCachedProposals: number;
  forceRefreshVotes: boolean;
}

export const DEFAULT_INGESTION_SETTINGS: IngestionSettings = {
  delegatePageSize: DELEGATE_PAGE_SIZE,
  proposalPageSize: PROPOSAL_PAGE_SIZE,
  votePageSize: VOTE_PAGE_SIZE,
  minCachedProposals: MIN_CACHED_PROPOSALS,
  forceRefreshVotes: false,
};

/**
 * Everything an ingestion service needs for one run. The client and store
 * are shared by every service in the run.
 */
export interface IngestionContext {
  client: GraphQLClient;
  store: CheckpointStore;
  settings: IngestionSettings;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

export const pageInput = (cursor: string | null, limit: number): Record<string, unknown> =>
  cursor ? { limit, afterCursor: cursor } : { limit };
