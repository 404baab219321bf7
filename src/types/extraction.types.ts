import type { ClientStats } from "../services/tally-graphql";
import type { PaginationStatus } from "../services/ingestion/paginator";

export interface EntityFetchSummary {
  status: PaginationStatus;
  count: number;
  fromCache: boolean;
  error: string | null;
}

export interface VoteFetchSummary {
  proposalId: string;
  status: PaginationStatus;
  votesFetched: number;
  expectedVoters: number | null;
  fromCache: boolean;
  resumed: boolean;
  error: string | null;
}

/**
 * A declared organization total next to what the run collected. Declared
 * totals are advisory and often lag the API's actual results.
 */
export interface DeclaredCount {
  declared: number | null;
  fetched: number;
}

export interface CoverageSummary {
  delegates: DeclaredCount;
  proposals: DeclaredCount;
  // Declared side sums the voter counts of proposals that report one
  votes: DeclaredCount;
}

/**
 * Run metadata written next to the exported tables.
 */
export interface RunReport {
  organizationName: string;
  organizationSlug: string;
  organizationId: string | null;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  delegates: EntityFetchSummary | null;
  proposals: EntityFetchSummary | null;
  votes: VoteFetchSummary[];
  coverage: CoverageSummary | null;
  client: ClientStats;
}
