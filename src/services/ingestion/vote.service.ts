/**
 * Vote Ingestion Service
 * Fetches the full vote set of one proposal, resuming from saved progress
 */

import { votesResponseSchema } from "../../schemas/tally.schemas";
import { expectedVoterCount, mapNodes, mapVoteNode } from "../../libs/tallyMapper";
import type { Proposal, Vote } from "../../types/governance.types";
import type { FetchError } from "../tally-graphql";
import { pageInput, type IngestionContext } from "./context";
import { paginate, type PaginationStatus } from "./paginator";
import {
  MIN_VOTE_PAGE_SIZE,
  VOTE_MAX_CONSECUTIVE_FAILURES,
  VOTE_PROGRESS_SAVE_INTERVAL_MS,
  VOTE_PROGRESS_SAVE_PAGES,
} from "./sync-utils";
import { systemClock } from "./utils";

const VOTES_QUERY = `
  query GetVotes($input: VotesInput!) {
    votes(input: $input) {
      nodes {
        ... on OnchainVote {
          id
          type
          amount
          reason
          voter { address name ens }
          block { timestamp number }
          txHash
        }
      }
      pageInfo { firstCursor lastCursor count }
    }
  }
`;

export interface VoteFetchOptions {
  forceRefresh?: boolean;
  // Overrides the count derived from the proposal's vote stats
  expectedTotal?: number | null;
  // Pages between partial vote snapshots
  progressSavePages?: number;
}

/**
 * Vote fetch statistics
 */
export interface VoteFetchResult {
  proposalId: string;
  status: PaginationStatus;
  votes: Vote[];
  cursor: string | null;
  pages: number;
  expectedVoters: number | null;
  droppedNodes: number;
  fromCache: boolean;
  resumed: boolean;
  lastError: FetchError | null;
}

export async function fetchVotesForProposal(
  ctx: IngestionContext,
  proposal: Proposal,
  options: VoteFetchOptions = {}
): Promise<VoteFetchResult> {
  const forceRefresh = options.forceRefresh ?? ctx.settings.forceRefreshVotes;
  const expectedVoters =
    options.expectedTotal !== undefined ? options.expectedTotal : expectedVoterCount(proposal);

  const progress = await ctx.store.loadVoteProgress(proposal.id);
  const cached = ctx.store.getCachedVotes(proposal.id);

  if (!forceRefresh && cached && !progress) {
    console.log(`[Vote Sync] Proposal ${proposal.id}: using ${cached.length} cached votes`);
    return {
      proposalId: proposal.id,
      status: "exhausted",
      votes: cached,
      cursor: null,
      pages: 0,
      expectedVoters,
      droppedNodes: 0,
      fromCache: true,
      resumed: false,
      lastError: null,
    };
  }

  const resumed = progress !== null;
  if (progress) {
    console.log(
      `[Vote Sync] Proposal ${proposal.id}: resuming with ${progress.votes.length} votes ` +
        `from cursor ${progress.afterCursor ?? "start"}`
    );
  }

  // Partial votes are snapshotted with the cursor they end at, every few
  // pages or once a minute. A resume from an older snapshot refetches the
  // pages in between and dedup drops the repeats.
  const savePages = Math.max(1, options.progressSavePages ?? VOTE_PROGRESS_SAVE_PAGES);
  let unsavedPages = 0;
  let lastSaveAt = systemClock();
  const saveProgress = async (cursor: string, votes: readonly Vote[]) => {
    await ctx.store.saveVoteCursor(proposal.id, cursor, votes);
    unsavedPages = 0;
    lastSaveAt = systemClock();
  };

  let droppedNodes = 0;
  const result = await paginate<Vote>({
    label: "Vote Sync",
    pageSize: ctx.settings.votePageSize,
    minPageSize: MIN_VOTE_PAGE_SIZE,
    maxConsecutiveFailures: VOTE_MAX_CONSECUTIVE_FAILURES,
    expectedTotal: expectedVoters,
    identify: (vote) => vote.id,
    seed: progress?.votes ?? [],
    startCursor: progress?.afterCursor ?? null,
    signal: ctx.signal,
    sleep: ctx.sleep,
    fetchPage: async (cursor, limit) => {
      const response = await ctx.client.send(
        VOTES_QUERY,
        {
          input: {
            filters: { proposalId: proposal.id },
            page: pageInput(cursor, limit),
            sort: { sortBy: "id", isDescending: false },
          },
        },
        votesResponseSchema
      );
      if (!response.ok) return response;

      const mapped = mapNodes(response.data.votes?.nodes, (node) => mapVoteNode(node, proposal.id));
      droppedNodes += mapped.dropped;
      return {
        ok: true,
        data: {
          items: mapped.items,
          nextCursor: response.data.votes?.pageInfo?.lastCursor ?? null,
        },
      };
    },
    onProgress: async ({ items, cursor, done }) => {
      // Completion is written below, votes first
      if (done || cursor === null) return;
      unsavedPages++;
      if (unsavedPages < savePages && systemClock() - lastSaveAt < VOTE_PROGRESS_SAVE_INTERVAL_MS) return;
      await saveProgress(cursor, items);
    },
  });

  if (result.status === "exhausted") {
    await ctx.store.saveProposalVotes(proposal.id, result.items);
    await ctx.store.saveVoteCursor(proposal.id, null);
  } else if (unsavedPages > 0 && result.cursor !== null) {
    await saveProgress(result.cursor, result.items);
  }

  const expected = expectedVoters === null ? "" : `/${expectedVoters}`;
  console.log(
    `[Vote Sync] Proposal ${proposal.id}: ${result.status}, ${result.items.length}${expected} votes` +
      (droppedNodes > 0 ? ` (${droppedNodes} dropped)` : "")
  );

  return {
    proposalId: proposal.id,
    status: result.status,
    votes: result.items,
    cursor: result.cursor,
    pages: result.pages,
    expectedVoters,
    droppedNodes,
    fromCache: false,
    resumed,
    lastError: result.lastError,
  };
}
