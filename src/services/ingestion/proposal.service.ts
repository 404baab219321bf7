/**
 * Proposal Ingestion Service
 * Fetches every proposal of an organization (archived included), newest first
 */

import { proposalsResponseSchema } from "../../schemas/tally.schemas";
import { mapNodes, mapProposalNode } from "../../libs/tallyMapper";
import type { Organization, Proposal } from "../../types/governance.types";
import type { FetchError } from "../tally-graphql";
import { pageInput, type IngestionContext } from "./context";
import { paginate, type PaginationStatus } from "./paginator";
import { ENTITY_MAX_CONSECUTIVE_FAILURES } from "./sync-utils";

const PROPOSALS_QUERY = `
  query GetProposals($input: ProposalsInput!) {
    proposals(input: $input) {
      nodes {
        ... on Proposal {
          id
          onchainId
          metadata { title description }
          proposer { address name }
          status
          start {
            ... on Block { timestamp number }
            ... on BlocklessTimestamp { timestamp }
          }
          end {
            ... on Block { timestamp number }
            ... on BlocklessTimestamp { timestamp }
          }
          voteStats { type votesCount votersCount percent }
          quorum
        }
      }
      pageInfo { firstCursor lastCursor count }
    }
  }
`;

/**
 * Summary of a proposal fetch
 */
export interface ProposalFetchResult {
  status: PaginationStatus;
  proposals: Proposal[];
  pages: number;
  droppedNodes: number;
  fromCache: boolean;
  lastError: FetchError | null;
}

/**
 * Cached proposals are reused once they reach the organization's declared
 * count, or the configured minimum when the count is unknown.
 */
export function minimumCachedProposals(organization: Organization, fallback: number): number {
  return organization.proposalsCount ?? fallback;
}

export async function fetchAllProposals(
  ctx: IngestionContext,
  organization: Organization
): Promise<ProposalFetchResult> {
  const cached = ctx.store.state().proposals;
  const minimum = minimumCachedProposals(organization, ctx.settings.minCachedProposals);

  if (cached.length > 0 && cached.length >= minimum) {
    console.log(`[Proposal Sync] Using ${cached.length} cached proposals`);
    return {
      status: "exhausted",
      proposals: cached,
      pages: 0,
      droppedNodes: 0,
      fromCache: true,
      lastError: null,
    };
  }
  if (cached.length > 0) {
    console.log(`[Proposal Sync] Cached proposals incomplete: ${cached.length}/${minimum}. Fetching fresh`);
  }

  let droppedNodes = 0;
  const result = await paginate<Proposal>({
    label: "Proposal Sync",
    pageSize: ctx.settings.proposalPageSize,
    maxConsecutiveFailures: ENTITY_MAX_CONSECUTIVE_FAILURES,
    identify: (proposal) => proposal.id,
    signal: ctx.signal,
    sleep: ctx.sleep,
    fetchPage: async (cursor, limit) => {
      const response = await ctx.client.send(
        PROPOSALS_QUERY,
        {
          input: {
            filters: { organizationId: organization.id, includeArchived: true },
            page: pageInput(cursor, limit),
            sort: { sortBy: "id", isDescending: true },
          },
        },
        proposalsResponseSchema
      );
      if (!response.ok) return response;

      const mapped = mapNodes(response.data.proposals?.nodes, mapProposalNode);
      droppedNodes += mapped.dropped;
      return {
        ok: true,
        data: {
          items: mapped.items,
          nextCursor: response.data.proposals?.pageInfo?.lastCursor ?? null,
        },
      };
    },
  });

  if (droppedNodes > 0) {
    console.warn(`[Proposal Sync] Dropped ${droppedNodes} invalid proposal nodes`);
  }

  if (result.status === "exhausted") {
    await ctx.store.save({ proposals: result.items });
  }
  console.log(`[Proposal Sync] ${result.status}: ${result.items.length} proposals`);

  return {
    status: result.status,
    proposals: result.items,
    pages: result.pages,
    droppedNodes,
    fromCache: false,
    lastError: result.lastError,
  };
}
