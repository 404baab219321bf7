/**
 * Delegate Sync Service
 * Pages through every delegate of an organization, checkpointing after each page
 */

import { delegatesResponseSchema } from "../../schemas/tally.schemas";
import { mapDelegateNode, mapNodes } from "../../libs/tallyMapper";
import type { Delegate, Organization } from "../../types/governance.types";
import type { FetchError } from "../tally-graphql";
import { isDelegateCollectionComplete } from "./checkpoint-store";
import { pageInput, type IngestionContext } from "./context";
import { paginate, type PaginationStatus } from "./paginator";
import { DELEGATE_PROGRESS_LOG_INTERVAL, ENTITY_MAX_CONSECUTIVE_FAILURES } from "./sync-utils";

const DELEGATES_QUERY = `
  query GetDelegates($input: DelegatesInput!) {
    delegates(input: $input) {
      nodes {
        ... on Delegate {
          id
          account { address name bio picture twitter ens }
          votesCount
          delegatorsCount
          statement { statement statementSummary isSeekingDelegation }
        }
      }
      pageInfo { firstCursor lastCursor count }
    }
  }
`;

export interface DelegateFetchResult {
  status: PaginationStatus;
  delegates: Delegate[];
  cursor: string | null;
  pages: number;
  droppedNodes: number;
  fromCache: boolean;
  lastError: FetchError | null;
}

export async function fetchAllDelegates(
  ctx: IngestionContext,
  organization: Organization
): Promise<DelegateFetchResult> {
  const checkpoint = ctx.store.state();

  if (isDelegateCollectionComplete(checkpoint)) {
    console.log(`[Delegate Sync] Using ${checkpoint.delegates.length} checkpointed delegates`);
    return {
      status: "exhausted",
      delegates: checkpoint.delegates,
      cursor: null,
      pages: 0,
      droppedNodes: 0,
      fromCache: true,
      lastError: null,
    };
  }

  const resuming = checkpoint.delegates.length > 0 && checkpoint.lastDelegateCursor !== null;
  if (resuming) {
    console.log(`[Delegate Sync] Resuming from checkpoint with ${checkpoint.delegates.length} delegates`);
  }

  const target = organization.delegatesCount;
  let droppedNodes = 0;
  let nextLogAt = DELEGATE_PROGRESS_LOG_INTERVAL;

  const result = await paginate<Delegate>({
    label: "Delegate Sync",
    pageSize: ctx.settings.delegatePageSize,
    maxConsecutiveFailures: ENTITY_MAX_CONSECUTIVE_FAILURES,
    identify: (delegate) => delegate.address,
    seed: resuming ? checkpoint.delegates : [],
    startCursor: resuming ? checkpoint.lastDelegateCursor : null,
    signal: ctx.signal,
    sleep: ctx.sleep,
    fetchPage: async (cursor, limit) => {
      const response = await ctx.client.send(
        DELEGATES_QUERY,
        {
          input: {
            filters: { organizationId: organization.id },
            page: pageInput(cursor, limit),
            sort: { sortBy: "id", isDescending: false },
          },
        },
        delegatesResponseSchema
      );
      if (!response.ok) return response;

      const mapped = mapNodes(response.data.delegates?.nodes, mapDelegateNode);
      droppedNodes += mapped.dropped;
      return {
        ok: true,
        data: {
          items: mapped.items,
          nextCursor: response.data.delegates?.pageInfo?.lastCursor ?? null,
        },
      };
    },
    onProgress: async ({ items, cursor }) => {
      await ctx.store.save({ delegates: [...items], lastDelegateCursor: cursor });
      if (items.length >= nextLogAt) {
        const pct = target ? ` (${((items.length / target) * 100).toFixed(1)}%)` : "";
        console.log(`[Delegate Sync] ${items.length}/${target ?? "?"} delegates${pct}`);
        nextLogAt += DELEGATE_PROGRESS_LOG_INTERVAL;
      }
    },
  });

  if (droppedNodes > 0) {
    console.warn(`[Delegate Sync] Dropped ${droppedNodes} delegate nodes without an address`);
  }
  console.log(`[Delegate Sync] ${result.status}: ${result.items.length} delegates in ${result.pages} pages`);

  return {
    status: result.status,
    delegates: result.items,
    cursor: result.cursor,
    pages: result.pages,
    droppedNodes,
    fromCache: false,
    lastError: result.lastError,
  };
}
