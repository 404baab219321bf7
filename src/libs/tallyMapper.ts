import {
  tallyDelegateSchema,
  tallyProposalSchema,
  tallyVoteSchema,
  type TallyOrganization,
} from "../schemas/tally.schemas";
import type {
  BlockRef,
  Delegate,
  Organization,
  Proposal,
  ProposalStatus,
  ProposalVoteStat,
  Vote,
} from "../types/governance.types";

type NumberLike = number | string | null | undefined;

const statusMap = new Map<string, ProposalStatus>(
  Object.entries({
    pending: "pending",
    draft: "pending",
    submitted: "pending",
    active: "active",
    extended: "active",
    succeeded: "succeeded",
    defeated: "defeated",
    executed: "executed",
    callexecuted: "executed",
    crosschainexecuted: "executed",
    canceled: "canceled",
    cancelled: "canceled",
    queued: "queued",
    expired: "expired",
  } satisfies Record<string, ProposalStatus>)
);

const toNumber = (value: NumberLike, fallback = 0): number => {
  if (value == null || value === "") return fallback;
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toNonNegativeInteger = (value: NumberLike): number =>
  Math.max(0, Math.trunc(toNumber(value)));

const toNullableNumber = (value: NumberLike): number | null => {
  if (value == null || value === "") return null;
  const parsed = toNumber(value, Number.NaN);
  return Number.isNaN(parsed) ? null : parsed;
};

const toNullableString = (value: NumberLike): string | null => {
  if (value == null) return null;
  const text = String(value).trim();
  return text.length > 0 ? text : null;
};

const toBlockRef = (
  block: { timestamp?: string | number | null; number?: NumberLike } | null | undefined
): BlockRef | null => {
  if (!block) return null;
  return {
    timestamp: block.timestamp == null ? null : String(block.timestamp),
    number: toNullableNumber(block.number),
  };
};

export const mapProposalStatus = (status: string | null | undefined): ProposalStatus => {
  if (!status) return "unknown";
  return statusMap.get(status.trim().toLowerCase()) ?? "unknown";
};

export const mapOrganization = (organization: TallyOrganization): Organization => ({
  id: organization.id,
  slug: organization.slug,
  name: organization.name,
  chainIds: organization.chainIds ?? [],
  governorIds: organization.governorIds ?? [],
  proposalsCount: toNullableNumber(organization.proposalsCount),
  delegatesCount: toNullableNumber(organization.delegatesCount),
  delegatesVotesCount: toNullableString(organization.delegatesVotesCount),
  tokenOwnersCount: toNullableNumber(organization.tokenOwnersCount),
  hasActiveProposals: organization.hasActiveProposals ?? false,
});

/**
 * Maps a raw delegate node. Returns null for nodes without an account address.
 */
export const mapDelegateNode = (node: unknown): Delegate | null => {
  const parsed = tallyDelegateSchema.safeParse(node);
  if (!parsed.success) return null;

  const { account, statement } = parsed.data;
  return {
    address: account.address.toLowerCase(),
    displayAddress: account.address,
    name: toNullableString(account.name),
    ens: toNullableString(account.ens),
    bio: toNullableString(account.bio),
    votingPower: Math.max(0, toNumber(parsed.data.votesCount)),
    delegatorsCount: toNonNegativeInteger(parsed.data.delegatorsCount),
    statement: toNullableString(statement?.statement),
    statementSummary: toNullableString(statement?.statementSummary),
    isSeekingDelegation: statement?.isSeekingDelegation ?? false,
  };
};

/**
 * Maps a raw proposal node. Proposals need an id plus at least one
 * identifying field (status, on-chain id, title, description or proposer).
 */
export const mapProposalNode = (node: unknown): Proposal | null => {
  const parsed = tallyProposalSchema.safeParse(node);
  if (!parsed.success) return null;

  const raw = parsed.data;
  const title = toNullableString(raw.metadata?.title);
  const description = toNullableString(raw.metadata?.description);
  const proposerAddress = toNullableString(raw.proposer?.address);
  const hasIdentity =
    raw.status != null ||
    raw.onchainId != null ||
    title !== null ||
    description !== null ||
    proposerAddress !== null;
  if (!hasIdentity) return null;

  const voteStats: ProposalVoteStat[] = (raw.voteStats ?? []).map((stat) => ({
    type: stat.type ?? "unknown",
    votesCount: toNullableString(stat.votesCount) ?? "0",
    votersCount: toNonNegativeInteger(stat.votersCount),
    percent: toNumber(stat.percent),
  }));

  return {
    id: raw.id,
    onchainId: raw.onchainId ?? null,
    status: mapProposalStatus(raw.status),
    title,
    description,
    proposerAddress: proposerAddress ? proposerAddress.toLowerCase() : null,
    start: toBlockRef(raw.start),
    end: toBlockRef(raw.end),
    quorum: toNullableString(raw.quorum),
    voteStats,
  };
};

/**
 * Maps a raw vote node. Votes without a voter address are dropped.
 */
export const mapVoteNode = (node: unknown, proposalId: string): Vote | null => {
  const parsed = tallyVoteSchema.safeParse(node);
  if (!parsed.success) return null;

  const raw = parsed.data;
  return {
    id: raw.id,
    proposalId,
    voterAddress: raw.voter.address.toLowerCase(),
    voterName: toNullableString(raw.voter.name) ?? toNullableString(raw.voter.ens),
    type: raw.type?.trim() ?? "",
    amount: toNullableString(raw.amount) ?? "0",
    reason: raw.reason ?? "",
    block: toBlockRef(raw.block),
    txHash: toNullableString(raw.txHash),
  };
};

export interface MappedNodes<T> {
  items: T[];
  dropped: number;
}

export function mapNodes<T>(
  nodes: readonly unknown[] | null | undefined,
  mapper: (node: unknown) => T | null
): MappedNodes<T> {
  const items: T[] = [];
  let dropped = 0;
  for (const node of nodes ?? []) {
    const mapped = mapper(node);
    if (mapped === null) {
      dropped++;
    } else {
      items.push(mapped);
    }
  }
  return { items, dropped };
}

/**
 * Sum of reported voter counts across a proposal's vote stats.
 * Returns null when the service reported no stats at all.
 */
export const expectedVoterCount = (proposal: Proposal): number | null => {
  if (proposal.voteStats.length === 0) return null;
  return proposal.voteStats.reduce((sum, stat) => sum + stat.votersCount, 0);
};
