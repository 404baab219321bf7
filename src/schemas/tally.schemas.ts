/**
 * Tally GraphQL payload schemas
 * API Documentation: https://apidocs.tally.xyz
 *
 * Raw nodes are validated loosely here (most fields nullish); defaulting into
 * the domain model happens once, in libs/tallyMapper.
 */

import { z } from "zod";

const idLike = z.union([z.string(), z.number()]).transform((value) => String(value));
const numberLike = z.union([z.number(), z.string()]).nullish();

export const tallyPageInfoSchema = z.object({
  firstCursor: z.string().nullish(),
  lastCursor: z.string().nullish(),
  count: z.number().nullish(),
});

/**
 * Nodes are kept as `unknown` at page level so that a single malformed node
 * is dropped by the mapper instead of failing the whole page.
 */
const connectionSchema = z.object({
  nodes: z.array(z.unknown()).nullish(),
  pageInfo: tallyPageInfoSchema.nullish(),
});

// ============================================================
// Organization
// ============================================================

export const tallyOrganizationSchema = z.object({
  id: idLike,
  slug: z.string(),
  name: z.string(),
  chainIds: z.array(z.string()).nullish(),
  governorIds: z.array(z.string()).nullish(),
  proposalsCount: numberLike,
  delegatesCount: numberLike,
  delegatesVotesCount: numberLike,
  tokenOwnersCount: numberLike,
  hasActiveProposals: z.boolean().nullish(),
});

export const organizationResponseSchema = z.object({
  organization: tallyOrganizationSchema.nullish(),
});

// ============================================================
// Delegates
// ============================================================

export const tallyDelegateSchema = z.object({
  id: idLike.nullish(),
  account: z.object({
    address: z.string().min(1),
    name: z.string().nullish(),
    bio: z.string().nullish(),
    picture: z.string().nullish(),
    twitter: z.string().nullish(),
    ens: z.string().nullish(),
  }),
  votesCount: numberLike,
  delegatorsCount: numberLike,
  statement: z
    .object({
      statement: z.string().nullish(),
      statementSummary: z.string().nullish(),
      isSeekingDelegation: z.boolean().nullish(),
    })
    .nullish(),
});

export const delegatesResponseSchema = z.object({
  delegates: connectionSchema.nullish(),
});

// ============================================================
// Proposals
// ============================================================

const blockRefSchema = z
  .object({
    timestamp: z.union([z.string(), z.number()]).nullish(),
    number: numberLike,
  })
  .nullish();

export const tallyVoteStatSchema = z.object({
  type: z.string().nullish(),
  votesCount: numberLike,
  votersCount: numberLike,
  percent: numberLike,
});

export const tallyProposalSchema = z.object({
  id: idLike,
  onchainId: idLike.nullish(),
  status: z.string().nullish(),
  metadata: z
    .object({
      title: z.string().nullish(),
      description: z.string().nullish(),
    })
    .nullish(),
  proposer: z
    .object({
      address: z.string().nullish(),
      name: z.string().nullish(),
    })
    .nullish(),
  start: blockRefSchema,
  end: blockRefSchema,
  voteStats: z.array(tallyVoteStatSchema).nullish(),
  quorum: numberLike,
});

export const proposalsResponseSchema = z.object({
  proposals: connectionSchema.nullish(),
});

// ============================================================
// Votes
// ============================================================

export const tallyVoteSchema = z.object({
  id: idLike,
  type: z.string().nullish(),
  amount: numberLike,
  reason: z.string().nullish(),
  voter: z.object({
    address: z.string().min(1),
    name: z.string().nullish(),
    ens: z.string().nullish(),
  }),
  block: blockRefSchema,
  txHash: z.string().nullish(),
});

export const votesResponseSchema = z.object({
  votes: connectionSchema.nullish(),
});

export type TallyPageInfo = z.infer<typeof tallyPageInfoSchema>;
export type TallyOrganization = z.infer<typeof tallyOrganizationSchema>;
export type TallyDelegate = z.infer<typeof tallyDelegateSchema>;
export type TallyProposal = z.infer<typeof tallyProposalSchema>;
export type TallyVoteStat = z.infer<typeof tallyVoteStatSchema>;
export type TallyVote = z.infer<typeof tallyVoteSchema>;
export type OrganizationResponse = z.infer<typeof organizationResponseSchema>;
export type DelegatesResponse = z.infer<typeof delegatesResponseSchema>;
export type ProposalsResponse = z.infer<typeof proposalsResponseSchema>;
export type VotesResponse = z.infer<typeof votesResponseSchema>;
