import { z } from "zod";
import {
  PROPOSAL_STATUSES,
  type Delegate,
  type Proposal,
  type Vote,
} from "../types/governance.types";

// Checkpoint files are written by this service but may predate a field, so
// every optional attribute defaults instead of failing the whole file.

const nullableString = z.string().nullable().default(null);

const blockRefSchema = z
  .object({
    timestamp: nullableString,
    number: z.number().nullable().default(null),
  })
  .nullable()
  .default(null);

export const delegateRecordSchema: z.ZodType<Delegate, z.ZodTypeDef, unknown> = z.object({
  address: z.string().min(1),
  displayAddress: z.string().min(1),
  name: nullableString,
  ens: nullableString,
  bio: nullableString,
  votingPower: z.number().nonnegative().default(0),
  delegatorsCount: z.number().int().nonnegative().default(0),
  statement: nullableString,
  statementSummary: nullableString,
  isSeekingDelegation: z.boolean().default(false),
});

export const proposalRecordSchema: z.ZodType<Proposal, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  onchainId: nullableString,
  status: z.enum(PROPOSAL_STATUSES).catch("unknown"),
  title: nullableString,
  description: nullableString,
  proposerAddress: nullableString,
  start: blockRefSchema,
  end: blockRefSchema,
  quorum: nullableString,
  voteStats: z
    .array(
      z.object({
        type: z.string(),
        votesCount: z.string().default("0"),
        votersCount: z.number().int().nonnegative().default(0),
        percent: z.number().default(0),
      })
    )
    .default([]),
});

export const voteRecordSchema: z.ZodType<Vote, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  proposalId: z.string().min(1),
  voterAddress: z.string().min(1),
  voterName: nullableString,
  type: z.string().default(""),
  amount: z.string().default("0"),
  reason: z.string().default(""),
  block: blockRefSchema,
  txHash: nullableString,
});

export const checkpointStateSchema = z.object({
  delegates: z.array(delegateRecordSchema).default([]),
  proposals: z.array(proposalRecordSchema).default([]),
  lastDelegateCursor: nullableString,
  votesCache: z.record(z.string(), z.array(voteRecordSchema)).default({}),
  processedProposals: z.array(z.string()).default([]),
  updatedAt: nullableString,
});

export const voteProgressSchema = z.object({
  afterCursor: nullableString,
  votes: z.array(voteRecordSchema).default([]),
  updatedAt: nullableString,
});

export const voteCheckpointSchema = z.record(z.string(), voteProgressSchema);

export type CheckpointState = z.infer<typeof checkpointStateSchema>;
export type VoteProgress = z.infer<typeof voteProgressSchema>;
