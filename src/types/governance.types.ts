/**
 * Governance domain model
 *
 * Records here are already normalised: addresses are lower-cased, numeric
 * fields parsed, and optional service fields collapsed to `null`.
 */

export const PROPOSAL_STATUSES = [
  "pending",
  "active",
  "succeeded",
  "defeated",
  "executed",
  "canceled",
  "queued",
  "expired",
  "unknown",
] as const;

export type ProposalStatus = (typeof PROPOSAL_STATUSES)[number];

export const VOTE_OUTCOMES = ["For", "Against", "Abstain", "Voted", "Unknown"] as const;

export type VoteOutcome = (typeof VOTE_OUTCOMES)[number];

export const DID_NOT_VOTE = "Did Not Vote";

export type MatrixVote = VoteOutcome | typeof DID_NOT_VOTE;

export interface Organization {
  id: string;
  slug: string;
  name: string;
  chainIds: string[];
  governorIds: string[];
  // Declared totals: expected counts only, never ground truth
  proposalsCount: number | null;
  delegatesCount: number | null;
  delegatesVotesCount: string | null;
  tokenOwnersCount: number | null;
  hasActiveProposals: boolean;
}

export interface Delegate {
  address: string; // lower-cased, unique key
  displayAddress: string;
  name: string | null;
  ens: string | null;
  bio: string | null;
  votingPower: number;
  delegatorsCount: number;
  statement: string | null;
  statementSummary: string | null;
  isSeekingDelegation: boolean;
}

export interface BlockRef {
  timestamp: string | null;
  number: number | null;
}

export interface ProposalVoteStat {
  type: string;
  votesCount: string;
  votersCount: number;
  percent: number;
}

export interface Proposal {
  id: string;
  onchainId: string | null;
  status: ProposalStatus;
  title: string | null;
  description: string | null;
  proposerAddress: string | null;
  start: BlockRef | null;
  end: BlockRef | null;
  quorum: string | null;
  voteStats: ProposalVoteStat[];
}

export interface Vote {
  id: string;
  proposalId: string;
  voterAddress: string; // lower-cased
  voterName: string | null;
  type: string;
  amount: string;
  reason: string;
  block: BlockRef | null;
  txHash: string | null;
}

export interface VotingMatrixRecord {
  organizationName: string;
  delegateAddress: string;
  delegateName: string;
  delegateEns: string;
  delegateVotingPower: number;
  delegateDelegatorsCount: number;
  hasStatement: boolean;
  seekingDelegation: boolean;
  isActiveDelegate: boolean;
  proposalId: string;
  proposalOnchainId: string;
  proposalTitle: string;
  proposalStatus: ProposalStatus;
  proposalStartTimestamp: string;
  proposalEndTimestamp: string;
  proposalStartBlock: string;
  proposalEndBlock: string;
  vote: MatrixVote;
  votingAmount: string;
  voteTypeRaw: string;
  voteReason: string;
  voteTimestamp: string;
  voteBlockNumber: string;
  voteTxHash: string;
  participated: boolean;
}

export type OutcomeTally = Record<VoteOutcome, number>;

export interface DelegateSummary {
  delegateAddress: string;
  delegateName: string;
  delegateEns: string;
  votesCast: number;
  totalProposals: number;
  votingPower: number;
  delegatorsCount: number;
  hasStatement: boolean;
  seekingDelegation: boolean;
  isActiveDelegate: boolean;
  participationRate: number;
  tally: OutcomeTally;
}

export interface ProposalSummary {
  proposalId: string;
  proposalTitle: string;
  proposalStatus: ProposalStatus;
  startTime: string;
  endTime: string;
  uniqueVoters: number;
  eligibleDelegates: number;
  votesFetched: number;
  expectedVoters: number | null;
  participationRate: number;
  tally: OutcomeTally;
}

export interface MatrixStatistics {
  totalRecords: number;
  uniqueDelegates: number;
  uniqueProposals: number;
  totalDelegateVotes: number;
  uniqueVoters: number;
  proposalsWithVotes: number;
  overallParticipationRate: number;
  activeDelegatesCount: number;
}

export interface VotingMatrix {
  records: VotingMatrixRecord[];
  delegateSummaries: DelegateSummary[];
  proposalSummaries: ProposalSummary[];
  statistics: MatrixStatistics;
}
