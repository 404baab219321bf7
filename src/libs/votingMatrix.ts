import { normalizeVote } from "./voteNormalizer";
import { expectedVoterCount } from "./tallyMapper";
import {
  DID_NOT_VOTE,
  type Delegate,
  type DelegateSummary,
  type MatrixStatistics,
  type OutcomeTally,
  type Proposal,
  type ProposalSummary,
  type Vote,
  type VoteOutcome,
  type VotingMatrix,
  type VotingMatrixRecord,
} from "../types/governance.types";

export interface VotingMatrixInput {
  organizationName: string;
  proposals: readonly Proposal[];
  delegates: readonly Delegate[];
  votesByProposal: ReadonlyMap<string, readonly Vote[]>;
}

interface AttachedVote {
  outcome: VoteOutcome;
  vote: Vote;
}

const emptyTally = (): OutcomeTally => ({
  For: 0,
  Against: 0,
  Abstain: 0,
  Voted: 0,
  Unknown: 0,
});

// Two decimals, 0 when there is nothing to divide by
const pct2 = (numerator: number, denominator: number): number =>
  denominator > 0 ? Math.round((numerator / denominator) * 10000) / 100 : 0;

const text = (value: string | number | null | undefined): string =>
  value == null ? "" : String(value);

export const delegateDisplayName = (delegate: Delegate): string =>
  delegate.name ?? `${delegate.displayAddress.slice(0, 10)}...`;

export const proposalDisplayTitle = (proposal: Proposal): string =>
  proposal.title ?? `Proposal ${proposal.id}`;

function uniqueDelegates(delegates: readonly Delegate[]): Delegate[] {
  const seen = new Set<string>();
  return delegates.filter((delegate) => {
    if (seen.has(delegate.address)) return false;
    seen.add(delegate.address);
    return true;
  });
}

/**
 * Keys a proposal's votes by lower-cased voter address. When a voter appears
 * more than once the later vote wins.
 */
export function buildVoteMap(votes: readonly Vote[]): Map<string, AttachedVote> {
  const voteMap = new Map<string, AttachedVote>();
  for (const vote of votes) {
    if (!vote.voterAddress) continue;
    voteMap.set(vote.voterAddress.toLowerCase(), {
      outcome: normalizeVote(vote),
      vote,
    });
  }
  return voteMap;
}

function buildRecord(
  organizationName: string,
  delegate: Delegate,
  proposal: Proposal,
  attached: AttachedVote | undefined
): VotingMatrixRecord {
  const base = {
    organizationName,
    delegateAddress: delegate.displayAddress,
    delegateName: delegateDisplayName(delegate),
    delegateEns: delegate.ens ?? "",
    delegateVotingPower: delegate.votingPower,
    delegateDelegatorsCount: delegate.delegatorsCount,
    hasStatement: Boolean(delegate.statement?.trim()),
    seekingDelegation: delegate.isSeekingDelegation,
    isActiveDelegate: delegate.votingPower > 0,
    proposalId: proposal.id,
    proposalOnchainId: proposal.onchainId ?? "",
    proposalTitle: proposalDisplayTitle(proposal),
    proposalStatus: proposal.status,
    proposalStartTimestamp: text(proposal.start?.timestamp),
    proposalEndTimestamp: text(proposal.end?.timestamp),
    proposalStartBlock: text(proposal.start?.number),
    proposalEndBlock: text(proposal.end?.number),
  };

  if (!attached) {
    return {
      ...base,
      vote: DID_NOT_VOTE,
      votingAmount: "0",
      voteTypeRaw: "",
      voteReason: "",
      voteTimestamp: "",
      voteBlockNumber: "",
      voteTxHash: "",
      participated: false,
    };
  }

  const { vote, outcome } = attached;
  return {
    ...base,
    vote: outcome,
    votingAmount: vote.amount || "0",
    voteTypeRaw: vote.type,
    voteReason: vote.reason,
    voteTimestamp: text(vote.block?.timestamp),
    voteBlockNumber: text(vote.block?.number),
    voteTxHash: vote.txHash ?? "",
    participated: true,
  };
}

/**
 * Full delegates × proposals cross-join. Every delegate gets one record per
 * proposal, voted or not, so participation has a denominator.
 */
export function buildVotingMatrix(input: VotingMatrixInput): VotingMatrix {
  const { organizationName, proposals, votesByProposal } = input;
  const delegates = uniqueDelegates(input.delegates);

  const records: VotingMatrixRecord[] = [];
  const delegateAgg = new Map<string, DelegateSummary>();
  const proposalSummaries: ProposalSummary[] = [];
  const votersOverall = new Set<string>();

  for (const delegate of delegates) {
    delegateAgg.set(delegate.address, {
      delegateAddress: delegate.displayAddress,
      delegateName: delegateDisplayName(delegate),
      delegateEns: delegate.ens ?? "",
      votesCast: 0,
      totalProposals: 0,
      votingPower: delegate.votingPower,
      delegatorsCount: delegate.delegatorsCount,
      hasStatement: Boolean(delegate.statement?.trim()),
      seekingDelegation: delegate.isSeekingDelegation,
      isActiveDelegate: delegate.votingPower > 0,
      participationRate: 0,
      tally: emptyTally(),
    });
  }

  for (const proposal of proposals) {
    const votes = votesByProposal.get(proposal.id) ?? [];
    const voteMap = buildVoteMap(votes);
    const tally = emptyTally();
    let uniqueVoters = 0;
    let eligibleDelegates = 0;

    for (const delegate of delegates) {
      const summary = delegateAgg.get(delegate.address);
      if (!summary) continue;

      const attached = voteMap.get(delegate.address);
      records.push(buildRecord(organizationName, delegate, proposal, attached));
      eligibleDelegates++;
      summary.totalProposals++;

      if (attached) {
        uniqueVoters++;
        tally[attached.outcome]++;
        summary.votesCast++;
        summary.tally[attached.outcome]++;
        votersOverall.add(delegate.address);
      }
    }

    proposalSummaries.push({
      proposalId: proposal.id,
      proposalTitle: proposalDisplayTitle(proposal),
      proposalStatus: proposal.status,
      startTime: text(proposal.start?.timestamp),
      endTime: text(proposal.end?.timestamp),
      uniqueVoters,
      eligibleDelegates,
      votesFetched: votes.length,
      expectedVoters: expectedVoterCount(proposal),
      participationRate: pct2(uniqueVoters, eligibleDelegates),
      tally,
    });
  }

  const delegateSummaries = [...delegateAgg.values()];
  for (const summary of delegateSummaries) {
    summary.participationRate = pct2(summary.votesCast, summary.totalProposals);
  }
  delegateSummaries.sort((a, b) => b.votingPower - a.votingPower);

  const totalDelegateVotes = proposalSummaries.reduce((sum, p) => sum + p.uniqueVoters, 0);
  const statistics: MatrixStatistics = {
    totalRecords: records.length,
    uniqueDelegates: delegateAgg.size,
    uniqueProposals: proposalSummaries.length,
    totalDelegateVotes,
    uniqueVoters: votersOverall.size,
    proposalsWithVotes: proposalSummaries.filter((p) => p.uniqueVoters > 0).length,
    overallParticipationRate: pct2(totalDelegateVotes, records.length),
    activeDelegatesCount: delegateSummaries.filter((d) => d.isActiveDelegate).length,
  };

  return {
    records,
    delegateSummaries,
    proposalSummaries: [...proposalSummaries].sort((a, b) => b.uniqueVoters - a.uniqueVoters),
    statistics,
  };
}
