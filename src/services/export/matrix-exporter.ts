/**
 * Voting matrix file export
 *
 * Writes the matrix, delegate summary and proposal analysis as CSV, the
 * delegation statements and proposal listing behind them, and a JSON run
 * report. Collections handed in are only read.
 */

import fs from "fs/promises";
import path from "path";
import { toCsv, type CsvColumn } from "../../libs/csv";
import type {
  Delegate,
  DelegateSummary,
  Proposal,
  ProposalSummary,
  ProposalVoteStat,
  VotingMatrix,
  VotingMatrixRecord,
} from "../../types/governance.types";
import type { RunReport } from "../../types/extraction.types";

export interface ExportContext {
  slug: string;
  organizationName: string;
  timestamp: Date;
  report?: RunReport;
}

export interface ExportedFiles {
  votingMatrix: string;
  delegateSummary: string;
  proposalAnalysis: string;
  delegationStatements: string;
  proposals: string;
  runReport: string;
}

/**
 * The fetched entities the matrix was built from
 */
export interface ExportSources {
  delegates: readonly Delegate[];
  proposals: readonly Proposal[];
}

export interface VotingMatrixExporter {
  exportResults(
    matrix: Readonly<VotingMatrix>,
    context: ExportContext,
    sources: ExportSources
  ): Promise<ExportedFiles>;
  exportEmergency<T>(
    context: ExportContext,
    label: string,
    rows: readonly T[],
    columns: readonly CsvColumn<T>[]
  ): Promise<string | null>;
}

// ============================================================
// Column Layouts
// ============================================================

export const MATRIX_COLUMNS: readonly CsvColumn<VotingMatrixRecord>[] = [
  { header: "dao_name", value: (r) => r.organizationName },
  { header: "delegate_address", value: (r) => r.delegateAddress },
  { header: "delegate_name", value: (r) => r.delegateName },
  { header: "delegate_ens", value: (r) => r.delegateEns },
  { header: "delegate_votes_count", value: (r) => r.delegateVotingPower },
  { header: "delegate_delegators_count", value: (r) => r.delegateDelegatorsCount },
  { header: "has_statement", value: (r) => r.hasStatement },
  { header: "seeking_delegation", value: (r) => r.seekingDelegation },
  { header: "is_active_delegate", value: (r) => r.isActiveDelegate },
  { header: "proposal_id", value: (r) => r.proposalId },
  { header: "proposal_onchain_id", value: (r) => r.proposalOnchainId },
  { header: "proposal_title", value: (r) => r.proposalTitle },
  { header: "proposal_status", value: (r) => r.proposalStatus },
  { header: "proposal_start_timestamp", value: (r) => r.proposalStartTimestamp },
  { header: "proposal_end_timestamp", value: (r) => r.proposalEndTimestamp },
  { header: "proposal_start_block", value: (r) => r.proposalStartBlock },
  { header: "proposal_end_block", value: (r) => r.proposalEndBlock },
  { header: "vote", value: (r) => r.vote },
  { header: "voting_amount", value: (r) => r.votingAmount },
  { header: "vote_type_raw", value: (r) => r.voteTypeRaw },
  { header: "vote_reason", value: (r) => r.voteReason },
  { header: "vote_timestamp", value: (r) => r.voteTimestamp },
  { header: "vote_block_number", value: (r) => r.voteBlockNumber },
  { header: "vote_tx_hash", value: (r) => r.voteTxHash },
  { header: "participated", value: (r) => r.participated },
];

export const DELEGATE_SUMMARY_COLUMNS: readonly CsvColumn<DelegateSummary>[] = [
  { header: "delegate_address", value: (s) => s.delegateAddress },
  { header: "delegate_name", value: (s) => s.delegateName },
  { header: "delegate_ens", value: (s) => s.delegateEns },
  { header: "votes_cast", value: (s) => s.votesCast },
  { header: "total_proposals", value: (s) => s.totalProposals },
  { header: "delegate_power", value: (s) => s.votingPower },
  { header: "delegators_count", value: (s) => s.delegatorsCount },
  { header: "has_statement", value: (s) => s.hasStatement },
  { header: "seeking_delegation", value: (s) => s.seekingDelegation },
  { header: "is_active_delegate", value: (s) => s.isActiveDelegate },
  { header: "participation_rate", value: (s) => s.participationRate },
  { header: "votes_for", value: (s) => s.tally.For },
  { header: "votes_against", value: (s) => s.tally.Against },
  { header: "votes_abstain", value: (s) => s.tally.Abstain },
  { header: "votes_voted", value: (s) => s.tally.Voted },
  { header: "votes_unknown", value: (s) => s.tally.Unknown },
];

export const PROPOSAL_ANALYSIS_COLUMNS: readonly CsvColumn<ProposalSummary>[] = [
  { header: "proposal_id", value: (p) => p.proposalId },
  { header: "proposal_title", value: (p) => p.proposalTitle },
  { header: "proposal_status", value: (p) => p.proposalStatus },
  { header: "actual_votes", value: (p) => p.uniqueVoters },
  { header: "total_delegates", value: (p) => p.eligibleDelegates },
  { header: "votes_fetched", value: (p) => p.votesFetched },
  { header: "expected_voters", value: (p) => p.expectedVoters },
  { header: "start_time", value: (p) => p.startTime },
  { header: "end_time", value: (p) => p.endTime },
  { header: "participation_rate", value: (p) => p.participationRate },
  { header: "votes_for", value: (p) => p.tally.For },
  { header: "votes_against", value: (p) => p.tally.Against },
  { header: "votes_abstain", value: (p) => p.tally.Abstain },
  { header: "votes_voted", value: (p) => p.tally.Voted },
  { header: "votes_unknown", value: (p) => p.tally.Unknown },
];

export const DELEGATE_COLUMNS: readonly CsvColumn<Delegate>[] = [
  { header: "delegate_address", value: (d) => d.displayAddress },
  { header: "delegate_name", value: (d) => d.name },
  { header: "delegate_ens", value: (d) => d.ens },
  { header: "votes_count", value: (d) => d.votingPower },
  { header: "delegators_count", value: (d) => d.delegatorsCount },
  { header: "has_statement", value: (d) => Boolean(d.statement?.trim()) },
  { header: "seeking_delegation", value: (d) => d.isSeekingDelegation },
];

export function hasDelegationStatement(delegate: Delegate): boolean {
  return Boolean(delegate.statement?.trim() || delegate.statementSummary?.trim());
}

export const DELEGATION_STATEMENT_COLUMNS: readonly CsvColumn<Delegate>[] = [
  { header: "delegate_address", value: (d) => d.displayAddress },
  { header: "delegate_name", value: (d) => d.name },
  { header: "delegate_ens", value: (d) => d.ens },
  { header: "bio", value: (d) => d.bio },
  { header: "statement", value: (d) => d.statement },
  { header: "statement_summary", value: (d) => d.statementSummary },
  { header: "seeking_delegation", value: (d) => d.isSeekingDelegation },
  { header: "votes_count", value: (d) => d.votingPower },
  { header: "delegators_count", value: (d) => d.delegatorsCount },
];

const findVoteStat = (proposal: Proposal, type: string): ProposalVoteStat | undefined =>
  proposal.voteStats.find((stat) => stat.type.toLowerCase() === type);

const voteStatColumns = (type: string): CsvColumn<Proposal>[] => [
  { header: `${type}_votes_count`, value: (p) => findVoteStat(p, type)?.votesCount },
  { header: `${type}_voters_count`, value: (p) => findVoteStat(p, type)?.votersCount },
  { header: `${type}_percent`, value: (p) => findVoteStat(p, type)?.percent.toFixed(2) },
];

export const PROPOSAL_COLUMNS: readonly CsvColumn<Proposal>[] = [
  { header: "proposal_id", value: (p) => p.id },
  { header: "onchain_id", value: (p) => p.onchainId },
  { header: "title", value: (p) => p.title },
  { header: "description", value: (p) => p.description },
  { header: "status", value: (p) => p.status },
  { header: "proposer_address", value: (p) => p.proposerAddress },
  { header: "start_timestamp", value: (p) => p.start?.timestamp },
  { header: "start_block", value: (p) => p.start?.number },
  { header: "end_timestamp", value: (p) => p.end?.timestamp },
  { header: "end_block", value: (p) => p.end?.number },
  { header: "quorum", value: (p) => p.quorum },
  ...voteStatColumns("for"),
  ...voteStatColumns("against"),
  ...voteStatColumns("abstain"),
];

// ============================================================
// Naming
// ============================================================

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * `YYYYMMDD_HHMMSS` in UTC
 */
export function exportTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function exportSlug(slug: string): string {
  return slug.trim().replace(/\s+/g, "_").toLowerCase();
}

// ============================================================
// File Exporter
// ============================================================

export class FileMatrixExporter implements VotingMatrixExporter {
  constructor(private readonly directory: string) {}

  async exportResults(
    matrix: Readonly<VotingMatrix>,
    context: ExportContext,
    sources: ExportSources
  ): Promise<ExportedFiles> {
    await fs.mkdir(this.directory, { recursive: true });
    const prefix = exportSlug(context.slug);
    const ts = exportTimestamp(context.timestamp);

    const files: ExportedFiles = {
      votingMatrix: path.join(this.directory, `${prefix}_voting_matrix_${ts}.csv`),
      delegateSummary: path.join(this.directory, `${prefix}_delegate_summary_${ts}.csv`),
      proposalAnalysis: path.join(this.directory, `${prefix}_proposal_analysis_${ts}.csv`),
      delegationStatements: path.join(this.directory, `${prefix}_delegation_statements_${ts}.csv`),
      proposals: path.join(this.directory, `${prefix}_proposals_${ts}.csv`),
      runReport: path.join(this.directory, `${prefix}_run_report_${ts}.json`),
    };

    await fs.writeFile(files.votingMatrix, toCsv(matrix.records, MATRIX_COLUMNS), "utf8");
    console.log(`[Export] Voting matrix: ${files.votingMatrix} (${matrix.records.length} records)`);

    await fs.writeFile(
      files.delegateSummary,
      toCsv(matrix.delegateSummaries, DELEGATE_SUMMARY_COLUMNS),
      "utf8"
    );
    console.log(`[Export] Delegate summary: ${files.delegateSummary}`);

    await fs.writeFile(
      files.proposalAnalysis,
      toCsv(matrix.proposalSummaries, PROPOSAL_ANALYSIS_COLUMNS),
      "utf8"
    );
    console.log(`[Export] Proposal analysis: ${files.proposalAnalysis}`);

    const statements = sources.delegates.filter(hasDelegationStatement);
    await fs.writeFile(
      files.delegationStatements,
      toCsv(statements, DELEGATION_STATEMENT_COLUMNS),
      "utf8"
    );
    console.log(`[Export] Delegation statements: ${files.delegationStatements} (${statements.length} delegates)`);

    await fs.writeFile(files.proposals, toCsv(sources.proposals, PROPOSAL_COLUMNS), "utf8");
    console.log(`[Export] Proposals: ${files.proposals} (${sources.proposals.length} proposals)`);

    const report = {
      organizationName: context.organizationName,
      organizationSlug: context.slug,
      exportedAt: context.timestamp.toISOString(),
      statistics: matrix.statistics,
      run: context.report ?? null,
    };
    await fs.writeFile(files.runReport, `${JSON.stringify(report, null, 2)}\n`, "utf8");
    console.log(`[Export] Run report: ${files.runReport}`);

    return files;
  }

  async exportEmergency<T>(
    context: ExportContext,
    label: string,
    rows: readonly T[],
    columns: readonly CsvColumn<T>[]
  ): Promise<string | null> {
    if (rows.length === 0) return null;

    await fs.mkdir(this.directory, { recursive: true });
    const file = path.join(
      this.directory,
      `${exportSlug(context.slug)}_EMERGENCY_${label}_${exportTimestamp(context.timestamp)}.csv`
    );
    await fs.writeFile(file, toCsv(rows, columns), "utf8");
    console.warn(`[Export] Emergency export: ${file} (${rows.length} rows)`);
    return file;
  }
}
