/**
 * Voting Matrix Extraction
 *
 * organization → delegates → proposals → votes per proposal → matrix → export
 *
 * Every stage reads and writes the run's checkpoint store, so an interrupted
 * or failed run resumes from the last page boundary.
 */

import { buildVotingMatrix } from "../../libs/votingMatrix";
import type {
  Delegate,
  Organization,
  Proposal,
  Vote,
  VotingMatrix,
  VotingMatrixRecord,
} from "../../types/governance.types";
import type {
  CoverageSummary,
  EntityFetchSummary,
  RunReport,
  VoteFetchSummary,
} from "../../types/extraction.types";
import {
  DELEGATE_COLUMNS,
  MATRIX_COLUMNS,
  PROPOSAL_COLUMNS,
  type ExportContext,
  type ExportedFiles,
  type VotingMatrixExporter,
} from "../export/matrix-exporter";
import type { GraphQLClient } from "../tally-graphql";
import type { CheckpointStore } from "./checkpoint-store";
import { DEFAULT_INGESTION_SETTINGS, type IngestionContext, type IngestionSettings } from "./context";
import { fetchAllDelegates } from "./delegate.service";
import { resolveOrganization } from "./organization.service";
import type { PaginationStatus } from "./paginator";
import { fetchAllProposals } from "./proposal.service";
import { formatDuration } from "./sync-utils";
import { errorMessage, type SleepFn } from "./utils";
import { fetchVotesForProposal } from "./vote.service";

export interface ExtractionDependencies {
  client: GraphQLClient;
  store: CheckpointStore;
  exporter: VotingMatrixExporter;
  sleep?: SleepFn;
  now?: () => Date;
}

export interface ExtractionOptions {
  slug: string;
  organizationName?: string;
  alternativeSlugs?: readonly string[];
  settings?: Partial<IngestionSettings>;
  allowPartialResults?: boolean;
  cleanupCheckpoints?: boolean;
  probeConcurrency?: number;
  signal?: AbortSignal;
}

export type ExtractionStatus = "completed" | "partial" | "interrupted";

export interface ExtractionResult {
  status: ExtractionStatus;
  organization: Organization | null;
  matrix: VotingMatrix | null;
  files: ExportedFiles | null;
  report: RunReport;
}

export type IncompleteEntity = "delegates" | "proposals" | "votes";

/**
 * An entity stayed partial and partial results were not allowed. Progress is
 * already checkpointed; rerunning resumes where this run stopped.
 */
export class ExtractionIncompleteError extends Error {
  constructor(
    readonly entity: IncompleteEntity,
    readonly status: PaginationStatus,
    detail: string
  ) {
    super(`Extraction incomplete: ${entity} ${status} (${detail})`);
    this.name = "ExtractionIncompleteError";
  }
}

interface RunTracker {
  organization: Organization | null;
  delegates: readonly Delegate[];
  proposals: readonly Proposal[];
  records: readonly VotingMatrixRecord[];
  delegateSummary: EntityFetchSummary | null;
  proposalSummary: EntityFetchSummary | null;
  votes: VoteFetchSummary[];
}

export async function runVotingMatrixExtraction(
  deps: ExtractionDependencies,
  options: ExtractionOptions
): Promise<ExtractionResult> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const settings: IngestionSettings = { ...DEFAULT_INGESTION_SETTINGS, ...options.settings };
  const allowPartial = options.allowPartialResults ?? false;
  const ctx: IngestionContext = {
    client: deps.client,
    store: deps.store,
    settings,
    signal: options.signal,
    sleep: deps.sleep,
  };

  const tracker: RunTracker = {
    organization: null,
    delegates: [],
    proposals: [],
    records: [],
    delegateSummary: null,
    proposalSummary: null,
    votes: [],
  };

  const organizationName = (): string =>
    options.organizationName || tracker.organization?.name || options.slug;

  const buildReport = (): RunReport => {
    const finishedAt = now();
    return {
      organizationName: organizationName(),
      organizationSlug: options.slug,
      organizationId: tracker.organization?.id ?? null,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      delegates: tracker.delegateSummary,
      proposals: tracker.proposalSummary,
      votes: tracker.votes,
      coverage: tracker.organization ? coverageSummary(tracker.organization, tracker) : null,
      client: deps.client.stats(),
    };
  };

  const emergencyContext = (): ExportContext => ({
    slug: options.slug,
    organizationName: organizationName(),
    timestamp: now(),
  });

  const interrupted = (stage: string): ExtractionResult => {
    console.log(`[Voting Matrix] Interrupted during ${stage}. Checkpoints are current; rerun to resume`);
    return {
      status: "interrupted",
      organization: tracker.organization,
      matrix: null,
      files: null,
      report: buildReport(),
    };
  };

  const requireComplete = (entity: IncompleteEntity, status: PaginationStatus, detail: string) => {
    if (status === "exhausted") return;
    if (!allowPartial) {
      throw new ExtractionIncompleteError(entity, status, detail);
    }
    console.warn(`[Voting Matrix] Continuing with partial ${entity}: ${detail}`);
  };

  try {
    await deps.store.load();

    // 1. Organization
    const organization = await resolveOrganization(
      deps.client,
      options.slug,
      options.alternativeSlugs ?? [],
      options.probeConcurrency
    );
    tracker.organization = organization;

    // 2. Delegates
    const delegates = await fetchAllDelegates(ctx, organization);
    tracker.delegates = delegates.delegates;
    tracker.delegateSummary = {
      status: delegates.status,
      count: delegates.delegates.length,
      fromCache: delegates.fromCache,
      error: delegates.lastError?.message ?? null,
    };
    if (delegates.status === "interrupted") return interrupted("delegate fetch");
    requireComplete(
      "delegates",
      delegates.status,
      `${delegates.delegates.length} fetched, resume cursor ${delegates.cursor ?? "none"}`
    );

    // 3. Proposals
    const proposals = await fetchAllProposals(ctx, organization);
    tracker.proposals = proposals.proposals;
    tracker.proposalSummary = {
      status: proposals.status,
      count: proposals.proposals.length,
      fromCache: proposals.fromCache,
      error: proposals.lastError?.message ?? null,
    };
    if (proposals.status === "interrupted") {
      await emergencyExport(deps, emergencyContext(), tracker, "proposals");
      return interrupted("proposal fetch");
    }
    requireComplete("proposals", proposals.status, `${proposals.proposals.length} fetched`);

    // 4. Votes, one proposal at a time
    const votesByProposal = await fetchAllVotes(ctx, proposals.proposals, tracker);
    if (votesByProposal === null) return interrupted("vote fetch");

    const failedProposals = tracker.votes.filter((v) => v.status === "failed");
    requireComplete(
      "votes",
      failedProposals.length > 0 ? "failed" : "exhausted",
      `${failedProposals.length} proposals incomplete`
    );

    // 5. Matrix
    const matrix = buildVotingMatrix({
      organizationName: organizationName(),
      proposals: proposals.proposals,
      delegates: delegates.delegates,
      votesByProposal,
    });
    tracker.records = matrix.records;
    logStatistics(matrix);

    const partial =
      delegates.status !== "exhausted" ||
      proposals.status !== "exhausted" ||
      failedProposals.length > 0;

    // 6. Export
    const report = buildReport();
    const files = await deps.exporter.exportResults(
      matrix,
      { slug: options.slug, organizationName: organizationName(), timestamp: startedAt, report },
      { delegates: delegates.delegates, proposals: proposals.proposals }
    );

    if (!partial && (options.cleanupCheckpoints ?? true)) {
      await deps.store.clear();
    }

    console.log(
      `[Voting Matrix] ${partial ? "Partial" : "Complete"} in ${formatDuration(report.durationMs)}; ` +
        `${report.client.totalRequests} requests, ${report.client.successRate}% success`
    );

    return {
      status: partial ? "partial" : "completed",
      organization,
      matrix,
      files,
      report,
    };
  } catch (error) {
    if (error instanceof ExtractionIncompleteError) {
      // Delegates and votes are checkpointed per page; a partial proposal
      // set is not, since it would pass as a complete cache
      if (error.entity === "proposals") {
        await emergencyExport(deps, emergencyContext(), tracker, "proposals");
      }
    } else {
      console.error(`[Voting Matrix] Extraction failed: ${errorMessage(error)}`);
      await emergencyExport(deps, emergencyContext(), tracker, "all");
    }
    throw error;
  }
}

async function fetchAllVotes(
  ctx: IngestionContext,
  proposals: readonly Proposal[],
  tracker: RunTracker
): Promise<Map<string, Vote[]> | null> {
  const votesByProposal = new Map<string, Vote[]>();

  for (const [index, proposal] of proposals.entries()) {
    if (ctx.signal?.aborted) return null;

    console.log(
      `[Voting Matrix] Proposal ${index + 1}/${proposals.length}: ` +
        `${(proposal.title ?? proposal.id).slice(0, 60)}`
    );
    const result = await fetchVotesForProposal(ctx, proposal);
    tracker.votes.push({
      proposalId: proposal.id,
      status: result.status,
      votesFetched: result.votes.length,
      expectedVoters: result.expectedVoters,
      fromCache: result.fromCache,
      resumed: result.resumed,
      error: result.lastError?.message ?? null,
    });

    if (result.status === "interrupted") return null;
    votesByProposal.set(proposal.id, result.votes);

    if (!result.fromCache) {
      const stats = ctx.client.stats();
      console.log(
        `[Voting Matrix] ${stats.totalRequests} requests, ${stats.successRate}% success, ` +
          `delay ${stats.currentDelayMs}ms`
      );
    }
  }

  return votesByProposal;
}

function sumKnown(values: ReadonlyArray<number | null>): number | null {
  const known = values.filter((value): value is number => value !== null);
  return known.length > 0 ? known.reduce((sum, value) => sum + value, 0) : null;
}

function coverageSummary(organization: Organization, tracker: RunTracker): CoverageSummary {
  return {
    delegates: { declared: organization.delegatesCount, fetched: tracker.delegates.length },
    proposals: { declared: organization.proposalsCount, fetched: tracker.proposals.length },
    votes: {
      declared: sumKnown(tracker.votes.map((v) => v.expectedVoters)),
      fetched: tracker.votes.reduce((sum, v) => sum + v.votesFetched, 0),
    },
  };
}

async function emergencyExport(
  deps: ExtractionDependencies,
  context: ExportContext,
  tracker: RunTracker,
  scope: "all" | "proposals"
): Promise<void> {
  try {
    if (scope === "all") {
      await deps.exporter.exportEmergency(context, "delegates", tracker.delegates, DELEGATE_COLUMNS);
    }
    await deps.exporter.exportEmergency(context, "proposals", tracker.proposals, PROPOSAL_COLUMNS);
    if (scope === "all") {
      await deps.exporter.exportEmergency(context, "matrix", tracker.records, MATRIX_COLUMNS);
    }
  } catch (exportError) {
    console.error(`[Voting Matrix] Emergency export failed: ${errorMessage(exportError)}`);
  }
}

function logStatistics(matrix: VotingMatrix): void {
  const s = matrix.statistics;
  console.log(
    `[Voting Matrix] ${s.totalRecords} records: ${s.uniqueDelegates} delegates × ${s.uniqueProposals} proposals, ` +
      `${s.totalDelegateVotes} delegate votes, ${s.proposalsWithVotes} proposals with votes, ` +
      `${s.overallParticipationRate}% participation`
  );
}
