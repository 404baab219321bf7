import type { Delegate, Proposal, Vote } from "../src/types/governance.types";
import type {
  GraphQLHttpResponse,
  GraphQLRequestBody,
  GraphQLTransport,
} from "../src/services/tally";
import type { ClientStats } from "../src/services/tally-graphql";
import type {
  ExtractionResult,
  ExtractionStatus,
} from "../src/services/ingestion/voting-matrix.service";

export function makeDelegate(address: string, overrides: Partial<Delegate> = {}): Delegate {
  return {
    address: address.toLowerCase(),
    displayAddress: address,
    name: null,
    ens: null,
    bio: null,
    votingPower: 0,
    delegatorsCount: 0,
    statement: null,
    statementSummary: null,
    isSeekingDelegation: false,
    ...overrides,
  };
}

export function makeProposal(id: string, overrides: Partial<Proposal> = {}): Proposal {
  return {
    id,
    onchainId: null,
    status: "executed",
    title: `Title ${id}`,
    description: null,
    proposerAddress: null,
    start: null,
    end: null,
    quorum: null,
    voteStats: [],
    ...overrides,
  };
}

export function makeVote(
  id: string,
  proposalId: string,
  voter: string,
  overrides: Partial<Vote> = {}
): Vote {
  return {
    id,
    proposalId,
    voterAddress: voter.toLowerCase(),
    voterName: null,
    type: "for",
    amount: "1",
    reason: "",
    block: null,
    txHash: null,
    ...overrides,
  };
}

// Raw service nodes

export const delegateNode = (address: string, votesCount = "0") => ({
  id: `delegate-${address}`,
  account: { address, name: null, ens: null },
  votesCount,
  delegatorsCount: 1,
  statement: null,
});

export const proposalNode = (id: string, votersCount?: number) => ({
  id,
  onchainId: `onchain-${id}`,
  status: "EXECUTED",
  metadata: { title: `Proposal ${id}`, description: null },
  proposer: null,
  start: { timestamp: "2024-01-01T00:00:00Z", number: 100 },
  end: { timestamp: "2024-01-08T00:00:00Z", number: 200 },
  voteStats: votersCount === undefined ? [] : [{ type: "for", votesCount: "1", votersCount, percent: 100 }],
  quorum: null,
});

export const voteNode = (id: string, voter: string, type = "for") => ({
  id,
  type,
  amount: "10",
  reason: null,
  voter: { address: voter, name: null, ens: null },
  block: { timestamp: "2024-01-02T00:00:00Z", number: 150 },
  txHash: `0xtx-${id}`,
});

/**
 * Clock whose sleep advances time instantly.
 */
export function createVirtualClock(start = 0) {
  let current = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => current,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += Math.max(0, ms);
    },
  };
}

export type TransportStep =
  | { status: number; body: unknown }
  | { error: Error };

/**
 * Transport that replays a fixed script of responses and records when each
 * request was dispatched.
 */
export function createScriptedTransport(steps: TransportStep[], now: () => number = () => 0) {
  const requests: Array<{ body: GraphQLRequestBody; at: number }> = [];
  const transport: GraphQLTransport = async (body) => {
    requests.push({ body, at: now() });
    const step = steps.shift();
    if (!step) throw new Error("transport script exhausted");
    if ("error" in step) throw step.error;
    const response: GraphQLHttpResponse = { status: step.status, body: step.body };
    return response;
  };
  return { transport, requests };
}

export interface FakeTallyData {
  organizations: Record<string, unknown>;
  delegates: unknown[];
  proposals: unknown[];
  votes: Record<string, unknown[]>;
}

const stringField = (value: unknown, key: string): string | undefined => {
  if (typeof value !== "object" || value === null) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" ? field : undefined;
};

const numberField = (value: unknown, key: string): number | undefined => {
  if (typeof value !== "object" || value === null) return undefined;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "number" ? field : undefined;
};

function connection(nodes: readonly unknown[], input: unknown) {
  const page: unknown = typeof input === "object" && input !== null ? Reflect.get(input, "page") : undefined;
  const afterCursor = stringField(page, "afterCursor");
  const limit = numberField(page, "limit") ?? 20;
  const start = afterCursor ? Number(afterCursor.replace("c:", "")) : 0;
  const slice = nodes.slice(start, start + limit);
  return {
    nodes: slice,
    pageInfo: {
      firstCursor: null,
      lastCursor: slice.length > 0 ? `c:${start + slice.length}` : null,
      count: slice.length,
    },
  };
}

/**
 * In-process stand-in for the Tally API. Cursors are `c:<offset>`; the page
 * after the last one comes back empty with a null cursor.
 */
export function createFakeTallyTransport(data: FakeTallyData) {
  const operations: string[] = [];
  const transport: GraphQLTransport = async ({ query, variables }) => {
    const input = variables.input;
    if (query.includes("query GetOrganization(")) {
      operations.push("organization");
      const slug = stringField(input, "slug") ?? "";
      const organization = data.organizations[slug] ?? null;
      return { status: 200, body: { data: { organization } } };
    }
    if (query.includes("query GetDelegates(")) {
      operations.push("delegates");
      return { status: 200, body: { data: { delegates: connection(data.delegates, input) } } };
    }
    if (query.includes("query GetProposals(")) {
      operations.push("proposals");
      return { status: 200, body: { data: { proposals: connection(data.proposals, input) } } };
    }
    if (query.includes("query GetVotes(")) {
      operations.push("votes");
      const filters: unknown = typeof input === "object" && input !== null ? Reflect.get(input, "filters") : undefined;
      const proposalId = stringField(filters, "proposalId") ?? "";
      const votes = data.votes[proposalId] ?? [];
      return { status: 200, body: { data: { votes: connection(votes, input) } } };
    }
    return { status: 400, body: { errors: [{ message: "unknown operation" }] } };
  };
  return { transport, operations };
}

export const CLIENT_STATS: ClientStats = {
  totalRequests: 4,
  totalAttempts: 5,
  successfulRequests: 4,
  failedRequests: 0,
  failedAttempts: 1,
  rateLimitedRequests: 1,
  successRate: 100,
  currentDelayMs: 600,
  efficiency: 0.8,
};

export function makeExtractionResult(
  status: ExtractionStatus = "completed",
  overrides: Partial<ExtractionResult> = {}
): ExtractionResult {
  return {
    status,
    organization: null,
    matrix: null,
    files: null,
    report: {
      organizationName: "Test DAO",
      organizationSlug: "test",
      organizationId: "org-1",
      startedAt: "2024-06-01T00:00:00.000Z",
      finishedAt: "2024-06-01T00:01:00.000Z",
      durationMs: 60000,
      delegates: null,
      proposals: null,
      votes: [],
      coverage: null,
      client: CLIENT_STATS,
    },
    ...overrides,
  };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
