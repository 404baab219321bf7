import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { CheckpointStore } from "../src/services/ingestion/checkpoint-store";
import { DEFAULT_INGESTION_SETTINGS, type IngestionContext } from "../src/services/ingestion/context";
import { fetchAllDelegates } from "../src/services/ingestion/delegate.service";
import { fetchAllProposals } from "../src/services/ingestion/proposal.service";
import { fetchVotesForProposal } from "../src/services/ingestion/vote.service";
import { mapDelegateNode, mapProposalNode, mapVoteNode } from "../src/libs/tallyMapper";
import { RateLimitedClient } from "../src/services/tally-graphql";
import type { GraphQLTransport } from "../src/services/tally";
import type { Organization } from "../src/types/governance.types";
import {
  createFakeTallyTransport,
  createVirtualClock,
  delegateNode,
  makeProposal,
  proposalNode,
  voteNode,
  type FakeTallyData,
} from "./helpers";

const organization: Organization = {
  id: "org-1",
  slug: "test",
  name: "Test DAO",
  chainIds: [],
  governorIds: ["gov-1"],
  proposalsCount: null,
  delegatesCount: null,
  delegatesVotesCount: null,
  tokenOwnersCount: null,
  hasActiveProposals: false,
};

const DELEGATES = [delegateNode("0xD1"), delegateNode("0xD2"), delegateNode("0xD3")];
const PROPOSALS = [proposalNode("p3"), proposalNode("p2"), proposalNode("p1")];
const VOTES = [voteNode("v1", "0xD1"), voteNode("v2", "0xD2", "against"), voteNode("v3", "0xD3")];

const proposalWithVoters = (id: string, votersCount: number) =>
  makeProposal(id, { voteStats: [{ type: "for", votesCount: "30", votersCount, percent: 100 }] });

let directory: string;

beforeEach(async () => {
  directory = await fs.mkdtemp(path.join(os.tmpdir(), "ingestion-test-"));
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(async () => {
  await fs.rm(directory, { recursive: true, force: true });
});

async function setup(data: Partial<FakeTallyData>, wrap?: (transport: GraphQLTransport) => GraphQLTransport) {
  const fake = createFakeTallyTransport({
    organizations: {},
    delegates: [],
    proposals: [],
    votes: {},
    ...data,
  });
  const clock = createVirtualClock();
  const client = new RateLimitedClient({
    transport: wrap ? wrap(fake.transport) : fake.transport,
    sleep: clock.sleep,
    now: clock.now,
  });
  const store = new CheckpointStore({ directory, slug: "test" });
  await store.load();
  const ctx: IngestionContext = {
    client,
    store,
    settings: { ...DEFAULT_INGESTION_SETTINGS, delegatePageSize: 2, proposalPageSize: 2, votePageSize: 2 },
    sleep: clock.sleep,
  };
  return { ctx, store, operations: fake.operations };
}

const count = (operations: string[], name: string) => operations.filter((op) => op === name).length;

describe("fetchAllDelegates", () => {
  it("pages through every delegate and marks the collection complete", async () => {
    const { ctx, store, operations } = await setup({ delegates: DELEGATES });

    const result = await fetchAllDelegates(ctx, organization);

    expect(result.status).toBe("exhausted");
    expect(result.delegates.map((d) => d.address)).toEqual(["0xd1", "0xd2", "0xd3"]);
    expect(result.pages).toBe(3);
    expect(result.fromCache).toBe(false);
    expect(count(operations, "delegates")).toBe(3);
    expect(store.state().lastDelegateCursor).toBeNull();
    expect(store.state().delegates).toHaveLength(3);
  });

  it("returns a complete checkpoint without fetching", async () => {
    const { ctx, operations } = await setup({ delegates: DELEGATES });
    await fetchAllDelegates(ctx, organization);

    const again = await fetchAllDelegates(ctx, organization);

    expect(again.fromCache).toBe(true);
    expect(again.delegates).toHaveLength(3);
    expect(count(operations, "delegates")).toBe(3);
  });

  it("resumes from the saved cursor", async () => {
    const { ctx, store, operations } = await setup({ delegates: DELEGATES });
    const first = mapDelegateNode(DELEGATES[0]);
    await store.save({ delegates: first ? [first] : [], lastDelegateCursor: "c:1" });

    const result = await fetchAllDelegates(ctx, organization);

    expect(result.delegates.map((d) => d.address)).toEqual(["0xd1", "0xd2", "0xd3"]);
    expect(count(operations, "delegates")).toBe(2);
  });

  it("counts nodes dropped by the mapper", async () => {
    const { ctx } = await setup({ delegates: [delegateNode("0xD1"), { id: "broken" }] });

    const result = await fetchAllDelegates(ctx, organization);

    expect(result.delegates).toHaveLength(1);
    expect(result.droppedNodes).toBe(1);
  });
});

describe("fetchAllProposals", () => {
  it("fetches every proposal and saves them once complete", async () => {
    const { ctx, store } = await setup({ proposals: PROPOSALS });

    const result = await fetchAllProposals(ctx, organization);

    expect(result.status).toBe("exhausted");
    expect(result.proposals.map((p) => p.id)).toEqual(["p3", "p2", "p1"]);
    expect(store.state().proposals).toHaveLength(3);
  });

  it("reuses cached proposals that reach the declared count", async () => {
    const { ctx, operations } = await setup({ proposals: PROPOSALS });
    await fetchAllProposals(ctx, organization);

    const again = await fetchAllProposals(ctx, { ...organization, proposalsCount: 3 });

    expect(again.fromCache).toBe(true);
    expect(count(operations, "proposals")).toBe(3);
  });

  it("refetches when the cache is short of the declared count", async () => {
    const { ctx, store, operations } = await setup({ proposals: PROPOSALS });
    const cached = mapProposalNode(PROPOSALS[0]);
    await store.save({ proposals: cached ? [cached] : [] });

    const result = await fetchAllProposals(ctx, { ...organization, proposalsCount: 3 });

    expect(result.fromCache).toBe(false);
    expect(result.proposals).toHaveLength(3);
    expect(count(operations, "proposals")).toBe(3);
  });

  it("fails after repeated errors without touching the checkpoint", async () => {
    const { ctx, store } = await setup({}, () => async () => ({ status: 400, body: "bad request" }));

    const result = await fetchAllProposals(ctx, organization);

    expect(result.status).toBe("failed");
    expect(result.lastError?.kind).toBe("permanent_http_error");
    expect(store.state().proposals).toEqual([]);
  });
});

describe("fetchVotesForProposal", () => {
  it("fetches all votes, caches them and clears the cursor", async () => {
    const { ctx, store } = await setup({ votes: { p1: VOTES } });

    const result = await fetchVotesForProposal(ctx, proposalWithVoters("p1", 3));

    expect(result.status).toBe("exhausted");
    expect(result.votes.map((v) => v.id)).toEqual(["v1", "v2", "v3"]);
    expect(result.expectedVoters).toBe(3);
    expect(result.resumed).toBe(false);
    expect(store.getCachedVotes("p1")).toHaveLength(3);
    expect(await store.loadVoteCursor("p1")).toBeNull();
  });

  it("serves a completed proposal from the cache", async () => {
    const { ctx, operations } = await setup({ votes: { p1: VOTES } });
    await fetchVotesForProposal(ctx, proposalWithVoters("p1", 3));

    const again = await fetchVotesForProposal(ctx, proposalWithVoters("p1", 3));

    expect(again.fromCache).toBe(true);
    expect(again.votes).toHaveLength(3);
    expect(count(operations, "votes")).toBe(3);
  });

  it("refetches cached votes when forced", async () => {
    const { ctx, operations } = await setup({ votes: { p1: VOTES } });
    await fetchVotesForProposal(ctx, proposalWithVoters("p1", 3));

    const again = await fetchVotesForProposal(ctx, proposalWithVoters("p1", 3), { forceRefresh: true });

    expect(again.fromCache).toBe(false);
    expect(count(operations, "votes")).toBe(6);
  });

  it("resumes with the partial votes saved beside the cursor", async () => {
    const { ctx, store, operations } = await setup({ votes: { p1: VOTES } });
    const partial = mapVoteNode(VOTES[0], "p1");
    await store.saveVoteCursor("p1", "c:1", partial ? [partial] : []);

    const result = await fetchVotesForProposal(ctx, proposalWithVoters("p1", 3));

    expect(result.resumed).toBe(true);
    expect(result.votes.map((v) => v.id)).toEqual(["v1", "v2", "v3"]);
    expect(count(operations, "votes")).toBe(2);
  });

  it("caches an empty vote set as complete", async () => {
    const { ctx, store, operations } = await setup({});

    const result = await fetchVotesForProposal(ctx, makeProposal("p9"));
    const again = await fetchVotesForProposal(ctx, makeProposal("p9"));

    expect(result.status).toBe("exhausted");
    expect(result.votes).toEqual([]);
    expect(store.getCachedVotes("p9")).toEqual([]);
    expect(again.fromCache).toBe(true);
    expect(count(operations, "votes")).toBe(1);
  });

  it("keeps the cursor and partial votes when interrupted", async () => {
    const controller = new AbortController();
    const { ctx, store } = await setup({ votes: { p1: VOTES } }, (transport) => async (body) => {
      const response = await transport(body);
      controller.abort();
      return response;
    });

    const result = await fetchVotesForProposal(
      { ...ctx, signal: controller.signal },
      proposalWithVoters("p1", 3)
    );

    expect(result.status).toBe("interrupted");
    expect(result.cursor).toBe("c:2");
    expect(store.getCachedVotes("p1")).toBeNull();
    expect((await store.loadVoteProgress("p1"))?.votes.map((v) => v.id)).toEqual(["v1", "v2"]);
  });

  describe("partial vote snapshots", () => {
    const FIVE_VOTES = ["v1", "v2", "v3", "v4", "v5"].map((id, i) => voteNode(id, `0xD${i + 1}`));

    it("saves progress every few pages instead of every page", async () => {
      const { ctx, store } = await setup({ votes: { p1: FIVE_VOTES } });
      const saves = vi.spyOn(store, "saveVoteCursor");

      const result = await fetchVotesForProposal(
        { ...ctx, settings: { ...ctx.settings, votePageSize: 1 } },
        proposalWithVoters("p1", 5),
        { progressSavePages: 2 }
      );

      expect(result.status).toBe("exhausted");
      expect(saves.mock.calls.map((call) => [call[1], call[2]?.length])).toEqual([
        ["c:2", 2],
        ["c:4", 4],
        [null, undefined],
      ]);
    });

    it("saves progress once a minute has passed", async () => {
      vi.useFakeTimers({ toFake: ["Date"] });
      try {
        const { ctx, store } = await setup({ votes: { p1: VOTES } }, (transport) => async (body) => {
          const response = await transport(body);
          vi.setSystemTime(Date.now() + 61000);
          return response;
        });
        const saves = vi.spyOn(store, "saveVoteCursor");

        await fetchVotesForProposal(ctx, proposalWithVoters("p1", 3));

        expect(saves.mock.calls.map((call) => [call[1], call[2]?.length])).toEqual([
          ["c:2", 2],
          ["c:3", 3],
          [null, undefined],
        ]);
      } finally {
        vi.useRealTimers();
      }
    });

    it("writes unsaved pages when the fetch fails", async () => {
      let voteRequests = 0;
      const { ctx, store } = await setup({ votes: { p1: VOTES } }, (transport) => async (body) => {
        if (body.query.includes("query GetVotes(") && ++voteRequests > 1) {
          return { status: 400, body: "bad request" };
        }
        return transport(body);
      });
      const saves = vi.spyOn(store, "saveVoteCursor");

      const result = await fetchVotesForProposal(ctx, proposalWithVoters("p1", 3));

      expect(result.status).toBe("failed");
      expect(saves).toHaveBeenCalledTimes(1);
      const progress = await store.loadVoteProgress("p1");
      expect(progress?.afterCursor).toBe("c:2");
      expect(progress?.votes.map((v) => v.id)).toEqual(["v1", "v2"]);
    });

    it("resumes from an older snapshot without duplicating votes", async () => {
      const { ctx, store } = await setup({ votes: { p1: VOTES } });
      const stale = [mapVoteNode(VOTES[0], "p1"), mapVoteNode(VOTES[1], "p1")];
      // Snapshot taken at c:1 although v2 was already collected
      await store.saveVoteCursor("p1", "c:1", stale);

      const result = await fetchVotesForProposal(ctx, proposalWithVoters("p1", 3));

      expect(result.status).toBe("exhausted");
      expect(result.votes.map((v) => v.id)).toEqual(["v1", "v2", "v3"]);
    });
  });
});
