import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  defaultAlternativeSlugs,
  getOrganizationBySlug,
  OrganizationNotFoundError,
  resolveOrganization,
} from "../src/services/ingestion/organization.service";
import { RateLimitedClient } from "../src/services/tally-graphql";
import { createFakeTallyTransport, createVirtualClock } from "./helpers";

const orgNode = (slug: string, governorIds: string[]) => ({
  id: `org-${slug}`,
  slug,
  name: `${slug} DAO`,
  governorIds,
  proposalsCount: 2,
});

function clientFor(organizations: Record<string, unknown>) {
  const clock = createVirtualClock();
  const fake = createFakeTallyTransport({ organizations, delegates: [], proposals: [], votes: {} });
  const client = new RateLimitedClient({ transport: fake.transport, sleep: clock.sleep, now: clock.now });
  return { client, operations: fake.operations };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

describe("getOrganizationBySlug", () => {
  it("maps a known organization", async () => {
    const { client } = clientFor({ test: orgNode("test", ["gov-1"]) });
    const result = await getOrganizationBySlug(client, "test");
    expect(result.ok && result.data?.id).toBe("org-test");
  });

  it("returns null data for an unknown slug", async () => {
    const { client } = clientFor({});
    expect(await getOrganizationBySlug(client, "missing")).toEqual({ ok: true, data: null });
  });
});

describe("resolveOrganization", () => {
  it("accepts the primary slug without probing aliases", async () => {
    const { client, operations } = clientFor({ test: orgNode("test", []) });

    const organization = await resolveOrganization(client, "test", ["alias"]);

    expect(organization.slug).toBe("test");
    expect(operations).toEqual(["organization"]);
  });

  it("picks the first alias in order that has governors", async () => {
    const { client } = clientFor({
      first: orgNode("first", []),
      second: orgNode("second", ["gov-2"]),
      third: orgNode("third", ["gov-3"]),
    });

    const organization = await resolveOrganization(client, "test", ["first", "second", "third"]);

    expect(organization.slug).toBe("second");
  });

  it("probes the default aliases when none are configured", async () => {
    const { client } = clientFor({ test_dao: orgNode("test_dao", ["gov-1"]) });
    const organization = await resolveOrganization(client, "test");
    expect(organization.slug).toBe("test_dao");
  });

  it("throws with every slug it tried", async () => {
    const { client } = clientFor({});

    const attempt = resolveOrganization(client, "test", ["test", "other", "other"]);

    await expect(attempt).rejects.toBeInstanceOf(OrganizationNotFoundError);
    await expect(attempt).rejects.toMatchObject({ slugs: ["test", "other"] });
  });
});

describe("defaultAlternativeSlugs", () => {
  it("derives dao-suffixed variants", () => {
    expect(defaultAlternativeSlugs("uni")).toEqual(["uni-dao", "unidao", "uni_dao"]);
  });
});
