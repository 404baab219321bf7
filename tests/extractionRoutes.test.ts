import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import os from "os";
import request from "supertest";
import { createApp } from "../src/app";
import { createExtractionRun, type ExtractionRun } from "../src/services/extraction";
import { resetExtractionStatus, waitForActiveExtraction } from "../src/services/extraction-status";
import { CheckpointStore } from "../src/services/ingestion/checkpoint-store";
import type { ExtractionResult } from "../src/services/ingestion/voting-matrix.service";
import { RateLimitedClient } from "../src/services/tally-graphql";
import { deferred, makeExtractionResult } from "./helpers";

vi.mock("../src/services/extraction", () => ({
  createExtractionRun: vi.fn(),
}));

function fakeRun(slug: string, execute: ExtractionRun["execute"]): ExtractionRun {
  return {
    slug,
    client: new RateLimitedClient({ transport: async () => ({ status: 200, body: {} }) }),
    store: new CheckpointStore({ directory: os.tmpdir(), slug }),
    execute,
  };
}

describe("extraction routes", () => {
  beforeEach(() => {
    resetExtractionStatus();
    vi.stubEnv("DAO_SLUG", "test");
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    resetExtractionStatus();
    vi.unstubAllEnvs();
  });

  it("reports no run before the first trigger", async () => {
    const response = await request(createApp()).get("/extraction/status");

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ success: true, running: false, run: null });
  });

  it("starts a run and rejects a second trigger while it is active", async () => {
    const pending = deferred<ExtractionResult>();
    vi.mocked(createExtractionRun).mockImplementation((_config, overrides = {}) =>
      fakeRun(overrides.slug ?? "test", () => pending.promise)
    );
    const app = createApp();

    const first = await request(app).post("/extraction/trigger").send({ slug: "other-dao" });

    expect(first.status).toBe(202);
    expect(first.body.success).toBe(true);
    expect(first.body.message).toBe("Voting matrix extraction started");
    expect(first.body.run).toMatchObject({ slug: "other-dao", trigger: "http", state: "running" });
    expect(vi.mocked(createExtractionRun).mock.calls[0][1]).toEqual({ slug: "other-dao" });

    const second = await request(app).post("/extraction/trigger").send({});
    expect(second.status).toBe(409);
    expect(second.body.error).toBe("Extraction already running");

    const status = await request(app).get("/extraction/status");
    expect(status.body.running).toBe(true);
    expect(status.body.run.client.currentDelayMs).toBe(600);

    pending.resolve(makeExtractionResult("completed"));
    await waitForActiveExtraction();

    const finished = await request(app).get("/extraction/status");
    expect(finished.body.running).toBe(false);
    expect(finished.body.run).toMatchObject({ slug: "other-dao", state: "completed", error: null });
  });

  it("rejects unknown body fields", async () => {
    const response = await request(createApp()).post("/extraction/trigger").send({ slug: "test", extra: 1 });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe("Invalid request body");
    expect(response.body.issues).toHaveLength(1);
    expect(createExtractionRun).not.toHaveBeenCalled();
  });

  it("rejects a body with the wrong types", async () => {
    const response = await request(createApp())
      .post("/extraction/trigger")
      .send({ forceRefreshVotes: "yes" });

    expect(response.status).toBe(400);
    expect(response.body.issues[0]).toMatch(/^forceRefreshVotes: /);
  });

  it("requires a slug from the body or the environment", async () => {
    vi.stubEnv("DAO_SLUG", "");

    const response = await request(createApp()).post("/extraction/trigger").send({});

    expect(response.status).toBe(400);
    expect(response.body.error).toBe("Missing organization slug");
    expect(createExtractionRun).not.toHaveBeenCalled();
  });

  it("returns 500 when the run cannot be built", async () => {
    vi.mocked(createExtractionRun).mockImplementation(() => {
      throw new Error("TALLY_API_KEY: an API key is required to start an extraction");
    });

    const response = await request(createApp()).post("/extraction/trigger").send({});

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      success: false,
      error: "Failed to start extraction",
      message: "TALLY_API_KEY: an API key is required to start an extraction",
    });
  });

  it("answers malformed JSON with a 400", async () => {
    const response = await request(createApp())
      .post("/extraction/trigger")
      .set("Content-Type", "application/json")
      .send('{"slug":');

    expect(response.status).toBe(400);
    expect(response.body.success).toBe(false);
  });
});
