import { describe, it, expect } from "vitest";
import { boundedConcurrency, processInParallel } from "../src/services/ingestion/parallel";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe("processInParallel", () => {
  it("never runs more than the given number of tasks at once", async () => {
    let active = 0;
    let peak = 0;

    const result = await processInParallel(
      [1, 2, 3, 4, 5, 6, 7],
      (n) => String(n),
      async (n) => {
        active++;
        peak = Math.max(peak, active);
        await tick();
        active--;
        return n * 10;
      },
      3
    );

    expect(peak).toBe(3);
    expect([...result.successful].sort((a, b) => a - b)).toEqual([10, 20, 30, 40, 50, 60, 70]);
    expect(result.failed).toEqual([]);
  });

  it("passes each item's input position", async () => {
    const result = await processInParallel(["a", "b", "c"], (s) => s, async (s, index) => `${s}${index}`);
    expect([...result.successful].sort()).toEqual(["a0", "b1", "c2"]);
  });

  it("skips null results and records failures by id", async () => {
    const result = await processInParallel(
      ["keep", "skip", "fail"],
      (s) => s,
      async (s) => {
        if (s === "fail") throw new Error("lookup failed");
        return s === "skip" ? null : s;
      }
    );

    expect(result.successful).toEqual(["keep"]);
    expect(result.failed).toEqual([{ id: "fail", error: "lookup failed" }]);
  });

  it("catches processors that throw synchronously", async () => {
    const result = await processInParallel(
      ["x"],
      (s) => s,
      (): Promise<string> => {
        throw new Error("sync failure");
      }
    );
    expect(result.failed).toEqual([{ id: "x", error: "sync failure" }]);
  });

  it("resolves immediately for an empty list", async () => {
    expect(await processInParallel([], String, async () => 1)).toEqual({ successful: [], failed: [] });
  });
});

describe("boundedConcurrency", () => {
  it("clamps into the probe range", () => {
    expect(boundedConcurrency(5)).toBe(3);
    expect(boundedConcurrency(2.7)).toBe(2);
    expect(boundedConcurrency(0)).toBe(1);
    expect(boundedConcurrency(Number.NaN)).toBe(1);
  });
});
