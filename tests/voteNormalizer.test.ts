import { describe, it, expect } from "vitest";
import { isPositiveAmount, normalizeVote, type NormalizableVote } from "../src/libs/voteNormalizer";
import { VOTE_OUTCOMES } from "../src/types/governance.types";

const vote = (overrides: Partial<NormalizableVote> = {}): NormalizableVote => ({
  type: "",
  amount: "0",
  reason: "",
  txHash: null,
  ...overrides,
});

describe("normalizeVote", () => {
  describe("type synonyms", () => {
    it.each([
      ["for", "For"],
      ["FOR", "For"],
      [" yes ", "For"],
      ["in_favor", "For"],
      ["1", "For"],
      ["Against", "Against"],
      ["nay", "Against"],
      ["0", "Against"],
      ["abstain", "Abstain"],
      ["Abstention", "Abstain"],
      ["2", "Abstain"],
    ] as const)("maps %j to %s", (type, expected) => {
      expect(normalizeVote(vote({ type }))).toBe(expected);
    });

    it("takes the type over a positive amount", () => {
      expect(normalizeVote(vote({ type: "against", amount: "500" }))).toBe("Against");
    });

    it("ignores names inherited from Object.prototype", () => {
      expect(normalizeVote(vote({ type: "constructor" }))).toBe("Unknown");
    });
  });

  it("reads a positive amount as For when the type is unrecognised", () => {
    expect(normalizeVote(vote({ type: "weighted", amount: "500" }))).toBe("For");
  });

  describe("reason keywords", () => {
    it("finds support in the reason", () => {
      expect(normalizeVote(vote({ reason: "I Support this change" }))).toBe("For");
    });

    it("finds a rejection", () => {
      expect(normalizeVote(vote({ reason: "No, too risky" }))).toBe("Against");
    });

    it("does not read 'disagree' as agreement", () => {
      expect(normalizeVote(vote({ reason: "I disagree with the budget" }))).toBe("Against");
    });

    it("finds neutrality", () => {
      expect(normalizeVote(vote({ reason: "neutral on this one" }))).toBe("Abstain");
    });

    it("checks affirmative keywords first", () => {
      expect(normalizeVote(vote({ reason: "oppose the old plan, favor the new" }))).toBe("For");
    });

    it("matches whole words only", () => {
      expect(normalizeVote(vote({ reason: "Before the deadline" }))).toBe("Unknown");
    });
  });

  it("reports Voted when only a transaction hash is known", () => {
    expect(normalizeVote(vote({ txHash: "0xtx1" }))).toBe("Voted");
  });

  it("falls back to Unknown", () => {
    expect(normalizeVote(vote())).toBe("Unknown");
  });

  it("always returns one of the fixed outcomes", () => {
    const samples: NormalizableVote[] = [
      vote({ type: "FOR" }),
      vote({ type: "???", amount: "-3" }),
      vote({ amount: "1e3" }),
      vote({ reason: "approved after review" }),
      vote({ reason: "rejecting", txHash: "0xabc" }),
      vote({ type: "  ", reason: "   " }),
    ];
    for (const sample of samples) {
      expect(VOTE_OUTCOMES).toContain(normalizeVote(sample));
    }
  });
});

describe("isPositiveAmount", () => {
  it("compares integer strings without losing precision", () => {
    expect(isPositiveAmount("1000000000000000000000000")).toBe(true);
    expect(isPositiveAmount("0")).toBe(false);
    expect(isPositiveAmount("-5")).toBe(false);
  });

  it("parses decimals", () => {
    expect(isPositiveAmount("0.5")).toBe(true);
    expect(isPositiveAmount("0.0")).toBe(false);
  });

  it("rejects empty and non-numeric input", () => {
    expect(isPositiveAmount("")).toBe(false);
    expect(isPositiveAmount(null)).toBe(false);
    expect(isPositiveAmount("abc")).toBe(false);
  });
});
