import type { Vote, VoteOutcome } from "../types/governance.types";

export type NormalizableVote = Pick<Vote, "type" | "amount" | "reason" | "txHash">;

const typeSynonyms = new Map<string, VoteOutcome>(
  Object.entries({
    for: "For",
    yes: "For",
    support: "For",
    approve: "For",
    in_favor: "For",
    infavor: "For",
    aye: "For",
    "1": "For",
    true: "For",

    against: "Against",
    no: "Against",
    oppose: "Against",
    nay: "Against",
    "0": "Against",
    false: "Against",

    abstain: "Abstain",
    abstention: "Abstain",
    present: "Abstain",
    "2": "Abstain",
  } satisfies Record<string, VoteOutcome>)
);

// Checked in order; whole words only, so "before" never reads as "for"
const reasonKeywords: Array<[VoteOutcome, RegExp]> = [
  ["For", /\b(?:support\w*|favou?r\w*|yes|approv\w*|agree\w*|for)\b/],
  ["Against", /\b(?:against|oppos\w*|no|disagree\w*|reject\w*)\b/],
  ["Abstain", /\b(?:abstain\w*|neutral|present)\b/],
];

/**
 * True when the string-encoded amount is strictly positive.
 * Integers are compared as bigint; anything else falls back to a float parse.
 */
export const isPositiveAmount = (amount: string | null | undefined): boolean => {
  const text = amount?.trim();
  if (!text) return false;
  if (/^[+-]?\d+$/.test(text)) {
    return BigInt(text) > 0n;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) && parsed > 0;
};

/**
 * Canonicalises a vote into a fixed outcome.
 *
 * Resolution order, first match wins:
 * 1. raw type against the synonym table (case-insensitive)
 * 2. positive amount → For
 * 3. keyword scan of the reason
 * 4. transaction hash present → Voted (participation without stance)
 * 5. Unknown
 */
export function normalizeVote(vote: NormalizableVote): VoteOutcome {
  const type = vote.type.trim().toLowerCase();
  if (type) {
    const mapped = typeSynonyms.get(type);
    if (mapped) return mapped;
  }

  if (isPositiveAmount(vote.amount)) {
    return "For";
  }

  const reason = vote.reason.toLowerCase();
  if (reason) {
    for (const [outcome, pattern] of reasonKeywords) {
      if (pattern.test(reason)) return outcome;
    }
  }

  if (vote.txHash) {
    return "Voted";
  }

  return "Unknown";
}
