/**
 * Environment configuration
 *
 * Parsed once from `process.env` (after dotenv has run) into typed settings.
 */

import cron from "node-cron";
import { z } from "zod";
import { DEFAULT_TALLY_API_URL } from "./services/tally";
import type { RateLimitOptions } from "./services/tally-graphql";
import type { IngestionSettings } from "./services/ingestion/context";
import { MAX_PROBE_CONCURRENCY } from "./services/ingestion/parallel";
import type { RetryOptions } from "./services/ingestion/utils";

export class ConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const integer = (fallback: number, min = 1, max?: number) => {
  const base = z.coerce.number().int().min(min);
  return z
    .preprocess(blankToUndefined, (max === undefined ? base : base.max(max)).optional())
    .transform((value) => value ?? fallback);
};

const TRUE_VALUES = ["true", "1", "yes"];

const flag = (fallback: boolean) =>
  z
    .preprocess(
      (value) => {
        const cleaned = blankToUndefined(value);
        return typeof cleaned === "string" ? cleaned.trim().toLowerCase() : cleaned;
      },
      z.enum(["true", "false", "1", "0", "yes", "no"]).optional()
    )
    .transform((value) => (value === undefined ? fallback : TRUE_VALUES.includes(value)));

const slugList = z
  .preprocess(blankToUndefined, z.string().optional())
  .transform((value) =>
    (value ?? "")
      .split(",")
      .map((slug) => slug.trim())
      .filter((slug) => slug.length > 0)
  );

const envSchema = z
  .object({
    TALLY_API_KEY: optionalText,
    TALLY_API_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_TALLY_API_URL)),
    TALLY_TIMEOUT_MS: integer(30000),
    TALLY_MIN_DELAY_MS: integer(600, 0),
    TALLY_MAX_DELAY_MS: integer(2000, 0),
    TALLY_MAX_RETRIES: integer(3, 1, 10),
    TALLY_RETRY_BASE_DELAY_MS: integer(2000, 0),
    TALLY_RETRY_MAX_DELAY_MS: integer(5000, 0),
    DAO_SLUG: optionalText,
    DAO_NAME: optionalText,
    DAO_ALTERNATIVE_SLUGS: slugList,
    DELEGATE_PAGE_SIZE: integer(200),
    PROPOSAL_PAGE_SIZE: integer(100),
    VOTE_PAGE_SIZE: integer(5000),
    MIN_CACHED_PROPOSALS: integer(1, 0),
    CHECKPOINT_DIR: z.preprocess(blankToUndefined, z.string().default("./checkpoints")),
    EXPORT_DIR: z.preprocess(blankToUndefined, z.string().default("./exports")),
    FORCE_REFRESH_VOTES: flag(false),
    ALLOW_PARTIAL_RESULTS: flag(false),
    CLEANUP_CHECKPOINTS: flag(true),
    ORG_PROBE_CONCURRENCY: integer(MAX_PROBE_CONCURRENCY, 1, MAX_PROBE_CONCURRENCY),
    ENABLE_CRON_JOBS: flag(true),
    EXTRACTION_SCHEDULE: z.preprocess(
      blankToUndefined,
      z
        .string()
        .default("0 3 * * *")
        .refine((expression) => cron.validate(expression), "not a valid cron expression")
    ),
    PORT: integer(3000, 1, 65535),
  })
  .superRefine((env, ctx) => {
    if (env.TALLY_MAX_DELAY_MS < env.TALLY_MIN_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TALLY_MAX_DELAY_MS"],
        message: "must be at least TALLY_MIN_DELAY_MS",
      });
    }
    if (env.TALLY_RETRY_MAX_DELAY_MS < env.TALLY_RETRY_BASE_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["TALLY_RETRY_MAX_DELAY_MS"],
        message: "must be at least TALLY_RETRY_BASE_DELAY_MS",
      });
    }
  });

export interface ExtractionConfig {
  tally: {
    apiKey: string | null;
    apiUrl: string;
    timeoutMs: number;
    rateLimit: Pick<RateLimitOptions, "floorDelayMs" | "ceilingDelayMs">;
    retry: RetryOptions;
  };
  organization: {
    slug: string | null;
    name: string | null;
    alternativeSlugs: string[];
  };
  ingestion: IngestionSettings;
  checkpointDir: string;
  exportDir: string;
  allowPartialResults: boolean;
  cleanupCheckpoints: boolean;
  probeConcurrency: number;
  enableCronJobs: boolean;
  extractionSchedule: string;
  port: number;
}

/**
 * Reads every setting at once. Throws a ConfigError naming each bad variable.
 */
export function loadExtractionConfig(env: NodeJS.ProcessEnv = process.env): ExtractionConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return {
    tally: {
      apiKey: e.TALLY_API_KEY ?? null,
      apiUrl: e.TALLY_API_URL,
      timeoutMs: e.TALLY_TIMEOUT_MS,
      rateLimit: { floorDelayMs: e.TALLY_MIN_DELAY_MS, ceilingDelayMs: e.TALLY_MAX_DELAY_MS },
      retry: {
        maxRetries: e.TALLY_MAX_RETRIES,
        baseDelay: e.TALLY_RETRY_BASE_DELAY_MS,
        maxDelay: e.TALLY_RETRY_MAX_DELAY_MS,
      },
    },
    organization: {
      slug: e.DAO_SLUG ?? null,
      name: e.DAO_NAME ?? null,
      alternativeSlugs: e.DAO_ALTERNATIVE_SLUGS,
    },
    ingestion: {
      delegatePageSize: e.DELEGATE_PAGE_SIZE,
      proposalPageSize: e.PROPOSAL_PAGE_SIZE,
      votePageSize: e.VOTE_PAGE_SIZE,
      minCachedProposals: e.MIN_CACHED_PROPOSALS,
      forceRefreshVotes: e.FORCE_REFRESH_VOTES,
    },
    checkpointDir: e.CHECKPOINT_DIR,
    exportDir: e.EXPORT_DIR,
    allowPartialResults: e.ALLOW_PARTIAL_RESULTS,
    cleanupCheckpoints: e.CLEANUP_CHECKPOINTS,
    probeConcurrency: e.ORG_PROBE_CONCURRENCY,
    enableCronJobs: e.ENABLE_CRON_JOBS,
    extractionSchedule: e.EXTRACTION_SCHEDULE,
    port: e.PORT,
  };
}

/**
 * The API key is only needed once a run starts.
 */
export function requireApiKey(config: ExtractionConfig): string {
  if (!config.tally.apiKey) {
    throw new ConfigError(["TALLY_API_KEY: required to query the Tally API"]);
  }
  return config.tally.apiKey;
}
