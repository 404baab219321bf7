/**
 * Builds one extraction run from configuration: a fresh rate-limited client,
 * the organization's checkpoint store and the file exporter.
 */

import { ConfigError, requireApiKey, type ExtractionConfig } from "../config";
import { FileMatrixExporter } from "./export/matrix-exporter";
import { CheckpointStore } from "./ingestion/checkpoint-store";
import {
  runVotingMatrixExtraction,
  type ExtractionResult,
} from "./ingestion/voting-matrix.service";
import { createAxiosTransport, createTallyHttpClient } from "./tally";
import { RateLimitedClient } from "./tally-graphql";

export interface ExtractionRunOverrides {
  slug?: string;
  organizationName?: string;
  alternativeSlugs?: string[];
  forceRefreshVotes?: boolean;
  allowPartialResults?: boolean;
}

export interface ExtractionRun {
  slug: string;
  client: RateLimitedClient;
  store: CheckpointStore;
  execute: (signal?: AbortSignal) => Promise<ExtractionResult>;
}

export function createExtractionRun(
  config: ExtractionConfig,
  overrides: ExtractionRunOverrides = {}
): ExtractionRun {
  const slug = overrides.slug ?? config.organization.slug;
  if (!slug) {
    throw new ConfigError(["DAO_SLUG: an organization slug is required"]);
  }
  const apiKey = requireApiKey(config);

  // Configured aliases belong to the configured slug
  const usesConfiguredSlug = slug === config.organization.slug;
  const alternativeSlugs =
    overrides.alternativeSlugs ?? (usesConfiguredSlug ? config.organization.alternativeSlugs : []);
  const organizationName =
    overrides.organizationName ?? (usesConfiguredSlug ? config.organization.name : null) ?? undefined;

  const http = createTallyHttpClient({
    apiKey,
    baseURL: config.tally.apiUrl,
    timeout: config.tally.timeoutMs,
  });
  const client = new RateLimitedClient({
    transport: createAxiosTransport(http),
    rateLimit: config.tally.rateLimit,
    retry: config.tally.retry,
  });
  const store = new CheckpointStore({ directory: config.checkpointDir, slug });
  const exporter = new FileMatrixExporter(config.exportDir);

  const execute = (signal?: AbortSignal) =>
    runVotingMatrixExtraction(
      { client, store, exporter },
      {
        slug,
        organizationName,
        alternativeSlugs,
        settings: {
          ...config.ingestion,
          forceRefreshVotes: overrides.forceRefreshVotes ?? config.ingestion.forceRefreshVotes,
        },
        allowPartialResults: overrides.allowPartialResults ?? config.allowPartialResults,
        cleanupCheckpoints: config.cleanupCheckpoints,
        probeConcurrency: config.probeConcurrency,
        signal,
      }
    );

  return { slug, client, store, execute };
}
