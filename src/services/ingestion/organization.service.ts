/**
 * Organization lookup by slug, with alias probing
 */

import { organizationResponseSchema } from "../../schemas/tally.schemas";
import { mapOrganization } from "../../libs/tallyMapper";
import type { Organization } from "../../types/governance.types";
import type { FetchResult, GraphQLClient } from "../tally-graphql";
import { boundedConcurrency, MAX_PROBE_CONCURRENCY, processInParallel } from "./parallel";

const ORGANIZATION_QUERY = `
  query GetOrganization($input: OrganizationInput!) {
    organization(input: $input) {
      id
      slug
      name
      chainIds
      governorIds
      proposalsCount
      delegatesCount
      delegatesVotesCount
      tokenOwnersCount
      hasActiveProposals
    }
  }
`;

export class OrganizationNotFoundError extends Error {
  constructor(readonly slugs: readonly string[]) {
    super(`No organization found for slugs: ${slugs.join(", ")}`);
    this.name = "OrganizationNotFoundError";
  }
}

/**
 * `data` is null when the service knows no organization under this slug.
 */
export async function getOrganizationBySlug(
  client: GraphQLClient,
  slug: string
): Promise<FetchResult<Organization | null>> {
  const result = await client.send(ORGANIZATION_QUERY, { input: { slug } }, organizationResponseSchema);
  if (!result.ok) return result;

  const organization = result.data.organization;
  return { ok: true, data: organization ? mapOrganization(organization) : null };
}

export const defaultAlternativeSlugs = (slug: string): string[] => [
  `${slug}-dao`,
  `${slug}dao`,
  `${slug}_dao`,
];

async function lookup(client: GraphQLClient, slug: string): Promise<Organization | null> {
  console.log(`[Organization] Testing slug '${slug}'...`);
  const result = await getOrganizationBySlug(client, slug);
  if (!result.ok) {
    console.warn(`[Organization] Lookup for '${slug}' failed: ${result.error.message}`);
    return null;
  }
  if (!result.data) {
    console.log(`[Organization] No data for slug '${slug}'`);
  }
  return result.data;
}

/**
 * Tries the primary slug, then probes the aliases with at most three lookups
 * in flight. Among aliases, the first one in the given order whose
 * organization has governors wins.
 */
export async function resolveOrganization(
  client: GraphQLClient,
  slug: string,
  alternativeSlugs: readonly string[] = [],
  concurrency: number = MAX_PROBE_CONCURRENCY
): Promise<Organization> {
  const primary = await lookup(client, slug);
  if (primary) {
    console.log(`[Organization] Found ${primary.name} (id ${primary.id}, ${primary.governorIds.length} governors)`);
    return primary;
  }

  const aliases = (alternativeSlugs.length > 0 ? alternativeSlugs : defaultAlternativeSlugs(slug)).filter(
    (alias, index, list) => alias !== slug && list.indexOf(alias) === index
  );

  const { successful, failed } = await processInParallel(
    aliases,
    (alias) => alias,
    async (alias, index) => {
      const organization = await lookup(client, alias);
      return organization && organization.governorIds.length > 0 ? { index, organization } : null;
    },
    boundedConcurrency(concurrency)
  );

  for (const failure of failed) {
    console.warn(`[Organization] Probe for '${failure.id}' failed: ${failure.error}`);
  }

  const winner = successful.sort((a, b) => a.index - b.index)[0];
  if (!winner) {
    throw new OrganizationNotFoundError([slug, ...aliases]);
  }

  console.log(
    `[Organization] Found ${winner.organization.name} via alias '${aliases[winner.index]}' ` +
      `(id ${winner.organization.id})`
  );
  return winner.organization;
}
