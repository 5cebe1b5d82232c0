/**
 * OCM Organizations
 *
 * Existence lookup for organizations in the accounts management API.
 */

import { Filter } from "./search-filters.js";
import type { OCMApi } from "./base-client.js";
import { OrganizationSchema, type OCMOrganizationInfo } from "./types.js";

export const ORGANIZATIONS_API_PATH = "/api/accounts_mgmt/v1/organizations";

/**
 * The organizations among `orgIds` that exist in OCM, keyed by id.
 * Ids are searched in chunks of `chunkSize`; unknown ids are absent.
 */
export async function getOrganizations(
  ocmApi: OCMApi,
  orgIds: Iterable<string>,
  chunkSize = 100
): Promise<Map<string, OCMOrganizationInfo>> {
  const ids = new Set(orgIds);
  const found = new Map<string, OCMOrganizationInfo>();
  if (ids.size === 0) {
    return found;
  }
  for (const chunk of new Filter().isIn("id", ids).chunkBy("id", chunkSize)) {
    for await (const item of ocmApi.getPaginated(ORGANIZATIONS_API_PATH, { search: chunk.render() })) {
      const organization = OrganizationSchema.parse(item);
      if (ids.has(organization.id)) {
        found.set(organization.id, organization);
      }
    }
  }
  return found;
}
