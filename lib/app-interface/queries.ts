/**
 * Typed Desired-State Queries
 */

import { z } from "zod";
import { QueryError, type QueryFunction } from "./query-function.js";
import {
  ClusterSchema,
  GithubOrgSchema,
  OCMEnvironmentSchema,
  OCMOrganizationSchema,
  RoleSchema,
  type Cluster,
  type GithubOrg,
  type OCMEnvironment,
  type OCMOrganization,
  type Role,
} from "./schemas.js";

export const CLUSTERS_QUERY = `
query Clusters {
  clusters: clusters_v1 {
    name
    ocm { name orgId environment { name } }
    spec { id }
    disable { integrations }
    ocmSubscriptionLabels
    auth {
      service
      ... on ClusterAuthRHIDP_v1 { name status issuer }
    }
  }
}
`;

export const OCM_ORGANIZATIONS_QUERY = `
query OcmOrganizations {
  ocmOrganizations: ocm_organizations_v1 {
    name
    orgId
    environment { name }
    ocmOrganizationLabels
  }
}
`;

export const OCM_ENVIRONMENTS_QUERY = `
query OcmEnvironments {
  ocmEnvironments: ocm_environments_v1 {
    name
    url
    accessTokenClientId
    accessTokenUrl
    accessTokenClientSecret { path field version }
  }
}
`;

export const ROLES_QUERY = `
query Roles {
  roles: roles_v1 {
    name
    users { githubUsername: github_username }
    bots { githubUsername: github_username }
    permissions {
      service
      ... on PermissionGithubOrg_v1 { org }
      ... on PermissionGithubOrgTeam_v1 { org team }
    }
  }
}
`;

export const GITHUB_ORGS_QUERY = `
query GithubOrgs {
  githubOrgs: githuborg_v1 {
    name
    token { path field version }
  }
}
`;

async function queryList<T extends z.ZodTypeAny>(
  queryFn: QueryFunction,
  query: string,
  field: string,
  itemSchema: T
): Promise<z.infer<T>[]> {
  const envelope = z.record(z.unknown()).safeParse(await queryFn(query));
  if (!envelope.success) {
    throw new QueryError(`desired-state query for ${field} did not return an object`);
  }
  const parsed = z.array(itemSchema).safeParse(envelope.data[field] ?? []);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new QueryError(
      `invalid ${field} in desired state at ${[field, ...issue.path].join(".")}: ${issue.message}`,
      { cause: parsed.error }
    );
  }
  return parsed.data;
}

export function queryClusters(queryFn: QueryFunction): Promise<Cluster[]> {
  return queryList(queryFn, CLUSTERS_QUERY, "clusters", ClusterSchema);
}

export function queryOcmOrganizations(queryFn: QueryFunction): Promise<OCMOrganization[]> {
  return queryList(queryFn, OCM_ORGANIZATIONS_QUERY, "ocmOrganizations", OCMOrganizationSchema);
}

export function queryOcmEnvironments(queryFn: QueryFunction): Promise<OCMEnvironment[]> {
  return queryList(queryFn, OCM_ENVIRONMENTS_QUERY, "ocmEnvironments", OCMEnvironmentSchema);
}

export function queryRoles(queryFn: QueryFunction): Promise<Role[]> {
  return queryList(queryFn, ROLES_QUERY, "roles", RoleSchema);
}

export function queryGithubOrgs(queryFn: QueryFunction): Promise<GithubOrg[]> {
  return queryList(queryFn, GITHUB_ORGS_QUERY, "githubOrgs", GithubOrgSchema);
}

/**
 * Whether `integration` is not listed in the record's `disable.integrations`.
 */
export function integrationIsEnabled(
  integration: string,
  record: { disable?: { integrations?: string[] | null } | null }
): boolean {
  return !(record.disable?.integrations ?? []).includes(integration);
}
