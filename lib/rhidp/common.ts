/**
 * RHIDP Common
 *
 * Label keys and helpers shared by the Red Hat IDP integrations.
 */

import { discoverClustersByLabels, type ClusterDetails } from "../ocm/clusters.js";
import type { OCMApi } from "../ocm/base-client.js";
import { subscriptionLabelFilter } from "../ocm/labels.js";
import type { SecretRef } from "../secret-reader.js";

export const RHIDP_NAMESPACE_LABEL_KEY = "sre-capabilities.rhidp";
export const STATUS_LABEL_KEY = `${RHIDP_NAMESPACE_LABEL_KEY}.status`;
export const AUTH_NAME_LABEL_KEY = `${RHIDP_NAMESPACE_LABEL_KEY}.name`;
export const ISSUER_LABEL_KEY = `${RHIDP_NAMESPACE_LABEL_KEY}.issuer`;

export const StatusValue = {
  ENABLED: "enabled",
  DISABLED: "disabled",
} as const;

export type StatusValue = (typeof StatusValue)[keyof typeof StatusValue];

/**
 * Clusters whose RHIDP status label has `status`, grouped by organization.
 * With `orgIds`, clusters of other organizations are dropped.
 */
export async function discoverClusters(
  ocmApi: OCMApi,
  orgIds?: ReadonlySet<string> | null,
  status: StatusValue = StatusValue.ENABLED
): Promise<Map<string, ClusterDetails[]>> {
  const clusters = await discoverClustersByLabels(
    ocmApi,
    subscriptionLabelFilter().eq("key", STATUS_LABEL_KEY).eq("value", status)
  );
  const byOrg = new Map<string, ClusterDetails[]>();
  for (const cluster of clusters) {
    if (orgIds && !orgIds.has(cluster.organizationId)) {
      continue;
    }
    byOrg.set(cluster.organizationId, [...(byOrg.get(cluster.organizationId) ?? []), cluster]);
  }
  return byOrg;
}

export interface ClusterSecretIdentity {
  orgId: string;
  clusterName: string;
  authName: string;
}

export function clusterVaultSecretId({ orgId, clusterName, authName }: ClusterSecretIdentity): string {
  return `${clusterName}-${orgId}-${authName}`;
}

export interface ClusterVaultSecretOptions extends Partial<ClusterSecretIdentity> {
  vaultInputPath: string;
  /** Takes precedence over the cluster identity */
  vaultSecretId?: string | null;
}

/**
 * Location of a cluster's IDP client secret under `vaultInputPath`.
 *
 * @throws Error when neither a secret id nor the full cluster identity is given
 */
export function clusterVaultSecret(options: ClusterVaultSecretOptions): SecretRef {
  let secretId = options.vaultSecretId;
  if (!secretId) {
    const { orgId, clusterName, authName } = options;
    if (!orgId || !clusterName || !authName) {
      throw new Error("a vaultSecretId or the full cluster identity is required");
    }
    secretId = clusterVaultSecretId({ orgId, clusterName, authName });
  }
  return { path: `${options.vaultInputPath}/${secretId}`, field: "" };
}
