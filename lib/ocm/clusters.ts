/**
 * OCM Cluster Discovery
 *
 * Finds clusters through their subscriptions and joins each cluster with
 * its subscription labels, capabilities and organization labels.
 */

import type { OCMApi } from "./base-client.js";
import {
  LabelContainer,
  buildLabelContainer,
  getLabels,
  getOrganizationLabels,
  isOrganizationLabel,
  isSubscriptionLabel,
} from "./labels.js";
import { Filter, orFilter } from "./search-filters.js";
import { ACTIVE_SUBSCRIPTION_STATES, buildSubscriptionFilter, getSubscriptions } from "./subscriptions.js";
import {
  ClusterSchema,
  PRODUCT_ID_OSD,
  PRODUCT_ID_ROSA,
  type OCMCapability,
  type OCMCluster,
  type OCMLabel,
  type OCMOrganizationLabel,
  type OCMSubscriptionLabel,
} from "./types.js";

export const CLUSTERS_API_PATH = "/api/clusters_mgmt/v1/clusters";

export interface ClusterDetailsInit {
  ocmCluster: OCMCluster;
  organizationId: string;
  subscriptionHref: string;
  capabilities?: ReadonlyMap<string, OCMCapability>;
  subscriptionLabels?: LabelContainer<OCMSubscriptionLabel>;
  organizationLabels?: LabelContainer<OCMOrganizationLabel>;
}

/**
 * Read-only snapshot of a cluster as seen through OCM in one run.
 */
export class ClusterDetails {
  readonly ocmCluster: OCMCluster;
  readonly organizationId: string;
  readonly subscriptionHref: string;
  readonly capabilities: ReadonlyMap<string, OCMCapability>;
  readonly subscriptionLabels: LabelContainer<OCMSubscriptionLabel>;
  readonly organizationLabels: LabelContainer<OCMOrganizationLabel>;

  constructor(init: ClusterDetailsInit) {
    this.ocmCluster = init.ocmCluster;
    this.organizationId = init.organizationId;
    this.subscriptionHref = init.subscriptionHref;
    this.capabilities = init.capabilities ?? new Map();
    this.subscriptionLabels = init.subscriptionLabels ?? new LabelContainer();
    this.organizationLabels = init.organizationLabels ?? new LabelContainer();
  }

  get id(): string {
    return this.ocmCluster.id;
  }

  get name(): string {
    return this.ocmCluster.name;
  }

  get subscriptionId(): string {
    return this.ocmCluster.subscriptionId;
  }

  get labelContainerHref(): string {
    return `${this.subscriptionHref}/labels`;
  }

  /** Organization labels overridden by subscription labels */
  get labels(): LabelContainer {
    return buildLabelContainer<OCMLabel>(this.organizationLabels, this.subscriptionLabels);
  }

  getLabel(name: string): OCMLabel | undefined {
    return this.subscriptionLabels.get(name) ?? this.organizationLabels.get(name);
  }

  isCapabilitySet(name: string, value: string): boolean {
    return this.capabilities.get(name)?.value === value;
  }

  withLabels(
    subscriptionLabels: LabelContainer<OCMSubscriptionLabel>,
    organizationLabels: LabelContainer<OCMOrganizationLabel>
  ): ClusterDetails {
    return new ClusterDetails({
      ocmCluster: this.ocmCluster,
      organizationId: this.organizationId,
      subscriptionHref: this.subscriptionHref,
      capabilities: this.capabilities,
      subscriptionLabels,
      organizationLabels,
    });
  }
}

/**
 * Managed OSD and ROSA clusters in ready state.
 */
export function clusterReadyForAppInterface(): Filter {
  return new Filter()
    .eq("managed", "true")
    .eq("state", "ready")
    .isIn("product.id", [PRODUCT_ID_OSD, PRODUCT_ID_ROSA]);
}

export async function* getOcmClusters(
  ocmApi: OCMApi,
  clusterFilter: Filter
): AsyncGenerator<OCMCluster, void, undefined> {
  const items = ocmApi.getPaginated(CLUSTERS_API_PATH, {
    search: clusterFilter.render(),
    order: "creation_timestamp",
  });
  for await (const item of items) {
    yield ClusterSchema.parse(item);
  }
}

export interface ClusterDetailsQuery {
  subscriptionFilter?: Filter | null;
  clusterFilter?: Filter | null;
  /** Fetch organization labels for the subscriptions' organizations */
  initLabels?: boolean;
  /** Ids per subscription and cluster request */
  chunkSize?: number;
}

export interface DiscoveryOptions {
  chunkSize?: number;
}

/**
 * Clusters of the active, managed subscriptions matching `subscriptionFilter`,
 * narrowed by `clusterFilter`.
 */
export async function getClusterDetailsForSubscriptions(
  ocmApi: OCMApi,
  { subscriptionFilter, clusterFilter, initLabels = true, chunkSize = 100 }: ClusterDetailsQuery = {}
): Promise<ClusterDetails[]> {
  const subscriptions = await getSubscriptions(
    ocmApi,
    (subscriptionFilter ?? new Filter()).and(
      buildSubscriptionFilter({ states: ACTIVE_SUBSCRIPTION_STATES, managed: true })
    ),
    chunkSize
  );
  if (subscriptions.size === 0) {
    return [];
  }

  const organizationLabels = new Map<string, OCMOrganizationLabel[]>();
  if (initLabels) {
    const orgIds = new Set([...subscriptions.values()].map((subscription) => subscription.organizationId));
    for await (const label of getOrganizationLabels(ocmApi, new Filter().isIn("organization_id", orgIds))) {
      const labels = organizationLabels.get(label.organizationId) ?? [];
      labels.push(label);
      organizationLabels.set(label.organizationId, labels);
    }
  }

  const clusterSearch = clusterReadyForAppInterface()
    .and(clusterFilter)
    .isIn("subscription.id", subscriptions.keys());

  const clusters: ClusterDetails[] = [];
  for (const chunk of clusterSearch.chunkBy("subscription.id", chunkSize, true)) {
    for await (const cluster of getOcmClusters(ocmApi, chunk)) {
      const subscription = subscriptions.get(cluster.subscriptionId);
      if (!subscription) {
        continue;
      }
      clusters.push(
        new ClusterDetails({
          ocmCluster: cluster,
          organizationId: subscription.organizationId,
          subscriptionHref: subscription.href,
          capabilities: new Map(subscription.capabilities.map((capability) => [capability.name, capability])),
          subscriptionLabels: buildLabelContainer(subscription.labels),
          organizationLabels: buildLabelContainer(organizationLabels.get(subscription.organizationId)),
        })
      );
    }
  }
  return clusters;
}

/**
 * Clusters carrying a subscription or organization label matching
 * `labelFilter`. The label containers of the result hold only the matched
 * labels.
 */
export async function discoverClustersByLabels(
  ocmApi: OCMApi,
  labelFilter: Filter,
  { chunkSize }: DiscoveryOptions = {}
): Promise<ClusterDetails[]> {
  const subscriptionLabels = new Map<string, OCMSubscriptionLabel[]>();
  const organizationLabels = new Map<string, OCMOrganizationLabel[]>();

  for await (const label of getLabels(ocmApi, labelFilter)) {
    if (isSubscriptionLabel(label)) {
      subscriptionLabels.set(label.subscriptionId, [...(subscriptionLabels.get(label.subscriptionId) ?? []), label]);
    } else if (isOrganizationLabel(label)) {
      organizationLabels.set(label.organizationId, [...(organizationLabels.get(label.organizationId) ?? []), label]);
    }
  }
  if (subscriptionLabels.size === 0 && organizationLabels.size === 0) {
    return [];
  }

  const subscriptionFilter = orFilter(
    new Filter().isIn("id", subscriptionLabels.keys()),
    new Filter().isIn("organization_id", organizationLabels.keys())
  );
  const clusters = await getClusterDetailsForSubscriptions(ocmApi, { subscriptionFilter, initLabels: false, chunkSize });

  return clusters.map((cluster) =>
    cluster.withLabels(
      buildLabelContainer(subscriptionLabels.get(cluster.subscriptionId)),
      buildLabelContainer(organizationLabels.get(cluster.organizationId))
    )
  );
}

export async function discoverClustersForSubscriptions(
  ocmApi: OCMApi,
  subscriptionIds: Iterable<string>,
  clusterFilter?: Filter | null,
  { chunkSize }: DiscoveryOptions = {}
): Promise<ClusterDetails[]> {
  const ids = [...subscriptionIds];
  if (ids.length === 0) {
    return [];
  }
  return getClusterDetailsForSubscriptions(ocmApi, {
    subscriptionFilter: new Filter().isIn("id", ids),
    clusterFilter,
    chunkSize,
  });
}

export async function discoverClustersForOrganizations(
  ocmApi: OCMApi,
  organizationIds: Iterable<string>,
  clusterFilter?: Filter | null,
  { chunkSize }: DiscoveryOptions = {}
): Promise<ClusterDetails[]> {
  const ids = [...organizationIds];
  if (ids.length === 0) {
    return [];
  }
  return getClusterDetailsForSubscriptions(ocmApi, {
    subscriptionFilter: new Filter().isIn("organization_id", ids),
    clusterFilter,
    chunkSize,
  });
}
