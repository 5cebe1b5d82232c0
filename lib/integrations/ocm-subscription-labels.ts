/**
 * OCM Subscription Labels
 *
 * Syncs organization labels (`ocmOrganizationLabels`) and cluster
 * subscription labels (`ocmSubscriptionLabels`) from app-interface to OCM.
 * Each label source manages the prefixes one segment below the configured
 * parent prefixes that its labels actually use; sibling segments belong to
 * other tools and are left alone.
 */

import { queryClusters, queryOcmEnvironments, queryOcmOrganizations, integrationIsEnabled } from "../app-interface/queries.js";
import { flattenLabelTree, type Cluster, type OCMOrganization } from "../app-interface/schemas.js";
import { formatAction } from "../logger.js";
import { initOCMApis, type OCMApis } from "../ocm/base-client.js";
import { discoverClustersForOrganizations } from "../ocm/clusters.js";
import {
  ClusterRef,
  LabelState,
  OrgRef,
  deriveManagedPrefixes,
  filterManagedLabels,
  managedLabelPrefixesFromSources,
  type Labels,
  type LabelSource,
} from "../ocm/label-sources.js";
import { reconcileLabels } from "../ocm/label-reconciler.js";
import { createOCMLabelStore, getOrgLabels, organizationLabelsHref } from "../ocm/labels.js";
import { getOrganizations } from "../ocm/organizations.js";
import { Filter } from "../ocm/search-filters.js";
import { initOCMApiFromContext, type Integration, type IntegrationContext, type OCMApiFactory } from "./types.js";

export const OCM_SUBSCRIPTION_LABELS = "ocm-subscription-labels";

export class ManagedLabelConflictError extends Error {
  constructor(label: string, identity: readonly string[]) {
    super(`The label ${label} on ${identity.join(" ")} is already managed by another label source`);
    this.name = "ManagedLabelConflictError";
  }
}


// ───────────────────────────────────────────────────────────────────────────────
// Label Sources
// ───────────────────────────────────────────────────────────────────────────────

/** A cluster that can be matched to an OCM subscription */
export type OcmCluster = Cluster & { ocm: NonNullable<Cluster["ocm"]>; spec: { id: string } };

export function hasOcmIdentity(cluster: Cluster): cluster is OcmCluster {
  return Boolean(cluster.ocm && cluster.spec?.id);
}

export class ClusterSubscriptionLabelSource implements LabelSource {
  readonly name = "cluster-subscription-labels";

  private readonly labels: Array<[OcmCluster, Labels]>;
  private readonly managedPrefixes: string[];

  constructor(clusters: readonly Cluster[], parentPrefixes: readonly string[]) {
    this.labels = clusters
      .filter(hasOcmIdentity)
      .filter((cluster) => integrationIsEnabled(OCM_SUBSCRIPTION_LABELS, cluster))
      .map((cluster): [OcmCluster, Labels] => [cluster, flattenLabelTree(cluster.ocmSubscriptionLabels)]);
    this.managedPrefixes = deriveManagedPrefixes(
      parentPrefixes,
      this.labels.map(([, labels]) => labels)
    );
  }

  managedLabelPrefixes(): string[] {
    return [...this.managedPrefixes];
  }

  getLabels(): LabelState {
    const state = new LabelState();
    for (const [cluster, labels] of this.labels) {
      const owner = new ClusterRef({
        clusterId: cluster.spec.id,
        orgId: cluster.ocm.orgId,
        ocmEnv: cluster.ocm.environment.name,
        name: cluster.name,
        labelContainerHref: null,
      });
      state.set(owner, filterManagedLabels(labels, this.managedPrefixes));
    }
    return state;
  }
}

export class OrganizationLabelSource implements LabelSource {
  readonly name = "organization-labels";

  private readonly labels: Array<[OCMOrganization, Labels]>;
  private readonly managedPrefixes: string[];

  constructor(organizations: readonly OCMOrganization[], parentPrefixes: readonly string[]) {
    this.labels = organizations.map((organization): [OCMOrganization, Labels] => [
      organization,
      flattenLabelTree(organization.ocmOrganizationLabels),
    ]);
    this.managedPrefixes = deriveManagedPrefixes(
      parentPrefixes,
      this.labels.map(([, labels]) => labels)
    );
  }

  managedLabelPrefixes(): string[] {
    return [...this.managedPrefixes];
  }

  getLabels(): LabelState {
    const state = new LabelState();
    for (const [organization, labels] of this.labels) {
      const owner = new OrgRef({
        orgId: organization.orgId,
        ocmEnv: organization.environment.name,
        name: organization.name,
        labelContainerHref: null,
      });
      state.set(owner, filterManagedLabels(labels, this.managedPrefixes));
    }
    return state;
  }
}

/**
 * Merge the labels of all sources. Each source contributes only keys under
 * its own managed prefixes.
 *
 * @throws ManagedLabelPrefixConflictError when the managed prefixes of two sources overlap
 * @throws ManagedLabelConflictError when two sources set the same key on one owner
 */
export function fetchDesiredState(sources: readonly LabelSource[]): LabelState {
  managedLabelPrefixesFromSources(sources);
  const merged = new LabelState();
  const claimed = new Map<string, Set<string>>();
  for (const source of sources) {
    const managed = source.managedLabelPrefixes();
    for (const [owner, labels] of source.getLabels()) {
      const keys = claimed.get(owner.identity) ?? new Set<string>();
      for (const key of Object.keys(labels)) {
        if (keys.has(key)) {
          throw new ManagedLabelConflictError(key, owner.identityLabels());
        }
        keys.add(key);
      }
      claimed.set(owner.identity, keys);
      merged.set(owner, { ...merged.get(owner), ...filterManagedLabels(labels, managed) });
    }
  }
  return merged;
}

// ───────────────────────────────────────────────────────────────────────────────
// Current State
// ───────────────────────────────────────────────────────────────────────────────

function managedKeyFilter(managedPrefixes: readonly string[]): Filter {
  return managedPrefixes.reduce((filter, prefix) => filter.like("key", `${prefix}%`), new Filter());
}

/**
 * Managed labels of the configured organizations that exist in OCM.
 * Organizations OCM does not know are absent, not even with an empty set;
 * existing organizations without managed labels get an empty set.
 */
export async function fetchOrganizationCurrentState(
  apis: OCMApis,
  organizations: readonly OCMOrganization[],
  managedPrefixes: readonly string[],
  chunkSize?: number
): Promise<LabelState> {
  const state = new LabelState();
  for (const [envName, api] of apis) {
    const envOrgs = organizations.filter((organization) => organization.environment.name === envName);
    if (envOrgs.length === 0) {
      continue;
    }
    const existing = await getOrganizations(
      api,
      envOrgs.map((organization) => organization.orgId),
      chunkSize
    );
    if (existing.size === 0) {
      continue;
    }
    const labelsByOrg =
      managedPrefixes.length > 0
        ? await getOrgLabels(api, existing.keys(), managedKeyFilter(managedPrefixes), chunkSize)
        : undefined;
    for (const organization of envOrgs) {
      if (!existing.has(organization.orgId)) {
        continue;
      }
      const owner = new OrgRef({
        orgId: organization.orgId,
        ocmEnv: envName,
        name: organization.name,
        labelContainerHref: organizationLabelsHref(organization.orgId),
      });
      const labels = labelsByOrg?.get(organization.orgId)?.getValuesDict() ?? {};
      state.set(owner, filterManagedLabels(labels, managedPrefixes));
    }
  }
  return state;
}

/**
 * Managed subscription labels of the configured clusters found in OCM.
 * Clusters missing in OCM or not ready yet are absent.
 */
export async function fetchClusterCurrentState(
  apis: OCMApis,
  clusters: readonly Cluster[],
  managedPrefixes: readonly string[],
  chunkSize?: number
): Promise<LabelState> {
  const configured = clusters.filter(hasOcmIdentity);
  const clusterIds = new Set(configured.map((cluster) => cluster.spec.id));
  const state = new LabelState();

  for (const [envName, api] of apis) {
    const orgIds = new Set(
      configured.filter((cluster) => cluster.ocm.environment.name === envName).map((cluster) => cluster.ocm.orgId)
    );
    const discovered = await discoverClustersForOrganizations(api, orgIds, null, { chunkSize });
    for (const details of discovered) {
      // organizations may hold clusters that are not configured here
      if (!clusterIds.has(details.id)) {
        continue;
      }
      const owner = new ClusterRef({
        clusterId: details.id,
        orgId: details.organizationId,
        ocmEnv: envName,
        name: details.name,
        labelContainerHref: details.labelContainerHref,
      });
      state.set(
        owner,
        filterManagedLabels(details.subscriptionLabels.getValuesDict(), managedPrefixes)
      );
    }
  }
  return state;
}

// ───────────────────────────────────────────────────────────────────────────────
// Integration
// ───────────────────────────────────────────────────────────────────────────────

interface DesiredConfig {
  clusters: Cluster[];
  organizations: OCMOrganization[];
}

interface LabelSources {
  organizations: LabelSource[];
  clusters: LabelSource[];
}

export class OcmSubscriptionLabelsIntegration implements Integration {
  readonly name = OCM_SUBSCRIPTION_LABELS;

  constructor(private readonly initOCMApi: OCMApiFactory = initOCMApiFromContext) {}

  private async fetchConfig(ctx: IntegrationContext): Promise<DesiredConfig> {
    const [clusters, organizations] = await Promise.all([queryClusters(ctx.query), queryOcmOrganizations(ctx.query)]);
    return {
      clusters: clusters.filter((cluster) => cluster.ocm && integrationIsEnabled(this.name, cluster)),
      organizations,
    };
  }

  private labelSources(ctx: IntegrationContext, config: DesiredConfig): LabelSources {
    const parentPrefixes = ctx.config.managedLabelPrefixes;
    return {
      organizations: [new OrganizationLabelSource(config.organizations, parentPrefixes)],
      clusters: [new ClusterSubscriptionLabelSource(config.clusters, parentPrefixes)],
    };
  }

  async getEarlyExitDesiredState(ctx: IntegrationContext): Promise<unknown> {
    const sources = this.labelSources(ctx, await this.fetchConfig(ctx));
    return {
      organizations: fetchDesiredState(sources.organizations).toJSON(),
      clusters: fetchDesiredState(sources.clusters).toJSON(),
    };
  }

  async run(ctx: IntegrationContext): Promise<void> {
    const config = await this.fetchConfig(ctx);
    const { clusters, organizations } = config;
    const sources = this.labelSources(ctx, config);
    const environments = await queryOcmEnvironments(ctx.query);

    const referenced = new Set([
      ...organizations.map((organization) => organization.environment.name),
      ...clusters.flatMap((cluster) => (cluster.ocm ? [cluster.ocm.environment.name] : [])),
    ]);
    const apis = await initOCMApis(environments, (environment) => this.initOCMApi(environment, ctx), referenced);
    const stores = new Map([...apis].map(([envName, api]) => [envName, createOCMLabelStore(api)]));
    const chunkSize = ctx.config.subscriptionChunkSize;

    ctx.logger.group("organization labels");
    try {
      const operations = await reconcileLabels({
        current: await fetchOrganizationCurrentState(
          apis,
          organizations,
          managedLabelPrefixesFromSources(sources.organizations),
          chunkSize
        ),
        desired: fetchDesiredState(sources.organizations),
        stores,
        dryRun: ctx.config.dryRun,
        scope: "organization",
        logger: ctx.logger,
      });
      ctx.logger.info(formatAction("organization_label_operations", `count=${operations.length}`));
    } finally {
      ctx.logger.groupEnd();
    }

    ctx.logger.group("cluster subscription labels");
    try {
      const operations = await reconcileLabels({
        current: await fetchClusterCurrentState(
          apis,
          clusters,
          managedLabelPrefixesFromSources(sources.clusters),
          chunkSize
        ),
        desired: fetchDesiredState(sources.clusters),
        stores,
        dryRun: ctx.config.dryRun,
        scope: "cluster",
        logger: ctx.logger,
      });
      ctx.logger.info(formatAction("cluster_label_operations", `count=${operations.length}`));
    } finally {
      ctx.logger.groupEnd();
    }
  }
}
