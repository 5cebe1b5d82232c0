/**
 * Cluster Auth RHIDP
 *
 * Publishes each cluster's Red Hat IDP auth settings as subscription labels
 * under `sre-capabilities.rhidp`, where the IDP tooling picks them up.
 */

import { integrationIsEnabled, queryClusters, queryOcmEnvironments } from "../app-interface/queries.js";
import type { Cluster } from "../app-interface/schemas.js";
import { initOCMApis } from "../ocm/base-client.js";
import {
  ClusterRef,
  LabelState,
  managedLabelPrefixesFromSources,
  type Labels,
  type LabelSource,
} from "../ocm/label-sources.js";
import { reconcileLabels } from "../ocm/label-reconciler.js";
import { createOCMLabelStore } from "../ocm/labels.js";
import {
  AUTH_NAME_LABEL_KEY,
  ISSUER_LABEL_KEY,
  RHIDP_NAMESPACE_LABEL_KEY,
  STATUS_LABEL_KEY,
  StatusValue,
} from "../rhidp/common.js";
import { fetchClusterCurrentState, hasOcmIdentity, type OcmCluster } from "./ocm-subscription-labels.js";
import { initOCMApiFromContext, type Integration, type IntegrationContext, type OCMApiFactory } from "./types.js";

export const CLUSTER_AUTH_RHIDP = "cluster-auth-rhidp";

export const RHIDP_AUTH_SERVICE = "rhidp";

/**
 * RHIDP labels for one cluster. Clusters without a `rhidp` auth entry get
 * none, which removes labels left from an earlier configuration.
 */
export function rhidpLabels(cluster: Cluster): Labels {
  const auth = cluster.auth.find((entry) => entry.service === RHIDP_AUTH_SERVICE);
  if (!auth) {
    return {};
  }
  const labels: Labels = { [STATUS_LABEL_KEY]: auth.status ?? StatusValue.ENABLED };
  if (auth.name) {
    labels[AUTH_NAME_LABEL_KEY] = auth.name;
  }
  if (auth.issuer) {
    labels[ISSUER_LABEL_KEY] = auth.issuer;
  }
  return labels;
}

export class ClusterAuthRhidpLabelSource implements LabelSource {
  readonly name = "cluster-auth-rhidp";

  constructor(private readonly clusters: readonly OcmCluster[]) {}

  managedLabelPrefixes(): string[] {
    return [RHIDP_NAMESPACE_LABEL_KEY];
  }

  getLabels(): LabelState {
    const state = new LabelState();
    for (const cluster of this.clusters) {
      const owner = new ClusterRef({
        clusterId: cluster.spec.id,
        orgId: cluster.ocm.orgId,
        ocmEnv: cluster.ocm.environment.name,
        name: cluster.name,
        labelContainerHref: null,
      });
      state.set(owner, rhidpLabels(cluster));
    }
    return state;
  }
}

export class ClusterAuthRhidpIntegration implements Integration {
  readonly name = CLUSTER_AUTH_RHIDP;

  constructor(private readonly initOCMApi: OCMApiFactory = initOCMApiFromContext) {}

  private async fetchClusters(ctx: IntegrationContext): Promise<OcmCluster[]> {
    const clusters = await queryClusters(ctx.query);
    return clusters.filter(hasOcmIdentity).filter((cluster) => integrationIsEnabled(this.name, cluster));
  }

  async getEarlyExitDesiredState(ctx: IntegrationContext): Promise<unknown> {
    return new ClusterAuthRhidpLabelSource(await this.fetchClusters(ctx)).getLabels().toJSON();
  }

  async run(ctx: IntegrationContext): Promise<void> {
    const clusters = await this.fetchClusters(ctx);
    if (clusters.length === 0) {
      ctx.logger.info("No clusters with OCM identity to reconcile");
      return;
    }
    const environments = await queryOcmEnvironments(ctx.query);
    const apis = await initOCMApis(
      environments,
      (environment) => this.initOCMApi(environment, ctx),
      new Set(clusters.map((cluster) => cluster.ocm.environment.name))
    );

    const source = new ClusterAuthRhidpLabelSource(clusters);
    await reconcileLabels({
      current: await fetchClusterCurrentState(
        apis,
        clusters,
        managedLabelPrefixesFromSources([source]),
        ctx.config.subscriptionChunkSize
      ),
      desired: source.getLabels(),
      stores: new Map([...apis].map(([envName, api]) => [envName, createOCMLabelStore(api)])),
      dryRun: ctx.config.dryRun,
      logger: ctx.logger,
    });
  }
}
