import { describe, it, expect } from "vitest";
import {
  CLUSTERS_API_PATH,
  ClusterDetails,
  clusterReadyForAppInterface,
  discoverClustersByLabels,
  discoverClustersForOrganizations,
  discoverClustersForSubscriptions,
  getClusterDetailsForSubscriptions,
} from "./clusters.js";
import { LABELS_API_PATH, buildLabelContainer, buildLabelFromDict, isSubscriptionLabel } from "./labels.js";
import { Filter } from "./search-filters.js";
import { SUBSCRIPTIONS_API_PATH } from "./subscriptions.js";
import { ClusterSchema } from "./types.js";
import { clusterPayload, createFakeOCMApi, labelPayload, subscriptionPayload } from "./test-helpers.js";

describe("clusterReadyForAppInterface", () => {
  it("should select managed OSD and ROSA clusters in ready state", () => {
    expect(clusterReadyForAppInterface().render()).toBe(
      "managed='true' and product.id in ('osd','rosa') and state='ready'"
    );
  });
});

describe("ClusterDetails", () => {
  const subscriptionLabel = buildLabelFromDict(labelPayload({ key: "owner", value: "team-a", subscriptionId: "sub-1" }));
  const cluster = new ClusterDetails({
    ocmCluster: ClusterSchema.parse(clusterPayload({ id: "c1", name: "cluster-1", subscriptionId: "sub-1" })),
    organizationId: "org-1",
    subscriptionHref: "/api/accounts_mgmt/v1/subscriptions/sub-1",
    subscriptionLabels: buildLabelContainer([subscriptionLabel].filter(isSubscriptionLabel)),
  });

  it("should expose the cluster identity", () => {
    expect(cluster.id).toBe("c1");
    expect(cluster.name).toBe("cluster-1");
    expect(cluster.subscriptionId).toBe("sub-1");
    expect(cluster.labelContainerHref).toBe("/api/accounts_mgmt/v1/subscriptions/sub-1/labels");
  });

  it("should default to no capabilities and no organization labels", () => {
    expect(cluster.isCapabilitySet("capability.cluster.autoscale", "true")).toBe(false);
    expect(cluster.organizationLabels.isEmpty).toBe(true);
    expect(cluster.getLabel("owner")?.value).toBe("team-a");
  });
});

describe("getClusterDetailsForSubscriptions", () => {
  it("should join clusters with subscription and organization data", async () => {
    const { api, calls } = createFakeOCMApi({
      [SUBSCRIPTIONS_API_PATH]: () => [
        subscriptionPayload({
          id: "sub-1",
          organizationId: "org-1",
          labels: [{ key: "owner", value: "team-a" }],
          capabilities: [{ name: "capability.cluster.autoscale", value: "true" }],
        }),
      ],
      [LABELS_API_PATH]: () => [
        labelPayload({ key: "owner", value: "org-owner", organizationId: "org-1" }),
        labelPayload({ key: "tier", value: "gold", organizationId: "org-1" }),
      ],
      [CLUSTERS_API_PATH]: () => [clusterPayload({ id: "c1", name: "cluster-1", subscriptionId: "sub-1" })],
    });

    const clusters = await getClusterDetailsForSubscriptions(api, {
      subscriptionFilter: new Filter().eq("organization_id", "org-1"),
    });

    expect(calls).toEqual([
      {
        apiPath: SUBSCRIPTIONS_API_PATH,
        search: "managed='true' and organization_id='org-1' and status='Active'",
      },
      { apiPath: LABELS_API_PATH, search: "organization_id='org-1' and type='Organization'" },
      {
        apiPath: CLUSTERS_API_PATH,
        search: "managed='true' and product.id in ('osd','rosa') and state='ready' and subscription.id='sub-1'",
      },
    ]);
    expect(api.getPaginated).toHaveBeenLastCalledWith(CLUSTERS_API_PATH, {
      search: "managed='true' and product.id in ('osd','rosa') and state='ready' and subscription.id='sub-1'",
      order: "creation_timestamp",
    });

    expect(clusters).toHaveLength(1);
    const [cluster] = clusters;
    expect(cluster.name).toBe("cluster-1");
    expect(cluster.organizationId).toBe("org-1");
    expect(cluster.isCapabilitySet("capability.cluster.autoscale", "true")).toBe(true);
    expect(cluster.subscriptionLabels.getValuesDict()).toEqual({ owner: "team-a" });
    expect(cluster.organizationLabels.getValuesDict()).toEqual({ owner: "org-owner", tier: "gold" });
    expect(cluster.labels.getValuesDict()).toEqual({ owner: "team-a", tier: "gold" });
    expect(cluster.getLabel("tier")?.value).toBe("gold");
  });

  it("should not query clusters when no subscription matches", async () => {
    const { api, calls } = createFakeOCMApi({ [SUBSCRIPTIONS_API_PATH]: () => [] });

    await expect(getClusterDetailsForSubscriptions(api)).resolves.toEqual([]);
    expect(calls).toEqual([{ apiPath: SUBSCRIPTIONS_API_PATH, search: "managed='true' and status='Active'" }]);
  });

  it("should skip organization labels when not requested", async () => {
    const { api, calls } = createFakeOCMApi({
      [SUBSCRIPTIONS_API_PATH]: () => [subscriptionPayload({ id: "sub-1", organizationId: "org-1" })],
      [CLUSTERS_API_PATH]: () => [],
    });

    await getClusterDetailsForSubscriptions(api, { initLabels: false });

    expect(calls.map((call) => call.apiPath)).toEqual([SUBSCRIPTIONS_API_PATH, CLUSTERS_API_PATH]);
  });
});

describe("discoverClustersByLabels", () => {
  it("should attach only the matching labels", async () => {
    const { api, calls } = createFakeOCMApi({
      [LABELS_API_PATH]: () => [
        labelPayload({ key: "sre-capabilities.rhidp.status", value: "enabled", subscriptionId: "sub-1" }),
        labelPayload({ key: "sre-capabilities.rhidp.status", value: "enabled", organizationId: "org-2" }),
      ],
      [SUBSCRIPTIONS_API_PATH]: () => [
        subscriptionPayload({ id: "sub-1", organizationId: "org-1", labels: [{ key: "owner", value: "team-a" }] }),
        subscriptionPayload({ id: "sub-2", organizationId: "org-2" }),
      ],
      [CLUSTERS_API_PATH]: () => [
        clusterPayload({ id: "c1", name: "cluster-1", subscriptionId: "sub-1" }),
        clusterPayload({ id: "c2", name: "cluster-2", subscriptionId: "sub-2" }),
      ],
    });

    const clusters = await discoverClustersByLabels(api, new Filter().eq("key", "sre-capabilities.rhidp.status"));

    expect(calls.map((call) => call.search)).toEqual([
      "key='sre-capabilities.rhidp.status'",
      "(id='sub-1' or organization_id='org-2') and managed='true' and status='Active'",
      "managed='true' and product.id in ('osd','rosa') and state='ready' and subscription.id in ('sub-1','sub-2')",
    ]);
    expect(clusters.map((cluster) => cluster.name)).toEqual(["cluster-1", "cluster-2"]);
    expect(clusters[0].subscriptionLabels.getValuesDict()).toEqual({ "sre-capabilities.rhidp.status": "enabled" });
    expect(clusters[0].organizationLabels.isEmpty).toBe(true);
    expect(clusters[1].subscriptionLabels.isEmpty).toBe(true);
    expect(clusters[1].organizationLabels.getValuesDict()).toEqual({ "sre-capabilities.rhidp.status": "enabled" });
  });

  it("should return nothing when no label matches", async () => {
    const { api, calls } = createFakeOCMApi({ [LABELS_API_PATH]: () => [] });

    await expect(discoverClustersByLabels(api, new Filter().eq("key", "missing"))).resolves.toEqual([]);
    expect(calls).toHaveLength(1);
  });
});

describe("discoverClustersForSubscriptions / discoverClustersForOrganizations", () => {
  it("should not query OCM without ids", async () => {
    const { api } = createFakeOCMApi({});

    await expect(discoverClustersForSubscriptions(api, [])).resolves.toEqual([]);
    await expect(discoverClustersForOrganizations(api, new Set<string>())).resolves.toEqual([]);
    expect(api.getPaginated).not.toHaveBeenCalled();
  });

  it("should filter subscriptions by id", async () => {
    const { api, calls } = createFakeOCMApi({ [SUBSCRIPTIONS_API_PATH]: () => [] });

    await discoverClustersForSubscriptions(api, ["sub-1"]);

    expect(calls[0].search).toBe("id='sub-1' and managed='true' and status='Active'");
  });

  it("should filter subscriptions by organization and apply the cluster filter", async () => {
    const { api, calls } = createFakeOCMApi({
      [SUBSCRIPTIONS_API_PATH]: () => [subscriptionPayload({ id: "sub-1", organizationId: "o1" })],
      [LABELS_API_PATH]: () => [],
      [CLUSTERS_API_PATH]: () => [],
    });

    await discoverClustersForOrganizations(api, ["o2", "o1"], new Filter().eq("name", "cluster-1"));

    expect(calls.map((call) => call.search)).toEqual([
      "managed='true' and organization_id in ('o1','o2') and status='Active'",
      "organization_id='o1' and type='Organization'",
      "managed='true' and name='cluster-1' and product.id in ('osd','rosa') and state='ready' and subscription.id='sub-1'",
    ]);
  });
});
