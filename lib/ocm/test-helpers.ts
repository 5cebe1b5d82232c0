/**
 * Builders for OCM payloads and an in-memory OCM API used by the tests.
 */

import { vi } from "vitest";
import type { OCMApi, OCMItem, QueryParams } from "./base-client.js";

export interface LabelPayloadInput {
  key: string;
  value: string;
  subscriptionId?: string;
  organizationId?: string;
  type?: string;
}

export function labelPayload(input: LabelPayloadInput): OCMItem {
  const type = input.type ?? (input.subscriptionId ? "Subscription" : "Organization");
  const owner =
    type === "Subscription"
      ? { subscription_id: input.subscriptionId ?? "sub-1" }
      : type === "Organization"
        ? { organization_id: input.organizationId ?? "org-1" }
        : { account_id: "account-1" };
  return {
    id: `label-${input.key}`,
    internal: false,
    updated_at: "2024-01-01T00:00:00Z",
    created_at: "2024-01-01T00:00:00Z",
    href: `/api/accounts_mgmt/v1/labels/${input.key}`,
    key: input.key,
    value: input.value,
    type,
    ...owner,
  };
}

export function organizationPayload(id: string, name = `name-${id}`): OCMItem {
  return {
    kind: "Organization",
    id,
    href: `/api/accounts_mgmt/v1/organizations/${id}`,
    name,
    external_id: `external-${id}`,
  };
}

export interface SubscriptionPayloadInput {
  id: string;
  organizationId: string;
  clusterId?: string;
  labels?: Array<{ key: string; value: string }>;
  capabilities?: Array<{ name: string; value: string }>;
}

export function subscriptionPayload(input: SubscriptionPayloadInput): OCMItem {
  return {
    id: input.id,
    href: `/api/accounts_mgmt/v1/subscriptions/${input.id}`,
    display_name: `display-${input.id}`,
    created_at: "2024-01-01T00:00:00Z",
    cluster_id: input.clusterId ?? `cluster-${input.id}`,
    organization_id: input.organizationId,
    managed: true,
    status: "Active",
    labels: (input.labels ?? []).map((label) => labelPayload({ ...label, subscriptionId: input.id })),
    capabilities: input.capabilities ?? [],
  };
}

export interface ClusterPayloadInput {
  id: string;
  name: string;
  subscriptionId: string;
  state?: string;
  productId?: string;
}

export function clusterPayload(input: ClusterPayloadInput): OCMItem {
  return {
    kind: "Cluster",
    id: input.id,
    external_id: `external-${input.id}`,
    name: input.name,
    display_name: input.name,
    managed: true,
    state: input.state ?? "ready",
    subscription: { id: input.subscriptionId, kind: "SubscriptionLink" },
    region: { id: "us-east-1" },
    cloud_provider: { id: "aws" },
    product: { id: input.productId ?? "rosa" },
    hypershift: { enabled: false },
    version: { id: "openshift-v4.15.1", raw_id: "4.15.1", channel_group: "stable" },
    console: { url: `https://console.${input.name}.example.com` },
    api: { url: `https://api.${input.name}.example.com:6443` },
    dns: { base_domain: `${input.name}.example.com` },
  };
}

export interface PaginatedCall {
  apiPath: string;
  search: string | undefined;
}

/**
 * Fake OCM API answering paginated requests from per-path handlers and
 * recording every call.
 */
export function createFakeOCMApi(handlers: Record<string, (search: string | undefined) => OCMItem[]>) {
  const calls: PaginatedCall[] = [];
  const api = {
    get: vi.fn().mockResolvedValue({}),
    post: vi.fn().mockResolvedValue({}),
    patch: vi.fn().mockResolvedValue(undefined),
    delete: vi.fn().mockResolvedValue(undefined),
    getPaginated: vi.fn(async function* (apiPath: string, params: QueryParams = {}) {
      const search = typeof params.search === "string" ? params.search : undefined;
      calls.push({ apiPath, search });
      const handler = handlers[apiPath];
      if (!handler) {
        throw new Error(`unexpected request to ${apiPath}`);
      }
      yield* handler(search);
    }),
  } satisfies OCMApi;
  return { api, calls };
}
