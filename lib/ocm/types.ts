/**
 * OCM API Models
 *
 * Schemas for the OCM payloads the integrations read. API fields are
 * snake_case; parsed models are camelCase.
 */

import { z } from "zod";

// ───────────────────────────────────────────────────────────────────────────────
// Labels
// ───────────────────────────────────────────────────────────────────────────────

const LabelBaseSchema = z.object({
  id: z.string(),
  internal: z.boolean().default(false),
  updated_at: z.coerce.date(),
  created_at: z.coerce.date(),
  href: z.string(),
  key: z.string(),
  value: z.string(),
});

function baseFields(label: z.infer<typeof LabelBaseSchema>) {
  return {
    id: label.id,
    internal: label.internal,
    updatedAt: label.updated_at,
    createdAt: label.created_at,
    href: label.href,
    key: label.key,
    value: label.value,
  };
}

export const SubscriptionLabelSchema = LabelBaseSchema.extend({
  type: z.literal("Subscription"),
  subscription_id: z.string(),
}).transform((label) => ({ ...baseFields(label), type: label.type, subscriptionId: label.subscription_id }));

export const OrganizationLabelSchema = LabelBaseSchema.extend({
  type: z.literal("Organization"),
  organization_id: z.string(),
}).transform((label) => ({ ...baseFields(label), type: label.type, organizationId: label.organization_id }));

export const AccountLabelSchema = LabelBaseSchema.extend({
  type: z.literal("Account"),
  account_id: z.string(),
}).transform((label) => ({ ...baseFields(label), type: label.type, accountId: label.account_id }));

export type OCMSubscriptionLabel = z.infer<typeof SubscriptionLabelSchema>;
export type OCMOrganizationLabel = z.infer<typeof OrganizationLabelSchema>;
export type OCMAccountLabel = z.infer<typeof AccountLabelSchema>;
export type OCMLabel = OCMSubscriptionLabel | OCMOrganizationLabel | OCMAccountLabel;

export const LABEL_TYPES = ["Subscription", "Organization", "Account"] as const;
export type OCMLabelType = (typeof LABEL_TYPES)[number];

// ───────────────────────────────────────────────────────────────────────────────
// Organizations
// ───────────────────────────────────────────────────────────────────────────────

export const OrganizationSchema = z
  .object({
    id: z.string(),
    name: z.string().nullish(),
    external_id: z.string().nullish(),
    href: z.string().nullish(),
  })
  .transform((organization) => ({
    id: organization.id,
    name: organization.name ?? null,
    externalId: organization.external_id ?? null,
    href: organization.href ?? null,
  }));

export type OCMOrganizationInfo = z.infer<typeof OrganizationSchema>;

// ───────────────────────────────────────────────────────────────────────────────
// Subscriptions
// ───────────────────────────────────────────────────────────────────────────────

export const SUBSCRIPTION_STATUSES = [
  "Active",
  "Deprovisioned",
  "Stale",
  "Archived",
  "Reserved",
  "Disconnected",
] as const;

export type OCMSubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

export const CapabilitySchema = z.object({
  name: z.string(),
  value: z.string(),
});

export type OCMCapability = z.infer<typeof CapabilitySchema>;

export const SubscriptionSchema = z
  .object({
    id: z.string(),
    href: z.string(),
    display_name: z.string(),
    created_at: z.coerce.date(),
    cluster_id: z.string(),
    organization_id: z.string(),
    managed: z.boolean(),
    status: z.enum(SUBSCRIPTION_STATUSES),
    labels: z.array(SubscriptionLabelSchema).nullish(),
    capabilities: z.array(CapabilitySchema).nullish(),
  })
  .transform((subscription) => ({
    id: subscription.id,
    href: subscription.href,
    displayName: subscription.display_name,
    createdAt: subscription.created_at,
    clusterId: subscription.cluster_id,
    organizationId: subscription.organization_id,
    managed: subscription.managed,
    status: subscription.status,
    labels: subscription.labels ?? [],
    capabilities: subscription.capabilities ?? [],
  }));

export type OCMSubscription = z.infer<typeof SubscriptionSchema>;

// ───────────────────────────────────────────────────────────────────────────────
// Clusters
// ───────────────────────────────────────────────────────────────────────────────

export const CLUSTER_STATES = [
  "error",
  "hibernating",
  "installing",
  "pending",
  "powering_down",
  "ready",
  "resuming",
  "uninstalling",
  "unknown",
  "validating",
  "waiting",
] as const;

export type OCMClusterState = (typeof CLUSTER_STATES)[number];

export const PRODUCT_ID_OSD = "osd";
export const PRODUCT_ID_ROSA = "rosa";

const ModelLinkSchema = z.object({
  id: z.string(),
  kind: z.string().nullish(),
  href: z.string().nullish(),
});

export const ClusterSchema = z
  .object({
    id: z.string(),
    external_id: z.string(),
    name: z.string(),
    display_name: z.string(),
    managed: z.boolean(),
    state: z.enum(CLUSTER_STATES),
    subscription: ModelLinkSchema,
    region: ModelLinkSchema,
    cloud_provider: ModelLinkSchema.nullish(),
    product: ModelLinkSchema,
    hypershift: z.object({ enabled: z.boolean() }).nullish(),
    aws: z.object({ sts: z.object({ enabled: z.boolean() }).nullish() }).nullish(),
    version: z.object({ id: z.string(), raw_id: z.string(), channel_group: z.string().nullish() }).nullish(),
    console: z.object({ url: z.string() }).nullish(),
    api: z.object({ url: z.string() }).nullish(),
    dns: z.object({ base_domain: z.string() }).nullish(),
  })
  .transform((cluster) => ({
    id: cluster.id,
    externalId: cluster.external_id,
    name: cluster.name,
    displayName: cluster.display_name,
    managed: cluster.managed,
    state: cluster.state,
    subscriptionId: cluster.subscription.id,
    regionId: cluster.region.id,
    cloudProviderId: cluster.cloud_provider?.id ?? null,
    productId: cluster.product.id,
    hypershift: cluster.hypershift?.enabled ?? false,
    sts: cluster.aws?.sts?.enabled ?? false,
    version: cluster.version?.raw_id ?? null,
    consoleUrl: cluster.console?.url ?? null,
    apiUrl: cluster.api?.url ?? null,
    baseDomain: cluster.dns?.base_domain ?? null,
  }));

export type OCMCluster = z.infer<typeof ClusterSchema>;
