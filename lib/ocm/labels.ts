/**
 * OCM Labels
 *
 * Label lookup, label containers and the label write endpoints of the
 * accounts management API.
 */

import { Filter } from "./search-filters.js";
import type { OCMApi } from "./base-client.js";
import {
  AccountLabelSchema,
  OrganizationLabelSchema,
  SubscriptionLabelSchema,
  type OCMLabel,
  type OCMOrganizationLabel,
  type OCMSubscriptionLabel,
} from "./types.js";

export const LABELS_API_PATH = "/api/accounts_mgmt/v1/labels";

export class UnknownLabelTypeError extends Error {
  constructor(readonly labelType: string) {
    super(`unknown label type: ${labelType}`);
    this.name = "UnknownLabelTypeError";
  }
}

export class MissingLabelError extends Error {
  constructor(readonly labelKey: string) {
    super(`Required label '${labelKey}' does not exist.`);
    this.name = "MissingLabelError";
  }
}

/**
 * Parse a label payload into its typed variant.
 *
 * @throws UnknownLabelTypeError when `type` is not Subscription, Organization or Account
 */
export function buildLabelFromDict(raw: unknown): OCMLabel {
  const type = typeof raw === "object" && raw !== null && "type" in raw ? String(raw.type) : "<missing>";
  switch (type) {
    case "Subscription":
      return SubscriptionLabelSchema.parse(raw);
    case "Organization":
      return OrganizationLabelSchema.parse(raw);
    case "Account":
      return AccountLabelSchema.parse(raw);
    default:
      throw new UnknownLabelTypeError(type);
  }
}

export function isSubscriptionLabel(label: OCMLabel): label is OCMSubscriptionLabel {
  return label.type === "Subscription";
}

export function isOrganizationLabel(label: OCMLabel): label is OCMOrganizationLabel {
  return label.type === "Organization";
}

// ───────────────────────────────────────────────────────────────────────────────
// Filters
// ───────────────────────────────────────────────────────────────────────────────

export function labelFilter(key: string, value?: string | null): Filter {
  return new Filter().eq("key", key).eq("value", value);
}

export function subscriptionLabelFilter(): Filter {
  return new Filter().eq("type", "Subscription");
}

export function organizationLabelFilter(): Filter {
  return new Filter().eq("type", "Organization");
}

// ───────────────────────────────────────────────────────────────────────────────
// Containers
// ───────────────────────────────────────────────────────────────────────────────

export class LabelContainer<L extends OCMLabel = OCMLabel> implements Iterable<L> {
  private readonly labels: ReadonlyMap<string, L>;

  constructor(labels: Iterable<L> = []) {
    const byKey = new Map<string, L>();
    for (const label of labels) {
      byKey.set(label.key, label);
    }
    this.labels = byKey;
  }

  get size(): number {
    return this.labels.size;
  }

  get isEmpty(): boolean {
    return this.labels.size === 0;
  }

  get(name: string): L | undefined {
    return this.labels.get(name);
  }

  getRequiredLabel(name: string): L {
    const label = this.labels.get(name);
    if (!label) {
      throw new MissingLabelError(name);
    }
    return label;
  }

  getLabelValue(name: string): string | undefined {
    return this.labels.get(name)?.value;
  }

  getValuesDict(): Record<string, string> {
    const values: Record<string, string> = {};
    for (const label of this.labels.values()) {
      values[label.key] = label.value;
    }
    return values;
  }

  keys(): string[] {
    return [...this.labels.keys()];
  }

  [Symbol.iterator](): Iterator<L> {
    return this.labels.values();
  }
}

/**
 * One container from several label lists; later lists win on key collisions.
 */
export function buildLabelContainer<L extends OCMLabel>(...labelLists: Array<Iterable<L> | null | undefined>): LabelContainer<L> {
  return new LabelContainer<L>(labelLists.flatMap((labels) => (labels ? [...labels] : [])));
}

/**
 * Labels whose key starts with `prefix`, optionally with the prefix removed.
 */
export function buildContainerForPrefix<L extends OCMLabel>(
  container: LabelContainer<L>,
  prefix: string,
  stripKeyPrefix = false
): LabelContainer<L> {
  const matching: L[] = [];
  for (const label of container) {
    if (label.key.startsWith(prefix)) {
      matching.push(stripKeyPrefix ? { ...label, key: label.key.slice(prefix.length) } : label);
    }
  }
  return new LabelContainer(matching);
}

// ───────────────────────────────────────────────────────────────────────────────
// Lookup
// ───────────────────────────────────────────────────────────────────────────────

export async function* getLabels(ocmApi: OCMApi, filter: Filter): AsyncGenerator<OCMLabel, void, undefined> {
  for await (const item of ocmApi.getPaginated(LABELS_API_PATH, { search: filter.render() })) {
    yield buildLabelFromDict(item);
  }
}

export async function* getSubscriptionLabels(
  ocmApi: OCMApi,
  filter: Filter
): AsyncGenerator<OCMSubscriptionLabel, void, undefined> {
  for await (const label of getLabels(ocmApi, filter.and(subscriptionLabelFilter()))) {
    if (isSubscriptionLabel(label)) {
      yield label;
    }
  }
}

export async function* getOrganizationLabels(
  ocmApi: OCMApi,
  filter: Filter
): AsyncGenerator<OCMOrganizationLabel, void, undefined> {
  for await (const label of getLabels(ocmApi, filter.and(organizationLabelFilter()))) {
    if (isOrganizationLabel(label)) {
      yield label;
    }
  }
}

/**
 * Organization labels matching `filter`, grouped by organization id.
 * Organizations without matching labels are absent from the result.
 */
export async function getOrgLabels(
  ocmApi: OCMApi,
  orgIds: Iterable<string>,
  filter?: Filter | null,
  chunkSize = 100
): Promise<Map<string, LabelContainer<OCMOrganizationLabel>>> {
  const ids = new Set(orgIds);
  const grouped = new Map<string, OCMOrganizationLabel[]>();
  if (ids.size === 0) {
    return new Map();
  }
  const chunks = new Filter().isIn("organization_id", ids).and(filter).chunkBy("organization_id", chunkSize);
  for (const chunk of chunks) {
    for await (const label of getOrganizationLabels(ocmApi, chunk)) {
      const labels = grouped.get(label.organizationId) ?? [];
      labels.push(label);
      grouped.set(label.organizationId, labels);
    }
  }
  return new Map([...grouped].map(([orgId, labels]) => [orgId, new LabelContainer(labels)]));
}

// ───────────────────────────────────────────────────────────────────────────────
// Writes
// ───────────────────────────────────────────────────────────────────────────────

export function organizationLabelsHref(orgId: string): string {
  return `/api/accounts_mgmt/v1/organizations/${orgId}/labels`;
}

export function subscriptionLabelsHref(subscriptionHref: string): string {
  return `${subscriptionHref}/labels`;
}

export async function addLabel(ocmApi: OCMApi, href: string, key: string, value: string): Promise<void> {
  await ocmApi.post(href, { kind: "Label", key, value });
}

export async function updateLabel(ocmApi: OCMApi, href: string, key: string, value: string): Promise<void> {
  await ocmApi.patch(`${href}/${key}`, { kind: "Label", key, value });
}

export async function deleteLabel(ocmApi: OCMApi, href: string, key: string): Promise<void> {
  await ocmApi.delete(`${href}/${key}`);
}

/**
 * Write side of label reconciliation for one OCM environment.
 */
export interface LabelStore {
  addLabel(href: string, key: string, value: string): Promise<void>;
  updateLabel(href: string, key: string, value: string): Promise<void>;
  deleteLabel(href: string, key: string): Promise<void>;
}

export function createOCMLabelStore(ocmApi: OCMApi): LabelStore {
  return {
    addLabel: (href, key, value) => addLabel(ocmApi, href, key, value),
    updateLabel: (href, key, value) => updateLabel(ocmApi, href, key, value),
    deleteLabel: (href, key) => deleteLabel(ocmApi, href, key),
  };
}
