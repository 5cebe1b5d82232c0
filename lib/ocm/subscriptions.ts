/**
 * OCM Subscriptions
 *
 * Subscription lookup in the accounts management API. Subscriptions carry
 * the cluster's subscription labels and capabilities.
 */

import type { OCMApi } from "./base-client.js";
import { Filter } from "./search-filters.js";
import { SubscriptionSchema, type OCMSubscription, type OCMSubscriptionStatus } from "./types.js";

export const SUBSCRIPTIONS_API_PATH = "/api/accounts_mgmt/v1/subscriptions";

/** Subscription states considered by cluster discovery */
export const ACTIVE_SUBSCRIPTION_STATES: readonly OCMSubscriptionStatus[] = ["Active"];

export interface SubscriptionFilterOptions {
  states?: Iterable<OCMSubscriptionStatus>;
  managed?: boolean;
}

export function buildSubscriptionFilter({ states, managed }: SubscriptionFilterOptions = {}): Filter {
  return new Filter().isIn("status", states).eq("managed", managed === undefined ? undefined : String(managed));
}

/**
 * Subscriptions matching `filter` keyed by id, labels and capabilities included.
 * An id membership condition is queried in chunks of `chunkSize`.
 */
export async function getSubscriptions(
  ocmApi: OCMApi,
  filter: Filter,
  chunkSize = 100
): Promise<Map<string, OCMSubscription>> {
  const subscriptions = new Map<string, OCMSubscription>();
  for (const chunk of filter.chunkBy("id", chunkSize, true)) {
    const items = ocmApi.getPaginated(SUBSCRIPTIONS_API_PATH, {
      search: chunk.render(),
      fetchLabels: "true",
      fetchCapabilities: "true",
    });
    for await (const item of items) {
      const subscription = SubscriptionSchema.parse(item);
      subscriptions.set(subscription.id, subscription);
    }
  }
  return subscriptions;
}
