/**
 * OCM Subscription Labels
 *
 * Scheduled sync of organization and cluster subscription labels from
 * app-interface to OCM.
 */

import { OcmSubscriptionLabelsIntegration } from "../lib/integrations/ocm-subscription-labels.js";
import { runIfMain, runIntegration } from "./shared/run-integration.js";

export async function main(): Promise<void> {
  await runIntegration(new OcmSubscriptionLabelsIntegration());
}

runIfMain(import.meta.url, main);
