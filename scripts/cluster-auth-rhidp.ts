/**
 * Cluster Auth RHIDP
 *
 * Scheduled publication of cluster RHIDP auth settings as OCM subscription
 * labels.
 */

import { ClusterAuthRhidpIntegration } from "../lib/integrations/cluster-auth-rhidp.js";
import { runIfMain, runIntegration } from "./shared/run-integration.js";

export async function main(): Promise<void> {
  await runIntegration(new ClusterAuthRhidpIntegration());
}

runIfMain(import.meta.url, main);
