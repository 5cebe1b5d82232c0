/**
 * GitHub Org Membership
 *
 * Scheduled reconciliation of GitHub organization and team membership
 * against app-interface roles.
 */

import { GithubOrgIntegration } from "../lib/integrations/github-org.js";
import { runIfMain, runIntegration } from "./shared/run-integration.js";

export async function main(): Promise<void> {
  await runIntegration(new GithubOrgIntegration());
}

runIfMain(import.meta.url, main);
