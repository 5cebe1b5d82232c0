/**
 * GitHub Org Integration
 *
 * Converges GitHub organization and team membership to the roles in
 * app-interface. A `github-org-team` permission also grants membership of
 * the team's organization.
 *
 * Organizations are never created or deleted; a team that disappears from
 * the desired state is emptied but kept.
 */

import { Octokit } from "octokit";
import pLimit from "p-limit";
import { AggregatedDiffRunner, AggregatedList } from "../aggregated-list.js";
import { queryGithubOrgs, queryRoles } from "../app-interface/queries.js";
import type { Role } from "../app-interface/schemas.js";
import { createGithubOrgService, type GithubOrgService, type OrgState } from "../github-org.js";
import { formatAction, type Logger } from "../logger.js";
import type { Integration, IntegrationContext } from "./types.js";

export const GITHUB_ORG = "github-org";

export type OrgMembershipParams = { service: "github-org"; org: string };
export type TeamMembershipParams = { service: "github-org-team"; org: string; team: string };
export type GithubOrgParams = OrgMembershipParams | TeamMembershipParams;

export type GithubOrgState = AggregatedList<GithubOrgParams, string>;

export class OrgMismatchError extends Error {
  constructor(
    readonly currentOrgs: string[],
    readonly desiredOrgs: string[]
  ) {
    super(`Current orgs don't match desired orgs: current=[${currentOrgs.join(",")}] desired=[${desiredOrgs.join(",")}]`);
    this.name = "OrgMismatchError";
  }
}

export class DiffActionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DiffActionError";
  }
}

function isOrgParams(params: GithubOrgParams): params is OrgMembershipParams {
  return params.service === "github-org";
}

function isTeamParams(params: GithubOrgParams): params is TeamMembershipParams {
  return params.service === "github-org-team";
}

// ───────────────────────────────────────────────────────────────────────────────
// State
// ───────────────────────────────────────────────────────────────────────────────

export function fetchDesiredState(roles: readonly Role[]): GithubOrgState {
  const state: GithubOrgState = new AggregatedList();
  for (const role of roles) {
    const members = [...role.users, ...role.bots].flatMap((member) =>
      member.githubUsername ? [member.githubUsername] : []
    );
    for (const permission of role.permissions) {
      if (!permission.org) {
        continue;
      }
      if (permission.service === "github-org") {
        state.add({ service: "github-org", org: permission.org }, members);
      } else if (permission.service === "github-org-team" && permission.team) {
        state.add({ service: "github-org-team", org: permission.org, team: permission.team }, members);
        state.add({ service: "github-org", org: permission.org }, members);
      }
    }
  }
  return state;
}

export function buildCurrentState(orgs: readonly OrgState[]): GithubOrgState {
  const state: GithubOrgState = new AggregatedList();
  for (const org of orgs) {
    state.add({ service: "github-org", org: org.org }, org.members);
    for (const team of org.teams) {
      state.add({ service: "github-org-team", org: org.org, team: team.name }, team.members);
    }
  }
  return state;
}

function orgsOf(state: GithubOrgState): string[] {
  return [...new Set(state.dump().map((element) => element.params.org))].sort();
}

/**
 * @throws OrgMismatchError when the two states cover different organizations
 */
export function assertSameOrgs(current: GithubOrgState, desired: GithubOrgState): void {
  const currentOrgs = orgsOf(current);
  const desiredOrgs = orgsOf(desired);
  if (currentOrgs.join("\n") !== desiredOrgs.join("\n")) {
    throw new OrgMismatchError(currentOrgs, desiredOrgs);
  }
}

// ───────────────────────────────────────────────────────────────────────────────
// Actions
// ───────────────────────────────────────────────────────────────────────────────

export interface MemberFailure {
  action: string;
  org: string;
  team?: string;
  member: string;
  error: Error;
}

/**
 * Applies diff elements to the GitHub organizations. Member-level failures
 * are collected so one bad login does not stop the run.
 */
export class GithubOrgActions {
  readonly failures: MemberFailure[] = [];

  constructor(
    private readonly services: ReadonlyMap<string, GithubOrgService>,
    private readonly teamSlugs: Map<string, Map<string, string>>,
    private readonly dryRun: boolean,
    private readonly logger: Logger
  ) {}

  private service(org: string): GithubOrgService {
    const service = this.services.get(org);
    if (!service) {
      throw new Error(`no GitHub client for organization ${org}`);
    }
    return service;
  }

  private teamSlug(org: string, team: string): string {
    const slug = this.teamSlugs.get(org)?.get(team);
    if (!slug) {
      throw new Error(`unknown team ${team} in organization ${org}`);
    }
    return slug;
  }

  private async eachMember(
    action: string,
    params: GithubOrgParams,
    members: readonly string[],
    apply: (member: string) => Promise<void>
  ): Promise<void> {
    const team = isTeamParams(params) ? params.team : undefined;
    for (const member of members) {
      this.logger.info(formatAction(action, member, params.org, ...(team ? [team] : [])));
      if (this.dryRun) {
        continue;
      }
      try {
        await apply(member);
      } catch (error) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error(`Failed to ${action} ${member} in ${params.org}`, err);
        this.failures.push({ action, org: params.org, team, member, error: err });
      }
    }
  }

  addOrgTeam = async (params: TeamMembershipParams): Promise<void> => {
    this.logger.info(formatAction("add_org_team", params.org, params.team));
    if (this.dryRun) {
      return;
    }
    const slug = await this.service(params.org).createTeam(params.org, params.team);
    const slugs = this.teamSlugs.get(params.org) ?? new Map<string, string>();
    slugs.set(params.team, slug);
    this.teamSlugs.set(params.org, slugs);
  };

  addUsersOrgTeam = (params: TeamMembershipParams, members: string[]): Promise<void> =>
    this.eachMember("add_to_org_team", params, members, (member) =>
      this.service(params.org).addTeamMember(params.org, this.teamSlug(params.org, params.team), member)
    );

  delUsersOrgTeam = (params: TeamMembershipParams, members: string[]): Promise<void> =>
    this.eachMember("del_from_org_team", params, members, (member) =>
      this.service(params.org).removeTeamMember(params.org, this.teamSlug(params.org, params.team), member)
    );

  addUsersOrg = (params: OrgMembershipParams, members: string[]): Promise<void> =>
    this.eachMember("add_to_org", params, members, (member) => this.service(params.org).addOrgMember(params.org, member));

  delUsersOrg = (params: OrgMembershipParams, members: string[]): Promise<void> =>
    this.eachMember("del_from_org", params, members, (member) =>
      this.service(params.org).removeOrgMember(params.org, member)
    );
}

function raiseDiffActionError(message: string): () => never {
  return () => {
    throw new DiffActionError(message);
  };
}

export function registerActions(runner: AggregatedDiffRunner<GithubOrgParams, string>, actions: GithubOrgActions): void {
  runner.registerFor("insert", isOrgParams, raiseDiffActionError("Cannot create a Github Org"));
  runner.registerFor("insert", isTeamParams, actions.addOrgTeam);
  runner.registerFor("insert", isTeamParams, actions.addUsersOrgTeam);

  runner.registerFor("delete", isOrgParams, raiseDiffActionError("Cannot delete a Github Org"));
  runner.registerFor("delete", isTeamParams, actions.delUsersOrgTeam);

  runner.registerFor("update-insert", isOrgParams, actions.addUsersOrg);
  runner.registerFor("update-insert", isTeamParams, actions.addUsersOrgTeam);

  runner.registerFor("update-delete", isOrgParams, actions.delUsersOrg);
  runner.registerFor("update-delete", isTeamParams, actions.delUsersOrgTeam);
}

// ───────────────────────────────────────────────────────────────────────────────
// Integration
// ───────────────────────────────────────────────────────────────────────────────

/** Builds a GitHub client authenticated with an organization token */
export type GithubClientFactory = (token: string) => unknown;

const defaultClientFactory: GithubClientFactory = (token) => new Octokit({ auth: token });

export class GithubOrgIntegration implements Integration {
  readonly name = GITHUB_ORG;

  constructor(private readonly createClient: GithubClientFactory = defaultClientFactory) {}

  async getEarlyExitDesiredState(ctx: IntegrationContext): Promise<unknown> {
    return fetchDesiredState(await queryRoles(ctx.query)).sortedDump();
  }

  async run(ctx: IntegrationContext): Promise<void> {
    const [orgs, roles] = await Promise.all([queryGithubOrgs(ctx.query), queryRoles(ctx.query)]);

    const concurrency = ctx.config.githubConcurrency;
    const services = new Map<string, GithubOrgService>();
    for (const org of orgs) {
      const token = await ctx.secretReader.readSecret(org.token);
      services.set(org.name, createGithubOrgService(this.createClient(token), { concurrency }));
    }

    const limit = pLimit(concurrency);
    const orgStates = await Promise.all(
      [...services].map(([org, service]) => limit(() => service.fetchOrgState(org)))
    );
    const teamSlugs = new Map(
      orgStates.map((state) => [state.org, new Map(state.teams.map((team) => [team.name, team.slug]))])
    );

    const current = buildCurrentState(orgStates);
    const desired = fetchDesiredState(roles);
    assertSameOrgs(current, desired);

    const actions = new GithubOrgActions(services, teamSlugs, ctx.config.dryRun, ctx.logger);
    const runner = new AggregatedDiffRunner(current.diff(desired));
    registerActions(runner, actions);
    await runner.run();

    if (actions.failures.length > 0) {
      throw new Error(`${actions.failures.length} membership change(s) failed`);
    }
  }
}
