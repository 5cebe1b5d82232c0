/**
 * GitHub Organization Membership
 *
 * Reads and writes organization and team membership for one GitHub
 * organization. Pending invitations count as members so that invited users
 * are not invited again on the next run.
 */

import pLimit, { type LimitFunction } from "p-limit";
import { GITHUB_ORG_CLIENT_CHECKS, hasPaginateIterator, validateClient } from "./client-validation.js";
import { CONFIG_BOUNDS } from "./config.js";

interface Member {
  login: string;
}

interface Invitation {
  login: string | null;
}

interface Team {
  id: number;
  name: string;
  slug: string;
}

interface OrgParams {
  org: string;
  per_page?: number;
  page?: number;
}

interface TeamParams extends OrgParams {
  team_slug: string;
}

export interface GithubOrgClient {
  rest: {
    orgs: {
      listMembers: (params: OrgParams) => Promise<{ data: Member[] }>;
      listPendingInvitations: (params: OrgParams) => Promise<{ data: Invitation[] }>;
      setMembershipForUser: (params: { org: string; username: string; role?: "admin" | "member" }) => Promise<unknown>;
      removeMembershipForUser: (params: { org: string; username: string }) => Promise<unknown>;
    };
    teams: {
      list: (params: OrgParams) => Promise<{ data: Team[] }>;
      listMembersInOrg: (params: TeamParams) => Promise<{ data: Member[] }>;
      listPendingInvitationsInOrg: (params: TeamParams) => Promise<{ data: Invitation[] }>;
      create: (params: { org: string; name: string }) => Promise<{ data: Team }>;
      addOrUpdateMembershipForUserInOrg: (params: {
        org: string;
        team_slug: string;
        username: string;
      }) => Promise<unknown>;
      removeMembershipForUserInOrg: (params: { org: string; team_slug: string; username: string }) => Promise<unknown>;
    };
  };
  paginate: {
    iterator: <T>(method: unknown, params: unknown) => AsyncIterable<{ data: T[] }>;
  };
}

function isValidGithubOrgClient(obj: unknown): obj is GithubOrgClient {
  return validateClient(obj, GITHUB_ORG_CLIENT_CHECKS) && hasPaginateIterator(obj);
}

export interface GithubOrgServiceOptions {
  /** Listing requests in flight at once */
  concurrency?: number;
}

export function createGithubOrgService(octokit: unknown, options: GithubOrgServiceOptions = {}): GithubOrgService {
  if (!isValidGithubOrgClient(octokit)) {
    throw new Error(
      "Invalid GitHub client: expected an Octokit-like object with orgs membership, teams membership and paginate.iterator methods"
    );
  }
  return new GithubOrgService(octokit, options);
}

export interface TeamState {
  name: string;
  slug: string;
  members: string[];
}

export interface OrgState {
  org: string;
  members: string[];
  teams: TeamState[];
}

export class GithubOrgService {
  private readonly limit: LimitFunction;

  constructor(
    private client: GithubOrgClient,
    { concurrency = CONFIG_BOUNDS.githubConcurrency.default }: GithubOrgServiceOptions = {}
  ) {
    this.limit = pLimit(concurrency);
  }

  /**
   * Members and pending invitations of the organization and of each team.
   * Teams are read concurrently, at most `concurrency` listings at a time.
   */
  async fetchOrgState(org: string): Promise<OrgState> {
    const [members, invited, teams] = await Promise.all([
      this.collect<Member>(this.client.rest.orgs.listMembers, { org, per_page: 100 }),
      this.collect<Invitation>(this.client.rest.orgs.listPendingInvitations, { org, per_page: 100 }),
      this.collect<Team>(this.client.rest.teams.list, { org, per_page: 100 }),
    ]);

    const teamStates = await Promise.all(
      teams.map(async (team): Promise<TeamState> => {
        const params: TeamParams = { org, team_slug: team.slug, per_page: 100 };
        const [teamMembers, teamInvited] = await Promise.all([
          this.collect<Member>(this.client.rest.teams.listMembersInOrg, params),
          this.collect<Invitation>(this.client.rest.teams.listPendingInvitationsInOrg, params),
        ]);
        return { name: team.name, slug: team.slug, members: logins(teamMembers, teamInvited) };
      })
    );

    return { org, members: logins(members, invited), teams: teamStates };
  }

  /** Create a team and return its slug */
  async createTeam(org: string, name: string): Promise<string> {
    const { data } = await this.client.rest.teams.create({ org, name });
    return data.slug;
  }

  async addOrgMember(org: string, username: string): Promise<void> {
    await this.client.rest.orgs.setMembershipForUser({ org, username, role: "member" });
  }

  async removeOrgMember(org: string, username: string): Promise<void> {
    await this.client.rest.orgs.removeMembershipForUser({ org, username });
  }

  async addTeamMember(org: string, teamSlug: string, username: string): Promise<void> {
    await this.client.rest.teams.addOrUpdateMembershipForUserInOrg({ org, team_slug: teamSlug, username });
  }

  async removeTeamMember(org: string, teamSlug: string, username: string): Promise<void> {
    await this.client.rest.teams.removeMembershipForUserInOrg({ org, team_slug: teamSlug, username });
  }

  private collect<T>(method: unknown, params: OrgParams): Promise<T[]> {
    return this.limit(async () => {
      const collected: T[] = [];
      for await (const { data } of this.client.paginate.iterator<T>(method, params)) {
        collected.push(...data);
      }
      return collected;
    });
  }
}

function logins(members: readonly Member[], invitations: readonly Invitation[]): string[] {
  const names = members.map((member) => member.login);
  for (const invitation of invitations) {
    if (invitation.login) {
      names.push(invitation.login);
    }
  }
  return names;
}
