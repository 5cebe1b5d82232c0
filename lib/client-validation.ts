/**
 * Client Shape Validation
 *
 * Services accept `unknown` clients (an Octokit instance, a test double)
 * and check the methods they call before narrowing to their own
 * client interface.
 */

export interface ValidationCheck {
  /** Dot-notation path to check (e.g., "rest.orgs") */
  path: string;
  /** Method names that must be functions at this path */
  requiredMethods?: string[];
}

function isObjectLike(value: unknown): value is Record<string, unknown> {
  // Octokit namespaces can be functions carrying properties
  return (typeof value === "object" || typeof value === "function") && value !== null;
}

function resolvePath(root: unknown, path: string): Record<string, unknown> | null {
  let current: unknown = root;
  for (const part of path.split(".")) {
    if (!isObjectLike(current)) {
      return null;
    }
    current = current[part];
  }
  return isObjectLike(current) ? current : null;
}

/**
 * Validate that an object satisfies all specified checks.
 *
 * @example
 * ```typescript
 * validateClient(octokit, [
 *   { path: "rest.orgs", requiredMethods: ["listMembers"] },
 *   { path: "paginate", requiredMethods: ["iterator"] },
 * ]);
 * ```
 */
export function validateClient(obj: unknown, checks: ValidationCheck[]): boolean {
  if (typeof obj !== "object" || obj === null) {
    return false;
  }

  return checks.every((check) => {
    const target = resolvePath(obj, check.path);
    if (!target) {
      return false;
    }
    return (check.requiredMethods ?? []).every((method) => typeof target[method] === "function");
  });
}

/**
 * `paginate` is a function with an `iterator` property on current Octokit
 * releases and a plain object on older ones; both are accepted.
 */
export function hasPaginateIterator(obj: unknown): boolean {
  return validateClient(obj, [{ path: "paginate", requiredMethods: ["iterator"] }]);
}

export const GITHUB_ORG_CLIENT_CHECKS: ValidationCheck[] = [
  {
    path: "rest.orgs",
    requiredMethods: ["listMembers", "listPendingInvitations", "setMembershipForUser", "removeMembershipForUser"],
  },
  {
    path: "rest.teams",
    requiredMethods: [
      "list",
      "listMembersInOrg",
      "listPendingInvitationsInOrg",
      "create",
      "addOrUpdateMembershipForUserInOrg",
      "removeMembershipForUserInOrg",
    ],
  },
];
