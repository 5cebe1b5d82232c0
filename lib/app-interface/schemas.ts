/**
 * Desired-State Schemas
 *
 * Zod schemas for the app-interface records the integrations consume.
 * Documents are validated at the boundary; everything downstream works
 * with the inferred types.
 */

import { z } from "zod";

// ───────────────────────────────────────────────────────────────────────────────
// Shared
// ───────────────────────────────────────────────────────────────────────────────

export const VaultSecretSchema = z.object({
  path: z.string().min(1),
  field: z.string().min(1),
  version: z.number().int().nullish(),
});

export type VaultSecret = z.infer<typeof VaultSecretSchema>;

/** Nested label definition; leaves are scalars, flattened to dotted keys later. */
export type LabelTree = string | number | boolean | { [key: string]: LabelTree };

export const LabelTreeSchema: z.ZodType<LabelTree> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.record(LabelTreeSchema)])
);

const LabelRecordSchema = z.record(LabelTreeSchema);

/**
 * Flatten nested labels to dotted keys with string values.
 *
 * `{ "sre-capabilities": { dtp: { tenant: "a" } } }` → `{ "sre-capabilities.dtp.tenant": "a" }`
 */
export function flattenLabelTree(tree: Readonly<Record<string, LabelTree>>, prefix = ""): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, value] of Object.entries(tree)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (typeof value === "object") {
      Object.assign(flat, flattenLabelTree(value, path));
    } else {
      flat[path] = String(value);
    }
  }
  return flat;
}

/**
 * Label fields arrive either as objects (bundle files) or as JSON-encoded
 * strings (GraphQL `JSON` scalars). Missing means no labels.
 */
export const LabelsFieldSchema = z
  .union([z.string(), LabelRecordSchema])
  .nullish()
  .transform((value, ctx): Record<string, LabelTree> => {
    if (value === null || value === undefined) {
      return {};
    }
    if (typeof value !== "string") {
      return value;
    }
    let decoded: unknown;
    try {
      decoded = JSON.parse(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `labels are not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      });
      return z.NEVER;
    }
    const parsed = LabelRecordSchema.safeParse(decoded);
    if (!parsed.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "labels must be a JSON object" });
      return z.NEVER;
    }
    return parsed.data;
  });

export const DisableSchema = z.object({
  integrations: z.array(z.string()).nullish(),
});

// ───────────────────────────────────────────────────────────────────────────────
// OCM
// ───────────────────────────────────────────────────────────────────────────────

export const OCMEnvironmentSchema = z.object({
  name: z.string(),
  url: z.string().url(),
  accessTokenClientId: z.string(),
  accessTokenUrl: z.string().url(),
  accessTokenClientSecret: VaultSecretSchema,
});

export type OCMEnvironment = z.infer<typeof OCMEnvironmentSchema>;

export const OCMOrganizationSchema = z.object({
  name: z.string(),
  orgId: z.string(),
  environment: z.object({ name: z.string() }),
  ocmOrganizationLabels: LabelsFieldSchema,
});

export type OCMOrganization = z.infer<typeof OCMOrganizationSchema>;

// ───────────────────────────────────────────────────────────────────────────────
// Clusters
// ───────────────────────────────────────────────────────────────────────────────

export const ClusterAuthSchema = z.object({
  service: z.string(),
  name: z.string().nullish(),
  status: z.string().nullish(),
  issuer: z.string().nullish(),
});

export type ClusterAuth = z.infer<typeof ClusterAuthSchema>;

export const ClusterSchema = z.object({
  name: z.string(),
  ocm: z
    .object({
      name: z.string().nullish(),
      orgId: z.string(),
      environment: z.object({ name: z.string() }),
    })
    .nullish(),
  spec: z.object({ id: z.string().nullish() }).nullish(),
  disable: DisableSchema.nullish(),
  ocmSubscriptionLabels: LabelsFieldSchema,
  auth: z
    .array(ClusterAuthSchema)
    .nullish()
    .transform((auth) => auth ?? []),
});

export type Cluster = z.infer<typeof ClusterSchema>;

// ───────────────────────────────────────────────────────────────────────────────
// GitHub
// ───────────────────────────────────────────────────────────────────────────────

export const GithubOrgSchema = z.object({
  name: z.string(),
  token: VaultSecretSchema,
});

export type GithubOrg = z.infer<typeof GithubOrgSchema>;

const RoleMemberSchema = z.object({
  githubUsername: z.string().nullish(),
});

export const PermissionSchema = z.object({
  service: z.string(),
  org: z.string().nullish(),
  team: z.string().nullish(),
});

export type Permission = z.infer<typeof PermissionSchema>;

export const RoleSchema = z.object({
  name: z.string(),
  users: z.array(RoleMemberSchema).nullish().transform((users) => users ?? []),
  bots: z.array(RoleMemberSchema).nullish().transform((bots) => bots ?? []),
  permissions: z.array(PermissionSchema).nullish().transform((permissions) => permissions ?? []),
});

export type Role = z.infer<typeof RoleSchema>;
