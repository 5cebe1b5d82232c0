/**
 * Library exports
 *
 * Central export point for the reconcile library.
 */

// Diff engine
export { AggregatedList, AggregatedDiffRunner, DIFF_BUCKETS, ParamsNotFoundError, UnknownDiffBucketError } from "./aggregated-list.js";
export type { AggregatedParams, AggregatedElement, AggregatedDiff, DiffBucket, DiffAction } from "./aggregated-list.js";
export { diffMappings, sameMapping } from "./differ.js";
export type { MappingDiff, ChangedValue } from "./differ.js";
export { canonicalJson, hashDesiredState } from "./state-hash.js";
export type { JsonValue } from "./state-hash.js";

// Ambient
export { createLogger, formatAction, logger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
export { loadRuntimeConfig, CONFIG_BOUNDS } from "./config.js";
export type { RuntimeConfig } from "./config.js";
export { ConfigurationError, getDesiredStateSource, validateEnv } from "./env-validation.js";
export type { DesiredStateSource } from "./env-validation.js";
export { EnvSecretReader, secretEnvVarName } from "./secret-reader.js";
export type { SecretReader, SecretRef } from "./secret-reader.js";
export { isTransientError } from "./transient-error.js";
export { withRetry } from "./retry.js";
export type { RetryConfig } from "./retry.js";

// Desired state
export { createQueryFunction, QueryError } from "./app-interface/query-function.js";
export type { QueryFunction } from "./app-interface/query-function.js";
export {
  queryClusters,
  queryOcmOrganizations,
  queryOcmEnvironments,
  queryRoles,
  queryGithubOrgs,
  integrationIsEnabled,
} from "./app-interface/queries.js";
export { flattenLabelTree } from "./app-interface/schemas.js";
export type { Cluster, OCMEnvironment, OCMOrganization, Role, GithubOrg, VaultSecret } from "./app-interface/schemas.js";

// OCM
export { Filter, orFilter, InvalidFilterError, InvalidChunkRequest } from "./ocm/search-filters.js";
export { OCMBaseClient, PaginationLimitError, initOCMBaseClient, initOCMApis } from "./ocm/base-client.js";
export type { OCMApi, OCMApis } from "./ocm/base-client.js";
export {
  LabelContainer,
  buildLabelContainer,
  buildContainerForPrefix,
  getOrgLabels,
  createOCMLabelStore,
  UnknownLabelTypeError,
} from "./ocm/labels.js";
export type { LabelStore } from "./ocm/labels.js";
export { getSubscriptions, buildSubscriptionFilter } from "./ocm/subscriptions.js";
export {
  ClusterDetails,
  discoverClustersByLabels,
  discoverClustersForOrganizations,
  discoverClustersForSubscriptions,
  getClusterDetailsForSubscriptions,
} from "./ocm/clusters.js";
export {
  ClusterRef,
  OrgRef,
  LabelState,
  ManagedLabelPrefixConflictError,
  MissingLabelContainerHrefError,
  deriveManagedPrefixes,
  filterManagedLabels,
  managedLabelPrefixesFromSources,
} from "./ocm/label-sources.js";
export { getOrganizations } from "./ocm/organizations.js";
export type { LabelOwnerRef, LabelSource, Labels } from "./ocm/label-sources.js";
export { computeLabelOperations, reconcileLabels } from "./ocm/label-reconciler.js";
export type { LabelOperation } from "./ocm/label-reconciler.js";

// GitHub
export { GithubOrgService, createGithubOrgService } from "./github-org.js";
export type { GithubOrgClient, OrgState, TeamState } from "./github-org.js";

// Integrations
export type { Integration, IntegrationContext } from "./integrations/types.js";
export { OcmSubscriptionLabelsIntegration, ManagedLabelConflictError } from "./integrations/ocm-subscription-labels.js";
export { ClusterAuthRhidpIntegration } from "./integrations/cluster-auth-rhidp.js";
export { GithubOrgIntegration, OrgMismatchError, DiffActionError } from "./integrations/github-org.js";

// RHIDP
export {
  RHIDP_NAMESPACE_LABEL_KEY,
  StatusValue,
  discoverClusters as discoverRhidpClusters,
  clusterVaultSecret,
  clusterVaultSecretId,
} from "./rhidp/common.js";
