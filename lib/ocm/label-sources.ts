/**
 * Label Owners and Label State
 *
 * A label owner is an OCM object that carries labels: a cluster
 * subscription or an organization. Owners are identified by environment,
 * organization and (for clusters) cluster id; their display name and label
 * container href do not take part in identity.
 */

export type Labels = Record<string, string>;

export class MissingLabelContainerHrefError extends Error {
  constructor() {
    super("href missing, should not be called in this state");
    this.name = "MissingLabelContainerHrefError";
  }
}

abstract class LabelOwnerBase {
  constructor(
    readonly orgId: string,
    readonly ocmEnv: string,
    readonly name: string,
    readonly labelContainerHref: string | null
  ) {}

  /** Key under which the owner is stored in a LabelState */
  abstract get identity(): string;

  /** Log fields naming the owner */
  abstract identityLabels(): string[];

  requiredLabelContainerHref(): string {
    if (!this.labelContainerHref) {
      throw new MissingLabelContainerHrefError();
    }
    return this.labelContainerHref;
  }
}

export class ClusterRef extends LabelOwnerBase {
  readonly kind = "cluster";
  readonly clusterId: string;

  constructor(init: { clusterId: string; orgId: string; ocmEnv: string; name: string; labelContainerHref: string | null }) {
    super(init.orgId, init.ocmEnv, init.name, init.labelContainerHref);
    this.clusterId = init.clusterId;
  }

  get identity(): string {
    return JSON.stringify(["cluster", this.ocmEnv, this.orgId, this.clusterId]);
  }

  identityLabels(): string[] {
    return [`ocm_env=${this.ocmEnv}`, `org_id=${this.orgId}`, `cluster=${this.name}`];
  }
}

export class OrgRef extends LabelOwnerBase {
  readonly kind = "org";

  constructor(init: { orgId: string; ocmEnv: string; name: string; labelContainerHref: string | null }) {
    super(init.orgId, init.ocmEnv, init.name, init.labelContainerHref);
  }

  get identity(): string {
    return JSON.stringify(["org", this.ocmEnv, this.orgId]);
  }

  identityLabels(): string[] {
    return [`ocm_env=${this.ocmEnv}`, `org_id=${this.orgId}`, `org_name=${this.name}`];
  }
}

export type LabelOwnerRef = ClusterRef | OrgRef;

/**
 * Labels per owner, keyed by owner identity. Setting an owner that is
 * already present keeps the first ref and replaces its labels.
 */
export class LabelState implements Iterable<[LabelOwnerRef, Labels]> {
  private readonly entries = new Map<string, { owner: LabelOwnerRef; labels: Labels }>();

  constructor(init: Iterable<[LabelOwnerRef, Labels]> = []) {
    for (const [owner, labels] of init) {
      this.set(owner, labels);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  has(owner: LabelOwnerRef): boolean {
    return this.entries.has(owner.identity);
  }

  get(owner: LabelOwnerRef): Labels | undefined {
    return this.entries.get(owner.identity)?.labels;
  }

  set(owner: LabelOwnerRef, labels: Labels): this {
    const existing = this.entries.get(owner.identity);
    this.entries.set(owner.identity, { owner: existing?.owner ?? owner, labels: { ...labels } });
    return this;
  }

  owners(): LabelOwnerRef[] {
    return [...this.entries.values()].map((entry) => entry.owner);
  }

  /** Plain form for hashing and logging, ordered by owner identity */
  toJSON(): Array<{ owner: string[]; labels: Labels }> {
    return [...this.entries.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([, { owner, labels }]) => ({ owner: owner.identityLabels(), labels }));
  }

  *[Symbol.iterator](): Iterator<[LabelOwnerRef, Labels]> {
    for (const { owner, labels } of this.entries.values()) {
      yield [owner, labels];
    }
  }
}

/**
 * Produces desired labels for a set of owners from configuration. Only keys
 * under the source's managed prefixes are its business; other keys on the
 * same owners belong to someone else.
 */
export interface LabelSource {
  readonly name: string;
  managedLabelPrefixes(): string[];
  getLabels(): LabelState;
}

export class ManagedLabelPrefixConflictError extends Error {
  constructor(
    readonly prefix: string,
    readonly source: string
  ) {
    super(`Label prefix '${prefix}' from ${source} is already managed by another label source`);
    this.name = "ManagedLabelPrefixConflictError";
  }
}

/**
 * Normalise a label prefix so it only matches whole key segments.
 */
export function normalizeLabelPrefix(prefix: string): string {
  return prefix.endsWith(".") ? prefix : `${prefix}.`;
}

function underPrefix(key: string, prefix: string): boolean {
  return key.startsWith(prefix) || `${key}.` === prefix;
}

/**
 * The segment of `key` directly below `parentPrefix`, if any.
 * `nextSegment("a.b", "a.b.c.d")` is `"c"`.
 */
export function nextSegment(parentPrefix: string, key: string): string | undefined {
  const parent = normalizeLabelPrefix(parentPrefix);
  if (!key.startsWith(parent)) {
    return undefined;
  }
  return key.slice(parent.length).split(".")[0] || undefined;
}

/**
 * Prefixes one level below each parent prefix that the given label sets
 * actually use. Labels `sre-capabilities.dtp.tenant` under the parent
 * `sre-capabilities` yield `sre-capabilities.dtp`; sibling segments stay
 * unmanaged.
 */
export function deriveManagedPrefixes(parentPrefixes: Iterable<string>, labelSets: Iterable<Readonly<Labels>>): string[] {
  const keys = [...labelSets].flatMap((labels) => Object.keys(labels));
  const managed = new Set<string>();
  for (const parentPrefix of parentPrefixes) {
    const parent = parentPrefix.endsWith(".") ? parentPrefix.slice(0, -1) : parentPrefix;
    for (const key of keys) {
      const segment = nextSegment(parent, key);
      if (segment) {
        managed.add(`${parent}.${segment}`);
      }
    }
  }
  return [...managed].sort();
}

/**
 * Union of the managed prefixes of all sources.
 *
 * @throws ManagedLabelPrefixConflictError when a prefix of one source equals
 *   or contains a prefix of another
 */
export function managedLabelPrefixesFromSources(sources: readonly LabelSource[]): string[] {
  const claimed = new Set<string>();
  for (const source of sources) {
    const own = new Set(source.managedLabelPrefixes().map(normalizeLabelPrefix));
    for (const prefix of own) {
      for (const other of claimed) {
        if (prefix.startsWith(other) || other.startsWith(prefix)) {
          throw new ManagedLabelPrefixConflictError(prefix.slice(0, -1), source.name);
        }
      }
    }
    own.forEach((prefix) => claimed.add(prefix));
  }
  return [...claimed].map((prefix) => prefix.slice(0, -1));
}

/**
 * Keep only keys under one of `managedPrefixes`. A key equal to a prefix
 * counts as under it.
 */
export function filterManagedLabels(labels: Readonly<Labels>, managedPrefixes: readonly string[]): Labels {
  const normalized = managedPrefixes.map(normalizeLabelPrefix);
  const filtered: Labels = {};
  for (const [key, value] of Object.entries(labels)) {
    if (normalized.some((prefix) => underPrefix(key, prefix))) {
      filtered[key] = value;
    }
  }
  return filtered;
}
