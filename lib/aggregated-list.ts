/**
 * Aggregated List
 *
 * Groups desired or current items by a parameter record (for example
 * `{ service: "github-org-team", org, team }` → member logins) and diffs two
 * such lists into insert/delete/update buckets. `AggregatedDiffRunner`
 * dispatches each bucket element to the registered actions.
 */

import { canonicalJson, hashDesiredState, type JsonValue } from "./state-hash.js";

export type AggregatedParams = { [key: string]: JsonValue };

export interface AggregatedElement<P extends AggregatedParams, I extends JsonValue> {
  params: P;
  items: I[];
}

export const DIFF_BUCKETS = ["insert", "delete", "update-insert", "update-delete"] as const;

export type DiffBucket = (typeof DIFF_BUCKETS)[number];

export type AggregatedDiff<P extends AggregatedParams, I extends JsonValue> = Record<
  DiffBucket,
  AggregatedElement<P, I>[]
>;

export class ParamsNotFoundError extends Error {
  constructor(readonly paramsHash: string) {
    super(`no element with params hash ${paramsHash}`);
    this.name = "ParamsNotFoundError";
  }
}

export class UnknownDiffBucketError extends Error {
  constructor(bucket: string) {
    super(`unknown diff bucket '${bucket}', expected one of ${DIFF_BUCKETS.join(", ")}`);
    this.name = "UnknownDiffBucketError";
  }
}

function itemKey(item: JsonValue): string {
  return canonicalJson(item);
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function missingFrom<I extends JsonValue>(items: readonly I[], other: readonly I[]): I[] {
  const otherKeys = new Set(other.map(itemKey));
  return items.filter((item) => !otherKeys.has(itemKey(item)));
}

export class AggregatedList<P extends AggregatedParams, I extends JsonValue> {
  private readonly elements = new Map<string, AggregatedElement<P, I>>();

  /** Stable digest of a params record; the element key. */
  static hashParams(params: AggregatedParams): string {
    return hashDesiredState(params);
  }

  /**
   * Add items under `params`, creating the element when needed. Items
   * already present (by value) are skipped.
   */
  add(params: P, items: Iterable<I>): this {
    const key = AggregatedList.hashParams(params);
    let element = this.elements.get(key);
    if (!element) {
      element = { params, items: [] };
      this.elements.set(key, element);
    }
    const seen = new Set(element.items.map(itemKey));
    for (const item of items) {
      const id = itemKey(item);
      if (!seen.has(id)) {
        seen.add(id);
        element.items.push(item);
      }
    }
    return this;
  }

  get(params: AggregatedParams): AggregatedElement<P, I> {
    return this.getByParamsHash(AggregatedList.hashParams(params));
  }

  getByParamsHash(paramsHash: string): AggregatedElement<P, I> {
    const element = this.elements.get(paramsHash);
    if (!element) {
      throw new ParamsNotFoundError(paramsHash);
    }
    return { params: element.params, items: [...element.items] };
  }

  has(params: AggregatedParams): boolean {
    return this.elements.has(AggregatedList.hashParams(params));
  }

  get size(): number {
    return this.elements.size;
  }

  dump(): AggregatedElement<P, I>[] {
    return [...this.elements.values()].map((element) => ({
      params: element.params,
      items: [...element.items],
    }));
  }

  /**
   * `dump()` ordered by params hash, with items in canonical order. Equal
   * lists give equal results whatever order they were built in.
   */
  sortedDump(): AggregatedElement<P, I>[] {
    return [...this.elements.entries()]
      .sort(([a], [b]) => compareStrings(a, b))
      .map(([, element]) => ({
        params: element.params,
        items: [...element.items].sort((x, y) => compareStrings(itemKey(x), itemKey(y))),
      }));
  }

  /**
   * Diff this (current) list against `right` (desired).
   *
   * Update buckets carry the params of this side; elements whose items
   * differ only in one direction appear in one update bucket.
   */
  diff(right: AggregatedList<P, I>): AggregatedDiff<P, I> {
    const result: AggregatedDiff<P, I> = {
      insert: [],
      delete: [],
      "update-insert": [],
      "update-delete": [],
    };

    for (const [key, element] of right.elements) {
      if (!this.elements.has(key)) {
        result.insert.push({ params: element.params, items: [...element.items] });
      }
    }

    for (const [key, left] of this.elements) {
      const other = right.elements.get(key);
      if (!other) {
        result.delete.push({ params: left.params, items: [...left.items] });
        continue;
      }
      const added = missingFrom(other.items, left.items);
      if (added.length > 0) {
        result["update-insert"].push({ params: left.params, items: added });
      }
      const removed = missingFrom(left.items, other.items);
      if (removed.length > 0) {
        result["update-delete"].push({ params: left.params, items: removed });
      }
    }

    return result;
  }
}

// ───────────────────────────────────────────────────────────────────────────────
// Diff Runner
// ───────────────────────────────────────────────────────────────────────────────

export type DiffAction<P, I> = (params: P, items: I[]) => void | Promise<void>;

interface DiffHandler<P, I> {
  on: DiffBucket;
  action: DiffAction<P, I>;
  cond: (params: P) => boolean;
}

function isDiffBucket(value: string): value is DiffBucket {
  return DIFF_BUCKETS.some((bucket) => bucket === value);
}

export class AggregatedDiffRunner<P extends AggregatedParams, I extends JsonValue> {
  private readonly handlers: DiffHandler<P, I>[] = [];

  constructor(private readonly diff: AggregatedDiff<P, I>) {}

  /**
   * Register an action for every element of `on` whose params satisfy `cond`.
   *
   * @throws UnknownDiffBucketError for a bucket outside the four diff buckets
   */
  register(on: DiffBucket, action: DiffAction<P, I>, cond: (params: P) => boolean = () => true): void {
    if (!isDiffBucket(on)) {
      throw new UnknownDiffBucketError(on);
    }
    this.handlers.push({ on, action, cond });
  }

  /**
   * Register an action for the params narrowed by a type guard.
   */
  registerFor<Q extends P>(on: DiffBucket, guard: (params: P) => params is Q, action: DiffAction<Q, I>): void {
    this.register(
      on,
      (params, items) => (guard(params) ? action(params, items) : undefined),
      guard
    );
  }

  /**
   * Invoke handlers in registration order. Errors thrown by actions propagate.
   */
  async run(): Promise<void> {
    for (const handler of this.handlers) {
      for (const element of this.diff[handler.on]) {
        if (handler.cond(element.params)) {
          await handler.action(element.params, element.items);
        }
      }
    }
  }
}
