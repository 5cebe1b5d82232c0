/**
 * OCM Search Filters
 *
 * Immutable builder for the `search` parameter of OCM list endpoints.
 * Every builder method returns a new filter; conditions on the same field
 * merge. AND conditions render sorted by field name so equivalent filters
 * produce identical strings; OR branches keep the order they were added in.
 *
 * @example
 * ```typescript
 * new Filter().eq("managed", "true").isIn("product.id", ["osd", "rosa"]).render();
 * // "managed='true' and product.id in ('osd','rosa')"
 * ```
 */

import { InvalidDateExpressionError, formatSearchDate, resolveDate, type DateInput } from "../dates.js";

export type FilterValue = string | number | boolean;

/** Value of a membership or pattern condition */
type ListValue = string | number;

export class InvalidFilterError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InvalidFilterError";
  }
}

export class InvalidChunkRequest extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidChunkRequest";
  }
}

function quote(value: ListValue): string {
  return `'${String(value).replace(/'/g, "''")}'`;
}

/** Numbers sort numerically and before strings */
function compareListValues(a: ListValue, b: ListValue): number {
  if (typeof a === "number" && typeof b === "number") {
    return a - b;
  }
  if (typeof a !== typeof b) {
    return typeof a === "number" ? -1 : 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function uniqueSorted(values: Iterable<ListValue>): ListValue[] {
  const byText = new Map<string, ListValue>();
  for (const value of values) {
    if (!byText.has(String(value))) {
      byText.set(String(value), value);
    }
  }
  return [...byText.values()].sort(compareListValues);
}

// ───────────────────────────────────────────────────────────────────────────────
// Conditions
// ───────────────────────────────────────────────────────────────────────────────

abstract class FilterCondition {
  /** Field name, or a unique symbol for conditions that never merge */
  constructor(readonly key: string | symbol) {}

  abstract render(now: Date): string;

  abstract mergeWith(other: FilterCondition): FilterCondition;

  /** Position among AND siblings */
  sortKey(_now: Date): string {
    return this.key.toString();
  }
}

abstract class ListCondition extends FilterCondition {
  declare readonly key: string;
  readonly values: readonly ListValue[];

  constructor(key: string, values: Iterable<ListValue>) {
    super(key);
    this.values = uniqueSorted(values);
  }

  abstract withValues(values: readonly ListValue[]): ListCondition;

  mergeWith(other: FilterCondition): FilterCondition {
    if (!(other instanceof ListCondition) || Object.getPrototypeOf(other) !== Object.getPrototypeOf(this)) {
      throw new InvalidFilterError(`cannot merge conditions of different kinds on '${this.key}'`);
    }
    return this.withValues([...this.values, ...other.values]);
  }
}

class EqCondition extends ListCondition {
  withValues(values: readonly ListValue[]): EqCondition {
    return new EqCondition(this.key, values);
  }

  render(): string {
    if (this.values.length === 1) {
      return `${this.key}=${quote(this.values[0])}`;
    }
    return `${this.key} in (${this.values.map(quote).join(",")})`;
  }
}

class LikeCondition extends ListCondition {
  withValues(values: readonly ListValue[]): LikeCondition {
    return new LikeCondition(this.key, values);
  }

  render(): string {
    const patterns = this.values.map((value) => `${this.key} like ${quote(value)}`);
    return patterns.length === 1 ? patterns[0] : `(${patterns.join(" or ")})`;
  }
}

class DateRangeCondition extends FilterCondition {
  declare readonly key: string;

  constructor(
    key: string,
    readonly start: DateInput | undefined,
    readonly end: DateInput | undefined
  ) {
    super(key);
  }

  mergeWith(other: FilterCondition): FilterCondition {
    // a lone lower bound and a lone upper bound combine into one range
    if (other instanceof DateRangeCondition) {
      if (this.start === undefined && other.end === undefined && this.end !== undefined && other.start !== undefined) {
        return new DateRangeCondition(this.key, other.start, this.end);
      }
      if (this.end === undefined && other.start === undefined && this.start !== undefined && other.end !== undefined) {
        return new DateRangeCondition(this.key, this.start, other.end);
      }
    }
    throw new InvalidFilterError(`cannot merge date range on '${this.key}'`);
  }

  render(now: Date): string {
    const start = this.start === undefined ? undefined : resolve(this.start, now);
    const end = this.end === undefined ? undefined : resolve(this.end, now);
    if (!start && !end) {
      throw new InvalidFilterError("A date range must have at least one bound.");
    }
    if (start && end && end.isBefore(start)) {
      throw new InvalidFilterError(
        `Invalid date range: start=${formatSearchDate(start)} end=${formatSearchDate(end)}`
      );
    }
    const parts: string[] = [];
    if (start) {
      parts.push(`${this.key} >= ${quote(formatSearchDate(start))}`);
    }
    if (end) {
      parts.push(`${this.key} <= ${quote(formatSearchDate(end))}`);
    }
    return parts.join(" and ");
  }
}

function resolve(input: DateInput, now: Date) {
  try {
    return resolveDate(input, now);
  } catch (error) {
    if (error instanceof InvalidDateExpressionError) {
      throw new InvalidFilterError(`Invalid relative date: ${error.expression}`, { cause: error });
    }
    throw error;
  }
}

/**
 * A nested filter inside another one (an OR group inside an AND chain or
 * a multi-condition AND branch inside an OR). Groups never merge.
 */
class GroupCondition extends FilterCondition {
  constructor(readonly filter: Filter) {
    super(Symbol("group"));
  }

  mergeWith(): FilterCondition {
    throw new InvalidFilterError("nested filter groups cannot be merged");
  }

  sortKey(now: Date): string {
    return this.render(now);
  }

  render(now: Date): string {
    const rendered = this.filter.render(now);
    // AND branches of an OR group keep their own parentheses
    return this.filter.mode === "and" && this.filter.conditions.length > 1 ? `(${rendered})` : rendered;
  }
}

// ───────────────────────────────────────────────────────────────────────────────
// Filter
// ───────────────────────────────────────────────────────────────────────────────

export type FilterMode = "and" | "or";

export class Filter {
  constructor(
    readonly conditions: readonly FilterCondition[] = [],
    readonly mode: FilterMode = "and"
  ) {}

  get isEmpty(): boolean {
    return this.conditions.length === 0;
  }

  conditionByKey(key: string | symbol): FilterCondition | undefined {
    return this.conditions.find((condition) => condition.key === key);
  }

  /** Values of a membership condition, or undefined when there is none. */
  valuesOf(key: string): readonly ListValue[] | undefined {
    const condition = this.conditionByKey(key);
    return condition instanceof ListCondition ? condition.values : undefined;
  }

  private withOverride(condition: FilterCondition): Filter {
    return new Filter(
      [...this.conditions.filter((existing) => existing.key !== condition.key), condition],
      this.mode
    );
  }

  private addCondition(condition: FilterCondition): Filter {
    const existing = this.conditionByKey(condition.key);
    if (!existing) {
      return new Filter([...this.conditions, condition], this.mode);
    }
    return this.withOverride(existing.mergeWith(condition));
  }

  /**
   * Require `key` to equal `value`. Falsy values (null, undefined, "", 0,
   * false) are ignored; use `isIn` to match them.
   */
  eq(key: string, value: FilterValue | null | undefined): Filter {
    if (!value) {
      return this;
    }
    return this.isIn(key, [value]);
  }

  /**
   * Require `key` to match the `%`-wildcard pattern.
   */
  like(key: string, pattern: string | null | undefined): Filter {
    if (!pattern) {
      return this;
    }
    return this.addCondition(new LikeCondition(key, [pattern]));
  }

  /**
   * Require `key` to be one of `values`. Absent or empty collections are ignored.
   */
  isIn(key: string, values: Iterable<FilterValue> | null | undefined): Filter {
    if (!values) {
      return this;
    }
    const list = Array.from(values, (value) => (typeof value === "boolean" ? String(value) : value));
    if (list.length === 0) {
      return this;
    }
    return this.addCondition(new EqCondition(key, list));
  }

  /** Inclusive upper bound */
  before(key: string, date: DateInput | null | undefined): Filter {
    if (!date) {
      return this;
    }
    return this.addCondition(new DateRangeCondition(key, undefined, date));
  }

  /** Inclusive lower bound */
  after(key: string, date: DateInput | null | undefined): Filter {
    if (!date) {
      return this;
    }
    return this.addCondition(new DateRangeCondition(key, date, undefined));
  }

  between(key: string, start: DateInput | null | undefined, end: DateInput | null | undefined): Filter {
    return this.addCondition(new DateRangeCondition(key, start || undefined, end || undefined));
  }

  /**
   * Split a membership condition into filters of at most `chunkSize` values,
   * keeping every other condition.
   *
   * @throws InvalidChunkRequest when `key` has no membership condition and
   * `ignoreMissing` is false
   */
  chunkBy(key: string, chunkSize: number, ignoreMissing = false): Filter[] {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new InvalidChunkRequest(`chunk size must be a positive integer, got ${chunkSize}`);
    }
    const condition = this.conditionByKey(key);
    if (condition instanceof ListCondition) {
      const chunks: Filter[] = [];
      for (let start = 0; start < condition.values.length; start += chunkSize) {
        chunks.push(this.withOverride(condition.withValues(condition.values.slice(start, start + chunkSize))));
      }
      return chunks;
    }
    if (ignoreMissing) {
      return [this];
    }
    throw new InvalidChunkRequest(`cannot chunk by ${key} because it is not a list condition`);
  }

  /**
   * Logical AND. Conditions on shared fields merge under the usual rules.
   */
  and(other: Filter | null | undefined): Filter {
    if (!other) {
      return this;
    }
    let combined = new Filter();
    for (const condition of [...this.asAndOperands(), ...other.asAndOperands()]) {
      combined = combined.addCondition(condition);
    }
    return combined;
  }

  /**
   * Logical OR. Empty filters are dropped; the OR of a single non-empty
   * filter is that filter.
   */
  or(other: Filter | null | undefined): Filter {
    if (!other || other.isEmpty) {
      return this;
    }
    if (this.isEmpty) {
      return other;
    }
    return new Filter([...this.asOrBranches(), ...other.asOrBranches()], "or");
  }

  private asAndOperands(): readonly FilterCondition[] {
    return this.mode === "or" ? [new GroupCondition(this)] : this.conditions;
  }

  private asOrBranches(): readonly FilterCondition[] {
    if (this.mode === "or" || this.conditions.length === 1) {
      return this.conditions;
    }
    return [new GroupCondition(this)];
  }

  /**
   * Render the filter for the `search` query parameter. Relative dates are
   * resolved against `now`.
   *
   * @throws InvalidFilterError for an empty filter or an invalid date range
   */
  render(now: Date = new Date()): string {
    if (this.isEmpty) {
      throw new InvalidFilterError("no conditions within filter object");
    }
    if (this.mode === "or") {
      const branches = this.conditions.map((condition) => condition.render(now));
      return branches.length > 1 ? `(${branches.join(" or ")})` : branches[0];
    }
    return this.conditions
      .map((condition) => ({ sortKey: condition.sortKey(now), rendered: condition.render(now) }))
      .sort((a, b) => (a.sortKey < b.sortKey ? -1 : a.sortKey > b.sortKey ? 1 : 0))
      .map((entry) => entry.rendered)
      .join(" and ");
  }

  toString(): string {
    return this.render();
  }

  /** Filters are equal when they render identically. */
  equals(other: Filter): boolean {
    return this.render() === other.render();
  }
}

/**
 * OR of all given filters, dropping empty ones.
 */
export function orFilter(...filters: Array<Filter | null | undefined>): Filter {
  return filters.reduce<Filter>((combined, filter) => combined.or(filter), new Filter());
}
