/**
 * Date Expressions
 *
 * Filters accept either a Date or a textual expression that is resolved
 * when the filter renders: ISO-8601 timestamps, "now", "today",
 * "yesterday", "tomorrow", "<n> <unit>(s) ago" and "in <n> <unit>(s)".
 */

import moment from "moment";

export type DateInput = Date | string;

const UNITS = ["second", "minute", "hour", "day", "week", "month", "year"] as const;
type Unit = (typeof UNITS)[number];

const RELATIVE_PATTERN = /^(?:(in)\s+)?(\d+|an?)\s+([a-z]+?)s?(?:\s+(ago))?$/;

export class InvalidDateExpressionError extends Error {
  constructor(readonly expression: string) {
    super(`Invalid date expression: '${expression}'`);
    this.name = "InvalidDateExpressionError";
  }
}

function isUnit(value: string): value is Unit {
  return UNITS.some((unit) => unit === value);
}

function parseRelative(expression: string, now: moment.Moment): moment.Moment | null {
  const match = RELATIVE_PATTERN.exec(expression);
  if (!match) {
    return null;
  }
  const [, future, amountText, unit, past] = match;
  // exactly one direction
  if (Boolean(future) === Boolean(past) || !isUnit(unit)) {
    return null;
  }
  const amount = amountText === "a" || amountText === "an" ? 1 : parseInt(amountText, 10);
  return future ? now.clone().add(amount, unit) : now.clone().subtract(amount, unit);
}

/**
 * Resolve a date input to a UTC moment relative to `now`.
 *
 * @throws InvalidDateExpressionError for unparseable expressions
 */
export function resolveDate(input: DateInput, now: Date = new Date()): moment.Moment {
  if (input instanceof Date) {
    const resolved = moment.utc(input);
    if (!resolved.isValid()) {
      throw new InvalidDateExpressionError(String(input));
    }
    return resolved;
  }

  const expression = input.trim().toLowerCase();
  const reference = moment.utc(now);

  switch (expression) {
    case "now":
      return reference;
    case "today":
      return reference.startOf("day");
    case "yesterday":
      return reference.startOf("day").subtract(1, "day");
    case "tomorrow":
      return reference.startOf("day").add(1, "day");
  }

  const relative = parseRelative(expression, reference);
  if (relative) {
    return relative;
  }

  const absolute = moment.utc(input.trim(), moment.ISO_8601, true);
  if (absolute.isValid()) {
    return absolute;
  }

  throw new InvalidDateExpressionError(input);
}

/**
 * Render a resolved date the way the OCM search language expects it.
 */
export function formatSearchDate(value: moment.Moment): string {
  return value.clone().utc().format("YYYY-MM-DDTHH:mm:ssZ");
}
