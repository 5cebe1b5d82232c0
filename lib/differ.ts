/**
 * Mapping Diff
 *
 * Three-way comparison of two string-keyed records, used for label sets.
 */

export interface ChangedValue<V> {
  current: V;
  desired: V;
}

export interface MappingDiff<V> {
  /** keys only in desired */
  add: Record<string, V>;
  /** keys only in current */
  delete: Record<string, V>;
  /** keys in both with different values */
  change: Record<string, ChangedValue<V>>;
  /** keys in both with equal values */
  identical: Record<string, V>;
}

export function diffMappings<V>(
  current: Readonly<Record<string, V>>,
  desired: Readonly<Record<string, V>>,
  equal: (a: V, b: V) => boolean = (a, b) => a === b
): MappingDiff<V> {
  const diff: MappingDiff<V> = { add: {}, delete: {}, change: {}, identical: {} };

  for (const key of Object.keys(desired).sort()) {
    if (!Object.hasOwn(current, key)) {
      diff.add[key] = desired[key];
    } else if (equal(current[key], desired[key])) {
      diff.identical[key] = desired[key];
    } else {
      diff.change[key] = { current: current[key], desired: desired[key] };
    }
  }

  for (const key of Object.keys(current).sort()) {
    if (!Object.hasOwn(desired, key)) {
      diff.delete[key] = current[key];
    }
  }

  return diff;
}

export function sameMapping<V>(a: Readonly<Record<string, V>>, b: Readonly<Record<string, V>>): boolean {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every((key) => Object.hasOwn(b, key) && a[key] === b[key]);
}
