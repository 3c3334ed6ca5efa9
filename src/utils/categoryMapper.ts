/**
 * Category mapping: turns the free-text labels of the CSV exports into ranks,
 * glyphs and colours.
 *
 * Lookups never throw. A label outside the known set resolves to the map's
 * fallback, and the optional onUnmapped hook is told about it so the run can
 * report data quality problems without aborting.
 */

import type { CategoryMap } from '../types';
import { UnmappedLabelWarning } from './errorUtils';

export type UnmappedHandler = (warning: UnmappedLabelWarning) => void;

/**
 * Build an immutable category map. Entry order is preserved and is the order
 * series are emitted in when a map drives a chart legend.
 */
export function createCategoryMap<V>(
  name: string,
  entries: Iterable<readonly [string, V]>,
  fallback: V
): CategoryMap<V> {
  const map = new Map<string, V>();
  for (const [label, value] of entries) {
    map.set(label, value);
  }
  return Object.freeze({
    name,
    entries: map,
    fallback,
  });
}

export function isMappedLabel<V>(map: CategoryMap<V>, label: string | undefined): label is string {
  return label !== undefined && map.entries.has(label.trim());
}

export function lookupCategory<V>(
  map: CategoryMap<V>,
  label: string | undefined,
  onUnmapped?: UnmappedHandler
): V {
  const key = label?.trim() ?? '';
  const value = map.entries.get(key);
  if (value !== undefined) {
    return value;
  }
  if (onUnmapped) {
    const fallback = map.fallback === undefined ? 'no value' : `"${String(map.fallback)}"`;
    onUnmapped(new UnmappedLabelWarning(map.name, key, fallback));
  }
  return map.fallback;
}

/**
 * Numeric lookup. Unknown labels give undefined, the one missing-value marker
 * used throughout the pipeline; callers must not coerce it to zero.
 */
export function lookupRank(
  map: CategoryMap<number | undefined>,
  label: string | undefined,
  onUnmapped?: UnmappedHandler
): number | undefined {
  return lookupCategory(map, label, onUnmapped);
}

export function labelsOf<V>(map: CategoryMap<V>): string[] {
  return Array.from(map.entries.keys());
}
