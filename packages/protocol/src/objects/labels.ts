// Label-set helpers
//
// Derived objects are associated with their Grant by label set alone, so the
// comparisons here decide what cleanup can find.

import type { Labels } from '../types/common.js';

/**
 * Whether `labels` contains every key/value pair of `selector`.
 * This is Kubernetes equality-based selector semantics; an empty selector matches everything.
 */
export function matchesSelector(labels: Labels, selector: Labels): boolean {
  return Object.entries(selector).every(([key, value]) => labels[key] === value);
}

/**
 * Whether two label sets hold exactly the same pairs.
 */
export function labelsEqual(a: Labels, b: Labels): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}

/**
 * Render a label set as a `key=value,...` selector string, keys sorted.
 */
export function formatLabelSelector(selector: Labels): string {
  return Object.keys(selector)
    .sort()
    .map((key) => `${key}=${selector[key]}`)
    .join(',');
}

/**
 * Copy a label set so callers cannot mutate the source.
 */
export function cloneLabels(labels: Labels): Labels {
  return { ...labels };
}
