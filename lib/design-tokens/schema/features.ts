/**
 * Structural scans shared by the detector and the validator.
 * All of them walk the whole document, objects and arrays alike.
 */

import { isTokenNode } from '../types';

function children(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (isTokenNode(value)) return Object.values(value);
  return [];
}

/** True when a key named `featureName` appears at any depth. */
export function hasFeature(data: unknown, featureName: string): boolean {
  if (isTokenNode(data) && Object.prototype.hasOwnProperty.call(data, featureName)) {
    return true;
  }
  return children(data).some((child) => hasFeature(child, featureName));
}

/** A `$type: "color"` token whose `$value` is an object with `colorSpace` (2025.10 form). */
export function hasStructuredColorObjects(data: unknown): boolean {
  if (isTokenNode(data) && data.$type === 'color') {
    const value = data.$value;
    if (isTokenNode(value) && 'colorSpace' in value) return true;
  }
  return children(data).some(hasStructuredColorObjects);
}

/** A `$type: "color"` token whose `$value` is a non-empty string (draft form). */
export function hasStringColorValues(data: unknown): boolean {
  if (isTokenNode(data) && data.$type === 'color') {
    const value = data.$value;
    if (typeof value === 'string' && value !== '') return true;
  }
  return children(data).some(hasStringColorValues);
}
