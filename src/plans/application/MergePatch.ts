// src/plans/application/MergePatch.ts

/**
 * Merge-patch engine for partial plan updates.
 *
 * Unlike RFC 7396, arrays are not replaced: a patch array is unioned into the
 * stored array, and `null` is stored as a value rather than deleting the field.
 *
 * For every (key, value) of the patch:
 * - object: merged recursively into an existing object, otherwise copied in
 * - array:  elements not already present (structural equality) are appended
 *           in patch order, otherwise copied in
 * - scalar or null: assigned
 */

import cloneDeep from 'lodash/cloneDeep';
import isEqual from 'lodash/isEqual';

import type { JsonObject, JsonValue } from '../domain/PlanDocument';

/**
 * Apply `patch` onto a copy of `base`. `base` is left untouched.
 */
export function mergePlanPatch(base: JsonObject, patch: JsonObject): JsonObject {
  const merged = cloneDeep(base);
  mergeInto(merged, patch);
  return merged;
}

/**
 * Deep structural equality; object key order is ignored.
 */
export function plansEqual(a: JsonValue, b: JsonValue): boolean {
  return isEqual(a, b);
}

function mergeInto(target: JsonObject, patch: JsonObject): void {
  for (const [key, patchValue] of Object.entries(patch)) {
    const current = Object.prototype.hasOwnProperty.call(target, key) ? target[key] : undefined;

    if (isPlainObject(patchValue)) {
      if (current !== undefined && isPlainObject(current)) {
        mergeInto(current, patchValue);
      } else {
        setOwn(target, key, cloneDeep(patchValue));
      }
    } else if (Array.isArray(patchValue)) {
      if (Array.isArray(current)) {
        unionInto(current, patchValue);
      } else {
        setOwn(target, key, cloneDeep(patchValue));
      }
    } else {
      setOwn(target, key, patchValue);
    }
  }
}

function unionInto(target: JsonValue[], additions: JsonValue[]): void {
  for (const item of additions) {
    if (!target.some((existing) => isEqual(existing, item))) {
      target.push(cloneDeep(item));
    }
  }
}

// Plain assignment of "__proto__" would replace the prototype instead of adding a field.
function setOwn(target: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(target, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

function isPlainObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
