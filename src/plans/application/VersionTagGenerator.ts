// src/plans/application/VersionTagGenerator.ts

import { createHash } from 'crypto';

import type { JsonValue } from '../domain/PlanDocument';

/**
 * Canonical serialization of a plan: JSON.stringify in the document's own key order.
 * Key order is significant, so the same fields in a different order are different content.
 * These are also the bytes stored under the `data` field.
 */
export function serializePlan(plan: JsonValue): string {
  return JSON.stringify(plan);
}

/**
 * Version tag (ETag) for serialized plan bytes.
 *
 * Format: base64url SHA-256 digest without padding (43 characters).
 */
export function createVersionTagFromSerialized(serialized: string): string {
  return createHash('sha256').update(serialized, 'utf8').digest('base64url');
}

export function createVersionTag(plan: JsonValue): string {
  return createVersionTagFromSerialized(serializePlan(plan));
}

/**
 * True when any client-supplied tag names the current version.
 * `*` matches whatever version currently exists.
 */
export function matchesVersionTag(currentTag: string, clientTags: readonly string[]): boolean {
  return clientTags.some((tag) => tag === '*' || tag === currentTag);
}
