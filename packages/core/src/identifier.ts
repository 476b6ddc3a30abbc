/**
 * Annotation identifiers.
 *
 * Every annotation request gets its own version-4 UUID, even when two
 * requests carry identical content. Uniqueness is per instance.
 */

import { randomUUID } from "node:crypto";

const UUID_V4_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

/**
 * Generate a fresh random identifier in 8-4-4-4-12 hex form.
 */
export function generateAnnotationId(): string {
  return randomUUID();
}

/**
 * Check that a value is a lowercase version-4 UUID with the RFC 4122 variant.
 */
export function isAnnotationId(value: string): boolean {
  return UUID_V4_PATTERN.test(value);
}
