/**
 * Id generation helpers
 */

import { randomUUID } from 'crypto';

/**
 * Generate a UUID v4 string
 */
export function generateUUID(): string {
  return randomUUID();
}

/**
 * Short opaque id for queue items (first 8 hex chars of a UUID).
 * Callers that need uniqueness within a collection check for collisions themselves.
 */
export function generateShortId(): string {
  return generateUUID().replace(/-/g, '').slice(0, 8);
}
