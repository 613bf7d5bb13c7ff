/**
 * Random identifiers for sessions and players.
 */

import { randomUUID } from 'node:crypto';

/**
 * Generates a random UUID v4.
 */
export function generateUUID(): string {
  return randomUUID();
}
