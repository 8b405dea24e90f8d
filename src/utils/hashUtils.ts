import crypto from 'crypto';
import type { FeatureProperties } from '../types/Observation';

/**
 * Stable JSON for hashing: object keys sorted at every depth
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, nested: unknown) => {
    if (nested && typeof nested === 'object' && !Array.isArray(nested)) {
      return Object.fromEntries(
        Object.entries(nested).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      );
    }
    return nested;
  });
}

/**
 * Generate a SHA-256 hash of a value's canonical JSON form
 */
export function generateHash(value: unknown): string {
  return crypto.createHash('sha256').update(canonicalJson(value) ?? 'null').digest('hex');
}

/**
 * Station key for a record that carries neither a station field nor a feature id.
 * Hashes the complete property map so distinct stations do not collide on a shared prefix.
 */
export function generateStationKey(properties: FeatureProperties): string {
  return `unknown_${generateHash(properties).slice(0, 16)}`;
}
