/**
 * Cache key derivation.
 *
 * Keys have the form `<kind>:<hash>` where the hash is the first 16 hex
 * characters of a SHA-256 digest over the canonicalized parameters.
 */

import { createHash } from 'crypto';
import type { Coordinates } from '../types/index.js';

export type OperationKind = 'geocode' | 'reverse' | 'route';

const KEY_SEPARATOR = ':';
const KEY_HASH_LENGTH = 16;
const COORDINATE_DIGITS = 6;

export function canonicalizeAddress(address: string): string {
  return address.trim().toLowerCase();
}

/**
 * Fixed-precision rendering. Values that print the same share a key,
 * including a negative value that rounds to zero.
 */
export function canonicalizeCoordinate(value: number): string {
  const fixed = value.toFixed(COORDINATE_DIGITS);
  return Number(fixed) === 0 ? (0).toFixed(COORDINATE_DIGITS) : fixed;
}

export function deriveKey(kind: OperationKind, ...parameters: string[]): string {
  const combined = parameters.join(KEY_SEPARATOR);
  const hash = createHash('sha256')
    .update(combined)
    .digest('hex')
    .slice(0, KEY_HASH_LENGTH);
  return `${kind}${KEY_SEPARATOR}${hash}`;
}

export function geocodeKey(address: string): string {
  return deriveKey('geocode', canonicalizeAddress(address));
}

export function reverseGeocodeKey(coordinates: Coordinates): string {
  return deriveKey(
    'reverse',
    canonicalizeCoordinate(coordinates.lat),
    canonicalizeCoordinate(coordinates.lng)
  );
}

export function routeKey(from: Coordinates, to: Coordinates): string {
  return deriveKey(
    'route',
    canonicalizeCoordinate(from.lat),
    canonicalizeCoordinate(from.lng),
    canonicalizeCoordinate(to.lat),
    canonicalizeCoordinate(to.lng)
  );
}
