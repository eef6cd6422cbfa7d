/**
 * Bundle: the atomic unit carried end-to-end by store-and-forward
 */

import type { RandomSource } from '../utils/random.js';

export interface Bundle {
  readonly id: string; // Unique bundle ID (for buffer deduplication)
  readonly source: string;
  readonly destination: string;
  readonly payload: Uint8Array;
  readonly createdAt: number; // ms
  readonly size: number; // payload bytes
  readonly expiresAt?: number; // ms
}

export interface BundleOptions {
  id?: string;
  createdAt?: number;
  ttlMs?: number;
  random?: RandomSource;
}

/**
 * Generate a bundle ID from the creation time and a random suffix
 */
function generateBundleId(createdAt: number, random?: RandomSource): string {
  const draw = random ? random.next() : Math.random();
  return `bndl_${createdAt}_${draw.toString(36).substring(2, 11)}`;
}

export function encodePayload(payload: string | Uint8Array): Uint8Array {
  return typeof payload === 'string' ? new TextEncoder().encode(payload) : payload;
}

export function createBundle(
  source: string,
  destination: string,
  payload: string | Uint8Array,
  options: BundleOptions = {}
): Bundle {
  const createdAt = options.createdAt ?? Date.now();
  const bytes = encodePayload(payload);

  const bundle: Bundle = {
    id: options.id ?? generateBundleId(createdAt, options.random),
    source,
    destination,
    payload: bytes,
    createdAt,
    size: bytes.byteLength,
    ...(options.ttlMs !== undefined ? { expiresAt: createdAt + options.ttlMs } : {}),
  };
  return Object.freeze(bundle);
}

export function isExpired(bundle: Bundle, now: number): boolean {
  return bundle.expiresAt !== undefined && now >= bundle.expiresAt;
}
