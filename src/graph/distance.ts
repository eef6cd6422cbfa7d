/**
 * Tagged link distances: "<value> km" for near links, "<value> M km" for
 * deep-space links
 */

import { ConfigError } from '../core/errors.js';

export type DistanceClass = 'near' | 'deep';

export interface LinkDistance {
  class: DistanceClass;
  km: number;
}

const KM_PER_MEGA_KM = 1_000_000;

const DISTANCE_PATTERN = /^\s*(\d+(?:\.\d+)?)\s*(M\s*)?km\s*$/;

export function parseDistance(raw: string, field = 'distance'): LinkDistance {
  const match = DISTANCE_PATTERN.exec(raw);
  if (!match || match[1] === undefined) {
    throw new ConfigError(field, `expected "<value> km" or "<value> M km", got "${raw}"`);
  }

  const value = Number(match[1]);
  if (match[2] !== undefined) {
    return { class: 'deep', km: value * KM_PER_MEGA_KM };
  }
  return { class: 'near', km: value };
}

export function formatDistance(distance: LinkDistance): string {
  if (distance.class === 'deep') {
    return `${distance.km / KM_PER_MEGA_KM} M km`;
  }
  return `${distance.km} km`;
}
