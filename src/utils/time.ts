import type { EpochSeconds } from '../types/ids.js';

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export interface Clock {
  /** Current time in milliseconds since the epoch. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now()
};

export function fixedClock(ms: number): Clock {
  return { now: () => ms };
}

export function toEpochSeconds(ms: number): EpochSeconds {
  return Math.floor(ms / 1000);
}

/** `18-Oct-2026`, always UTC so output does not depend on the host zone. */
export function formatDateStr(seconds: EpochSeconds): string {
  const date = new Date(seconds * 1000);
  const day = date.getUTCDate().toString().padStart(2, '0');
  return `${day}-${MONTHS[date.getUTCMonth()]}-${date.getUTCFullYear()}`;
}

export function formatRfc822(seconds: EpochSeconds): string {
  return new Date(seconds * 1000).toUTCString();
}
