import { randomBytes } from 'node:crypto';

/**
 * Generate a URL-safe random ID of the given byte length (default 16 bytes -> 22 chars base64url).
 */
export function generateId(bytes = 16): string {
  return randomBytes(bytes).toString('base64url');
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Build identifier: `build-YYYYMMDD-HHMMSS-<suffix>` in UTC.
 * The suffix keeps two builds started in the same second apart.
 */
export function generateBuildId(now: Date = new Date(), suffix: string = generateId(6).slice(0, 6)): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `build-${date}-${time}-${suffix}`;
}
