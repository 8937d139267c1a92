import { createHash } from 'node:crypto';

const BASE36 = '0123456789abcdefghijklmnopqrstuvwxyz';

export function sha512HexUtf8(value: string): string {
  return createHash('sha512').update(value, 'utf8').digest('hex');
}

/**
 * Ten-character base-36 id from the first 48 bits of sha512(value).
 * The same scheme names zip contents on the unbox service, so it doubles as
 * an anchor id for names that cannot appear raw in an id attribute.
 */
export function shortHash(value: string): string {
  let n = Number.parseInt(sha512HexUtf8(value).slice(0, 12), 16);
  let out = '';
  while (n > 0) {
    out = BASE36[n % 36] + out;
    n = Math.floor(n / 36);
  }
  return out.padStart(10, '0');
}
