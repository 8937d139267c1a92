import { createHash } from 'node:crypto';
import type { Digests } from '../types/checksum.js';

export interface DigestResult {
  digests: Digests;
  bytes: number;
}

/** Feeds one pass over the content into md5 and sha512 together. */
export async function computeDigests(source: AsyncIterable<Uint8Array>): Promise<DigestResult> {
  const md5 = createHash('md5');
  const sha512 = createHash('sha512');
  let bytes = 0;
  for await (const chunk of source) {
    md5.update(chunk);
    sha512.update(chunk);
    bytes += chunk.length;
  }
  return { digests: { md5: md5.digest('hex'), sha512: sha512.digest('hex') }, bytes };
}
