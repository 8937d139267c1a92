import type { ArchivePath } from '../types/ids.js';

/** RFC 3986 unreserved characters; everything else is percent-encoded. */
const UNRESERVED = /^[A-Za-z0-9\-._~]$/;

const encoder = new TextEncoder();

/** Percent-encodes one segment byte by byte with uppercase hex. */
export function encodePathSegment(segment: string): string {
  let out = '';
  for (const ch of segment) {
    if (UNRESERVED.test(ch)) {
      out += ch;
      continue;
    }
    for (const byte of encoder.encode(ch)) {
      out += `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
    }
  }
  return out;
}

/** Percent-encodes each segment; the separators stay literal. */
export function encodeArchivePath(path: ArchivePath): string {
  return path.split('/').map(encodePathSegment).join('/');
}
