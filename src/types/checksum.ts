import type { ArchivePath } from './ids.js';

export interface Digests {
  md5: string;
  sha512: string;
}

export interface ChecksumRecord extends Digests {
  path: ArchivePath;
  size: number;
  mtimeMs: number;
}

export interface ChecksumStats {
  hits: number;
  computed: number;
  failed: number;
}
