import type { EntryKind } from './enums.js';

export interface FsStat {
  kind: EntryKind;
  size: number;
  mtimeMs: number;
  mode: number;
}

/**
 * Read-only view of the served tree. The Node implementation lives in
 * scanner/NodeFileSystem; tests substitute an in-memory tree.
 */
export interface FileSystemSource {
  lstat(osPath: string): Promise<FsStat>;
  stat(osPath: string): Promise<FsStat>;
  readdir(osPath: string): Promise<string[]>;
  readlink(osPath: string): Promise<string>;
  openRead(osPath: string): AsyncIterable<Uint8Array>;
}
