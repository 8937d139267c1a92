import type { ArchivePath } from './ids.js';

export interface ScannedSymlink {
  /** Link body as read from disk. */
  raw: string;
  kind: 'file' | 'directory';
  target: ArchivePath;
}

export interface ScannedFile {
  name: string;
  path: ArchivePath;
  /** Size and mtime of the file, or of the link's target for symlinks. */
  size: number;
  mtimeMs: number;
  symlink?: ScannedSymlink;
}

export interface ScannedDirectory {
  path: ArchivePath;
  name: string;
  parent: ArchivePath | null;
  mtimeMs: number;
  fragmentMtimeMs?: number;
  subdirs: ArchivePath[];
  files: ScannedFile[];
}

export interface ScanResult {
  rootName: string;
  dirs: Map<ArchivePath, ScannedDirectory>;
}
