import fs from 'node:fs';
import fsp from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { EntryKind } from '../types/enums.js';
import type { FileSystemSource, FsStat } from '../types/fs.js';

function toFsStat(stat: Stats): FsStat {
  const kind = stat.isDirectory()
    ? EntryKind.DIR
    : stat.isFile()
      ? EntryKind.FILE
      : stat.isSymbolicLink()
        ? EntryKind.SYMLINK
        : EntryKind.SPECIAL;
  return { kind, size: stat.size, mtimeMs: Math.trunc(stat.mtimeMs), mode: stat.mode };
}

export class NodeFileSystem implements FileSystemSource {
  async lstat(osPath: string): Promise<FsStat> {
    return toFsStat(await fsp.lstat(osPath));
  }

  async stat(osPath: string): Promise<FsStat> {
    return toFsStat(await fsp.stat(osPath));
  }

  async readdir(osPath: string): Promise<string[]> {
    return fsp.readdir(osPath);
  }

  async readlink(osPath: string): Promise<string> {
    return fsp.readlink(osPath);
  }

  openRead(osPath: string): AsyncIterable<Uint8Array> {
    return fs.createReadStream(osPath, { highWaterMark: 1 << 20 });
  }
}
