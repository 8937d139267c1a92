import path from 'node:path';
import { EntryKind } from '../types/enums.js';
import type { FileSystemSource, FsStat } from '../types/fs.js';

type MemoryNode =
  | { kind: EntryKind.FILE; data: Uint8Array; mtimeMs: number; mode: number }
  | { kind: EntryKind.DIR; mtimeMs: number; mode: number }
  | { kind: EntryKind.SYMLINK; target: string; mtimeMs: number };

export interface MemoryEntryOptions {
  mtimeMs?: number;
  mode?: number;
}

function fsError(code: string, osPath: string): Error {
  return Object.assign(new Error(`${code}: ${osPath}`), { code });
}

/**
 * In-process FileSystemSource. Paths are POSIX; parents are created on
 * demand. Counts reads so callers can tell whether content was hashed.
 */
export class MemoryFileSystem implements FileSystemSource {
  private readonly nodes = new Map<string, MemoryNode>();
  private readonly readCounts = new Map<string, number>();
  private readonly failing = new Set<string>();

  constructor(private readonly defaultMtimeMs = 0) {
    this.nodes.set('/', { kind: EntryKind.DIR, mtimeMs: defaultMtimeMs, mode: 0o755 });
  }

  mkdir(osPath: string, options: MemoryEntryOptions = {}): this {
    const key = path.posix.resolve(osPath);
    this.ensureParents(key);
    this.nodes.set(key, {
      kind: EntryKind.DIR,
      mtimeMs: options.mtimeMs ?? this.defaultMtimeMs,
      mode: options.mode ?? 0o755
    });
    return this;
  }

  writeFile(osPath: string, content: string | Uint8Array, options: MemoryEntryOptions = {}): this {
    const key = path.posix.resolve(osPath);
    this.ensureParents(key);
    const data = typeof content === 'string' ? new TextEncoder().encode(content) : content;
    this.nodes.set(key, {
      kind: EntryKind.FILE,
      data,
      mtimeMs: options.mtimeMs ?? this.defaultMtimeMs,
      mode: options.mode ?? 0o644
    });
    return this;
  }

  symlink(target: string, osPath: string): this {
    const key = path.posix.resolve(osPath);
    this.ensureParents(key);
    this.nodes.set(key, { kind: EntryKind.SYMLINK, target, mtimeMs: this.defaultMtimeMs });
    return this;
  }

  remove(osPath: string): this {
    const key = path.posix.resolve(osPath);
    for (const existing of [...this.nodes.keys()]) {
      if (existing === key || existing.startsWith(`${key}/`)) this.nodes.delete(existing);
    }
    return this;
  }

  /** Makes every later read of `osPath` fail with EACCES. */
  failReadsOf(osPath: string): this {
    this.failing.add(path.posix.resolve(osPath));
    return this;
  }

  readCount(osPath: string): number {
    return this.readCounts.get(path.posix.resolve(osPath)) ?? 0;
  }

  totalReads(): number {
    let total = 0;
    for (const count of this.readCounts.values()) total += count;
    return total;
  }

  async lstat(osPath: string): Promise<FsStat> {
    return this.toStat(this.lookup(path.posix.resolve(osPath)), osPath);
  }

  async stat(osPath: string): Promise<FsStat> {
    return this.toStat(this.lookup(this.follow(path.posix.resolve(osPath))), osPath);
  }

  async readdir(osPath: string): Promise<string[]> {
    const key = path.posix.resolve(osPath);
    const node = this.lookup(key);
    if (node.kind !== EntryKind.DIR) throw fsError('ENOTDIR', osPath);
    const prefix = key === '/' ? '/' : `${key}/`;
    const out: string[] = [];
    for (const candidate of this.nodes.keys()) {
      if (candidate === key || !candidate.startsWith(prefix)) continue;
      const rest = candidate.slice(prefix.length);
      if (!rest.includes('/')) out.push(rest);
    }
    return out;
  }

  async readlink(osPath: string): Promise<string> {
    const node = this.lookup(path.posix.resolve(osPath));
    if (node.kind !== EntryKind.SYMLINK) throw fsError('EINVAL', osPath);
    return node.target;
  }

  openRead(osPath: string): AsyncIterable<Uint8Array> {
    const key = this.follow(path.posix.resolve(osPath));
    const nodes = this.nodes;
    const failing = this.failing;
    const readCounts = this.readCounts;
    return {
      async *[Symbol.asyncIterator]() {
        if (failing.has(key)) throw fsError('EACCES', osPath);
        const node = nodes.get(key);
        if (!node) throw fsError('ENOENT', osPath);
        if (node.kind !== EntryKind.FILE) throw fsError('EISDIR', osPath);
        readCounts.set(key, (readCounts.get(key) ?? 0) + 1);
        const chunk = 4096;
        for (let offset = 0; offset < node.data.length; offset += chunk) {
          yield node.data.subarray(offset, offset + chunk);
        }
      }
    };
  }

  private ensureParents(key: string): void {
    let parent = path.posix.dirname(key);
    const missing: string[] = [];
    while (!this.nodes.has(parent)) {
      missing.push(parent);
      parent = path.posix.dirname(parent);
    }
    for (const dir of missing) {
      this.nodes.set(dir, { kind: EntryKind.DIR, mtimeMs: this.defaultMtimeMs, mode: 0o755 });
    }
  }

  private lookup(key: string): MemoryNode {
    const node = this.nodes.get(key);
    if (!node) throw fsError('ENOENT', key);
    return node;
  }

  private follow(key: string, depth = 0): string {
    const node = this.nodes.get(key);
    if (!node || node.kind !== EntryKind.SYMLINK) return key;
    if (depth > 16) throw fsError('ELOOP', key);
    return this.follow(path.posix.resolve(path.posix.dirname(key), node.target), depth + 1);
  }

  private toStat(node: MemoryNode, osPath: string): FsStat {
    switch (node.kind) {
      case EntryKind.FILE:
        return { kind: node.kind, size: node.data.length, mtimeMs: node.mtimeMs, mode: node.mode };
      case EntryKind.DIR:
        return { kind: node.kind, size: 0, mtimeMs: node.mtimeMs, mode: node.mode };
      case EntryKind.SYMLINK:
        return { kind: node.kind, size: node.target.length, mtimeMs: node.mtimeMs, mode: 0o777 };
      default:
        throw fsError('EINVAL', osPath);
    }
  }
}
