import type { ArchivePath } from '../types/ids.js';

export class ArchivePathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArchivePathError';
  }
}

/** Validates a relative slash path; rejects empty, `.` and `..` segments. */
export function splitArchivePath(value: string): string[] {
  if (value.length === 0) {
    throw new ArchivePathError('path is empty');
  }
  if (value.startsWith('/')) {
    throw new ArchivePathError('path must be relative');
  }
  const parts = value.split('/');
  for (const part of parts) {
    if (part.length === 0) {
      throw new ArchivePathError('path contains empty segment');
    }
    if (part === '.' || part === '..') {
      throw new ArchivePathError(`path segment "${part}" not allowed`);
    }
  }
  return parts;
}

export function joinArchivePath(parent: ArchivePath, child: string): ArchivePath {
  return parent.length === 0 ? child : `${parent}/${child}`;
}

export function parentArchivePath(path: ArchivePath): ArchivePath | null {
  const idx = path.lastIndexOf('/');
  if (idx <= 0) return null;
  return path.slice(0, idx);
}

export function baseName(path: ArchivePath): string {
  const idx = path.lastIndexOf('/');
  return idx < 0 ? path : path.slice(idx + 1);
}

export function isImmediateChild(parent: ArchivePath, child: ArchivePath): boolean {
  if (!child.startsWith(`${parent}/`)) return false;
  const rest = child.slice(parent.length + 1);
  return rest.length > 0 && !rest.includes('/');
}

/** Every proper ancestor of `path`, shallowest first. */
export function ancestorsOf(path: ArchivePath): ArchivePath[] {
  const parts = path.split('/');
  const out: ArchivePath[] = [];
  for (let i = 1; i < parts.length; i += 1) {
    out.push(parts.slice(0, i).join('/'));
  }
  return out;
}

/**
 * Resolves a symlink body against the link's directory. Returns null when the
 * result climbs above the first segment of `linkDir`.
 */
export function resolveLinkTarget(linkDir: ArchivePath, target: string): ArchivePath | null {
  if (target.startsWith('/')) return null;
  const out = linkDir.split('/');
  for (const part of target.split('/')) {
    if (part === '' || part === '.') continue;
    if (part === '..') {
      if (out.length <= 1) return null;
      out.pop();
      continue;
    }
    out.push(part);
  }
  return out.join('/');
}
