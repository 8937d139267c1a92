import path from 'node:path';
import type { Logger } from 'pino';
import { EntryKind, ErrorCode, ErrorStage } from '../types/enums.js';
import type { FileSystemSource, FsStat } from '../types/fs.js';
import type { ArchivePath } from '../types/ids.js';
import type { ReservedRules } from '../types/config.js';
import type { ScanResult, ScannedDirectory, ScannedFile } from '../types/scan.js';
import { DiagnosticCode } from '../types/diagnostic.js';
import type { DiagnosticLog } from '../diagnostics/DiagnosticLog.js';
import { baseName, joinArchivePath, resolveLinkTarget } from '../paths/normalize.js';
import { compareNames } from '../utils/order.js';
import { describeFailure, mapFsError } from './errorMapper.js';
import { ReservedMatcher } from './ignore/ReservedMatcher.js';

const WORLD_READ = 0o004;
const WORLD_READ_SEARCH = 0o005;

export interface FilesystemCorrelatorOptions {
  treeDir: string;
  rootName: string;
  fragmentName: string;
  reserved: ReservedRules;
  fs: FileSystemSource;
  diagnostics: DiagnosticLog;
  logger: Logger;
}

/**
 * Walks the served tree and records what is actually there. Existence, size
 * and time come only from here; the document never overrides them.
 */
export class FilesystemCorrelator {
  private readonly reserved: ReservedMatcher;

  constructor(private readonly options: FilesystemCorrelatorOptions) {
    this.reserved = new ReservedMatcher(options.reserved);
  }

  async scan(): Promise<ScanResult> {
    const { rootName } = this.options;
    const dirs = new Map<ArchivePath, ScannedDirectory>();
    // The root must exist; everything below it is best effort.
    const rootStat = await this.options.fs.stat(this.osPath(rootName));
    if (rootStat.kind !== EntryKind.DIR) {
      throw new Error(`${this.osPath(rootName)} is not a directory`);
    }
    await this.walk(rootName, null, rootStat, dirs);
    return { rootName, dirs };
  }

  private osPath(archivePath: ArchivePath): string {
    return path.join(this.options.treeDir, ...archivePath.split('/'));
  }

  private async walk(
    dirPath: ArchivePath,
    parent: ArchivePath | null,
    stat: FsStat,
    dirs: Map<ArchivePath, ScannedDirectory>
  ): Promise<void> {
    const { fs, fragmentName, logger } = this.options;
    const dir: ScannedDirectory = {
      path: dirPath,
      name: baseName(dirPath),
      parent,
      mtimeMs: stat.mtimeMs,
      subdirs: [],
      files: []
    };
    dirs.set(dirPath, dir);
    logger.debug({ dir: dirPath }, 'scanning directory');

    let names: string[];
    try {
      names = await fs.readdir(this.osPath(dirPath));
    } catch (err) {
      this.walkFailure(dirPath, err, ErrorStage.LIST);
      return;
    }
    names.sort(compareNames);

    for (const name of names) {
      if (name.startsWith('.')) continue;
      const childPath = joinArchivePath(dirPath, name);
      if (this.reserved.isReserved(childPath)) continue;

      let child: FsStat;
      try {
        child = await fs.lstat(this.osPath(childPath));
      } catch (err) {
        this.walkFailure(childPath, err, ErrorStage.STAT);
        continue;
      }

      if (child.kind === EntryKind.FILE && name === fragmentName) {
        dir.fragmentMtimeMs = child.mtimeMs;
        continue;
      }
      if (child.kind === EntryKind.DIR) {
        if ((child.mode & WORLD_READ_SEARCH) !== WORLD_READ_SEARCH) continue;
        dir.subdirs.push(childPath);
        await this.walk(childPath, dirPath, child, dirs);
        continue;
      }
      if (child.kind === EntryKind.FILE) {
        if ((child.mode & WORLD_READ) === 0) continue;
        dir.files.push({ name, path: childPath, size: child.size, mtimeMs: child.mtimeMs });
        continue;
      }
      if (child.kind === EntryKind.SYMLINK) {
        const link = await this.readSymlink(dirPath, name, childPath);
        if (link) dir.files.push(link);
      }
    }
  }

  private async readSymlink(dirPath: ArchivePath, name: string, linkPath: ArchivePath): Promise<ScannedFile | null> {
    const { fs, diagnostics } = this.options;
    let raw: string;
    let target: FsStat;
    try {
      raw = await fs.readlink(this.osPath(linkPath));
      target = await fs.stat(this.osPath(linkPath));
    } catch (err) {
      const failure = mapFsError(err, ErrorStage.READLINK);
      if (failure.code === ErrorCode.NOT_FOUND) {
        diagnostics.report(DiagnosticCode.BROKEN_SYMLINK, linkPath, 'symlink target does not exist');
      } else {
        diagnostics.report(DiagnosticCode.WALK_IO, linkPath, describeFailure(failure));
      }
      return null;
    }
    const resolved = resolveLinkTarget(dirPath, raw.replace(/\/+$/, ''));
    if (resolved === null || (resolved !== this.options.rootName && !resolved.startsWith(`${this.options.rootName}/`))) {
      diagnostics.report(DiagnosticCode.BROKEN_SYMLINK, linkPath, `symlink target ${raw} is outside the archive`);
      return null;
    }
    if (target.kind === EntryKind.DIR) {
      return {
        name,
        path: linkPath,
        size: 0,
        mtimeMs: target.mtimeMs,
        symlink: { raw, kind: 'directory', target: resolved }
      };
    }
    if (target.kind === EntryKind.FILE) {
      return {
        name,
        path: linkPath,
        size: target.size,
        mtimeMs: target.mtimeMs,
        symlink: { raw, kind: 'file', target: resolved }
      };
    }
    return null;
  }

  private walkFailure(archivePath: ArchivePath, err: unknown, stage: ErrorStage): void {
    const failure = mapFsError(err, stage);
    const message =
      failure.code === ErrorCode.NOT_FOUND ? 'vanished during the walk' : describeFailure(failure);
    this.options.diagnostics.report(DiagnosticCode.WALK_IO, archivePath, message);
  }
}
