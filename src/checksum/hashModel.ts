import path from 'node:path';
import type { ArchiveModel, FileEntry } from '../types/model.js';
import type { ArchivePath } from '../types/ids.js';
import { DiagnosticCode } from '../types/diagnostic.js';
import type { DiagnosticLog } from '../diagnostics/DiagnosticLog.js';
import { mapWithConcurrency } from '../utils/pool.js';
import type { ChecksumCache } from './ChecksumCache.js';

export interface HashModelOptions {
  treeDir: string;
  concurrency: number;
  diagnostics: DiagnosticLog;
}

/**
 * Fills md5/sha512 on every regular file through the cache, then copies the
 * target's digests onto file symlinks. Failures leave the digests absent.
 */
export async function hashModel(model: ArchiveModel, cache: ChecksumCache, options: HashModelOptions): Promise<void> {
  const regular: FileEntry[] = [];
  const links: FileEntry[] = [];
  const byPath = new Map<ArchivePath, FileEntry>();
  for (const dir of model.dirs.values()) {
    for (const entry of dir.files) {
      byPath.set(entry.path, entry);
      if (!entry.symlink) regular.push(entry);
      else if (entry.symlink.kind === 'file') links.push(entry);
    }
  }

  await mapWithConcurrency(regular, options.concurrency, async (entry) => {
    const osPath = path.join(options.treeDir, ...entry.path.split('/'));
    const outcome = await cache.lookup(entry.path, osPath, { size: entry.size, mtimeMs: entry.mtimeMs });
    if (outcome.ok) {
      entry.md5 = outcome.digests.md5;
      entry.sha512 = outcome.digests.sha512;
    } else {
      options.diagnostics.report(DiagnosticCode.CHECKSUM_IO, entry.path, outcome.message);
    }
  });

  for (const link of links) {
    let target = link.symlink ? byPath.get(link.symlink.path) : undefined;
    for (let hop = 0; target?.symlink?.kind === 'file' && hop < 8; hop += 1) {
      target = byPath.get(target.symlink.path);
    }
    if (target && !target.symlink) {
      link.md5 = target.md5;
      link.sha512 = target.sha512;
    }
  }
}
