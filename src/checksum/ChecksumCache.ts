import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type { ChecksumRecord, ChecksumStats, Digests } from '../types/checksum.js';
import type { FileSystemSource } from '../types/fs.js';
import type { ArchivePath } from '../types/ids.js';
import { ErrorStage } from '../types/enums.js';
import { CommitFailureError } from '../errors.js';
import { describeFailure, mapFsError } from '../scanner/errorMapper.js';
import { tempPathFor } from '../utils/atomic.js';
import { computeDigests } from './digest.js';
import { ensureSchema, hasChecksumTable, type ChecksumRow } from './schema.js';

export interface ChecksumCacheOptions {
  /** SQLite file holding the committed cache. */
  path: string;
  fs: FileSystemSource;
  logger: Logger;
}

export interface LiveStat {
  size: number;
  mtimeMs: number;
}

export type ChecksumOutcome =
  | { ok: true; digests: Digests; computed: boolean }
  | { ok: false; message: string };

/**
 * Digest memo keyed by path and validated by size and mtime. Lookups only
 * touch memory; the file on disk changes solely through commit(), which
 * swaps in a complete new database by rename.
 */
export class ChecksumCache {
  private readonly stored = new Map<ArchivePath, ChecksumRecord>();
  private readonly live = new Map<ArchivePath, ChecksumRecord>();
  private readonly counters: ChecksumStats = { hits: 0, computed: 0, failed: 0 };

  constructor(private readonly options: ChecksumCacheOptions) {
    this.load();
  }

  stats(): ChecksumStats {
    return { ...this.counters };
  }

  async lookup(archivePath: ArchivePath, osPath: string, stat: LiveStat): Promise<ChecksumOutcome> {
    const cached = this.live.get(archivePath) ?? this.stored.get(archivePath);
    if (cached && cached.size === stat.size && cached.mtimeMs === stat.mtimeMs) {
      this.live.set(archivePath, cached);
      this.counters.hits += 1;
      return { ok: true, digests: { md5: cached.md5, sha512: cached.sha512 }, computed: false };
    }

    this.options.logger.debug({ path: archivePath }, 'computing checksums');
    try {
      const { digests, bytes } = await computeDigests(this.options.fs.openRead(osPath));
      if (bytes !== stat.size) {
        this.counters.failed += 1;
        return { ok: false, message: `changed while hashing (expected ${stat.size} bytes, read ${bytes})` };
      }
      this.live.set(archivePath, { path: archivePath, size: stat.size, mtimeMs: stat.mtimeMs, ...digests });
      this.counters.computed += 1;
      return { ok: true, digests, computed: true };
    } catch (err) {
      this.counters.failed += 1;
      return { ok: false, message: describeFailure(mapFsError(err, ErrorStage.READ)) };
    }
  }

  /** Persists the records seen this run; records for paths not seen are dropped. */
  commit(): void {
    const target = this.options.path;
    const tmp = tempPathFor(target);
    try {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.rmSync(tmp, { force: true });
      const db = new Database(tmp);
      try {
        ensureSchema(db);
        const insert = db.prepare<[string, number, number, string, string]>(
          'INSERT INTO checksums (path, size, mtimeMs, md5, sha512) VALUES (?, ?, ?, ?, ?)'
        );
        const insertAll = db.transaction((records: ChecksumRecord[]) => {
          for (const record of records) {
            insert.run(record.path, record.size, record.mtimeMs, record.md5, record.sha512);
          }
        });
        insertAll([...this.live.values()]);
      } finally {
        db.close();
      }
      fs.renameSync(tmp, target);
    } catch (err) {
      fs.rmSync(tmp, { force: true });
      throw new CommitFailureError('checksum cache', err);
    }
    this.stored.clear();
    for (const [key, record] of this.live) this.stored.set(key, record);
    this.options.logger.debug({ records: this.live.size }, 'checksum cache committed');
  }

  private load(): void {
    const file = this.options.path;
    if (!fs.existsSync(file)) return;
    let db: Database.Database | undefined;
    try {
      db = new Database(file, { readonly: true, fileMustExist: true });
      if (!hasChecksumTable(db)) return;
      const rows = db.prepare<[], ChecksumRow>('SELECT path, size, mtimeMs, md5, sha512 FROM checksums').all();
      for (const row of rows) {
        this.stored.set(row.path, { ...row });
      }
    } catch (err) {
      // Treated as empty; the next commit replaces the file.
      this.stored.clear();
      this.options.logger.warn({ err, path: file }, 'ignoring unreadable checksum cache');
    } finally {
      db?.close();
    }
  }
}
