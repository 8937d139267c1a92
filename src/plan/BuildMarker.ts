import fs from 'node:fs';
import type { Logger } from 'pino';
import type { EpochSeconds } from '../types/ids.js';
import { CommitFailureError } from '../errors.js';
import { writeFileAtomic } from '../utils/atomic.js';

/** Timestamp of the last successful build, one decimal integer in a file. */
export class BuildMarker {
  constructor(
    private readonly path: string,
    private readonly logger: Logger
  ) {}

  read(): EpochSeconds | null {
    let text: string;
    try {
      text = fs.readFileSync(this.path, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }
    const value = Number.parseInt(text.trim(), 10);
    if (!Number.isFinite(value) || value < 0 || String(value) !== text.trim()) {
      this.logger.warn({ path: this.path }, 'ignoring unreadable build marker');
      return null;
    }
    return value;
  }

  write(seconds: EpochSeconds): void {
    try {
      writeFileAtomic(this.path, `${seconds}\n`);
    } catch (err) {
      throw new CommitFailureError('build marker', err);
    }
  }
}
