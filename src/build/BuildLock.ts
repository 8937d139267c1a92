import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { Logger } from 'pino';
import { LockHeldError, type LockHolder } from '../errors.js';
import { systemClock, type Clock } from '../utils/time.js';

function parseHolder(text: string): LockHolder | null {
  try {
    const value: unknown = JSON.parse(text);
    if (
      typeof value === 'object' &&
      value !== null &&
      'pid' in value &&
      'host' in value &&
      'startedAt' in value &&
      typeof value.pid === 'number' &&
      typeof value.host === 'string' &&
      typeof value.startedAt === 'string'
    ) {
      return { pid: value.pid, host: value.host, startedAt: value.startedAt };
    }
  } catch {
    return null;
  }
  return null;
}

/**
 * Exclusive build lock: a file created with O_EXCL. A held lock is reported,
 * never waited on or broken.
 */
export class BuildLock {
  private held = false;

  constructor(
    private readonly lockPath: string,
    private readonly logger: Logger,
    private readonly clock: Clock = systemClock
  ) {}

  acquire(): void {
    const holder: LockHolder = {
      pid: process.pid,
      host: os.hostname(),
      startedAt: new Date(this.clock.now()).toISOString()
    };
    fs.mkdirSync(path.dirname(this.lockPath), { recursive: true });
    let fd: number;
    try {
      fd = fs.openSync(this.lockPath, 'wx');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'EEXIST') throw this.heldError();
      throw err;
    }
    try {
      fs.writeSync(fd, `${JSON.stringify(holder)}\n`);
    } finally {
      fs.closeSync(fd);
    }
    this.held = true;
    this.logger.debug({ lockPath: this.lockPath }, 'build lock acquired');
  }

  release(): void {
    if (!this.held) return;
    fs.rmSync(this.lockPath, { force: true });
    this.held = false;
    this.logger.debug({ lockPath: this.lockPath }, 'build lock released');
  }

  private heldError(): LockHeldError {
    let holder: LockHolder | null = null;
    let ageMs: number | null = null;
    try {
      holder = parseHolder(fs.readFileSync(this.lockPath, 'utf8'));
      const started = holder ? Date.parse(holder.startedAt) : Number.NaN;
      ageMs = Number.isNaN(started) ? this.clock.now() - fs.statSync(this.lockPath).mtimeMs : this.clock.now() - started;
    } catch (err) {
      this.logger.debug({ err, lockPath: this.lockPath }, 'could not inspect held lock');
    }
    return new LockHeldError(this.lockPath, holder, ageMs);
  }
}
