export class ArchiveIndexError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'ArchiveIndexError';
    this.code = code;
  }
}

/** Structural fault in the composed document; nothing downstream may run. */
export class MalformedDocumentError extends ArchiveIndexError {
  readonly line: number;

  constructor(line: number, message: string) {
    super('MALFORMED_DOCUMENT', `line ${line}: ${message}`);
    this.name = 'MalformedDocumentError';
    this.line = line;
  }
}

export interface LockHolder {
  pid: number;
  host: string;
  startedAt: string;
}

export class LockHeldError extends ArchiveIndexError {
  readonly holder: LockHolder | null;
  readonly ageMs: number | null;

  constructor(lockPath: string, holder: LockHolder | null, ageMs: number | null) {
    const who = holder ? `pid ${holder.pid} on ${holder.host} since ${holder.startedAt}` : 'unknown holder';
    const age = ageMs === null ? '' : ` (${Math.round(ageMs / 1000)}s old)`;
    super('LOCK_HELD', `build lock ${lockPath} is held by ${who}${age}`);
    this.name = 'LockHeldError';
    this.holder = holder;
    this.ageMs = ageMs;
  }
}

export class CommitFailureError extends ArchiveIndexError {
  constructor(what: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('COMMIT_FAILURE', `failed to commit ${what}: ${detail}`);
    this.name = 'CommitFailureError';
    this.cause = cause;
  }
}

export class ConfigError extends ArchiveIndexError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'ConfigError';
  }
}
