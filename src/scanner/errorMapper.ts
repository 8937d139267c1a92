import { ErrorCode, ErrorStage } from '../types/enums.js';

/** A filesystem error reduced to what diagnostics and the cache report. */
export interface FsFailure {
  code: ErrorCode;
  stage: ErrorStage;
  message: string;
  osCode?: string;
}

const OS_CODES: Record<string, ErrorCode> = {
  EACCES: ErrorCode.PERMISSION_DENIED,
  EPERM: ErrorCode.PERMISSION_DENIED,
  ENOENT: ErrorCode.NOT_FOUND,
  ENOTDIR: ErrorCode.NOT_FOUND,
  ENAMETOOLONG: ErrorCode.PATH_TOO_LONG
};

function errnoCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

export function mapFsError(err: unknown, stage: ErrorStage): FsFailure {
  const osCode = errnoCode(err);
  const message =
    typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string'
      ? err.message
      : String(err);
  const code = osCode === undefined ? ErrorCode.UNKNOWN : (OS_CODES[osCode] ?? ErrorCode.IO_ERROR);
  return { code, stage, message, osCode };
}

/** `read failed (EIO): device error` */
export function describeFailure(failure: FsFailure): string {
  return `${failure.stage.toLowerCase()} failed (${failure.osCode ?? failure.code}): ${failure.message}`;
}
