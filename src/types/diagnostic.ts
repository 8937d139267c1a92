import type { ArchivePath } from './ids.js';

export enum DiagnosticCode {
  MISSING_FILE = 'MISSING_FILE',
  UNDOCUMENTED_FILE = 'UNDOCUMENTED_FILE',
  CHECKSUM_IO = 'CHECKSUM_IO',
  WALK_IO = 'WALK_IO',
  BROKEN_SYMLINK = 'BROKEN_SYMLINK'
}

export interface Diagnostic {
  code: DiagnosticCode;
  path: ArchivePath;
  message: string;
}
