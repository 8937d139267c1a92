import type { Logger } from 'pino';
import type { Diagnostic } from '../types/diagnostic.js';
import { DiagnosticCode } from '../types/diagnostic.js';
import type { ArchivePath } from '../types/ids.js';

/** Soft per-entry conditions collected over one build. */
export class DiagnosticLog {
  private readonly entries: Diagnostic[] = [];

  constructor(private readonly logger: Logger) {}

  report(code: DiagnosticCode, path: ArchivePath, message: string): void {
    this.entries.push({ code, path, message });
    if (code === DiagnosticCode.UNDOCUMENTED_FILE) {
      this.logger.info({ code, path }, message);
    } else {
      this.logger.warn({ code, path }, message);
    }
  }

  all(): Diagnostic[] {
    return [...this.entries];
  }

  byCode(code: DiagnosticCode): Diagnostic[] {
    return this.entries.filter((entry) => entry.code === code);
  }
}
