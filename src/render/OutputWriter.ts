import path from 'node:path';
import { writeFileAtomic } from '../utils/atomic.js';

/** Writes generated files under the destination and remembers what it wrote. */
export class OutputWriter {
  private readonly written: string[] = [];

  constructor(readonly destDir: string) {}

  write(relativePath: string, content: string): void {
    writeFileAtomic(this.resolve(relativePath), content);
    this.written.push(relativePath);
  }

  resolve(relativePath: string): string {
    return path.join(this.destDir, ...relativePath.split('/'));
  }

  files(): string[] {
    return [...this.written];
  }
}
