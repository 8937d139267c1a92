import fs from 'node:fs';
import path from 'node:path';
import type { OutputModes } from '../types/config.js';

/** Sets `modes.file` on each written file and `modes.dir` on every directory between it and `destDir`. */
export function applyOutputModes(destDir: string, files: string[], modes: OutputModes): void {
  const dirs = new Set<string>();
  for (const relative of files) {
    const target = path.join(destDir, ...relative.split('/'));
    fs.chmodSync(target, modes.file);
    let dir = path.dirname(target);
    while (dir.startsWith(destDir) && dir !== destDir && !dirs.has(dir)) {
      dirs.add(dir);
      dir = path.dirname(dir);
    }
  }
  for (const dir of dirs) fs.chmodSync(dir, modes.dir);
}
