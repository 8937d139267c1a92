import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { BuildCoordinator, type BuildResult } from '../../src/build/BuildCoordinator.js';
import { parseEnv, resolveConfig, type ConfigOverrides } from '../../src/config/loadConfig.js';
import { MemoryFileSystem } from '../../src/scanner/MemoryFileSystem.js';
import type { BuildConfig } from '../../src/types/config.js';
import { fixedClock } from '../../src/utils/time.js';
import { silentLogger } from '../../src/logger.js';

// Tree timestamps, in seconds. Everything starts well over a year before the
// first build so no date window but "all" holds a file.
export const OLD = 1_600_000_000;
export const FIRST_BUILD = 1_700_000_000;
export const SECOND_BUILD = FIRST_BUILD + 3_600;

export const INDEX_DOC = [
  '# if-archive:',
  'The root of the archive.',
  '',
  '## games/zcode/deep.z5',
  'tuid: t-deep',
  '',
  'Top note.',
  '',
  '---',
  '# if-archive/games:',
  'Games of every kind.',
  '',
  '## advent.z5',
  'tuid: t-advent',
  '',
  'The original cave crawl.',
  '',
  '## advent-copy.z5',
  'tuid: t-advent',
  '',
  'A second copy.',
  '',
  '## zcode/deep.z5',
  'Games note.',
  '',
  '## new.z5',
  'tuid: t-new',
  '',
  'Arrives later.',
  '',
  '---',
  '# if-archive/games/zcode:',
  '',
  '## deep.z5',
  'ifdbid: i-deep',
  '',
  'Zcode note.',
  '',
  '---',
  '# if-archive/info:',
  '',
  '## manual.txt',
  'tuid: t-new',
  '',
  'Manual for the new game.',
  '',
  '## walkthrough.txt',
  'ifdbid: i-deep',
  '',
  'How to finish the deep game.',
  '',
  '## hints.txt',
  'tuid: t-deep',
  '',
  'Hints for the deep game.',
  ''
].join('\n');

// Each test gets its own temp directory for the document and the outputs.
export function createTempDir(prefix = 'archive-index-e2e-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

// The served tree lives in memory so mtimes are exact and reads are counted.
export function buildTree(): MemoryFileSystem {
  const ms = OLD * 1000;
  return new MemoryFileSystem(ms)
    .mkdir('/srv/if-archive')
    .writeFile('/srv/if-archive/games/advent.z5', 'advent')
    .writeFile('/srv/if-archive/games/advent-copy.z5', 'advent')
    .writeFile('/srv/if-archive/games/zcode/deep.z5', 'deep')
    .writeFile('/srv/if-archive/info/manual.txt', 'manual')
    .writeFile('/srv/if-archive/info/walkthrough.txt', 'walkthrough')
    .writeFile('/srv/if-archive/info/hints.txt', 'hints');
}

// Adds the file the document already declares, touching its directory the way
// a real upload would.
export function addNewGame(tree: MemoryFileSystem, at: number): MemoryFileSystem {
  return tree
    .writeFile('/srv/if-archive/games/new.z5', 'new game', { mtimeMs: at * 1000 })
    .mkdir('/srv/if-archive/games', { mtimeMs: at * 1000 });
}

export function makeConfig(workDir: string, overrides: ConfigOverrides = {}): BuildConfig {
  const indexPath = path.join(workDir, 'Master-Index');
  if (!fs.existsSync(indexPath)) fs.writeFileSync(indexPath, INDEX_DOC);
  return resolveConfig(
    {
      indexPath: 'Master-Index',
      treeDir: '/srv',
      destDir: 'out',
      siteUrl: 'https://example.org',
      fileBaseUrl: 'https://example.org/files',
      concurrency: { hash: 2 }
    },
    { env: parseEnv({}), baseDir: workDir, source: 'test config', overrides }
  );
}

export function runBuild(config: BuildConfig, tree: MemoryFileSystem, nowSeconds: number): Promise<BuildResult> {
  return new BuildCoordinator({
    config,
    logger: silentLogger,
    fs: tree,
    clock: fixedClock(nowSeconds * 1000)
  }).run();
}

export function readOutput(config: BuildConfig, relative: string): string {
  return fs.readFileSync(path.join(config.destDir, ...relative.split('/')), 'utf8');
}

// Every rendered page under destDir, keyed by relative path. Build state
// (cache, marker, links, lock) is left out.
export function readAllOutputs(config: BuildConfig): Map<string, string> {
  const state = new Set([config.cachePath, config.markerPath, config.linksPath, config.lockPath]);
  const out = new Map<string, string>();
  const walk = (dir: string): void => {
    for (const name of fs.readdirSync(dir).sort()) {
      const full = path.join(dir, name);
      if (state.has(full)) continue;
      if (fs.statSync(full).isDirectory()) walk(full);
      else out.set(path.relative(config.destDir, full).split(path.sep).join('/'), fs.readFileSync(full, 'utf8'));
    }
  };
  walk(config.destDir);
  return out;
}
