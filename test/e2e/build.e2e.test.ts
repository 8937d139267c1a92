import { describe, expect, it } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { MalformedDocumentError, LockHeldError } from '../../src/errors.js';
import { DiagnosticCode } from '../../src/types/diagnostic.js';
import { anchorId } from '../../src/render/escape.js';
import {
  FIRST_BUILD,
  SECOND_BUILD,
  addNewGame,
  buildTree,
  cleanupTempDir,
  createTempDir,
  makeConfig,
  readAllOutputs,
  readOutput,
  runBuild
} from './helpers.js';

describe('first and repeated builds', () => {
  it('renders everything on the first build and records the marker', async () => {
    const dir = createTempDir();
    try {
      const config = makeConfig(dir);
      const result = await runBuild(config, buildTree(), FIRST_BUILD);

      expect(result.status).toBe('success');
      expect(result.plan?.full).toBe(true);
      expect(result.written).toHaveLength(12);
      expect(result.written.slice(0, 4)).toEqual([
        'if-archive/index.html',
        'if-archive/games/index.html',
        'if-archive/games/zcode/index.html',
        'if-archive/info/index.html'
      ]);
      expect(result.written).toContain('date.html');
      expect(result.written).toContain('date_4.html');
      expect(result.written.slice(-3)).toEqual(['dirlist.html', 'Master-Index.xml', 'feed.xml']);
      expect(result.checksumStats).toEqual({ hits: 0, computed: 6, failed: 0 });
      expect(result.diagnostics.map((d) => [d.code, d.path])).toEqual([
        [DiagnosticCode.MISSING_FILE, 'if-archive/games/new.z5']
      ]);
      expect(fs.readFileSync(config.markerPath, 'utf8')).toBe(`${FIRST_BUILD}\n`);
      expect(fs.existsSync(config.cachePath)).toBe(true);
      expect(fs.existsSync(config.lockPath)).toBe(false);
    } finally {
      cleanupTempDir(dir);
    }
  });

  it('reuses every checksum and only rewrites the listings when nothing changed', async () => {
    const dir = createTempDir();
    try {
      const config = makeConfig(dir);
      const tree = buildTree();
      await runBuild(config, tree, FIRST_BUILD);
      expect(tree.totalReads()).toBe(6);

      const second = await runBuild(config, tree, FIRST_BUILD + 60);
      expect(second.status).toBe('success');
      expect(second.plan?.full).toBe(false);
      expect(second.plan?.dirs.size).toBe(0);
      expect(second.written).toEqual(['dirlist.html', 'Master-Index.xml', 'feed.xml']);
      expect(second.checksumStats).toEqual({ hits: 6, computed: 0, failed: 0 });
      expect(tree.totalReads()).toBe(6);
      expect(fs.readFileSync(config.markerPath, 'utf8')).toBe(`${FIRST_BUILD + 60}\n`);
    } finally {
      cleanupTempDir(dir);
    }
  });

  it('rebuilds everything when forced even with a marker present', async () => {
    const dir = createTempDir();
    try {
      await runBuild(makeConfig(dir), buildTree(), FIRST_BUILD);
      const forced = await runBuild(makeConfig(dir, { forceFull: true }), buildTree(), FIRST_BUILD + 60);
      expect(forced.plan?.full).toBe(true);
      expect(forced.written).toHaveLength(12);
    } finally {
      cleanupTempDir(dir);
    }
  });
});

describe('directory counts', () => {
  it('counts files and subdirectories as they exist on disk', async () => {
    const dir = createTempDir();
    try {
      const config = makeConfig(dir);
      await runBuild(config, buildTree(), FIRST_BUILD);

      const manifest = readOutput(config, 'Master-Index.xml');
      expect(manifest).toContain('<name>if-archive</name>\n<filecount>0</filecount>\n<subdircount>2</subdircount>\n');
      expect(manifest).toContain('<name>if-archive/games</name>\n<filecount>2</filecount>\n<subdircount>1</subdircount>\n');
      expect(manifest).toContain('<name>if-archive/info</name>\n<filecount>3</filecount>\n<subdircount>0</subdircount>\n');

      expect(readOutput(config, 'dirlist.html')).toContain(
        '<ul class="dirlist">\n' +
          '<li class="Even"><a href="https://example.org/indexes/if-archive/">if-archive</a> (0)</li>\n' +
          '<li class="Odd"><a href="https://example.org/indexes/if-archive/games/">if-archive/games</a> (2)</li>\n' +
          '<li class="Even"><a href="https://example.org/indexes/if-archive/games/zcode/">if-archive/games/zcode</a> (1)</li>\n' +
          '<li class="Odd"><a href="https://example.org/indexes/if-archive/info/">if-archive/info</a> (3)</li>\n' +
          '</ul>'
      );

      expect(readOutput(config, 'if-archive/index.html')).toContain(
        `<li id="${anchorId('dir', 'games')}" class="Even"><a href="https://example.org/indexes/if-archive/games/">games</a> (2 files, 1 subdirectories)</li>\n` +
          `<li id="${anchorId('dir', 'info')}" class="Odd"><a href="https://example.org/indexes/if-archive/info/">info</a> (3 files)</li>\n`
      );
    } finally {
      cleanupTempDir(dir);
    }
  });

  it('sets the configured modes on written pages and their directories', async () => {
    const dir = createTempDir();
    try {
      const config = makeConfig(dir);
      await runBuild(config, buildTree(), FIRST_BUILD);
      expect(fs.statSync(path.join(config.destDir, 'dirlist.html')).mode & 0o777).toBe(0o644);
      expect(fs.statSync(path.join(config.destDir, 'if-archive', 'games')).mode & 0o777).toBe(0o755);
    } finally {
      cleanupTempDir(dir);
    }
  });
});

describe('build failures', () => {
  it('leaves outputs and build state untouched while another build holds the lock', async () => {
    const dir = createTempDir();
    try {
      const config = makeConfig(dir);
      const tree = buildTree();
      await runBuild(config, tree, FIRST_BUILD);
      const outputs = readAllOutputs(config);
      const cache = fs.readFileSync(config.cachePath);
      const links = fs.readFileSync(config.linksPath, 'utf8');
      const holder = '{"pid":4242,"host":"build-host","startedAt":"2023-11-14T22:13:20.000Z"}\n';
      fs.writeFileSync(config.lockPath, holder);

      addNewGame(tree, SECOND_BUILD - 60);
      const result = await runBuild(config, tree, SECOND_BUILD);

      expect(result.status).toBe('locked');
      expect(result.error).toBeInstanceOf(LockHeldError);
      expect(result.error?.message).toBe(
        `build lock ${config.lockPath} is held by pid 4242 on build-host since 2023-11-14T22:13:20.000Z (3600s old)`
      );
      expect(result.written).toEqual([]);
      expect(readAllOutputs(config)).toEqual(outputs);
      expect(fs.readFileSync(config.cachePath).equals(cache)).toBe(true);
      expect(fs.readFileSync(config.linksPath, 'utf8')).toBe(links);
      expect(fs.readFileSync(config.markerPath, 'utf8')).toBe(`${FIRST_BUILD}\n`);
      expect(fs.readFileSync(config.lockPath, 'utf8')).toBe(holder);
      expect(tree.totalReads()).toBe(6);
    } finally {
      cleanupTempDir(dir);
    }
  });

  it('writes no marker or cache when the document is malformed', async () => {
    const dir = createTempDir();
    try {
      fs.writeFileSync(path.join(dir, 'Master-Index'), '# if-archive/games\nNo colon.\n');
      const config = makeConfig(dir);

      const result = await runBuild(config, buildTree(), FIRST_BUILD);

      expect(result.status).toBe('failed');
      expect(result.error).toBeInstanceOf(MalformedDocumentError);
      expect(result.plan).toBeNull();
      expect(fs.existsSync(config.markerPath)).toBe(false);
      expect(fs.existsSync(config.cachePath)).toBe(false);
      expect(fs.existsSync(config.linksPath)).toBe(false);
      expect(fs.existsSync(config.lockPath)).toBe(false);
    } finally {
      cleanupTempDir(dir);
    }
  });
});
