import { describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadConfig, parseEnv, resolveConfig } from './loadConfig.js';
import { ConfigError } from '../errors.js';

const MINIMAL = {
  indexPath: 'Master-Index',
  treeDir: 'tree',
  destDir: '/var/www/indexes',
  siteUrl: 'https://example.org/'
};

function resolve(raw: unknown, env: Record<string, string> = {}, overrides = {}) {
  return resolveConfig(raw, { env: parseEnv(env), baseDir: '/etc/archive', source: 'test.json', overrides });
}

describe('resolveConfig', () => {
  it('fills defaults and resolves paths against the config directory', () => {
    const config = resolve(MINIMAL);
    expect(config.rootName).toBe('if-archive');
    expect(config.indexPath).toBe('/etc/archive/Master-Index');
    expect(config.treeDir).toBe('/etc/archive/tree');
    expect(config.cachePath).toBe('/var/www/indexes/checksum-cache.sqlite');
    expect(config.markerPath).toBe('/var/www/indexes/.last-build');
    expect(config.linksPath).toBe('/var/www/indexes/.page-links.json');
    expect(config.lockPath).toBe('/var/www/indexes/.build.lock');
    expect(config.identifierKeys).toEqual(['tuid', 'ifdbid']);
    expect(config.siteUrl).toBe('https://example.org');
    expect(config.pageBaseUrl).toBe('https://example.org/indexes');
    expect(config.fileBaseUrl).toBe('https://example.org');
    expect(config.outputModes).toEqual({ file: 0o644, dir: 0o755 });
    expect(config.hashConcurrency).toBe(4);
    expect(config.search).toBeUndefined();
    expect(config.logLevel).toBe('info');
  });

  it('parses octal modes and lets flags and the environment win', () => {
    const config = resolve(
      { ...MINIMAL, outputMode: { file: '0664', dir: 0o775 }, excludeUndocumented: false, logLevel: 'warn' },
      { LOG_LEVEL: 'debug' },
      { excludeUndocumented: true, forceFull: true }
    );
    expect(config.outputModes).toEqual({ file: 0o664, dir: 0o775 });
    expect(config.excludeUndocumented).toBe(true);
    expect(config.forceFull).toBe(true);
    expect(config.logLevel).toBe('debug');
  });

  it('takes notification secrets from the environment', () => {
    const config = resolve(
      {
        ...MINIMAL,
        search: { url: 'https://search.example.org/reindex' },
        purge: { url: 'https://cdn.example.org/purge', prefixes: ['https://example.org/', 'https://mirror.example.org'] }
      },
      { SEARCH_REINDEX_KEY: 'test-secret', CACHE_PURGE_KEY: 'purge-secret', CACHE_PURGE_EMAIL: 'ops@example.org' }
    );
    expect(config.search).toEqual({ url: 'https://search.example.org/reindex', key: 'test-secret' });
    expect(config.purge).toEqual({
      url: 'https://cdn.example.org/purge',
      key: 'purge-secret',
      email: 'ops@example.org',
      prefixes: ['https://example.org', 'https://mirror.example.org'],
      unboxBase: undefined
    });
  });

  it('lists every problem in one error', () => {
    try {
      resolve({ treeDir: 3, destDir: 'out', siteUrl: 'not a url', feedSize: 0 });
      expect.fail('expected a configuration error');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      const message = err instanceof Error ? err.message : '';
      expect(message.split('\n')[0]).toBe('invalid configuration in test.json');
      expect(message).toContain('  - indexPath: Required');
      expect(message).toContain('  - treeDir: Expected string, received number');
      expect(message).toContain('  - siteUrl: Invalid url');
      expect(message).toContain('  - feedSize: Number must be greater than or equal to 1');
    }
  });

  it('rejects notification sections without their secrets', () => {
    expect(() => resolve({ ...MINIMAL, search: { url: 'https://search.example.org/' } })).toThrowError(
      /search\.key: missing/
    );
    expect(() => resolve(MINIMAL, {}, { triggerSearchIndex: true })).toThrowError(/search: required/);
  });
});

describe('loadConfig', () => {
  it('reads the file named by ARCHIVE_INDEX_CONFIG', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-'));
    try {
      const file = path.join(dir, 'archive.json');
      fs.writeFileSync(file, JSON.stringify({ ...MINIMAL, destDir: 'out' }));
      const config = loadConfig({ env: { ARCHIVE_INDEX_CONFIG: file } });
      expect(config.destDir).toBe(path.join(dir, 'out'));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('requires a configuration file', () => {
    expect(() => loadConfig({ env: {} })).toThrowError(ConfigError);
  });
});
