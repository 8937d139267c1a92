import fs from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import type { BuildConfig } from '../types/config.js';
import { ConfigError } from '../errors.js';
import { configEnvSchema, configFileSchema, type ConfigEnv, type ConfigFile } from './schema.js';

export type EnvSource = Record<string, string | undefined>;

/** Command-line flags; each one set wins over the file. */
export interface ConfigOverrides {
  forceFull?: boolean;
  excludeUndocumented?: boolean;
  triggerSearchIndex?: boolean;
  logLevel?: string;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: EnvSource;
  overrides?: ConfigOverrides;
}

function formatIssues(source: string, issues: z.ZodIssue[]): string {
  const details = issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `  - ${location}: ${issue.message}`;
  });
  return `invalid configuration in ${source}\n${details.join('\n')}`;
}

function trimSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}

/** Reads the JSON file named by the options or ARCHIVE_INDEX_CONFIG and resolves it. */
export function loadConfig(options: LoadConfigOptions = {}): BuildConfig {
  const env = parseEnv(options.env ?? process.env);
  const configPath = options.configPath ?? env.ARCHIVE_INDEX_CONFIG;
  if (!configPath) {
    throw new ConfigError('no configuration file: pass --config or set ARCHIVE_INDEX_CONFIG');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`cannot read ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return resolveConfig(raw, {
    env,
    baseDir: path.dirname(path.resolve(configPath)),
    source: configPath,
    overrides: options.overrides
  });
}

export function parseEnv(source: EnvSource): ConfigEnv {
  const result = configEnvSchema.safeParse(source);
  if (!result.success) throw new ConfigError(formatIssues('environment', result.error.issues));
  return result.data;
}

export interface ResolveConfigOptions {
  env: ConfigEnv;
  /** Relative paths in the file are taken from here. */
  baseDir: string;
  source: string;
  overrides?: ConfigOverrides;
}

/** Validates the parsed file, fills defaults and applies secrets from the environment. */
export function resolveConfig(raw: unknown, options: ResolveConfigOptions): BuildConfig {
  const result = configFileSchema.safeParse(raw);
  if (!result.success) throw new ConfigError(formatIssues(options.source, result.error.issues));
  const file: ConfigFile = result.data;
  const { env, overrides = {} } = options;
  const at = (value: string): string => path.resolve(options.baseDir, value);

  const issues: string[] = [];
  const searchKey = env.SEARCH_REINDEX_KEY ?? file.search?.key;
  if (file.search && !searchKey) issues.push('search.key: missing (set SEARCH_REINDEX_KEY)');
  const purgeKey = env.CACHE_PURGE_KEY ?? file.purge?.key;
  const purgeEmail = env.CACHE_PURGE_EMAIL ?? file.purge?.email;
  if (file.purge && !purgeKey) issues.push('purge.key: missing (set CACHE_PURGE_KEY)');
  if (file.purge && !purgeEmail) issues.push('purge.email: missing (set CACHE_PURGE_EMAIL)');
  const triggerSearchIndex = overrides.triggerSearchIndex ?? file.triggerSearchIndex;
  if (triggerSearchIndex && !file.search) issues.push('search: required when the search index is triggered');
  if (issues.length > 0) {
    throw new ConfigError(`invalid configuration in ${options.source}\n${issues.map((i) => `  - ${i}`).join('\n')}`);
  }

  const destDir = at(file.destDir);
  const siteUrl = trimSlashes(file.siteUrl);
  return {
    rootName: file.rootName,
    indexPath: at(file.indexPath),
    treeDir: at(file.treeDir),
    destDir,
    templateDir: file.templateDir ? at(file.templateDir) : undefined,
    cachePath: file.cachePath ? at(file.cachePath) : path.join(destDir, 'checksum-cache.sqlite'),
    markerPath: file.markerPath ? at(file.markerPath) : path.join(destDir, '.last-build'),
    linksPath: file.linksPath ? at(file.linksPath) : path.join(destDir, '.page-links.json'),
    lockPath: file.lockPath ? at(file.lockPath) : path.join(destDir, '.build.lock'),
    manifestName: file.manifestName,
    fragmentName: file.fragmentName,
    identifierKeys: file.identifierKeys.map((key) => key.toLowerCase()),
    reserved: file.reserved,
    quietPrefixes: file.quietPrefixes,
    excludeUndocumented: overrides.excludeUndocumented ?? file.excludeUndocumented,
    forceFull: overrides.forceFull ?? false,
    triggerSearchIndex,
    feedSize: file.feedSize,
    feedTitle: file.feedTitle,
    siteUrl,
    pageBaseUrl: trimSlashes(file.pageBaseUrl ?? `${siteUrl}/indexes`),
    fileBaseUrl: trimSlashes(file.fileBaseUrl ?? siteUrl),
    hashConcurrency: file.concurrency.hash,
    outputModes: { file: file.outputMode.file, dir: file.outputMode.dir },
    search: file.search && searchKey ? { url: file.search.url, key: searchKey } : undefined,
    purge:
      file.purge && purgeKey && purgeEmail
        ? {
            url: file.purge.url,
            key: purgeKey,
            email: purgeEmail,
            prefixes: file.purge.prefixes.map(trimSlashes),
            unboxBase: file.purge.unboxBase ? trimSlashes(file.purge.unboxBase) : undefined
          }
        : undefined,
    logLevel: overrides.logLevel ?? env.LOG_LEVEL ?? file.logLevel
  };
}
