import path from 'node:path';
import type { Logger } from 'pino';
import type { PurgeNotifyConfig } from '../types/config.js';
import { encodeArchivePath } from '../paths/encode.js';
import { shortHash } from '../utils/crypto.js';
import { listZipMembers } from './zipMembers.js';

export interface UncacheOptions {
  rootName: string;
  treeDir: string;
  purge: Pick<PurgeNotifyConfig, 'prefixes' | 'unboxBase'>;
  logger: Logger;
}

function knownHosts(prefixes: string[]): Set<string> {
  const hosts = new Set<string>();
  for (const prefix of prefixes) {
    try {
      hosts.add(new URL(prefix).host.toLowerCase());
    } catch {
      continue;
    }
  }
  return hosts;
}

/**
 * Reduces `foo`, `/if-archive/foo` or `https://host/if-archive/foo` to the
 * path below the archive root. Hosts not among the purge prefixes are kept.
 */
export function normalizeArchiveArgument(value: string, rootName: string, hosts: Set<string>): string {
  let rest = value;
  const match = /^https?:\/\/([^/]+)\//i.exec(rest);
  if (match && hosts.has(match[1].toLowerCase())) rest = rest.slice(match[0].length);
  if (rest.startsWith('/')) rest = rest.slice(1);
  if (rest.startsWith(`${rootName}/`)) rest = rest.slice(rootName.length + 1);
  return rest;
}

/** Every public URL of the named files, plus unboxed zip members with `zip`. */
export async function expandUncacheUrls(
  args: string[],
  options: UncacheOptions & { zip: boolean; rawUrls?: string[] }
): Promise<string[]> {
  const { purge, rootName, logger } = options;
  const hosts = knownHosts(purge.prefixes);
  const urls = [...(options.rawUrls ?? [])];
  const files = args.map((arg) => normalizeArchiveArgument(arg, rootName, hosts));

  for (const file of files) {
    for (const prefix of purge.prefixes) urls.push(`${prefix}/${encodeArchivePath(file)}`);
  }

  if (options.zip) {
    if (!purge.unboxBase) {
      logger.warn('no unboxBase configured; zip members are not purged');
      return urls;
    }
    for (const file of files) {
      const zipPath = path.join(options.treeDir, rootName, ...file.split('/'));
      try {
        const hash = shortHash(file);
        for (const member of await listZipMembers(zipPath)) {
          urls.push(`${purge.unboxBase}/${hash}/${encodeArchivePath(member)}`);
        }
      } catch (err) {
        logger.warn({ err, path: zipPath }, 'cannot list zip members');
      }
    }
  }
  return urls;
}
