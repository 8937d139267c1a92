import fs from 'node:fs';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { ArchiveModel } from '../types/model.js';
import type { ArchivePath } from '../types/ids.js';
import { CommitFailureError } from '../errors.js';
import { parentArchivePath } from '../paths/normalize.js';
import { writeFileAtomic } from '../utils/atomic.js';

/** What a directory page shows from other directories. */
export interface PageLinks {
  /** Ancestor sections whose declarations appear on the page. */
  sections: ArchivePath[];
  /** Directories holding another member of one of the page's clusters. */
  partners: ArchivePath[];
}

export type PageLinkMap = Map<ArchivePath, PageLinks>;

const LINKS_VERSION = 1;

const linksFileSchema = z.object({
  version: z.literal(LINKS_VERSION),
  pages: z.record(
    z.object({
      sections: z.array(z.string()),
      partners: z.array(z.string())
    })
  )
});

export function collectPageLinks(model: ArchiveModel): PageLinkMap {
  const out: PageLinkMap = new Map();
  for (const dir of model.dirs.values()) {
    const sections = model.mentions.declaringSectionsOf(dir.path).filter((section) => section !== dir.path);
    const partners = new Set<ArchivePath>();
    for (const entry of dir.files) {
      for (const member of model.clusters.membersOf(entry.path)) {
        const owner = parentArchivePath(member);
        if (owner !== null && owner !== dir.path) partners.add(owner);
      }
    }
    if (sections.length > 0 || partners.size > 0) {
      out.set(dir.path, { sections, partners: [...partners].sort() });
    }
  }
  return out;
}

/**
 * The link graph of the last successful build. A later build consults it so
 * that a link which has since disappeared still regenerates the page that
 * showed it.
 */
export class PageLinkStore {
  constructor(
    private readonly path: string,
    private readonly logger: Logger
  ) {}

  read(): PageLinkMap | null {
    let text: string;
    try {
      text = fs.readFileSync(this.path, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      throw err;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      raw = null;
    }
    const parsed = linksFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ path: this.path }, 'ignoring unreadable page links');
      return null;
    }
    return new Map(Object.entries(parsed.data.pages));
  }

  write(links: PageLinkMap): void {
    const pages: Record<ArchivePath, PageLinks> = {};
    for (const [page, entry] of links) pages[page] = entry;
    try {
      writeFileAtomic(this.path, `${JSON.stringify({ version: LINKS_VERSION, pages })}\n`);
    } catch (err) {
      throw new CommitFailureError('page links', err);
    }
  }
}
