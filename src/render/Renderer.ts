import type { Logger } from 'pino';
import type { ArchiveModel, DirectoryNode, FileEntry } from '../types/model.js';
import type { BuildConfig } from '../types/config.js';
import type { ArchivePath, EpochSeconds } from '../types/ids.js';
import { createMetadataBlock, mergeMetadataInto, type MetadataBlock } from '../types/metadata.js';
import { DateWindow, type BuildPlan } from '../types/plan.js';
import { ancestorsOf, baseName, parentArchivePath } from '../paths/normalize.js';
import { compareNames } from '../utils/order.js';
import { formatDateStr, formatRfc822 } from '../utils/time.js';
import { isStringNonwhite } from '../utils/text.js';
import { inWindow, WINDOW_PAGES } from '../plan/windows.js';
import { anchorId, cdata, displayName, escapeHtml, escapeXml, hrefFor } from './escape.js';
import type { TemplateContext, TemplateOutput } from './template.js';
import type { TemplateSet } from './TemplateSet.js';
import type { OutputWriter } from './OutputWriter.js';

export type RendererConfig = Pick<
  BuildConfig,
  'rootName' | 'siteUrl' | 'pageBaseUrl' | 'fileBaseUrl' | 'feedSize' | 'feedTitle' | 'manifestName'
>;

export interface RendererOptions {
  config: RendererConfig;
  templates: TemplateSet;
  logger: Logger;
}

const INTERVAL_NAMES: Record<DateWindow, string | null> = {
  [DateWindow.ALL]: null,
  [DateWindow.WEEK]: 'week',
  [DateWindow.MONTH]: 'month',
  [DateWindow.QUARTER]: 'three months',
  [DateWindow.YEAR]: 'year'
};

export const DIRLIST_PAGE = 'dirlist.html';
export const FEED_PAGE = 'feed.xml';

function parity(index: number): string {
  return index % 2 === 0 ? 'Even' : 'Odd';
}

function newestFirst(a: FileEntry, b: FileEntry): number {
  return b.date - a.date || compareNames(a.name, b.name) || compareNames(a.path, b.path);
}

/**
 * Turns the resolved model into pages. Every method is a pure function of
 * the model, the configuration and the `now` it is given.
 */
export class Renderer {
  constructor(private readonly options: RendererOptions) {}

  /** Writes every output the plan names; returns the relative paths written. */
  render(model: ArchiveModel, plan: BuildPlan, writer: OutputWriter): string[] {
    const { logger, config } = this.options;
    for (const path of [...plan.dirs].sort(compareNames)) {
      const dir = model.dirs.get(path);
      if (!dir) continue;
      writer.write(`${path}/index.html`, this.directoryPage(model, dir));
    }
    for (const window of plan.windows) {
      writer.write(WINDOW_PAGES[window], this.datePage(model, window, plan.now));
    }
    writer.write(DIRLIST_PAGE, this.dirList(model));
    writer.write(config.manifestName, this.manifest(model));
    writer.write(FEED_PAGE, this.feed(model, plan.now));
    logger.info({ files: writer.files().length, full: plan.full }, 'rendered outputs');
    return writer.files();
  }

  directoryPage(model: ArchiveModel, dir: DirectoryNode): string {
    const { templates } = this.options;
    const isRoot = dir.parent === null;
    const subdirs = dir.subdirs.map((path) => model.dirs.get(path)).filter((d): d is DirectoryNode => d !== undefined);
    const mentions = model.mentions.descendantsOf(dir.path);
    const context: TemplateContext = {
      ...this.siteContext(),
      title: escapeHtml(dir.path),
      dirname: displayName(dir.path),
      _breadcrumbs: (out) => this.writeBreadcrumbs(dir.path, out),
      isroot: isRoot,
      header: isRoot ? templates.raw('top-level.html') : '',
      hasdesc: isStringNonwhite(dir.description),
      desc: dir.description,
      hasmetadata: dir.metadata.size > 0,
      _metadata: (out) => this.writeHtmlMetadata(dir.metadata, out),
      hassubdirs: subdirs.length > 0,
      _subdirs: (out) =>
        subdirs.forEach((subdir, index) =>
          this.entry('subdir-entry.html', out, {
            parity: parity(index),
            anchor: anchorId('dir', subdir.name),
            href: this.pageUrl(subdir.path),
            name: displayName(subdir.name),
            filecount: subdir.fileCount,
            subdircount: subdir.subdirCount,
            hasdesc: isStringNonwhite(subdir.entryDescription),
            desc: subdir.entryDescription
          })
        ),
      hasfiles: dir.files.length > 0,
      _files: (out) => dir.files.forEach((entry, index) => this.writeFileEntry(model, entry, index, out)),
      hasmentions: mentions.length > 0,
      _mentions: (out) =>
        mentions.forEach((mention, index) =>
          this.entry('mention-entry.html', out, {
            parity: parity(index),
            href: this.entryUrl(mention.path),
            path: displayName(mention.path.slice(dir.path.length + 1)),
            hasdesc: isStringNonwhite(mention.description),
            desc: mention.description
          })
        ),
      filecount: dir.fileCount,
      subdircount: dir.subdirCount
    };
    return `${templates.get('directory.html').renderToString([context])}\n`;
  }

  datePage(model: ArchiveModel, window: DateWindow, now: EpochSeconds): string {
    const files = this.filesByDate(model).filter((entry) => inWindow(window, entry.date, now));
    const interval = INTERVAL_NAMES[window];
    const context: TemplateContext = {
      ...this.siteContext(),
      hasinterval: interval !== null,
      interval: interval ?? '',
      _files: (out) =>
        files.forEach((entry, index) =>
          this.entry('date-entry.html', out, {
            parity: parity(index),
            datestr: formatDateStr(entry.date),
            href: this.fileUrl(entry.path),
            name: displayName(entry.name),
            dirhref: this.entryUrl(entry.path),
            dir: displayName(entry.dir),
            hasdesc: isStringNonwhite(entry.description),
            desc: entry.description
          })
        )
    };
    return `${this.options.templates.get('date.html').renderToString([context])}\n`;
  }

  dirList(model: ArchiveModel): string {
    const dirs = this.sortedDirs(model);
    const context: TemplateContext = {
      ...this.siteContext(),
      _dirs: (out) =>
        dirs.forEach((dir, index) =>
          this.entry('dirlist-entry.html', out, {
            parity: parity(index),
            href: this.pageUrl(dir.path),
            dir: displayName(dir.path),
            filecount: dir.fileCount
          })
        )
    };
    return `${this.options.templates.get('dirlist.html').renderToString([context])}\n`;
  }

  manifest(model: ArchiveModel): string {
    const { templates } = this.options;
    const context: TemplateContext = {
      ...this.siteContext(),
      _dirs: (out) => {
        for (const dir of this.sortedDirs(model)) {
          templates.get('xml-dir.xml').render(
            [
              {
                dir: escapeXml(dir.path),
                filecount: dir.fileCount,
                subdircount: dir.subdirCount,
                hasdesc: isStringNonwhite(dir.description),
                desc: cdata(dir.description),
                _metadata: (inner) => this.writeXmlMetadata(dir.metadata, inner),
                _files: (inner) => dir.files.forEach((entry) => this.writeXmlFile(model, entry, inner))
              }
            ],
            out
          );
          out.write('\n');
        }
      }
    };
    return `${templates.get('master-index.xml').renderToString([context])}\n`;
  }

  feed(model: ArchiveModel, now: EpochSeconds): string {
    const { config, templates } = this.options;
    const items = this.filesByDate(model).slice(0, config.feedSize);
    const context: TemplateContext = {
      ...this.siteContext(),
      title: escapeXml(config.feedTitle),
      link: escapeXml(`${config.pageBaseUrl}/${DIRLIST_PAGE}`),
      builddate: formatRfc822(now),
      _items: (out) =>
        items.forEach((entry) =>
          this.entry('feed-item.xml', out, {
            name: escapeXml(entry.name),
            link: escapeXml(this.entryUrl(entry.path)),
            guid: escapeXml(this.fileUrl(entry.path)),
            pubdate: formatRfc822(entry.date),
            hasdesc: isStringNonwhite(entry.description),
            desc: cdata(entry.description)
          })
        )
    };
    return `${templates.get('feed.xml').renderToString([context])}\n`;
  }

  pageUrl(path: ArchivePath): string {
    return `${this.options.config.pageBaseUrl}/${hrefFor(path)}/`;
  }

  fileUrl(path: ArchivePath): string {
    return `${this.options.config.fileBaseUrl}/${hrefFor(path)}`;
  }

  /** Link to a file's entry on its directory page. */
  entryUrl(path: ArchivePath): string {
    const parent = parentArchivePath(path) ?? path;
    return `${this.pageUrl(parent)}#${anchorId('file', baseName(path))}`;
  }

  private siteContext(): TemplateContext {
    const { config } = this.options;
    return {
      root: escapeXml(config.rootName),
      site: escapeHtml(config.siteUrl),
      pagebase: escapeHtml(config.pageBaseUrl),
      filebase: escapeHtml(config.fileBaseUrl)
    };
  }

  private entry(
    name: 'subdir-entry.html' | 'mention-entry.html' | 'date-entry.html' | 'dirlist-entry.html' | 'feed-item.xml',
    out: TemplateOutput,
    context: TemplateContext
  ): void {
    this.options.templates.get(name).render([context], out);
    out.write('\n');
  }

  private writeFileEntry(model: ArchiveModel, entry: FileEntry, index: number, out: TemplateOutput): void {
    const chain = model.mentions.inheritedFor(entry.path);
    const others = model.clusters.membersOf(entry.path).filter((member) => member !== entry.path);
    const link = entry.symlink;
    const metadata = this.metadataFor(model, entry);
    const context: TemplateContext = {
      parity: parity(index),
      anchor: anchorId('file', entry.name),
      href: link?.kind === 'directory' ? this.pageUrl(link.path) : this.fileUrl(entry.path),
      name: displayName(entry.name),
      islink: link !== undefined,
      linkhref: link ? (link.kind === 'directory' ? this.pageUrl(link.path) : this.entryUrl(link.path)) : '',
      linktarget: link ? displayName(link.path) : '',
      hassize: link?.kind !== 'directory',
      size: entry.size,
      datestr: formatDateStr(entry.date),
      hasdesc: isStringNonwhite(entry.description),
      desc: entry.description,
      hasmetadata: metadata.size > 0,
      _metadata: (inner) => this.writeHtmlMetadata(metadata, inner),
      hasinherited: chain.length > 1,
      _inherited: (inner) => {
        for (const item of chain) {
          inner.write(`<li><a href="${this.pageUrl(item.sectionPath)}">${escapeHtml(item.sectionPath)}</a>`);
          if (isStringNonwhite(item.description)) inner.write(`\n<div class="description">\n${item.description}\n</div>`);
          inner.write('</li>\n');
        }
      },
      hascluster: others.length > 0,
      _cluster: (inner) =>
        inner.write(
          others.map((member) => `<a href="${this.entryUrl(member)}">${displayName(member)}</a>`).join(', ')
        ),
      hasmd5: entry.md5 !== undefined,
      md5: entry.md5 ?? '',
      sha512: entry.sha512 ?? ''
    };
    this.options.templates.get('file-entry.html').render([context], out);
    out.write('\n');
  }

  private writeXmlFile(model: ArchiveModel, entry: FileEntry, out: TemplateOutput): void {
    const metadata = this.metadataFor(model, entry);
    const context: TemplateContext = {
      name: escapeXml(entry.name),
      path: escapeXml(entry.path),
      islink: entry.symlink !== undefined,
      linktype: entry.symlink?.kind ?? '',
      linktarget: escapeXml(entry.symlink?.path ?? ''),
      size: entry.size,
      date: entry.date,
      datestr: formatDateStr(entry.date),
      hasmd5: entry.md5 !== undefined,
      md5: entry.md5 ?? '',
      sha512: entry.sha512 ?? '',
      hasdesc: isStringNonwhite(entry.description),
      desc: cdata(entry.description),
      _metadata: (inner) => this.writeXmlMetadata(metadata, inner)
    };
    this.options.templates.get('xml-file.xml').render([context], out);
    out.write('\n');
  }

  /** The entry's own metadata, then whatever its aliases declare. */
  private metadataFor(model: ArchiveModel, entry: FileEntry): MetadataBlock {
    const merged = createMetadataBlock();
    mergeMetadataInto(merged, entry.metadata);
    mergeMetadataInto(merged, model.clusters.metadataOf(entry.path));
    return merged;
  }

  private writeBreadcrumbs(path: ArchivePath, out: TemplateOutput): void {
    const crumbs = ancestorsOf(path).map((ancestor) => `<a href="${this.pageUrl(ancestor)}">${displayName(baseName(ancestor))}</a>`);
    crumbs.push(displayName(baseName(path)));
    out.write(crumbs.join(' / '));
  }

  private writeHtmlMetadata(metadata: MetadataBlock, out: TemplateOutput): void {
    for (const [key, values] of metadata) {
      for (const value of values) {
        out.write(`<li><span class="key">${escapeHtml(key)}</span>: ${escapeHtml(value)}</li>\n`);
      }
    }
  }

  private writeXmlMetadata(metadata: MetadataBlock, out: TemplateOutput): void {
    for (const [key, values] of metadata) {
      for (const value of values) {
        out.write(`<meta key="${escapeXml(key)}">${escapeXml(value)}</meta>\n`);
      }
    }
  }

  private sortedDirs(model: ArchiveModel): DirectoryNode[] {
    return [...model.dirs.values()].sort((a, b) => compareNames(a.path, b.path));
  }

  private filesByDate(model: ArchiveModel): FileEntry[] {
    const files: FileEntry[] = [];
    for (const dir of model.dirs.values()) {
      files.push(...dir.files.filter((entry) => entry.symlink?.kind !== 'directory'));
    }
    return files.sort(newestFirst);
  }
}
