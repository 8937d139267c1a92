import type { Logger } from 'pino';
import { SectionKind } from '../types/enums.js';
import type { ParsedDocument, SectionRecord } from '../types/document.js';
import type { ArchivePath } from '../types/ids.js';
import type { ArchiveModel, DirectoryNode, FileEntry, InheritedDescription } from '../types/model.js';
import type { ScanResult, ScannedDirectory, ScannedFile } from '../types/scan.js';
import { createMetadataBlock, mergeMetadataInto, type MetadataBlock } from '../types/metadata.js';
import { DiagnosticCode } from '../types/diagnostic.js';
import type { DiagnosticLog } from '../diagnostics/DiagnosticLog.js';
import { ancestorsOf, parentArchivePath } from '../paths/normalize.js';
import { compareNames } from '../utils/order.js';
import { toEpochSeconds } from '../utils/time.js';
import { MentionIndex, primaryDeclaration } from './MentionIndex.js';
import { IdentifierClusters } from './IdentifierClusters.js';

const MAX_LINK_HOPS = 8;

export interface MetadataResolverOptions {
  identifierKeys: string[];
  quietPrefixes: string[];
  excludeUndocumented: boolean;
  diagnostics: DiagnosticLog;
  logger: Logger;
}

function toInherited(record: SectionRecord): InheritedDescription {
  return {
    sectionPath: record.sectionPath,
    depth: record.depth,
    description: record.description,
    line: record.line,
    order: record.order
  };
}

/**
 * Unifies the parsed document with the filesystem skeleton. The filesystem
 * decides what exists; the document only contributes descriptions,
 * metadata and identifiers.
 */
export class MetadataResolver {
  constructor(private readonly options: MetadataResolverOptions) {}

  resolve(doc: ParsedDocument, scan: ScanResult): ArchiveModel {
    const fileDecls = new Map<ArchivePath, SectionRecord[]>();
    const dirDecls = new Map<ArchivePath, SectionRecord[]>();
    for (const record of doc.sections) {
      const target = record.kind === SectionKind.DIRECTORY ? dirDecls : fileDecls;
      const list = target.get(record.path);
      if (list) list.push(record);
      else target.set(record.path, [record]);
    }

    const mentions = new MentionIndex();
    for (const [path, records] of fileDecls) {
      for (const record of records) mentions.addDeclaration(path, toInherited(record));
    }
    mentions.seal();

    const livePaths = new Set<ArchivePath>(scan.dirs.keys());
    const dirs = new Map<ArchivePath, DirectoryNode>();
    for (const scanned of scan.dirs.values()) {
      dirs.set(scanned.path, this.buildDirectory(scanned, dirDecls.get(scanned.path) ?? [], mentions));
      for (const file of scanned.files) livePaths.add(file.path);
    }

    for (const dir of dirs.values()) {
      const scanned = scan.dirs.get(dir.path);
      if (!scanned) continue;
      for (const file of scanned.files) {
        const entry = this.buildFile(file, dir.path, fileDecls.get(file.path) ?? [], mentions);
        if (entry) dir.files.push(entry);
      }
    }

    this.reportMissing(dirDecls, fileDecls, livePaths, mentions);
    this.recordMentions(fileDecls, dirs, livePaths, mentions);
    this.resolveSymlinks(dirs);

    const clusters = new IdentifierClusters();
    const identified: FileEntry[] = [];
    for (const dir of dirs.values()) {
      for (const entry of dir.files) {
        if (entry.identifiers.length > 0) identified.push(entry);
      }
    }
    identified.sort((a, b) => a.firstOrder - b.firstOrder || compareNames(a.path, b.path));
    for (const entry of identified) clusters.add(entry);

    for (const dir of dirs.values()) {
      dir.files.sort((a, b) => compareNames(a.name, b.name));
      dir.subdirs.sort((a, b) => compareNames(a, b));
      dir.fileCount = dir.files.length;
      dir.subdirCount = dir.subdirs.length;
    }

    this.options.logger.debug(
      { dirs: dirs.size, sections: doc.sections.length, clusters: clusters.clusters().length },
      'resolved archive model'
    );
    return { rootName: scan.rootName, dirs, mentions, clusters };
  }

  private buildDirectory(scanned: ScannedDirectory, records: SectionRecord[], mentions: MentionIndex): DirectoryNode {
    const metadata = createMetadataBlock();
    const descriptions: string[] = [];
    for (const record of records) {
      mergeMetadataInto(metadata, record.metadata);
      if (record.description.length > 0) descriptions.push(record.description);
    }
    const primary = primaryDeclaration(mentions.inheritedFor(scanned.path));
    return {
      path: scanned.path,
      name: scanned.name,
      parent: scanned.parent,
      subdirs: [...scanned.subdirs],
      files: [],
      metadata,
      description: descriptions.join('\n\n'),
      entryDescription: primary?.description ?? '',
      fileCount: 0,
      subdirCount: 0,
      mtimeMs: scanned.mtimeMs,
      fragmentMtimeMs: scanned.fragmentMtimeMs
    };
  }

  private buildFile(
    file: ScannedFile,
    dirPath: ArchivePath,
    records: SectionRecord[],
    mentions: MentionIndex
  ): FileEntry | null {
    const documented = records.length > 0;
    if (!documented && !this.isQuiet(file.path)) {
      this.options.diagnostics.report(DiagnosticCode.UNDOCUMENTED_FILE, file.path, 'file without index entry');
      if (this.options.excludeUndocumented) return null;
    }

    const chain = mentions.inheritedFor(file.path);
    const metadata = createMetadataBlock();
    for (const link of chain) {
      const record = records.find((candidate) => candidate.order === link.order);
      if (record) mergeMetadataInto(metadata, record.metadata);
    }

    return {
      name: file.name,
      dir: dirPath,
      path: file.path,
      size: file.size,
      mtimeMs: file.mtimeMs,
      date: toEpochSeconds(file.mtimeMs),
      symlink: file.symlink ? { kind: file.symlink.kind, path: file.symlink.target } : undefined,
      identifiers: this.identifiersOf(metadata),
      description: primaryDeclaration(chain)?.description ?? '',
      metadata,
      documented,
      firstOrder: documented ? Math.min(...records.map((record) => record.order)) : Number.MAX_SAFE_INTEGER
    };
  }

  private identifiersOf(metadata: MetadataBlock): string[] {
    const out: string[] = [];
    for (const key of this.options.identifierKeys) {
      for (const value of metadata.get(key.toLowerCase()) ?? []) {
        out.push(`${key.toLowerCase()}:${value}`);
      }
    }
    return out;
  }

  private isQuiet(path: ArchivePath): boolean {
    return this.options.quietPrefixes.some((prefix) => path.startsWith(prefix));
  }

  private reportMissing(
    dirDecls: Map<ArchivePath, SectionRecord[]>,
    fileDecls: Map<ArchivePath, SectionRecord[]>,
    livePaths: Set<ArchivePath>,
    mentions: MentionIndex
  ): void {
    const { diagnostics } = this.options;
    for (const path of dirDecls.keys()) {
      if (!livePaths.has(path)) {
        diagnostics.report(DiagnosticCode.MISSING_FILE, path, 'index section for a directory that does not exist');
      }
    }
    for (const path of fileDecls.keys()) {
      if (!livePaths.has(path)) {
        diagnostics.report(DiagnosticCode.MISSING_FILE, path, 'index entry without file');
        mentions.drop(path);
      }
    }
  }

  private recordMentions(
    fileDecls: Map<ArchivePath, SectionRecord[]>,
    dirs: Map<ArchivePath, DirectoryNode>,
    livePaths: Set<ArchivePath>,
    mentions: MentionIndex
  ): void {
    for (const [path, records] of fileDecls) {
      if (!livePaths.has(path)) continue;
      const parent = parentArchivePath(path);
      for (const record of records) {
        const between = ancestorsOf(path).filter((dir) => dir.startsWith(`${record.sectionPath}/`));
        for (const dir of [record.sectionPath, ...between]) {
          mentions.addDeclaringSection(dir, record.sectionPath);
          if (dir === parent || !dirs.has(dir)) continue;
          mentions.addDescendantMention(dir, {
            path,
            sectionPath: record.sectionPath,
            description: record.description,
            order: record.order
          });
        }
        if (dirs.has(path)) mentions.addDeclaringSection(path, record.sectionPath);
      }
    }
    mentions.seal();
  }

  private resolveSymlinks(dirs: Map<ArchivePath, DirectoryNode>): void {
    const byPath = new Map<ArchivePath, FileEntry>();
    for (const dir of dirs.values()) {
      for (const entry of dir.files) byPath.set(entry.path, entry);
    }

    for (const dir of dirs.values()) {
      for (const entry of dir.files) {
        if (!entry.symlink) continue;
        if (entry.symlink.kind === 'directory') {
          if (entry.description.length === 0) entry.description = `Symlink to ${entry.symlink.path}`;
          continue;
        }
        const target = this.followFileLink(entry, byPath);
        if (!target) continue;
        entry.size = target.size;
        entry.mtimeMs = target.mtimeMs;
        entry.date = target.date;
        if (entry.description.length === 0) entry.description = target.description;
        if (entry.metadata.size === 0) {
          mergeMetadataInto(entry.metadata, target.metadata);
          entry.identifiers = this.identifiersOf(entry.metadata);
        }
      }
    }
  }

  private followFileLink(entry: FileEntry, byPath: Map<ArchivePath, FileEntry>): FileEntry | undefined {
    let current: FileEntry | undefined = entry;
    for (let hop = 0; hop < MAX_LINK_HOPS && current?.symlink?.kind === 'file'; hop += 1) {
      current = byPath.get(current.symlink.path);
    }
    return current && !current.symlink ? current : undefined;
  }
}
