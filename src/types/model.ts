import type { ArchivePath, EpochSeconds } from './ids.js';
import type { MetadataBlock } from './metadata.js';

/** One declaration of a path, tagged with where it came from. */
export interface InheritedDescription {
  sectionPath: ArchivePath;
  /** Segments between the declaring section and the described path. */
  depth: number;
  description: string;
  line: number;
  order: number;
}

/** A description declared in this directory's section, or above it, for a path further down. */
export interface DescendantMention {
  path: ArchivePath;
  sectionPath: ArchivePath;
  description: string;
  order: number;
}

export type SymlinkTarget =
  | { kind: 'file'; path: ArchivePath }
  | { kind: 'directory'; path: ArchivePath };

export interface FileEntry {
  name: string;
  dir: ArchivePath;
  path: ArchivePath;
  size: number;
  mtimeMs: number;
  date: EpochSeconds;
  md5?: string;
  sha512?: string;
  symlink?: SymlinkTarget;
  /** `key:value` pairs taken from the configured identifier keys. */
  identifiers: string[];
  description: string;
  metadata: MetadataBlock;
  documented: boolean;
  /** Document order of the first declaration; undocumented entries sort last. */
  firstOrder: number;
}

export interface DirectoryNode {
  path: ArchivePath;
  name: string;
  parent: ArchivePath | null;
  subdirs: ArchivePath[];
  files: FileEntry[];
  metadata: MetadataBlock;
  description: string;
  /** Description given to this directory by a file heading in an ancestor section. */
  entryDescription: string;
  fileCount: number;
  subdirCount: number;
  mtimeMs: number;
  fragmentMtimeMs?: number;
}

/** Path-keyed provenance lookups; nodes never point back into it. */
export interface MentionLookup {
  inheritedFor(path: ArchivePath): InheritedDescription[];
  descendantsOf(dir: ArchivePath): DescendantMention[];
  /** Sections that declared something at or below `dir`, for change tracking. */
  declaringSectionsOf(dir: ArchivePath): ArchivePath[];
}

export interface ClusterLookup {
  /** Every member of the path's cluster, itself included, in document order. */
  membersOf(path: ArchivePath): ArchivePath[];
  metadataOf(path: ArchivePath): MetadataBlock;
}

export interface ArchiveModel {
  rootName: string;
  dirs: Map<ArchivePath, DirectoryNode>;
  mentions: MentionLookup;
  clusters: ClusterLookup;
}
