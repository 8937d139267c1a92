import type { ArchivePath } from '../types/ids.js';
import type { ClusterLookup, FileEntry } from '../types/model.js';
import { createMetadataBlock, mergeMetadataInto, type MetadataBlock } from '../types/metadata.js';
import { DisjointSet } from './DisjointSet.js';

/**
 * Groups entries that declare a shared identifier into one logical work.
 * Membership is answered on demand from the disjoint set; nothing is copied
 * onto the entries themselves.
 */
export class IdentifierClusters implements ClusterLookup {
  private readonly sets = new DisjointSet();
  private readonly entries = new Map<ArchivePath, FileEntry>();
  private members: Map<string, ArchivePath[]> | null = null;

  /** Entries must be added in document order. */
  add(entry: FileEntry): void {
    if (entry.identifiers.length === 0) return;
    this.entries.set(entry.path, entry);
    const pathKey = `path:${entry.path}`;
    this.sets.add(pathKey);
    for (const identifier of entry.identifiers) {
      this.sets.union(`id:${identifier}`, pathKey);
    }
    this.members = null;
  }

  membersOf(path: ArchivePath): ArchivePath[] {
    const pathKey = `path:${path}`;
    if (!this.sets.has(pathKey)) return [path];
    return this.groups().get(this.sets.find(pathKey)) ?? [path];
  }

  metadataOf(path: ArchivePath): MetadataBlock {
    const merged = createMetadataBlock();
    for (const member of this.membersOf(path)) {
      const entry = this.entries.get(member);
      if (entry) mergeMetadataInto(merged, entry.metadata);
    }
    return merged;
  }

  /** Clusters with more than one member, each ordered by first declaration. */
  clusters(): ArchivePath[][] {
    return [...this.groups().values()].filter((members) => members.length > 1);
  }

  private groups(): Map<string, ArchivePath[]> {
    if (this.members) return this.members;
    const out = new Map<string, ArchivePath[]>();
    for (const [root, keys] of this.sets.groups()) {
      const paths = keys.filter((key) => key.startsWith('path:')).map((key) => key.slice('path:'.length));
      paths.sort((a, b) => this.orderOf(a) - this.orderOf(b));
      out.set(root, paths);
    }
    this.members = out;
    return out;
  }

  private orderOf(path: ArchivePath): number {
    return this.entries.get(path)?.firstOrder ?? Number.MAX_SAFE_INTEGER;
  }
}
