import type { ArchivePath } from '../types/ids.js';
import type { DescendantMention, InheritedDescription, MentionLookup } from '../types/model.js';

function sectionDepth(sectionPath: ArchivePath): number {
  return sectionPath.split('/').length;
}

/**
 * Non-owning multimap from a path to every declaration that named it, plus
 * the reverse view from a directory to the deeper paths its sections (or its
 * ancestors' sections) described.
 */
export class MentionIndex implements MentionLookup {
  private readonly inherited = new Map<ArchivePath, InheritedDescription[]>();
  private readonly descendants = new Map<ArchivePath, DescendantMention[]>();
  private readonly declaring = new Map<ArchivePath, Set<ArchivePath>>();

  addDeclaration(path: ArchivePath, entry: InheritedDescription): void {
    const list = this.inherited.get(path);
    if (list) list.push(entry);
    else this.inherited.set(path, [entry]);
  }

  addDescendantMention(dir: ArchivePath, mention: DescendantMention): void {
    const list = this.descendants.get(dir);
    if (list) list.push(mention);
    else this.descendants.set(dir, [mention]);
  }

  addDeclaringSection(dir: ArchivePath, sectionPath: ArchivePath): void {
    const set = this.declaring.get(dir);
    if (set) set.add(sectionPath);
    else this.declaring.set(dir, new Set([sectionPath]));
  }

  /** Sorts every chain shallowest section first, then by document order. */
  seal(): this {
    for (const list of this.inherited.values()) {
      list.sort((a, b) => sectionDepth(a.sectionPath) - sectionDepth(b.sectionPath) || a.order - b.order);
    }
    for (const list of this.descendants.values()) {
      list.sort((a, b) => a.order - b.order);
    }
    return this;
  }

  drop(path: ArchivePath): void {
    this.inherited.delete(path);
  }

  inheritedFor(path: ArchivePath): InheritedDescription[] {
    return this.inherited.get(path) ?? [];
  }

  descendantsOf(dir: ArchivePath): DescendantMention[] {
    return this.descendants.get(dir) ?? [];
  }

  declaringSectionsOf(dir: ArchivePath): ArchivePath[] {
    return [...(this.declaring.get(dir) ?? [])].sort();
  }
}

/** The declaration closest to the path wins; ties go to the earliest in the document. */
export function primaryDeclaration(chain: InheritedDescription[]): InheritedDescription | undefined {
  let best: InheritedDescription | undefined;
  for (const entry of chain) {
    if (
      !best ||
      sectionDepth(entry.sectionPath) > sectionDepth(best.sectionPath) ||
      (sectionDepth(entry.sectionPath) === sectionDepth(best.sectionPath) && entry.order < best.order)
    ) {
      best = entry;
    }
  }
  return best;
}
