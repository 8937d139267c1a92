import type { ArchivePath } from './ids.js';
import type { SectionKind } from './enums.js';
import type { MetadataBlock } from './metadata.js';

export interface SectionRecord {
  kind: SectionKind;
  /** Full path of the described directory or file. */
  path: ArchivePath;
  /** Directory heading the record was declared under (equal to `path` for directory records). */
  sectionPath: ArchivePath;
  /** Segments in the file heading; 1 for a direct child, 0 for a directory record. */
  depth: number;
  metadata: MetadataBlock;
  description: string;
  /** 1-based line of the heading. */
  line: number;
  /** Position in the document, used as the tie-breaker everywhere. */
  order: number;
}

export interface ParsedDocument {
  rootName: string;
  sections: SectionRecord[];
}
