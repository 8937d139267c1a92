import fs from 'node:fs';
import type { Logger } from 'pino';
import { SectionKind } from '../types/enums.js';
import type { ParsedDocument, SectionRecord } from '../types/document.js';
import type { ArchivePath } from '../types/ids.js';
import { addMetadataValue, createMetadataBlock, type MetadataBlock } from '../types/metadata.js';
import { MalformedDocumentError } from '../errors.js';
import { ArchivePathError, joinArchivePath, splitArchivePath } from '../paths/normalize.js';
import { expandTabs, isStringNonwhite, trimBlankLines } from '../utils/text.js';
import { silentLogger } from '../logger.js';
import { classifyMetadataLine } from './metadata.js';

const DIR_HEADING_PATTERN = /^# (.*)$/;
const FILE_HEADING_PATTERN = /^## (.*)$/;
const RULE_PATTERN = /^\s*-{3,}\s*$/;

export interface IndexDocumentParserOptions {
  rootName: string;
  logger?: Logger;
}

interface OpenRecord {
  kind: SectionKind;
  path: ArchivePath;
  sectionPath: ArchivePath;
  depth: number;
  line: number;
  metadata: MetadataBlock;
  lines: string[];
  inMetadata: boolean;
  metaKey: string | null;
}

/**
 * Turns the composed description document into ordered section records.
 * Any structural fault throws MalformedDocumentError before a single record
 * is returned, so a corrupt document never reaches the renderer.
 */
export class IndexDocumentParser {
  private readonly rootName: string;
  private readonly logger: Logger;

  constructor(options: IndexDocumentParserOptions) {
    this.rootName = options.rootName;
    this.logger = options.logger ?? silentLogger;
  }

  parseFile(filePath: string): ParsedDocument {
    return this.parse(fs.readFileSync(filePath, 'utf8'));
  }

  parse(text: string): ParsedDocument {
    const sections: SectionRecord[] = [];
    let sectionPath: ArchivePath | null = null;
    let current: OpenRecord | null = null;
    let preamble = 0;

    const finish = () => {
      if (!current) return;
      sections.push({
        kind: current.kind,
        path: current.path,
        sectionPath: current.sectionPath,
        depth: current.depth,
        metadata: current.metadata,
        description: trimBlankLines(current.lines).join('\n'),
        line: current.line,
        order: sections.length
      });
      current = null;
    };

    const rawLines = text.split(/\r?\n/);
    for (let i = 0; i < rawLines.length; i += 1) {
      const lineNo = i + 1;
      const line = expandTabs(rawLines[i]).trimEnd();

      const fileHeading = FILE_HEADING_PATTERN.exec(line);
      if (fileHeading) {
        finish();
        if (sectionPath === null) {
          throw new MalformedDocumentError(lineNo, 'file heading outside of a directory section');
        }
        const name = fileHeading[1].trim().replace(/\/+$/, '');
        const parts = this.checkedSegments(name, lineNo, 'file heading');
        current = this.open(SectionKind.FILE, joinArchivePath(sectionPath, name), sectionPath, parts.length, lineNo);
        continue;
      }

      const dirHeading = DIR_HEADING_PATTERN.exec(line);
      if (dirHeading) {
        finish();
        const path = this.directoryPath(dirHeading[1].trim(), lineNo);
        sectionPath = path;
        current = this.open(SectionKind.DIRECTORY, path, path, 0, lineNo);
        continue;
      }

      if (RULE_PATTERN.test(line)) {
        finish();
        sectionPath = null;
        continue;
      }

      if (!current) {
        if (isStringNonwhite(line)) preamble += 1;
        continue;
      }
      this.consume(current, line);
    }
    finish();

    if (preamble > 0) {
      this.logger.debug({ lines: preamble }, 'ignored text outside of any section');
    }
    return { rootName: this.rootName, sections };
  }

  private open(kind: SectionKind, path: ArchivePath, sectionPath: ArchivePath, depth: number, line: number): OpenRecord {
    return {
      kind,
      path,
      sectionPath,
      depth,
      line,
      metadata: createMetadataBlock(),
      lines: [],
      inMetadata: true,
      metaKey: null
    };
  }

  private consume(record: OpenRecord, line: string): void {
    if (record.inMetadata) {
      if (!isStringNonwhite(line)) {
        record.inMetadata = false;
        return;
      }
      const meta = classifyMetadataLine(line);
      if (meta.type === 'start') {
        record.metaKey = meta.key;
        if (meta.value.length > 0) addMetadataValue(record.metadata, meta.key, meta.value);
        return;
      }
      if (meta.type === 'continuation' && record.metaKey !== null) {
        addMetadataValue(record.metadata, record.metaKey, meta.value);
        return;
      }
      record.inMetadata = false;
    }
    record.lines.push(line);
  }

  private directoryPath(heading: string, line: number): ArchivePath {
    if (!heading.endsWith(':')) {
      throw new MalformedDocumentError(line, `directory heading "${heading}" must end with ":"`);
    }
    const path = heading.slice(0, -1).trim();
    const parts = this.checkedSegments(path, line, 'directory heading');
    if (parts[0] !== this.rootName) {
      throw new MalformedDocumentError(line, `directory heading "${path}" is outside ${this.rootName}`);
    }
    return path;
  }

  private checkedSegments(value: string, line: number, what: string): string[] {
    try {
      return splitArchivePath(value);
    } catch (err) {
      if (err instanceof ArchivePathError) {
        throw new MalformedDocumentError(line, `${what} "${value}": ${err.message}`);
      }
      throw err;
    }
  }
}
