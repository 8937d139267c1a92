import { describe, expect, it } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Renderer } from './Renderer.js';
import { TemplateSet } from './TemplateSet.js';
import { OutputWriter } from './OutputWriter.js';
import { anchorId } from './escape.js';
import { IndexDocumentParser } from '../document/IndexDocumentParser.js';
import { MetadataResolver } from '../resolve/MetadataResolver.js';
import { DiagnosticLog } from '../diagnostics/DiagnosticLog.js';
import { DateWindow } from '../types/plan.js';
import type { ArchiveModel } from '../types/model.js';
import type { ScanResult } from '../types/scan.js';
import { silentLogger } from '../logger.js';

const DOC = [
  '# if-archive:',
  'Root <b>text</b>.',
  '',
  '## games',
  'All the games.',
  '',
  '---',
  '# if-archive/games:',
  'genre: adventure',
  '',
  '## advent.z5',
  'tuid: t1',
  '',
  'The cave & more.',
  '',
  '## Long-File_name.with-many.parts.zip',
  'tuid: t1',
  '',
  'Packed ]]> copy.',
  ''
].join('\n');

const LONG = 'Long-File_name.with-many.parts.zip';
const NOW = 1_540_000_100;

function buildModel(): ArchiveModel {
  const scan: ScanResult = {
    rootName: 'if-archive',
    dirs: new Map([
      [
        'if-archive',
        { path: 'if-archive', name: 'if-archive', parent: null, mtimeMs: 1_000, subdirs: ['if-archive/games'], files: [] }
      ],
      [
        'if-archive/games',
        {
          path: 'if-archive/games',
          name: 'games',
          parent: 'if-archive',
          mtimeMs: 1_000,
          subdirs: [],
          files: [
            { name: 'advent.z5', path: 'if-archive/games/advent.z5', size: 10, mtimeMs: 1_540_000_000_000 },
            { name: LONG, path: `if-archive/games/${LONG}`, size: 20, mtimeMs: 1_539_000_000_000 }
          ]
        }
      ]
    ])
  };
  const doc = new IndexDocumentParser({ rootName: 'if-archive' }).parse(DOC);
  const model = new MetadataResolver({
    identifierKeys: ['tuid'],
    quietPrefixes: [],
    excludeUndocumented: false,
    diagnostics: new DiagnosticLog(silentLogger),
    logger: silentLogger
  }).resolve(doc, scan);
  const advent = model.dirs.get('if-archive/games')?.files[0];
  if (advent) {
    advent.md5 = 'md5-placeholder';
    advent.sha512 = 'sha512-placeholder';
  }
  return model;
}

const renderer = new Renderer({
  config: {
    rootName: 'if-archive',
    siteUrl: 'https://example.org',
    pageBaseUrl: 'https://example.org/indexes',
    fileBaseUrl: 'https://example.org/files',
    feedSize: 1,
    feedTitle: 'New & Noted',
    manifestName: 'Master-Index.xml'
  },
  templates: TemplateSet.load(silentLogger),
  logger: silentLogger
});

function page(dirPath: string): string {
  const model = buildModel();
  const dir = model.dirs.get(dirPath);
  if (!dir) throw new Error(`no directory ${dirPath}`);
  return renderer.directoryPage(model, dir);
}

describe('Renderer directory pages', () => {
  it('links breadcrumbs and titles the page by path', () => {
    const html = page('if-archive/games');
    expect(html).toContain('<title>if-archive/games</title>');
    expect(html).toContain(
      '<nav class="breadcrumbs"><a href="https://example.org/indexes/if-archive/">if-archive</a> / games</nav>'
    );
    expect(html).toContain('<p class="counts">2 files, 0 subdirectories</p>');
  });

  it('renders file entries with anchors, raw descriptions and checksums', () => {
    const html = page('if-archive/games');
    expect(html).toContain(
      `<dt id="${anchorId('file', 'advent.z5')}" class="Even"><a href="https://example.org/files/if-archive/games/advent.z5">advent.z5</a>\n` +
        '<span class="info">10 bytes, 20-Oct-2018</span></dt>'
    );
    expect(html).toContain('<div class="description">\nThe cave & more.\n</div>');
    expect(html).toContain('<li><span class="key">tuid</span>: t1</li>');
    expect(html).toContain(
      '<p class="checksums"><span class="md5">MD5: md5-placeholder</span> <span class="sha512">SHA512: sha512-placeholder</span></p>'
    );
    expect(html).toContain(`<dt id="${anchorId('file', LONG)}" class="Odd">`);
  });

  it('cross-links members of an identifier cluster', () => {
    const html = page('if-archive/games');
    expect(html).toContain(
      `<p class="cluster">Also available as: <a href="https://example.org/indexes/if-archive/games/#${anchorId('file', LONG)}">` +
        'if-<wbr>archive/<wbr>games/<wbr>Long-<wbr>File_<wbr>name.<wbr>with-<wbr>many.<wbr>parts.<wbr>zip</a></p>'
    );
  });

  it('lists subdirectories with their entry description and shows the header on the root page', () => {
    const html = page('if-archive');
    expect(html).toContain(
      `<li id="${anchorId('dir', 'games')}" class="Even"><a href="https://example.org/indexes/if-archive/games/">games</a> (2 files)\n` +
        '<div class="description">\nAll the games.\n</div></li>'
    );
    expect(html).toContain('<div class="description">\nRoot <b>text</b>.\n</div>');
    expect(html).toContain('<div class="header">\n<p>Welcome to the archive.');
  });
});

describe('Renderer listings', () => {
  it('limits date pages to their window, newest first', () => {
    const model = buildModel();
    const week = renderer.datePage(model, DateWindow.WEEK, NOW);
    expect(week).toContain('<title>Files added in the past week</title>');
    expect(week.match(/<li class=/g)).toHaveLength(1);
    expect(week).toContain(
      '<li class="Even"><span class="date">20-Oct-2018</span> <a href="https://example.org/files/if-archive/games/advent.z5">advent.z5</a>'
    );
    const all = renderer.datePage(model, DateWindow.ALL, NOW);
    expect(all).toContain('<title>All files by date</title>');
    expect(all.match(/<li class=/g)).toHaveLength(2);
  });

  it('leaves directory symlinks out of date pages and the feed', () => {
    const model = buildModel();
    const games = model.dirs.get('if-archive/games');
    const advent = games?.files[0];
    if (!games || !advent) throw new Error('fixture is missing advent.z5');
    games.files.push({
      ...advent,
      name: 'top',
      path: 'if-archive/games/top',
      date: NOW,
      mtimeMs: NOW * 1000,
      symlink: { kind: 'directory', path: 'if-archive' }
    });

    const all = renderer.datePage(model, DateWindow.ALL, NOW);
    expect(all.match(/<li class=/g)).toHaveLength(2);
    expect(all).not.toContain('if-archive/games/top');
    const feed = renderer.feed(model, NOW);
    expect(feed.match(/<item>/g)).toHaveLength(1);
    expect(feed).toContain('<title>advent.z5</title>');
  });

  it('lists every directory in folded order', () => {
    const html = renderer.dirList(buildModel());
    expect(html).toContain(
      '<ul class="dirlist">\n' +
        '<li class="Even"><a href="https://example.org/indexes/if-archive/">if-archive</a> (0)</li>\n' +
        '<li class="Odd"><a href="https://example.org/indexes/if-archive/games/">if-archive/games</a> (2)</li>\n' +
        '</ul>'
    );
  });

  it('carries descriptions byte-for-byte in the manifest', () => {
    const xml = renderer.manifest(buildModel());
    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<ifarchive root="if-archive">\n<directory>\n')).toBe(true);
    expect(xml).toContain('<name>if-archive/games</name>\n<filecount>2</filecount>\n<subdircount>0</subdircount>\n');
    expect(xml).toContain('<meta key="genre">adventure</meta>\n');
    expect(xml).toContain('<description><![CDATA[Packed ]]]]><![CDATA[> copy.]]></description>');
    expect(xml).toContain('<md5>md5-placeholder</md5>');
  });

  it('puts the newest files in the feed', () => {
    const xml = renderer.feed(buildModel(), NOW);
    expect(xml).toContain('<title>New &amp; Noted</title>');
    expect(xml).toContain('<lastBuildDate>Sat, 20 Oct 2018 01:48:20 GMT</lastBuildDate>');
    expect(xml.match(/<item>/g)).toHaveLength(1);
    expect(xml).toContain('<title>advent.z5</title>');
    expect(xml).toContain('<pubDate>Sat, 20 Oct 2018 01:46:40 GMT</pubDate>');
    expect(xml).toContain('<description><![CDATA[The cave & more.]]></description>');
  });

  it('writes the planned pages and the always-built outputs', () => {
    const destDir = fs.mkdtempSync(path.join(os.tmpdir(), 'renderer-'));
    try {
      const writer = new OutputWriter(destDir);
      const written = renderer.render(
        buildModel(),
        { full: false, since: NOW - 10, now: NOW, dirs: new Set(['if-archive/games']), windows: new Set([DateWindow.WEEK]), always: true },
        writer
      );
      expect(written).toEqual(['if-archive/games/index.html', 'date_1.html', 'dirlist.html', 'Master-Index.xml', 'feed.xml']);
      expect(fs.readFileSync(path.join(destDir, 'if-archive', 'games', 'index.html'), 'utf8')).toContain('advent.z5');
      expect(fs.existsSync(path.join(destDir, 'if-archive', 'index.html'))).toBe(false);
    } finally {
      fs.rmSync(destDir, { recursive: true, force: true });
    }
  });
});
