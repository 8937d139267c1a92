import { describe, expect, it } from 'vitest';
import { anchorId, cdata, displayName, escapeHtml, escapeXml, hrefFor } from './escape.js';

describe('escaping', () => {
  it('escapes the five HTML and XML specials', () => {
    expect(escapeHtml(`<a href="x">&'`)).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&#39;');
    expect(escapeXml(`<'&">`)).toBe('&lt;&apos;&amp;&quot;&gt;');
  });

  it('splits ]]> inside CDATA', () => {
    expect(cdata('a]]>b')).toBe('<![CDATA[a]]]]><![CDATA[>b]]>');
    expect(cdata('<b>raw</b>')).toBe('<![CDATA[<b>raw</b>]]>');
  });

  it('derives anchors from the short hash of the raw name', () => {
    expect(anchorId('file', 'a b.txt')).toBe('file-091715gqbv');
    expect(anchorId('dir', 'games/advent.zip')).toBe('dir-22wxjyk0mb');
  });

  it('adds break hints only to long display names', () => {
    expect(displayName('short-name.txt')).toBe('short-name.txt');
    expect(displayName('a-very-long_file.name.with-parts.zip')).toBe(
      'a-<wbr>very-<wbr>long_<wbr>file.<wbr>name.<wbr>with-<wbr>parts.<wbr>zip'
    );
    expect(displayName('<long&name-that-goes-on-and-on>')).toBe(
      '&lt;long&amp;name-<wbr>that-<wbr>goes-<wbr>on-<wbr>and-<wbr>on&gt;'
    );
  });

  it('percent-encodes every segment of a link target', () => {
    expect(hrefFor('if-archive/a b/“q”.txt')).toBe('if-archive/a%20b/%E2%80%9Cq%E2%80%9D.txt');
    expect(hrefFor('if-archive/x?y#z')).toBe('if-archive/x%3Fy%23z');
  });
});
