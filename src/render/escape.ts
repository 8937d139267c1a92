import { encodeArchivePath } from '../paths/encode.js';
import { shortHash } from '../utils/crypto.js';
import type { ArchivePath } from '../types/ids.js';

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;'
};

/** Names at or under this length are displayed without break hints. */
const BREAK_HINT_MIN_LENGTH = 24;

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ENTITIES[ch] ?? ch);
}

export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => XML_ENTITIES[ch] ?? ch);
}

/** Wraps text in CDATA, splitting any `]]>` it contains. */
export function cdata(value: string): string {
  return `<![CDATA[${value.replaceAll(']]>', ']]]]><![CDATA[>')}]]>`;
}

export type AnchorKind = 'file' | 'dir';

export function anchorId(kind: AnchorKind, name: string): string {
  return `${kind}-${shortHash(name)}`;
}

/** Escaped display text with `<wbr>` after separators of long names. */
export function displayName(name: string): string {
  const escaped = escapeHtml(name);
  if (name.length <= BREAK_HINT_MIN_LENGTH) return escaped;
  return escaped.replace(/([._\-/])(?=.)/g, '$1<wbr>');
}

/** Percent-encoded href for an archive path, relative to the site root. */
export function hrefFor(path: ArchivePath): string {
  return encodeArchivePath(path);
}
