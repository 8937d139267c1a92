export function isStringNonwhite(value: string): boolean {
  return value.trim().length > 0;
}

export function expandTabs(value: string, width = 8): string {
  if (!value.includes('\t')) return value;
  let out = '';
  for (const ch of value) {
    if (ch === '\t') {
      out += ' '.repeat(width - (out.length % width));
    } else {
      out += ch;
    }
  }
  return out;
}

/** Drops leading and trailing blank lines, keeping interior spacing intact. */
export function trimBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && !isStringNonwhite(lines[start])) start += 1;
  while (end > start && !isStringNonwhite(lines[end - 1])) end -= 1;
  return lines.slice(start, end);
}
