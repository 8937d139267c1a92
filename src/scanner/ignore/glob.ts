function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compiles a reserved-path glob. Patterns starting with `/` are anchored at
 * the tree directory; others match at any depth. `*` stays within a segment,
 * `**` crosses segments, and a trailing `/**` also matches the directory itself.
 */
export function globToRegExp(pattern: string): RegExp {
  const anchored = pattern.startsWith('/');
  let body = anchored ? pattern.slice(1) : pattern;
  let subtree = false;
  if (body.endsWith('/**')) {
    body = body.slice(0, -3);
    subtree = true;
  }

  let out = '';
  let i = 0;
  while (i < body.length) {
    const ch = body[i];
    if (ch === '\\' && i + 1 < body.length) {
      out += escapeRegex(body[i + 1]);
      i += 2;
    } else if (ch === '*' && body[i + 1] === '*') {
      out += '.*';
      i += 2;
    } else if (ch === '*') {
      out += '[^/]*';
      i += 1;
    } else if (ch === '?') {
      out += '[^/]';
      i += 1;
    } else if (ch === '[' && body.indexOf(']', i + 1) > i) {
      const end = body.indexOf(']', i + 1);
      out += `[${body.slice(i + 1, end).replace(/\\/g, '\\\\')}]`;
      i = end + 1;
    } else {
      out += escapeRegex(ch);
      i += 1;
    }
  }

  const prefix = anchored ? '^' : '^(?:.*/)?';
  const suffix = subtree ? '(?:/.*)?' : '';
  return new RegExp(`${prefix}${out}${suffix}$`);
}
