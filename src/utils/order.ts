const textEncoder = new TextEncoder();

/** Lowercases A-Z and nothing else, so folding never depends on locale tables. */
export function foldAsciiCase(value: string): string {
  return value.replace(/[A-Z]/g, (ch) => String.fromCharCode(ch.charCodeAt(0) + 0x20));
}

/** Unsigned comparison of the UTF-8 encodings. */
export function compareUtf8(a: string, b: string): number {
  const left = textEncoder.encode(a);
  const right = textEncoder.encode(b);
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i += 1) {
    if (left[i] !== right[i]) return left[i] - right[i];
  }
  return left.length - right.length;
}

/** Case-folded byte order with the raw name as tie-breaker; independent of locale. */
export function compareNames(a: string, b: string): number {
  return compareUtf8(foldAsciiCase(a), foldAsciiCase(b)) || compareUtf8(a, b);
}
