/** Ordered multi-valued mapping; insertion order of keys and values is preserved. */
export type MetadataBlock = Map<string, string[]>;

export function createMetadataBlock(): MetadataBlock {
  return new Map<string, string[]>();
}

export function addMetadataValue(block: MetadataBlock, key: string, value: string): void {
  const values = block.get(key);
  if (values) {
    values.push(value);
  } else {
    block.set(key, [value]);
  }
}

/** Appends every value of `source` not already present under the same key. */
export function mergeMetadataInto(target: MetadataBlock, source: MetadataBlock): void {
  for (const [key, values] of source) {
    const existing = target.get(key);
    if (!existing) {
      target.set(key, [...values]);
      continue;
    }
    for (const value of values) {
      if (!existing.includes(value)) existing.push(value);
    }
  }
}
