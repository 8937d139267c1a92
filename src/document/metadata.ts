// Metadata lines follow the Markdown meta-data convention: up to three
// leading spaces, a key, a colon; continuation values are indented four.
export const META_START_PATTERN = /^ {0,3}([A-Za-z0-9_-]+):(.*)$/;
export const META_CONTINUATION_PATTERN = /^(?: {4}|\t)(.*)$/;

export type MetadataLine =
  | { type: 'start'; key: string; value: string }
  | { type: 'continuation'; value: string }
  | { type: 'other' };

export function classifyMetadataLine(line: string): MetadataLine {
  const start = META_START_PATTERN.exec(line);
  if (start) {
    return { type: 'start', key: start[1].toLowerCase(), value: start[2].trim() };
  }
  const cont = META_CONTINUATION_PATTERN.exec(line);
  if (cont && cont[1].trim().length > 0) {
    return { type: 'continuation', value: cont[1].trim() };
  }
  return { type: 'other' };
}
