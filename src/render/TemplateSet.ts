import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Logger } from 'pino';
import { Template } from './template.js';
import { ConfigError } from '../errors.js';

export const TEMPLATE_NAMES = [
  'directory.html',
  'top-level.html',
  'file-entry.html',
  'subdir-entry.html',
  'mention-entry.html',
  'date.html',
  'date-entry.html',
  'dirlist.html',
  'dirlist-entry.html',
  'master-index.xml',
  'xml-dir.xml',
  'xml-file.xml',
  'feed.xml',
  'feed-item.xml'
] as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[number];

export const DEFAULT_TEMPLATE_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

function stripFinalNewline(body: string): string {
  return body.endsWith('\n') ? body.slice(0, -1) : body;
}

/** Every template the renderer uses, read once per build. */
export class TemplateSet {
  private constructor(
    private readonly bodies: Map<TemplateName, string>,
    private readonly compiled: Map<TemplateName, Template>
  ) {}

  /** Reads each template from `overrideDir` when present there, else from `defaultDir`. */
  static load(logger: Logger, overrideDir?: string, defaultDir = DEFAULT_TEMPLATE_DIR): TemplateSet {
    const bodies = new Map<TemplateName, string>();
    const compiled = new Map<TemplateName, Template>();
    for (const name of TEMPLATE_NAMES) {
      const override = overrideDir ? path.join(overrideDir, name) : undefined;
      const file = override && fs.existsSync(override) ? override : path.join(defaultDir, name);
      let body: string;
      try {
        body = stripFinalNewline(fs.readFileSync(file, 'utf8'));
      } catch (err) {
        throw new ConfigError(`cannot read template ${file}: ${err instanceof Error ? err.message : String(err)}`);
      }
      if (file === override) logger.debug({ template: name, file }, 'using template override');
      bodies.set(name, body);
      compiled.set(name, new Template(name, body, logger));
    }
    return new TemplateSet(bodies, compiled);
  }

  get(name: TemplateName): Template {
    const template = this.compiled.get(name);
    if (!template) throw new ConfigError(`template ${name} is not loaded`);
    return template;
  }

  /** Unparsed body, for fragments inserted verbatim. */
  raw(name: TemplateName): string {
    return this.bodies.get(name) ?? '';
  }
}
