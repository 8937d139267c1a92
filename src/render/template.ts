import type { Logger } from 'pino';

/** Writes a fragment straight into the output instead of returning a value. */
export type TemplateWriter = (out: TemplateOutput) => void;

export type TemplateValue = string | number | boolean | TemplateWriter | null | undefined;

export type TemplateContext = Record<string, TemplateValue>;

export interface TemplateOutput {
  write(text: string): void;
}

type TemplateNode =
  | { type: 'text'; value: string }
  | { type: 'var'; key: string }
  | { type: 'if'; key: string; yes: TemplateNode[]; no: TemplateNode[] };

const TAG_PATTERN = /\{([^}]*)\}/g;

/** Parses the brace language: `{key}`, `{?key}..{:}..{/}` and `{{}` for a literal brace. */
export function compileTemplate(body: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: { node: Extract<TemplateNode, { type: 'if' }>; inElse: boolean }[] = [];
  const target = (): TemplateNode[] => {
    const top = stack.at(-1);
    if (!top) return root;
    return top.inElse ? top.node.no : top.node.yes;
  };

  let pos = 0;
  for (const match of body.matchAll(TAG_PATTERN)) {
    const start = match.index ?? 0;
    if (start > pos) target().push({ type: 'text', value: body.slice(pos, start) });
    pos = start + match[0].length;
    const tag = match[1];
    if (tag === ':') {
      const top = stack.at(-1);
      if (top) top.inElse = !top.inElse;
    } else if (tag === '/') {
      stack.pop();
    } else if (tag === '{') {
      target().push({ type: 'text', value: '{' });
    } else if (tag.startsWith('?')) {
      const node: Extract<TemplateNode, { type: 'if' }> = { type: 'if', key: tag.slice(1), yes: [], no: [] };
      target().push(node);
      stack.push({ node, inElse: false });
    } else {
      target().push({ type: 'var', key: tag });
    }
  }
  if (pos < body.length) target().push({ type: 'text', value: body.slice(pos) });
  return root;
}

function truthy(value: TemplateValue): boolean {
  if (typeof value === 'function') return true;
  return Boolean(value);
}

/**
 * Compiled template. Lookups fall through the context list front to back,
 * so per-item maps can shadow page-level values.
 */
export class Template {
  private readonly nodes: TemplateNode[];

  constructor(
    readonly name: string,
    body: string,
    private readonly logger: Logger
  ) {
    this.nodes = compileTemplate(body);
  }

  render(contexts: TemplateContext[], out: TemplateOutput): void {
    this.emit(this.nodes, contexts, out);
  }

  renderToString(contexts: TemplateContext[]): string {
    const buffer = new StringOutput();
    this.render(contexts, buffer);
    return buffer.toString();
  }

  private emit(nodes: TemplateNode[], contexts: TemplateContext[], out: TemplateOutput): void {
    for (const node of nodes) {
      switch (node.type) {
        case 'text':
          out.write(node.value);
          break;
        case 'if':
          this.emit(truthy(lookup(contexts, node.key)) ? node.yes : node.no, contexts, out);
          break;
        case 'var': {
          const value = lookup(contexts, node.key);
          if (value === undefined || value === null) {
            this.logger.warn({ template: this.name, key: node.key }, 'undefined template key');
            out.write('[UNKNOWN]');
          } else if (typeof value === 'function') {
            value(out);
          } else {
            out.write(String(value));
          }
          break;
        }
      }
    }
  }
}

function lookup(contexts: TemplateContext[], key: string): TemplateValue {
  for (const context of contexts) {
    if (Object.prototype.hasOwnProperty.call(context, key)) return context[key];
  }
  return undefined;
}

export class StringOutput implements TemplateOutput {
  private readonly parts: string[] = [];

  write(text: string): void {
    this.parts.push(text);
  }

  toString(): string {
    return this.parts.join('');
  }
}
