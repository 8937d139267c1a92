import { createRequire } from 'node:module';
import { ConfigError } from '../../errors.js';

export interface CompiledRegex {
  test(text: string): boolean;
}

type RegexEngine = new (pattern: string) => CompiledRegex;

// undefined until first use; null when re2 is not installed.
let re2Engine: RegexEngine | null | undefined;

function engineFrom(exported: unknown): RegexEngine | null {
  const candidate =
    typeof exported === 'object' && exported !== null && 'default' in exported ? exported.default : exported;
  return typeof candidate === 'function' ? (candidate as RegexEngine) : null;
}

function loadRe2(): RegexEngine | null {
  try {
    return engineFrom(createRequire(import.meta.url)('re2'));
  } catch {
    return null;
  }
}

/** Compiles a reserved-path rule on RE2 when available, otherwise on RegExp. */
export function compileRegex(pattern: string): CompiledRegex {
  if (re2Engine === undefined) re2Engine = loadRe2();
  const Engine: RegexEngine = re2Engine ?? RegExp;
  try {
    return new Engine(pattern);
  } catch (err) {
    throw new ConfigError(`invalid reserved pattern ${JSON.stringify(pattern)}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
