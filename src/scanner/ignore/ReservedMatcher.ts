import type { ReservedRules } from '../../types/config.js';
import type { ArchivePath } from '../../types/ids.js';
import { compileRegex, type CompiledRegex } from './compileRegex.js';
import { globToRegExp } from './glob.js';

/** Administratively reserved subtrees the walk never enters or lists. */
export class ReservedMatcher {
  private readonly globMatchers: RegExp[];
  private readonly regexMatchers: CompiledRegex[];

  constructor(rules: ReservedRules) {
    this.globMatchers = rules.glob.map((pattern) => globToRegExp(pattern));
    this.regexMatchers = rules.regex.map((pattern) => compileRegex(pattern));
  }

  isReserved(path: ArchivePath): boolean {
    for (const matcher of this.globMatchers) {
      if (matcher.test(path)) return true;
    }
    for (const matcher of this.regexMatchers) {
      if (matcher.test(path)) return true;
    }
    return false;
  }
}
