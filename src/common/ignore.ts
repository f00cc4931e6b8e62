import { readFile } from 'node:fs/promises';
import { sep } from 'node:path';
import { describeError } from './errors';
import { getLogger } from './logger';

const log = getLogger('ignore');

export interface IgnoreRule {
  pattern: string;
  regex: RegExp;
}

/**
 * Convert a shell-style glob into an anchored regular expression.
 * `*` and `?` cross directory separators, as with fnmatch; `[...]` is a
 * character class and `[!...]` its negation; `^` inside a class is literal.
 */
export function compileGlobToRegExp(pattern: string): RegExp {
  let regex = '';
  let i = 0;
  while (i < pattern.length) {
    const char = pattern[i];
    if (char === '*') {
      // Consecutive stars behave like a single one.
      while (pattern[i + 1] === '*') {
        i += 1;
      }
      regex += '[\\s\\S]*';
      i += 1;
      continue;
    }
    if (char === '?') {
      regex += '[\\s\\S]';
      i += 1;
      continue;
    }
    if (char === '[') {
      const klass = readCharacterClass(pattern, i);
      if (klass) {
        regex += klass.source;
        i = klass.end;
        continue;
      }
    }
    if (/[-\\^$+?.()|{}[\]/]/.test(char)) {
      regex += `\\${char}`;
    } else {
      regex += char;
    }
    i += 1;
  }

  return new RegExp(`^${regex}$`);
}

function readCharacterClass(pattern: string, start: number): { source: string; end: number } | undefined {
  let i = start + 1;
  let negate = false;
  if (pattern[i] === '!') {
    negate = true;
    i += 1;
  }
  // A leading `]` is a literal member of the class.
  if (pattern[i] === ']') {
    i += 1;
  }
  const close = pattern.indexOf(']', i);
  if (close === -1) {
    return undefined;
  }
  const body = pattern
    .slice(negate ? start + 2 : start + 1, close)
    .replace(/[\\\]^[]/g, (char) => `\\${char}`);
  return { source: `[${negate ? '^' : ''}${body}]`, end: close + 1 };
}

const MATCH_NOTHING = /(?!)/;

// A class such as `[z-a]` has no members; like fnmatch, the pattern then matches nothing.
function compileIgnorePattern(pattern: string): RegExp {
  try {
    return compileGlobToRegExp(pattern);
  } catch (error) {
    log.warn(`Ignore pattern ${pattern} can never match`, { reason: describeError(error) });
    return MATCH_NOTHING;
  }
}

export function parseIgnorePatterns(contents: string): string[] {
  return contents
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

export class IgnoreMatcher {
  private readonly rules: readonly IgnoreRule[];

  constructor(patterns: readonly string[] = []) {
    this.rules = Object.freeze(
      patterns.map((pattern) => Object.freeze({ pattern, regex: compileIgnorePattern(pattern) })),
    );
  }

  /**
   * A path is ignored when any pattern matches either its path relative to the
   * source root or its bare file name.
   */
  isIgnored(relativePath: string, baseName: string): boolean {
    const normalized = relativePath.split(sep).join('/');
    return this.rules.some((rule) => rule.regex.test(normalized) || rule.regex.test(baseName));
  }

  static fromFileContents(contents: string): IgnoreMatcher {
    return new IgnoreMatcher(parseIgnorePatterns(contents));
  }

  /** A missing or unreadable ignore file yields a matcher that ignores nothing. */
  static async fromFile(path?: string): Promise<IgnoreMatcher> {
    if (!path) {
      return new IgnoreMatcher();
    }

    let contents: string;
    try {
      contents = await readFile(path, 'utf8');
    } catch (error) {
      log.debug(`Ignore file ${path} not loaded, ignoring nothing`, { reason: describeError(error) });
      return new IgnoreMatcher();
    }

    const matcher = IgnoreMatcher.fromFileContents(contents);
    log.info(`Loaded ${matcher.size} ignore patterns`, { path });
    return matcher;
  }

  get size(): number {
    return this.rules.length;
  }

  get patterns(): string[] {
    return this.rules.map((rule) => rule.pattern);
  }
}
