import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { IgnoreMatcher, compileGlobToRegExp, parseIgnorePatterns } from '../../src/common/ignore';

describe('compileGlobToRegExp', () => {
  it('lets star cross directory separators', () => {
    const regex = compileGlobToRegExp('*.log');
    expect(regex.test('app.log')).toBe(true);
    expect(regex.test('nested/dir/app.log')).toBe(true);
    expect(regex.test('app.log.txt')).toBe(false);
  });

  it('matches exactly one character for a question mark', () => {
    const regex = compileGlobToRegExp('b?.txt');
    expect(regex.test('b1.txt')).toBe(true);
    expect(regex.test('b.txt')).toBe(false);
    expect(regex.test('b12.txt')).toBe(false);
  });

  it('supports character classes and their negation', () => {
    expect(compileGlobToRegExp('[ab].txt').test('a.txt')).toBe(true);
    expect(compileGlobToRegExp('[ab].txt').test('c.txt')).toBe(false);
    expect(compileGlobToRegExp('[!ab].txt').test('c.txt')).toBe(true);
    expect(compileGlobToRegExp('[!ab].txt').test('a.txt')).toBe(false);
    expect(compileGlobToRegExp('[]x].txt').test('].txt')).toBe(true);
  });

  it('treats a caret inside a class as a literal member', () => {
    const regex = compileGlobToRegExp('[^a].txt');
    expect(regex.test('^.txt')).toBe(true);
    expect(regex.test('a.txt')).toBe(true);
    expect(regex.test('b.txt')).toBe(false);
  });

  it('treats regex metacharacters literally', () => {
    expect(compileGlobToRegExp('file(1)+.txt').test('file(1)+.txt')).toBe(true);
    expect(compileGlobToRegExp('a.txt').test('abtxt')).toBe(false);
    expect(compileGlobToRegExp('[oops').test('[oops')).toBe(true);
  });
});

describe('IgnoreMatcher', () => {
  it('parses patterns skipping comments and blank lines', () => {
    expect(parseIgnorePatterns('# secrets\nsecrets.log\n\n  *.bak  \n')).toEqual(['secrets.log', '*.bak']);
  });

  it('splits patterns on CR, LF and CRLF line endings', () => {
    expect(parseIgnorePatterns('a.log\rb.log\r\nc.log\n')).toEqual(['a.log', 'b.log', 'c.log']);
  });

  it('keeps a pattern with a reversed range but lets it match nothing', () => {
    const matcher = new IgnoreMatcher(['[z-a].log', 'secrets.txt']);
    expect(matcher.patterns).toEqual(['[z-a].log', 'secrets.txt']);
    expect(matcher.isIgnored('m.log', 'm.log')).toBe(false);
    expect(matcher.isIgnored('[z-a].log', '[z-a].log')).toBe(false);
    expect(matcher.isIgnored('dir/secrets.txt', 'secrets.txt')).toBe(true);
  });

  it('ignores on a base name match', () => {
    const matcher = new IgnoreMatcher(['secrets.log']);
    expect(matcher.isIgnored('logs/secrets.log', 'secrets.log')).toBe(true);
    expect(matcher.isIgnored('logs/app.log', 'app.log')).toBe(false);
  });

  it('ignores on a relative path match', () => {
    const matcher = new IgnoreMatcher(['private/*']);
    expect(matcher.isIgnored('private/a.txt', 'a.txt')).toBe(true);
    expect(matcher.isIgnored('private/deep/b.txt', 'b.txt')).toBe(true);
    expect(matcher.isIgnored('public/a.txt', 'a.txt')).toBe(false);
  });

  it('matches nothing without patterns', () => {
    const matcher = new IgnoreMatcher();
    expect(matcher.size).toBe(0);
    expect(matcher.isIgnored('a.txt', 'a.txt')).toBe(false);
  });

  it('is case sensitive', () => {
    const matcher = IgnoreMatcher.fromFileContents('*.LOG\n');
    expect(matcher.patterns).toEqual(['*.LOG']);
    expect(matcher.isIgnored('app.log', 'app.log')).toBe(false);
  });

  it('falls back to ignoring nothing when the ignore file is absent', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'log-sanitizer-ignore-'));
    try {
      expect((await IgnoreMatcher.fromFile(undefined)).size).toBe(0);
      const missing = await IgnoreMatcher.fromFile(join(dir, 'ignore.list'));
      expect(missing.size).toBe(0);

      const path = join(dir, 'present.list');
      await writeFile(path, '*.tmp\n# comment\n');
      const loaded = await IgnoreMatcher.fromFile(path);
      expect(loaded.patterns).toEqual(['*.tmp']);
      expect(loaded.isIgnored('cache/x.tmp', 'x.tmp')).toBe(true);

      const malformedPath = join(dir, 'malformed.list');
      await writeFile(malformedPath, '[z-a].log\n[a-\\]\n*.bak\n');
      const malformed = await IgnoreMatcher.fromFile(malformedPath);
      expect(malformed.size).toBe(3);
      expect(malformed.isIgnored('old/x.bak', 'x.bak')).toBe(true);
      expect(malformed.isIgnored('m.log', 'm.log')).toBe(false);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
