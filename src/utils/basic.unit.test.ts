import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { sha512HexUtf8, shortHash } from './crypto.js';
import { compareNames, compareUtf8, foldAsciiCase } from './order.js';
import { formatDateStr, formatRfc822, toEpochSeconds } from './time.js';
import { expandTabs, isStringNonwhite, trimBlankLines } from './text.js';
import { writeFileAtomic } from './atomic.js';
import { mapWithConcurrency } from './pool.js';

describe('hashes', () => {
  it('hashes deterministically', () => {
    expect(sha512HexUtf8('abc')).toBe(
      'ddaf35a193617abacc417349ae20413112e6fa4e89a97ea20a9eeee64b55d39a2192992a274fc1a836ba3c23a3feebbd454d4423643ce80e2a9ac94fa54ca49f'
    );
  });

  it('derives ten-character base-36 short hashes', () => {
    expect(shortHash('games/advent.zip')).toBe('22wxjyk0mb');
    expect(shortHash('a b.txt')).toBe('091715gqbv');
    expect(shortHash('“q”.txt')).toBe('0ltm34r74p');
  });
});

describe('ordering', () => {
  it('folds ASCII letters only', () => {
    expect(foldAsciiCase('AbC-_.%')).toBe('abc-_.%');
    expect(foldAsciiCase('ÅßÇ')).toBe('ÅßÇ');
  });

  it('compares by unsigned byte order', () => {
    expect(compareUtf8('a', 'b')).toBeLessThan(0);
    expect(compareUtf8('a', 'aa')).toBeLessThan(0);
    expect(compareUtf8('z', 'é')).toBeLessThan(0);
  });

  it('orders names case-insensitively with a stable tie-break', () => {
    const names = ['beta', 'Alpha', 'alpha', 'Gamma'];
    expect([...names].sort(compareNames)).toEqual(['Alpha', 'alpha', 'beta', 'Gamma']);
  });
});

describe('time helpers', () => {
  it('formats dates in UTC', () => {
    expect(formatDateStr(1540000000)).toBe('20-Oct-2018');
    expect(formatRfc822(1540000000)).toBe('Sat, 20 Oct 2018 01:46:40 GMT');
    expect(toEpochSeconds(1540000000999)).toBe(1540000000);
  });
});

describe('text helpers', () => {
  it('detects whitespace-only strings', () => {
    expect(isStringNonwhite('')).toBe(false);
    expect(isStringNonwhite('\n  \t  \n')).toBe(false);
    expect(isStringNonwhite('x      \n')).toBe(true);
    expect(isStringNonwhite('\n      x')).toBe(true);
  });

  it('expands tabs to eight-column stops', () => {
    expect(expandTabs('a\tb')).toBe('a       b');
    expect(expandTabs('abcdefgh\tb')).toBe('abcdefgh        b');
  });

  it('trims blank lines at both ends only', () => {
    expect(trimBlankLines(['', 'a', '', 'b', '  '])).toEqual(['a', '', 'b']);
  });
});

describe('writeFileAtomic', () => {
  it('creates parent directories and leaves no temp file behind', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'atomic-'));
    const target = path.join(dir, 'nested', 'out.txt');
    writeFileAtomic(target, 'one');
    writeFileAtomic(target, 'two');
    expect(fs.readFileSync(target, 'utf8')).toBe('two');
    expect(fs.readdirSync(path.join(dir, 'nested'))).toEqual(['out.txt']);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe('mapWithConcurrency', () => {
  it('keeps input order and bounds in-flight work', async () => {
    let inFlight = 0;
    let peak = 0;
    const result = await mapWithConcurrency([5, 1, 3, 2], 2, async (n) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, n));
      inFlight -= 1;
      return n * 10;
    });
    expect(result).toEqual([50, 10, 30, 20]);
    expect(peak).toBe(2);
  });
});
