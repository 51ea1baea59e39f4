/**
 * Date-key normalization of structural paths
 */

import { describe, it, expect } from 'vitest';
import {
  DATE_FORMAT_NAMES,
  DATE_GRAMMARS,
  PathNormalizer,
  compileGrammar,
  compileLayout,
  dateToken,
  matchesGrammar,
  normalizePath,
} from '../../src/lib/normalizer/index.js';

describe('Date grammars', () => {
  it('should list the ten built-in grammars in priority order', () => {
    expect(DATE_FORMAT_NAMES).toEqual([
      'yyyy-mm-dd',
      'dd-mm-yyyy',
      'yyyy/mm/dd',
      'dd/mm/yyyy',
      'yyyymmdd',
      'ddmmyyyy',
      'month dd, yyyy',
      'dd month yyyy',
      'yyyy-mm',
      'mm-yyyy',
    ]);
  });

  it('should match the example of every grammar', () => {
    for (const grammar of DATE_GRAMMARS) {
      expect(matchesGrammar(grammar.example, compileGrammar(grammar))).toBe(true);
    }
  });

  it('should compile whitespace to a whitespace run', () => {
    expect(compileLayout('MMMM DD, YYYY').source).toContain('\\s+');
  });

  it('should accept unpadded month and day', () => {
    const isoDate = compileGrammar(DATE_GRAMMARS[0]);
    expect(matchesGrammar('2021-1-8', isoDate)).toBe(true);
  });

  it('should reject dates that do not exist', () => {
    const isoDate = compileGrammar(DATE_GRAMMARS[0]);
    expect(matchesGrammar('2021-02-30', isoDate)).toBe(false);
    expect(matchesGrammar('2021-02-29', isoDate)).toBe(false);
    expect(matchesGrammar('2020-02-29', isoDate)).toBe(true);
    expect(matchesGrammar('2021-04-31', isoDate)).toBe(false);
    expect(matchesGrammar('0000-01-01', isoDate)).toBe(false);
  });

  it('should require the whole key to match', () => {
    const isoDate = compileGrammar(DATE_GRAMMARS[0]);
    expect(matchesGrammar('2021-11-08T10:00', isoDate)).toBe(false);
    expect(matchesGrammar('x2021-11-08', isoDate)).toBe(false);
  });
});

describe('PathNormalizer', () => {
  const normalizer = new PathNormalizer();

  it('should detect each grammar', () => {
    expect(normalizer.detectDateFormat('2021-11-08')).toBe('yyyy-mm-dd');
    expect(normalizer.detectDateFormat('08-11-2021')).toBe('dd-mm-yyyy');
    expect(normalizer.detectDateFormat('2021/11/08')).toBe('yyyy/mm/dd');
    expect(normalizer.detectDateFormat('08/11/2021')).toBe('dd/mm/yyyy');
    expect(normalizer.detectDateFormat('20211108')).toBe('yyyymmdd');
    expect(normalizer.detectDateFormat('08112021')).toBe('ddmmyyyy');
    expect(normalizer.detectDateFormat('November 08, 2021')).toBe('month dd, yyyy');
    expect(normalizer.detectDateFormat('8 november 2021')).toBe('dd month yyyy');
    expect(normalizer.detectDateFormat('2021-11')).toBe('yyyy-mm');
    expect(normalizer.detectDateFormat('11-2021')).toBe('mm-yyyy');
  });

  it('should match month names case-insensitively and across extra spaces', () => {
    expect(normalizer.detectDateFormat('NOVEMBER 08, 2021')).toBe('month dd, yyyy');
    expect(normalizer.detectDateFormat('November  08,  2021')).toBe('month dd, yyyy');
    expect(normalizer.detectDateFormat('Nov 08, 2021')).toBeNull();
  });

  it('should resolve ambiguous keys by grammar priority', () => {
    // valid both as yyyymmdd (1212-12-12) and ddmmyyyy (12-12-1212)
    expect(normalizer.detectDateFormat('12121212')).toBe('yyyymmdd');

    const dayFirst = new PathNormalizer({ dateFormats: ['ddmmyyyy', 'yyyymmdd'] });
    expect(dayFirst.detectDateFormat('12121212')).toBe('ddmmyyyy');
  });

  it('should leave ordinary keys alone', () => {
    expect(normalizer.detectDateFormat('user')).toBeNull();
    expect(normalizer.detectDateFormat('12345')).toBeNull();
    expect(normalizer.detectDateFormat('2021-13-01')).toBeNull();
    expect(normalizer.detectDateFormat('')).toBeNull();
  });

  it('should collapse sibling date keys to the same path', () => {
    expect(normalizer.normalize('matches.2021-11-08')).toBe('matches.yyyy-mm-dd_1');
    expect(normalizer.normalize('matches.2021-11-09')).toBe('matches.yyyy-mm-dd_1');
  });

  it('should qualify date tokens by segment position', () => {
    expect(normalizer.normalize('2021-11-08')).toBe('yyyy-mm-dd_0');
    expect(normalizer.normalize('stats.2021-11-08')).toBe('stats.yyyy-mm-dd_1');
    expect(normalizer.normalize('2021-11-08.2021-11-08')).toBe(
      'yyyy-mm-dd_0.yyyy-mm-dd_1',
    );
    expect(dateToken('yyyy-mm', 3)).toBe('yyyy-mm_3');
  });

  it('should be idempotent', () => {
    const paths = [
      '',
      'user.id',
      'matches.2021-11-08',
      '2021-11-08.visits[].November 08, 2021',
      'a.20211108.b[]',
    ];
    for (const path of paths) {
      const once = normalizer.normalize(path);
      expect(normalizer.normalize(once)).toBe(once);
    }
  });

  it('should report replaced segments', () => {
    expect(normalizer.normalizeSegments('a.2021-11-08.b')).toEqual({
      segments: ['a', 'yyyy-mm-dd_1', 'b'],
      matches: [{ format: 'yyyy-mm-dd', position: 1, token: 'yyyy-mm-dd_1' }],
    });
  });

  it('should not normalize anything with no grammars', () => {
    const disabled = new PathNormalizer({ dateFormats: [] });
    expect(disabled.normalize('matches.2021-11-08')).toBe('matches.2021-11-08');
  });

  it('should expose a default normalizer', () => {
    expect(normalizePath('daily.2021-11')).toBe('daily.yyyy-mm_1');
  });
});
