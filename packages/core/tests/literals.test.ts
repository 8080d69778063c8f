/**
 * Literal Codec Tests
 * String escapes, number kinds, regex delimiters and lexical patterns
 */

import { describe, expect, it } from 'vitest';
import {
  BAREWORD_PATTERN,
  NAME_PATTERN,
  decodeNumber,
  decodeString,
  encodeString,
  formatNumber,
  regexBody,
} from '../src/literals.js';
import { LiteralDecodeError } from '../src/error-classes.js';

describe('decodeString', () => {
  it('decodes simple escapes in double-quoted strings', () => {
    expect(decodeString('"a\\nb\\tc"')).toEqual({ value: 'a\nb\tc', quote: '"' });
  });

  it('keeps the quote style of single-quoted strings', () => {
    expect(decodeString("'it\\'s'")).toEqual({ value: "it's", quote: "'" });
  });

  it('decodes hex and unicode escapes', () => {
    expect(decodeString('"\\x41\\u00e9"').value).toBe('Aé');
    expect(decodeString('"\\U0001F600"').value).toBe('\u{1F600}');
  });

  it('decodes octal escapes', () => {
    expect(decodeString('"\\101\\0"').value).toBe('A\0');
  });

  it('keeps unknown escapes as written', () => {
    expect(decodeString('"\\d+\\.log"').value).toBe('\\d+\\.log');
  });

  it('drops escaped line breaks', () => {
    expect(decodeString('"one \\\ntwo"').value).toBe('one two');
  });

  it('rejects truncated hex escapes with LSC-L001', () => {
    try {
      decodeString('"\\x4"');
      expect.fail('Expected LiteralDecodeError');
    } catch (err) {
      expect(err).toBeInstanceOf(LiteralDecodeError);
      if (err instanceof LiteralDecodeError) {
        expect(err.errorId).toBe('LSC-L001');
        expect(err.message).toBe('Malformed escape sequence \\x4 in string literal');
      }
    }
  });

  it('rejects text that is not a quoted string with LSC-L002', () => {
    expect(() => decodeString('plain')).toThrow('Invalid string literal: plain');
  });
});

describe('encodeString', () => {
  it('escapes backslashes, control characters and the quote', () => {
    expect(encodeString('say "hi"\n')).toBe('"say \\"hi\\"\\n"');
  });

  it('only escapes the chosen quote', () => {
    expect(encodeString(`it's "x"`, "'")).toBe(`'it\\'s "x"'`);
  });

  it('produces lexemes that decode back to the value', () => {
    const value = 'tab\there \\ "quoted"';
    expect(decodeString(encodeString(value)).value).toBe(value);
  });
});

describe('numbers', () => {
  it('keeps integer and float kinds', () => {
    expect(decodeNumber('42')).toEqual({ value: 42, kind: 'integer' });
    expect(decodeNumber('-3.50')).toEqual({ value: -3.5, kind: 'float' });
  });

  it('rejects exponent notation', () => {
    expect(() => decodeNumber('1e3')).toThrow(LiteralDecodeError);
  });

  it('formats integral floats with a fractional part', () => {
    expect(formatNumber(3, 'float')).toBe('3.0');
    expect(formatNumber(2.25, 'float')).toBe('2.25');
  });

  it('formats integers without a decimal point', () => {
    expect(formatNumber(7, 'integer')).toBe('7');
    expect(formatNumber(-12, 'integer')).toBe('-12');
  });
});

describe('regexBody', () => {
  it('strips one pair of delimiting slashes', () => {
    expect(regexBody('/a.*/')).toBe('a.*');
    expect(regexBody('//a//')).toBe('/a/');
  });

  it('leaves bodies without delimiters alone', () => {
    expect(regexBody('a/b')).toBe('a/b');
  });
});

describe('lexical patterns', () => {
  it('requires barewords to have two characters and a non-digit start', () => {
    expect(BAREWORD_PATTERN.test('ab')).toBe(true);
    expect(BAREWORD_PATTERN.test('_x1')).toBe(true);
    expect(BAREWORD_PATTERN.test('a')).toBe(false);
    expect(BAREWORD_PATTERN.test('9ab')).toBe(false);
  });

  it('lets names start with digits or consist of hyphens', () => {
    expect(NAME_PATTERN.test('9-plugin')).toBe(true);
    expect(NAME_PATTERN.test('---')).toBe(true);
    expect(NAME_PATTERN.test('has space')).toBe(false);
  });
});
