/**
 * Literal Codec
 * Lexical patterns, string escape decoding/encoding, number formatting.
 */

import type { NumberKind, QuoteChar } from './ast-nodes.js';
import { LiteralDecodeError } from './error-classes.js';

// ============================================================
// LEXICAL PATTERNS
// ============================================================

/** Strict identifier: two or more characters, no leading digit */
export const BAREWORD_PATTERN = /^[A-Za-z_][A-Za-z0-9_]+$/;

/** Plugin and attribute names when unquoted */
export const NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

/** One or more [segment] groups */
export const SELECTOR_PATTERN = /^(?:\[[^[\],]+\])+$/;

export const NUMBER_PATTERN = /^-?[0-9]+(?:\.[0-9]+)?$/;

const STRING_PATTERNS: Record<QuoteChar, RegExp> = {
  '"': /^"(?:\\[\s\S]|[^"\\])*"$/,
  "'": /^'(?:\\[\s\S]|[^'\\])*'$/,
};

// ============================================================
// STRING DECODING
// ============================================================

const SIMPLE_ESCAPES: Record<string, string> = {
  '\\': '\\',
  "'": "'",
  '"': '"',
  n: '\n',
  t: '\t',
  r: '\r',
  b: '\b',
  f: '\f',
  v: '\v',
  a: '\x07',
  '\n': '',
};

const HEX_ESCAPE_WIDTH: Record<string, number> = { x: 2, u: 4, U: 8 };

function quoteOf(lexeme: string): QuoteChar | null {
  const first = lexeme.charAt(0);
  if ((first === '"' || first === "'") && STRING_PATTERNS[first].test(lexeme)) {
    return first;
  }
  return null;
}

/**
 * Decode a quoted string lexeme.
 *
 * Unknown escapes such as \d stay as written, so regular expressions
 * embedded in strings keep their backslashes.
 *
 * @throws LiteralDecodeError on a lexeme that is not a quoted string or has
 * a truncated \x, \u or \U escape
 */
export function decodeString(lexeme: string): {
  value: string;
  quote: QuoteChar;
} {
  const quote = quoteOf(lexeme);
  if (quote === null) {
    throw new LiteralDecodeError('LSC-L002', {
      kind: 'string literal',
      text: lexeme,
    });
  }

  const body = lexeme.slice(1, -1);
  let value = '';
  let i = 0;

  while (i < body.length) {
    const char = body.charAt(i);
    if (char !== '\\') {
      value += char;
      i++;
      continue;
    }

    const next = body.charAt(i + 1);
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      value += simple;
      i += 2;
      continue;
    }

    const width = HEX_ESCAPE_WIDTH[next];
    if (width !== undefined) {
      const digits = body.slice(i + 2, i + 2 + width);
      const codePoint = /^[0-9A-Fa-f]+$/.test(digits)
        ? parseInt(digits, 16)
        : NaN;
      if (digits.length !== width || !(codePoint <= 0x10ffff)) {
        throw new LiteralDecodeError('LSC-L001', {
          escape: `\\${next}${digits}`,
        });
      }
      value += String.fromCodePoint(codePoint);
      i += 2 + width;
      continue;
    }

    const octal = /^[0-7]{1,3}/.exec(body.slice(i + 1));
    if (octal) {
      value += String.fromCharCode(parseInt(octal[0], 8));
      i += 1 + octal[0].length;
      continue;
    }

    // Unknown escape: keep backslash and character
    value += char + next;
    i += 2;
  }

  return { value, quote };
}

/** Build a lexeme whose decoding is exactly `value` */
export function encodeString(value: string, quote: QuoteChar = '"'): string {
  let body = '';
  for (const char of value) {
    switch (char) {
      case '\\':
        body += '\\\\';
        break;
      case '\n':
        body += '\\n';
        break;
      case '\r':
        body += '\\r';
        break;
      case '\t':
        body += '\\t';
        break;
      case quote:
        body += `\\${quote}`;
        break;
      default:
        body += char;
    }
  }
  return `${quote}${body}${quote}`;
}

// ============================================================
// NUMBERS
// ============================================================

/** Read a number lexeme, keeping its integer/float kind */
export function decodeNumber(lexeme: string): {
  value: number;
  kind: NumberKind;
} {
  if (!NUMBER_PATTERN.test(lexeme)) {
    throw new LiteralDecodeError('LSC-L002', {
      kind: 'number literal',
      text: lexeme,
    });
  }
  return {
    value: Number(lexeme),
    kind: lexeme.includes('.') ? 'float' : 'integer',
  };
}

/** Canonical text for a number built without a lexeme */
export function formatNumber(value: number, kind: NumberKind): string {
  if (kind === 'integer') {
    return BigInt(Math.trunc(value)).toString();
  }
  if (Number.isInteger(value)) {
    return Math.abs(value) < 1e21
      ? value.toFixed(1)
      : `${BigInt(value).toString()}.0`;
  }
  const text = String(value);
  if (!/e/i.test(text)) {
    return text;
  }
  const fixed = value.toFixed(20).replace(/0+$/, '');
  return fixed.endsWith('.') ? `${fixed}0` : fixed;
}

// ============================================================
// REGEX
// ============================================================

/** Strip one pair of delimiting slashes, if present */
export function regexBody(text: string): string {
  if (text.length >= 2 && text.startsWith('/') && text.endsWith('/')) {
    return text.slice(1, -1);
  }
  return text;
}
