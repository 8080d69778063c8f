/**
 * Parser Helpers
 * Shared combinators layered on the arcsecond primitives.
 * @internal This module contains internal parser utilities
 */

import { Parser, coroutine, many, possibly } from 'arcsecond';
import { SourceScanner } from './scanner.js';

// ============================================================
// POSITION AND TRIVIA
// ============================================================

/**
 * Current byte index; consumes nothing.
 * @internal
 */
export const position: Parser<number> = new Parser((state) =>
  state.isError ? state : { ...state, result: state.index }
);

function scannerOf(data: unknown): SourceScanner {
  if (data instanceof SourceScanner) {
    return data;
  }
  throw new Error('Token rules need a SourceScanner as parser data');
}

/**
 * Match `pattern` at the current index without copying the remaining input.
 * The scanner travels as parser data (see `withData` in parser/index.ts).
 * @internal
 */
export function token(pattern: RegExp, expected: string): Parser<string> {
  const sticky = new RegExp(pattern.source, `${pattern.flags.replace('y', '')}y`);
  return new Parser<string>((state) => {
    if (state.isError) {
      return state;
    }
    const scanner = scannerOf(state.data);
    const found = scanner.match(sticky, state.index);
    if (found === null) {
      scanner.fail(state.index, expected);
      return { ...state, isError: true, error: `Expected ${expected}` };
    }
    return { ...state, index: found.end, result: found.text };
  });
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Exact text such as `=>` or `{`.
 * @internal
 */
export function symbol(text: string): Parser<string> {
  return token(new RegExp(escapeRegExp(text)), `"${text}"`);
}

/**
 * Insignificant whitespace and #-to-end-of-line comments (possibly empty).
 * @internal
 */
export const cs: Parser<string> = token(/(?:\s|#[^\r\n]*)*/, 'whitespace');

// ============================================================
// TOKENS
// ============================================================

/**
 * A keyword that is not the prefix of a longer name.
 * @internal
 */
export function keyword(word: string): Parser<string> {
  return token(new RegExp(`${word}(?![A-Za-z0-9_-])`), `"${word}"`);
}

/**
 * An operator word that is not the prefix of a longer identifier.
 * @internal
 */
export function operatorWord(word: string): Parser<string> {
  return token(new RegExp(`${word}(?![A-Za-z0-9_])`), `"${word}"`);
}

/**
 * Match one of several literal spellings, yielding the spelling.
 * Longer spellings must come first when they share a prefix.
 * @internal
 */
export function oneOf<T extends string>(
  spellings: readonly T[],
  boundary = ''
): Parser<T> {
  const pattern = token(
    new RegExp(`(?:${spellings.map(escapeRegExp).join('|')})${boundary}`),
    spellings.map((s) => `"${s}"`).join(' or ')
  );
  return coroutine((run) => {
    const text = run(pattern);
    const spelling = spellings.find((s) => s === text);
    if (spelling === undefined) {
      throw new Error(`Matched unknown spelling: ${text}`);
    }
    return spelling;
  });
}

// ============================================================
// SEQUENCES
// ============================================================

/**
 * `open item (sep item)* close` with trivia allowed between every token.
 * Zero items are allowed.
 * @internal
 */
export function delimited<T>(
  open: string,
  item: Parser<T>,
  separator: string | null,
  close: string
): Parser<T[]> {
  const separated = coroutine((run) => {
    run(cs);
    if (separator !== null) {
      run(symbol(separator));
      run(cs);
    }
    return run(item);
  });

  return coroutine((run) => {
    run(symbol(open));
    run(cs);
    const first = run(possibly(item));
    const items: T[] = first === null ? [] : [first, ...run(many(separated))];
    run(cs);
    run(symbol(close));
    return items;
  });
}
