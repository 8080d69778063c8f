// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/** Maps a combinator byte index to a 1-based line/column location */
export type Locator = (byteIndex: number) => SourceLocation;

const encoder = new TextEncoder();

/**
 * UTF-8 byte offset of every UTF-16 unit of `source`, plus one entry for
 * the end of input. A low surrogate shares its pair's start.
 */
export function utf8Offsets(source: string): number[] {
  const byteStarts: number[] = [];
  let bytes = 0;
  for (let i = 0; i < source.length; i++) {
    byteStarts.push(bytes);
    const code = source.charCodeAt(i);
    if (code >= 0xd800 && code <= 0xdbff && i + 1 < source.length) {
      byteStarts.push(bytes);
      bytes += 4;
      i++;
      continue;
    }
    bytes += encoder.encode(source[i] ?? '').length;
  }
  byteStarts.push(bytes);
  return byteStarts;
}

/**
 * Build a locator for a source text.
 *
 * The combinator library reports positions as UTF-8 byte offsets; locations
 * use UTF-16 offsets so they index the original string directly.
 */
export function createLocator(source: string): Locator {
  const byteStarts = utf8Offsets(source);

  const lineStarts: number[] = [0];
  for (let i = 0; i < source.length; i++) {
    if (source[i] === '\n') {
      lineStarts.push(i + 1);
    }
  }

  return (byteIndex: number): SourceLocation => {
    const offset = lowerBound(byteStarts, byteIndex);
    const lineIndex = upperBound(lineStarts, offset) - 1;
    const lineStart = lineStarts[lineIndex] ?? 0;
    return {
      line: lineIndex + 1,
      column: offset - lineStart + 1,
      offset,
    };
  };
}

/** First index whose value is >= target */
function lowerBound(values: number[], target: number): number {
  let lo = 0;
  let hi = values.length - 1;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if ((values[mid] ?? 0) < target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/** First index whose value is > target */
function upperBound(values: number[], target: number): number {
  let lo = 0;
  let hi = values.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if ((values[mid] ?? 0) <= target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
