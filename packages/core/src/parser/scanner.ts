/**
 * Source Scanner
 * Matches token patterns against the source string at a combinator byte
 * index, and remembers the furthest point any token failed.
 * @internal
 */

import { utf8Offsets } from '../source-location.js';

/** @internal */
export interface TokenMatch {
  readonly text: string;
  /** Byte index just past the match */
  readonly end: number;
}

/** @internal */
export interface TokenFailure {
  readonly byteIndex: number;
  /** Descriptions of every token tried at that index, first try first */
  readonly expected: readonly string[];
}

/** @internal */
export class SourceScanner {
  private readonly byteStarts: number[];
  private readonly unitAt = new Map<number, number>();
  private furthest = -1;
  private expected: string[] = [];

  constructor(readonly source: string) {
    this.byteStarts = utf8Offsets(source);
    this.byteStarts.forEach((byte, unit) => {
      if (!this.unitAt.has(byte)) {
        this.unitAt.set(byte, unit);
      }
    });
  }

  /**
   * Match a sticky pattern at a byte index.
   * Empty matches succeed, including at the end of input.
   */
  match(pattern: RegExp, byteIndex: number): TokenMatch | null {
    const unit = this.unitAt.get(byteIndex);
    if (unit === undefined) {
      return null;
    }
    pattern.lastIndex = unit;
    const found = pattern.exec(this.source);
    if (found === null) {
      return null;
    }
    const text = found[0];
    const end = this.byteStarts[unit + text.length];
    if (end === undefined) {
      return null;
    }
    return { text, end };
  }

  /** Record that a token described by `expected` did not match at `byteIndex` */
  fail(byteIndex: number, expected: string): void {
    if (byteIndex > this.furthest) {
      this.furthest = byteIndex;
      this.expected = [expected];
    } else if (byteIndex === this.furthest && !this.expected.includes(expected)) {
      this.expected.push(expected);
    }
  }

  furthestFailure(): TokenFailure | null {
    if (this.furthest < 0) {
      return null;
    }
    return { byteIndex: this.furthest, expected: [...this.expected] };
  }
}
