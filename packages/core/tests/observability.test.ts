/**
 * Parse Observability Tests
 */

import { describe, expect, it } from 'vitest';
import {
  EmptyInputError,
  type ParseEndEvent,
  type ParseErrorEvent,
  type ParseStartEvent,
  parse,
  parseFragment,
} from 'lsconf';

describe('parse observability', () => {
  it('reports start and end with the node count', () => {
    const starts: ParseStartEvent[] = [];
    const ends: ParseEndEvent[] = [];
    parse('input { stdin { } }', {
      observability: {
        onParseStart: (event) => starts.push(event),
        onParseEnd: (event) => ends.push(event),
      },
    });
    expect(starts).toEqual([{ source: 'input { stdin { } }', kind: 'Document' }]);
    expect(ends).toHaveLength(1);
    expect(ends[0]?.kind).toBe('Document');
    expect(ends[0]?.nodeCount).toBe(3);
    expect(ends[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('reports the fragment kind', () => {
    const kinds: string[] = [];
    parseFragment('[a]', 'Selector', {
      observability: { onParseStart: (event) => kinds.push(event.kind) },
    });
    expect(kinds).toEqual(['Selector']);
  });

  it('reports failures with the thrown error', () => {
    const errors: ParseErrorEvent[] = [];
    let thrown: unknown;
    try {
      parse('  ', { observability: { onParseError: (event) => errors.push(event) } });
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(EmptyInputError);
    expect(errors).toHaveLength(1);
    expect(errors[0]?.error).toBe(thrown);
    expect(errors[0]?.kind).toBe('Document');
  });

  it('does not report an end after a failure', () => {
    let ended = false;
    expect(() =>
      parse('filter {', {
        observability: {
          onParseEnd: () => {
            ended = true;
          },
        },
      })
    ).toThrow();
    expect(ended).toBe(false);
  });
});
