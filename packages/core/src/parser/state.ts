/**
 * Parse Context
 * Per-parse state shared by every grammar rule: the node builder (and its
 * id sequence) plus byte-offset to source-location mapping.
 * @internal
 */

import { createNodeBuilder, type NodeBuilder } from '../ast/builder.js';
import {
  createLocator,
  type SourceLocation,
  type SourceSpan,
} from '../source-location.js';

/** @internal */
export interface ParseContext {
  readonly build: NodeBuilder;
  locate(byteIndex: number): SourceLocation;
  span(startByte: number, endByte: number): SourceSpan;
}

/**
 * Create the context for one parse of `source`.
 * Pass a builder to continue an id sequence started elsewhere.
 * @internal
 */
export function createParseContext(
  source: string,
  build: NodeBuilder = createNodeBuilder()
): ParseContext {
  const locate = createLocator(source);
  return {
    build,
    locate,
    span(startByte, endByte) {
      return { start: locate(startByte), end: locate(endByte) };
    },
  };
}

/**
 * Span covering two child spans, or null when either is missing.
 * @internal
 */
export function joinSpans(
  first: SourceSpan | null,
  last: SourceSpan | null
): SourceSpan | null {
  if (first === null || last === null) {
    return null;
  }
  return { start: first.start, end: last.end };
}
