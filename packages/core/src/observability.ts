/**
 * Observability Hooks
 * Optional callbacks invoked around each parse. Hosts route these to their
 * own logging or metrics; the library writes nothing itself.
 */

import type { ParseError } from './error-classes.js';

export interface ParseStartEvent {
  readonly source: string;
  /** Node kind requested; 'Document' for parse() */
  readonly kind: string;
}

export interface ParseEndEvent {
  readonly kind: string;
  readonly durationMs: number;
  /** Nodes in the resulting tree, the root included */
  readonly nodeCount: number;
}

export interface ParseErrorEvent {
  readonly kind: string;
  readonly error: ParseError;
  readonly durationMs: number;
}

/**
 * Callbacks for parse lifecycle events.
 * Exceptions thrown by a callback propagate to the caller.
 */
export interface ParseObservability {
  onParseStart?: (event: ParseStartEvent) => void;
  onParseEnd?: (event: ParseEndEvent) => void;
  onParseError?: (event: ParseErrorEvent) => void;
}
