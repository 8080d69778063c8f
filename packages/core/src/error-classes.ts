/**
 * Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import type { ErrorCategory } from './error-registry.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LsconfErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Render the registry message for an error ID.
 * Throws TypeError for unknown IDs or IDs outside the expected categories.
 */
function registryMessage(
  errorId: string,
  context: Record<string, unknown>,
  categories: readonly ErrorCategory[]
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (!categories.includes(definition.category)) {
    throw new TypeError(
      `Expected ${categories.join(' or ')} error ID, got: ${errorId}`
    );
  }
  return renderMessage(definition.messageTemplate, context);
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all lsconf errors.
 * Provides structured data for host applications to format as needed.
 */
export class LsconfError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: LsconfErrorData, options?: { cause?: unknown }) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`, options);
    this.name = 'LsconfError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LsconfErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LsconfErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// PARSE ERRORS
// ============================================================

/**
 * The single failure surface of parse() and parseFragment().
 * Internal exceptions escaping the grammar are wrapped in this class.
 */
export class ParseError extends LsconfError {
  constructor(
    errorId: string,
    context: Record<string, unknown>,
    location?: SourceLocation,
    options?: { cause?: unknown }
  ) {
    const message = registryMessage(errorId, context, ['input', 'parse']);
    super({ errorId, message, location, context }, options);
    this.name = 'ParseError';
  }
}

/** Empty or whitespace-only input, rejected before the grammar runs */
export class EmptyInputError extends ParseError {
  constructor() {
    super('LSC-I001', {});
    this.name = 'EmptyInputError';
  }
}

/** Grammar mismatch, leftover input, or an undecodable literal */
export class ConfigSyntaxError extends ParseError {
  /** What the grammar expected at the failure position */
  readonly expected: string;

  constructor(
    expected: string,
    location: SourceLocation,
    options?: { errorId?: string; cause?: unknown }
  ) {
    super(
      options?.errorId ?? 'LSC-P001',
      { detail: expected },
      location,
      options?.cause === undefined ? undefined : { cause: options.cause }
    );
    this.name = 'ConfigSyntaxError';
    this.expected = expected;
  }
}

// ============================================================
// CONSTRUCTION ERRORS
// ============================================================

/** A string or other literal that matched but could not be decoded or built */
export class LiteralDecodeError extends LsconfError {
  constructor(errorId: string, context: Record<string, unknown>) {
    super({
      errorId,
      message: registryMessage(errorId, context, ['literal']),
      context,
    });
    this.name = 'LiteralDecodeError';
  }
}

/** from_tree input that violates the canonical tree shape */
export class TreeShapeError extends LsconfError {
  /** Path to the offending value, e.g. config[0].plugin_section.filter[2] */
  readonly path: string;

  constructor(
    errorId: string,
    context: Record<string, unknown>,
    path: string,
    options?: { cause?: unknown }
  ) {
    const message = registryMessage(errorId, context, ['tree']);
    super(
      {
        errorId,
        message: path ? `${message} (at ${path})` : message,
        context,
      },
      options
    );
    this.name = 'TreeShapeError';
    this.path = path;
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Factory function for creating errors from registry.
 *
 * Looks up the definition, renders its template and returns the class that
 * matches its category.
 *
 * @example
 * createError("LSC-T005", { count: 2 })
 * // TreeShapeError: "Attribute must have exactly one key, found 2"
 *
 * @example
 * createError("LSC-X999", {})
 * // Throws: TypeError("Unknown error ID: LSC-X999")
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location?: SourceLocation | undefined
): LsconfError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  switch (definition.category) {
    case 'input':
    case 'parse':
      return new ParseError(errorId, context, location);
    case 'literal':
      return new LiteralDecodeError(errorId, context);
    case 'tree':
      return new TreeShapeError(errorId, context, '');
  }
}
