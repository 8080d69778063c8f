/**
 * CLI Shared Utilities
 * Error formatting, exit codes and error documentation for lsconf
 */

import {
  ERROR_REGISTRY,
  LsconfError,
  ParseError,
  TreeShapeError,
} from 'lsconf';

/** Version reported by --version */
export const VERSION = '0.3.0';

/** Process exit codes */
export const EXIT_CODES = {
  ok: 0,
  usage: 1,
  fileNotFound: 2,
  invalidInput: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** Bad arguments or configuration; reported with exit code 1 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/** Input file that does not exist or is not a regular file */
export class FileNotFoundError extends Error {
  readonly file: string;

  constructor(
    file: string,
    reason = 'File not found',
    options?: { cause?: unknown }
  ) {
    super(`${reason}: ${file}`, options);
    this.name = 'FileNotFoundError';
    this.file = file;
  }
}

/** A tree file that is neither JSON nor YAML */
export class TreeFileError extends Error {
  constructor(file: string, options?: { cause?: unknown }) {
    const detail =
      options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Invalid tree file ${file}: ${detail}`, options);
    this.name = 'TreeFileError';
  }
}

/**
 * Format error for stderr output
 *
 * Parse errors name the line and column; the ` at L:C` suffix the library
 * appends is dropped in favor of that prefix.
 */
export function formatError(err: Error): string {
  if (err instanceof ParseError) {
    const message = err.message.replace(/ at \d+:\d+$/, '');
    const location = err.location;
    if (location) {
      return `Parse error at line ${location.line}, column ${location.column}: ${message} (${err.errorId})`;
    }
    return `Parse error: ${message} (${err.errorId})`;
  }

  if (err instanceof TreeShapeError) {
    return `Tree error: ${err.message} (${err.errorId})`;
  }

  if (err instanceof LsconfError) {
    return `Error: ${err.message} (${err.errorId})`;
  }

  return `Error: ${err.message}`;
}

/** Exit code for an error raised while running a command */
export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof FileNotFoundError) {
    return EXIT_CODES.fileNotFound;
  }
  if (err instanceof LsconfError || err instanceof TreeFileError) {
    return EXIT_CODES.invalidInput;
  }
  return EXIT_CODES.usage;
}

const ERROR_ID_PATTERN = /^LSC-[IPLT]\d{3}$/;

/**
 * Render registry documentation for an error id.
 * Returns null for malformed or unknown ids.
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const lines = [
    `${definition.errorId}: ${definition.description}`,
    '',
    `Message: ${definition.messageTemplate}`,
  ];
  if (definition.cause) {
    lines.push(`Cause: ${definition.cause}`);
  }
  if (definition.resolution) {
    lines.push(`Resolution: ${definition.resolution}`);
  }
  if (definition.examples && definition.examples.length > 0) {
    lines.push('', 'Examples:');
    for (const example of definition.examples) {
      lines.push(`  ${example.description}:`, `    ${example.code}`);
    }
  }
  return lines.join('\n');
}
