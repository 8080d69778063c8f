/**
 * CLI Runner
 * Argument parsing and dispatch for the lsconf binary. Output goes through
 * the context so callers other than the binary can capture it.
 */

import { createDefaultConfig, isTreeFormat, loadConfig } from './cli-config.js';
import type { CliConfig, TreeFormat } from './cli-config.js';
import {
  checkFile,
  formatFile,
  sourceOfTreeFile,
  treeOfFile,
} from './cli-commands.js';
import {
  EXIT_CODES,
  UsageError,
  VERSION,
  exitCodeFor,
  explainError,
  formatError,
} from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'check'; file: string }
  | { mode: 'fmt'; file: string; write: boolean }
  | { mode: 'tree'; file: string; format: TreeFormat | null }
  | { mode: 'from-tree'; file: string }
  | { mode: 'explain'; errorId: string }
  | { mode: 'help' | 'version' };

type Command = 'check' | 'fmt' | 'tree' | 'from-tree';

/** Options each command accepts; `true` marks options that take a value */
const COMMAND_OPTIONS: Record<Command, Record<string, boolean>> = {
  check: {},
  fmt: { '--write': false },
  tree: { '--format': true },
  'from-tree': {},
};

function isCommand(value: string): value is Command {
  return Object.hasOwn(COMMAND_OPTIONS, value);
}

export const USAGE = `lsconf - Parse, format and convert pipeline configuration files

Usage:
  lsconf check <file>                     Parse the file and report errors
  lsconf fmt <file> [--write]             Print the file in canonical layout
  lsconf tree <file> [--format json|yaml] Print the canonical tree
  lsconf from-tree <file>                 Print source for a JSON or YAML tree
  lsconf --explain LSC-XXXX               Show error documentation

Options:
  --write         Replace the file instead of printing (fmt)
  --format <fmt>  Tree output format: json or yaml (default from .lsconf.json)
  -h, --help      Show this help message
  -v, --version   Show version number

Exit codes:
  0 success, 1 usage or configuration error, 2 file not found,
  3 parse or tree error`;

/**
 * Parse command-line arguments into a structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @throws UsageError for unknown commands or options and missing arguments
 */
export function parseCliArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const explainIndex = argv.indexOf('--explain');
  if (explainIndex !== -1) {
    const errorId = argv[explainIndex + 1];
    if (!errorId) {
      throw new UsageError('Missing error ID after --explain');
    }
    return { mode: 'explain', errorId };
  }

  const [command, ...rest] = argv;
  if (command === undefined) {
    throw new UsageError('Missing command');
  }
  if (!isCommand(command)) {
    throw new UsageError(
      command.startsWith('-')
        ? `Unknown option: ${command}`
        : `Unknown command: ${command}`
    );
  }

  const accepted = COMMAND_OPTIONS[command];
  const values = new Map<string, string | null>();
  const positional: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === undefined) continue;

    if (!arg.startsWith('-') || arg === '-') {
      positional.push(arg);
      continue;
    }

    const takesValue = accepted[arg];
    if (takesValue === undefined) {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    if (takesValue) {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new UsageError(`${arg} requires an argument`);
      }
      values.set(arg, value);
      i++;
    } else {
      values.set(arg, null);
    }
  }

  const [file, extra] = positional;
  if (file === undefined) {
    throw new UsageError('Missing file argument');
  }
  if (extra !== undefined) {
    throw new UsageError(`Unexpected argument: ${extra}`);
  }

  switch (command) {
    case 'check':
      return { mode: 'check', file };
    case 'fmt':
      return { mode: 'fmt', file, write: values.has('--write') };
    case 'tree': {
      const format = values.get('--format') ?? null;
      if (format !== null && !isTreeFormat(format)) {
        throw new UsageError(`Invalid format: ${format}. Expected json or yaml`);
      }
      return { mode: 'tree', file, format };
    }
    case 'from-tree':
      return { mode: 'from-tree', file };
  }
}

/** Where a CLI run writes and which directory it reads configuration from */
export interface CliContext {
  readonly cwd: string;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

function defaultContext(): CliContext {
  return {
    cwd: process.cwd(),
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  };
}

function line(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

/**
 * Run one CLI invocation.
 * Resolves to the process exit code; never rejects.
 */
export async function runCli(
  argv: string[],
  context: CliContext = defaultContext()
): Promise<number> {
  try {
    const args = parseCliArgs(argv);

    switch (args.mode) {
      case 'help':
        context.stdout(line(USAGE));
        return EXIT_CODES.ok;

      case 'version':
        context.stdout(line(VERSION));
        return EXIT_CODES.ok;

      case 'explain': {
        const documentation = explainError(args.errorId);
        if (documentation === null) {
          context.stderr(line(`Invalid error ID: ${args.errorId}`));
          context.stderr(
            line('Error ID must be in format LSC-{I|P|L|T}{3-digit}, e.g., LSC-P001')
          );
          return EXIT_CODES.usage;
        }
        context.stdout(line(documentation));
        return EXIT_CODES.ok;
      }

      case 'check':
        context.stdout(line(await checkFile(args.file)));
        return EXIT_CODES.ok;

      case 'fmt': {
        const config = loadCliConfig(context.cwd);
        const output = await formatFile(args.file, config, args.write);
        if (output !== null) {
          context.stdout(output);
        }
        return EXIT_CODES.ok;
      }

      case 'tree': {
        const config = loadCliConfig(context.cwd);
        context.stdout(await treeOfFile(args.file, args.format ?? config.treeFormat));
        return EXIT_CODES.ok;
      }

      case 'from-tree': {
        const config = loadCliConfig(context.cwd);
        context.stdout(await sourceOfTreeFile(args.file, config));
        return EXIT_CODES.ok;
      }
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    context.stderr(line(formatError(error)));
    return exitCodeFor(err);
  }
}

function loadCliConfig(cwd: string): CliConfig {
  try {
    return loadConfig(cwd) ?? createDefaultConfig();
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}
