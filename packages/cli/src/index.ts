/**
 * lsconf CLI
 * Programmatic access to the command-line tool
 */

export { parseCliArgs, runCli, USAGE, type CliContext, type ParsedArgs } from './cli-run.js';
export {
  checkFile,
  formatFile,
  readSource,
  sourceOfTreeFile,
  treeOfFile,
} from './cli-commands.js';
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  type CliConfig,
  type TreeFormat,
} from './cli-config.js';
export {
  EXIT_CODES,
  FileNotFoundError,
  TreeFileError,
  UsageError,
  VERSION,
  exitCodeFor,
  explainError,
  formatError,
  type ExitCode,
} from './cli-shared.js';
