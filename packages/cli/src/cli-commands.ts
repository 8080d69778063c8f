/**
 * CLI Commands
 * File-level operations behind each lsconf subcommand. Each returns the
 * text to print; the entry point decides where it goes.
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as yaml from 'yaml';
import { fromTree, parse, render, toTree, type ASTNode } from 'lsconf';
import type { CliConfig, TreeFormat } from './cli-config.js';
import { FileNotFoundError, TreeFileError } from './cli-shared.js';

/**
 * Read a file as UTF-8 text.
 * @throws FileNotFoundError when the path is missing or a directory
 */
export async function readSource(file: string): Promise<string> {
  let stats: Stats;
  try {
    stats = await fs.stat(file);
  } catch (err) {
    throw new FileNotFoundError(file, 'File not found', { cause: err });
  }
  if (stats.isDirectory()) {
    throw new FileNotFoundError(file, 'Path is a directory');
  }
  return fs.readFile(file, 'utf-8');
}

/** Parse only; resolves to "ok" or rejects with the parse error */
export async function checkFile(file: string): Promise<string> {
  parse(await readSource(file));
  return 'ok';
}

/**
 * Render the parsed document in canonical layout.
 * With `write` the file is replaced and nothing is returned.
 */
export async function formatFile(
  file: string,
  config: CliConfig,
  write: boolean
): Promise<string | null> {
  const source = await readSource(file);
  const output = render(parse(source), { indentWidth: config.indentWidth });
  if (!write) {
    return output;
  }
  if (output !== source) {
    await fs.writeFile(file, output, 'utf-8');
  }
  return null;
}

/** Canonical tree of the document as JSON or YAML text */
export async function treeOfFile(file: string, format: TreeFormat): Promise<string> {
  const tree = toTree(parse(await readSource(file)));
  return format === 'yaml'
    ? yaml.stringify(tree)
    : `${JSON.stringify(tree, null, 2)}\n`;
}

/**
 * Source text of a JSON or YAML tree file.
 * The tree may describe a whole document or any single node.
 */
export async function sourceOfTreeFile(file: string, config: CliConfig): Promise<string> {
  const text = await readSource(file);
  let tree: unknown;
  try {
    tree = yaml.parse(text);
  } catch (err) {
    throw new TreeFileError(file, { cause: err });
  }
  const node: ASTNode = fromTree(tree);
  const output = render(node, { indentWidth: config.indentWidth });
  return output.endsWith('\n') ? output : `${output}\n`;
}
