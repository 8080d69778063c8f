/**
 * lsconf CLI Tests
 * Runs each command in-process against files in a temp directory
 *
 * Exit codes: 0 ok, 1 usage or config, 2 file not found, 3 parse or tree error
 */

import { afterAll, afterEach, beforeAll, describe, expect, it } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'yaml';
import { type CliContext, USAGE, runCli } from '../src/cli-run.js';
import { CONFIG_FILE_NAME } from '../src/cli-config.js';

interface Captured {
  readonly code: number;
  readonly stdout: string;
  readonly stderr: string;
}

describe('lsconf CLI', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lsconf-cli-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  afterEach(async () => {
    await fs.rm(path.join(tempDir, CONFIG_FILE_NAME), { force: true });
  });

  async function writeFile(name: string, content: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
  }

  async function run(...argv: string[]): Promise<Captured> {
    let stdout = '';
    let stderr = '';
    const context: CliContext = {
      cwd: tempDir,
      stdout: (text) => {
        stdout += text;
      },
      stderr: (text) => {
        stderr += text;
      },
    };
    const code = await runCli(argv, context);
    return { code, stdout, stderr };
  }

  describe('check', () => {
    it('prints ok for a valid file', async () => {
      const file = await writeFile('valid.conf', 'input { stdin { } }\n');
      expect(await run('check', file)).toEqual({ code: 0, stdout: 'ok\n', stderr: '' });
    });

    it('exits 2 for a missing file', async () => {
      const file = path.join(tempDir, 'missing.conf');
      expect(await run('check', file)).toEqual({
        code: 2,
        stdout: '',
        stderr: `Error: File not found: ${file}\n`,
      });
    });

    it('exits 2 for a directory', async () => {
      const result = await run('check', tempDir);
      expect(result.code).toBe(2);
      expect(result.stderr).toBe(`Error: Path is a directory: ${tempDir}\n`);
    });

    it('exits 3 with the location of a syntax error', async () => {
      const file = await writeFile('broken.conf', 'filter {\n  mutate {\n');
      const result = await run('check', file);
      expect(result.code).toBe(3);
      expect(result.stderr).toMatch(/^Parse error at line \d+, column \d+: Failed to parse configuration: /);
      expect(result.stderr.endsWith('(LSC-P001)\n')).toBe(true);
    });

    it('exits 3 for an empty file', async () => {
      const file = await writeFile('empty.conf', '\n\n');
      expect(await run('check', file)).toEqual({
        code: 3,
        stdout: '',
        stderr: 'Parse error: Configuration text is empty (LSC-I001)\n',
      });
    });
  });

  describe('fmt', () => {
    it('prints the canonical layout', async () => {
      const file = await writeFile('compact.conf', 'filter{drop{}}');
      expect(await run('fmt', file)).toEqual({
        code: 0,
        stdout: 'filter {\n  drop {\n  }\n}\n',
        stderr: '',
      });
    });

    it('uses the configured indent width', async () => {
      await writeFile(CONFIG_FILE_NAME, '{"indentWidth": 4}');
      const file = await writeFile('indent.conf', 'filter{drop{}}');
      expect((await run('fmt', file)).stdout).toBe('filter {\n    drop {\n    }\n}\n');
    });

    it('replaces the file with --write', async () => {
      const file = await writeFile('rewrite.conf', 'output{stdout{codec=>json}}');
      expect(await run('fmt', file, '--write')).toEqual({ code: 0, stdout: '', stderr: '' });
      expect(await fs.readFile(file, 'utf-8')).toBe(
        'output {\n  stdout {\n    codec => json\n  }\n}\n'
      );
    });

    it('exits 1 for an invalid configuration', async () => {
      await writeFile(CONFIG_FILE_NAME, '{"indentWidth": 0}');
      const file = await writeFile('any.conf', 'filter{drop{}}');
      expect(await run('fmt', file)).toEqual({
        code: 1,
        stdout: '',
        stderr: 'Error: Invalid configuration: indentWidth must be a positive integer, got 0\n',
      });
    });
  });

  describe('tree', () => {
    const expected = {
      config: [
        {
          plugin_section: {
            output: [{ plugin: { plugin_name: 'stdout', attributes: [] } }],
          },
        },
      ],
    };

    it('prints JSON by default', async () => {
      const file = await writeFile('tree.conf', 'output { stdout { } }');
      const result = await run('tree', file);
      expect(result.code).toBe(0);
      expect(result.stdout.endsWith('}\n')).toBe(true);
      expect(JSON.parse(result.stdout)).toEqual(expected);
    });

    it('prints YAML with --format yaml', async () => {
      const file = await writeFile('tree-yaml.conf', 'output { stdout { } }');
      const result = await run('tree', file, '--format', 'yaml');
      expect(result.code).toBe(0);
      expect(yaml.parse(result.stdout)).toEqual(expected);
    });

    it('takes the default format from the configuration', async () => {
      await writeFile(CONFIG_FILE_NAME, '{"treeFormat": "yaml"}');
      const file = await writeFile('tree-config.conf', 'output { stdout { } }');
      const result = await run('tree', file);
      expect(result.stdout.startsWith('config:')).toBe(true);
    });
  });

  describe('from-tree', () => {
    it('renders a JSON tree', async () => {
      const file = await writeFile(
        'tree.json',
        JSON.stringify({ plugin: { plugin_name: 'stdout', attributes: [{ codec: 'json' }] } })
      );
      expect(await run('from-tree', file)).toEqual({
        code: 0,
        stdout: 'stdout {\n  codec => json\n}\n',
        stderr: '',
      });
    });

    it('renders a YAML document tree', async () => {
      const file = await writeFile(
        'tree.yaml',
        [
          'config:',
          '  - plugin_section:',
          '      filter:',
          '        - plugin:',
          '            plugin_name: drop',
          '',
        ].join('\n')
      );
      expect((await run('from-tree', file)).stdout).toBe('filter {\n  drop {\n  }\n}\n');
    });

    it('exits 3 for a tree of the wrong shape', async () => {
      const file = await writeFile('bad-shape.json', '{"boolean": "yes"}');
      expect(await run('from-tree', file)).toEqual({
        code: 3,
        stdout: '',
        stderr: 'Tree error: Tree value must be a boolean, found string (at boolean) (LSC-T003)\n',
      });
    });

    it('exits 3 for text that is not YAML', async () => {
      const file = await writeFile('bad-syntax.yaml', '{ a: [');
      const result = await run('from-tree', file);
      expect(result.code).toBe(3);
      expect(result.stderr.startsWith(`Error: Invalid tree file ${file}: `)).toBe(true);
    });
  });

  describe('explain', () => {
    it('prints the registry entry', async () => {
      const result = await run('--explain', 'LSC-I001');
      expect(result.code).toBe(0);
      expect(result.stdout.startsWith(
        'LSC-I001: Empty configuration\n\nMessage: Configuration text is empty\nCause: '
      )).toBe(true);
      expect(result.stdout).toContain('\nExamples:\n  Empty file:\n');
    });

    it('exits 1 for a malformed id', async () => {
      expect(await run('--explain', 'P001')).toEqual({
        code: 1,
        stdout: '',
        stderr:
          'Invalid error ID: P001\nError ID must be in format LSC-{I|P|L|T}{3-digit}, e.g., LSC-P001\n',
      });
    });
  });

  describe('usage', () => {
    it('prints help', async () => {
      expect(await run('--help')).toEqual({ code: 0, stdout: `${USAGE}\n`, stderr: '' });
    });

    it('prints the version', async () => {
      expect((await run('--version')).stdout).toBe('0.3.0\n');
    });

    it('exits 1 for an unknown command', async () => {
      expect(await run('lint', 'a.conf')).toEqual({
        code: 1,
        stdout: '',
        stderr: 'Error: Unknown command: lint\n',
      });
    });
  });
});
