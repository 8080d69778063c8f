/**
 * Fragment Parsing Tests
 * Each node kind parsed on its own, plus the trailing-input switch
 */

import { describe, expect, it } from 'vitest';
import {
  ConfigSyntaxError,
  ParseError,
  parseFragment,
  render,
  toValue,
} from 'lsconf';

describe('literal fragments', () => {
  it('parses barewords of two or more characters', () => {
    expect(parseFragment('ab', 'Bareword').value).toBe('ab');
    expect(() => parseFragment('a', 'Bareword')).toThrow(ConfigSyntaxError);
  });

  it('keeps string quote style and lexeme', () => {
    const node = parseFragment("'single \\' quote'", 'StringLiteral');
    expect(node.quote).toBe("'");
    expect(node.value).toBe("single ' quote");
    expect(node.lexeme).toBe("'single \\' quote'");
  });

  it('parses negative floats with their lexeme', () => {
    const node = parseFragment('-12.50', 'NumberLiteral');
    expect(node).toMatchObject({ value: -12.5, kind: 'float', lexeme: '-12.50' });
    expect(render(node)).toBe('-12.50');
  });

  it('parses arrays of integers as integers', () => {
    const node = parseFragment('[1, 2, 3]', 'Array');
    expect(node.elements).toHaveLength(3);
    expect(node.elements.map((el) => el.type)).toEqual([
      'NumberLiteral',
      'NumberLiteral',
      'NumberLiteral',
    ]);
    expect(toValue(node)).toEqual([1, 2, 3]);
    for (const el of node.elements) {
      expect(el).toMatchObject({ kind: 'integer' });
    }
  });

  it('reads multi-segment selectors as one token', () => {
    expect(parseFragment('[a][b c]', 'Selector').raw).toBe('[a][b c]');
  });

  it('stores regex bodies without delimiters', () => {
    const node = parseFragment('/\\/var\\/log\\/.*/', 'RegexLiteral');
    expect(node.pattern).toBe('\\/var\\/log\\/.*');
    expect(render(node)).toBe('/\\/var\\/log\\/.*/');
  });

  it('parses true and false but not longer words', () => {
    expect(parseFragment('true', 'BoolLiteral').value).toBe(true);
    expect(parseFragment('false', 'BoolLiteral').value).toBe(false);
    expect(parseFragment('trueish', 'Value').type).toBe('Bareword');
  });

  it('never reads true or false as a bareword', () => {
    expect(() => parseFragment('true', 'Bareword')).toThrow(ConfigSyntaxError);
    expect(() => parseFragment('{ false => 1 }', 'Map')).toThrow(ConfigSyntaxError);
  });
});

describe('input without a trailing newline', () => {
  it('parses the fragment up to the last character', () => {
    expect(parseFragment('[1, 2, 3]', 'Array').elements).toHaveLength(3);
    expect(parseFragment('42', 'NumberLiteral').value).toBe(42);
    expect(parseFragment('"x"', 'StringLiteral').value).toBe('x');
    expect(parseFragment('[a] == 1', 'CompareExpr').operator).toBe('==');
  });

  it('allows a comment as the last line', () => {
    expect(toValue(parseFragment('[1] # done', 'Array'))).toEqual([1]);
  });
});

describe('names', () => {
  it('accepts plugin names that start with a digit', () => {
    const node = parseFragment('9-plugin { }', 'Plugin');
    expect(node.name).toBe('9-plugin');
    expect(render(node)).toBe('9-plugin {\n}');
  });

  it('accepts quoted plugin names and re-quotes them', () => {
    const node = parseFragment('"my plugin" { id => "x" }', 'Plugin');
    expect(node.name).toBe('my plugin');
    expect(render(node)).toBe('"my plugin" {\n  id => "x"\n}');
  });

  it('accepts hyphen-only attribute names', () => {
    const node = parseFragment('--- => 1', 'Attribute');
    expect(node.name).toMatchObject({ type: 'Bareword', value: '---' });
  });
});

describe('values', () => {
  it('parses maps keyed by strings, barewords and numbers', () => {
    const node = parseFragment('{ "a" => 1 b_key => [x_y] 3 => true }', 'Map');
    expect(node.entries.map((entry) => entry.key.type)).toEqual([
      'StringLiteral',
      'Bareword',
      'NumberLiteral',
    ]);
    expect(toValue(node)).toEqual({ a: 1, b_key: ['x_y'], '3': true });
  });

  it('allows a plugin as an attribute value', () => {
    const node = parseFragment('codec => json { charset => "UTF-8" }', 'Attribute');
    expect(node.value.type).toBe('Plugin');
    expect(toValue(node)).toEqual({ codec: { json: [{ charset: 'UTF-8' }] } });
  });

  it('ignores comments between tokens', () => {
    const node = parseFragment(
      'stdout { # first\n  codec => rubydebug # second\n}',
      'Plugin'
    );
    expect(toValue(node)).toEqual({ stdout: [{ codec: 'rubydebug' }] });
  });
});

describe('expressions', () => {
  it('parses comparisons with RValue operands', () => {
    const node = parseFragment('[status] >= 400', 'CompareExpr');
    expect(node.operator).toBe('>=');
    expect(node.left).toMatchObject({ type: 'RValue', value: { type: 'Selector' } });
    expect(node.right).toMatchObject({ type: 'RValue', value: { value: 400 } });
  });

  it('accepts whitespace and comments inside not in', () => {
    const node = parseFragment('[tags] not  # note\n in ["x", "y"]', 'NotInExpr');
    expect(node.collection).toMatchObject({ type: 'RValue', value: { type: 'Array' } });
    expect(render(node)).toBe('[tags] not in ["x", "y"]');
  });

  it('parses membership tests', () => {
    const node = parseFragment('"error" in [tags]', 'InExpr');
    expect(render(node)).toBe('"error" in [tags]');
  });

  it('parses regex matches against regex and string patterns', () => {
    expect(parseFragment('[msg] =~ /err.*/', 'RegexExpr').pattern).toMatchObject({
      type: 'RegexLiteral',
      pattern: 'err.*',
    });
    expect(parseFragment("[msg] !~ 'ok'", 'RegexExpr').pattern).toMatchObject({
      type: 'StringLiteral',
      value: 'ok',
    });
  });

  it('parses method calls with and without arguments', () => {
    expect(render(parseFragment('size([a], "b")', 'MethodCall'))).toBe('size([a], "b")');
    expect(render(parseFragment('now( )', 'MethodCall'))).toBe('now()');
  });

  it('negates selectors without parentheses', () => {
    const node = parseFragment('![tag]', 'NegativeExpr');
    expect(node.expression.type).toBe('Selector');
    expect(render(node)).toBe('![tag]');
  });

  it('keeps parentheses around negated comparisons', () => {
    expect(render(parseFragment('!( [s] >= 400 )', 'NegativeExpr'))).toBe('!([s] >= 400)');
  });
});

describe('boolean precedence', () => {
  it('binds and tighter than or', () => {
    const node = parseFragment('[a] == 1 or [b] == 2 and [c] == 3', 'Condition');
    expect(node).toMatchObject({
      type: 'BooleanExpr',
      operator: 'or',
      left: { type: 'CompareExpr' },
      right: { type: 'BooleanExpr', operator: 'and' },
    });
  });

  it('folds and before a following or', () => {
    const node = parseFragment('[a] and [b] or [c]', 'Condition');
    expect(node).toMatchObject({
      operator: 'or',
      left: { type: 'BooleanExpr', operator: 'and' },
      right: { type: 'RValue' },
    });
  });

  it('treats and, xor and nand as one left-associative tier', () => {
    const node = parseFragment('[a] xor [b] nand [c] and [d]', 'Condition');
    expect(node).toMatchObject({
      operator: 'and',
      left: {
        operator: 'nand',
        left: { operator: 'xor' },
      },
    });
  });

  it('honors explicit parentheses', () => {
    const node = parseFragment('([a] or [b]) and [c]', 'Condition');
    expect(node).toMatchObject({
      operator: 'and',
      left: { type: 'BooleanExpr', operator: 'or' },
    });
    expect(render(node)).toBe('([a] or [b]) and [c]');
  });

  it('does not read operator words inside identifiers', () => {
    const node = parseFragment('[a] == "x" or [b] == "y"', 'Condition');
    expect(render(node)).toBe('[a] == "x" or [b] == "y"');
    expect(() => parseFragment('[a] order [b]', 'Condition')).toThrow(ConfigSyntaxError);
  });
});

describe('fragment kind checks', () => {
  it('rejects an expression of another kind with LSC-P003', () => {
    try {
      parseFragment('[a] == 1', 'RegexExpr');
      expect.fail('Expected ParseError');
    } catch (err) {
      expect(err).toBeInstanceOf(ParseError);
      if (err instanceof ParseError) {
        expect(err.errorId).toBe('LSC-P003');
        expect(err.message).toBe('Expected RegexExpr, found CompareExpr');
      }
    }
  });

  it('rejects trailing input by default', () => {
    try {
      parseFragment('[1] extra', 'Array');
      expect.fail('Expected ConfigSyntaxError');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigSyntaxError);
      if (err instanceof ConfigSyntaxError) {
        expect(err.errorId).toBe('LSC-P001');
        expect(err.location).toEqual({ line: 1, column: 5, offset: 4 });
      }
    }
  });

  it('ignores trailing input when allowed', () => {
    const node = parseFragment('[1] extra', 'Array', { allowTrailing: true });
    expect(toValue(node)).toEqual([1]);
  });
});
