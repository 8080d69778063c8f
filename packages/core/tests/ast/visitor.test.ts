/**
 * AST Visitor Tests
 */

import { describe, expect, it } from 'vitest';
import {
  type ASTNode,
  childrenOf,
  countNodes,
  parse,
  parseFragment,
  visitNode,
} from 'lsconf';

describe('childrenOf', () => {
  it('lists attribute name and value', () => {
    const attr = parseFragment('id => "m1"', 'Attribute');
    expect(childrenOf(attr).map((node) => node.type)).toEqual(['Bareword', 'StringLiteral']);
  });

  it('lists clauses of a branch in order', () => {
    const doc = parse('filter { if [a] { } else if [b] { } else { } }');
    const branch = doc.sections[0]?.items[0];
    expect(branch && childrenOf(branch).map((node) => node.type)).toEqual([
      'If',
      'ElseIf',
      'Else',
    ]);
  });

  it('returns nothing for literals', () => {
    expect(childrenOf(parseFragment('[a]', 'Selector'))).toEqual([]);
  });
});

describe('visitNode', () => {
  it('enters parents before children and exits after', () => {
    const events: string[] = [];
    visitNode(parseFragment('[a] == 1', 'CompareExpr'), {
      enter: (node) => events.push(`enter ${node.type}`),
      exit: (node) => events.push(`exit ${node.type}`),
    });
    expect(events).toEqual([
      'enter CompareExpr',
      'enter RValue',
      'enter Selector',
      'exit Selector',
      'exit RValue',
      'enter RValue',
      'enter NumberLiteral',
      'exit NumberLiteral',
      'exit RValue',
      'exit CompareExpr',
    ]);
  });

  it('passes the ancestor path', () => {
    const paths: string[] = [];
    visitNode(parse('output { stdout { } }'), {
      enter: (node: ASTNode, path: readonly ASTNode[]) => {
        if (node.type === 'Plugin') {
          paths.push(path.map((ancestor) => ancestor.type).join('/'));
        }
      },
    });
    expect(paths).toEqual(['Document/Section']);
  });
});

describe('countNodes', () => {
  it('counts the root and every descendant', () => {
    // Plugin, Attribute, Bareword name, Array, two StringLiterals
    expect(countNodes(parseFragment('mutate { tags => ["a", "b"] }', 'Plugin'))).toBe(6);
  });
});
