/**
 * Control Flow Parsing
 * if / else if / else chains and the block bodies they guard.
 * @internal
 */

import {
  type Parser,
  choice,
  coroutine,
  many,
  possibly,
  recursiveParser,
} from 'arcsecond';
import type {
  BlockItemNode,
  BranchNode,
  ElseIfNode,
  ElseNode,
  IfNode,
} from '../ast-nodes.js';
import type { ParseContext } from './state.js';
import type { ValueRules } from './parser-values.js';
import type { ExpressionRules } from './parser-expr.js';
import { cs, delimited, keyword, position } from './helpers.js';

/** @internal */
export interface ControlRules {
  readonly blockItem: Parser<BlockItemNode>;
  /** { (plugin|branch)* } */
  readonly block: Parser<BlockItemNode[]>;
  readonly ifClause: Parser<IfNode>;
  readonly elseIfClause: Parser<ElseIfNode>;
  readonly elseClause: Parser<ElseNode>;
  readonly branch: Parser<BranchNode>;
}

/**
 * Build control-flow rules.
 * @internal
 */
export function createControlRules(
  ctx: ParseContext,
  values: ValueRules,
  expr: ExpressionRules
): ControlRules {
  const { build } = ctx;

  const blockItem: Parser<BlockItemNode> = recursiveParser(() =>
    choice([branch, values.plugin])
  );

  const block: Parser<BlockItemNode[]> = delimited('{', blockItem, null, '}');

  const ifClause: Parser<IfNode> = coroutine((run) => {
    const start = run(position);
    run(keyword('if'));
    run(cs);
    const condition = run(expr.condition);
    run(cs);
    const body = run(block);
    return build.ifClause(condition, body, ctx.span(start, run(position)));
  });

  const elseIfClause: Parser<ElseIfNode> = coroutine((run) => {
    const start = run(position);
    run(keyword('else'));
    run(cs);
    run(keyword('if'));
    run(cs);
    const condition = run(expr.condition);
    run(cs);
    const body = run(block);
    return build.elseIfClause(condition, body, ctx.span(start, run(position)));
  });

  const elseClause: Parser<ElseNode> = coroutine((run) => {
    const start = run(position);
    run(keyword('else'));
    run(cs);
    const body = run(block);
    return build.elseClause(body, ctx.span(start, run(position)));
  });

  const branch: Parser<BranchNode> = coroutine((run) => {
    const start = run(position);
    const first = run(ifClause);
    const middle = run(
      many(
        coroutine((r) => {
          r(cs);
          return r(elseIfClause);
        })
      )
    );
    const last = run(
      possibly(
        coroutine((r) => {
          r(cs);
          return r(elseClause);
        })
      )
    );
    const clauses = last === null ? [first, ...middle] : [first, ...middle, last];
    return build.branch(clauses, ctx.span(start, run(position)));
  });

  return { blockItem, block, ifClause, elseIfClause, elseClause, branch };
}
