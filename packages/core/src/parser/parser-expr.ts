/**
 * Expression Parsing
 * Operands, comparison/regex/membership tails, negation and boolean
 * combination with precedence folding.
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
import {
  BOOLEAN_OPERATORS,
  COMPARE_OPERATORS,
  REGEX_OPERATORS,
  type BooleanOperator,
  type CompareOperator,
  type ConditionNode,
  type MethodCallNode,
  type NegativeExprNode,
  type OperandNode,
  type RegexLiteralNode,
  type RegexOperator,
  type RValueNode,
  type RValueTarget,
  type StringLiteralNode,
} from '../ast-nodes.js';
import { BOOLEAN_PRECEDENCE } from '../render/precedence.js';
import type { ParseContext } from './state.js';
import { joinSpans } from './state.js';
import type { LiteralRules } from './parser-literals.js';
import type { ValueRules } from './parser-values.js';
import {
  cs,
  delimited,
  oneOf,
  operatorWord,
  position,
  symbol,
  token,
} from './helpers.js';

const METHOD_NAME = token(/[A-Za-z_][A-Za-z0-9_]+/, 'a method name');

/** @internal */
export interface ExpressionRules {
  readonly rvalue: Parser<RValueNode>;
  readonly methodCall: Parser<MethodCallNode>;
  readonly negation: Parser<NegativeExprNode>;
  /** A single expression without boolean operators */
  readonly expression: Parser<ConditionNode>;
  /** Expressions joined by and/or/xor/nand */
  readonly condition: Parser<ConditionNode>;
}

/** What follows the left operand of a binary expression */
type OperandTail =
  | { readonly kind: 'in'; readonly collection: OperandNode }
  | { readonly kind: 'not in'; readonly collection: OperandNode }
  | {
      readonly kind: 'compare';
      readonly operator: CompareOperator;
      readonly right: OperandNode;
    }
  | {
      readonly kind: 'regex';
      readonly operator: RegexOperator;
      readonly pattern: StringLiteralNode | RegexLiteralNode;
    };

interface BooleanStep {
  readonly operator: BooleanOperator;
  readonly right: ConditionNode;
}

/**
 * Build expression rules.
 * @internal
 */
export function createExpressionRules(
  ctx: ParseContext,
  lit: LiteralRules,
  values: ValueRules
): ExpressionRules {
  const { build } = ctx;

  const methodCall: Parser<MethodCallNode> = coroutine((run) => {
    const start = run(position);
    const name = run(METHOD_NAME);
    run(cs);
    const args = run(delimited('(', rvalue, ',', ')'));
    return build.methodCall(name, args, ctx.span(start, run(position)));
  });

  // string > number > selector > array > method call > regex
  const rvalueTarget: Parser<RValueTarget> = recursiveParser(() =>
    choice([
      lit.string,
      lit.number,
      lit.selector,
      values.array,
      methodCall,
      lit.regex,
    ])
  );

  const rvalue: Parser<RValueNode> = coroutine((run) => {
    const start = run(position);
    const target = run(rvalueTarget);
    return build.rvalue(target, ctx.span(start, run(position)));
  });

  // ============================================================
  // BINARY TAILS
  // ============================================================

  const inTail: Parser<OperandTail> = coroutine((run) => {
    run(cs);
    run(operatorWord('in'));
    run(cs);
    return { kind: 'in', collection: run(rvalue) };
  });

  const notInTail: Parser<OperandTail> = coroutine((run) => {
    run(cs);
    run(operatorWord('not'));
    run(cs);
    run(operatorWord('in'));
    run(cs);
    return { kind: 'not in', collection: run(rvalue) };
  });

  const compareTail: Parser<OperandTail> = coroutine((run) => {
    run(cs);
    const operator = run(oneOf(COMPARE_OPERATORS));
    run(cs);
    return { kind: 'compare', operator, right: run(rvalue) };
  });

  const regexTail: Parser<OperandTail> = coroutine((run) => {
    run(cs);
    const operator = run(oneOf(REGEX_OPERATORS));
    run(cs);
    const pattern: StringLiteralNode | RegexLiteralNode = run(
      choice([lit.string, lit.regex])
    );
    return { kind: 'regex', operator, pattern };
  });

  // Regex operators share a first character with == and !=, so try them first
  const operandTail: Parser<OperandTail> = choice([
    inTail,
    notInTail,
    regexTail,
    compareTail,
  ]);

  /** rvalue, optionally followed by a comparison/regex/membership tail */
  const operandExpression: Parser<ConditionNode> = coroutine((run) => {
    const start = run(position);
    const left = run(rvalue);
    const tail = run(possibly(operandTail));
    if (tail === null) {
      return left;
    }
    const span = ctx.span(start, run(position));
    switch (tail.kind) {
      case 'in':
        return build.inExpr(left, tail.collection, span);
      case 'not in':
        return build.notInExpr(left, tail.collection, span);
      case 'compare':
        return build.compare(left, tail.operator, tail.right, span);
      case 'regex':
        return build.regexMatch(left, tail.operator, tail.pattern, span);
    }
  });

  // ============================================================
  // PRIMARY EXPRESSIONS
  // ============================================================

  const parenthesized: Parser<ConditionNode> = coroutine((run) => {
    run(symbol('('));
    run(cs);
    const inner = run(condition);
    run(cs);
    run(symbol(')'));
    return inner;
  });

  // ! (condition) | ! selector | ! method call
  const negation: Parser<NegativeExprNode> = coroutine((run) => {
    const start = run(position);
    run(symbol('!'));
    run(cs);
    const operand: ConditionNode = run(
      choice([parenthesized, lit.selector, methodCall])
    );
    return build.negate(operand, ctx.span(start, run(position)));
  });

  const expression: Parser<ConditionNode> = recursiveParser(() =>
    choice([parenthesized, negation, operandExpression])
  );

  // ============================================================
  // BOOLEAN COMBINATION
  // ============================================================

  const booleanStep: Parser<BooleanStep> = coroutine((run) => {
    run(cs);
    const operator = run(oneOf(BOOLEAN_OPERATORS, '(?![A-Za-z0-9_])'));
    run(cs);
    return { operator, right: run(expression) };
  });

  /** Fold a flat operand/operator list by precedence, left-associative */
  function fold(first: ConditionNode, steps: BooleanStep[]): ConditionNode {
    const operands: ConditionNode[] = [first];
    const operators: BooleanOperator[] = [];

    const reduce = (): void => {
      const right = operands.pop();
      const left = operands.pop();
      const operator = operators.pop();
      if (right === undefined || left === undefined || operator === undefined) {
        throw new Error('Unbalanced boolean expression');
      }
      operands.push(
        build.booleanExpr(left, operator, right, joinSpans(left.span, right.span))
      );
    };

    for (const step of steps) {
      while (
        operators.length > 0 &&
        BOOLEAN_PRECEDENCE[operators[operators.length - 1] ?? 'or'] >=
          BOOLEAN_PRECEDENCE[step.operator]
      ) {
        reduce();
      }
      operators.push(step.operator);
      operands.push(step.right);
    }
    while (operators.length > 0) {
      reduce();
    }

    const [result] = operands;
    if (result === undefined) {
      throw new Error('Unbalanced boolean expression');
    }
    return result;
  }

  const condition: Parser<ConditionNode> = recursiveParser(() =>
    coroutine((run) => {
      const first = run(expression);
      const steps = run(many(booleanStep));
      return fold(first, steps);
    })
  );

  return { rvalue, methodCall, negation, expression, condition };
}

