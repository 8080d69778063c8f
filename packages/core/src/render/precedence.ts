/**
 * Operator Precedence
 * Shared by the condition parser (folding) and the unparser (parentheses).
 */

import type { BooleanOperator, ConditionNode } from '../ast-nodes.js';

/**
 * Binding strength of boolean operators; higher binds tighter.
 * and, xor and nand share one tier above or.
 */
export const BOOLEAN_PRECEDENCE: Readonly<Record<BooleanOperator, number>> = {
  or: 1,
  and: 2,
  xor: 2,
  nand: 2,
};

/** Operators where (a op b) op c equals a op (b op c) */
const ASSOCIATIVE: ReadonlySet<BooleanOperator> = new Set(['and', 'or', 'xor']);

/**
 * Whether an operand of `parent` needs parentheses to re-read with the
 * same grouping.
 *
 * Left operands: only a looser-binding combination.
 * Right operands: a looser-binding combination, or one on the same tier
 * unless it repeats an associative operator (a and b and c stays flat).
 */
export function needsParens(
  parent: BooleanOperator,
  child: ConditionNode,
  side: 'left' | 'right'
): boolean {
  if (child.type !== 'BooleanExpr') {
    return false;
  }
  const parentRank = BOOLEAN_PRECEDENCE[parent];
  const childRank = BOOLEAN_PRECEDENCE[child.operator];
  if (childRank < parentRank) {
    return true;
  }
  if (side === 'left' || childRank > parentRank) {
    return false;
  }
  return child.operator !== parent || !ASSOCIATIVE.has(parent);
}

/** Negation operands that read back without parentheses */
export function isBareNegationOperand(node: ConditionNode): boolean {
  const target = node.type === 'RValue' ? node.value : node;
  return target.type === 'Selector' || target.type === 'MethodCall';
}
