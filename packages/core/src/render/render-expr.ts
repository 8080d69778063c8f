/**
 * Expression Rendering
 * Single-line text for literals, operands and conditions. The same code
 * serves source output and expression-context values, differing only in
 * how literals are spelled.
 */

import type {
  ConditionNode,
  LiteralNode,
  MethodCallNode,
  OperandNode,
  PluginNode,
  ValueNode,
} from '../ast-nodes.js';
import { NAME_PATTERN, encodeString, formatNumber } from '../literals.js';
import { isBareNegationOperand, needsParens } from './precedence.js';

/**
 * - 'source': original lexemes where known (strings keep their quotes)
 * - 'canonical': spelling derived from decoded values, strings double-quoted
 */
export type LiteralStyle = 'source' | 'canonical';

// ============================================================
// LITERALS
// ============================================================

export function formatLiteral(node: LiteralNode, style: LiteralStyle): string {
  switch (node.type) {
    case 'StringLiteral':
      return style === 'source' ? node.lexeme : encodeString(node.value, '"');
    case 'Bareword':
      return node.value;
    case 'NumberLiteral':
      return style === 'source' && node.lexeme !== null
        ? node.lexeme
        : formatNumber(node.value, node.kind);
    case 'BoolLiteral':
      return node.value ? 'true' : 'false';
    case 'RegexLiteral':
      return `/${node.pattern}/`;
    case 'Selector':
      return node.raw;
  }
}

/** Plugin names render bare when the name grammar allows it */
export function formatPluginName(name: string): string {
  return NAME_PATTERN.test(name) ? name : encodeString(name, '"');
}

// ============================================================
// INLINE VALUES
// ============================================================

/** A value on one line, as it appears inside an expression */
export function formatInlineValue(node: ValueNode, style: LiteralStyle): string {
  switch (node.type) {
    case 'Array':
      return `[${node.elements.map((el) => formatInlineValue(el, style)).join(', ')}]`;
    case 'Map':
      if (node.entries.length === 0) {
        return '{}';
      }
      return `{ ${node.entries
        .map(
          (entry) =>
            `${formatLiteral(entry.key, style)} => ${formatInlineValue(entry.value, style)}`
        )
        .join(' ')} }`;
    case 'Plugin':
      return formatInlinePlugin(node, style);
    case 'MethodCall':
      return formatMethodCall(node, style);
    default:
      return formatLiteral(node, style);
  }
}

function formatInlinePlugin(node: PluginNode, style: LiteralStyle): string {
  const name = formatPluginName(node.name);
  if (node.attributes.length === 0) {
    return `${name} {}`;
  }
  const attributes = node.attributes
    .map(
      (attr) =>
        `${formatLiteral(attr.name, style)} => ${formatInlineValue(attr.value, style)}`
    )
    .join(' ');
  return `${name} { ${attributes} }`;
}

function formatMethodCall(node: MethodCallNode, style: LiteralStyle): string {
  const args = node.args.map((arg) => formatOperand(arg, style));
  return `${node.name}(${args.join(', ')})`;
}

function formatOperand(node: OperandNode, style: LiteralStyle): string {
  return formatInlineValue(node.type === 'RValue' ? node.value : node, style);
}

// ============================================================
// CONDITIONS
// ============================================================

/**
 * Render a condition with the minimum parentheses that re-read to the same
 * tree. The outermost expression is never wrapped.
 */
export function formatCondition(node: ConditionNode, style: LiteralStyle): string {
  switch (node.type) {
    case 'CompareExpr':
      return `${formatOperand(node.left, style)} ${node.operator} ${formatOperand(node.right, style)}`;

    case 'RegexExpr':
      return `${formatOperand(node.left, style)} ${node.operator} ${formatLiteral(node.pattern, style)}`;

    case 'InExpr':
      return `${formatOperand(node.value, style)} in ${formatOperand(node.collection, style)}`;

    case 'NotInExpr':
      return `${formatOperand(node.value, style)} not in ${formatOperand(node.collection, style)}`;

    case 'NegativeExpr': {
      const inner = formatCondition(node.expression, style);
      return isBareNegationOperand(node.expression) ? `!${inner}` : `!(${inner})`;
    }

    case 'BooleanExpr': {
      const wrap = (child: ConditionNode, side: 'left' | 'right'): string => {
        const text = formatCondition(child, style);
        return needsParens(node.operator, child, side) ? `(${text})` : text;
      };
      return `${wrap(node.left, 'left')} ${node.operator} ${wrap(node.right, 'right')}`;
    }

    default:
      return formatOperand(node, style);
  }
}
