/**
 * Value Projection
 * Decoded, host-native view of a tree. Two trees that mean the same
 * configuration project to deep-equal values.
 */

import type { ASTNode, BlockItemNode, MapKeyNode } from './ast-nodes.js';
import { branchClauses } from './ast-nodes.js';
import { formatCondition } from './render/render-expr.js';

export type PlainValue =
  | string
  | number
  | boolean
  | PlainValue[]
  | { [key: string]: PlainValue };

export interface ValueOptions {
  /**
   * Project as an operand of an expression: strings become their quoted
   * canonical spelling instead of the bare decoded text.
   */
  readonly inExpression?: boolean | undefined;
}

/** Decoded value of a node */
export function toValue(node: ASTNode, options: ValueOptions = {}): PlainValue {
  const inExpression = options.inExpression ?? false;

  switch (node.type) {
    case 'StringLiteral':
      return inExpression ? formatCondition(node, 'canonical') : node.value;
    case 'Bareword':
      return node.value;
    case 'NumberLiteral':
      return node.value;
    case 'BoolLiteral':
      return node.value;
    case 'RegexLiteral':
    case 'Selector':
      return formatCondition(node, 'canonical');

    case 'Array':
      return node.elements.map((el) => toValue(el, options));

    case 'Map':
      return Object.fromEntries(
        node.entries.map((entry) => [mapKey(entry.key), toValue(entry.value, options)])
      );

    case 'MapEntry':
      return { [mapKey(node.key)]: toValue(node.value, options) };

    case 'Attribute':
      return { [node.name.value]: toValue(node.value, options) };

    case 'Plugin':
      return {
        [node.name]: node.attributes.map((attr) => toValue(attr, options)),
      };

    case 'CompareExpr':
    case 'RegexExpr':
    case 'InExpr':
    case 'NotInExpr':
    case 'NegativeExpr':
    case 'BooleanExpr':
    case 'MethodCall':
      return formatCondition(node, 'canonical');

    case 'RValue':
      return toValue(node.value, { inExpression: true });

    case 'If':
      return { if: formatCondition(node.condition, 'canonical'), body: bodyValue(node.body) };
    case 'ElseIf':
      return {
        'else if': formatCondition(node.condition, 'canonical'),
        body: bodyValue(node.body),
      };
    case 'Else':
      return { else: bodyValue(node.body) };

    case 'Branch':
      return { branch: branchClauses(node).map((clause) => toValue(clause)) };

    case 'Section':
      return { [node.sectionType]: bodyValue(node.items) };

    case 'Document':
      return node.sections.map((section) => toValue(section));

    default: {
      const exhaustive: never = node;
      throw new Error(`Unhandled node type in toValue: ${String(exhaustive)}`);
    }
  }
}

function mapKey(key: MapKeyNode): string {
  return key.type === 'NumberLiteral' ? String(key.value) : key.value;
}

function bodyValue(items: BlockItemNode[]): PlainValue[] {
  return items.map((item) => toValue(item));
}
