/**
 * AST to canonical tree.
 * RValue wrappers are transparent; every other node maps to its tag.
 */

import type {
  ASTNode,
  AttributeNode,
  BlockItemNode,
  MapKeyNode,
  MapNode,
  NumberLiteralNode,
} from '../ast-nodes.js';
import { formatNumber } from '../literals.js';
import { formatLiteral } from '../render/render-expr.js';
import type { TreeObject, TreeValue } from './tags.js';

/** Canonical tagged tree of a node */
export function toTree(node: ASTNode): TreeValue {
  switch (node.type) {
    case 'StringLiteral':
      return { ls_string: node.lexeme };
    case 'Bareword':
      return { ls_bare_word: node.value };
    case 'NumberLiteral':
      return { number: numberTree(node) };
    case 'BoolLiteral':
      return { boolean: node.value };
    case 'RegexLiteral':
      return { regexp: `/${node.pattern}/` };
    case 'Selector':
      return { selector_node: node.raw };

    case 'Array':
      return { array: node.elements.map(toTree) };

    case 'Map':
      return { hash: hashTree(node) };

    case 'MapEntry':
      return { hash_entry: { key: keyText(node.key), value: toTree(node.value) } };

    case 'Attribute':
      return attributeTree(node);

    case 'Plugin':
      return {
        plugin: {
          plugin_name: node.name,
          attributes: node.attributes.map(attributeTree),
        },
      };

    case 'RValue':
      return toTree(node.value);

    case 'CompareExpr':
      return {
        compare_expression: {
          left: toTree(node.left),
          operator: node.operator,
          right: toTree(node.right),
        },
      };

    case 'RegexExpr':
      return {
        regex_expression: {
          left: toTree(node.left),
          operator: node.operator,
          pattern: toTree(node.pattern),
        },
      };

    case 'InExpr':
      return {
        in_expression: {
          value: toTree(node.value),
          operator: 'in',
          collection: toTree(node.collection),
        },
      };

    case 'NotInExpr':
      return {
        not_in_expression: {
          value: toTree(node.value),
          operator: 'not in',
          collection: toTree(node.collection),
        },
      };

    case 'NegativeExpr':
      return {
        negative_expression: { operator: '!', expression: toTree(node.expression) },
      };

    case 'BooleanExpr':
      return {
        boolean_expression: {
          left: toTree(node.left),
          operator: node.operator,
          right: toTree(node.right),
        },
      };

    case 'MethodCall':
      return {
        method_call: { method_name: node.name, arguments: node.args.map(toTree) },
      };

    case 'If':
      return { if_condition: { expr: toTree(node.condition), body: bodyTree(node.body) } };
    case 'ElseIf':
      return {
        else_if_condition: { expr: toTree(node.condition), body: bodyTree(node.body) },
      };
    case 'Else':
      return { else_condition: bodyTree(node.body) };

    case 'Branch':
      return {
        branch: [
          toTree(node.ifClause),
          ...node.elseIfClauses.map(toTree),
          ...(node.elseClause ? [toTree(node.elseClause)] : []),
        ],
      };

    case 'Section':
      return { plugin_section: { [node.sectionType]: bodyTree(node.items) } };

    case 'Document':
      return { config: node.sections.map(toTree) };

    default: {
      const exhaustive: never = node;
      throw new Error(`Unhandled node type in toTree: ${String(exhaustive)}`);
    }
  }
}

/** JSON numbers hold neither the kind of `1.0` nor digits past 2^53 */
function numberTree(node: NumberLiteralNode): number | string {
  const text = node.lexeme ?? formatNumber(node.value, node.kind);
  return String(node.value) === text ? node.value : text;
}

const INDEX_KEY = /^(?:0|[1-9][0-9]*)$/;

/**
 * Object form while key order survives it; otherwise an ordered
 * hash_entry list (objects move integer-like keys first and merge repeats).
 */
function hashTree(node: MapNode): TreeValue {
  const keys = node.entries.map((entry) => keyText(entry.key));
  const ordered =
    new Set(keys).size === keys.length && !keys.some((key) => INDEX_KEY.test(key));
  if (!ordered) {
    return node.entries.map(toTree);
  }
  return Object.fromEntries(
    node.entries.map((entry) => [keyText(entry.key), toTree(entry.value)])
  );
}

/** Strings keep their quoted lexeme so they re-read as strings */
function keyText(key: MapKeyNode): string {
  return formatLiteral(key, 'source');
}

function attributeTree(node: AttributeNode): TreeObject {
  return { [formatLiteral(node.name, 'source')]: toTree(node.value) };
}

function bodyTree(items: BlockItemNode[]): TreeValue[] {
  return items.map(toTree);
}
