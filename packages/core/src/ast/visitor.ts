/**
 * AST Visitor
 * Child enumeration and recursive traversal with enter/exit callbacks.
 */

import type { ASTNode } from '../ast-nodes.js';
import { branchClauses } from '../ast-nodes.js';

// ============================================================
// CHILDREN
// ============================================================

/** Owned child nodes in source order */
export function childrenOf(node: ASTNode): ASTNode[] {
  switch (node.type) {
    case 'StringLiteral':
    case 'Bareword':
    case 'NumberLiteral':
    case 'BoolLiteral':
    case 'RegexLiteral':
    case 'Selector':
      return [];

    case 'Array':
      return [...node.elements];

    case 'Map':
      return [...node.entries];

    case 'MapEntry':
      return [node.key, node.value];

    case 'Attribute':
      return [node.name, node.value];

    case 'Plugin':
      return [...node.attributes];

    case 'RValue':
      return [node.value];

    case 'CompareExpr':
      return [node.left, node.right];

    case 'RegexExpr':
      return [node.left, node.pattern];

    case 'InExpr':
    case 'NotInExpr':
      return [node.value, node.collection];

    case 'NegativeExpr':
      return [node.expression];

    case 'BooleanExpr':
      return [node.left, node.right];

    case 'MethodCall':
      return [...node.args];

    case 'If':
    case 'ElseIf':
      return [node.condition, ...node.body];

    case 'Else':
      return [...node.body];

    case 'Branch':
      return branchClauses(node);

    case 'Section':
      return [...node.items];

    case 'Document':
      return [...node.sections];

    default: {
      const exhaustive: never = node;
      throw new Error(`Unhandled node type in visitor: ${String(exhaustive)}`);
    }
  }
}

// ============================================================
// VISITOR
// ============================================================

/**
 * Visitor callbacks. `path` holds the ancestors of `node`, root first;
 * nodes carry no parent links.
 */
export interface NodeVisitor {
  enter?(node: ASTNode, path: readonly ASTNode[]): void;
  exit?(node: ASTNode, path: readonly ASTNode[]): void;
}

/**
 * Recursively visit AST nodes.
 *
 * Traversal order:
 * 1. visitor.enter(node)
 * 2. Recurse into children
 * 3. visitor.exit(node)
 */
export function visitNode(
  node: ASTNode,
  visitor: NodeVisitor,
  path: ASTNode[] = []
): void {
  visitor.enter?.(node, path);

  path.push(node);
  for (const child of childrenOf(node)) {
    visitNode(child, visitor, path);
  }
  path.pop();

  visitor.exit?.(node, path);
}

/** Count nodes in a subtree, the root included */
export function countNodes(node: ASTNode): number {
  let count = 0;
  visitNode(node, {
    enter() {
      count++;
    },
  });
  return count;
}
