/**
 * Unparser
 * Renders any node back to configuration text that re-parses to the same
 * values. Blocks open on the line of their header and close on their own
 * line at the enclosing indent.
 */

import type {
  ASTNode,
  AttributeNode,
  BlockItemNode,
  BranchNode,
  ElseIfNode,
  ElseNode,
  IfNode,
  MapNode,
  PluginNode,
  SectionNode,
  ValueNode,
} from '../ast-nodes.js';
import {
  formatCondition,
  formatInlineValue,
  formatLiteral,
  formatPluginName,
} from './render-expr.js';

export interface RenderOptions {
  /** Spaces per nesting level (default 2) */
  readonly indentWidth?: number | undefined;
  /** Nesting level of the rendered node itself (default 0) */
  readonly level?: number | undefined;
}

interface Layout {
  readonly unit: string;
}

/** Render a node as configuration source */
export function render(node: ASTNode, options: RenderOptions = {}): string {
  const width = options.indentWidth ?? 2;
  if (!Number.isInteger(width) || width < 0) {
    throw new RangeError(`indentWidth must be a non-negative integer, got ${width}`);
  }
  return renderNode(node, { unit: ' '.repeat(width) }, options.level ?? 0);
}

function pad(layout: Layout, level: number): string {
  return layout.unit.repeat(level);
}

function renderNode(node: ASTNode, layout: Layout, level: number): string {
  switch (node.type) {
    case 'StringLiteral':
    case 'Bareword':
    case 'NumberLiteral':
    case 'BoolLiteral':
    case 'RegexLiteral':
    case 'Selector':
    case 'Array':
    case 'Map':
    case 'Plugin':
      return renderValue(node, layout, level);

    case 'MapEntry':
      return `${formatLiteral(node.key, 'source')} => ${renderValue(node.value, layout, level)}`;

    case 'Attribute':
      return renderAttribute(node, layout, level);

    case 'CompareExpr':
    case 'RegexExpr':
    case 'InExpr':
    case 'NotInExpr':
    case 'NegativeExpr':
    case 'BooleanExpr':
    case 'MethodCall':
    case 'RValue':
      return formatCondition(node, 'source');

    case 'If':
    case 'ElseIf':
    case 'Else':
      return renderClause(node, layout, level);

    case 'Branch':
      return renderBranch(node, layout, level);

    case 'Section':
      return renderSection(node, layout, level);

    case 'Document':
      // Sections are separated by one blank line; output ends with one newline
      return `${node.sections
        .map((section) => pad(layout, level) + renderSection(section, layout, level))
        .join('\n\n')}\n`;

    default: {
      const exhaustive: never = node;
      throw new Error(`Unhandled node type in render: ${String(exhaustive)}`);
    }
  }
}

// ============================================================
// VALUES
// ============================================================

function renderValue(node: ValueNode, layout: Layout, level: number): string {
  switch (node.type) {
    case 'Array':
      return `[${node.elements.map((el) => renderValue(el, layout, level)).join(', ')}]`;
    case 'Map':
      return renderMap(node, layout, level);
    case 'Plugin':
      return renderPlugin(node, layout, level);
    default:
      return formatInlineValue(node, 'source');
  }
}

function renderMap(node: MapNode, layout: Layout, level: number): string {
  if (node.entries.length === 0) {
    return '{}';
  }
  const inner = pad(layout, level + 1);
  const entries = node.entries.map(
    (entry) =>
      `${inner}${formatLiteral(entry.key, 'source')} => ${renderValue(entry.value, layout, level + 1)}\n`
  );
  return `{\n${entries.join('')}${pad(layout, level)}}`;
}

function renderAttribute(node: AttributeNode, layout: Layout, level: number): string {
  return `${formatLiteral(node.name, 'source')} => ${renderValue(node.value, layout, level)}`;
}

function renderPlugin(node: PluginNode, layout: Layout, level: number): string {
  const inner = pad(layout, level + 1);
  const attributes = node.attributes.map(
    (attr) => `${inner}${renderAttribute(attr, layout, level + 1)}\n`
  );
  return `${formatPluginName(node.name)} {\n${attributes.join('')}${pad(layout, level)}}`;
}

// ============================================================
// BLOCKS
// ============================================================

function renderItem(node: BlockItemNode, layout: Layout, level: number): string {
  return node.type === 'Plugin'
    ? renderPlugin(node, layout, level)
    : renderBranch(node, layout, level);
}

/** `{` body `}` where the opening brace ends the caller's line */
function renderBody(
  items: BlockItemNode[],
  layout: Layout,
  level: number,
  separator: string
): string {
  const inner = pad(layout, level + 1);
  const body = items
    .map((item) => `${inner}${renderItem(item, layout, level + 1)}`)
    .join(separator);
  return items.length === 0 ? `{\n${pad(layout, level)}}` : `{\n${body}\n${pad(layout, level)}}`;
}

function renderClause(
  node: IfNode | ElseIfNode | ElseNode,
  layout: Layout,
  level: number
): string {
  const body = renderBody(node.body, layout, level, '\n');
  switch (node.type) {
    case 'If':
      return `if ${formatCondition(node.condition, 'source')} ${body}`;
    case 'ElseIf':
      return `else if ${formatCondition(node.condition, 'source')} ${body}`;
    case 'Else':
      return `else ${body}`;
  }
}

function renderBranch(node: BranchNode, layout: Layout, level: number): string {
  let text = renderClause(node.ifClause, layout, level);
  for (const clause of node.elseIfClauses) {
    text += ` ${renderClause(clause, layout, level)}`;
  }
  if (node.elseClause) {
    text += ` ${renderClause(node.elseClause, layout, level)}`;
  }
  return text;
}

function renderSection(node: SectionNode, layout: Layout, level: number): string {
  return `${node.sectionType} ${renderBody(node.items, layout, level, '\n\n')}`;
}
