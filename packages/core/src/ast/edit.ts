/**
 * Structural Edits
 * Append/remove helpers for programmatic construction. Each returns a new
 * node with the same id; the input node is left untouched.
 */

import type {
  ArrayNode,
  AttributeNode,
  BlockItemNode,
  DocumentNode,
  ElseIfNode,
  ElseNode,
  IfNode,
  MapEntryNode,
  MapNode,
  PluginNode,
  SectionNode,
  ValueNode,
} from '../ast-nodes.js';

type BlockContainer = SectionNode | IfNode | ElseIfNode | ElseNode;

function without<T>(items: readonly T[], index: number): T[] {
  if (!Number.isInteger(index) || index < 0 || index >= items.length) {
    throw new RangeError(
      `Index ${index} out of range for ${items.length} children`
    );
  }
  return [...items.slice(0, index), ...items.slice(index + 1)];
}

// ============================================================
// DOCUMENT AND SECTIONS
// ============================================================

export function appendSection(
  document: DocumentNode,
  section: SectionNode
): DocumentNode {
  return { ...document, sections: [...document.sections, section] };
}

export function removeSection(
  document: DocumentNode,
  index: number
): DocumentNode {
  return { ...document, sections: without(document.sections, index) };
}

// ============================================================
// BLOCK BODIES
// ============================================================

/** Append a plugin or branch to a section or clause body */
export function appendItem(container: SectionNode, item: BlockItemNode): SectionNode;
export function appendItem(container: IfNode, item: BlockItemNode): IfNode;
export function appendItem(container: ElseIfNode, item: BlockItemNode): ElseIfNode;
export function appendItem(container: ElseNode, item: BlockItemNode): ElseNode;
export function appendItem(
  container: BlockContainer,
  item: BlockItemNode
): BlockContainer {
  if (container.type === 'Section') {
    return { ...container, items: [...container.items, item] };
  }
  return { ...container, body: [...container.body, item] };
}

/** Remove the body item at `index` */
export function removeItem(container: SectionNode, index: number): SectionNode;
export function removeItem(container: IfNode, index: number): IfNode;
export function removeItem(container: ElseIfNode, index: number): ElseIfNode;
export function removeItem(container: ElseNode, index: number): ElseNode;
export function removeItem(
  container: BlockContainer,
  index: number
): BlockContainer {
  if (container.type === 'Section') {
    return { ...container, items: without(container.items, index) };
  }
  return { ...container, body: without(container.body, index) };
}

// ============================================================
// PLUGINS AND VALUES
// ============================================================

export function appendAttribute(
  plugin: PluginNode,
  attribute: AttributeNode
): PluginNode {
  return { ...plugin, attributes: [...plugin.attributes, attribute] };
}

/** Remove every attribute whose name decodes to `name` */
export function removeAttribute(plugin: PluginNode, name: string): PluginNode {
  return {
    ...plugin,
    attributes: plugin.attributes.filter((attr) => attr.name.value !== name),
  };
}

export function appendElement(array: ArrayNode, element: ValueNode): ArrayNode {
  return { ...array, elements: [...array.elements, element] };
}

export function removeElement(array: ArrayNode, index: number): ArrayNode {
  return { ...array, elements: without(array.elements, index) };
}

export function appendEntry(map: MapNode, entry: MapEntryNode): MapNode {
  return { ...map, entries: [...map.entries, entry] };
}

export function removeEntry(map: MapNode, index: number): MapNode {
  return { ...map, entries: without(map.entries, index) };
}
