/**
 * Canonical tree to AST.
 *
 * Accepts the tagged shape produced by toTree() plus plain JSON values:
 * strings become barewords when they fit the bareword grammar (otherwise,
 * and for "true" and "false", strings), numbers and booleans become
 * literals, lists become arrays and untagged objects become maps. A `hash`
 * body is either an object or an ordered list of `hash_entry` nodes.
 * Operands are wrapped in RValue nodes the way the parser wraps them. Nodes
 * carry no spans.
 */

import {
  BOOLEAN_OPERATORS,
  COMPARE_OPERATORS,
  REGEX_OPERATORS,
  SECTION_TYPES,
  type ArrayNode,
  type ASTNode,
  type AttributeNode,
  type BlockItemNode,
  type ClauseNode,
  type ConditionNode,
  type MapEntryNode,
  type MapKeyNode,
  type MapNode,
  type NameNode,
  type NodeOfType,
  type NodeType,
  type NumberLiteralNode,
  type OperandNode,
  type RegexLiteralNode,
  type RValueTarget,
  type SectionNode,
  type StringLiteralNode,
  type ValueNode,
} from '../ast-nodes.js';
import { createNodeBuilder, type NodeBuilder } from '../ast/builder.js';
import { LiteralDecodeError, TreeShapeError } from '../error-classes.js';
import {
  BAREWORD_PATTERN,
  NUMBER_PATTERN,
  SELECTOR_PATTERN,
} from '../literals.js';
import { parseFragment } from '../parser/index.js';
import { type TreeTag, isRecord, isTreeTag } from './tags.js';

/** Which node family the top-level tree value must decode to */
export type TreeContext = 'node' | 'value' | 'condition' | 'attribute';

/**
 * Build an AST from a canonical tree.
 *
 * @throws TreeShapeError with the path of the offending value
 *
 * @example
 * fromTree({ plugin: { plugin_name: 'stdout', attributes: [] } })
 * // PluginNode named "stdout"
 */
export function fromTree(tree: unknown, context?: 'node'): ASTNode;
export function fromTree(tree: unknown, context: 'value'): ValueNode;
export function fromTree(tree: unknown, context: 'condition'): ConditionNode;
export function fromTree(tree: unknown, context: 'attribute'): AttributeNode;
export function fromTree(tree: unknown, context: TreeContext = 'node'): ASTNode {
  const decoder = new TreeDecoder(createNodeBuilder());
  switch (context) {
    case 'node':
      return decoder.node(tree, '');
    case 'value':
      return decoder.value(tree, '');
    case 'condition':
      return decoder.condition(tree, '');
    case 'attribute':
      return decoder.attribute(tree, '');
  }
}

// ============================================================
// HELPERS
// ============================================================

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function child(path: string, key: string): string {
  return path === '' ? key : `${path}.${key}`;
}

function item(path: string, index: number): string {
  return `${path}[${index}]`;
}

/** Plain text that reads back as a bareword rather than a boolean */
function isBareword(text: string): boolean {
  return BAREWORD_PATTERN.test(text) && text !== 'true' && text !== 'false';
}

function isOneOf<T extends string>(
  value: unknown,
  options: readonly T[]
): value is T {
  return options.some((option) => option === value);
}

function wrongType(path: string, expected: string, value: unknown): TreeShapeError {
  return new TreeShapeError(
    'LSC-T003',
    { expected, found: describe(value) },
    path
  );
}

function isValueNode(node: ASTNode): node is ValueNode {
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
    case 'MethodCall':
      return true;
    default:
      return false;
  }
}

function isRValueTarget(node: ASTNode): node is RValueTarget {
  switch (node.type) {
    case 'StringLiteral':
    case 'NumberLiteral':
    case 'Selector':
    case 'Array':
    case 'MethodCall':
    case 'RegexLiteral':
      return true;
    default:
      return false;
  }
}

function isConditionNode(node: ASTNode): node is ConditionNode {
  switch (node.type) {
    case 'CompareExpr':
    case 'RegexExpr':
    case 'InExpr':
    case 'NotInExpr':
    case 'NegativeExpr':
    case 'BooleanExpr':
    case 'RValue':
      return true;
    default:
      return false;
  }
}

function isBlockItem(node: ASTNode): node is BlockItemNode {
  return node.type === 'Plugin' || node.type === 'Branch';
}

function isClause(node: ASTNode): node is ClauseNode {
  return node.type === 'If' || node.type === 'ElseIf' || node.type === 'Else';
}

// ============================================================
// DECODER
// ============================================================

class TreeDecoder {
  private readonly build: NodeBuilder;

  constructor(build: NodeBuilder) {
    this.build = build;
  }

  /** Any node: tagged objects, attributes, or plain values */
  node(tree: unknown, path: string): ASTNode {
    if (isRecord(tree)) {
      const keys = Object.keys(tree);
      const [tag] = keys;
      if (keys.length === 1 && tag !== undefined) {
        return isTreeTag(tag)
          ? this.tagged(tag, tree[tag], path)
          : this.attribute(tree, path);
      }
      return this.untaggedMap(tree, path);
    }
    return this.value(tree, path);
  }

  value(tree: unknown, path: string): ValueNode {
    if (Array.isArray(tree)) {
      return this.array(tree, path);
    }
    if (isRecord(tree)) {
      const tagged = this.taggedOrNull(tree, path);
      if (tagged === null) {
        return this.untaggedMap(tree, path);
      }
      if (isValueNode(tagged.node)) {
        return tagged.node;
      }
      throw this.unexpectedTag(tagged.tag, 'a value', path);
    }
    if (typeof tree === 'string') {
      return isBareword(tree)
        ? this.build.bareword(tree)
        : this.build.stringValue(tree);
    }
    if (typeof tree === 'number') {
      return this.number(tree, path);
    }
    if (typeof tree === 'boolean') {
      return this.build.boolean(tree);
    }
    throw wrongType(path, 'a tree value', tree);
  }

  /** Plain strings in condition position are read as condition text */
  condition(tree: unknown, path: string): ConditionNode {
    if (typeof tree === 'string') {
      try {
        return parseFragment(tree, 'Condition', { builder: this.build });
      } catch (err) {
        throw new TreeShapeError(
          'LSC-T003',
          { expected: 'condition text', found: JSON.stringify(tree) },
          path,
          { cause: err }
        );
      }
    }
    if (isRecord(tree)) {
      const tagged = this.taggedOrNull(tree, path);
      if (tagged !== null) {
        if (isConditionNode(tagged.node)) {
          return tagged.node;
        }
        if (isRValueTarget(tagged.node)) {
          return this.build.rvalue(tagged.node);
        }
        throw this.unexpectedTag(tagged.tag, 'a condition', path);
      }
    }
    return this.operand(tree, path);
  }

  /** Operands: selectors, strings, numbers, arrays, method calls, regexes */
  operand(tree: unknown, path: string): OperandNode {
    if (typeof tree === 'string') {
      const target = SELECTOR_PATTERN.test(tree)
        ? this.build.selector(tree)
        : this.build.stringValue(tree);
      return this.build.rvalue(target);
    }
    if (typeof tree === 'number') {
      return this.build.rvalue(this.number(tree, path));
    }
    if (Array.isArray(tree)) {
      return this.build.rvalue(this.array(tree, path));
    }
    if (isRecord(tree)) {
      const tagged = this.taggedOrNull(tree, path);
      if (tagged !== null) {
        if (isRValueTarget(tagged.node)) {
          return this.build.rvalue(tagged.node);
        }
        throw this.unexpectedTag(tagged.tag, 'an operand', path);
      }
    }
    throw wrongType(path, 'an operand', tree);
  }

  /** Single-key object from attribute name to value */
  attribute(tree: unknown, path: string): AttributeNode {
    if (!isRecord(tree)) {
      throw wrongType(path, 'an attribute object', tree);
    }
    const entries = Object.entries(tree);
    const [entry] = entries;
    if (entries.length !== 1 || entry === undefined) {
      throw new TreeShapeError('LSC-T005', { count: entries.length }, path);
    }
    const [name, value] = entry;
    return this.build.attribute(
      this.name(name, path),
      this.value(value, child(path, name))
    );
  }

  // ============================================================
  // TAGGED NODES
  // ============================================================

  private tagged(tag: TreeTag, body: unknown, parent: string): ASTNode {
    const path = child(parent, tag);
    switch (tag) {
      case 'ls_string': {
        const lexeme = this.expectString(body, path);
        return this.literal(() => this.build.string(lexeme), path, 'a quoted string lexeme', lexeme);
      }
      case 'ls_bare_word': {
        const word = this.expectString(body, path);
        return this.literal(() => this.build.bareword(word), path, 'a bareword', word);
      }
      case 'number':
        if (typeof body === 'string' && NUMBER_PATTERN.test(body)) {
          return this.build.number(body);
        }
        if (typeof body === 'number') {
          return this.number(body, path);
        }
        throw wrongType(path, 'a number', body);
      case 'boolean':
        if (typeof body !== 'boolean') {
          throw wrongType(path, 'a boolean', body);
        }
        return this.build.boolean(body);
      case 'regexp':
        return this.build.regex(this.expectString(body, path));
      case 'selector_node': {
        const raw = this.expectString(body, path);
        return this.literal(() => this.build.selector(raw), path, 'a selector', raw);
      }

      case 'array':
        return this.array(this.expectList(body, path), path);
      case 'hash':
        return Array.isArray(body)
          ? this.build.map(body.map((entry, i) => this.hashEntry(entry, item(path, i))))
          : this.map(this.expectRecord(body, path), path);
      case 'hash_entry': {
        const fields = this.fields(body, tag, path, ['key', 'value']);
        const key = this.expectString(this.field(fields, 'key', tag, path), child(path, 'key'));
        return this.build.mapEntry(
          this.mapKey(key, path),
          this.value(this.field(fields, 'value', tag, path), child(path, 'value'))
        );
      }
      case 'plugin': {
        const fields = this.fields(body, tag, path, ['plugin_name', 'attributes']);
        const name = this.expectString(
          this.field(fields, 'plugin_name', tag, path),
          child(path, 'plugin_name')
        );
        const attrPath = child(path, 'attributes');
        const attributes = this.optionalList(fields, 'attributes', path).map(
          (entry, i) => this.attribute(entry, item(attrPath, i))
        );
        return this.literal(() => this.build.plugin(name, attributes), path, 'a plugin name', name);
      }
      case 'method_call': {
        const fields = this.fields(body, tag, path, ['method_name', 'arguments']);
        const name = this.expectString(
          this.field(fields, 'method_name', tag, path),
          child(path, 'method_name')
        );
        const argPath = child(path, 'arguments');
        const args = this.optionalList(fields, 'arguments', path).map((arg, i) =>
          this.operand(arg, item(argPath, i))
        );
        return this.literal(() => this.build.methodCall(name, args), path, 'a method name', name);
      }

      case 'compare_expression': {
        const fields = this.fields(body, tag, path, ['left', 'operator', 'right']);
        const operator = this.field(fields, 'operator', tag, path);
        if (!isOneOf(operator, COMPARE_OPERATORS)) {
          throw this.invalidOperator(operator, tag, path);
        }
        return this.build.compare(
          this.operand(this.field(fields, 'left', tag, path), child(path, 'left')),
          operator,
          this.operand(this.field(fields, 'right', tag, path), child(path, 'right'))
        );
      }
      case 'regex_expression': {
        const fields = this.fields(body, tag, path, ['left', 'operator', 'pattern']);
        const operator = this.field(fields, 'operator', tag, path);
        if (!isOneOf(operator, REGEX_OPERATORS)) {
          throw this.invalidOperator(operator, tag, path);
        }
        return this.build.regexMatch(
          this.operand(this.field(fields, 'left', tag, path), child(path, 'left')),
          operator,
          this.pattern(this.field(fields, 'pattern', tag, path), child(path, 'pattern'))
        );
      }
      case 'in_expression':
      case 'not_in_expression': {
        const fields = this.fields(body, tag, path, ['value', 'operator', 'collection']);
        const expected = tag === 'in_expression' ? 'in' : 'not in';
        const operator = fields['operator'];
        if (operator !== undefined && operator !== expected) {
          throw this.invalidOperator(operator, tag, path);
        }
        const value = this.operand(this.field(fields, 'value', tag, path), child(path, 'value'));
        const collection = this.operand(
          this.field(fields, 'collection', tag, path),
          child(path, 'collection')
        );
        return tag === 'in_expression'
          ? this.build.inExpr(value, collection)
          : this.build.notInExpr(value, collection);
      }
      case 'negative_expression': {
        const fields = this.fields(body, tag, path, ['operator', 'expression']);
        const operator = fields['operator'];
        if (operator !== undefined && operator !== '!') {
          throw this.invalidOperator(operator, tag, path);
        }
        return this.build.negate(
          this.condition(this.field(fields, 'expression', tag, path), child(path, 'expression'))
        );
      }
      case 'boolean_expression': {
        const fields = this.fields(body, tag, path, ['left', 'operator', 'right']);
        const operator = this.field(fields, 'operator', tag, path);
        if (!isOneOf(operator, BOOLEAN_OPERATORS)) {
          throw this.invalidOperator(operator, tag, path);
        }
        return this.build.booleanExpr(
          this.condition(this.field(fields, 'left', tag, path), child(path, 'left')),
          operator,
          this.condition(this.field(fields, 'right', tag, path), child(path, 'right'))
        );
      }

      case 'if_condition':
      case 'else_if_condition': {
        const fields = this.fields(body, tag, path, ['expr', 'body']);
        const condition = this.condition(
          this.field(fields, 'expr', tag, path),
          child(path, 'expr')
        );
        const items = this.blockItems(this.optionalList(fields, 'body', path), child(path, 'body'));
        return tag === 'if_condition'
          ? this.build.ifClause(condition, items)
          : this.build.elseIfClause(condition, items);
      }
      case 'else_condition':
        return this.build.elseClause(this.blockItems(this.expectList(body, path), path));

      case 'branch': {
        const clauses = this.expectList(body, path).map((entry, i) =>
          this.clause(entry, item(path, i))
        );
        try {
          return this.build.branch(clauses);
        } catch (err) {
          if (err instanceof TreeShapeError) {
            throw new TreeShapeError(err.errorId, err.context ?? {}, path);
          }
          throw err;
        }
      }
      case 'plugin_section':
        return this.section(body, path);
      case 'config': {
        const sections = this.expectList(body, path).map((entry, i) =>
          this.sectionNode(entry, item(path, i))
        );
        return this.build.document(sections);
      }
    }
  }

  private taggedOrNull(
    tree: Record<string, unknown>,
    path: string
  ): { tag: string; node: ASTNode } | null {
    const keys = Object.keys(tree);
    const [tag] = keys;
    if (keys.length !== 1 || tag === undefined || !isTreeTag(tag)) {
      return null;
    }
    return { tag, node: this.tagged(tag, tree[tag], path) };
  }

  private expectTagged(tree: unknown, path: string, expected: string): ASTNode {
    if (!isRecord(tree)) {
      throw wrongType(path, expected, tree);
    }
    const keys = Object.keys(tree);
    const [tag] = keys;
    if (keys.length !== 1 || tag === undefined) {
      throw wrongType(path, `a single-key tagged object for ${expected}`, tree);
    }
    if (!isTreeTag(tag)) {
      throw this.unexpectedTag(tag, expected, path);
    }
    return this.tagged(tag, tree[tag], path);
  }

  // ============================================================
  // COMPOSITES
  // ============================================================

  private number(value: number, path: string): NumberLiteralNode {
    return this.literal(() => this.build.numberValue(value), path, 'a finite number', value);
  }

  private array(items: unknown[], path: string): ArrayNode {
    return this.build.array(items.map((entry, i) => this.value(entry, item(path, i))));
  }

  private hashEntry(tree: unknown, path: string): MapEntryNode {
    const node = this.expectTagged(tree, path, 'a hash entry');
    if (node.type !== 'MapEntry') {
      throw this.unexpectedTag(describeTag(tree), 'a hash entry', path);
    }
    return node;
  }

  /** A tag key beside other keys is a malformed node, not a map */
  private untaggedMap(tree: Record<string, unknown>, path: string): MapNode {
    const keys = Object.keys(tree);
    const tag = keys.find(isTreeTag);
    const extra = keys.find((key) => key !== tag);
    if (tag !== undefined && extra !== undefined) {
      throw new TreeShapeError('LSC-T007', { field: extra, tag }, path);
    }
    return this.map(tree, path);
  }

  private map(tree: Record<string, unknown>, path: string): MapNode {
    return this.build.map(
      Object.entries(tree).map(([key, value]) =>
        this.build.mapEntry(this.mapKey(key, path), this.value(value, child(path, key)))
      )
    );
  }

  /** Keys are their rendered text: quoted strings, numbers, barewords */
  private mapKey(key: string, path: string): MapKeyNode {
    if (key.startsWith('"') || key.startsWith("'")) {
      return this.quoted(key, path);
    }
    if (NUMBER_PATTERN.test(key)) {
      return this.build.number(key);
    }
    return isBareword(key)
      ? this.build.bareword(key)
      : this.build.stringValue(key);
  }

  private name(key: string, path: string): NameNode | string {
    if (key.startsWith('"') || key.startsWith("'")) {
      return this.quoted(key, path);
    }
    return key;
  }

  private quoted(text: string, path: string): StringLiteralNode {
    return this.fragment(text, 'StringLiteral', path, 'a quoted string key');
  }

  private pattern(
    tree: unknown,
    path: string
  ): StringLiteralNode | RegexLiteralNode {
    if (typeof tree === 'string') {
      return tree.length >= 2 && tree.startsWith('/') && tree.endsWith('/')
        ? this.build.regex(tree)
        : this.build.stringValue(tree);
    }
    const node = this.expectTagged(tree, path, 'a regex pattern');
    if (node.type === 'StringLiteral' || node.type === 'RegexLiteral') {
      return node;
    }
    throw this.unexpectedTag(describeTag(tree), 'a regex pattern', path);
  }

  // ============================================================
  // STRUCTURE
  // ============================================================

  private blockItems(items: unknown[], path: string): BlockItemNode[] {
    return items.map((entry, i) => {
      const itemPath = item(path, i);
      const node = this.expectTagged(entry, itemPath, 'a plugin or branch');
      if (!isBlockItem(node)) {
        throw this.unexpectedTag(describeTag(entry), 'a plugin or branch', itemPath);
      }
      return node;
    });
  }

  private clause(tree: unknown, path: string): ClauseNode {
    const node = this.expectTagged(tree, path, 'a branch clause');
    if (!isClause(node)) {
      throw this.unexpectedTag(describeTag(tree), 'a branch clause', path);
    }
    return node;
  }

  private sectionNode(tree: unknown, path: string): SectionNode {
    const node = this.expectTagged(tree, path, 'a plugin section');
    if (node.type !== 'Section') {
      throw this.unexpectedTag(describeTag(tree), 'a plugin section', path);
    }
    return node;
  }

  private section(body: unknown, path: string): SectionNode {
    const fields = this.expectRecord(body, path);
    const entries = Object.entries(fields);
    const [entry] = entries;
    if (entries.length !== 1 || entry === undefined) {
      throw wrongType(path, 'an object with one section type key', body);
    }
    const [sectionType, items] = entry;
    if (!isOneOf(sectionType, SECTION_TYPES)) {
      throw new TreeShapeError(
        'LSC-T003',
        { expected: `one of ${SECTION_TYPES.join(', ')}`, found: sectionType },
        path
      );
    }
    const itemPath = child(path, sectionType);
    return this.build.section(
      sectionType,
      this.blockItems(this.expectList(items, itemPath), itemPath)
    );
  }

  // ============================================================
  // FIELD ACCESS
  // ============================================================

  /** Object body of a tagged node, holding no keys beyond `allowed` */
  private fields(
    body: unknown,
    tag: TreeTag,
    path: string,
    allowed: readonly string[]
  ): Record<string, unknown> {
    const fields = this.expectRecord(body, path);
    const extra = Object.keys(fields).find((key) => !allowed.includes(key));
    if (extra !== undefined) {
      throw new TreeShapeError('LSC-T007', { field: extra, tag }, path);
    }
    return fields;
  }

  private field(
    fields: Record<string, unknown>,
    name: string,
    tag: string,
    path: string
  ): unknown {
    const value = fields[name];
    if (value === undefined) {
      throw new TreeShapeError('LSC-T002', { tag, field: name }, path);
    }
    return value;
  }

  private optionalList(
    fields: Record<string, unknown>,
    name: string,
    path: string
  ): unknown[] {
    const value = fields[name];
    return value === undefined ? [] : this.expectList(value, child(path, name));
  }

  private expectString(value: unknown, path: string): string {
    if (typeof value !== 'string') {
      throw wrongType(path, 'a string', value);
    }
    return value;
  }

  private expectList(value: unknown, path: string): unknown[] {
    if (!Array.isArray(value)) {
      throw wrongType(path, 'a list', value);
    }
    return value;
  }

  private expectRecord(value: unknown, path: string): Record<string, unknown> {
    if (!isRecord(value)) {
      throw wrongType(path, 'an object', value);
    }
    return value;
  }

  // ============================================================
  // ERRORS
  // ============================================================

  /** Run a builder call, reporting rejected literals at the tree path */
  private literal<T>(make: () => T, path: string, expected: string, found: unknown): T {
    try {
      return make();
    } catch (err) {
      if (err instanceof LiteralDecodeError) {
        throw new TreeShapeError(
          'LSC-T003',
          { expected, found: JSON.stringify(found) },
          path,
          { cause: err }
        );
      }
      throw err;
    }
  }

  private fragment<K extends NodeType>(
    text: string,
    kind: K,
    path: string,
    expected: string
  ): NodeOfType<K> {
    try {
      return parseFragment(text, kind, { builder: this.build });
    } catch (err) {
      throw new TreeShapeError(
        'LSC-T003',
        { expected, found: JSON.stringify(text) },
        path,
        { cause: err }
      );
    }
  }

  private unexpectedTag(tag: string, expected: string, path: string): TreeShapeError {
    return new TreeShapeError('LSC-T001', { tag, expected }, path);
  }

  private invalidOperator(operator: unknown, tag: string, path: string): TreeShapeError {
    return new TreeShapeError(
      'LSC-T006',
      { operator: typeof operator === 'string' ? operator : describe(operator), tag },
      path
    );
  }
}

function describeTag(tree: unknown): string {
  if (isRecord(tree)) {
    const [tag] = Object.keys(tree);
    if (tag !== undefined) return tag;
  }
  return describe(tree);
}
