/**
 * Node Builder
 * Construction functions for every node type, sharing one id sequence.
 */

import type {
  ArrayNode,
  AttributeNode,
  BarewordNode,
  BlockItemNode,
  BooleanExprNode,
  BooleanOperator,
  BoolLiteralNode,
  BranchNode,
  ClauseNode,
  CompareExprNode,
  CompareOperator,
  ConditionNode,
  DocumentNode,
  ElseIfNode,
  ElseNode,
  IfNode,
  InExprNode,
  MapEntryNode,
  MapKeyNode,
  MapNode,
  MethodCallNode,
  NameNode,
  NegativeExprNode,
  NotInExprNode,
  NumberKind,
  NumberLiteralNode,
  OperandNode,
  PluginNode,
  QuoteChar,
  RegexExprNode,
  RegexLiteralNode,
  RegexOperator,
  RValueNode,
  RValueTarget,
  SectionNode,
  SectionType,
  SelectorNode,
  StringLiteralNode,
  ValueNode,
} from '../ast-nodes.js';
import type { SourceSpan } from '../source-location.js';
import { LiteralDecodeError, TreeShapeError } from '../error-classes.js';
import {
  BAREWORD_PATTERN,
  NAME_PATTERN,
  SELECTOR_PATTERN,
  decodeNumber,
  decodeString,
  encodeString,
  regexBody,
} from '../literals.js';

type Span = SourceSpan | null;

export interface NodeBuilder {
  /** Number of nodes created so far */
  readonly count: number;

  string(lexeme: string, span?: Span): StringLiteralNode;
  stringValue(value: string, quote?: QuoteChar): StringLiteralNode;
  /** Unquoted value; `true` and `false` are booleans, not barewords */
  bareword(value: string, span?: Span): BarewordNode;
  /** Unquoted plugin or attribute name, which may start with a digit or hyphen */
  name(value: string, span?: Span): BarewordNode;
  number(lexeme: string, span?: Span): NumberLiteralNode;
  numberValue(value: number, kind?: NumberKind): NumberLiteralNode;
  boolean(value: boolean, span?: Span): BoolLiteralNode;
  regex(pattern: string, span?: Span): RegexLiteralNode;
  selector(raw: string, span?: Span): SelectorNode;

  array(elements: ValueNode[], span?: Span): ArrayNode;
  map(entries: MapEntryNode[], span?: Span): MapNode;
  mapEntry(key: MapKeyNode, value: ValueNode, span?: Span): MapEntryNode;
  attribute(name: NameNode | string, value: ValueNode, span?: Span): AttributeNode;
  plugin(name: string, attributes: AttributeNode[], span?: Span): PluginNode;

  rvalue(value: RValueTarget, span?: Span): RValueNode;
  compare(
    left: OperandNode,
    operator: CompareOperator,
    right: OperandNode,
    span?: Span
  ): CompareExprNode;
  regexMatch(
    left: OperandNode,
    operator: RegexOperator,
    pattern: StringLiteralNode | RegexLiteralNode,
    span?: Span
  ): RegexExprNode;
  inExpr(value: OperandNode, collection: OperandNode, span?: Span): InExprNode;
  notInExpr(
    value: OperandNode,
    collection: OperandNode,
    span?: Span
  ): NotInExprNode;
  negate(expression: ConditionNode, span?: Span): NegativeExprNode;
  booleanExpr(
    left: ConditionNode,
    operator: BooleanOperator,
    right: ConditionNode,
    span?: Span
  ): BooleanExprNode;
  methodCall(name: string, args: OperandNode[], span?: Span): MethodCallNode;

  ifClause(condition: ConditionNode, body: BlockItemNode[], span?: Span): IfNode;
  elseIfClause(
    condition: ConditionNode,
    body: BlockItemNode[],
    span?: Span
  ): ElseIfNode;
  elseClause(body: BlockItemNode[], span?: Span): ElseNode;
  /** Build a branch from an ordered clause list, validating the chain */
  branch(clauses: ClauseNode[], span?: Span): BranchNode;

  section(sectionType: SectionType, items: BlockItemNode[], span?: Span): SectionNode;
  document(sections: SectionNode[], span?: Span): DocumentNode;
}

/**
 * Create a builder with its own id sequence starting at 1.
 * The parser creates one per parse so ids are deterministic within a tree.
 */
export function createNodeBuilder(): NodeBuilder {
  let lastId = 0;
  const nextId = (): number => ++lastId;

  function invalid(kind: string, text: string): LiteralDecodeError {
    return new LiteralDecodeError('LSC-L002', { kind, text });
  }

  function bareword(value: string, span: Span = null): BarewordNode {
    if (!BAREWORD_PATTERN.test(value) || value === 'true' || value === 'false') {
      throw invalid('bareword', value);
    }
    return { type: 'Bareword', id: nextId(), span, value };
  }

  function name(value: string, span: Span = null): BarewordNode {
    if (!NAME_PATTERN.test(value)) {
      throw invalid('name', value);
    }
    return { type: 'Bareword', id: nextId(), span, value };
  }

  function stringValue(value: string, quote: QuoteChar = '"'): StringLiteralNode {
    return {
      type: 'StringLiteral',
      id: nextId(),
      span: null,
      lexeme: encodeString(value, quote),
      value,
      quote,
    };
  }

  return {
    get count(): number {
      return lastId;
    },

    string(lexeme, span = null) {
      const { value, quote } = decodeString(lexeme);
      return { type: 'StringLiteral', id: nextId(), span, lexeme, value, quote };
    },

    stringValue,
    bareword,
    name,

    number(lexeme, span = null) {
      const { value, kind } = decodeNumber(lexeme);
      return { type: 'NumberLiteral', id: nextId(), span, value, kind, lexeme };
    },

    numberValue(value, kind) {
      if (!Number.isFinite(value)) {
        throw invalid('number literal', String(value));
      }
      return {
        type: 'NumberLiteral',
        id: nextId(),
        span: null,
        value,
        kind: kind ?? (Number.isInteger(value) ? 'integer' : 'float'),
        lexeme: null,
      };
    },

    boolean(value, span = null) {
      return { type: 'BoolLiteral', id: nextId(), span, value };
    },

    regex(pattern, span = null) {
      return { type: 'RegexLiteral', id: nextId(), span, pattern: regexBody(pattern) };
    },

    selector(raw, span = null) {
      if (!SELECTOR_PATTERN.test(raw)) {
        throw invalid('selector', raw);
      }
      return { type: 'Selector', id: nextId(), span, raw };
    },

    array(elements, span = null) {
      return { type: 'Array', id: nextId(), span, elements };
    },

    map(entries, span = null) {
      return { type: 'Map', id: nextId(), span, entries };
    },

    mapEntry(key, value, span = null) {
      return { type: 'MapEntry', id: nextId(), span, key, value };
    },

    attribute(attrName, value, span = null) {
      const nameNode =
        typeof attrName !== 'string'
          ? attrName
          : NAME_PATTERN.test(attrName)
            ? name(attrName)
            : stringValue(attrName);
      return { type: 'Attribute', id: nextId(), span, name: nameNode, value };
    },

    plugin(name, attributes, span = null) {
      if (name === '') {
        throw invalid('plugin name', '""');
      }
      return { type: 'Plugin', id: nextId(), span, name, attributes };
    },

    rvalue(value, span = null) {
      return { type: 'RValue', id: nextId(), span, value };
    },

    compare(left, operator, right, span = null) {
      return { type: 'CompareExpr', id: nextId(), span, left, operator, right };
    },

    regexMatch(left, operator, pattern, span = null) {
      return { type: 'RegexExpr', id: nextId(), span, left, operator, pattern };
    },

    inExpr(value, collection, span = null) {
      return { type: 'InExpr', id: nextId(), span, value, collection };
    },

    notInExpr(value, collection, span = null) {
      return { type: 'NotInExpr', id: nextId(), span, value, collection };
    },

    negate(expression, span = null) {
      return { type: 'NegativeExpr', id: nextId(), span, expression };
    },

    booleanExpr(left, operator, right, span = null) {
      return { type: 'BooleanExpr', id: nextId(), span, left, operator, right };
    },

    methodCall(method, args, span = null) {
      if (!BAREWORD_PATTERN.test(method)) {
        throw invalid('method name', method);
      }
      return { type: 'MethodCall', id: nextId(), span, name: method, args };
    },

    ifClause(condition, body, span = null) {
      return { type: 'If', id: nextId(), span, condition, body };
    },

    elseIfClause(condition, body, span = null) {
      return { type: 'ElseIf', id: nextId(), span, condition, body };
    },

    elseClause(body, span = null) {
      return { type: 'Else', id: nextId(), span, body };
    },

    branch(clauses, span = null) {
      const [first, ...rest] = clauses;
      if (first === undefined || first.type !== 'If') {
        throw new TreeShapeError(
          'LSC-T004',
          { reason: 'must start with an if clause' },
          ''
        );
      }

      const elseIfClauses: ElseIfNode[] = [];
      let elseClause: ElseNode | null = null;
      for (const clause of rest) {
        if (elseClause !== null) {
          throw new TreeShapeError(
            'LSC-T004',
            { reason: 'cannot continue after its else clause' },
            ''
          );
        }
        switch (clause.type) {
          case 'If':
            throw new TreeShapeError(
              'LSC-T004',
              { reason: 'can only have one if clause' },
              ''
            );
          case 'ElseIf':
            elseIfClauses.push(clause);
            break;
          case 'Else':
            elseClause = clause;
            break;
        }
      }

      return {
        type: 'Branch',
        id: nextId(),
        span,
        ifClause: first,
        elseIfClauses,
        elseClause,
      };
    },

    section(sectionType, items, span = null) {
      return { type: 'Section', id: nextId(), span, sectionType, items };
    },

    document(sections, span = null) {
      return { type: 'Document', id: nextId(), span, sections };
    },
  };
}
