import type { SourceSpan } from './source-location.js';

interface BaseNode {
  /** Creation-order id from the builder that made the node */
  readonly id: number;
  /** Source span; null when built programmatically or from a tree */
  readonly span: SourceSpan | null;
}

// ============================================================
// LITERALS
// ============================================================

/**
 * Quoted string: "text" or 'text'
 * The lexeme keeps the original quotes and escapes; value is decoded.
 */
export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly lexeme: string;
  readonly value: string;
  readonly quote: QuoteChar;
}

export type QuoteChar = '"' | "'";

/** Unquoted identifier: [A-Za-z_][A-Za-z0-9_]+ */
export interface BarewordNode extends BaseNode {
  readonly type: 'Bareword';
  readonly value: string;
}

/**
 * Numeric literal. Integer and float kinds stay distinct so that
 * integers never gain a decimal point on output.
 */
export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
  readonly kind: NumberKind;
  /** Source text when parsed; null for programmatic numbers */
  readonly lexeme: string | null;
}

export type NumberKind = 'integer' | 'float';

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

/** /pattern/ with the body stored without delimiters */
export interface RegexLiteralNode extends BaseNode {
  readonly type: 'RegexLiteral';
  readonly pattern: string;
}

/** Field reference such as [a][b], kept as its raw text */
export interface SelectorNode extends BaseNode {
  readonly type: 'Selector';
  readonly raw: string;
}

export type LiteralNode =
  | StringLiteralNode
  | BarewordNode
  | NumberLiteralNode
  | BoolLiteralNode
  | RegexLiteralNode
  | SelectorNode;

// ============================================================
// COMPOSITE VALUES
// ============================================================

export interface ArrayNode extends BaseNode {
  readonly type: 'Array';
  readonly elements: ValueNode[];
}

export interface MapNode extends BaseNode {
  readonly type: 'Map';
  readonly entries: MapEntryNode[];
}

/** key => value inside a map */
export interface MapEntryNode extends BaseNode {
  readonly type: 'MapEntry';
  readonly key: MapKeyNode;
  readonly value: ValueNode;
}

export type MapKeyNode = StringLiteralNode | BarewordNode | NumberLiteralNode;

/** Attribute and plugin names: a bareword-like run or a quoted string */
export type NameNode = StringLiteralNode | BarewordNode;

/** Anything that can sit on the right of => or inside an array */
export type ValueNode =
  | LiteralNode
  | ArrayNode
  | MapNode
  | PluginNode
  | MethodCallNode;

// ============================================================
// DECLARATIONS
// ============================================================

/** name => value */
export interface AttributeNode extends BaseNode {
  readonly type: 'Attribute';
  readonly name: NameNode;
  readonly value: ValueNode;
}

/** name { attribute* } */
export interface PluginNode extends BaseNode {
  readonly type: 'Plugin';
  readonly name: string;
  readonly attributes: AttributeNode[];
}

// ============================================================
// EXPRESSIONS
// ============================================================

/** Longest spellings first so the grammar never stops at a prefix */
export const COMPARE_OPERATORS = ['==', '!=', '<=', '>=', '<', '>'] as const;
export const REGEX_OPERATORS = ['=~', '!~'] as const;
export const BOOLEAN_OPERATORS = ['nand', 'and', 'xor', 'or'] as const;

export type CompareOperator = (typeof COMPARE_OPERATORS)[number];
export type RegexOperator = (typeof REGEX_OPERATORS)[number];
export type BooleanOperator = (typeof BOOLEAN_OPERATORS)[number];

export const SECTION_TYPES = ['input', 'filter', 'output'] as const;

/** Primary operands accepted where the grammar reads an rvalue */
export type RValueTarget =
  | StringLiteralNode
  | NumberLiteralNode
  | SelectorNode
  | ArrayNode
  | MethodCallNode
  | RegexLiteralNode;

/**
 * Marks an operand that the grammar read as a primary reference rather than
 * a compound condition. Transparent for rendering, values and trees.
 */
export interface RValueNode extends BaseNode {
  readonly type: 'RValue';
  readonly value: RValueTarget;
}

export type OperandNode = RValueNode | RValueTarget;

/** left op right, op one of == != <= >= < > */
export interface CompareExprNode extends BaseNode {
  readonly type: 'CompareExpr';
  readonly left: OperandNode;
  readonly operator: CompareOperator;
  readonly right: OperandNode;
}

/** left =~ /pattern/ or left !~ "pattern" */
export interface RegexExprNode extends BaseNode {
  readonly type: 'RegexExpr';
  readonly left: OperandNode;
  readonly operator: RegexOperator;
  readonly pattern: StringLiteralNode | RegexLiteralNode;
}

/** value in collection */
export interface InExprNode extends BaseNode {
  readonly type: 'InExpr';
  readonly value: OperandNode;
  readonly collection: OperandNode;
}

/** value not in collection */
export interface NotInExprNode extends BaseNode {
  readonly type: 'NotInExpr';
  readonly value: OperandNode;
  readonly collection: OperandNode;
}

/** !expression */
export interface NegativeExprNode extends BaseNode {
  readonly type: 'NegativeExpr';
  readonly expression: ConditionNode;
}

/** left and|or|xor|nand right */
export interface BooleanExprNode extends BaseNode {
  readonly type: 'BooleanExpr';
  readonly left: ConditionNode;
  readonly operator: BooleanOperator;
  readonly right: ConditionNode;
}

/** name(arg, ...) */
export interface MethodCallNode extends BaseNode {
  readonly type: 'MethodCall';
  readonly name: string;
  readonly args: OperandNode[];
}

export type ConditionNode =
  | CompareExprNode
  | RegexExprNode
  | InExprNode
  | NotInExprNode
  | NegativeExprNode
  | BooleanExprNode
  | OperandNode;

// ============================================================
// CONTROL FLOW
// ============================================================

export type BlockItemNode = PluginNode | BranchNode;

export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ConditionNode;
  readonly body: BlockItemNode[];
}

export interface ElseIfNode extends BaseNode {
  readonly type: 'ElseIf';
  readonly condition: ConditionNode;
  readonly body: BlockItemNode[];
}

export interface ElseNode extends BaseNode {
  readonly type: 'Else';
  readonly body: BlockItemNode[];
}

export type ClauseNode = IfNode | ElseIfNode | ElseNode;

/**
 * if ... { } else if ... { } else { }
 * The shape itself enforces: one leading If, any ElseIf, at most one Else.
 */
export interface BranchNode extends BaseNode {
  readonly type: 'Branch';
  readonly ifClause: IfNode;
  readonly elseIfClauses: ElseIfNode[];
  readonly elseClause: ElseNode | null;
}

// ============================================================
// DOCUMENT STRUCTURE
// ============================================================

export type SectionType = (typeof SECTION_TYPES)[number];

/** input|filter|output { (plugin|branch)* } */
export interface SectionNode extends BaseNode {
  readonly type: 'Section';
  readonly sectionType: SectionType;
  readonly items: BlockItemNode[];
}

/** Sections in source order; same-type sections are not merged */
export interface DocumentNode extends BaseNode {
  readonly type: 'Document';
  readonly sections: SectionNode[];
}

// ============================================================
// UNION
// ============================================================

export type ASTNode =
  | StringLiteralNode
  | BarewordNode
  | NumberLiteralNode
  | BoolLiteralNode
  | RegexLiteralNode
  | SelectorNode
  | ArrayNode
  | MapNode
  | MapEntryNode
  | AttributeNode
  | PluginNode
  | CompareExprNode
  | RegexExprNode
  | InExprNode
  | NotInExprNode
  | NegativeExprNode
  | BooleanExprNode
  | MethodCallNode
  | RValueNode
  | IfNode
  | ElseIfNode
  | ElseNode
  | BranchNode
  | SectionNode
  | DocumentNode;

export type NodeType = ASTNode['type'];

/** Node interface for a type tag */
export type NodeOfType<T extends NodeType> = Extract<ASTNode, { type: T }>;

/** Ordered clause chain of a branch */
export function branchClauses(branch: BranchNode): ClauseNode[] {
  const clauses: ClauseNode[] = [branch.ifClause, ...branch.elseIfClauses];
  if (branch.elseClause) {
    clauses.push(branch.elseClause);
  }
  return clauses;
}
