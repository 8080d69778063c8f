/**
 * lsconf
 * Parser, renderer and tree bridge for pipeline configuration files
 */

export {
  parse,
  parseFragment,
  toParseError,
  type FragmentKind,
  type ParseOptions,
} from './parser/index.js';
export { render, type RenderOptions } from './render/index.js';
export {
  formatCondition,
  formatInlineValue,
  formatLiteral,
  type LiteralStyle,
} from './render/render-expr.js';
export { BOOLEAN_PRECEDENCE, needsParens } from './render/precedence.js';
export { toValue, type PlainValue, type ValueOptions } from './value.js';

// ============================================================
// CANONICAL TREE
// ============================================================
export {
  toTree,
  fromTree,
  isTreeTag,
  type TreeContext,
  type TreeValue,
  type TreeObject,
  type TreeTag,
  type ValueTag,
  type ExpressionTag,
  type StructureTag,
  VALUE_TAGS,
  EXPRESSION_TAGS,
  STRUCTURE_TAGS,
} from './tree/index.js';

// ============================================================
// AST CONSTRUCTION AND TRAVERSAL
// ============================================================
export { createNodeBuilder, type NodeBuilder } from './ast/builder.js';
export {
  childrenOf,
  countNodes,
  visitNode,
  type NodeVisitor,
} from './ast/visitor.js';
export {
  appendAttribute,
  appendElement,
  appendEntry,
  appendItem,
  appendSection,
  removeAttribute,
  removeElement,
  removeEntry,
  removeItem,
  removeSection,
} from './ast/edit.js';
export * from './ast-nodes.js';

// ============================================================
// LITERALS
// ============================================================
export {
  BAREWORD_PATTERN,
  NAME_PATTERN,
  NUMBER_PATTERN,
  SELECTOR_PATTERN,
  decodeNumber,
  decodeString,
  encodeString,
  formatNumber,
} from './literals.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  ConfigSyntaxError,
  EmptyInputError,
  LiteralDecodeError,
  LsconfError,
  ParseError,
  TreeShapeError,
  createError,
  type LsconfErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';

// ============================================================
// OBSERVABILITY
// ============================================================
export type {
  ParseEndEvent,
  ParseErrorEvent,
  ParseObservability,
  ParseStartEvent,
} from './observability.js';
export type { Locator, SourceLocation, SourceSpan } from './source-location.js';
export { createLocator } from './source-location.js';
