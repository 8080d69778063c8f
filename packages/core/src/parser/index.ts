/**
 * Parser
 * Entry points: parse() for whole documents, parseFragment() for any node
 * kind. Every failure surfaces as a ParseError.
 */

import { type Parser, coroutine, endOfInput, withData } from 'arcsecond';
import type {
  ASTNode,
  ConditionNode,
  DocumentNode,
  NameNode,
  NodeOfType,
  NodeType,
  ValueNode,
} from '../ast-nodes.js';
import {
  ConfigSyntaxError,
  EmptyInputError,
  LsconfError,
  ParseError,
} from '../error-classes.js';
import type { NodeBuilder } from '../ast/builder.js';
import { countNodes } from '../ast/visitor.js';
import type { ParseObservability } from '../observability.js';
import { createParseContext, type ParseContext } from './state.js';
import { cs } from './helpers.js';
import { SourceScanner } from './scanner.js';
import { createLiteralRules } from './parser-literals.js';
import { createValueRules } from './parser-values.js';
import { createExpressionRules } from './parser-expr.js';
import { createControlRules } from './parser-control.js';
import { createDocumentRules } from './parser-document.js';

// ============================================================
// OPTIONS
// ============================================================

export interface ParseOptions {
  /** Accept unconsumed input after the parsed node (default false) */
  readonly allowTrailing?: boolean | undefined;
  readonly observability?: ParseObservability | undefined;
  /** Builder whose id sequence new nodes continue (default: a fresh one) */
  readonly builder?: NodeBuilder | undefined;
}

/** Node kinds plus the helper rules that yield a union of kinds */
export type FragmentKind = NodeType | 'Name' | 'Value' | 'Condition';

// ============================================================
// GRAMMAR ASSEMBLY
// ============================================================

/** Build the rule table for one parse */
function createGrammar(ctx: ParseContext): Record<FragmentKind, Parser<ASTNode>> {
  const lit = createLiteralRules(ctx);
  const values = createValueRules(ctx, lit);
  const expr = createExpressionRules(ctx, lit, values);
  const control = createControlRules(ctx, values, expr);
  const doc = createDocumentRules(ctx, control);

  return {
    StringLiteral: lit.string,
    Bareword: lit.bareword,
    NumberLiteral: lit.number,
    BoolLiteral: lit.boolean,
    RegexLiteral: lit.regex,
    Selector: lit.selector,
    Array: values.array,
    Map: values.map,
    MapEntry: values.mapEntry,
    Attribute: values.attribute,
    Plugin: values.plugin,
    CompareExpr: expr.expression,
    RegexExpr: expr.expression,
    InExpr: expr.expression,
    NotInExpr: expr.expression,
    NegativeExpr: expr.negation,
    BooleanExpr: expr.condition,
    MethodCall: expr.methodCall,
    RValue: expr.rvalue,
    If: control.ifClause,
    ElseIf: control.elseIfClause,
    Else: control.elseClause,
    Branch: control.branch,
    Section: doc.section,
    Document: doc.document,
    Name: lit.name,
    Value: values.value,
    Condition: expr.condition,
  };
}

// ============================================================
// RUNNER
// ============================================================

/**
 * Convert anything thrown while parsing into a ParseError.
 * Domain errors pass through; anything else is wrapped with its cause.
 */
export function toParseError(err: unknown): ParseError {
  if (err instanceof ParseError) {
    return err;
  }
  const detail =
    err instanceof LsconfError || err instanceof Error
      ? err.message
      : String(err);
  return new ParseError('LSC-P099', { detail }, undefined, { cause: err });
}

/** Strip arcsecond's "ParseError (position N): " prefix */
function describeFailure(error: unknown): string {
  return String(error).replace(/^ParseError[^:]*:\s*/, '');
}

function runRule(
  source: string,
  kind: FragmentKind,
  options: ParseOptions
): ASTNode {
  const observability = options.observability;
  const startTime = Date.now();
  observability?.onParseStart?.({ source, kind });

  let node: ASTNode;
  try {
    if (source.trim() === '') {
      throw new EmptyInputError();
    }

    const ctx = createParseContext(source, options.builder);
    const rule = createGrammar(ctx)[kind];
    const allowTrailing = options.allowTrailing ?? false;

    const scanner = new SourceScanner(source);
    const entry = coroutine((run) => {
      run(cs);
      const parsed = run(rule);
      run(cs);
      if (!allowTrailing) {
        run(endOfInput);
      }
      return parsed;
    });

    const result = withData(entry)(scanner).run(source);
    if (result.isError) {
      // Report where the deepest token failed, not where backtracking ended
      const failure = scanner.furthestFailure();
      if (failure !== null && failure.byteIndex >= result.index) {
        throw new ConfigSyntaxError(
          `Expected ${failure.expected.join(' or ')}`,
          ctx.locate(failure.byteIndex)
        );
      }
      throw new ConfigSyntaxError(
        describeFailure(result.error),
        ctx.locate(result.index)
      );
    }
    node = result.result;
    if (!isHelperKind(kind) && node.type !== kind) {
      throw new ParseError('LSC-P003', { expected: kind, found: node.type });
    }
  } catch (err) {
    const error = toParseError(err);
    observability?.onParseError?.({
      kind,
      error,
      durationMs: Date.now() - startTime,
    });
    throw error;
  }

  observability?.onParseEnd?.({
    kind,
    durationMs: Date.now() - startTime,
    nodeCount: countNodes(node),
  });
  return node;
}

function isHelperKind(kind: FragmentKind): boolean {
  return kind === 'Name' || kind === 'Value' || kind === 'Condition';
}

// ============================================================
// PUBLIC API
// ============================================================

/**
 * Parse a complete pipeline configuration.
 *
 * @throws EmptyInputError for empty or whitespace-only text
 * @throws ConfigSyntaxError when the grammar does not match
 * @throws ParseError for any other failure
 */
export function parse(source: string, options: ParseOptions = {}): DocumentNode {
  return parseFragment(source, 'Document', options);
}

/**
 * Parse a fragment as a single node kind.
 *
 * Expression kinds are read with the expression grammar and then checked,
 * so `parseFragment('[a] == 1', 'RegexExpr')` fails with LSC-P003.
 */
export function parseFragment<K extends NodeType>(
  source: string,
  kind: K,
  options?: ParseOptions
): NodeOfType<K>;
export function parseFragment(
  source: string,
  kind: 'Name',
  options?: ParseOptions
): NameNode;
export function parseFragment(
  source: string,
  kind: 'Value',
  options?: ParseOptions
): ValueNode;
export function parseFragment(
  source: string,
  kind: 'Condition',
  options?: ParseOptions
): ConditionNode;
export function parseFragment(
  source: string,
  kind: FragmentKind,
  options: ParseOptions = {}
): ASTNode {
  return runRule(source, kind, options);
}
