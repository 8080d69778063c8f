/**
 * Literal Parsing
 * Strings, barewords, numbers, booleans, regexes, selectors and names.
 * @internal
 */

import { type Parser, choice, coroutine } from 'arcsecond';
import type {
  BarewordNode,
  BoolLiteralNode,
  MapKeyNode,
  NameNode,
  NumberLiteralNode,
  RegexLiteralNode,
  SelectorNode,
  StringLiteralNode,
} from '../ast-nodes.js';
import { ConfigSyntaxError, LiteralDecodeError } from '../error-classes.js';
import type { ParseContext } from './state.js';
import { operatorWord, position, token } from './helpers.js';

/** @internal */
export interface LiteralRules {
  readonly string: Parser<StringLiteralNode>;
  readonly bareword: Parser<BarewordNode>;
  readonly number: Parser<NumberLiteralNode>;
  readonly boolean: Parser<BoolLiteralNode>;
  readonly regex: Parser<RegexLiteralNode>;
  readonly selector: Parser<SelectorNode>;
  /** Plugin and attribute names: [A-Za-z0-9_-]+ or a quoted string */
  readonly name: Parser<NameNode>;
  /** Map keys: number, bareword or string */
  readonly mapKey: Parser<MapKeyNode>;
}

const STRING_TOKEN = token(
  /"(?:\\[\s\S]|[^"\\])*"|'(?:\\[\s\S]|[^'\\])*'/,
  'a quoted string'
);
// true and false are booleans wherever a bareword could appear
const BAREWORD_TOKEN = token(
  /(?!(?:true|false)(?![A-Za-z0-9_]))[A-Za-z_][A-Za-z0-9_]+/,
  'a bareword'
);
const NUMBER_TOKEN = token(/-?[0-9]+(?:\.[0-9]+)?/, 'a number');
const REGEX_TOKEN = token(/\/(?:\\\/|[^/])*\//, 'a regex');
const SELECTOR_TOKEN = token(/(?:\[[^[\],]+\])+/, 'a field selector');
const NAME_TOKEN = token(/[A-Za-z0-9_-]+/, 'a name');

/**
 * Build literal rules bound to one parse context.
 * @internal
 */
export function createLiteralRules(ctx: ParseContext): LiteralRules {
  const { build } = ctx;

  /** Run a node constructor, reporting decode failures at the literal */
  function decoded<T>(startByte: number, construct: () => T): T {
    try {
      return construct();
    } catch (err) {
      if (err instanceof LiteralDecodeError) {
        throw new ConfigSyntaxError(err.message, ctx.locate(startByte), {
          errorId: 'LSC-P002',
          cause: err,
        });
      }
      throw err;
    }
  }

  const string: Parser<StringLiteralNode> = coroutine((run) => {
    const start = run(position);
    const lexeme = run(STRING_TOKEN);
    const span = ctx.span(start, run(position));
    return decoded(start, () => build.string(lexeme, span));
  });

  const bareword: Parser<BarewordNode> = coroutine((run) => {
    const start = run(position);
    const value = run(BAREWORD_TOKEN);
    return build.bareword(value, ctx.span(start, run(position)));
  });

  const number: Parser<NumberLiteralNode> = coroutine((run) => {
    const start = run(position);
    const lexeme = run(NUMBER_TOKEN);
    const span = ctx.span(start, run(position));
    return decoded(start, () => build.number(lexeme, span));
  });

  const boolean: Parser<BoolLiteralNode> = coroutine((run) => {
    const start = run(position);
    const text = run(choice([operatorWord('true'), operatorWord('false')]));
    return build.boolean(text === 'true', ctx.span(start, run(position)));
  });

  const regexLiteral: Parser<RegexLiteralNode> = coroutine((run) => {
    const start = run(position);
    const lexeme = run(REGEX_TOKEN);
    return build.regex(lexeme, ctx.span(start, run(position)));
  });

  const selector: Parser<SelectorNode> = coroutine((run) => {
    const start = run(position);
    const raw = run(SELECTOR_TOKEN);
    return build.selector(raw, ctx.span(start, run(position)));
  });

  const bareName: Parser<BarewordNode> = coroutine((run) => {
    const start = run(position);
    const value = run(NAME_TOKEN);
    return build.name(value, ctx.span(start, run(position)));
  });

  const name: Parser<NameNode> = choice([bareName, string]);
  const mapKey: Parser<MapKeyNode> = choice([number, bareword, string]);

  return {
    string,
    bareword,
    number,
    boolean,
    regex: regexLiteral,
    selector,
    name,
    mapKey,
  };
}
