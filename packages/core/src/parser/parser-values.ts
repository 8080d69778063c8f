/**
 * Value Parsing
 * Arrays, maps, attributes and plugins. Values nest plugins (codec-style
 * attribute values), so the rules here are mutually recursive.
 * @internal
 */

import {
  type Parser,
  choice,
  coroutine,
  many,
  recursiveParser,
} from 'arcsecond';
import type {
  ArrayNode,
  AttributeNode,
  MapEntryNode,
  MapNode,
  PluginNode,
  ValueNode,
} from '../ast-nodes.js';
import type { ParseContext } from './state.js';
import type { LiteralRules } from './parser-literals.js';
import { cs, delimited, position, symbol } from './helpers.js';

/** @internal */
export interface ValueRules {
  readonly value: Parser<ValueNode>;
  readonly array: Parser<ArrayNode>;
  readonly map: Parser<MapNode>;
  readonly mapEntry: Parser<MapEntryNode>;
  readonly attribute: Parser<AttributeNode>;
  readonly plugin: Parser<PluginNode>;
}

/**
 * Build value rules.
 * @internal
 */
export function createValueRules(
  ctx: ParseContext,
  lit: LiteralRules
): ValueRules {
  const { build } = ctx;

  // plugin > boolean > bareword > string > number > array > map
  const value: Parser<ValueNode> = recursiveParser(() =>
    choice([
      plugin,
      lit.boolean,
      lit.bareword,
      lit.string,
      lit.number,
      array,
      map,
    ])
  );

  const array: Parser<ArrayNode> = coroutine((run) => {
    const start = run(position);
    const elements = run(delimited('[', value, ',', ']'));
    return build.array(elements, ctx.span(start, run(position)));
  });

  const mapEntry: Parser<MapEntryNode> = coroutine((run) => {
    const start = run(position);
    const key = run(lit.mapKey);
    run(cs);
    run(symbol('=>'));
    run(cs);
    const entryValue = run(value);
    return build.mapEntry(key, entryValue, ctx.span(start, run(position)));
  });

  const map: Parser<MapNode> = coroutine((run) => {
    const start = run(position);
    const entries = run(delimited('{', mapEntry, null, '}'));
    return build.map(entries, ctx.span(start, run(position)));
  });

  const attribute: Parser<AttributeNode> = coroutine((run) => {
    const start = run(position);
    const name = run(lit.name);
    run(cs);
    run(symbol('=>'));
    run(cs);
    const attrValue = run(value);
    return build.attribute(name, attrValue, ctx.span(start, run(position)));
  });

  const plugin: Parser<PluginNode> = coroutine((run) => {
    const start = run(position);
    const name = run(lit.name);
    run(cs);
    run(symbol('{'));
    run(cs);
    const attributes = run(
      many(
        coroutine((r) => {
          const attr = r(attribute);
          r(cs);
          return attr;
        })
      )
    );
    run(symbol('}'));
    return build.plugin(name.value, attributes, ctx.span(start, run(position)));
  });

  return { value, array, map, mapEntry, attribute, plugin };
}
