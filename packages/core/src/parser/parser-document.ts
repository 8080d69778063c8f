/**
 * Document Parsing
 * Plugin sections and the top-level document.
 * @internal
 */

import { type Parser, coroutine, many } from 'arcsecond';
import {
  SECTION_TYPES,
  type DocumentNode,
  type SectionNode,
} from '../ast-nodes.js';
import type { ParseContext } from './state.js';
import type { ControlRules } from './parser-control.js';
import { cs, oneOf, position } from './helpers.js';

/** @internal */
export interface DocumentRules {
  readonly section: Parser<SectionNode>;
  /** One or more sections; leading and trailing trivia are the caller's */
  readonly document: Parser<DocumentNode>;
}

/**
 * Build section and document rules.
 * @internal
 */
export function createDocumentRules(
  ctx: ParseContext,
  control: ControlRules
): DocumentRules {
  const { build } = ctx;

  const section: Parser<SectionNode> = coroutine((run) => {
    const start = run(position);
    const sectionType = run(oneOf(SECTION_TYPES, '(?![A-Za-z0-9_-])'));
    run(cs);
    const items = run(control.block);
    return build.section(sectionType, items, ctx.span(start, run(position)));
  });

  const document: Parser<DocumentNode> = coroutine((run) => {
    const start = run(position);
    const first = run(section);
    const rest = run(
      many(
        coroutine((r) => {
          r(cs);
          return r(section);
        })
      )
    );
    return build.document([first, ...rest], ctx.span(start, run(position)));
  });

  return { section, document };
}
