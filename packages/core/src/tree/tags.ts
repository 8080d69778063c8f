/**
 * Canonical Tree Shape
 * JSON-safe tagged representation shared by toTree() and fromTree().
 *
 * Tagged nodes are single-key objects whose key is the snake_case tag:
 *   {"compare_expression": {"left": ..., "operator": "==", "right": ...}}
 * Attributes are untagged single-key objects from name to value.
 */

export type TreeValue =
  | string
  | number
  | boolean
  | TreeValue[]
  | { [key: string]: TreeValue };

export type TreeObject = { [key: string]: TreeValue };

/** Literal and composite tags accepted wherever a value is expected */
export const VALUE_TAGS = [
  'ls_string',
  'ls_bare_word',
  'number',
  'boolean',
  'regexp',
  'selector_node',
  'array',
  'hash',
  'plugin',
  'method_call',
] as const;

/** Tags of expression nodes */
export const EXPRESSION_TAGS = [
  'compare_expression',
  'regex_expression',
  'in_expression',
  'not_in_expression',
  'negative_expression',
  'boolean_expression',
] as const;

/** Tags of structural nodes */
export const STRUCTURE_TAGS = [
  'hash_entry',
  'if_condition',
  'else_if_condition',
  'else_condition',
  'branch',
  'plugin_section',
  'config',
] as const;

export type ValueTag = (typeof VALUE_TAGS)[number];
export type ExpressionTag = (typeof EXPRESSION_TAGS)[number];
export type StructureTag = (typeof STRUCTURE_TAGS)[number];
export type TreeTag = ValueTag | ExpressionTag | StructureTag;

const ALL_TAGS: ReadonlySet<string> = new Set<string>([
  ...VALUE_TAGS,
  ...EXPRESSION_TAGS,
  ...STRUCTURE_TAGS,
]);

export function isTreeTag(key: string): key is TreeTag {
  return ALL_TAGS.has(key);
}

/** Plain object check for parsed JSON/YAML input */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
