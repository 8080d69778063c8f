/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'input' | 'parse' | 'literal' | 'tree';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LSC-{category letter}{3-digit} (e.g., LSC-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

/** All error definitions indexed by error ID */
const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Input Errors (LSC-I0xx)
  {
    errorId: 'LSC-I001',
    category: 'input',
    description: 'Empty configuration',
    messageTemplate: 'Configuration text is empty',
    cause:
      'The text handed to the parser was empty or contained only whitespace.',
    resolution:
      'Pass the contents of a pipeline configuration with at least one input, filter or output section.',
    examples: [
      { description: 'Empty file', code: '' },
      { description: 'Whitespace only', code: '   \n\t' },
    ],
  },

  // Parse Errors (LSC-P0xx)
  {
    errorId: 'LSC-P001',
    category: 'parse',
    description: 'Syntax error',
    messageTemplate: 'Failed to parse configuration: {detail}',
    cause:
      'The grammar could not match the text at the reported position: an unbalanced brace, a stray token or an incomplete block.',
    resolution:
      'Check the construct that starts at the reported line and column. Every plugin and section needs a closing brace.',
    examples: [
      { description: 'Missing closing brace', code: 'filter { mutate { }' },
      { description: 'No section at all', code: '# comment only' },
    ],
  },
  {
    errorId: 'LSC-P002',
    category: 'parse',
    description: 'Invalid literal',
    messageTemplate: 'Failed to parse configuration: {detail}',
    cause:
      'A string or number matched the grammar but could not be decoded, for example a truncated \\x escape.',
    resolution: 'Fix or escape the backslash sequence inside the literal.',
    examples: [
      {
        description: 'Truncated hex escape',
        code: 'filter { mutate { replace => "\\x4" } }',
      },
    ],
  },
  {
    errorId: 'LSC-P003',
    category: 'parse',
    description: 'Unexpected node kind',
    messageTemplate: 'Expected {expected}, found {found}',
    cause:
      'A fragment parsed successfully but produced a different node kind than requested.',
    resolution:
      'Parse the fragment as the kind it actually is, or adjust the fragment text.',
  },
  {
    errorId: 'LSC-P099',
    category: 'parse',
    description: 'Unexpected parser failure',
    messageTemplate: 'Failed to parse configuration: {detail}',
    cause: 'An exception not raised by the grammar escaped while parsing.',
    resolution: 'Report the input that triggers it.',
  },

  // Literal Errors (LSC-L0xx)
  {
    errorId: 'LSC-L001',
    category: 'literal',
    description: 'Malformed escape sequence',
    messageTemplate: 'Malformed escape sequence {escape} in string literal',
    cause:
      'A \\x, \\u or \\U escape is not followed by the required number of hex digits.',
    resolution: 'Complete the escape or write the backslash as \\\\.',
    examples: [{ description: 'Short unicode escape', code: '"\\u12"' }],
  },
  {
    errorId: 'LSC-L002',
    category: 'literal',
    description: 'Invalid literal text',
    messageTemplate: 'Invalid {kind}: {text}',
    cause:
      'A literal built outside the parser does not satisfy the grammar of its kind.',
    resolution:
      'Barewords need at least two identifier characters, selectors need bracketed segments, names need a non-empty value.',
    examples: [
      { description: 'Single character bareword', code: 'a' },
      { description: 'Selector without brackets', code: 'field' },
    ],
  },

  // Tree Errors (LSC-T0xx)
  {
    errorId: 'LSC-T001',
    category: 'tree',
    description: 'Unexpected tree tag',
    messageTemplate: 'Unexpected tree tag {tag} where {expected} was expected',
    cause: 'The tagged value names a node type that cannot appear here.',
    resolution: 'Use one of the canonical tags for this position.',
  },
  {
    errorId: 'LSC-T002',
    category: 'tree',
    description: 'Missing tree field',
    messageTemplate: '{tag} is missing required field {field}',
    cause: 'A tagged node object lacks one of its fields.',
    resolution: 'Provide every field of the node shape.',
  },
  {
    errorId: 'LSC-T003',
    category: 'tree',
    description: 'Wrong tree value type',
    messageTemplate: 'Tree value must be {expected}, found {found}',
    cause: 'A tree field holds a value of the wrong JSON type.',
    resolution: 'Match the canonical tree shape for the node.',
  },
  {
    errorId: 'LSC-T004',
    category: 'tree',
    description: 'Invalid branch chain',
    messageTemplate: 'Branch {reason}',
    cause:
      'A branch must start with one if clause, continue with else-if clauses and end with at most one else clause.',
    resolution: 'Reorder the clauses or add the leading if clause.',
    examples: [
      {
        description: 'Else before else-if',
        code: '{"branch": [{"if_condition": ...}, {"else_condition": []}, {"else_if_condition": ...}]}',
      },
    ],
  },
  {
    errorId: 'LSC-T005',
    category: 'tree',
    description: 'Invalid attribute shape',
    messageTemplate: 'Attribute must have exactly one key, found {count}',
    cause: 'Attributes serialize as a single-key object from name to value.',
    resolution: 'Split the object into one object per attribute.',
  },
  {
    errorId: 'LSC-T006',
    category: 'tree',
    description: 'Invalid operator',
    messageTemplate: 'Invalid operator {operator} in {tag}',
    cause: 'The operator field is not one the grammar accepts for this node.',
    resolution: 'Use an operator the expression kind supports.',
  },
  {
    errorId: 'LSC-T007',
    category: 'tree',
    description: 'Unknown field',
    messageTemplate: 'Unknown field {field} in {tag}',
    cause: 'A tagged object carries a key its node kind does not define.',
    resolution: 'Remove the key or fix its spelling.',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, found {found}", {expected: "Array", found: "Map"})
 * // Returns: "Expected Array, found Map"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      let j = i + 1;
      while (j < template.length && template[j] !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        result += String(value);
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
