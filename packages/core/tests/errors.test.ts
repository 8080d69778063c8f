/**
 * Error Taxonomy Tests
 * Registry lookups, template rendering and the error class hierarchy
 */

import { describe, expect, it } from 'vitest';
import {
  ConfigSyntaxError,
  ERROR_REGISTRY,
  EmptyInputError,
  LiteralDecodeError,
  LsconfError,
  ParseError,
  TreeShapeError,
  createError,
  renderMessage,
} from 'lsconf';

describe('ERROR_REGISTRY', () => {
  it('uses the category letter in every id', () => {
    const letters = { input: 'I', parse: 'P', literal: 'L', tree: 'T' };
    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      expect(id).toMatch(new RegExp(`^LSC-${letters[definition.category]}\\d{3}$`));
      expect(definition.errorId).toBe(id);
    }
  });

  it('keeps descriptions short', () => {
    for (const [, definition] of ERROR_REGISTRY.entries()) {
      expect(definition.description.length).toBeLessThanOrEqual(50);
    }
  });

  it('returns undefined for unknown ids', () => {
    expect(ERROR_REGISTRY.get('LSC-X999')).toBeUndefined();
    expect(ERROR_REGISTRY.has('LSC-P001')).toBe(true);
  });
});

describe('renderMessage', () => {
  it('fills placeholders', () => {
    expect(renderMessage('Expected {expected}, found {found}', { expected: 'Array', found: 'Map' })).toBe(
      'Expected Array, found Map'
    );
  });

  it('renders missing values as empty text', () => {
    expect(renderMessage('a{b}c', {})).toBe('ac');
  });

  it('returns unclosed templates unchanged', () => {
    expect(renderMessage('oops {name', { name: 'x' })).toBe('oops {name');
  });

  it('coerces non-string values', () => {
    expect(renderMessage('found {count}', { count: 2 })).toBe('found 2');
  });
});

describe('createError', () => {
  it('returns the class matching the category', () => {
    expect(createError('LSC-P001', { detail: 'x' })).toBeInstanceOf(ParseError);
    expect(createError('LSC-L002', { kind: 'selector', text: 'f' })).toBeInstanceOf(
      LiteralDecodeError
    );
    expect(createError('LSC-T005', { count: 2 })).toBeInstanceOf(TreeShapeError);
  });

  it('renders the registry template', () => {
    expect(createError('LSC-T005', { count: 2 }).message).toBe(
      'Attribute must have exactly one key, found 2'
    );
  });

  it('appends the location to parse errors', () => {
    const err = createError('LSC-P001', { detail: 'x' }, { line: 2, column: 4, offset: 9 });
    expect(err.message).toBe('Failed to parse configuration: x at 2:4');
  });

  it('throws TypeError for unknown ids', () => {
    expect(() => createError('LSC-X999', {})).toThrow(new TypeError('Unknown error ID: LSC-X999'));
  });
});

describe('error classes', () => {
  it('rejects ids from another category', () => {
    expect(() => new TreeShapeError('LSC-P001', {}, '')).toThrow(
      new TypeError('Expected tree error ID, got: LSC-P001')
    );
  });

  it('exposes structured data without the location suffix', () => {
    const err = new ConfigSyntaxError('"}"', { line: 3, column: 1, offset: 20 });
    expect(err.toData()).toEqual({
      errorId: 'LSC-P001',
      message: 'Failed to parse configuration: "}"',
      location: { line: 3, column: 1, offset: 20 },
      context: { detail: '"}"' },
    });
    expect(err.expected).toBe('"}"');
  });

  it('formats with a host formatter', () => {
    const err = new EmptyInputError();
    expect(err.format()).toBe('Configuration text is empty');
    expect(err.format((data) => `[${data.errorId}] ${data.message}`)).toBe(
      '[LSC-I001] Configuration text is empty'
    );
  });

  it('keeps the hierarchy', () => {
    const err = new EmptyInputError();
    expect(err).toBeInstanceOf(ParseError);
    expect(err).toBeInstanceOf(LsconfError);
    expect(err.name).toBe('EmptyInputError');
  });
});
