/**
 * Node Builder and Structural Edit Tests
 */

import { describe, expect, it } from 'vitest';
import {
  LiteralDecodeError,
  TreeShapeError,
  appendAttribute,
  appendElement,
  appendEntry,
  appendItem,
  appendSection,
  createNodeBuilder,
  removeAttribute,
  removeElement,
  removeEntry,
  removeItem,
  removeSection,
  render,
} from 'lsconf';

describe('createNodeBuilder', () => {
  it('numbers nodes from 1 per builder', () => {
    const a = createNodeBuilder();
    const b = createNodeBuilder();
    expect(a.bareword('xx').id).toBe(1);
    expect(a.bareword('yy').id).toBe(2);
    expect(b.bareword('zz').id).toBe(1);
    expect(a.count).toBe(2);
  });

  it('decodes string lexemes', () => {
    const node = createNodeBuilder().string("'a\\nb'");
    expect(node.value).toBe('a\nb');
    expect(node.quote).toBe("'");
  });

  it('encodes string values', () => {
    expect(createNodeBuilder().stringValue('say "hi"').lexeme).toBe('"say \\"hi\\""');
  });

  it('classifies numbers', () => {
    const b = createNodeBuilder();
    expect(b.number('2.0').kind).toBe('float');
    expect(b.number('2').kind).toBe('integer');
    expect(b.numberValue(2.5).kind).toBe('float');
  });

  it('rejects invalid literal text', () => {
    const b = createNodeBuilder();
    expect(() => b.selector('field')).toThrow(LiteralDecodeError);
    expect(() => b.bareword('a b')).toThrow('Invalid bareword: a b');
    expect(() => b.bareword('a')).toThrow('Invalid bareword: a');
    expect(() => b.bareword('true')).toThrow('Invalid bareword: true');
    expect(() => b.bareword('9lives')).toThrow('Invalid bareword: 9lives');
    expect(() => b.name('a b')).toThrow('Invalid name: a b');
    expect(() => b.numberValue(Infinity)).toThrow(LiteralDecodeError);
    expect(() => b.plugin('', [])).toThrow(LiteralDecodeError);
  });

  it('builds names the bareword grammar does not allow', () => {
    const b = createNodeBuilder();
    expect(b.name('9-plugin')).toMatchObject({ type: 'Bareword', value: '9-plugin' });
    expect(render(b.attribute('x', b.numberValue(1)))).toBe('x => 1');
  });

  it('quotes attribute names outside the name grammar', () => {
    const b = createNodeBuilder();
    expect(render(b.attribute('my key', b.numberValue(1)))).toBe('"my key" => 1');
    expect(render(b.attribute('id', b.numberValue(1)))).toBe('id => 1');
  });
});

describe('branch', () => {
  const b = createNodeBuilder();
  const guard = () => b.rvalue(b.selector('[a]'));

  it('splits clauses into if, else-if and else', () => {
    const branch = b.branch([
      b.ifClause(guard(), []),
      b.elseIfClause(guard(), []),
      b.elseIfClause(guard(), []),
      b.elseClause([]),
    ]);
    expect(branch.elseIfClauses).toHaveLength(2);
    expect(branch.elseClause?.type).toBe('Else');
  });

  it('requires a leading if', () => {
    expect(() => b.branch([])).toThrow(TreeShapeError);
    expect(() => b.branch([b.elseClause([])])).toThrow('Branch must start with an if clause');
  });

  it('rejects a second if', () => {
    expect(() => b.branch([b.ifClause(guard(), []), b.ifClause(guard(), [])])).toThrow(
      'Branch can only have one if clause'
    );
  });

  it('rejects clauses after else', () => {
    expect(() =>
      b.branch([b.ifClause(guard(), []), b.elseClause([]), b.elseIfClause(guard(), [])])
    ).toThrow('Branch cannot continue after its else clause');
  });
});

describe('structural edits', () => {
  const b = createNodeBuilder();

  it('appends and removes sections', () => {
    const doc = b.document([b.section('input', [])]);
    const grown = appendSection(doc, b.section('output', []));
    expect(grown.sections.map((s) => s.sectionType)).toEqual(['input', 'output']);
    expect(grown.id).toBe(doc.id);
    expect(doc.sections).toHaveLength(1);
    expect(removeSection(grown, 0).sections.map((s) => s.sectionType)).toEqual(['output']);
  });

  it('appends and removes block items', () => {
    const section = appendItem(b.section('filter', []), b.plugin('drop', []));
    expect(render(section)).toBe('filter {\n  drop {\n  }\n}');
    expect(removeItem(section, 0).items).toEqual([]);

    const clause = appendItem(b.elseClause([]), b.plugin('drop', []));
    expect(clause.type).toBe('Else');
    expect(clause.body).toHaveLength(1);
  });

  it('removes attributes by name', () => {
    const plugin = appendAttribute(
      b.plugin('mutate', [b.attribute('id', b.stringValue('m1'))]),
      b.attribute('add_tag', b.array([b.stringValue('x')]))
    );
    expect(render(removeAttribute(plugin, 'id'))).toBe('mutate {\n  add_tag => ["x"]\n}');
  });

  it('edits arrays and maps', () => {
    const array = appendElement(b.array([]), b.numberValue(1));
    expect(render(array)).toBe('[1]');
    expect(removeElement(array, 0).elements).toEqual([]);

    const map = appendEntry(b.map([]), b.mapEntry(b.bareword('key1'), b.boolean(true)));
    expect(render(map)).toBe('{\n  key1 => true\n}');
    expect(removeEntry(map, 0).entries).toEqual([]);
  });

  it('throws RangeError for indexes out of range', () => {
    expect(() => removeElement(b.array([]), 0)).toThrow(RangeError);
    expect(() => removeSection(b.document([]), -1)).toThrow(
      'Index -1 out of range for 0 children'
    );
  });
});
