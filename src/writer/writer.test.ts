import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { Section } from '../document/section.js';
import { Value } from '../document/value.js';
import { parse } from '../parser/line-parser.js';
import { Logger } from '../utils/logger.js';
import { renderLiteral, serialize } from './writer.js';

const quiet = new Logger({ component: 'test', debugMode: false });

describe('renderLiteral', () => {
  it('should render every variant', () => {
    expect(renderLiteral(Value.text('hi'))).toBe("'hi'");
    expect(renderLiteral(Value.integer(-3))).toBe('-3');
    expect(renderLiteral(Value.real(30))).toBe('30.0');
    expect(renderLiteral(Value.real(2.5))).toBe('2.5');
    expect(renderLiteral(Value.boolean(false))).toBe('false');
    expect(renderLiteral(Value.from(['a', 1, 2.5, true]))).toBe("['a', 1, 2.5, true]");
    expect(renderLiteral(Value.from([[1], []]))).toBe('[[1], []]');
  });

  it('should use the requested quote style', () => {
    expect(renderLiteral(Value.from(['x', "it's"]), 'double')).toBe('["x", "it\'s"]');
  });
});

describe('serialize', () => {
  it('should return an empty string for an empty tree', () => {
    expect(serialize(new Section())).toBe('');
  });

  it('should write root properties without a header', () => {
    const root = new Section();
    root.set('a', 1).set('b', 'two');

    expect(serialize(root)).toBe("a = 1\nb = 'two'\n");
  });

  it('should indent nested headers and their properties', () => {
    const root = new Section();
    root.set('name', 'demo');
    const server = root.section('server');
    server.set('port', 8080);
    server.section('connection').set('host', 'h');

    expect(serialize(root)).toBe(
      [
        "name = 'demo'",
        '',
        '^ server',
        '    port = 8080',
        '',
        '    ^^ connection',
        "        host = 'h'",
        '',
      ].join('\n')
    );
  });

  it('should not start with a blank line when the root has no properties', () => {
    const root = new Section();
    root.section('a');
    root.section('b');

    expect(serialize(root)).toBe('^ a\n\n^ b\n');
  });

  it('should honor indent width and quote style', () => {
    const root = new Section();
    root.section('a').section('b').set('s', 'x');

    expect(serialize(root, { indentWidth: 2, quote: 'double' })).toBe(
      '^ a\n\n  ^^ b\n    s = "x"\n'
    );
  });

  it('should keep reals distinguishable from integers', () => {
    const root = new Section();
    root.set('r', Value.real(5)).set('i', 5);
    const reparsed = parse(serialize(root), {}, quiet);

    expect(reparsed.get('r').kind).toBe('real');
    expect(reparsed.get('i').kind).toBe('integer');
  });
});

const nameArb = fc.stringMatching(/^[a-z][a-z0-9_]{0,7}$/);
const textArb = fc.stringMatching(/^[A-Za-z0-9 _.,-]{0,12}$/);

const scalarArb: fc.Arbitrary<Value> = fc.oneof(
  textArb.map((text) => Value.text(text)),
  fc.maxSafeInteger().map((n) => Value.integer(n)),
  fc.double({ noNaN: true, noDefaultInfinity: true }).map((n) => Value.real(n)),
  fc.boolean().map((b) => Value.boolean(b))
);

const valueArb: fc.Arbitrary<Value> = fc.oneof(
  scalarArb,
  fc.array(scalarArb, { maxLength: 4 }).map((elements) => Value.array(elements)),
  fc
    .array(fc.array(scalarArb, { maxLength: 3 }), { maxLength: 3 })
    .map((rows) => Value.array(rows.map((row) => Value.array(row))))
);

function copyInto(target: Section, source: Section): void {
  for (const [key, value] of source.properties()) {
    target.set(key, value);
  }
  for (const [name, child] of source.sections()) {
    copyInto(target.section(name), child);
  }
}

function treeArb(depth: number): fc.Arbitrary<Section> {
  const properties = fc.array(fc.tuple(nameArb, valueArb), { maxLength: 4 });
  const children =
    depth === 0
      ? fc.constant<[string, Section][]>([])
      : fc.array(fc.tuple(nameArb, treeArb(depth - 1)), { maxLength: 2 });

  return fc.tuple(properties, children).map(([props, kids]) => {
    const section = new Section();
    for (const [key, value] of props) {
      section.set(key, value);
    }
    for (const [name, child] of kids) {
      copyInto(section.section(name), child);
    }
    return section;
  });
}

describe('round trip', () => {
  it('should reproduce an equivalent tree', () => {
    fc.assert(
      fc.property(treeArb(3), (tree) => {
        expect(parse(serialize(tree), {}, quiet).equals(tree)).toBe(true);
      })
    );
  });

  it('should be stable after one pass', () => {
    fc.assert(
      fc.property(treeArb(3), fc.constantFrom<'single' | 'double'>('single', 'double'), (tree, quote) => {
        const once = serialize(tree, { quote });
        expect(serialize(parse(once, {}, quiet), { quote })).toBe(once);
      })
    );
  });
});
