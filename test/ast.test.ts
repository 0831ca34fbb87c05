// test/ast.test.ts
import { describe, it, expect } from 'vitest';
import type { AstNode, Field } from '../src/ast/types.ts';
import { isJsonPath, isWildcard } from '../src/ast/types.ts';
import {
  selectStatement,
  fields,
  field,
  topic,
  filter,
  binaryExpr,
  callExpr,
  switchExpr,
  caseExpr,
  jsonPath,
} from '../src/ast/builders.ts';
import { BinaryOp, BINARY_OP_BY_SYMBOL, isBinaryOpCode } from '../src/ast/operators.ts';
import {
  noWindow,
  tumblingWindow,
  hoppingWindow,
  slidingWindow,
  sessionWindow,
  checkWindow,
  isWindowKind,
} from '../src/ast/window.ts';
import { children, walk, collect } from '../src/ast/walk.ts';
import { formatExpression } from '../src/ast/format.ts';
import { NULL, intNode, floatNode, stringNode } from '../src/value/node.ts';

// SELECT a, upper(b) FROM t WHERE a > 1
const statement = selectStatement({
  fields: fields([field(jsonPath('a')), field(callExpr('upper(b)', 'upper', [jsonPath('b')]))]),
  topic: topic(['t']),
  filter: filter(binaryExpr(BinaryOp.GT, jsonPath('a'), intNode(1n))),
});

describe('builders', () => {
  it('freeze nodes and copy their child lists', () => {
    const items: Field[] = [field(jsonPath('a'))];
    const f = fields(items);
    items.push(field(jsonPath('b')));
    expect(f.items).toHaveLength(1);
    expect(Object.isFrozen(f)).toBe(true);
    expect(Object.isFrozen(f.items)).toBe(true);
  });

  it('omit an absent alias', () => {
    expect('alias' in field(jsonPath('a'))).toBe(false);
    expect(field(jsonPath('a'), 'x').alias).toBe('x');
  });

  it('mark SELECT * as a wildcard path', () => {
    expect(isWildcard(field(jsonPath('*')))).toBe(true);
    expect(isWildcard(field(jsonPath('a')))).toBe(false);
  });
});

describe('window model', () => {
  it('derives the interval from the kind', () => {
    expect(noWindow()).toEqual({ type: 'Window', kind: 'NONE', length: 0, interval: 0 });
    expect(tumblingWindow(10)).toEqual({ type: 'Window', kind: 'TUMBLING', length: 10, interval: 10 });
    expect(hoppingWindow(10, 5)).toEqual({ type: 'Window', kind: 'HOPPING', length: 10, interval: 5 });
    expect(slidingWindow(5)).toEqual({ type: 'Window', kind: 'SLIDING', length: 5, interval: 0 });
    expect(sessionWindow(60, 5)).toEqual({ type: 'Window', kind: 'SESSION', length: 60, interval: 5 });
  });

  it('checks length and interval per kind', () => {
    expect(checkWindow(tumblingWindow(10))).toBeUndefined();
    expect(checkWindow(hoppingWindow(10, 5))).toBeUndefined();
    expect(checkWindow(noWindow())).toBeUndefined();
    expect(checkWindow(tumblingWindow(0))).toBe('TUMBLING window length must be a positive integer');
    expect(checkWindow(hoppingWindow(10, 10))).toBe('HOPPING window interval must be between 1 and length - 1');
    expect(checkWindow(sessionWindow(10, 0))).toBe('SESSION window requires a positive gap');
  });

  it('recognizes kind names', () => {
    expect(isWindowKind('SESSION')).toBe(true);
    expect(isWindowKind('session')).toBe(false);
  });
});

describe('walk', () => {
  it('visits nodes depth-first in source order', () => {
    const paths = collect(statement, isJsonPath).map((p) => p.path);
    expect(paths).toEqual(['a', 'b', 'a']);
  });

  it('skips the children of a node when the visitor returns false', () => {
    const seen: string[] = [];
    walk(statement, (node) => {
      seen.push(node.type);
      return node.type !== 'Filter';
    });
    expect(seen).toEqual([
      'SelectStatement',
      'Fields',
      'Field',
      'JSONPathExpr',
      'Field',
      'CallExpr',
      'JSONPathExpr',
      'Topic',
      'Filter',
    ]);
  });

  it('passes the parent of each node', () => {
    const parents = new Map<AstNode, AstNode | undefined>();
    walk(statement, (node, parent) => {
      parents.set(node, parent);
    });
    expect(parents.get(statement)).toBeUndefined();
    expect(parents.get(statement.topic)).toBe(statement);
  });

  it('lists switch children with the cases in order', () => {
    const first = caseExpr(intNode(1n), stringNode('one'));
    const second = caseExpr(intNode(2n), stringNode('two'));
    const sw = switchExpr(jsonPath('x'), [first, second], NULL);
    expect(children(sw)).toEqual([jsonPath('x'), first, second, NULL]);
  });
});

describe('formatExpression', () => {
  it('parenthesizes nested binary expressions', () => {
    const expr = binaryExpr(BinaryOp.ADD, jsonPath('a'), binaryExpr(BinaryOp.MUL, intNode(2n), floatNode(3)));
    expect(formatExpression(expr)).toBe('a + (2 * 3.0)');
  });

  it('renders literals', () => {
    expect(formatExpression(stringNode('hi'))).toBe('"hi"');
    expect(formatExpression(floatNode(0.5))).toBe('0.5');
    expect(formatExpression(NULL)).toBe('null');
  });

  it('renders CASE and calls', () => {
    const sw = switchExpr(jsonPath('x'), [caseExpr(intNode(1n), stringNode('one'))], NULL);
    expect(formatExpression(sw)).toBe('CASE x WHEN 1 THEN "one" ELSE null END');
    expect(formatExpression(callExpr('upper( b )', 'upper', [jsonPath('b')]))).toBe('upper( b )');
  });

  it('names unknown operators by code', () => {
    expect(formatExpression(binaryExpr(99, jsonPath('a'), jsonPath('b')))).toBe('a op(99) b');
  });
});

describe('operators', () => {
  it('maps both spellings of not-equal', () => {
    expect(BINARY_OP_BY_SYMBOL['<>']).toBe(BinaryOp.NEQ);
    expect(BINARY_OP_BY_SYMBOL['!=']).toBe(BinaryOp.NEQ);
  });

  it('knows the valid codes', () => {
    expect(isBinaryOpCode(BinaryOp.MOD)).toBe(true);
    expect(isBinaryOpCode(0)).toBe(false);
    expect(isBinaryOpCode(14)).toBe(false);
  });
});
