// test/newNode.test.ts
import { describe, it, expect } from 'vitest';
import { newNode } from '../src/value/newNode.ts';
import { UNDEFINED, NULL, boolNode, intNode, floatNode, stringNode, jsonNode } from '../src/value/node.ts';

describe('newNode', () => {
  it('maps primitives', () => {
    expect(newNode(42)).toEqual(intNode(42n));
    expect(newNode(-3)).toEqual(intNode(-3n));
    expect(newNode(1.5)).toEqual(floatNode(1.5));
    expect(newNode('s')).toEqual(stringNode('s'));
    expect(newNode(false)).toEqual(boolNode(false));
  });

  it('treats integers beyond the safe range as Float', () => {
    expect(newNode(2 ** 53)).toEqual(floatNode(9007199254740992));
  });

  it('maps bigint through int64', () => {
    expect(newNode(-5n)).toEqual(intNode(-5n));
    expect(newNode(10n ** 20n)).toBe(UNDEFINED);
  });

  it('maps null and undefined to Null', () => {
    expect(newNode(null)).toBe(NULL);
    expect(newNode(undefined)).toBe(NULL);
  });

  it('decodes bytes as a JSON payload', () => {
    expect(newNode(new TextEncoder().encode('{"k":1}'))).toEqual(jsonNode('{"k":1}'));
    expect(newNode(Buffer.from('[true]'))).toEqual(jsonNode('[true]'));
  });

  it('unwraps boxed primitives', () => {
    expect(newNode(Object(3))).toEqual(intNode(3n));
    expect(newNode(Object('x'))).toEqual(stringNode('x'));
    expect(newNode(Object(false))).toEqual(boolNode(false));
  });

  it('serializes mappings and sequences', () => {
    expect(newNode({ a: 1, b: 'x' })).toEqual(jsonNode('{"a":1,"b":"x"}'));
    expect(newNode([1, 2])).toEqual(jsonNode('[1,2]'));
    expect(newNode(new Set([1, 2]))).toEqual(jsonNode('[1,2]'));
    expect(newNode(new Map([['a', 1]]))).toEqual(jsonNode('{"a":1}'));

    const bare: Record<string, unknown> = Object.create(null);
    bare.k = 'v';
    expect(newNode(bare)).toEqual(jsonNode('{"k":"v"}'));
  });

  it('degrades unsupported values to Undefined', () => {
    expect(newNode(() => 1)).toBe(UNDEFINED);
    expect(newNode(Symbol('s'))).toBe(UNDEFINED);
    expect(newNode(new Date(0))).toBe(UNDEFINED);
    expect(newNode(new Map([[1, 'a']]))).toBe(UNDEFINED);

    class Reading {
      constructor(public readonly value: number) {}
    }
    expect(newNode(new Reading(1))).toBe(UNDEFINED);
  });

  it('degrades values that cannot be serialized', () => {
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    expect(newNode(cyclic)).toBe(UNDEFINED);
    expect(newNode({ n: 1n })).toBe(UNDEFINED);
  });
});
