// test/json.test.ts
import { describe, it, expect } from 'vitest';
import { updateJson, setJsonKey, toWireString, toBytesWithWrapString } from '../src/json/update.ts';
import { scanObject } from '../src/json/scanner.ts';
import { JsonUpdateError } from '../src/errors/errors.ts';
import { UNDEFINED, NULL, boolNode, intNode, floatNode, stringNode, arrayNode, jsonNode } from '../src/value/node.ts';
import { catchFlowql } from './helpers.ts';

describe('updateJson', () => {
  it('replaces one value and leaves the rest byte-for-byte', () => {
    expect(updateJson('{"a":1,"b":2}', 'b', intNode(5n))).toBe('{"a":1,"b":5}');
  });

  it('keeps whitespace and key order around the replaced value', () => {
    const doc = '{ "a" : 1 , "b" : [1, 2] }';
    expect(updateJson(doc, 'b', stringNode('x'))).toBe('{ "a" : 1 , "b" : "x" }');
  });

  it('writes scalars with their String() text', () => {
    expect(updateJson('{"t":0}', 't', floatNode(21.5))).toBe('{"t":21.500000}');
    expect(updateJson('{"ok":false}', 'ok', boolNode(true))).toBe('{"ok":true}');
  });

  it('embeds JSON values as raw text', () => {
    expect(updateJson('{"meta":null}', 'meta', jsonNode('{"v":1}'))).toBe('{"meta":{"v":1}}');
  });

  it('wraps strings in quotes without escaping them', () => {
    expect(updateJson('{"s":""}', 's', stringNode('a"b'))).toBe('{"s":"a"b"}');
  });

  it('replaces the whole document for an empty key', () => {
    expect(updateJson('{"a":1}', '', jsonNode('{"x":9}'))).toBe('{"x":9}');
    expect(updateJson('not json at all', '', jsonNode('{"x":9}'))).toBe('{"x":9}');
  });

  it('matches keys after unescaping', () => {
    expect(updateJson('{"a\\u0062":1}', 'ab', intNode(2n))).toBe('{"a\\u0062":2}');
  });

  it('updates the first of duplicate keys', () => {
    expect(updateJson('{"k":1,"k":2}', 'k', intNode(9n))).toBe('{"k":9,"k":2}');
  });

  it('skips brackets inside nested strings', () => {
    expect(updateJson('{"a":{"b":"}"},"c":3}', 'c', intNode(4n))).toBe('{"a":{"b":"}"},"c":4}');
  });

  it('rejects values it cannot embed', () => {
    for (const value of [NULL, UNDEFINED, arrayNode('[1]')]) {
      const err = catchFlowql(() => updateJson('{"a":1}', 'a', value));
      expect(err).toBeInstanceOf(JsonUpdateError);
      expect(err.code).toBe('E_JSON_UNSUPPORTED_VALUE');
      expect(err).toHaveProperty('valueType', value.type);
    }
  });

  it('reports a missing key', () => {
    const err = catchFlowql(() => updateJson('{"a":1}', 'zz', intNode(1n)));
    expect(err.code).toBe('E_JSON_KEY_NOT_FOUND');
    expect(err.message).toBe("Key 'zz' not found in document.");
    expect(err).toHaveProperty('key', 'zz');
  });

  it('reports malformed documents', () => {
    expect(catchFlowql(() => updateJson('{"a":}', 'a', intNode(1n))).message).toBe(
      'Malformed JSON document at offset 5: expected value.',
    );
    expect(catchFlowql(() => updateJson('{"a":1} x', 'a', intNode(1n))).code).toBe('E_JSON_MALFORMED');
    expect(catchFlowql(() => updateJson('[1,2]', 'a', intNode(1n))).code).toBe('E_JSON_MALFORMED');
    expect(catchFlowql(() => updateJson('{"a":"open', 'a', intNode(1n))).code).toBe('E_JSON_MALFORMED');
  });
});

describe('setJsonKey', () => {
  it('inserts into an empty object', () => {
    expect(setJsonKey('{}', 'a', intNode(1n))).toBe('{"a":1}');
    expect(setJsonKey('{ }', 'a', boolNode(true))).toBe('{ "a":true}');
  });

  it('appends after the last member', () => {
    expect(setJsonKey('{"a":1}', 'b', stringNode('x'))).toBe('{"a":1,"b":"x"}');
  });

  it('replaces an existing member', () => {
    expect(setJsonKey('{"a":1}', 'a', NULL)).toBe('{"a":null}');
  });

  it('quotes keys as JSON strings', () => {
    expect(setJsonKey('{}', 'say "hi"', intNode(1n))).toBe('{"say \\"hi\\"":1}');
  });

  it('escapes String values so the document stays valid JSON', () => {
    const doc = setJsonKey('{}', 's', stringNode('a"b\nc'));
    expect(doc).toBe('{"s":"a\\"b\\nc"}');
    expect(setJsonKey(doc, 'n', intNode(1n))).toBe('{"s":"a\\"b\\nc","n":1}');
    expect(JSON.parse(doc)).toEqual({ s: 'a"b\nc' });
  });

  it('rejects Undefined', () => {
    expect(catchFlowql(() => setJsonKey('{}', 'a', UNDEFINED)).code).toBe('E_JSON_UNSUPPORTED_VALUE');
  });
});

describe('wire serializer', () => {
  it('quotes strings and passes JSON through', () => {
    expect(toWireString(stringNode('x'))).toBe('"x"');
    expect(toWireString(jsonNode('{"a":1}'))).toBe('{"a":1}');
    expect(toWireString(intNode(3n))).toBe('3');
    expect(toWireString(NULL)).toBe('null');
    expect(toWireString(floatNode(1))).toBe('1.000000');
  });

  it('encodes as UTF-8 bytes', () => {
    expect(Array.from(toBytesWithWrapString(stringNode('hé')))).toEqual([34, 104, 195, 169, 34]);
  });
});

describe('scanObject', () => {
  it('locates every member value', () => {
    const layout = scanObject('{"a":1, "b":"x"}');
    expect(layout.open).toBe(0);
    expect(layout.close).toBe(15);
    expect(layout.members).toEqual([
      { key: 'a', keyStart: 1, valueStart: 5, valueEnd: 6 },
      { key: 'b', keyStart: 8, valueStart: 12, valueEnd: 15 },
    ]);
  });
});
