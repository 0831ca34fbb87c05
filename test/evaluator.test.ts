// test/evaluator.test.ts
import { describe, it, expect } from 'vitest';
import { parseExpression } from '../src/parser/index.ts';
import { evaluate } from '../src/eval/evaluator.ts';
import type { EvaluateOptions } from '../src/eval/evaluator.ts';
import { switchExpr, caseExpr, jsonPath } from '../src/ast/builders.ts';
import { EvaluationError } from '../src/errors/errors.ts';
import { UNDEFINED, NULL, boolNode, intNode, floatNode, stringNode, jsonNode } from '../src/value/node.ts';
import type { Node } from '../src/value/types.ts';
import { catchFlowql } from './helpers.ts';

const record = {
  temp: 25,
  humidity: 40.5,
  name: 'dev-1',
  tags: ['a', 'b'],
  meta: { site: 'north', 'floor no': 3 },
  flag: true,
  nothing: null,
};

const run = (query: string, options?: EvaluateOptions): Node => evaluate(parseExpression(query).ast, record, options);

describe('evaluator: paths', () => {
  it('resolves fields through newNode', () => {
    expect(run('temp')).toEqual(intNode(25n));
    expect(run('humidity')).toEqual(floatNode(40.5));
    expect(run('meta.site')).toEqual(stringNode('north'));
    expect(run('meta."floor no"')).toEqual(intNode(3n));
    expect(run('tags[1]')).toEqual(stringNode('b'));
    expect(run('meta')).toEqual(jsonNode('{"site":"north","floor no":3}'));
    expect(run('nothing')).toEqual(NULL);
  });

  it('yields Undefined for missing fields', () => {
    expect(run('missing')).toBe(UNDEFINED);
    expect(run('tags[5]')).toBe(UNDEFINED);
    expect(run('name.first')).toBe(UNDEFINED);
  });

  it('wraps the whole record for the wildcard path', () => {
    expect(evaluate(jsonPath('*'), { a: 1 })).toEqual(jsonNode('{"a":1}'));
  });
});

describe('evaluator: operators', () => {
  it('keeps Int arithmetic in Int except division', () => {
    expect(run('temp + 5')).toEqual(intNode(30n));
    expect(run('temp - 30')).toEqual(intNode(-5n));
    expect(run('temp % 7')).toEqual(intNode(4n));
    expect(run('temp / 2')).toEqual(floatNode(12.5));
    expect(run('temp * 1.5')).toEqual(floatNode(37.5));
  });

  it('yields Undefined for an Int remainder by zero', () => {
    expect(run('temp % 0')).toBe(UNDEFINED);
  });

  it('concatenates strings with +', () => {
    expect(run('"a" + "b"')).toEqual(stringNode('ab'));
  });

  it('compares numbers across Int and Float, and strings by code unit', () => {
    expect(run('temp > 20')).toEqual(boolNode(true));
    expect(run('temp = 25.0')).toEqual(boolNode(true));
    expect(run('temp != 25')).toEqual(boolNode(false));
    expect(run('temp <> 24')).toEqual(boolNode(true));
    expect(run('name = "dev-1"')).toEqual(boolNode(true));
    expect(run('name < "dev-2"')).toEqual(boolNode(true));
    expect(run('nothing = null')).toEqual(boolNode(true));
  });

  it('propagates Undefined operands', () => {
    expect(run('missing + 1')).toBe(UNDEFINED);
    expect(run('missing > 1')).toBe(UNDEFINED);
  });

  it('short-circuits AND and OR', () => {
    expect(run('temp > 20 AND flag')).toEqual(boolNode(true));
    expect(run('false AND name')).toEqual(boolNode(false));
    expect(run('true OR missing')).toEqual(boolNode(true));
  });

  it('reports mismatched operand types', () => {
    const ordering = catchFlowql(() => run('name > 3'));
    expect(ordering).toBeInstanceOf(EvaluationError);
    expect(ordering.code).toBe('E_EVAL_TYPE_MISMATCH');
    expect(ordering.message).toBe("Type mismatch for '>': expected number|string, got String/Int.");

    expect(catchFlowql(() => run('name + 1')).message).toBe(
      "Type mismatch for '+': expected Int|Float, got String/Int.",
    );
    expect(catchFlowql(() => run('temp AND true')).message).toBe(
      "Type mismatch for 'AND': expected Bool, got Int.",
    );
  });
});

describe('evaluator: CASE', () => {
  it('returns the first matching case', () => {
    const expr = switchExpr(
      boolNode(true),
      [
        caseExpr(boolNode(false), stringNode('A')),
        caseExpr(boolNode(true), stringNode('B')),
        caseExpr(boolNode(true), stringNode('C')),
      ],
      NULL,
    );
    expect(evaluate(expr, record)).toEqual(stringNode('B'));
  });

  it('evaluates searched CASE in order', () => {
    const q = 'CASE WHEN temp > 30 THEN "hot" WHEN temp > 20 THEN "warm" ELSE "cold" END';
    expect(run(q)).toEqual(stringNode('warm'));
  });

  it('falls back to the default branch', () => {
    expect(run('CASE name WHEN "x" THEN 1 END')).toBe(NULL);
    expect(run('CASE temp WHEN 25.0 THEN "match" ELSE "no" END')).toEqual(stringNode('match'));
  });
});

describe('evaluator: functions', () => {
  it('provides the builtins', () => {
    expect(run('upper(name)')).toEqual(stringNode('DEV-1'));
    expect(run('lower("AbC")')).toEqual(stringNode('abc'));
    expect(run('length(tags)')).toEqual(intNode(2n));
    expect(run('length(meta)')).toEqual(intNode(2n));
    expect(run('length(name)')).toEqual(intNode(5n));
    expect(run('concat(name, ":", temp)')).toEqual(stringNode('dev-1:25'));
    expect(run('abs(-3)')).toEqual(intNode(3n));
    expect(run('abs(-2.5)')).toEqual(floatNode(2.5));
    expect(run('coalesce(missing, nothing, "d")')).toEqual(stringNode('d'));
  });

  it('converts through the value model', () => {
    expect(run('to_int("42")')).toEqual(intNode(42n));
    expect(run('to_number("2.5")')).toEqual(floatNode(2.5));
    expect(run('to_string(1.5)')).toEqual(stringNode('1.500000'));
    expect(run('to_bool("t")')).toEqual(boolNode(true));
    expect(run('to_float(flag)')).toBe(UNDEFINED);
  });

  it('looks functions up case-insensitively', () => {
    expect(run('UPPER(name)')).toEqual(stringNode('DEV-1'));
  });

  it('checks arity', () => {
    const err = catchFlowql(() => run('upper(name, name)'));
    expect(err.code).toBe('E_EVAL_GENERIC');
    expect(err.message).toBe("Function 'upper' expects 1 argument(s), got 2.");
  });

  it('rejects unknown functions unless lenient', () => {
    const err = catchFlowql(() => run('nope(1)'));
    expect(err.code).toBe('E_EVAL_UNKNOWN_FUNCTION');
    expect(err.message).toBe("Unknown function 'nope'.");
    expect(run('nope(1)', { strictFunctions: false })).toBe(UNDEFINED);
  });

  it('accepts custom functions', () => {
    const options: EvaluateOptions = {
      functions: {
        DOUBLE: (args) => {
          const [a] = args;
          return a?.type === 'Int' ? intNode(a.value * 2n) : UNDEFINED;
        },
      },
    };
    expect(run('double(temp)', options)).toEqual(intNode(50n));
    expect(run('Double(name)', options)).toBe(UNDEFINED);
  });
});
