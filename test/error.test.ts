// test/error.test.ts
import { describe, it, expect } from 'vitest';
import { parse } from '../src/parser/index.ts';
import { updateJson } from '../src/json/update.ts';
import { evaluate } from '../src/eval/evaluator.ts';
import { failUnexpectedToken } from '../src/parser/parserErrors.ts';
import {
  FlowqlError,
  ParseError,
  JsonUpdateError,
  EvaluationError,
  formatLocation,
} from '../src/errors/errors.ts';
import { callExpr } from '../src/ast/builders.ts';
import { NULL, toType, stringNode } from '../src/value/node.ts';
import { newNode } from '../src/value/newNode.ts';
import { catchFlowql } from './helpers.ts';

describe('Error Handling', () => {
  it('every layer raises a FlowqlError subclass with its own name', () => {
    const parseErr = catchFlowql(() => parse('SELECT'));
    const jsonErr = catchFlowql(() => updateJson('{}', 'a', NULL));
    const evalErr = catchFlowql(() => evaluate(callExpr('f()', 'f', []), {}));

    expect(parseErr).toBeInstanceOf(ParseError);
    expect(parseErr.name).toBe('ParseError');
    expect(jsonErr).toBeInstanceOf(JsonUpdateError);
    expect(jsonErr.name).toBe('JsonUpdateError');
    expect(evalErr).toBeInstanceOf(EvaluationError);
    expect(evalErr.name).toBe('EvaluationError');
    for (const err of [parseErr, jsonErr, evalErr]) {
      expect(err).toBeInstanceOf(FlowqlError);
      expect(err).toBeInstanceOf(Error);
    }
  });

  it('uses the generic code by default', () => {
    expect(new ParseError('x').code).toBe('E_PARSE_GENERIC');
    expect(new JsonUpdateError('x').code).toBe('E_JSON_MALFORMED');
    expect(new EvaluationError('x').code).toBe('E_EVAL_GENERIC');
  });

  it('formats unexpected tokens with their location', () => {
    const err = catchFlowql(() => failUnexpectedToken({ image: 'x', startLine: 1, startColumn: 2 }, 'Identifier'));
    expect(err.code).toBe('E_PARSE_UNEXPECTED_TOKEN');
    expect(err.message).toBe("Unexpected token 'x' at 1:2. Expected Identifier.");
    expect(catchFlowql(() => failUnexpectedToken({ image: 'x' }, 'Identifier')).message).toBe(
      "Unexpected token 'x'. Expected Identifier.",
    );
  });

  it('formats locations only when both parts are known', () => {
    expect(formatLocation(3, 4)).toBe('3:4');
    expect(formatLocation(3)).toBe('');
    expect(formatLocation()).toBe('');
  });

  it('value conversion never throws', () => {
    expect(() => toType(stringNode('not a number'), 'Int')).not.toThrow();
    expect(() => newNode(() => 1)).not.toThrow();
  });
});
