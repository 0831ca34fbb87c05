import { JsonUpdateError } from '../errors/errors.ts';

export function failUnsupportedValue(key: string, valueType: string): never {
  const msg = `Unsupported value type '${valueType}' for key '${key}'.`;
  throw new JsonUpdateError(msg, key, valueType, 'E_JSON_UNSUPPORTED_VALUE');
}

export function failKeyNotFound(key: string): never {
  throw new JsonUpdateError(`Key '${key}' not found in document.`, key, undefined, 'E_JSON_KEY_NOT_FOUND');
}

export function failMalformed(offset: number, expected: string): never {
  const msg = `Malformed JSON document at offset ${offset}: expected ${expected}.`;
  throw new JsonUpdateError(msg, undefined, undefined, 'E_JSON_MALFORMED');
}
