// src/eval/path.ts
// JSONPathExpr.path の解決。書式はパーサーが出力する正規形:
//   name ( .name | ."quoted key" | [index] )*
// 先頭セグメントも ."..." を外した "quoted key" で書ける。

import { failGenericEval } from './evaluationErrors.ts';

export type PathSegment = string | number;

export type Resolved = { found: true; value: unknown } | { found: false };

const IDENT = /[A-Za-z_][A-Za-z0-9_]*/y;
const QUOTED = /"(?:[^\\"]|\\.)*"/y;
const INDEX = /\[(\d+)\]/y;

export function parsePath(path: string): PathSegment[] {
  const segments: PathSegment[] = [];
  let pos = 0;

  const key = (): void => {
    IDENT.lastIndex = pos;
    const ident = IDENT.exec(path);
    if (ident) {
      segments.push(ident[0]);
      pos = IDENT.lastIndex;
      return;
    }
    QUOTED.lastIndex = pos;
    const quoted = QUOTED.exec(path);
    if (!quoted) failGenericEval(`Invalid path '${path}' at offset ${pos}`);
    segments.push(decodeQuoted(quoted[0], path));
    pos = QUOTED.lastIndex;
  };

  key();
  while (pos < path.length) {
    if (path[pos] === '.') {
      pos++;
      key();
      continue;
    }
    INDEX.lastIndex = pos;
    const index = INDEX.exec(path);
    if (!index?.[1]) failGenericEval(`Invalid path '${path}' at offset ${pos}`);
    segments.push(Number(index[1]));
    pos = INDEX.lastIndex;
  }
  return segments;
}

function decodeQuoted(token: string, path: string): string {
  let value: unknown;
  try {
    value = JSON.parse(token);
  } catch {
    failGenericEval(`Invalid quoted key ${token} in path '${path}'`);
  }
  if (typeof value !== 'string') failGenericEval(`Invalid quoted key ${token} in path '${path}'`);
  return value;
}

// 途中で見つからなければ found: false（null 値とは区別する）
export function resolvePath(record: unknown, segments: readonly PathSegment[]): Resolved {
  let cur: unknown = record;
  for (const seg of segments) {
    if (typeof seg === 'number') {
      if (!Array.isArray(cur) || seg >= cur.length) return { found: false };
      cur = cur[seg];
    } else {
      if (!isRecord(cur) || !Object.hasOwn(cur, seg)) return { found: false };
      cur = cur[seg];
    }
  }
  return { found: true, value: cur };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
