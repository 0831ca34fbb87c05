// src/json/scanner.ts
// トップレベルのオブジェクトだけを走査し、各メンバーの値の位置（半開区間）を求める最小スキャナ。
// 入れ子の値は括弧の対応と文字列だけを見て読み飛ばし、中身の妥当性は検査しない。

import { failMalformed } from './jsonErrors.ts';

export interface MemberSpan {
  // JSON 文字列としてデコード済みのキー
  key: string;
  keyStart: number;
  valueStart: number;
  valueEnd: number;
}

export interface ObjectLayout {
  open: number;
  close: number;
  members: MemberSpan[];
}

const LITERAL = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?|true|false|null/y;

class Scanner {
  public pos = 0;
  constructor(private readonly text: string) {}

  peek(): string {
    return this.text.charAt(this.pos);
  }

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  skipWhitespace(): void {
    while (!this.atEnd()) {
      const c = this.peek();
      if (c !== ' ' && c !== '\t' && c !== '\n' && c !== '\r') return;
      this.pos++;
    }
  }

  expect(ch: string, expected: string): void {
    if (this.peek() !== ch) failMalformed(this.pos, expected);
    this.pos++;
  }

  skipString(): void {
    this.expect('"', 'string');
    while (!this.atEnd()) {
      const c = this.peek();
      if (c === '\\') {
        this.pos += 2;
      } else if (c === '"') {
        this.pos++;
        return;
      } else {
        this.pos++;
      }
    }
    failMalformed(this.pos, 'closing quote');
  }

  skipValue(): void {
    const c = this.peek();
    if (c === '"') return this.skipString();
    if (c === '{' || c === '[') return this.skipContainer();
    LITERAL.lastIndex = this.pos;
    const m = LITERAL.exec(this.text);
    if (!m) failMalformed(this.pos, 'value');
    this.pos += m[0].length;
  }

  private skipContainer(): void {
    const closers: string[] = [];
    while (!this.atEnd()) {
      const c = this.peek();
      if (c === '"') {
        this.skipString();
        continue;
      }
      if (c === '{') closers.push('}');
      else if (c === '[') closers.push(']');
      else if (c === '}' || c === ']') {
        if (closers.pop() !== c) failMalformed(this.pos, 'matching bracket');
        if (closers.length === 0) {
          this.pos++;
          return;
        }
      }
      this.pos++;
    }
    failMalformed(this.pos, 'closing bracket');
  }
}

function decodeKey(token: string, offset: number): string {
  let key: unknown;
  try {
    key = JSON.parse(token);
  } catch {
    failMalformed(offset, 'valid string key');
  }
  if (typeof key !== 'string') failMalformed(offset, 'string key');
  return key;
}

export function scanObject(doc: string): ObjectLayout {
  const s = new Scanner(doc);
  const members: MemberSpan[] = [];

  s.skipWhitespace();
  const open = s.pos;
  s.expect('{', "'{'");
  s.skipWhitespace();

  let close: number;
  if (s.peek() === '}') {
    close = s.pos;
    s.pos++;
  } else {
    for (;;) {
      s.skipWhitespace();
      const keyStart = s.pos;
      s.skipString();
      const key = decodeKey(doc.slice(keyStart, s.pos), keyStart);
      s.skipWhitespace();
      s.expect(':', "':'");
      s.skipWhitespace();
      const valueStart = s.pos;
      s.skipValue();
      members.push({ key, keyStart, valueStart, valueEnd: s.pos });
      s.skipWhitespace();
      const c = s.peek();
      if (c === ',') {
        s.pos++;
        continue;
      }
      if (c === '}') {
        close = s.pos;
        s.pos++;
        break;
      }
      failMalformed(s.pos, "',' or '}'");
    }
  }

  s.skipWhitespace();
  if (!s.atEnd()) failMalformed(s.pos, 'end of document');
  return { open, close, members };
}

// 重複キーは先勝ち
export function findMember(layout: ObjectLayout, key: string): MemberSpan | undefined {
  return layout.members.find((m) => m.key === key);
}
