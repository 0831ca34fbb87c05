// src/cli/records.ts
// CLI / REPL 共通: JSON 配列ファイルを読み、各要素を execute に渡す JSON テキストへ変換する。

import fs from 'node:fs/promises';
import path from 'node:path';

export async function loadRecords(file: string): Promise<string[]> {
  const raw = await fs.readFile(path.resolve(file), 'utf8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new Error(`${file}: not valid JSON (${reason})`);
  }
  if (!Array.isArray(data)) throw new Error(`${file}: data must be a JSON array of records`);
  // 文字列化できない要素（undefined など）はレコードとして扱えない
  return data.map((record, i) => {
    const text = JSON.stringify(record);
    if (typeof text !== 'string') throw new Error(`${file}: record #${i} is not JSON-serializable`);
    return text;
  });
}
