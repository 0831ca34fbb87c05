// src/cli/output.ts
// CLI / REPL 共通の出力整形

// Int の bigint は JSON.stringify できないため文字列にする
export function astReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
