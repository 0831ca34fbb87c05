/**
 * flowql REPL (簡易)
 *
 * 目的:
 * - 1行の SELECT 文を入力し、各レコードへの適用結果を即時表示する。:q で終了。
 * - データは --data に相当する環境変数 FLOWQL_DATA から読み込む（JSON配列）。
 *
 * 使い方:
 *   FLOWQL_DATA=examples/readings.json npm run flowql -- repl
 *
 * コマンド:
 *   :q              終了
 *   :mode ast       出力モードを AST に変更
 *   :mode result    出力モードを 結果（デフォルト）に変更
 *   :lenient on|off 未知の関数を undefined として扱うかの切替
 */

import process from 'node:process';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import { parse } from '../parser/index.ts';
import { execute, windowOf } from '../eval/execute.ts';
import { FlowqlError } from '../errors/errors.ts';
import { astReplacer } from './output.ts';
import { loadRecords } from './records.ts';

type Mode = 'result' | 'ast';

export async function startRepl(): Promise<void> {
  const dataPath = process.env.FLOWQL_DATA;
  if (!dataPath) {
    console.error('REPL error: FLOWQL_DATA environment variable is required (path to JSON array).');
    process.exit(1);
  }
  const records = await loadRecords(dataPath);

  let mode: Mode = 'result';
  let lenient = false;

  const rl = readline.createInterface({ input, output, prompt: 'flowql> ' });
  rl.prompt();

  for await (const line of rl) {
    const text = line.trim();
    if (text === '') { rl.prompt(); continue; }
    if (text === ':q') { break; }

    // 設定コマンド
    if (text.startsWith(':mode ')) {
      const m = text.slice(6).trim();
      if (m === 'result' || m === 'ast') {
        mode = m;
        console.log(`mode = ${mode}`);
      } else {
        console.log('usage: :mode result|ast');
      }
      rl.prompt();
      continue;
    }
    if (text.startsWith(':lenient ')) {
      const v = text.slice(9).trim();
      if (v === 'on') lenient = true;
      else if (v === 'off') lenient = false;
      else console.log('usage: :lenient on|off');
      console.log(`lenient = ${lenient}`);
      rl.prompt();
      continue;
    }

    try {
      const { ast } = parse(text);
      if (mode === 'ast') {
        console.log(JSON.stringify(ast, astReplacer, 2));
      } else {
        const window = windowOf(ast);
        if (window.kind !== 'NONE') {
          console.log(`window = ${window.kind}(length=${window.length}, interval=${window.interval})`);
        }
        const out = records
          .map((r) => execute(ast, r, { strictFunctions: !lenient }))
          .filter((r): r is string => r !== null);
        console.log(`count = ${out.length}`);
        for (const r of out.slice(0, 5)) console.log(r);
      }
    } catch (err: unknown) {
      // 入力ミスで REPL を終わらせない。既知のエラーはコード付きで表示する
      if (err instanceof FlowqlError) console.error(`REPL error [${err.code}]: ${err.message}`);
      else throw err;
    }

    rl.prompt();
  }

  rl.close();
}
