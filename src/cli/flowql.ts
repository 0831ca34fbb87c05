/// <reference types="node" />
/**
 * flowql CLI
 *
 * 目的:
 * - SELECT 文を JSON 配列の各レコードに適用し、出力レコードを 1 行ずつ表示する。
 * - データ (--data) を先に読み込んで検査し、その後でクエリを --query／--query-file／STDIN から読む。
 *
 * 使い方:
 *   echo 'SELECT temp AS t FROM sensors WHERE temp > 20' | flowql --data examples/readings.json
 *   flowql --data examples/readings.json --query-file q.sql --print ast
 *   flowql repl   // 対話モード（簡易REPL）
 *
 * オプション:
 *   --data <path>            JSON配列のデータファイル（必須）
 *   --query "<select>"       クエリ文字列（--query-file と排他）
 *   --query-file <path>      クエリを含むテキストファイル
 *   --print ast|result       出力内容（既定: result）
 *   --lenient                未知の関数を undefined として扱う
 *
 * 終了コード: 0 = 正常、1 = 実行時エラー、2 = 引数の誤り
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import { parse } from '../parser/index.ts';
import { execute, windowOf } from '../eval/execute.ts';
import { FlowqlError } from '../errors/errors.ts';
import { astReplacer } from './output.ts';
import { loadRecords } from './records.ts';

// クエリの入手元
type QuerySource = { kind: 'inline'; text: string } | { kind: 'file'; path: string } | { kind: 'stdin' };

type Command =
  | { cmd: 'repl' }
  | { cmd: 'run'; data: string; query: QuerySource; print: 'ast' | 'result'; lenient: boolean };

const VALUE_FLAGS = ['--data', '--query', '--query-file', '--print'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(flag: string): flag is ValueFlag {
  return VALUE_FLAGS.some((f) => f === flag);
}

function printHelp(): void {
  console.log(`flowql CLI

Usage:
  echo 'SELECT * FROM sensors WHERE temp > 20' | flowql --data readings.json
  flowql --data readings.json --query-file query.sql --print ast
  flowql repl

Options:
  --data <path>            JSON array file (required for run)
  --query "<select>"       Inline query string
  --query-file <path>      File containing the query
  --print ast|result       Output mode (default: result)
  --lenient                Unknown functions yield undefined instead of failing
`);
}

function usageError(message: string): never {
  console.error(`flowql: ${message}`);
  printHelp();
  process.exit(2);
}

function parseArgs(argv: readonly string[]): Command {
  const rest = argv.slice(2);
  // サブコマンド風に "repl" を認識
  if (rest[0] === 'repl') return { cmd: 'repl' };

  const values = new Map<ValueFlag, string>();
  let lenient = false;
  for (let i = 0; i < rest.length; i++) {
    const flag = rest[i] ?? '';
    if (flag === '--lenient') {
      lenient = true;
    } else if (flag === '--help' || flag === '-h') {
      printHelp();
      process.exit(0);
    } else if (isValueFlag(flag)) {
      const value = rest[++i];
      if (value === undefined || value.startsWith('--')) usageError(`${flag} requires a value`);
      if (values.has(flag)) usageError(`${flag} given more than once`);
      values.set(flag, value);
    } else {
      usageError(`unknown option ${flag}`);
    }
  }

  const data = values.get('--data');
  if (data === undefined) usageError('--data <path> is required');

  const print = values.get('--print') ?? 'result';
  if (print !== 'ast' && print !== 'result') usageError(`--print must be "ast" or "result" (got "${print}")`);

  const text = values.get('--query');
  const file = values.get('--query-file');
  if (text !== undefined && file !== undefined) usageError('--query and --query-file are mutually exclusive');
  const query: QuerySource =
    text !== undefined ? { kind: 'inline', text } : file !== undefined ? { kind: 'file', path: file } : { kind: 'stdin' };

  return { cmd: 'run', data, query, print, lenient };
}

async function readQuery(source: QuerySource): Promise<string> {
  switch (source.kind) {
    case 'inline':
      return source.text;
    case 'file':
      return fs.readFile(path.resolve(source.path), 'utf8');
    case 'stdin': {
      if (process.stdin.isTTY) usageError('--query or --query-file is required when STDIN is a terminal');
      let buf = '';
      process.stdin.setEncoding('utf8');
      for await (const chunk of process.stdin) buf += chunk;
      return buf;
    }
  }
}

async function run(command: Extract<Command, { cmd: 'run' }>): Promise<void> {
  // データの誤りは STDIN を待つ前に報告する
  const records = await loadRecords(command.data);
  const query = (await readQuery(command.query)).trim();
  if (query === '') usageError('query is empty');

  const { ast } = parse(query);
  if (command.print === 'ast') {
    console.log(JSON.stringify(ast, astReplacer, 2));
    return;
  }

  const window = windowOf(ast);
  if (window.kind !== 'NONE') {
    console.error(`flowql: ${window.kind} window (length=${window.length}, interval=${window.interval}) is not applied by the CLI`);
  }

  const options = { strictFunctions: !command.lenient };
  let matched = 0;
  for (const record of records) {
    const out = execute(ast, record, options);
    if (out === null) continue;
    matched++;
    console.log(out);
  }
  console.error(`flowql: ${matched}/${records.length} records matched`);
}

async function main(): Promise<void> {
  const command = parseArgs(process.argv);
  if (command.cmd === 'repl') {
    const { startRepl } = await import('./repl.ts');
    await startRepl();
    return;
  }
  await run(command);
}

main().catch((err: unknown) => {
  if (err instanceof FlowqlError) console.error(`flowql error [${err.code}]: ${err.message}`);
  else if (err instanceof Error) console.error(`flowql error: ${err.message}`);
  else console.error('flowql error:', err);
  process.exit(1);
});
