// src/ast/window.ts
// ストリーミングのウィンドウ記述子。ここでは設定値として保持するだけで、
// バケット割り当て・発火・ウォーターマークは実行系が担う。
//
// - TUMBLING: interval == length。重ならない固定幅
// - HOPPING:  interval < length。interval ごとに進み、重なり合う
// - SLIDING:  イベントごとに再評価。interval は 0
// - SESSION:  interval は無通信ギャップ。length はセッションの最大幅

import type { Window } from './types.ts';

export type WindowKind = 'NONE' | 'TUMBLING' | 'HOPPING' | 'SLIDING' | 'SESSION';

export const WINDOW_KINDS: readonly WindowKind[] = ['NONE', 'TUMBLING', 'HOPPING', 'SLIDING', 'SESSION'];

export function isWindowKind(text: string): text is WindowKind {
  return WINDOW_KINDS.some((kind) => kind === text);
}

function windowOf(kind: WindowKind, length: number, interval: number): Window {
  return Object.freeze({ type: 'Window', kind, length, interval });
}

export function noWindow(): Window {
  return windowOf('NONE', 0, 0);
}

export function tumblingWindow(length: number): Window {
  return windowOf('TUMBLING', length, length);
}

export function hoppingWindow(length: number, interval: number): Window {
  return windowOf('HOPPING', length, interval);
}

export function slidingWindow(length: number): Window {
  return windowOf('SLIDING', length, 0);
}

export function sessionWindow(length: number, gap: number): Window {
  return windowOf('SESSION', length, gap);
}

/**
 * 種別ごとの length / interval の組み合わせを検査し、問題があれば理由を返す。
 * ウィンドウ自体は検査しないデータなので、呼び出すかどうかは構築側（パーサー）が決める。
 */
export function checkWindow(window: Window): string | undefined {
  const { kind, length, interval } = window;
  if (kind === 'NONE') return undefined;
  if (!Number.isInteger(length) || length <= 0) return `${kind} window length must be a positive integer`;
  if (!Number.isInteger(interval) || interval < 0) return `${kind} window interval must be a non-negative integer`;
  switch (kind) {
    case 'TUMBLING':
      return interval === length ? undefined : 'TUMBLING window interval must equal its length';
    case 'HOPPING':
      return interval > 0 && interval < length ? undefined : 'HOPPING window interval must be between 1 and length - 1';
    case 'SLIDING':
      return interval === 0 ? undefined : 'SLIDING window takes no interval';
    case 'SESSION':
      return interval > 0 ? undefined : 'SESSION window requires a positive gap';
  }
}
