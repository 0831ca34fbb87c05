// test/helpers.ts
import { FlowqlError } from '../src/errors/errors.ts';

// 例外を捕まえて返す。FlowqlError 以外や、何も投げられなかった場合はテスト失敗
export function catchFlowql(fn: () => unknown): FlowqlError {
  try {
    fn();
  } catch (e) {
    if (e instanceof FlowqlError) return e;
    throw e;
  }
  throw new Error('FlowqlError was not thrown');
}
