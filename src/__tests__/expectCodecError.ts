import { expect } from 'vitest';
import { isCodecError, type ErrorCode } from '../shared/index.js';

export function expectCodecError(fn: () => unknown, code: ErrorCode, message?: RegExp): void {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(isCodecError(caught)).toBe(true);
  if (isCodecError(caught)) {
    expect(caught.code).toBe(code);
    if (message) expect(caught.message).toMatch(message);
  }
}
