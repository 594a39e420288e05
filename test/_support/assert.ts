import { IdnaCodecError } from "../../src/core/error.ts";
import type { IdnaCodecErrorCode } from "../../src/core/error.ts";

export function assertOk(value: unknown, message?: string): void {
  if (!value) {
    throw new Error(message ?? "Assertion failed");
  }
}

export function assertEqual<T>(actual: T, expected: T, message?: string): void {
  if (actual !== expected) {
    throw new Error(message ?? `Expected ${String(expected)}, got ${String(actual)}`);
  }
}

export function assertDeepEqual(actual: unknown, expected: unknown, message?: string): void {
  if (!deepEqual(actual, expected)) {
    throw new Error(
      message ?? `Deep equal assertion failed: ${safeJson(actual)} !== ${safeJson(expected)}`,
    );
  }
}

/**
 * Run fn and require it to throw IdnaCodecError with the given code.
 */
export function assertThrowsCode(
  fn: () => unknown,
  code: IdnaCodecErrorCode,
  message?: string,
): IdnaCodecError {
  try {
    fn();
  } catch (error) {
    if (error instanceof IdnaCodecError && error.code === code) return error;
    throw new Error(message ?? `Expected IdnaCodecError(${code}), got ${String(error)}`);
  }
  throw new Error(message ?? `Expected IdnaCodecError(${code}), nothing was thrown`);
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function deepEqual(leftValue: unknown, rightValue: unknown): boolean {
  if (Object.is(leftValue, rightValue)) return true;
  if (typeof leftValue !== "object" || typeof rightValue !== "object") return false;
  if (leftValue === null || rightValue === null) return false;

  if (Array.isArray(leftValue) && Array.isArray(rightValue)) {
    if (leftValue.length !== rightValue.length) return false;
    return leftValue.every((item, index) => deepEqual(item, rightValue[index]));
  }
  if (Array.isArray(leftValue) || Array.isArray(rightValue)) return false;

  const entriesA = Object.entries(leftValue).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const entriesB = Object.entries(rightValue).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (entriesA.length !== entriesB.length) return false;
  return entriesA.every(([key, value], index) => {
    const other = entriesB[index];
    return other !== undefined && other[0] === key && deepEqual(value, other[1]);
  });
}
