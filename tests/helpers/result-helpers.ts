/**
 * Test helpers for Result types.
 *
 * Unwrap a Result in a test, failing with the other branch printed.
 */

import type { Result } from 'neverthrow';

/**
 * Unwrap the Ok value, throw if Err.
 *
 * @example
 * const handle = expectOk(lab.register(draft, input), 'registering clicks');
 * expect(handle.spec.fqn).toBe('default.clicks');
 */
export function expectOk<T, E>(result: Result<T, E>, context: string): T {
  if (result.isErr()) {
    throw new Error(`Expected Ok in ${context}, but got Err:\n${describe(result.error)}`);
  }
  return result.value;
}

/**
 * Unwrap the Err value, throw if Ok.
 *
 * @example
 * const error = expectErr(lab.register(draft, input), 'registering without staleness');
 * expect(error.cause.code).toBe('MISSING_STALENESS');
 */
export function expectErr<T, E>(result: Result<T, E>, context: string): E {
  if (result.isOk()) {
    throw new Error(`Expected Err in ${context}, but got Ok:\n${describe(result.value)}`);
  }
  return result.error;
}

function describe(value: unknown): string {
  if (typeof value === 'function') return `[function ${value.name}]`;
  try {
    return JSON.stringify(value, null, 2);
  } catch {
    return String(value);
  }
}
