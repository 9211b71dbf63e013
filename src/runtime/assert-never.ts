/**
 * Exhaustiveness helper for discriminated unions.
 * Use in `switch` statements so a new union member fails at compile time.
 */
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${JSON.stringify(x)}`);
}
