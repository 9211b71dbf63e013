/**
 * Brand helper for "parse, don't validate".
 *
 * A branded string proves a value went through a parser (an FQN, a duration)
 * before it reached a spec. Brands are erased at runtime.
 */
export type Brand<T, B extends string> = T & { readonly __brand: B };
