/**
 * Explicit symbol table for reference resolution.
 *
 * Two tiers, mirroring a definition's lexical surroundings: bindings local
 * to the defining function, then module-level bindings. Locals shadow
 * globals.
 */
export interface SymbolScope {
  lookup(identifier: string): { readonly found: true; readonly value: unknown } | { readonly found: false };
}

export interface ScopeBindings {
  readonly locals?: Readonly<Record<string, unknown>>;
  readonly globals?: Readonly<Record<string, unknown>>;
}

export function createScope(bindings: ScopeBindings = {}): SymbolScope {
  const locals = new Map(Object.entries(bindings.locals ?? {}));
  const globals = new Map(Object.entries(bindings.globals ?? {}));

  return {
    lookup(identifier) {
      if (locals.has(identifier)) return { found: true, value: locals.get(identifier) };
      if (globals.has(identifier)) return { found: true, value: globals.get(identifier) };
      return { found: false };
    },
  };
}

export const EMPTY_SCOPE: SymbolScope = createScope();
