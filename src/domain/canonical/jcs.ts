import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { JsonObject, JsonValue } from './json-types.js';

export type CanonicalJsonError =
  | { readonly code: 'CANONICAL_JSON_UNSUPPORTED_VALUE'; readonly message: string }
  | { readonly code: 'CANONICAL_JSON_NON_FINITE_NUMBER'; readonly message: string };

/**
 * RFC 8785 JSON Canonicalization Scheme (JCS) rendering.
 *
 * - Objects: keys sorted by UTF-16 code units (JS default sort).
 * - Arrays: order preserved.
 * - Numbers: NaN/Infinity rejected; -0 rendered as 0.
 * - Strings: JSON.stringify escaping.
 *
 * Manifests are rendered through this so the same spec always exports the
 * same text.
 */
export function toCanonicalJson(value: JsonValue): Result<string, CanonicalJsonError> {
  switch (typeof value) {
    case 'string':
      return ok(JSON.stringify(value));
    case 'number':
      return renderNumber(value);
    case 'boolean':
      return ok(value ? 'true' : 'false');
    case 'object':
      if (value === null) return ok('null');
      if (isJsonArray(value)) return renderArray(value);
      return renderObject(value);
    default:
      return err({
        code: 'CANONICAL_JSON_UNSUPPORTED_VALUE',
        message: `Unsupported JSON value type: ${typeof value}`,
      });
  }
}

function isJsonArray(value: readonly JsonValue[] | JsonObject): value is readonly JsonValue[] {
  return Array.isArray(value);
}

function renderNumber(value: number): Result<string, CanonicalJsonError> {
  if (!Number.isFinite(value)) {
    return err({
      code: 'CANONICAL_JSON_NON_FINITE_NUMBER',
      message: `Non-finite numbers are not allowed in canonical JSON: ${String(value)}`,
    });
  }
  return ok(JSON.stringify(Object.is(value, -0) ? 0 : value));
}

function renderArray(values: readonly JsonValue[]): Result<string, CanonicalJsonError> {
  const parts: string[] = [];
  for (const v of values) {
    const r = toCanonicalJson(v);
    if (r.isErr()) return err(r.error);
    parts.push(r.value);
  }
  return ok(`[${parts.join(',')}]`);
}

function renderObject(obj: JsonObject): Result<string, CanonicalJsonError> {
  const parts: string[] = [];
  for (const key of Object.keys(obj).sort()) {
    const entry = obj[key];
    // undefined members are omitted, as JSON.stringify does
    if (entry === undefined) continue;
    const rendered = toCanonicalJson(entry);
    if (rendered.isErr()) return err(rendered.error);
    parts.push(`${JSON.stringify(key)}:${rendered.value}`);
  }
  return ok(`{${parts.join(',')}}`);
}
