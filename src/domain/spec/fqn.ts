/**
 * Fully-qualified names.
 *
 * Grammar: `[namespace.]name[+aggrfn]`, e.g. `default.clicks`, `ads.clicks+sum`.
 * A parsed FQN always carries a namespace once normalized.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../../runtime/brand.js';
import { AggrFn, parseAggrFn } from './aggregation.js';
import { NAME_PATTERN } from './schemas.js';
import { type SpecError, SpecErr } from './spec-error.js';

export type Fqn = Brand<string, 'Fqn'>;

export interface ParsedFqn {
  readonly namespace?: string;
  readonly name: string;
  readonly aggrFn?: AggrFn;
}

export function parseFqn(text: string): Result<ParsedFqn, SpecError> {
  const plus = text.indexOf('+');
  const base = plus === -1 ? text : text.slice(0, plus);
  const suffix = plus === -1 ? undefined : text.slice(plus + 1);

  const parts = base.split('.');
  if (parts.length > 2) {
    return err(SpecErr.invalidFqn(text, 'expected [namespace.]name[+aggrfn]'));
  }

  const [first, second] = parts;
  const name = second ?? first ?? '';
  const namespace = second === undefined ? undefined : first;

  if (!NAME_PATTERN.test(name)) {
    return err(SpecErr.invalidFqn(text, `invalid name '${name}'`));
  }
  if (namespace !== undefined && !NAME_PATTERN.test(namespace)) {
    return err(SpecErr.invalidFqn(text, `invalid namespace '${namespace}'`));
  }

  if (suffix === undefined) {
    return ok(namespace === undefined ? { name } : { namespace, name });
  }

  const aggrFn = parseAggrFn(suffix);
  if (aggrFn === AggrFn.Unknown) {
    return err(SpecErr.invalidFqn(text, `unknown aggregation '${suffix}'`));
  }
  return ok(namespace === undefined ? { name, aggrFn } : { namespace, name, aggrFn });
}

export function formatFqn(namespace: string, name: string, aggrFn?: AggrFn): Fqn {
  const base = `${namespace}.${name}`;
  return (aggrFn === undefined ? base : `${base}+${aggrFn}`) as Fqn;
}

/** Canonical form of `text`, with `defaultNamespace` filled in when missing. */
export function normalizeFqn(text: string, defaultNamespace: string): Result<Fqn, SpecError> {
  return parseFqn(text).map((parsed) =>
    formatFqn(parsed.namespace ?? defaultNamespace, parsed.name, parsed.aggrFn)
  );
}

/** The FQN without its aggregation suffix. */
export function baseFqnOf(parsed: ParsedFqn, defaultNamespace: string): Fqn {
  return formatFqn(parsed.namespace ?? defaultNamespace, parsed.name);
}
