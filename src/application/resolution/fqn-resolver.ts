/**
 * FQN Resolver
 *
 * Turns a feature reference into the canonical FQN stored in specs.
 *
 * Two tiers:
 * - literal FQN strings are looked up in the registry directly
 * - symbols and handles are bound through the caller's scope and must carry
 *   a spec the registry knows
 *
 * Aggregated features fan out into one derived feature per function, so a
 * bare (symbol or handle) reference to one is ambiguous and rejected; a
 * literal must name the aggregation (`ns.name+sum`).
 *
 * Runs when a feature-set body is invoked or a program is compiled, never
 * when a draft is defined. Pure with respect to the registry (reads only).
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Spec } from '../../domain/spec/feature-spec.js';
import type { Fqn } from '../../domain/spec/fqn.js';
import { normalizeFqn, parseFqn } from '../../domain/spec/fqn.js';
import { type SpecError, SpecErr } from '../../domain/spec/spec-error.js';
import type { SpecRegistry } from '../../ports/spec-registry.port.js';
import type { FeatureHandle, FeatureReference } from '../handles.js';
import { isFeatureHandle, isSymbolRef } from '../handles.js';
import type { SymbolScope } from './symbol-scope.js';

export interface FqnResolver {
  resolve(ref: FeatureReference): Result<Fqn, SpecError>;
}

export interface FqnResolverDeps {
  readonly registry: SpecRegistry;
  readonly scope: SymbolScope;
  readonly defaultNamespace: string;
}

export function createFqnResolver(deps: FqnResolverDeps): FqnResolver {
  const { registry, scope, defaultNamespace } = deps;

  function resolveLiteral(text: string): Result<Fqn, SpecError> {
    const parsed = parseFqn(text);
    if (parsed.isErr()) return err(parsed.error);

    const found = registry.specByFqn(text);
    if (found.isErr()) return err(found.error);

    const spec = found.value;
    if (spec.kind === 'feature' && spec.aggr !== undefined && parsed.value.aggrFn === undefined) {
      return err(SpecErr.ambiguousAggregatedReference(spec.fqn));
    }
    return normalizeFqn(text, defaultNamespace);
  }

  function resolveBound(handle: FeatureHandle, onMissing: () => SpecError): Result<Fqn, SpecError> {
    const registered = registry.specByFqn(handle.spec.fqn);
    if (registered.isErr()) {
      return err(onMissing());
    }
    return rejectAggregated(registered.value);
  }

  return {
    resolve(ref) {
      if (typeof ref === 'string') {
        return resolveLiteral(ref);
      }

      if (isSymbolRef(ref)) {
        const binding = scope.lookup(ref.identifier);
        if (!binding.found || !isFeatureHandle(binding.value)) {
          return err(SpecErr.unresolvedSymbol(ref.identifier));
        }
        return resolveBound(binding.value, () => SpecErr.unresolvedSymbol(ref.identifier));
      }

      return resolveBound(ref, () => SpecErr.fqnNotFound(ref.spec.fqn));
    },
  };
}

function rejectAggregated(spec: Spec): Result<Fqn, SpecError> {
  if (spec.kind === 'feature' && spec.aggr !== undefined) {
    return err(SpecErr.ambiguousAggregatedReference(spec.fqn));
  }
  return ok(spec.fqn);
}
