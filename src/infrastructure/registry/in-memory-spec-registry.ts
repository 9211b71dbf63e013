import { inject, singleton } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { FeatureSetSpec, FeatureSpec, Spec } from '../../domain/spec/feature-spec.js';
import { isFeatureSetSpec, isFeatureSpec } from '../../domain/spec/feature-spec.js';
import type { Fqn } from '../../domain/spec/fqn.js';
import { baseFqnOf, formatFqn, parseFqn } from '../../domain/spec/fqn.js';
import { type SpecError, SpecErr } from '../../domain/spec/spec-error.js';
import type { SpecRegistry } from '../../ports/spec-registry.port.js';

/**
 * In-process spec registry.
 *
 * Keyed by base FQN (`namespace.name`); derived aggregation FQNs
 * (`namespace.name+sum`) resolve to the base spec. A source name can be
 * shared across namespaces and kinds, so the name index keeps every FQN
 * declared under it and answers with the most recent one still present.
 * Insertion order is kept for listings and exports.
 */
@singleton()
export class InMemorySpecRegistry implements SpecRegistry {
  private readonly byFqn = new Map<Fqn, Spec>();
  private readonly bySrcName = new Map<string, Fqn[]>();
  private readonly exported = new Set<Fqn>();

  constructor(@inject(DI.Config.App) private readonly config: ValidatedConfig) {}

  registerSpec(spec: Spec): Result<void, SpecError> {
    const existing = this.byFqn.get(spec.fqn);
    if (existing !== undefined && this.config.registry.onConflict.kind === 'reject') {
      return err(SpecErr.specAlreadyExists(spec.fqn));
    }

    // Replacing keeps the original insertion slot.
    this.byFqn.set(spec.fqn, spec);
    this.forgetName(spec);
    this.bySrcName.set(spec.name, [...(this.bySrcName.get(spec.name) ?? []), spec.fqn]);
    return ok(undefined);
  }

  exportFeatureSet(fqn: string): Result<void, SpecError> {
    return this.specByFqn(fqn).andThen((spec) => {
      if (!isFeatureSetSpec(spec)) {
        return err(SpecErr.fqnNotFound(fqn));
      }
      this.exported.add(spec.fqn);
      return ok(undefined);
    });
  }

  specByFqn(fqn: string): Result<Spec, SpecError> {
    const parsed = parseFqn(fqn);
    if (parsed.isErr()) return err(parsed.error);

    const { namespace, name, aggrFn } = parsed.value;
    const defaultNamespace = this.config.specs.defaultNamespace;
    const spec = this.byFqn.get(baseFqnOf(parsed.value, defaultNamespace));
    if (spec === undefined) {
      return err(SpecErr.fqnNotFound(formatFqn(namespace ?? defaultNamespace, name, aggrFn)));
    }

    if (aggrFn !== undefined) {
      const declared = isFeatureSpec(spec) && spec.aggr !== undefined && spec.aggr.funcs.includes(aggrFn);
      if (!declared) return err(SpecErr.aggrFnNotDeclared(spec.fqn, aggrFn));
    }

    return ok(spec);
  }

  specBySrcName(name: string): Spec | undefined {
    const fqns = this.bySrcName.get(name);
    const latest = fqns?.[fqns.length - 1];
    return latest === undefined ? undefined : this.byFqn.get(latest);
  }

  hasSpec(fqn: string): boolean {
    return this.specByFqn(fqn).isOk();
  }

  unregister(fqn: string): boolean {
    const found = this.specByFqn(fqn);
    if (found.isErr()) return false;

    const spec = found.value;
    this.byFqn.delete(spec.fqn);
    this.exported.delete(spec.fqn);
    this.forgetName(spec);
    return true;
  }

  featureSpecs(): readonly FeatureSpec[] {
    return [...this.byFqn.values()].filter(isFeatureSpec);
  }

  featureSetSpecs(): readonly FeatureSetSpec[] {
    return [...this.byFqn.values()].filter(isFeatureSetSpec);
  }

  exportedFeatureSets(): readonly FeatureSetSpec[] {
    const sets: FeatureSetSpec[] = [];
    for (const fqn of this.exported) {
      const spec = this.byFqn.get(fqn);
      if (spec !== undefined && isFeatureSetSpec(spec)) sets.push(spec);
    }
    return sets;
  }

  private forgetName(spec: Spec): void {
    const remaining = (this.bySrcName.get(spec.name) ?? []).filter((fqn) => fqn !== spec.fqn);
    if (remaining.length === 0) {
      this.bySrcName.delete(spec.name);
    } else {
      this.bySrcName.set(spec.name, remaining);
    }
  }
}
