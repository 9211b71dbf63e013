import type { Result } from 'neverthrow';
import type { FeatureSetSpec, FeatureSpec, Spec } from '../domain/spec/feature-spec.js';
import type { SpecError } from '../domain/spec/spec-error.js';

/**
 * Spec registry port.
 *
 * Process-wide store of published specs, keyed by source name and by FQN.
 *
 * Guarantees:
 * - Single writer: specs are published sequentially while definitions load
 * - `registerSpec` either publishes fully or leaves the registry unchanged
 * - Lookups are read-only
 *
 * Lifetime: one instance per DI container (per process).
 */
export interface SpecRegistry {
  /** Publish a spec under its source name and FQN. */
  registerSpec(spec: Spec): Result<void, SpecError>;

  /** Add an already-published feature set to the exported view. */
  exportFeatureSet(fqn: string): Result<void, SpecError>;

  /**
   * Look a spec up by FQN. Accepts `name`, `namespace.name` and
   * `namespace.name+aggrfn`; the aggregation suffix must be declared by the spec.
   */
  specByFqn(fqn: string): Result<Spec, SpecError>;

  /** Look a spec up by the name it was declared with. */
  specBySrcName(name: string): Spec | undefined;

  hasSpec(fqn: string): boolean;

  /** Remove a spec (and its exported entry). Returns whether it existed. */
  unregister(fqn: string): boolean;

  featureSpecs(): readonly FeatureSpec[];
  featureSetSpecs(): readonly FeatureSetSpec[];
  exportedFeatureSets(): readonly FeatureSetSpec[];
}
