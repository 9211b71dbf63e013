import type { Result } from 'neverthrow';
import type { Spec } from '../domain/spec/feature-spec.js';
import type { JsonObject } from '../domain/canonical/json-types.js';
import type { CanonicalJsonError } from '../domain/canonical/jcs.js';

export interface Manifest extends JsonObject {
  readonly apiVersion: string;
  readonly kind: 'Feature' | 'FeatureSet';
  readonly metadata: JsonObject;
  readonly spec: JsonObject;
}

/** Output accessor attached to registered handles as `manifest` and `export`. */
export type ManifestAccessor = () => Result<string, CanonicalJsonError>;

/**
 * Manifest producer port.
 *
 * Describes finished specs for external consumption.
 */
export interface ManifestProducer {
  manifestOf(spec: Spec): Result<Manifest, CanonicalJsonError>;
  /** Canonical JSON text of one spec's manifest. */
  render(spec: Spec): Result<string, CanonicalJsonError>;
  /** Canonical JSON array of several manifests, in the given order. */
  renderAll(specs: readonly Spec[]): Result<string, CanonicalJsonError>;
  accessorFor(spec: Spec): ManifestAccessor;
}
