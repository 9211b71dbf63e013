import { inject, singleton } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { FeatureSetSpec, FeatureSpec, Spec } from '../../domain/spec/feature-spec.js';
import { toCanonicalJson, type CanonicalJsonError } from '../../domain/canonical/jcs.js';
import { JsonValueSchema } from '../../domain/canonical/json-schema.js';
import type { JsonObject } from '../../domain/canonical/json-types.js';
import type { Manifest, ManifestAccessor, ManifestProducer } from '../../ports/manifest-producer.port.js';

/**
 * Renders specs as resource manifests in RFC 8785 canonical JSON, so a
 * given spec always exports byte-identical text.
 */
@singleton()
export class CanonicalManifestProducer implements ManifestProducer {
  constructor(@inject(DI.Config.App) private readonly config: ValidatedConfig) {}

  manifestOf(spec: Spec): Result<Manifest, CanonicalJsonError> {
    const metadata: JsonObject = {
      name: spec.name,
      namespace: spec.namespace,
      ...(spec.description !== '' ? { description: spec.description } : {}),
    };

    const body: Result<JsonObject, CanonicalJsonError> =
      spec.kind === 'feature' ? featureBody(spec) : ok(featureSetBody(spec));

    return body.map((content): Manifest => ({
      apiVersion: this.config.manifest.apiVersion,
      kind: spec.kind === 'feature' ? 'Feature' : 'FeatureSet',
      metadata,
      spec: content,
    }));
  }

  render(spec: Spec): Result<string, CanonicalJsonError> {
    return this.manifestOf(spec).andThen((manifest) => toCanonicalJson(manifest));
  }

  renderAll(specs: readonly Spec[]): Result<string, CanonicalJsonError> {
    const manifests: Manifest[] = [];
    for (const spec of specs) {
      const res = this.manifestOf(spec);
      if (res.isErr()) return err(res.error);
      manifests.push(res.value);
    }
    return toCanonicalJson(manifests);
  }

  accessorFor(spec: Spec): ManifestAccessor {
    return () => this.render(spec);
  }
}

// ---------------------------------------------------------------------------
// Bodies
// ---------------------------------------------------------------------------

function featureBody(spec: FeatureSpec): Result<JsonObject, CanonicalJsonError> {
  let builder: JsonObject | undefined;
  if (spec.builder !== undefined) {
    const options = JsonValueSchema.safeParse(spec.builder.options);
    if (!options.success) {
      return err({
        code: 'CANONICAL_JSON_UNSUPPORTED_VALUE',
        message: `builder options of ${spec.fqn} are not JSON: ${options.error.errors[0]?.message ?? 'invalid value'}`,
      });
    }
    builder = { kind: spec.builder.kind, options: options.data };
  }

  return ok({
    primitive: spec.primitive,
    keys: spec.keys,
    freshness: spec.freshness,
    staleness: spec.staleness,
    dependencies: spec.program.dependencies,
    ...(spec.aggr !== undefined
      ? {
          aggr: {
            funcs: spec.aggr.funcs,
            ...(spec.aggr.granularity !== undefined ? { granularity: spec.aggr.granularity } : {}),
          },
        }
      : {}),
    ...(spec.dataSource !== undefined
      ? {
          dataSource: {
            name: spec.dataSource.name,
            ...(spec.dataSource.namespace !== undefined ? { namespace: spec.dataSource.namespace } : {}),
          },
        }
      : {}),
    ...(builder !== undefined ? { builder } : {}),
  });
}

function featureSetBody(spec: FeatureSetSpec): JsonObject {
  return {
    features: spec.features,
    timeout: spec.timeout,
    ...(spec.keyFeature !== undefined ? { keyFeature: spec.keyFeature } : {}),
  };
}
