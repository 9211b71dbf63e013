import { inject, singleton } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import type { CanonicalJsonError } from '../../domain/canonical/jcs.js';
import type { Spec } from '../../domain/spec/feature-spec.js';
import { formatFqn } from '../../domain/spec/fqn.js';
import type { RegistrationError, SpecError } from '../../domain/spec/spec-error.js';
import type { ManifestProducer } from '../../ports/manifest-producer.port.js';
import type { ProgramCompiler } from '../../ports/program-compiler.port.js';
import type { ReplayFactory } from '../../ports/replay-factory.port.js';
import type { SpecRegistry } from '../../ports/spec-registry.port.js';
import type { FeatureDraft, FeatureSetDraft, RegisteredFeature, RegisteredFeatureSet } from '../handles.js';
import { type RegisterFeatureInput, registerFeature } from '../registration/register-feature.js';
import { type RegisterFeatureSetInput, registerFeatureSet } from '../registration/register-feature-set.js';
import type { RegistrationDeps } from '../registration/registration-deps.js';

export interface ExportManifestsOptions {
  /** Every published spec instead of the exported feature sets and their features. */
  readonly all?: boolean;
}

export type ExportManifestsError = CanonicalJsonError | SpecError;

/**
 * Entry point for definition modules: the terminal `register` and
 * `featureSet` steps plus manifest export, bound to the container's
 * registry and producers.
 */
@singleton()
export class FeatureLab {
  private readonly logger: Logger;
  private readonly deps: RegistrationDeps;

  constructor(
    @inject(DI.Specs.Registry) private readonly specRegistry: SpecRegistry,
    @inject(DI.Specs.Compiler) compiler: ProgramCompiler,
    @inject(DI.Specs.ReplayFactory) replays: ReplayFactory,
    @inject(DI.Specs.ManifestProducer) private readonly manifests: ManifestProducer,
    @inject(DI.Config.App) config: ValidatedConfig,
    @inject(DI.Infra.LoggerFactory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('FeatureLab');
    this.deps = {
      registry: specRegistry,
      compiler,
      replays,
      manifests,
      defaultNamespace: config.specs.defaultNamespace,
    };
  }

  get registry(): SpecRegistry {
    return this.specRegistry;
  }

  register(draft: FeatureDraft, input: RegisterFeatureInput): Result<RegisteredFeature, RegistrationError> {
    const namespace = draft.options.namespace ?? input.options?.namespace ?? this.deps.defaultNamespace;
    const replacing = this.specRegistry.hasSpec(formatFqn(namespace, draft.name));

    return this.observe(registerFeature(this.deps, draft, input), replacing);
  }

  featureSet(
    draft: FeatureSetDraft,
    input: RegisterFeatureSetInput = {}
  ): Result<RegisteredFeatureSet, RegistrationError> {
    const namespace = input.options?.namespace ?? this.deps.defaultNamespace;
    const replacing = this.specRegistry.hasSpec(formatFqn(namespace, draft.name));

    const result = this.observe(registerFeatureSet(this.deps, draft, input), replacing);
    if (result.isOk()) {
      this.logger.debug(
        { fqn: result.value.spec.fqn, features: result.value.spec.features },
        'feature set references resolved'
      );
    }
    return result;
  }

  /**
   * Canonical JSON array of manifests. By default: every exported feature set,
   * preceded by the features they reference (each once, first reference first).
   */
  exportManifests(options: ExportManifestsOptions = {}): Result<string, ExportManifestsError> {
    if (options.all === true) {
      return this.manifests.renderAll([...this.specRegistry.featureSpecs(), ...this.specRegistry.featureSetSpecs()]);
    }

    const sets = this.specRegistry.exportedFeatureSets();
    const features = new Map<string, Spec>();
    for (const set of sets) {
      for (const fqn of set.features) {
        const found = this.specRegistry.specByFqn(fqn);
        if (found.isErr()) return err(found.error);
        if (!features.has(found.value.fqn)) features.set(found.value.fqn, found.value);
      }
    }

    const rendered = this.manifests.renderAll([...features.values(), ...sets]);
    if (rendered.isErr()) return err(rendered.error);
    this.logger.info({ featureSets: sets.length, features: features.size }, 'manifests exported');
    return ok(rendered.value);
  }

  private observe<T extends { readonly spec: Spec }>(
    result: Result<T, RegistrationError>,
    replacing: boolean
  ): Result<T, RegistrationError> {
    if (result.isErr()) {
      this.logger.warn({ err: result.error, name: result.error.declaredName }, 'registration rejected');
      return result;
    }

    const { spec } = result.value;
    if (replacing) {
      this.logger.warn({ fqn: spec.fqn }, 'spec replaced an earlier definition');
    }
    this.logger.info({ fqn: spec.fqn, kind: spec.kind }, 'spec published');
    return result;
  }
}
