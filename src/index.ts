import 'reflect-metadata';

// DI container
export { initializeContainer, getFeatureLab, isInitialized, resetContainer, container } from './di/container.js';
export type { ContainerInitOptions } from './di/container.js';
export { DI } from './di/tokens.js';

// Registration
export { FeatureLab } from './application/services/feature-lab.js';
export type { ExportManifestsOptions, ExportManifestsError } from './application/services/feature-lab.js';
export { registerFeature } from './application/registration/register-feature.js';
export type { RegisterFeatureInput } from './application/registration/register-feature.js';
export { registerFeatureSet } from './application/registration/register-feature-set.js';
export type { FeatureSetOptions, RegisterFeatureSetInput } from './application/registration/register-feature-set.js';
export type { RegistrationDeps } from './application/registration/registration-deps.js';

// Option staging
export {
  aggr,
  builder,
  dataSource,
  defineFeature,
  defineFeatureSet,
  namespace,
  stageOptions,
} from './application/staging/option-staging.js';
export type {
  DefineFeatureOptions,
  DefineFeatureSetOptions,
  OptionModifier,
  StagingTarget,
} from './application/staging/option-staging.js';

// Handles and references
export { isFeatureHandle, isSymbolRef, sym } from './application/handles.js';
export type {
  FeatureDraft,
  FeatureHandle,
  FeatureReference,
  FeatureSetBody,
  FeatureSetDraft,
  RegisteredFeature,
  RegisteredFeatureSet,
  StagedOptions,
  SymbolRef,
} from './application/handles.js';

// Resolution
export { createFqnResolver } from './application/resolution/fqn-resolver.js';
export type { FqnResolver, FqnResolverDeps } from './application/resolution/fqn-resolver.js';
export { createScope, EMPTY_SCOPE } from './application/resolution/symbol-scope.js';
export type { ScopeBindings, SymbolScope } from './application/resolution/symbol-scope.js';

// Domain
export { AggrFn, parseAggrFn, supports } from './domain/spec/aggregation.js';
export { parsePrimitive } from './domain/spec/primitives.js';
export type { PrimitiveType } from './domain/spec/primitives.js';
export { formatFqn, normalizeFqn, parseFqn } from './domain/spec/fqn.js';
export type { Fqn, ParsedFqn } from './domain/spec/fqn.js';
export { DEFAULT_FEATURE_SET_TIMEOUT, fqnFor, isFeatureSetSpec, isFeatureSpec } from './domain/spec/feature-spec.js';
export type {
  AggrSpec,
  BuilderSpec,
  FeatureHandler,
  FeatureRequest,
  FeatureSetSpec,
  FeatureSpec,
  Program,
  ResourceReference,
  Spec,
} from './domain/spec/feature-spec.js';
export { SpecErr } from './domain/spec/spec-error.js';
export type { RegistrationError, SpecError } from './domain/spec/spec-error.js';

// Ports
export type { SpecRegistry } from './ports/spec-registry.port.js';
export type { ProgramCompiler, CompiledProgram, ResolveFqn } from './ports/program-compiler.port.js';
export type {
  HistoricalGet,
  HistoricalQuery,
  HistoricalRow,
  Replay,
  ReplayError,
  ReplayFactory,
  ReplayRequest,
  ReplayRow,
} from './ports/replay-factory.port.js';
export type { HistoricalSourceError, HistoricalValueSource } from './ports/historical-value-source.port.js';
export type { Manifest, ManifestAccessor, ManifestProducer } from './ports/manifest-producer.port.js';
export type { TimeClockPort } from './ports/time-clock.port.js';

// Config and errors
export { loadConfig, createValidatedConfig } from './config/app-config.js';
export type { AppConfig, ConflictPolicy, ValidatedConfig } from './config/app-config.js';
export { formatAppError, formatRegistrationError, formatSpecError } from './errors/index.js';
export type { AppError } from './errors/index.js';
