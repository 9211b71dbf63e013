import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DI } from './tokens.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { AppError, NotInitializedError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import { createBootstrapLogger } from '../core/logging/index.js';
import type { FeatureLab } from '../application/services/feature-lab.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;
let initialization: Promise<Result<void, AppError>> | null = null;

export interface ContainerInitOptions {
  /** Environment to read configuration from. Defaults to `process.env`. */
  readonly env?: Record<string, string | undefined>;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(options: ContainerInitOptions): Result<void, AppError> {
  // Tests register a config before initialization; never overwrite it.
  if (container.isRegistered(DI.Config.App)) return ok(undefined);

  return loadConfig({ env: options.env ?? process.env }).map((config) => {
    container.register<ValidatedConfig>(DI.Config.App, { useValue: config });
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// INFRASTRUCTURE REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

async function registerInfrastructure(): Promise<void> {
  const { PinoLoggerFactory } = await import('../core/logging/create-logger.js');
  const { SystemClock } = await import('../infrastructure/clock/system-clock.js');

  if (!container.isRegistered(DI.Infra.LoggerFactory)) {
    container.register(DI.Infra.LoggerFactory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }
  if (!container.isRegistered(DI.Infra.Clock)) {
    container.register(DI.Infra.Clock, {
      useFactory: instanceCachingFactory((c) => c.resolve(SystemClock)),
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SPEC SERVICES REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

async function registerSpecServices(): Promise<void> {
  // Dependencies before dependents. Each token is registered only when
  // missing so tests can substitute fakes.
  const { InMemorySpecRegistry } = await import('../infrastructure/registry/in-memory-spec-registry.js');
  const { DeclaredProgramCompiler } = await import('../application/compiler/declared-program-compiler.js');
  const { LocalReplayFactory } = await import('../infrastructure/replay/local-replay-factory.js');
  const { CanonicalManifestProducer } = await import('../infrastructure/manifest/canonical-manifest-producer.js');
  const { FeatureLab } = await import('../application/services/feature-lab.js');

  if (!container.isRegistered(DI.Specs.Registry)) {
    container.register(DI.Specs.Registry, {
      useFactory: instanceCachingFactory((c) => c.resolve(InMemorySpecRegistry)),
    });
  }
  if (!container.isRegistered(DI.Specs.Compiler)) {
    container.register(DI.Specs.Compiler, {
      useFactory: instanceCachingFactory((c) => c.resolve(DeclaredProgramCompiler)),
    });
  }
  if (!container.isRegistered(DI.Specs.ReplayFactory)) {
    container.register(DI.Specs.ReplayFactory, {
      useFactory: instanceCachingFactory((c) => c.resolve(LocalReplayFactory)),
    });
  }
  if (!container.isRegistered(DI.Specs.ManifestProducer)) {
    container.register(DI.Specs.ManifestProducer, {
      useFactory: instanceCachingFactory((c) => c.resolve(CanonicalManifestProducer)),
    });
  }
  container.register(DI.Services.Lab, {
    useFactory: instanceCachingFactory((c) => c.resolve(FeatureLab)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container: validated config, infrastructure, spec services.
 *
 * Idempotent: concurrent and repeated calls share one initialization.
 * Invalid configuration is returned as an error; nothing is registered after it.
 */
export function initializeContainer(options: ContainerInitOptions = {}): Promise<Result<void, AppError>> {
  if (initialization === null) {
    initialization = runInitialization(options);
  }
  return initialization;
}

async function runInitialization(options: ContainerInitOptions): Promise<Result<void, AppError>> {
  const configured = registerConfig(options);
  if (configured.isErr()) {
    initialization = null;
    return err(configured.error);
  }

  try {
    await registerInfrastructure();
    await registerSpecServices();
  } catch (error) {
    initialization = null;
    return err(Err.unexpected('Container initialization failed', error));
  }

  initialized = true;
  createBootstrapLogger('DI').debug('container initialized');
  return ok(undefined);
}

export function isInitialized(): boolean {
  return initialized;
}

/** The container's `FeatureLab`; fails before `initializeContainer` completes. */
export function getFeatureLab(): Result<FeatureLab, NotInitializedError> {
  if (!initialized) return err(Err.notInitialized('FeatureLab'));
  return ok(container.resolve<FeatureLab>(DI.Services.Lab));
}

/**
 * Reset the container (tests only). Clears every registration, including
 * test-provided config and fakes.
 */
export function resetContainer(): void {
  container.clearInstances();
  container.reset();
  initialized = false;
  initialization = null;
}

export { container };
