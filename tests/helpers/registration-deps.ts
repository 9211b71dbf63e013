import type { AppConfig } from '../../src/config/app-config.js';
import { createValidatedConfig } from '../../src/config/app-config.js';
import { DeclaredProgramCompiler } from '../../src/application/compiler/declared-program-compiler.js';
import type { RegistrationDeps } from '../../src/application/registration/registration-deps.js';
import { InMemorySpecRegistry } from '../../src/infrastructure/registry/in-memory-spec-registry.js';
import { CanonicalManifestProducer } from '../../src/infrastructure/manifest/canonical-manifest-producer.js';
import { LocalReplayFactory } from '../../src/infrastructure/replay/local-replay-factory.js';
import { FakeTimeClock } from '../fakes/time-clock.fake.js';
import { TEST_APP_CONFIG } from '../di/test-container.js';

export interface TestDeps {
  readonly deps: RegistrationDeps;
  readonly registry: InMemorySpecRegistry;
  readonly clock: FakeTimeClock;
}

/**
 * Pipeline collaborators wired by hand, without the container.
 */
export function createTestDeps(appConfig: AppConfig = TEST_APP_CONFIG): TestDeps {
  const config = createValidatedConfig(appConfig);
  const clock = new FakeTimeClock();
  const registry = new InMemorySpecRegistry(config);

  return {
    deps: {
      registry,
      compiler: new DeclaredProgramCompiler(),
      replays: new LocalReplayFactory(clock),
      manifests: new CanonicalManifestProducer(config),
      defaultNamespace: config.specs.defaultNamespace,
    },
    registry,
    clock,
  };
}
