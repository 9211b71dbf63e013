import type { ManifestProducer } from '../../ports/manifest-producer.port.js';
import type { ProgramCompiler } from '../../ports/program-compiler.port.js';
import type { ReplayFactory } from '../../ports/replay-factory.port.js';
import type { SpecRegistry } from '../../ports/spec-registry.port.js';

/**
 * Collaborators of the registration pipeline. Passed explicitly so the
 * pipeline stays a plain function; the service wires them from DI.
 */
export interface RegistrationDeps {
  readonly registry: SpecRegistry;
  readonly compiler: ProgramCompiler;
  readonly replays: ReplayFactory;
  readonly manifests: ManifestProducer;
  readonly defaultNamespace: string;
}
