import type { Result } from 'neverthrow';
import type { FeatureDraft, FeatureReference } from '../application/handles.js';
import type { Program } from '../domain/spec/feature-spec.js';
import type { Fqn } from '../domain/spec/fqn.js';
import type { PrimitiveType } from '../domain/spec/primitives.js';
import type { SpecError } from '../domain/spec/spec-error.js';

export type ResolveFqn = (ref: FeatureReference) => Result<Fqn, SpecError>;

export interface CompiledProgram {
  readonly primitive: PrimitiveType;
  readonly program: Program;
}

/**
 * Program compiler port.
 *
 * Turns a draft's body into a deferred computation and infers its result
 * type. Cross-references inside the body go through `resolveFqn`; any
 * failure propagates as a registration failure.
 */
export interface ProgramCompiler {
  compile(draft: FeatureDraft, resolveFqn: ResolveFqn): Result<CompiledProgram, SpecError>;
}
