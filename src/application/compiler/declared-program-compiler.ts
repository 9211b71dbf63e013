import { singleton } from 'tsyringe';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Program } from '../../domain/spec/feature-spec.js';
import type { Fqn } from '../../domain/spec/fqn.js';
import { parsePrimitive } from '../../domain/spec/primitives.js';
import { type SpecError, SpecErr } from '../../domain/spec/spec-error.js';
import type { CompiledProgram, ProgramCompiler, ResolveFqn } from '../../ports/program-compiler.port.js';
import type { FeatureDraft } from '../handles.js';

/**
 * Default program compiler.
 *
 * TypeScript handlers carry no inspectable body, so the result type is the
 * one the draft declares and the cross-references are the draft's
 * `dependsOn` list. The program wraps the handler unchanged.
 */
@singleton()
export class DeclaredProgramCompiler implements ProgramCompiler {
  compile(draft: FeatureDraft, resolveFqn: ResolveFqn): Result<CompiledProgram, SpecError> {
    const primitive = parsePrimitive(draft.primitive);
    if (primitive === 'unknown') {
      return err(SpecErr.compileFailed(`unsupported primitive type '${draft.primitive}'`));
    }

    const dependencies: Fqn[] = [];
    for (const ref of draft.dependsOn) {
      const resolved = resolveFqn(ref);
      if (resolved.isErr()) return err(resolved.error);
      dependencies.push(resolved.value);
    }

    const handler = draft.handler;
    const program: Program = {
      primitive,
      dependencies,
      run: (request) => handler(request),
    };

    return ok({ primitive, program });
  }
}
