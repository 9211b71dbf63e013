/**
 * Registration pipeline: features
 *
 * One pass from draft to published spec:
 *
 *   validate input → merge staged options → timing rules → compile program
 *   → aggregation/primitive check → build spec → publish → attach outputs
 *
 * Every failure is returned before the registry is touched. The aggregation
 * check runs after compilation because only the compiled program knows the
 * primitive.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { AggrFn, supports } from '../../domain/spec/aggregation.js';
import type { AggrSpec, FeatureRequest } from '../../domain/spec/feature-spec.js';
import { createFeatureSpec } from '../../domain/spec/feature-spec.js';
import { FeatureInputSchema, toInputIssues } from '../../domain/spec/schemas.js';
import { type RegistrationError, type SpecError, SpecErr, registrationFailed } from '../../domain/spec/spec-error.js';
import type { FeatureDraft, RegisteredFeature, StagedOptions } from '../handles.js';
import { createFqnResolver } from '../resolution/fqn-resolver.js';
import { EMPTY_SCOPE, type SymbolScope } from '../resolution/symbol-scope.js';
import type { RegistrationDeps } from './registration-deps.js';

export interface RegisterFeatureInput {
  readonly keys: string | readonly string[];
  readonly staleness: string;
  /** Empty or omitted: an aggregation granularity must stand in. */
  readonly freshness?: string;
  /** Explicit options; staged options on the draft win over these. */
  readonly options?: StagedOptions;
  /** Bindings for symbol references in the draft's `dependsOn`. */
  readonly scope?: SymbolScope;
}

export function registerFeature(
  deps: RegistrationDeps,
  draft: FeatureDraft,
  input: RegisterFeatureInput
): Result<RegisteredFeature, RegistrationError> {
  return buildAndPublish(deps, draft, input).mapErr((cause) => registrationFailed(draft.name || '<anonymous>', cause));
}

function buildAndPublish(
  deps: RegistrationDeps,
  draft: FeatureDraft,
  input: RegisterFeatureInput
): Result<RegisteredFeature, SpecError> {
  const freshness = input.freshness ?? '';
  const options: StagedOptions = { ...input.options, ...draft.options };
  const namespace = options.namespace ?? deps.defaultNamespace;

  const parsed = FeatureInputSchema.safeParse({
    name: draft.name,
    namespace,
    keys: input.keys,
    staleness: input.staleness,
    freshness,
    aggr: options.aggr,
    dataSource: options.dataSource,
    builder: options.builder,
  });
  if (!parsed.success) {
    return err(SpecErr.invalidInput(toInputIssues(parsed.error)));
  }

  const aggr = normalizeAggr(options.aggr);
  if (aggr?.funcs.includes(AggrFn.Unknown)) {
    return err(SpecErr.unknownAggrFn());
  }

  if (freshness === '' && aggr?.granularity === undefined) {
    return err(SpecErr.missingFreshness(draft.name));
  }
  if (input.staleness === '') {
    return err(SpecErr.missingStaleness(draft.name));
  }

  const resolver = createFqnResolver({
    registry: deps.registry,
    scope: input.scope ?? EMPTY_SCOPE,
    defaultNamespace: deps.defaultNamespace,
  });
  const compiled = deps.compiler.compile(draft, (ref) => resolver.resolve(ref));
  if (compiled.isErr()) return err(compiled.error);

  const { primitive, program } = compiled.value;
  for (const fn of aggr?.funcs ?? []) {
    if (!supports(fn, primitive)) {
      return err(SpecErr.aggrPrimitiveMismatch(draft.name, fn, primitive));
    }
  }

  const spec = createFeatureSpec({
    name: draft.name,
    namespace,
    description: draft.description,
    keys: parsed.data.keys,
    freshness,
    staleness: input.staleness,
    primitive,
    program,
    ...(aggr !== undefined ? { aggr } : {}),
    ...(options.dataSource !== undefined ? { dataSource: options.dataSource } : {}),
    ...(options.builder !== undefined ? { builder: options.builder } : {}),
  });

  const published = deps.registry.registerSpec(spec);
  if (published.isErr()) return err(published.error);

  const handler = draft.handler;
  const manifest = deps.manifests.accessorFor(spec);
  const handle: RegisteredFeature = Object.assign((request: FeatureRequest) => handler(request), {
    spec,
    replay: deps.replays.newReplay(spec),
    manifest,
    export: manifest,
  });
  return ok(handle);
}

/** An empty granularity means none. */
function normalizeAggr(aggr: AggrSpec | undefined): AggrSpec | undefined {
  if (aggr === undefined) return undefined;
  if (aggr.granularity === undefined || aggr.granularity === '') return { funcs: aggr.funcs };
  return aggr;
}
