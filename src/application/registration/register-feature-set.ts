/**
 * Registration pipeline: feature sets
 *
 * The body is a zero-argument function returning the set's references. It
 * runs exactly once, here; its references resolve against the registry as
 * it stands at that moment, so the features must be registered first.
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { DEFAULT_FEATURE_SET_TIMEOUT, createFeatureSetSpec } from '../../domain/spec/feature-spec.js';
import { type Fqn, normalizeFqn } from '../../domain/spec/fqn.js';
import { FeatureSetInputSchema, toInputIssues } from '../../domain/spec/schemas.js';
import { type RegistrationError, type SpecError, SpecErr, registrationFailed } from '../../domain/spec/spec-error.js';
import type { FeatureReference, FeatureSetBody, FeatureSetDraft, RegisteredFeatureSet } from '../handles.js';
import { isFeatureHandle, isSymbolRef } from '../handles.js';
import { createFqnResolver } from '../resolution/fqn-resolver.js';
import { EMPTY_SCOPE, type SymbolScope } from '../resolution/symbol-scope.js';
import type { RegistrationDeps } from './registration-deps.js';

export interface FeatureSetOptions {
  readonly namespace?: string;
  /** FQN of the member that carries the set's entity key. */
  readonly keyFeature?: string;
  readonly timeout?: string;
}

export interface RegisterFeatureSetInput {
  /** Also publish under the exported view. */
  readonly register?: boolean;
  readonly options?: FeatureSetOptions;
  readonly scope?: SymbolScope;
}

export function registerFeatureSet(
  deps: RegistrationDeps,
  draft: FeatureSetDraft,
  input: RegisterFeatureSetInput = {}
): Result<RegisteredFeatureSet, RegistrationError> {
  return buildAndPublish(deps, draft, input).mapErr((cause) => registrationFailed(draft.name || '<anonymous>', cause));
}

function buildAndPublish(
  deps: RegistrationDeps,
  draft: FeatureSetDraft,
  input: RegisterFeatureSetInput
): Result<RegisteredFeatureSet, SpecError> {
  const options = input.options ?? {};

  if (declaresParameters(draft.body)) {
    return err(SpecErr.invalidFeatureSetSignature(draft.name));
  }

  const parsed = FeatureSetInputSchema.safeParse({
    name: draft.name,
    namespace: options.namespace,
    keyFeature: options.keyFeature,
    timeout: options.timeout,
  });
  if (!parsed.success) {
    return err(SpecErr.invalidInput(toInputIssues(parsed.error)));
  }

  const entries = invokeBody(draft);
  if (entries.isErr()) return err(entries.error);

  const resolver = createFqnResolver({
    registry: deps.registry,
    scope: input.scope ?? EMPTY_SCOPE,
    defaultNamespace: deps.defaultNamespace,
  });

  const features: Fqn[] = [];
  for (const entry of entries.value) {
    const resolved = resolver.resolve(entry);
    if (resolved.isErr()) return err(resolved.error);
    features.push(resolved.value);
  }

  let keyFeature: Fqn | undefined;
  if (parsed.data.keyFeature !== undefined) {
    const normalized = normalizeFqn(parsed.data.keyFeature, deps.defaultNamespace);
    if (normalized.isErr()) return err(normalized.error);
    if (!features.includes(normalized.value)) {
      return err(
        SpecErr.invalidInput([{ path: 'keyFeature', message: `${normalized.value} is not a member of the feature set` }])
      );
    }
    keyFeature = normalized.value;
  }

  const spec = createFeatureSetSpec({
    name: draft.name,
    namespace: parsed.data.namespace ?? deps.defaultNamespace,
    description: draft.description,
    features,
    ...(keyFeature !== undefined ? { keyFeature } : {}),
    timeout: parsed.data.timeout ?? DEFAULT_FEATURE_SET_TIMEOUT,
  });

  const published = deps.registry.registerSpec(spec);
  if (published.isErr()) return err(published.error);

  if (input.register === true) {
    const exported = deps.registry.exportFeatureSet(spec.fqn);
    if (exported.isErr()) return err(exported.error);
  }

  const body = draft.body;
  const manifest = deps.manifests.accessorFor(spec);
  const handle: RegisteredFeatureSet = Object.assign(() => body(), {
    spec,
    historicalGet: deps.replays.newHistoricalGet(spec),
    manifest,
    export: manifest,
  });
  return ok(handle);
}

function invokeBody(draft: FeatureSetDraft): Result<readonly FeatureReference[], SpecError> {
  let returned: unknown;
  try {
    returned = draft.body();
  } catch (cause) {
    return err(SpecErr.featureSetBodyFailed(cause));
  }

  if (!Array.isArray(returned)) {
    return err(SpecErr.invalidFeatureSetSignature(draft.name));
  }

  const values: readonly unknown[] = returned;
  const entries: FeatureReference[] = [];
  for (const [index, entry] of values.entries()) {
    if (typeof entry === 'string' || isFeatureHandle(entry) || isSymbolRef(entry)) {
      entries.push(entry);
      continue;
    }
    return err(SpecErr.invalidFeatureSetEntry(index, 'must be an FQN string, a registered feature or a symbol'));
  }
  return ok(entries);
}

const SINGLE_PARAM_ARROW = /^(?:async\s+)?[A-Za-z_$][\w$]*\s*=>/;

/**
 * `Function.length` stops counting at the first default or rest parameter,
 * so the parameter list is read from the source text as well.
 */
function declaresParameters(body: FeatureSetBody): boolean {
  if (body.length !== 0) return true;

  const source = Function.prototype.toString.call(body);
  if (SINGLE_PARAM_ARROW.test(source)) return true;

  const open = source.indexOf('(');
  if (open === -1) return false;

  let depth = 0;
  let quote: string | null = null;
  for (let i = open; i < source.length; i++) {
    const ch = source[i];
    if (quote !== null) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') {
      quote = ch;
    } else if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      if (depth === 0) return source.slice(open + 1, i).trim() !== '';
    }
  }
  return false;
}
