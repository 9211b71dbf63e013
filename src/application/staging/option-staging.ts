/**
 * Option Staging
 *
 * Modifiers attach options to a feature draft before the terminal
 * `register` call consumes them. Each modifier returns a new draft; the
 * input is never mutated, so a staged option cannot leak into an
 * unrelated definition.
 *
 *   const draft = stageOptions(
 *     defineFeature(clicks, { primitive: 'int' }),
 *     aggr([AggrFn.Sum, AggrFn.Count], '1d'),
 *     namespace('ads'),
 *   );
 */

import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { AggrFn } from '../../domain/spec/aggregation.js';
import { type FeatureHandler, freezeOptions } from '../../domain/spec/feature-spec.js';
import { type SpecError, SpecErr } from '../../domain/spec/spec-error.js';
import type {
  FeatureDraft,
  FeatureReference,
  FeatureSetBody,
  FeatureSetDraft,
  RegisteredFeature,
  StagedOptions,
} from '../handles.js';

export type StagingTarget = FeatureDraft | RegisteredFeature;

export type OptionModifier = (target: StagingTarget) => Result<FeatureDraft, SpecError>;

export interface DefineFeatureOptions {
  /** Defaults to the handler's own name. */
  readonly name?: string;
  readonly description?: string;
  /** Declared result type (`int`, `float`, `[]string`, ...). */
  readonly primitive: string;
  readonly dependsOn?: readonly FeatureReference[];
}

export function defineFeature(handler: FeatureHandler, options: DefineFeatureOptions): FeatureDraft {
  return {
    kind: 'feature_draft',
    handler,
    name: options.name ?? handler.name,
    description: options.description ?? '',
    primitive: options.primitive,
    dependsOn: options.dependsOn ?? [],
    options: {},
  };
}

export interface DefineFeatureSetOptions {
  readonly name?: string;
  readonly description?: string;
}

/** The body must take no parameters and return the set's references. */
export function defineFeatureSet(body: FeatureSetBody, options: DefineFeatureSetOptions = {}): FeatureSetDraft {
  return {
    kind: 'feature_set_draft',
    body,
    name: options.name ?? body.name,
    description: options.description ?? '',
  };
}

// ---------------------------------------------------------------------------
// Modifiers
// ---------------------------------------------------------------------------

/**
 * Aggregations for the feature. `granularity` substitutes for freshness.
 * Fails for the `unknown` sentinel regardless of the target.
 */
export function aggr(funcs: readonly AggrFn[], granularity?: string): OptionModifier {
  return (target) => {
    if (funcs.some((fn) => fn === AggrFn.Unknown)) {
      return err(SpecErr.unknownAggrFn());
    }
    return stage(target, {
      aggr: granularity === undefined ? { funcs: [...funcs] } : { funcs: [...funcs], granularity },
    });
  };
}

export function dataSource(name: string, namespace?: string): OptionModifier {
  return (target) => stage(target, { dataSource: namespace === undefined ? { name } : { name, namespace } });
}

export function namespace(ns: string): OptionModifier {
  return (target) => stage(target, { namespace: ns });
}

export function builder(kind: string, options: Readonly<Record<string, unknown>> = {}): OptionModifier {
  return (target) => stage(target, { builder: { kind, options: freezeOptions(options) } });
}

/** Apply modifiers left to right; the first failure stops the chain. */
export function stageOptions(
  target: StagingTarget,
  ...modifiers: readonly OptionModifier[]
): Result<FeatureDraft, SpecError> {
  let current: Result<FeatureDraft, SpecError> = isRegistered(target)
    ? err(SpecErr.modifierAfterRegister())
    : ok(target);

  for (const modifier of modifiers) {
    current = current.andThen(modifier);
  }
  return current;
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

function stage(target: StagingTarget, options: StagedOptions): Result<FeatureDraft, SpecError> {
  if (isRegistered(target)) {
    return err(SpecErr.modifierAfterRegister());
  }
  return ok({ ...target, options: { ...target.options, ...options } });
}

function isRegistered(target: StagingTarget): target is RegisteredFeature {
  return typeof target === 'function';
}
