/**
 * Drafts, references and registered handles.
 *
 * A draft is the builder value threaded through option modifiers. A handle
 * is what a terminal registration returns: the original callable with its
 * spec and output capabilities attached.
 */

import type {
  AggrSpec,
  BuilderSpec,
  FeatureHandler,
  FeatureSetSpec,
  FeatureSpec,
  ResourceReference,
} from '../domain/spec/feature-spec.js';
import type { ManifestAccessor } from '../ports/manifest-producer.port.js';
import type { HistoricalGet, Replay } from '../ports/replay-factory.port.js';

// ---------------------------------------------------------------------------
// Drafts
// ---------------------------------------------------------------------------

export interface StagedOptions {
  readonly aggr?: AggrSpec;
  readonly dataSource?: ResourceReference;
  readonly namespace?: string;
  readonly builder?: BuilderSpec;
}

export interface FeatureDraft {
  readonly kind: 'feature_draft';
  readonly handler: FeatureHandler;
  readonly name: string;
  readonly description: string;
  /** Declared result type, parsed by the program compiler. */
  readonly primitive: string;
  /** Cross-references the body reads; resolved at registration time. */
  readonly dependsOn: readonly FeatureReference[];
  readonly options: StagedOptions;
}

export type FeatureSetBody = () => readonly FeatureReference[];

export interface FeatureSetDraft {
  readonly kind: 'feature_set_draft';
  readonly body: FeatureSetBody;
  readonly name: string;
  readonly description: string;
}

// ---------------------------------------------------------------------------
// References
// ---------------------------------------------------------------------------

/** A reference by identifier, looked up in the caller-supplied scope. */
export interface SymbolRef {
  readonly kind: 'symbol';
  readonly identifier: string;
}

/**
 * How a feature set (or a feature body) names another feature:
 * - a literal FQN string (`ns.name`, `ns.name+sum`)
 * - a registered handle (a variable holding it)
 * - a symbol resolved through the scope
 */
export type FeatureReference = string | FeatureHandle | SymbolRef;

export function sym(identifier: string): SymbolRef {
  return { kind: 'symbol', identifier };
}

export function isSymbolRef(value: unknown): value is SymbolRef {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'symbol' &&
    'identifier' in value &&
    typeof value.identifier === 'string'
  );
}

// ---------------------------------------------------------------------------
// Registered handles
// ---------------------------------------------------------------------------

export interface FeatureCapabilities {
  readonly spec: FeatureSpec;
  readonly replay: Replay;
  readonly manifest: ManifestAccessor;
  readonly export: ManifestAccessor;
}

export interface FeatureSetCapabilities {
  readonly spec: FeatureSetSpec;
  readonly historicalGet: HistoricalGet;
  readonly manifest: ManifestAccessor;
  readonly export: ManifestAccessor;
}

export type RegisteredFeature = FeatureHandler & FeatureCapabilities;
export type RegisteredFeatureSet = FeatureSetBody & FeatureSetCapabilities;
export type FeatureHandle = RegisteredFeature | RegisteredFeatureSet;

/**
 * Whether `value` carries an attached spec. The resolver still checks the
 * registry before trusting it.
 */
export function isFeatureHandle(value: unknown): value is FeatureHandle {
  if (typeof value !== 'function' || !('spec' in value)) return false;
  const spec: unknown = value.spec;
  return (
    typeof spec === 'object' &&
    spec !== null &&
    'kind' in spec &&
    (spec.kind === 'feature' || spec.kind === 'feature_set')
  );
}
