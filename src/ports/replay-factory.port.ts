import type { Result } from 'neverthrow';
import type { FeatureSetSpec, FeatureSpec } from '../domain/spec/feature-spec.js';
import type { Fqn } from '../domain/spec/fqn.js';
import type { PrimitiveType } from '../domain/spec/primitives.js';
import type { HistoricalSourceError, HistoricalValueSource } from './historical-value-source.port.js';

// ---------------------------------------------------------------------------
// Replay (features)
// ---------------------------------------------------------------------------

export interface ReplayRequest {
  readonly keys: Readonly<Record<string, string>>;
  /** Defaults to the clock's current time. */
  readonly timestamp?: Date;
  readonly dependencies?: Readonly<Record<string, unknown>>;
}

export interface ReplayRow {
  readonly fqn: Fqn;
  readonly keys: Readonly<Record<string, string>>;
  readonly timestamp: Date;
  readonly value: unknown;
}

export type ReplayError =
  | { readonly code: 'REPLAY_MISSING_KEY'; readonly index: number; readonly key: string; readonly message: string }
  | { readonly code: 'REPLAY_HANDLER_FAILED'; readonly index: number; readonly cause: unknown; readonly message: string }
  | {
      readonly code: 'REPLAY_TYPE_MISMATCH';
      readonly index: number;
      readonly expected: PrimitiveType;
      readonly actual: PrimitiveType;
      readonly message: string;
    };

export type Replay = (requests: readonly ReplayRequest[]) => Result<readonly ReplayRow[], ReplayError>;

// ---------------------------------------------------------------------------
// Historical get (feature sets)
// ---------------------------------------------------------------------------

export interface HistoricalQuery {
  readonly keys: Readonly<Record<string, string>>;
  readonly timestamp: Date;
}

export interface HistoricalRow {
  readonly keys: Readonly<Record<string, string>>;
  readonly timestamp: Date;
  /** Column order: the feature set's feature order. */
  readonly columns: readonly Fqn[];
  readonly values: Readonly<Record<string, unknown>>;
}

export type HistoricalGet = (
  queries: readonly HistoricalQuery[],
  source: HistoricalValueSource
) => Result<readonly HistoricalRow[], HistoricalSourceError>;

/**
 * Replay factory port.
 *
 * Invoked exactly once per successful registration, after the spec is
 * fully validated.
 */
export interface ReplayFactory {
  newReplay(spec: FeatureSpec): Replay;
  newHistoricalGet(spec: FeatureSetSpec): HistoricalGet;
}
